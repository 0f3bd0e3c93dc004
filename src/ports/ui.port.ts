// =============================================================================
// UI Port — Declarative component tree handed to the host's UI framework
// =============================================================================

interface ComponentBase {
  elemId?: string;
  visible?: boolean;
}

export interface ButtonComponent extends ComponentBase {
  kind: "button";
  value: string;
}

export interface CheckboxComponent extends ComponentBase {
  kind: "checkbox";
  label: string;
  info?: string;
  value: boolean;
}

export interface DropdownComponent extends ComponentBase {
  kind: "dropdown";
  label: string;
  choices: string[];
  value: string;
  interactive: boolean;
}

export interface SliderComponent extends ComponentBase {
  kind: "slider";
  label: string;
  minimum: number;
  maximum: number;
  step: number;
  value: number;
  interactive: boolean;
}

export interface HtmlComponent extends ComponentBase {
  kind: "html";
  html: string;
}

export interface RowComponent extends ComponentBase {
  kind: "row";
  children: UiComponent[];
}

export interface ColumnComponent extends ComponentBase {
  kind: "column";
  children: UiComponent[];
}

export type UiComponent =
  | ButtonComponent
  | CheckboxComponent
  | DropdownComponent
  | SliderComponent
  | HtmlComponent
  | RowComponent
  | ColumnComponent;

/** Literal argument passed to a browser-side action ahead of control values */
export type ActionArg = string | number | boolean;

/**
 * Click wiring: when `trigger` is clicked the browser calls `action` with
 * `args` followed by the current values of the `inputs` controls.
 */
export interface ActionBinding {
  trigger: string;
  action: string;
  args: readonly ActionArg[];
  inputs: readonly string[];
}

export interface TabDescriptor {
  content: RowComponent[];
  label: string;
  elemId: string;
  bindings: readonly ActionBinding[];
}
