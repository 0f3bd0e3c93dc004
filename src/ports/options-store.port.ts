// =============================================================================
// Options Store Port — The host's persistent settings namespace
// =============================================================================

export type OptionComponent = "textbox" | "checkbox" | "slider" | "dropdown";

export interface OptionComponentArgs {
  interactive?: boolean;
  maxLines?: number;
  [key: string]: unknown;
}

/** Settings panel section as `[id, label]` */
export type OptionSection = readonly [id: string, label: string];

export interface OptionInfo {
  default: unknown;
  label: string;
  component: OptionComponent;
  componentArgs?: OptionComponentArgs;
  section: OptionSection;
}

export interface OptionsStorePort {
  /** Register (or replace) an option definition under `key` */
  addOption(key: string, info: OptionInfo): void;
  /** Current value for `key`, or `undefined` when nothing is stored */
  get(key: string): unknown;
  /** Registered option definitions, in registration order */
  listOptions(): ReadonlyMap<string, OptionInfo>;
}
