// =============================================================================
// Bindings — Which browser-side action each tab control triggers
// =============================================================================

import type { ActionBinding } from "../ports/ui.port.js";

export const ELEM = {
  loadButton: "photopeaLoadButton",
  iframeContainer: "photopeaIframeContainer",
  activeLayerOnly: "photopea-use-active-layer-only",
  modelIndex: "photopeaControlNetModelIndex",
  iframeSlider: "photopeaIframeSlider",
  sendTxt2imgControlNet: "photopeaSendTxt2imgControlNet",
  sendExtras: "photopeaSendExtras",
  sendImg2img: "photopeaSendImg2img",
  sendImg2imgControlNet: "photopeaSendImg2imgControlNet",
  inpaintSelection: "photopeaInpaintSelection",
} as const;

/** Functions defined by the browser-side bindings script */
export const JS_ACTIONS = {
  load: "loadPhotopea",
  sendToTab: "getAndSendImageToWebUITab",
  sendWithMaskSelection: "sendImageWithMaskSelectionToWebUi",
} as const;

/** Host tab names the send buttons target */
export type WebUiTab = "txt2img" | "img2img" | "extras";

function sendToTab(trigger: string, tab: WebUiTab, toControlNet: boolean): ActionBinding {
  return {
    trigger,
    action: JS_ACTIONS.sendToTab,
    args: [tab, toControlNet],
    inputs: [ELEM.modelIndex],
  };
}

export const PHOTOPEA_BINDINGS: readonly ActionBinding[] = [
  sendToTab(ELEM.sendTxt2imgControlNet, "txt2img", true),
  sendToTab(ELEM.sendExtras, "extras", false),
  sendToTab(ELEM.sendImg2img, "img2img", false),
  sendToTab(ELEM.sendImg2imgControlNet, "img2img", true),
  { trigger: ELEM.inpaintSelection, action: JS_ACTIONS.sendWithMaskSelection, args: [], inputs: [] },
  { trigger: ELEM.loadButton, action: JS_ACTIONS.load, args: [], inputs: [] },
];

const INPUT_PARAM_NAMES = "ijklmn";

function formatArg(arg: string | number | boolean): string {
  if (typeof arg === "string") return `'${arg.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
  return String(arg);
}

/**
 * Render a binding as the snippet the host attaches to the click event.
 * A bare action name when there is nothing to pass, otherwise an arrow
 * function taking one parameter per input control.
 */
export function toJsExpression(binding: ActionBinding): string {
  if (binding.args.length === 0 && binding.inputs.length === 0) return binding.action;
  if (binding.inputs.length > INPUT_PARAM_NAMES.length) {
    throw new RangeError(`Too many inputs for "${binding.trigger}": ${binding.inputs.length}`);
  }

  const params = binding.inputs.map((_, i) => INPUT_PARAM_NAMES.charAt(i));
  const callArgs = [...binding.args.map(formatArg), ...params].join(", ");
  return `(${params.join(", ")}) => {${binding.action}(${callArgs})}`;
}

export function findBinding(trigger: string): ActionBinding | undefined {
  return PHOTOPEA_BINDINGS.find((b) => b.trigger === trigger);
}
