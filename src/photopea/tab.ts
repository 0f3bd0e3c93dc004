// =============================================================================
// Tab — Layout of the Photopea tab in the host UI
// =============================================================================

import type { HostContext } from "../ports/host.port.js";
import type {
  ButtonComponent,
  ColumnComponent,
  DropdownComponent,
  RowComponent,
  TabDescriptor,
} from "../ports/ui.port.js";
import { ELEM, PHOTOPEA_BINDINGS } from "./bindings.js";
import { isCompanionActive, readControlNetModelCount } from "./companion.js";
import { TAB_ELEM_ID, TAB_LABEL } from "./constants.js";

export const IFRAME_HEIGHT = { minimum: 512, maximum: 2160, step: 10, value: 768 } as const;

const CONTROLNET_MISSING_HTML =
  '<b>Controlnet extension not found!</b> Either <a href="https://github.com/Mikubill/sd-webui-controlnet" target="_blank">install it</a>, or activate it under Settings.';

const PREMIUM_FOOTER_HTML =
  '<font size="small"><p align="right">Consider supporting Photopea by <a href="https://www.photopea.com/api/accounts" target="_blank">going Premium</a>!</font></p>';

function button(elemId: string, value: string, visible = true): ButtonComponent {
  return { kind: "button", elemId, value, visible };
}

function modelIndexDropdown(modelCount: number): DropdownComponent {
  return {
    kind: "dropdown",
    elemId: ELEM.modelIndex,
    label: "ControlNet model index",
    choices: Array.from({ length: modelCount }, (_, i) => String(i)),
    value: "0",
    interactive: true,
    visible: modelCount > 1,
  };
}

function sendColumns(companionPresent: boolean): ColumnComponent[] {
  return [
    {
      kind: "column",
      children: [
        { kind: "html", html: CONTROLNET_MISSING_HTML, visible: !companionPresent },
        button(ELEM.sendTxt2imgControlNet, "Send to txt2img ControlNet", companionPresent),
        button(ELEM.sendExtras, "Send to Extras"),
      ],
    },
    {
      kind: "column",
      children: [
        button(ELEM.sendImg2img, "Send to img2img"),
        button(ELEM.sendImg2imgControlNet, "Send to img2img ControlNet", companionPresent),
      ],
    },
    {
      kind: "column",
      children: [button(ELEM.inpaintSelection, "Inpaint selection")],
    },
  ];
}

export function buildTab(ctx: HostContext): TabDescriptor {
  const companionPresent = isCompanionActive(ctx.extensions);
  const modelCount = readControlNetModelCount(ctx.options);

  const content: RowComponent[] = [
    { kind: "row", children: [button(ELEM.loadButton, "Load Photopea")] },
    { kind: "row", elemId: ELEM.iframeContainer, children: [] },
    {
      kind: "row",
      children: [
        {
          kind: "checkbox",
          elemId: ELEM.activeLayerOnly,
          label: "Active Layer Only",
          info: "If true, instead of sending the flattened image, will send just the currently selected layer.",
          value: false,
        },
        modelIndexDropdown(modelCount),
        {
          kind: "slider",
          elemId: ELEM.iframeSlider,
          label: "iFrame height",
          ...IFRAME_HEIGHT,
          interactive: true,
        },
      ],
    },
    { kind: "row", children: sendColumns(companionPresent) },
    { kind: "row", children: [{ kind: "html", html: PREMIUM_FOOTER_HTML }] },
  ];

  return {
    content,
    label: TAB_LABEL,
    elemId: TAB_ELEM_ID,
    bindings: PHOTOPEA_BINDINGS,
  };
}
