import { describe, it, expect } from "vitest";

import { StaticExtensionRegistry } from "../../adapters/host/static-extension-registry.adapter.js";
import { createHostContext } from "../../__tests__/helpers/test-utils.js";
import type { UiComponent } from "../../ports/ui.port.js";
import { ELEM, PHOTOPEA_BINDINGS } from "../bindings.js";
import { buildTab } from "../tab.js";

function flatten(components: readonly UiComponent[]): UiComponent[] {
  return components.flatMap((c) =>
    c.kind === "row" || c.kind === "column" ? [c, ...flatten(c.children)] : [c],
  );
}

function byElemId(components: readonly UiComponent[], elemId: string): UiComponent {
  const found = flatten(components).find((c) => c.elemId === elemId);
  if (!found) throw new Error(`No component with elemId ${elemId}`);
  return found;
}

function helpMessage(components: readonly UiComponent[]): UiComponent {
  const found = flatten(components).find(
    (c) => c.kind === "html" && c.html.includes("Controlnet extension not found!"),
  );
  if (!found) throw new Error("help message missing");
  return found;
}

describe("buildTab", () => {
  it("returns the Photopea tab descriptor with the wiring table", () => {
    const tab = buildTab(createHostContext());

    expect(tab.label).toBe("Photopea");
    expect(tab.elemId).toBe("photopea_embed");
    expect(tab.bindings).toBe(PHOTOPEA_BINDINGS);
    expect(tab.content).toHaveLength(5);
  });

  it("shows the ControlNet buttons when the companion extension is active", () => {
    const tab = buildTab(createHostContext({ extensions: ["foo", "sd-webui-controlnet"] }));

    expect(byElemId(tab.content, ELEM.sendTxt2imgControlNet).visible).toBe(true);
    expect(byElemId(tab.content, ELEM.sendImg2imgControlNet).visible).toBe(true);
    expect(helpMessage(tab.content).visible).toBe(false);
  });

  it("hides the ControlNet buttons and shows help when the companion is missing", () => {
    const tab = buildTab(createHostContext({ extensions: ["foo", "bar"] }));

    expect(byElemId(tab.content, ELEM.sendTxt2imgControlNet).visible).toBe(false);
    expect(byElemId(tab.content, ELEM.sendImg2imgControlNet).visible).toBe(false);
    expect(helpMessage(tab.content).visible).toBe(true);
  });

  it("ignores a disabled ControlNet extension", () => {
    const ctx = {
      ...createHostContext(),
      extensions: new StaticExtensionRegistry([
        "foo",
        { name: "sd-webui-controlnet", enabled: false },
      ]),
    };
    const tab = buildTab(ctx);

    expect(byElemId(tab.content, ELEM.sendTxt2imgControlNet).visible).toBe(false);
    expect(byElemId(tab.content, ELEM.sendImg2imgControlNet).visible).toBe(false);
    expect(helpMessage(tab.content).visible).toBe(true);
  });

  it("keeps the unconditional send buttons visible either way", () => {
    const tab = buildTab(createHostContext());

    for (const id of [ELEM.sendExtras, ELEM.sendImg2img, ELEM.inpaintSelection, ELEM.loadButton]) {
      expect(byElemId(tab.content, id).visible).toBe(true);
    }
  });

  it.each([
    ["absent", {}],
    ["one", { control_net_max_models_num: 1 }],
    ["a string", { control_net_max_models_num: "3" }],
    ["zero", { control_net_max_models_num: 0 }],
  ])("hides the model index selector when the unit count is %s", (_label, values) => {
    const tab = buildTab(createHostContext({ values }));

    expect(byElemId(tab.content, ELEM.modelIndex)).toMatchObject({
      kind: "dropdown",
      choices: ["0"],
      value: "0",
      visible: false,
    });
  });

  it("shows one choice per ControlNet unit", () => {
    const tab = buildTab(createHostContext({ values: { control_net_max_models_num: 3 } }));

    expect(byElemId(tab.content, ELEM.modelIndex)).toMatchObject({
      kind: "dropdown",
      label: "ControlNet model index",
      choices: ["0", "1", "2"],
      value: "0",
      visible: true,
    });
  });

  it("declares the iframe height slider", () => {
    const tab = buildTab(createHostContext());

    expect(byElemId(tab.content, ELEM.iframeSlider)).toEqual({
      kind: "slider",
      elemId: "photopeaIframeSlider",
      label: "iFrame height",
      minimum: 512,
      maximum: 2160,
      step: 10,
      value: 768,
      interactive: true,
    });
  });

  it("reserves an empty container for the editor iframe", () => {
    const tab = buildTab(createHostContext());

    expect(byElemId(tab.content, ELEM.iframeContainer)).toEqual({
      kind: "row",
      elemId: "photopeaIframeContainer",
      children: [],
    });
  });

  it("declares the active-layer checkbox unchecked", () => {
    const tab = buildTab(createHostContext());

    expect(byElemId(tab.content, ELEM.activeLayerOnly)).toMatchObject({
      kind: "checkbox",
      label: "Active Layer Only",
      value: false,
    });
  });
});
