import { describe, expect, it, vi } from "vitest";

import { createCapturingLogger, createHostContext } from "../../__tests__/helpers/test-utils.js";
import { LifecycleError } from "../../errors.js";
import type { AppServerPort } from "../../ports/app-server.port.js";
import type { HostPlugin } from "../../ports/host.port.js";
import type { TabDescriptor } from "../../ports/ui.port.js";
import { HostLifecycle } from "../host-lifecycle.js";

const app: AppServerPort = { mount: vi.fn() };

function tab(label: string): TabDescriptor {
  return { content: [], label, elemId: label, bindings: [] };
}

describe("HostLifecycle", () => {
  it("runs hooks phase by phase in registration order", () => {
    const order: string[] = [];
    const lifecycle = new HostLifecycle({ logger: createCapturingLogger().logger });

    for (const name of ["first", "second"]) {
      lifecycle.register({
        name,
        hooks: {
          beforeUi: () => order.push(`${name}:beforeUi`),
          uiSettings: () => order.push(`${name}:uiSettings`),
          uiTabs: () => {
            order.push(`${name}:uiTabs`);
            return [tab(name)];
          },
          appStarted: () => order.push(`${name}:appStarted`),
        },
      });
    }

    const tabs = lifecycle.start(createHostContext(), app);

    expect(order).toEqual([
      "first:beforeUi",
      "second:beforeUi",
      "first:uiSettings",
      "second:uiSettings",
      "first:uiTabs",
      "second:uiTabs",
      "first:appStarted",
      "second:appStarted",
    ]);
    expect(tabs.map((t) => t.label)).toEqual(["first", "second"]);
    expect(lifecycle.phase).toBe("appStarted");
  });

  it("threads each plugin's beforeUi result into its own appStarted", () => {
    const seen: Array<[string, number]> = [];
    const lifecycle = new HostLifecycle({ logger: createCapturingLogger().logger });

    const makePlugin = (name: string, value: number): HostPlugin<number> => ({
      name,
      hooks: {
        beforeUi: () => value,
        appStarted: (_ctx, { state }) => {
          seen.push([name, state]);
        },
      },
    });
    lifecycle.register(makePlugin("a", 1));
    lifecycle.register(makePlugin("b", 2));

    lifecycle.start(createHostContext(), app);

    expect(seen).toEqual([
      ["a", 1],
      ["b", 2],
    ]);
  });

  it("rejects phases run out of order or twice", () => {
    const lifecycle = new HostLifecycle({ logger: createCapturingLogger().logger });
    const ctx = createHostContext();

    expect(() => lifecycle.runAppStarted(ctx, app)).toThrow(LifecycleError);
    expect(() => lifecycle.runAppStarted(ctx, app)).toThrow(
      '[appStarted] expected "beforeUi" to run next',
    );

    lifecycle.runBeforeUi(ctx);
    expect(() => lifecycle.runBeforeUi(ctx)).toThrow('[beforeUi] expected "uiSettings" to run next');
    expect(lifecycle.phase).toBe("beforeUi");
  });

  it("rejects duplicate names and late registration", () => {
    const lifecycle = new HostLifecycle({ logger: createCapturingLogger().logger });
    lifecycle.register({ name: "dup", hooks: {} });

    expect(() => lifecycle.register({ name: "dup", hooks: {} })).toThrow(
      'Plugin "dup" is already registered',
    );

    lifecycle.runBeforeUi(createHostContext());
    expect(() => lifecycle.register({ name: "late", hooks: {} })).toThrow(
      "Cannot register plugins after startup began",
    );
  });

  it("reports a throwing hook and keeps loading the other plugins", () => {
    const capture = createCapturingLogger();
    const lifecycle = new HostLifecycle({ logger: capture.logger });
    const appStarted = vi.fn();

    lifecycle.register({
      name: "broken",
      hooks: {
        beforeUi: () => {
          throw new Error("no disk");
        },
        appStarted,
      },
    });
    lifecycle.register({ name: "fine", hooks: { uiTabs: () => [tab("fine")] } });

    const tabs = lifecycle.start(createHostContext(), app);

    expect(tabs.map((t) => t.label)).toEqual(["fine"]);
    expect(appStarted).not.toHaveBeenCalled();
    expect(capture.atLevel("error")).toHaveLength(1);
    expect(capture.atLevel("error")[0]?.message).toBe('Error running beforeUi for "broken"');
    expect(capture.atLevel("warn")[0]?.data).toEqual({ reason: "beforeUi failed" });
  });
});
