// =============================================================================
// HostLifecycle — Runs plugin hooks in the web UI's fixed startup order
// =============================================================================

import { LifecycleError } from "../errors.js";
import { createLogger, errorData, type Logger } from "../logging/logger.js";
import type { AppServerPort } from "../ports/app-server.port.js";
import { HOST_PHASES, type HostContext, type HostPhase, type HostPlugin } from "../ports/host.port.js";
import type { TabDescriptor } from "../ports/ui.port.js";

interface BeforeUiRecord {
  state: unknown;
}

export interface HostLifecycleOptions {
  logger?: Logger;
}

/**
 * Each phase runs once, in `HOST_PHASES` order. A hook that throws is
 * reported and skipped so the remaining plugins still load; a plugin whose
 * `beforeUi` threw gets no `appStarted` call.
 */
export class HostLifecycle {
  private readonly plugins: HostPlugin<unknown>[] = [];
  private readonly beforeUiResults = new Map<HostPlugin<unknown>, BeforeUiRecord>();
  private readonly failedBeforeUi = new Set<HostPlugin<unknown>>();
  private readonly logger: Logger;
  private completed = 0;

  constructor(options: HostLifecycleOptions = {}) {
    this.logger = options.logger ?? createLogger({ source: "host" });
  }

  register<TState>(plugin: HostPlugin<TState>): void {
    if (this.completed > 0) throw new Error("Cannot register plugins after startup began");
    if (this.plugins.some((p) => p.name === plugin.name)) {
      throw new Error(`Plugin "${plugin.name}" is already registered`);
    }
    this.plugins.push(plugin);
  }

  /** Last phase that finished, or `null` before startup */
  get phase(): HostPhase | null {
    return this.completed === 0 ? null : (HOST_PHASES[this.completed - 1] ?? null);
  }

  runBeforeUi(ctx: HostContext): void {
    this.enter("beforeUi");
    for (const plugin of this.plugins) {
      const hook = plugin.hooks.beforeUi;
      if (!hook) {
        this.beforeUiResults.set(plugin, { state: undefined });
        continue;
      }
      this.guard(plugin, "beforeUi", () => {
        this.beforeUiResults.set(plugin, { state: hook(ctx) });
      });
      if (!this.beforeUiResults.has(plugin)) this.failedBeforeUi.add(plugin);
    }
  }

  runUiSettings(ctx: HostContext): void {
    this.enter("uiSettings");
    for (const plugin of this.plugins) {
      const hook = plugin.hooks.uiSettings;
      if (!hook) continue;
      this.guard(plugin, "uiSettings", () => hook(ctx));
    }
  }

  runUiTabs(ctx: HostContext): TabDescriptor[] {
    this.enter("uiTabs");
    const tabs: TabDescriptor[] = [];
    for (const plugin of this.plugins) {
      const hook = plugin.hooks.uiTabs;
      if (!hook) continue;
      this.guard(plugin, "uiTabs", () => {
        tabs.push(...hook(ctx));
      });
    }
    return tabs;
  }

  runAppStarted(ctx: HostContext, app: AppServerPort): void {
    this.enter("appStarted");
    for (const plugin of this.plugins) {
      const hook = plugin.hooks.appStarted;
      if (!hook) continue;
      const record = this.beforeUiResults.get(plugin);
      if (!record) {
        this.logger.warn("host:skip-app-started", `Skipping appStarted for "${plugin.name}"`, {
          reason: this.failedBeforeUi.has(plugin) ? "beforeUi failed" : "beforeUi did not run",
        });
        continue;
      }
      this.guard(plugin, "appStarted", () => hook(ctx, { app, state: record.state }));
    }
  }

  /** All four phases back to back; returns the tabs to render */
  start(ctx: HostContext, app: AppServerPort): TabDescriptor[] {
    this.runBeforeUi(ctx);
    this.runUiSettings(ctx);
    const tabs = this.runUiTabs(ctx);
    this.runAppStarted(ctx, app);
    return tabs;
  }

  private enter(phase: HostPhase): void {
    const expected = HOST_PHASES[this.completed];
    if (expected !== phase) {
      throw new LifecycleError(
        phase,
        expected ? `expected "${expected}" to run next` : "startup already finished",
      );
    }
    this.completed++;
  }

  private guard(plugin: HostPlugin<unknown>, phase: HostPhase, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.logger.error("host:hook-failed", `Error running ${phase} for "${plugin.name}"`, {
        error: errorData(err),
      });
    }
  }
}
