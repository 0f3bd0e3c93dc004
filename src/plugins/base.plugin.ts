// =============================================================================
// BasePlugin — Abstract base class for web UI host plugins
// =============================================================================

import type { HostPlugin, HostPluginHooks } from "../ports/host.port.js";

export abstract class BasePlugin<TState = void> implements HostPlugin<TState> {
  abstract readonly name: string;
  readonly version: string = "1.0.0";
  readonly hooks: HostPluginHooks<TState>;

  constructor() {
    this.hooks = this.buildHooks();
  }

  protected abstract buildHooks(): HostPluginHooks<TState>;
}
