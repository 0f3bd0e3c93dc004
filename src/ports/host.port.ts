// =============================================================================
// Host Port — Contract between the web UI host and its extension plugins
// =============================================================================

import type { AppServerPort } from "./app-server.port.js";
import type { ExtensionRegistryPort } from "./extension-registry.port.js";
import type { OptionsStorePort } from "./options-store.port.js";
import type { TabDescriptor } from "./ui.port.js";

/** Host lifecycle phases, in the order the host invokes them */
export const HOST_PHASES = ["beforeUi", "uiSettings", "uiTabs", "appStarted"] as const;

export type HostPhase = (typeof HOST_PHASES)[number];

/** Services the host exposes to every hook */
export interface HostContext {
  readonly options: OptionsStorePort;
  readonly extensions: ExtensionRegistryPort;
}

export interface AppStartedParams<TState> {
  app: AppServerPort;
  /** Value the same plugin returned from `beforeUi` */
  state: TState;
}

/**
 * Lifecycle hooks. Each one is called at most once per process, synchronously,
 * on the host's startup path.
 */
export interface HostPluginHooks<TState = void> {
  beforeUi?(ctx: HostContext): TState;
  uiSettings?(ctx: HostContext): void;
  uiTabs?(ctx: HostContext): TabDescriptor[];
  appStarted?(ctx: HostContext, params: AppStartedParams<TState>): void;
}

export interface HostPlugin<TState = void> {
  readonly name: string;
  readonly version?: string;
  readonly hooks: HostPluginHooks<TState>;
}
