// =============================================================================
// photopea-embed — Public API
// =============================================================================

// Plugin
export { PhotopeaPlugin } from "./plugins/photopea.plugin.js";
export type { PhotopeaPluginOptions } from "./plugins/photopea.plugin.js";
export { BasePlugin } from "./plugins/base.plugin.js";

// Building blocks
export { updatePhotopea } from "./photopea/provisioner.js";
export type { ProvisioningOutcome, UpdatePhotopeaParams } from "./photopea/provisioner.js";
export { registerOptions, readSourceConfig, readTextOption } from "./photopea/settings.js";
export type { SourceConfig } from "./photopea/settings.js";
export { buildTab, IFRAME_HEIGHT } from "./photopea/tab.js";
export { isCompanionActive, readControlNetModelCount } from "./photopea/companion.js";
export { mountPhotopea } from "./photopea/mounter.js";
export type { MountPhotopeaParams } from "./photopea/mounter.js";
export { ELEM, JS_ACTIONS, PHOTOPEA_BINDINGS, findBinding, toJsExpression } from "./photopea/bindings.js";
export type { WebUiTab } from "./photopea/bindings.js";
export * from "./photopea/constants.js";

// Ports
export type * from "./ports/host.port.js";
export { HOST_PHASES } from "./ports/host.port.js";
export type * from "./ports/options-store.port.js";
export type * from "./ports/extension-registry.port.js";
export type * from "./ports/git.port.js";
export type * from "./ports/app-server.port.js";
export type * from "./ports/ui.port.js";

// Reference host
export { HostLifecycle } from "./host/host-lifecycle.js";
export type { HostLifecycleOptions } from "./host/host-lifecycle.js";
export { GitCloneAdapter } from "./adapters/git/git-clone.adapter.js";
export type { GitCloneAdapterOptions } from "./adapters/git/git-clone.adapter.js";
export { InMemoryOptionsStore } from "./adapters/host/in-memory-options.adapter.js";
export { StaticExtensionRegistry } from "./adapters/host/static-extension-registry.adapter.js";
export * from "./rest/index.js";

// Logging & errors
export { createLogger, errorData } from "./logging/logger.js";
export type { Logger, LogEntry, LogLevel, LogSink, LoggerOptions } from "./logging/logger.js";
export { PhotopeaError, ProvisioningError, GitCommandError, LifecycleError } from "./errors.js";
