// =============================================================================
// photopea-embed/rest — Host application server and static mounts
// =============================================================================

export { HostAppServer } from "./server.js";
export type { HostAppServerOptions } from "./server.js";
export { Router, sendError, sendJson } from "./router.js";
export type { RouteHandler, RouteMatch } from "./router.js";
export { serveStatic, contentTypeFor } from "./static-files.js";
export type { StaticFilesOptions } from "./static-files.js";
