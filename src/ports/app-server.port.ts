// =============================================================================
// App Server Port — Mount point on the host's running HTTP application
// =============================================================================

import type { IncomingMessage, ServerResponse } from "node:http";

/**
 * Handler for a mounted sub-application. `subpath` is the request path with
 * the mount prefix stripped ("" when the prefix itself was requested).
 */
export type MountHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  subpath: string,
) => void | Promise<void>;

export interface AppServerPort {
  mount(prefix: string, handler: MountHandler, name: string): void;
}
