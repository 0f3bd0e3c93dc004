// =============================================================================
// REST — HostAppServer (the web UI's HTTP application, node:http)
// =============================================================================

import { createServer, type Server, type IncomingMessage, type ServerResponse } from "node:http";

import { createLogger, errorData, type Logger } from "../logging/logger.js";
import type { AppServerPort, MountHandler } from "../ports/app-server.port.js";
import { Router, sendError, sendJson, type RouteHandler } from "./router.js";

export interface HostAppServerOptions {
  /** Port to listen on. Default: 7860 */
  port?: number;
  /** Interface to bind. Default: "127.0.0.1" */
  host?: string;
  logger?: Logger;
}

export class HostAppServer implements AppServerPort {
  private readonly options: Required<Omit<HostAppServerOptions, "logger">>;
  private readonly logger: Logger;
  private readonly router = new Router();
  private server: Server | null = null;

  constructor(options?: HostAppServerOptions) {
    this.options = {
      port: options?.port ?? 7860,
      host: options?.host ?? "127.0.0.1",
    };
    this.logger = options?.logger ?? createLogger({ source: "host-app" });

    this.router.get("/api/health", (_req, res) => {
      sendJson(res, 200, { status: "ok", mounts: this.router.mountNames() });
    });
  }

  get(path: string, handler: RouteHandler): void {
    this.router.get(path, handler);
  }

  mount(prefix: string, handler: MountHandler, name: string): void {
    this.router.mount(prefix, name, handler);
    this.logger.info("app:mount", `Mounted "${name}" at ${prefix}`);
  }

  private handleRequest = async (
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method?.toUpperCase() ?? "GET";
    const pathname = url.pathname;

    const match = this.router.resolve(method, pathname);
    if (!match) {
      return sendError(res, 404, `Not found: ${method} ${pathname}`);
    }

    try {
      if (match.kind === "route") {
        await match.handler(req, res, match.params);
      } else {
        await match.handler(req, res, match.subpath);
      }
    } catch (err) {
      this.logger.error("app:handler-failed", `${method} ${pathname} failed`, {
        error: errorData(err),
      });
      if (!res.headersSent) {
        sendError(res, 500, err instanceof Error ? err.message : String(err));
      } else {
        res.destroy();
      }
    }
  };

  async listen(port?: number): Promise<void> {
    const p = port ?? this.options.port;
    await new Promise<void>((resolve, reject) => {
      const server = createServer((req, res) => {
        void this.handleRequest(req, res);
      });
      this.server = server;
      server.on("error", reject);
      server.listen(p, this.options.host, () => resolve());
    });
  }

  /** Bound port, once listening */
  address(): number | null {
    const addr = this.server?.address();
    if (!addr || typeof addr === "string") return null;
    return addr.port;
  }

  async close(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const server = this.server;
      if (!server) return resolve();
      this.server = null;
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
