// =============================================================================
// REST — Path router with prefix mounts (zero dependencies)
// =============================================================================

import type { IncomingMessage, ServerResponse } from "node:http";

import type { MountHandler } from "../ports/app-server.port.js";

export type RouteHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  params: Record<string, string>,
) => void | Promise<void>;

interface Route {
  method: string;
  path: string;
  handler: RouteHandler;
}

interface Mount {
  prefix: string;
  name: string;
  handler: MountHandler;
}

export type RouteMatch =
  | { kind: "route"; handler: RouteHandler; params: Record<string, string> }
  | { kind: "mount"; name: string; handler: MountHandler; subpath: string };

export class Router {
  private readonly routes: Route[] = [];
  private readonly mounts: Mount[] = [];

  get(path: string, handler: RouteHandler): void {
    this.routes.push({ method: "GET", path, handler });
  }

  /** Hand every request under `prefix` (any method) to `handler` */
  mount(prefix: string, name: string, handler: MountHandler): void {
    const normalized = normalizePrefix(prefix);
    if (this.mounts.some((m) => m.prefix === normalized)) {
      throw new Error(`A sub-application is already mounted at "${normalized}"`);
    }
    this.mounts.push({ prefix: normalized, name, handler });
    // Longest prefix wins
    this.mounts.sort((a, b) => b.prefix.length - a.prefix.length);
  }

  mountNames(): string[] {
    return this.mounts.map((m) => m.name);
  }

  resolve(method: string, pathname: string): RouteMatch | null {
    for (const route of this.routes) {
      if (route.method !== method) continue;
      const params = matchPath(route.path, pathname);
      if (params !== null) {
        return { kind: "route", handler: route.handler, params };
      }
    }

    for (const mount of this.mounts) {
      const subpath = matchPrefix(mount.prefix, pathname);
      if (subpath !== null) {
        return { kind: "mount", name: mount.name, handler: mount.handler, subpath };
      }
    }
    return null;
  }
}

function normalizePrefix(prefix: string): string {
  const withSlash = prefix.startsWith("/") ? prefix : `/${prefix}`;
  return withSlash.length > 1 ? withSlash.replace(/\/+$/, "") : withSlash;
}

/** Path with `prefix` stripped, or null when `pathname` is outside it */
function matchPrefix(prefix: string, pathname: string): string | null {
  if (prefix === "/") return pathname;
  if (pathname === prefix) return "";
  if (pathname.startsWith(`${prefix}/`)) return pathname.slice(prefix.length);
  return null;
}

/** Exact matches plus `:param` segments. */
function matchPath(
  pattern: string,
  pathname: string,
): Record<string, string> | null {
  if (pattern === pathname) return {};

  const patternParts = pattern.split("/");
  const pathParts = pathname.split("/");
  if (patternParts.length !== pathParts.length) return null;

  const params: Record<string, string> = {};
  for (let i = 0; i < patternParts.length; i++) {
    const pp = patternParts[i] ?? "";
    const part = pathParts[i] ?? "";
    if (pp.startsWith(":")) {
      params[pp.slice(1)] = part;
    } else if (pp !== part) {
      return null;
    }
  }
  return params;
}

// ---------------------------------------------------------------------------
// HTTP helpers
// ---------------------------------------------------------------------------

export function sendJson(
  res: ServerResponse,
  status: number,
  data: unknown,
): void {
  const body = JSON.stringify(data);
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(body);
}

export function sendError(
  res: ServerResponse,
  code: number,
  message: string,
): void {
  sendJson(res, code, { error: { code, message } });
}
