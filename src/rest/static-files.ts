// =============================================================================
// REST — Static file handler for mounted directories
// =============================================================================

import { createReadStream, type Stats } from "node:fs";
import { realpath, stat } from "node:fs/promises";
import type { IncomingMessage, ServerResponse } from "node:http";
import { extname, join, resolve, sep } from "node:path";
import { pipeline } from "node:stream/promises";

import type { MountHandler } from "../ports/app-server.port.js";
import { sendError } from "./router.js";

export interface StaticFilesOptions {
  /** Directory served at the mount point */
  root: string;
  /** Serve `index.html` for directories and `404.html` for misses (default: false) */
  html?: boolean;
}

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".htm": "text/html; charset=utf-8",
  ".js": "text/javascript; charset=utf-8",
  ".mjs": "text/javascript; charset=utf-8",
  ".css": "text/css; charset=utf-8",
  ".json": "application/json",
  ".map": "application/json",
  ".txt": "text/plain; charset=utf-8",
  ".xml": "application/xml",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".ico": "image/x-icon",
  ".wasm": "application/wasm",
  ".woff": "font/woff",
  ".woff2": "font/woff2",
  ".ttf": "font/ttf",
};

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

/** fs failures that mean "no such file" for a request path */
const MISSING_CODES = new Set([
  "ENOENT",
  "ENOTDIR",
  "ENAMETOOLONG",
  "ELOOP",
  "ERR_INVALID_ARG_VALUE",
]);

async function orNull<T>(op: () => Promise<T>): Promise<T | null> {
  try {
    return await op();
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (typeof code === "string" && MISSING_CODES.has(code)) return null;
    throw err;
  }
}

function statOrNull(path: string): Promise<Stats | null> {
  return orNull(() => stat(path));
}

function isWithin(root: string, path: string): boolean {
  return path === root || path.startsWith(root + sep);
}

async function sendFile(
  req: IncomingMessage,
  res: ServerResponse,
  filePath: string,
  stats: Stats,
  status = 200,
): Promise<void> {
  res.writeHead(status, {
    "Content-Type": contentTypeFor(filePath),
    "Content-Length": stats.size,
    "Last-Modified": stats.mtime.toUTCString(),
  });
  if (req.method?.toUpperCase() === "HEAD") {
    res.end();
    return;
  }
  await pipeline(createReadStream(filePath), res);
}

export function serveStatic(options: StaticFilesOptions): MountHandler {
  const root = resolve(options.root);
  const html = options.html ?? false;

  /** Symlinks are followed only while they stay under the real root */
  async function resolvesInsideRoot(path: string): Promise<boolean> {
    const realRoot = await orNull(() => realpath(root));
    const real = await orNull(() => realpath(path));
    return realRoot !== null && real !== null && isWithin(realRoot, real);
  }

  async function notFound(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (html) {
      const page = join(root, "404.html");
      const stats = await statOrNull(page);
      if (stats?.isFile() && (await resolvesInsideRoot(page))) {
        return sendFile(req, res, page, stats, 404);
      }
    }
    sendError(res, 404, "Not Found");
  }

  return async (req, res, subpath) => {
    const method = req.method?.toUpperCase() ?? "GET";
    if (method !== "GET" && method !== "HEAD") {
      res.setHeader("Allow", "GET, HEAD");
      return sendError(res, 405, "Method Not Allowed");
    }

    let decoded: string;
    try {
      decoded = decodeURIComponent(subpath);
    } catch {
      return sendError(res, 400, "Malformed path");
    }

    const target = resolve(root, `.${decoded.startsWith("/") ? "" : "/"}${decoded}`);
    if (!isWithin(root, target)) {
      return notFound(req, res);
    }

    const stats = await statOrNull(target);
    if (!stats || !(await resolvesInsideRoot(target))) return notFound(req, res);

    if (stats.isDirectory()) {
      if (!html) return notFound(req, res);
      if (!decoded.endsWith("/")) {
        const url = new URL(req.url ?? "/", "http://localhost");
        res.writeHead(307, { Location: `${url.pathname}/${url.search}` });
        res.end();
        return;
      }
      const index = join(target, "index.html");
      const indexStats = await statOrNull(index);
      if (!indexStats?.isFile() || !(await resolvesInsideRoot(index))) return notFound(req, res);
      return sendFile(req, res, index, indexStats);
    }

    if (!stats.isFile()) return notFound(req, res);
    return sendFile(req, res, target, stats);
  };
}
