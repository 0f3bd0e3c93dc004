// =============================================================================
// GitCloneAdapter — Clone-or-update through the git CLI
// =============================================================================

import { spawnSync } from "node:child_process";
import { existsSync, rmSync } from "node:fs";

import { GitCommandError } from "../../errors.js";
import type { GitClonePort, GitCloneRequest } from "../../ports/git.port.js";

export interface GitCloneAdapterOptions {
  /** git binary (default: "git", or $GIT when set) */
  gitBinary?: string;
}

const GIT_SPAWN_OPTS = { encoding: "utf8", maxBuffer: 10 * 1024 * 1024 } as const;

/**
 * Mirrors the web UI's own extension installer:
 * - missing dir: clone, then check out `commitHash` if given
 * - existing dir without `commitHash`: left untouched
 * - existing dir at another revision: retarget origin if needed, fetch, check out
 */
export class GitCloneAdapter implements GitClonePort {
  private readonly git: string;

  constructor(options: GitCloneAdapterOptions = {}) {
    this.git = options.gitBinary ?? process.env.GIT ?? "git";
  }

  clone(request: GitCloneRequest): void {
    const { url, dir, commitHash } = request;

    if (existsSync(dir)) {
      if (commitHash === null) return;

      const current = this.run(["-C", dir, "rev-parse", "HEAD"]).trim();
      if (current === commitHash) return;

      const origin = this.run(["-C", dir, "config", "--get", "remote.origin.url"], {
        allowFailure: true,
      }).trim();
      if (origin !== url) {
        this.run(["-C", dir, "remote", "set-url", "origin", url]);
      }
      this.run(["-C", dir, "fetch"]);
      this.run(["-C", dir, "checkout", commitHash]);
      return;
    }

    try {
      this.run(["clone", "--config", "core.filemode=false", url, dir]);
    } catch (err) {
      rmSync(dir, { recursive: true, force: true });
      throw err;
    }

    if (commitHash !== null) {
      this.run(["-C", dir, "checkout", commitHash]);
    }
  }

  private run(args: string[], opts: { allowFailure?: boolean } = {}): string {
    const result = spawnSync(this.git, args, GIT_SPAWN_OPTS);
    const command = [this.git, ...args].join(" ");

    if (result.error) {
      throw new GitCommandError(command, null, result.error.message, result.error);
    }
    if (result.status !== 0 && !opts.allowFailure) {
      throw new GitCommandError(command, result.status, result.stderr);
    }
    return result.stdout;
  }
}
