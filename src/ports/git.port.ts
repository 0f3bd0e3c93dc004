// =============================================================================
// Git Port — Clone-or-update utility provided by the host
// =============================================================================

export interface GitCloneRequest {
  url: string;
  dir: string;
  /** Display name used in diagnostics */
  name: string;
  /** Revision to check out; `null` keeps whatever is already there */
  commitHash: string | null;
}

export interface GitClonePort {
  /** Throws on any failure */
  clone(request: GitCloneRequest): void;
}
