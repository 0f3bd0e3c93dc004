/**
 * Error hierarchy for the Photopea embed plugin and its reference host.
 *
 * Everything extends {@link PhotopeaError} so callers can match on `code`:
 *
 * ```ts
 * try {
 *   lifecycle.runAppStarted(app);
 * } catch (e) {
 *   if (e instanceof LifecycleError) { ... }
 * }
 * ```
 *
 * @module errors
 */

/** Base error. Includes an error code for programmatic matching. */
export class PhotopeaError extends Error {
  readonly code: string;
  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PhotopeaError";
    this.code = code;
  }
}

/** Any failure while fetching or updating the editor bundle. Kinds are not distinguished. */
export class ProvisioningError extends PhotopeaError {
  readonly repoUrl: string;
  constructor(repoUrl: string, cause: unknown) {
    super("PROVISIONING_FAILED", `Could not update Photopea from ${repoUrl}`, { cause });
    this.name = "ProvisioningError";
    this.repoUrl = repoUrl;
  }
}

/** A git invocation exited non-zero or could not be started. */
export class GitCommandError extends PhotopeaError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;
  constructor(command: string, exitCode: number | null, stderr: string, cause?: unknown) {
    const detail = stderr.trim() || `exit code ${exitCode ?? "unknown"}`;
    super("GIT_COMMAND_FAILED", `Command "${command}" failed: ${detail}`, { cause });
    this.name = "GitCommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/** A host lifecycle phase was run twice or out of order. */
export class LifecycleError extends PhotopeaError {
  readonly phase: string;
  constructor(phase: string, message: string) {
    super("LIFECYCLE_ERROR", `[${phase}] ${message}`);
    this.name = "LifecycleError";
    this.phase = phase;
  }
}
