// =============================================================================
// Provisioner — Clone or update the offline Photopea bundle
// =============================================================================

import { ProvisioningError } from "../errors.js";
import { errorData, type Logger } from "../logging/logger.js";
import type { GitClonePort } from "../ports/git.port.js";

export interface ProvisioningOutcome {
  readonly succeeded: boolean;
}

export interface UpdatePhotopeaParams {
  repoUrl: string;
  targetDir: string;
  /** `null` or empty keeps the current checkout */
  commitHash?: string | null;
}

/**
 * Single best-effort clone/update. Every failure is logged at `critical` and
 * reported as `false`; nothing is rethrown.
 */
export function updatePhotopea(
  git: GitClonePort,
  logger: Logger,
  params: UpdatePhotopeaParams,
): boolean {
  const commitHash = params.commitHash ? params.commitHash : null;
  try {
    git.clone({
      url: params.repoUrl,
      dir: params.targetDir,
      name: "Photopea",
      commitHash,
    });
    return true;
  } catch (err) {
    const failure = new ProvisioningError(params.repoUrl, err);
    logger.critical("photopea:update-failed", "Failed to update Photopea, will not load!", {
      repoUrl: params.repoUrl,
      targetDir: params.targetDir,
      commitHash,
      error: errorData(failure),
    });
    return false;
  }
}
