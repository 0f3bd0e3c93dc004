// =============================================================================
// Mounter — Serve the provisioned bundle from the host app server
// =============================================================================

import type { Logger } from "../logging/logger.js";
import type { AppServerPort } from "../ports/app-server.port.js";
import { serveStatic } from "../rest/static-files.js";
import { MOUNT_NAME } from "./constants.js";
import type { ProvisioningOutcome } from "./provisioner.js";

export interface MountPhotopeaParams {
  app: AppServerPort;
  outcome: ProvisioningOutcome;
  wwwDir: string;
  mountPath: string;
}

/** Returns whether the bundle was mounted */
export function mountPhotopea(logger: Logger, params: MountPhotopeaParams): boolean {
  if (!params.outcome.succeeded) {
    logger.warn("photopea:not-mounted", "Photopea not loaded due to update failure!", {
      mountPath: params.mountPath,
    });
    return false;
  }

  params.app.mount(
    params.mountPath,
    serveStatic({ root: params.wwwDir, html: true }),
    MOUNT_NAME,
  );
  logger.debug("photopea:mounted", `Photopea mounted at ${params.mountPath}`, {
    root: params.wwwDir,
  });
  return true;
}
