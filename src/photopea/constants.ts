// =============================================================================
// Photopea — Fixed names shared by the plugin's lifecycle hooks
// =============================================================================

import { join } from "node:path";

export const PLUGIN_NAME = "photopea-embed";

export const DEFAULT_REPO_URL = "https://git.nixnet.services/DUOLabs333/Photopea-Offline.git";

export const OPTION_SECTION = ["photopea", "Photopea"] as const;
export const OPTION_REPO_URL = "photopea_repo_url";
export const OPTION_COMMIT_HASH = "photopea_commit_hash";

/** ControlNet's own setting for how many unit tabs it shows */
export const CONTROLNET_MODEL_COUNT_OPTION = "control_net_max_models_num";
export const COMPANION_NAME_FRAGMENT = "controlnet";

export const MOUNT_PATH = "/photopea";
export const MOUNT_NAME = "photopea";

export const TAB_LABEL = "Photopea";
export const TAB_ELEM_ID = "photopea_embed";

export interface PhotopeaPaths {
  /** Where the plugin itself is installed */
  extensionDir: string;
  /** Checkout of the offline bundle repository */
  appDir: string;
  /** Document root inside the checkout */
  wwwDir: string;
}

export function resolvePaths(extensionDir: string): PhotopeaPaths {
  const appDir = join(extensionDir, "app");
  return {
    extensionDir,
    appDir,
    wwwDir: join(appDir, "www.photopea.com"),
  };
}
