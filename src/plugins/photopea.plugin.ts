// =============================================================================
// PhotopeaPlugin — Embeds the Photopea editor as a web UI tab
// =============================================================================

import { z } from "zod";

import { GitCloneAdapter } from "../adapters/git/git-clone.adapter.js";
import { createLogger, type Logger } from "../logging/logger.js";
import type { GitClonePort } from "../ports/git.port.js";
import type { HostPluginHooks } from "../ports/host.port.js";
import {
  MOUNT_PATH,
  PLUGIN_NAME,
  resolvePaths,
  type PhotopeaPaths,
} from "../photopea/constants.js";
import { mountPhotopea } from "../photopea/mounter.js";
import { updatePhotopea, type ProvisioningOutcome } from "../photopea/provisioner.js";
import { readSourceConfig, registerOptions } from "../photopea/settings.js";
import { buildTab } from "../photopea/tab.js";
import { BasePlugin } from "./base.plugin.js";

export interface PhotopeaPluginOptions {
  /** Directory the plugin is installed in; the bundle goes to `<dir>/app` */
  extensionDir: string;
  /** URL prefix for the bundle (default: "/photopea") */
  mountPath?: string;
  logger?: Logger;
  /** Clone utility (default: git CLI) */
  git?: GitClonePort;
}

const OPTIONS_SCHEMA = z.object({
  extensionDir: z.string().min(1),
  mountPath: z
    .string()
    .regex(/^\/[^?#]*$/, "must be an absolute URL path")
    .default(MOUNT_PATH),
});

export class PhotopeaPlugin extends BasePlugin<ProvisioningOutcome> {
  readonly name = PLUGIN_NAME;

  readonly paths: PhotopeaPaths;
  private readonly mountPath: string;
  private readonly logger: Logger;
  private readonly git: GitClonePort;

  constructor(options: PhotopeaPluginOptions) {
    super();
    const parsed = OPTIONS_SCHEMA.parse({
      extensionDir: options.extensionDir,
      mountPath: options.mountPath,
    });
    this.paths = resolvePaths(parsed.extensionDir);
    this.mountPath = parsed.mountPath;
    this.logger = options.logger ?? createLogger({ source: PLUGIN_NAME });
    this.git = options.git ?? new GitCloneAdapter();
  }

  protected buildHooks(): HostPluginHooks<ProvisioningOutcome> {
    return {
      beforeUi: (ctx) => {
        const source = readSourceConfig(ctx.options);
        const succeeded = updatePhotopea(this.git, this.logger, {
          repoUrl: source.repoUrl,
          targetDir: this.paths.appDir,
          commitHash: source.commitHash,
        });
        return { succeeded };
      },

      uiSettings: (ctx) => {
        registerOptions(ctx.options);
      },

      uiTabs: (ctx) => [buildTab(ctx)],

      appStarted: (_ctx, { app, state }) => {
        mountPhotopea(this.logger, {
          app,
          outcome: state,
          wwwDir: this.paths.wwwDir,
          mountPath: this.mountPath,
        });
      },
    };
  }
}
