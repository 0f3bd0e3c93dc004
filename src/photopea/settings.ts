// =============================================================================
// Settings — Photopea options in the host's settings panel
// =============================================================================

import { z } from "zod";

import type { OptionInfo, OptionsStorePort } from "../ports/options-store.port.js";
import {
  DEFAULT_REPO_URL,
  OPTION_COMMIT_HASH,
  OPTION_REPO_URL,
  OPTION_SECTION,
} from "./constants.js";

export interface SourceConfig {
  repoUrl: string;
  /** `null` means "latest" */
  commitHash: string | null;
}

const TEXT_OPTION = z.string();

function textbox(label: string, defaultValue: string): OptionInfo {
  return {
    default: defaultValue,
    label,
    component: "textbox",
    componentArgs: { interactive: true, maxLines: 1 },
    section: OPTION_SECTION,
  };
}

export function registerOptions(store: OptionsStorePort): void {
  store.addOption(OPTION_REPO_URL, textbox("Photopea repository URL", DEFAULT_REPO_URL));
  store.addOption(OPTION_COMMIT_HASH, textbox("Photopea repository commit hash", ""));
}

/** Read a string option, falling back when it is missing or not a string */
export function readTextOption(
  store: OptionsStorePort,
  key: string,
  fallback: string,
): string {
  const parsed = TEXT_OPTION.safeParse(store.get(key));
  return parsed.success ? parsed.data : fallback;
}

export function readSourceConfig(store: OptionsStorePort): SourceConfig {
  const commitHash = readTextOption(store, OPTION_COMMIT_HASH, "");
  return {
    repoUrl: readTextOption(store, OPTION_REPO_URL, DEFAULT_REPO_URL),
    commitHash: commitHash !== "" ? commitHash : null,
  };
}
