// =============================================================================
// Companion — Detection of the ControlNet extension and its unit count
// =============================================================================

import { z } from "zod";

import type { ExtensionRegistryPort } from "../ports/extension-registry.port.js";
import type { OptionsStorePort } from "../ports/options-store.port.js";
import { COMPANION_NAME_FRAGMENT, CONTROLNET_MODEL_COUNT_OPTION } from "./constants.js";

const MODEL_COUNT = z.number().int().positive();

export function isCompanionActive(registry: ExtensionRegistryPort): boolean {
  return registry.active().some((ext) => ext.name.includes(COMPANION_NAME_FRAGMENT));
}

/** Number of ControlNet unit tabs; 1 when unset or not a positive integer */
export function readControlNetModelCount(store: OptionsStorePort): number {
  const parsed = MODEL_COUNT.safeParse(store.get(CONTROLNET_MODEL_COUNT_OPTION));
  return parsed.success ? parsed.data : 1;
}
