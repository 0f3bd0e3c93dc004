// =============================================================================
// StaticExtensionRegistry — Fixed list of installed extensions
// =============================================================================

import type { ExtensionInfo, ExtensionRegistryPort } from "../../ports/extension-registry.port.js";

export class StaticExtensionRegistry implements ExtensionRegistryPort {
  private readonly extensions: readonly ExtensionInfo[];

  constructor(extensions: readonly (string | ExtensionInfo)[] = []) {
    this.extensions = extensions.map((ext) => (typeof ext === "string" ? { name: ext } : ext));
  }

  /** Extensions not explicitly disabled */
  active(): readonly ExtensionInfo[] {
    return this.extensions.filter((ext) => ext.enabled !== false);
  }
}
