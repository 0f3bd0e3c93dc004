// =============================================================================
// InMemoryOptionsStore — Host settings held in a Map
// =============================================================================

import type { OptionInfo, OptionsStorePort } from "../../ports/options-store.port.js";

export class InMemoryOptionsStore implements OptionsStorePort {
  private readonly definitions = new Map<string, OptionInfo>();
  private readonly values = new Map<string, unknown>();

  /** `initial` holds user-saved values, e.g. loaded from the host's config file */
  constructor(initial: Record<string, unknown> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  addOption(key: string, info: OptionInfo): void {
    // Map.set keeps the original insertion slot, so re-registering does not reorder
    this.definitions.set(key, info);
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  /** Value for `key`, falling back to its registered default */
  valueOf(key: string): unknown {
    if (this.values.has(key)) return this.values.get(key);
    return this.definitions.get(key)?.default;
  }

  listOptions(): ReadonlyMap<string, OptionInfo> {
    return this.definitions;
  }
}
