// =============================================================================
// Extension Registry Port — Read-only view of the host's active extensions
// =============================================================================

export interface ExtensionInfo {
  readonly name: string;
  readonly enabled?: boolean;
}

export interface ExtensionRegistryPort {
  active(): readonly ExtensionInfo[];
}
