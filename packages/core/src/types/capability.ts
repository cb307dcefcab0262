/**
 * Capstack Core — Capability Groups and Provider Kinds
 *
 * The set of capability groups is closed and fixed at compile time. A
 * manifest may bind providers only to these groups; anything else is
 * rejected when the stack is assembled, never at call time.
 */

// ---------------------------------------------------------------------------
// Capability Groups
// ---------------------------------------------------------------------------

/**
 * The API surfaces a stack can expose. Each group is served by exactly one
 * active provider binding.
 */
export enum CapabilityGroup {
  /** Chat completion, text completion, embeddings. */
  Inference = 'inference',
  /** Classifier-backed shield evaluation over conversation messages. */
  Safety = 'safety',
  /** Memory banks: chunked documents and similarity query. */
  Memory = 'memory',
  /** Agent configuration, sessions and turns. */
  Agents = 'agents',
  /** Event logging and trace lookup. */
  Telemetry = 'telemetry',
  /** Registry of named shields. */
  Shields = 'shields',
}

export const CAPABILITY_GROUPS: ReadonlyArray<CapabilityGroup> = Object.values(CapabilityGroup);

const GROUP_NAMES = new Set<string>(CAPABILITY_GROUPS);

export function isCapabilityGroup(value: string): value is CapabilityGroup {
  return GROUP_NAMES.has(value);
}

// ---------------------------------------------------------------------------
// Provider Kinds
// ---------------------------------------------------------------------------

/**
 * Where a provider's implementation runs.
 *
 * Inline providers execute in the stack's own process. Remote providers
 * proxy every operation over the network and must not perform I/O until
 * the first call.
 */
export enum ProviderKind {
  Inline = 'inline',
  Remote = 'remote',
}

/**
 * Normalize a manifest `provider_type` to its `<kind>::<name>` form.
 *
 * A bare name (e.g. `meta-reference`) is an inline provider. Returns
 * `undefined` when the prefix names no known kind or the name is empty.
 *
 * @example
 * normalizeProviderType('meta-reference')  // { kind: 'inline', provider_type: 'inline::meta-reference' }
 * normalizeProviderType('remote::ollama')  // { kind: 'remote', provider_type: 'remote::ollama' }
 */
export function normalizeProviderType(
  providerType: string,
): { readonly kind: ProviderKind; readonly provider_type: string } | undefined {
  const separator = providerType.indexOf('::');
  if (separator === -1) {
    if (providerType.trim() === '') return undefined;
    return { kind: ProviderKind.Inline, provider_type: `${ProviderKind.Inline}::${providerType}` };
  }

  const prefix = providerType.slice(0, separator);
  const name = providerType.slice(separator + 2);
  if (name === '') return undefined;
  switch (prefix) {
    case ProviderKind.Inline:
      return { kind: ProviderKind.Inline, provider_type: providerType };
    case ProviderKind.Remote:
      return { kind: ProviderKind.Remote, provider_type: providerType };
    default:
      return undefined;
  }
}
