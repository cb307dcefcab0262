/**
 * Capstack Core — Error Taxonomy
 *
 * Every failure a stack surfaces is a StackError subclass. The `fault`
 * field tells the caller whether the request itself was wrong (`caller`:
 * configuration, routing, memory-bank misuse) or the backend failed
 * (`backend`: adapter timeouts, upstream errors, transport failures).
 * Retry policy belongs to the caller; nothing in the stack retries.
 *
 * The Router annotates errors with the capability group and provider id
 * they came from before rethrowing them.
 */

export type ErrorFault = 'caller' | 'backend';

export type ConfigErrorCode =
  | 'InvalidManifest'
  | 'MissingCapability'
  | 'UnknownCapability'
  | 'UnknownProviderKind'
  | 'InvalidProviderConfig'
  | 'DuplicateProviderId'
  | 'MultipleActiveProviders'
  | 'MissingDependency'
  | 'DuplicateBank'
  | 'InvalidBankConfig'
  | 'DuplicateShield'
  | 'InvalidEnvironment';

export type RoutingErrorCode =
  | 'NoActiveProvider'
  | 'UnknownProvider'
  | 'UnknownCapability'
  | 'UnknownOperation'
  | 'UnknownShield'
  | 'UnsupportedModel'
  | 'ContractViolation'
  | 'InvalidRequest';

export type AdapterErrorCode =
  | 'Timeout'
  | 'Upstream'
  | 'Transport'
  | 'InvalidResponse'
  | 'Internal';

export type ChunkingErrorCode =
  | 'DuplicateDocumentId'
  | 'EmptyContent'
  | 'UnsupportedContent';

export type NotFoundErrorCode = 'BankId' | 'Agent' | 'Session';

/** Attribution attached by the Router (or set directly by an adapter). */
export interface ErrorOrigin {
  readonly capability?: string | undefined;
  readonly provider_id?: string | undefined;
  readonly cause?: unknown;
}

/**
 * Serialized error shape used on the wire and in CLI output.
 */
export interface WireError {
  readonly type: string;
  readonly code: string;
  readonly message: string;
  readonly fault: ErrorFault;
  readonly capability?: string | undefined;
  readonly provider_id?: string | undefined;
  readonly status?: number | undefined;
}

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

export abstract class StackError extends Error {
  abstract readonly fault: ErrorFault;
  abstract readonly code: string;
  /** Capability group the failure came from. Set once, by the first annotate(). */
  capability: string | undefined;
  provider_id: string | undefined;

  constructor(message: string, origin: ErrorOrigin = {}) {
    super(message, origin.cause === undefined ? undefined : { cause: origin.cause });
    this.name = new.target.name;
    this.capability = origin.capability;
    this.provider_id = origin.provider_id;
  }

  /**
   * Attach the originating capability group and provider id.
   * Attribution already present (e.g. set by a nested dispatch) is kept.
   */
  annotate(capability: string, providerId: string | undefined): this {
    this.capability ??= capability;
    this.provider_id ??= providerId;
    return this;
  }

  toWire(): WireError {
    return {
      type: this.name,
      code: this.code,
      message: this.message,
      fault: this.fault,
      capability: this.capability,
      provider_id: this.provider_id,
    };
  }
}

// ---------------------------------------------------------------------------
// Caller faults
// ---------------------------------------------------------------------------

/** Manifest or resource configuration is malformed or incomplete. */
export class ConfigError extends StackError {
  readonly fault = 'caller' as const;

  constructor(
    readonly code: ConfigErrorCode,
    message: string,
    origin?: ErrorOrigin,
  ) {
    super(message, origin);
  }
}

/** The call could not be routed, or the adapter broke its contract. */
export class RoutingError extends StackError {
  readonly fault = 'caller' as const;

  constructor(
    readonly code: RoutingErrorCode,
    message: string,
    origin?: ErrorOrigin,
  ) {
    super(message, origin);
  }
}

export class ChunkingError extends StackError {
  readonly fault = 'caller' as const;

  constructor(
    readonly code: ChunkingErrorCode,
    message: string,
    origin?: ErrorOrigin,
  ) {
    super(message, origin);
  }
}

export class NotFoundError extends StackError {
  readonly fault = 'caller' as const;

  constructor(
    readonly code: NotFoundErrorCode,
    message: string,
    origin?: ErrorOrigin,
  ) {
    super(message, origin);
  }
}

// ---------------------------------------------------------------------------
// Backend faults
// ---------------------------------------------------------------------------

/**
 * Body of a structured error returned by another stack, kept when the
 * remote binding is configured to trust its error shape.
 */
export interface UpstreamError {
  readonly type: string;
  readonly code: string;
  readonly message: string;
}

export interface AdapterErrorDetails extends ErrorOrigin {
  readonly status?: number | undefined;
  readonly body?: string | undefined;
  readonly upstream?: UpstreamError | undefined;
}

export class AdapterError extends StackError {
  readonly fault = 'backend' as const;
  /** HTTP status for `Upstream` failures. */
  readonly status: number | undefined;
  /** Upstream response body, as opaque text. */
  readonly body: string | undefined;
  readonly upstream: UpstreamError | undefined;

  constructor(
    readonly code: AdapterErrorCode,
    message: string,
    details: AdapterErrorDetails = {},
  ) {
    super(message, details);
    this.status = details.status;
    this.body = details.body;
    this.upstream = details.upstream;
  }

  override toWire(): WireError {
    return { ...super.toWire(), status: this.status };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isStackError(err: unknown): err is StackError {
  return err instanceof StackError;
}

/**
 * Convert anything thrown by an adapter into a StackError.
 * Unknown errors become `AdapterError(Internal)` with the original as cause.
 */
export function toStackError(err: unknown): StackError {
  if (err instanceof StackError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new AdapterError('Internal', message, { cause: err });
}
