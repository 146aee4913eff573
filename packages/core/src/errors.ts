/** Stable identifiers for the service's failure classes. */
export type ErrorCode =
  | 'UNAUTHENTICATED'
  | 'TOOL_UNAVAILABLE'
  | 'TOOL_SERVER_UNREACHABLE'
  | 'MODEL_PROVIDER_FAILURE'
  | 'VALIDATION_FAILURE'
  | 'STORAGE_FAILURE'
  | 'NOT_FOUND'
  | 'CONFIGURATION';

/** Base class for every failure that crosses a component boundary. */
export abstract class ParleyError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing, malformed, expired or rejected credential. */
export class UnauthenticatedError extends ParleyError {
  readonly code = 'UNAUTHENTICATED';

  constructor(message = 'Unauthenticated', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A single tool failed or timed out. Recovered locally as an observation. */
export class ToolUnavailableError extends ParleyError {
  readonly code = 'TOOL_UNAVAILABLE';

  constructor(
    public readonly toolName: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Tool ${toolName} is unavailable: ${reason}`, options);
  }
}

/**
 * The remote tool server could not be reached or rejected the credential.
 * `credentialRejected` separates a refusal of this caller from an outage
 * that affects everyone.
 */
export class ToolServerUnreachableError extends ParleyError {
  readonly code = 'TOOL_SERVER_UNREACHABLE';
  readonly credentialRejected: boolean;

  constructor(
    public readonly serverName: string,
    reason: string,
    options?: { cause?: unknown; credentialRejected?: boolean },
  ) {
    super(`Tool server "${serverName}" unreachable: ${reason}`, options);
    this.credentialRejected = options?.credentialRejected ?? false;
  }
}

/** The language model errored, was rate limited, or is not configured. */
export class ModelProviderError extends ParleyError {
  readonly code = 'MODEL_PROVIDER_FAILURE';
}

/** A request body failed schema validation. */
export class ValidationError extends ParleyError {
  readonly code = 'VALIDATION_FAILURE';

  constructor(
    message: string,
    public readonly issues: ReadonlyArray<{ path: string; message: string }> = [],
  ) {
    super(message);
  }
}

/** The conversation store could not complete a read or write. */
export class StorageError extends ParleyError {
  readonly code = 'STORAGE_FAILURE';
}

/** Invalid configuration detected at startup or while assembling a toolset. */
export class ConfigurationError extends ParleyError {
  readonly code = 'CONFIGURATION';
}
