/**
 * CARP error taxonomy
 *
 * None of these are retried by the runtime; they reach the caller as thrown.
 */

export type CarpErrorCode =
  | 'MISSING_TYPE'
  | 'MISSING_MODULE'
  | 'RESOURCE'
  | 'REMOTE_INVOCATION'
  | 'MISSING_ENDPOINT'
  | 'STATUS_MODIFICATION'
  | 'INTERNAL_SERVER'
  | 'PROTOCOL'
  | 'MISSING_FIELD'
  | 'TRANSPORT'
  | 'SCHEMA_DEFECT'
  | 'FATAL';

/**
 * Base of every error raised by CARP packages.
 */
export abstract class CarpError extends Error {
  abstract readonly code: CarpErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export function isCarpError(error: unknown): error is CarpError {
  return error instanceof CarpError;
}

// =============================================================================
// Schema Resolution
// =============================================================================

/**
 * A schema type could not be found. `moduleMissing` tells apart "no scope
 * defines the module" from "the module exists but lacks the type".
 */
export class MissingTypeException extends CarpError {
  readonly code: CarpErrorCode = 'MISSING_TYPE';

  constructor(
    readonly typeName: string,
    readonly moduleMissing: boolean = false,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? `No type ${typeName}`, options);
  }
}

export class MissingModuleException extends MissingTypeException {
  readonly code: CarpErrorCode = 'MISSING_MODULE';

  constructor(typeName: string, readonly moduleName: string) {
    super(typeName, true, `No module ${moduleName} for ${typeName}`);
  }
}

/**
 * A module descriptor exists but cannot be read or is malformed.
 */
export class ResourceException extends CarpError {
  readonly code = 'RESOURCE';

  constructor(
    readonly moduleName: string,
    readonly errors: readonly string[],
    options?: { cause?: unknown }
  ) {
    super(`Failed to load module ${moduleName}: ${errors.join('; ')}`, options);
  }
}

// =============================================================================
// Remote Invocation
// =============================================================================

/**
 * Any failure of a remote call, including unrecognized status outcomes.
 */
export class RemoteInvocationException extends CarpError {
  readonly code: CarpErrorCode = 'REMOTE_INVOCATION';
}

/** The peer does not know the addressed receiver */
export class MissingEndpointException extends RemoteInvocationException {
  readonly code: CarpErrorCode = 'MISSING_ENDPOINT';

  constructor(readonly endpoint: string) {
    super(`No receiver at ${endpoint}`);
  }
}

/** The peer rejected a requested status change */
export class StatusModificationException extends RemoteInvocationException {
  readonly code: CarpErrorCode = 'STATUS_MODIFICATION';
  readonly params: Readonly<Record<string, string>>;

  constructor(params: Record<string, string> = {}, message = 'Status modification rejected') {
    super(message);
    this.params = Object.freeze({ ...params });
  }
}

/** The peer failed internally; only an opaque id is disclosed */
export class InternalServerException extends RemoteInvocationException {
  readonly code: CarpErrorCode = 'INTERNAL_SERVER';

  constructor(readonly errorId: string) {
    super(`server error ${errorId}`);
  }
}

/** The response broke the wire contract */
export class ProtocolException extends RemoteInvocationException {
  readonly code: CarpErrorCode = 'PROTOCOL';
}

/** A required structure field was absent from a wire object */
export class MissingFieldException extends ProtocolException {
  readonly code: CarpErrorCode = 'MISSING_FIELD';

  constructor(readonly field: string) {
    super(`Missing field ${field}`);
  }
}

/** Connecting, writing or reading failed */
export class TransportException extends RemoteInvocationException {
  readonly code: CarpErrorCode = 'TRANSPORT';

  constructor(readonly endpoint: string, cause: unknown) {
    super(`Transport failure for ${endpoint}: ${String(cause)}`, { cause });
  }
}

// =============================================================================
// Defects
// =============================================================================

/**
 * Schema wiring is inconsistent, e.g. a call plan names a response variant
 * the schema lacks. Raised while building, never while calling.
 */
export class SchemaDefectError extends CarpError {
  readonly code = 'SCHEMA_DEFECT';
}

/**
 * Marks a failure the reclaim loop must not swallow.
 */
export class FatalError extends CarpError {
  readonly code = 'FATAL';
}
