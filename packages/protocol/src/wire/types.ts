/**
 * CARP wire format
 *
 * JSON messages exchanged between a proxy and a remote receiver.
 */

// =============================================================================
// Values
// =============================================================================

export type WireValue =
  | null
  | boolean
  | number
  /** Integers outside the safe range of a double */
  | bigint
  | string
  | WireValue[]
  | WireObject;

export type WireObject = { [key: string]: WireValue };

// =============================================================================
// Messages
// =============================================================================

export type PrintEntry = {
  host: string;
  port: number;
  print: {
    /** Digest algorithm, e.g. "SHA-256" */
    algo: string;
    /** Digest octets, 0..255 */
    val: number[];
  };
};

export type WireRequest = {
  /** Call name */
  'req-type': string;
  /** Encoded arguments by parameter name */
  req: WireObject;
  /** Fingerprints of peers referenced by endpoint-valued arguments */
  prints: PrintEntry[];
};

export type WireResponse = {
  /** Response variant name */
  'rsp-type': string;
  /** Encoded fields by field name */
  rsp: WireObject;
  /** Fingerprints of peers referenced by endpoint-valued fields */
  prints: PrintEntry[];
};

/** Body accompanying an "unprocessable" outcome */
export type StatusModificationBody = {
  params: Record<string, string>;
  message: string;
};

/** Body accompanying an "internal error" outcome */
export type InternalErrorBody = {
  error: string;
};

// =============================================================================
// Status Outcomes
// =============================================================================

export type StatusOutcome =
  | 'ok'
  | 'empty'
  | 'not-found'
  | 'unprocessable'
  | 'internal-error'
  | 'other';

export const JSON_CONTENT_TYPE = 'application/json';
