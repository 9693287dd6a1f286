/**
 * Trace event model
 *
 * Every notable runtime step is recorded as an event. Events form a SHA-256
 * hash chain so that a persisted log can be checked for tampering.
 */

export type Severity = 'debug' | 'info' | 'warn' | 'error' | 'critical';

export type TraceEventType =
  // Schema resolution
  | 'schema.module.loaded'
  | 'schema.module.missing'
  | 'schema.module.failed'

  // Caches
  | 'runtime.translator.created'
  | 'runtime.translator.reclaimed'
  | 'runtime.proxy.created'
  | 'runtime.proxy.reclaimed'

  // Calls
  | 'runtime.call.started'
  | 'runtime.call.completed'
  | 'runtime.call.failed'

  // Fingerprints
  | 'runtime.fingerprint.recorded'
  | 'runtime.fingerprint.mismatch'

  // Reclamation
  | 'runtime.reclaim.action_failed'
  | 'runtime.reclaim.fatal'

  // System events
  | 'system.startup'
  | 'system.shutdown'
  | 'system.config.loaded';

export interface TraceEvent {
  /** Unique event ID (UUIDv7, time-ordered) */
  event_id: string;
  /** Monotonic sequence number within the collector */
  sequence: number;
  /** ISO 8601 timestamp */
  timestamp: string;

  /** Event classification */
  event_type: TraceEventType;
  /** Severity level */
  severity: Severity;
  /** Emitting component, e.g. "carp.runtime" */
  component: string;

  /** Event-specific payload */
  payload: Record<string, unknown>;

  /** SHA-256 of previous event (chain) */
  previous_event_hash?: string;
  /** SHA-256 of this event (excluding this field) */
  event_hash: string;
}
