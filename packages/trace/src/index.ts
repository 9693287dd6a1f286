/**
 * CARP Trace Package
 *
 * Structured event log for the schema resolver and client runtime.
 */

export { TraceCollector, loadTraceFile } from './collector.js';
export type { CollectorOptions } from './collector.js';

export type { TraceEvent, TraceEventType, Severity } from './types.js';

export {
  generateId,
  getTimestamp,
  computeHash,
  canonicalize,
  meetsSeverity,
  createEvent,
  verifyEventHash,
  verifyChain,
  toJsonl,
  fromJsonl,
} from './utils.js';
