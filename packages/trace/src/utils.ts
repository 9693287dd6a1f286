/**
 * Trace utilities
 */

import { createHash } from 'crypto';
import { v7 as uuidv7 } from 'uuid';
import type { Severity, TraceEvent, TraceEventType } from './types.js';

const SEVERITY_RANK: Record<Severity, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  critical: 4,
};

/**
 * Generate a UUIDv7 (time-ordered)
 */
export function generateId(): string {
  return uuidv7();
}

/**
 * Get current ISO 8601 timestamp
 */
export function getTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Compute SHA-256 hash of content
 */
export function computeHash(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Create canonical JSON string with sorted keys
 */
export function canonicalize(obj: unknown): string {
  return JSON.stringify(obj, (_, value: unknown) => {
    if (value && typeof value === 'object' && !Array.isArray(value)) {
      return Object.fromEntries(
        Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      );
    }
    return value;
  });
}

/**
 * Whether an event of one severity passes a minimum severity
 */
export function meetsSeverity(severity: Severity, minimum: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[minimum];
}

/**
 * Create a trace event chained onto its predecessor
 */
export function createEvent(
  eventType: TraceEventType,
  payload: Record<string, unknown>,
  options: {
    sequence: number;
    component: string;
    severity?: Severity;
    previous_event_hash?: string;
  }
): TraceEvent {
  const eventWithoutHash: Omit<TraceEvent, 'event_hash'> = {
    event_id: generateId(),
    sequence: options.sequence,
    timestamp: getTimestamp(),
    event_type: eventType,
    severity: options.severity ?? 'info',
    component: options.component,
    payload,
    previous_event_hash: options.previous_event_hash,
  };

  return {
    ...eventWithoutHash,
    event_hash: computeHash(canonicalize(eventWithoutHash)),
  };
}

/**
 * Verify event hash integrity
 */
export function verifyEventHash(event: TraceEvent): boolean {
  const { event_hash, ...rest } = event;
  return computeHash(canonicalize(rest)) === event_hash;
}

/**
 * Verify hash chain integrity. The first event's predecessor is not
 * checked, so a retained window of a longer log verifies too.
 */
export function verifyChain(events: TraceEvent[]): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (let i = 0; i < events.length; i++) {
    if (!verifyEventHash(events[i])) {
      errors.push(`Event ${i} (${events[i].event_id}): hash mismatch`);
    }

    if (i > 0 && events[i].previous_event_hash !== events[i - 1].event_hash) {
      errors.push(`Event ${i} (${events[i].event_id}): chain break`);
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Format event as JSONL line
 */
export function toJsonl(event: TraceEvent): string {
  return JSON.stringify(event);
}

/**
 * Parse JSONL line to event
 */
export function fromJsonl(line: string): TraceEvent {
  return JSON.parse(line) as TraceEvent;
}
