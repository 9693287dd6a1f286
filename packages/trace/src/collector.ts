/**
 * Trace Collector
 *
 * Append-only event collection with hash chain integrity. Serves as the
 * runtime's log: events are kept in a bounded in-memory window, emitted for
 * streaming, and optionally appended to a JSONL file.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import type { Severity, TraceEvent, TraceEventType } from './types.js';
import {
  createEvent,
  fromJsonl,
  generateId,
  getTimestamp,
  meetsSeverity,
  toJsonl,
  verifyChain,
} from './utils.js';

export interface CollectorOptions {
  /** Default component for recorded events */
  component?: string;
  /** Output directory for trace files */
  output_dir?: string;
  /** Output file name (optional, auto-generated) */
  output_file?: string;
  /** Enable file output */
  file_output?: boolean;
  /** Events below this severity are dropped */
  min_severity?: Severity;
  /** Number of events kept in memory */
  retain_events?: number;
  /** Buffer size before flush */
  buffer_size?: number;
  /** Flush interval in ms (file output only) */
  flush_interval_ms?: number;
}

/**
 * Trace Collector
 *
 * Emits `'event'` for every recorded event and `'error'` when a flush fails.
 */
export class TraceCollector extends EventEmitter {
  private readonly collectorId: string;
  private readonly component: string;
  private readonly outputDir?: string;
  private readonly outputFile?: string;
  private readonly fileOutput: boolean;
  private readonly minSeverity: Severity;
  private readonly retainEvents: number;
  private readonly bufferSize: number;

  private events: TraceEvent[] = [];
  private buffer: TraceEvent[] = [];
  private sequence = 0;
  private lastEventHash?: string;
  private flushTimer?: NodeJS.Timeout;
  private fileHandle?: fs.promises.FileHandle;
  private closed = false;

  constructor(options: CollectorOptions = {}) {
    super();
    this.collectorId = generateId();
    this.component = options.component ?? 'carp.runtime';
    this.outputDir = options.output_dir;
    this.outputFile = options.output_file;
    this.fileOutput = options.file_output ?? false;
    this.minSeverity = options.min_severity ?? 'debug';
    this.retainEvents = options.retain_events ?? 1000;
    this.bufferSize = options.buffer_size ?? 100;

    const flushInterval = options.flush_interval_ms ?? 1000;
    if (this.fileOutput && flushInterval > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, flushInterval);
      // Never hold the process open for the log's sake
      this.flushTimer.unref();
    }
  }

  /**
   * Record an event. Returns undefined when the event is below the minimum
   * severity or the collector has been closed.
   */
  record(
    eventType: TraceEventType,
    payload: Record<string, unknown>,
    options: {
      severity?: Severity;
      component?: string;
    } = {}
  ): TraceEvent | undefined {
    const severity = options.severity ?? 'info';
    if (this.closed || !meetsSeverity(severity, this.minSeverity)) {
      return undefined;
    }

    const event = createEvent(eventType, payload, {
      sequence: ++this.sequence,
      component: options.component ?? this.component,
      severity,
      previous_event_hash: this.lastEventHash,
    });

    this.lastEventHash = event.event_hash;

    this.events.push(event);
    if (this.events.length > this.retainEvents) {
      this.events.splice(0, this.events.length - this.retainEvents);
    }
    if (this.fileOutput) {
      this.buffer.push(event);
    }

    super.emit('event', event);

    if (this.buffer.length >= this.bufferSize) {
      void this.flush();
    }

    return event;
  }

  /**
   * Get the retained events
   */
  getEvents(): TraceEvent[] {
    return [...this.events];
  }

  /**
   * Get retained events of one type
   */
  getEventsOfType(eventType: TraceEventType): TraceEvent[] {
    return this.events.filter(e => e.event_type === eventType);
  }

  /**
   * Get events as async iterable stream, ending when the collector closes
   */
  async *stream(): AsyncIterable<TraceEvent> {
    for (const event of this.events) {
      yield event;
    }

    const eventQueue: TraceEvent[] = [];
    let wake: (() => void) | null = null;

    const handler = (event: TraceEvent) => {
      eventQueue.push(event);
      if (wake) {
        wake();
        wake = null;
      }
    };
    const closer = () => {
      if (wake) {
        wake();
        wake = null;
      }
    };

    this.on('event', handler);
    this.on('close', closer);

    try {
      while (!this.closed) {
        const next = eventQueue.shift();
        if (next) {
          yield next;
        } else {
          await new Promise<void>(r => { wake = r; });
        }
      }

      for (const event of eventQueue) {
        yield event;
      }
    } finally {
      this.off('event', handler);
      this.off('close', closer);
    }
  }

  /**
   * Flush buffered events to file
   */
  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;
    if (!this.fileOutput || !this.outputDir) return;

    const eventsToFlush = [...this.buffer];
    this.buffer = [];

    try {
      await fs.promises.mkdir(this.outputDir, { recursive: true });

      if (!this.fileHandle) {
        const fileName = this.outputFile ??
          `${new Date().toISOString().replace(/[:.]/g, '-')}-${this.collectorId.slice(0, 8)}.trace.jsonl`;
        this.fileHandle = await fs.promises.open(path.join(this.outputDir, fileName), 'a');
      }

      const lines = eventsToFlush.map(e => toJsonl(e) + '\n').join('');
      await this.fileHandle.write(lines);
    } catch (error) {
      // Put events back in buffer on failure
      this.buffer = eventsToFlush.concat(this.buffer);
      if (this.listenerCount('error') > 0) {
        super.emit('error', error);
      }
    }
  }

  /**
   * Verify the integrity of retained events
   */
  verify(): { valid: boolean; errors: string[] } {
    return verifyChain(this.events);
  }

  /**
   * Export retained events to JSONL string
   */
  toJsonl(): string {
    return this.events.map(e => toJsonl(e)).join('\n');
  }

  /**
   * Get summary of collected trace
   */
  getSummary(): {
    collector_id: string;
    event_count: number;
    retained_count: number;
    started_at: string;
    ended_at?: string;
  } {
    const firstEvent = this.events[0];
    const lastEvent = this.events[this.events.length - 1];

    return {
      collector_id: this.collectorId,
      event_count: this.sequence,
      retained_count: this.events.length,
      started_at: firstEvent?.timestamp ?? getTimestamp(),
      ended_at: lastEvent?.timestamp,
    };
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Close the collector
   */
  async close(): Promise<void> {
    if (this.closed) return;

    if (this.flushTimer) {
      clearInterval(this.flushTimer);
    }

    await this.flush();

    this.closed = true;

    if (this.fileHandle) {
      await this.fileHandle.close();
    }

    super.emit('close');
  }
}

/**
 * Load events from a trace file
 */
export async function loadTraceFile(filePath: string): Promise<TraceEvent[]> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  const lines = content.split('\n').filter(line => line.trim());
  return lines.map(line => fromJsonl(line));
}
