/**
 * Trace Collector Tests
 *
 * Tests for event recording, hash chain integrity, retention and file output.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { TraceCollector, loadTraceFile } from '../collector.js';
import { verifyChain, verifyEventHash, fromJsonl, meetsSeverity } from '../utils.js';
import type { TraceEvent } from '../types.js';

describe('Trace Collector', () => {
  let collector: TraceCollector;

  beforeEach(() => {
    collector = new TraceCollector({ component: 'test.component' });
  });

  afterEach(async () => {
    await collector.close();
  });

  describe('Event Recording', () => {
    it('should record events with correct structure', () => {
      const event = collector.record('system.startup', { test: true });

      expect(event?.event_id).toMatch(/^[0-9a-f-]{36}$/);
      expect(event?.sequence).toBe(1);
      expect(event?.event_type).toBe('system.startup');
      expect(event?.severity).toBe('info');
      expect(event?.component).toBe('test.component');
      expect(event?.payload).toEqual({ test: true });
      expect(event?.previous_event_hash).toBeUndefined();
      expect(event?.event_hash).toMatch(/^[a-f0-9]{64}$/);
    });

    it('should let events override the component', () => {
      const event = collector.record('schema.module.loaded', {}, { component: 'carp.schema' });
      expect(event?.component).toBe('carp.schema');
    });

    it('should chain events by hash', () => {
      const first = collector.record('system.startup', {});
      const second = collector.record('runtime.call.started', { call: 'say' });

      expect(second?.previous_event_hash).toBe(first?.event_hash);
      expect(second?.sequence).toBe(2);
      expect(collector.verify()).toEqual({ valid: true, errors: [] });
    });

    it('should detect tampering', () => {
      collector.record('system.startup', {});
      collector.record('runtime.call.started', { call: 'say' });

      const events = collector.getEvents();
      const tampered: TraceEvent[] = [events[0], { ...events[1], payload: { call: 'other' } }];

      expect(verifyEventHash(tampered[1])).toBe(false);
      expect(verifyChain(tampered).errors).toEqual([
        `Event 1 (${events[1].event_id}): hash mismatch`,
      ]);
    });

    it('should emit events for streaming', () => {
      const seen: TraceEvent[] = [];
      collector.on('event', (e: TraceEvent) => seen.push(e));

      collector.record('runtime.proxy.created', { endpoint: 'http://h/' });

      expect(seen).toHaveLength(1);
      expect(seen[0].event_type).toBe('runtime.proxy.created');
    });

    it('should filter events by type', () => {
      collector.record('runtime.call.started', {});
      collector.record('runtime.call.completed', {});
      collector.record('runtime.call.started', {});

      expect(collector.getEventsOfType('runtime.call.started')).toHaveLength(2);
    });
  });

  describe('Severity', () => {
    it('should rank severities', () => {
      expect(meetsSeverity('warn', 'info')).toBe(true);
      expect(meetsSeverity('debug', 'info')).toBe(false);
      expect(meetsSeverity('critical', 'error')).toBe(true);
    });

    it('should drop events below the minimum severity', async () => {
      const quiet = new TraceCollector({ min_severity: 'warn' });

      expect(quiet.record('runtime.call.started', {}, { severity: 'debug' })).toBeUndefined();
      expect(quiet.record('runtime.call.failed', {}, { severity: 'error' })?.sequence).toBe(1);
      expect(quiet.getEvents()).toHaveLength(1);

      await quiet.close();
    });
  });

  describe('Retention', () => {
    it('should keep only the newest events', async () => {
      const small = new TraceCollector({ retain_events: 2 });
      small.record('system.startup', { n: 1 });
      small.record('system.startup', { n: 2 });
      small.record('system.startup', { n: 3 });

      expect(small.getEvents().map(e => e.payload.n)).toEqual([2, 3]);
      expect(small.getSummary().event_count).toBe(3);
      expect(small.getSummary().retained_count).toBe(2);
      expect(small.verify().valid).toBe(true);

      await small.close();
    });
  });

  describe('Closing', () => {
    it('should ignore records after close', async () => {
      await collector.close();
      expect(collector.isClosed()).toBe(true);
      expect(collector.record('system.shutdown', {})).toBeUndefined();
    });

    it('should end streams on close', async () => {
      collector.record('system.startup', {});
      const received: TraceEvent[] = [];

      const reading = (async () => {
        for await (const event of collector.stream()) {
          received.push(event);
        }
      })();

      collector.record('system.shutdown', {});
      await collector.close();
      await reading;

      expect(received.map(e => e.event_type)).toEqual(['system.startup', 'system.shutdown']);
    });
  });

  describe('File Output', () => {
    const outputDir = './test-carp-traces';

    afterEach(() => {
      fs.rmSync(outputDir, { recursive: true, force: true });
    });

    it('should write JSONL on close', async () => {
      const fileCollector = new TraceCollector({
        output_dir: outputDir,
        output_file: 'run.trace.jsonl',
        file_output: true,
        flush_interval_ms: 0,
      });

      fileCollector.record('system.startup', { n: 1 });
      fileCollector.record('system.shutdown', { n: 2 });
      await fileCollector.close();

      const events = await loadTraceFile(path.join(outputDir, 'run.trace.jsonl'));
      expect(events.map(e => e.payload.n)).toEqual([1, 2]);
      expect(verifyChain(events).valid).toBe(true);
    });

    it('should export JSONL text', () => {
      collector.record('system.startup', { n: 1 });
      const line = collector.toJsonl();
      expect(fromJsonl(line).payload).toEqual({ n: 1 });
    });
  });
});
