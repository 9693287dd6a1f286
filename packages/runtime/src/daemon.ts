/**
 * Reclaim Daemon
 *
 * One background loop per process runs the cleanup actions of reclaimed
 * cache entries. The loop waits on a promise rather than a timer, so it
 * never keeps the process alive by itself.
 *
 * A throwing cleanup action is logged and the loop moves on. A FatalError
 * stops the loop: it is recorded, kept as `failure` and emitted as `'fatal'`.
 */

import { EventEmitter } from 'events';
import { FatalError } from '@carp/protocol';
import { TraceCollector } from '@carp/trace';

export type CleanupAction = () => void;

export interface ReclaimDaemonOptions {
  trace?: TraceCollector;
}

export class ReclaimDaemon extends EventEmitter {
  private static instance?: ReclaimDaemon;

  private readonly trace: TraceCollector;
  private readonly queue: CleanupAction[] = [];
  private wake: (() => void) | null = null;
  private idleWaiters: Array<() => void> = [];
  private waiting = false;
  private running = true;
  private completed = 0;
  private failed = 0;
  private fatal?: FatalError;
  private readonly loop: Promise<void>;

  constructor(options: ReclaimDaemonOptions = {}) {
    super();
    this.trace = options.trace ?? new TraceCollector({ component: 'carp.reclaim' });
    this.loop = this.run().catch((error: unknown) => {
      this.running = false;
      this.fatal = error instanceof FatalError
        ? error
        : new FatalError('Reclaim loop crashed', { cause: error });
      this.settleIdle();
    });
  }

  /**
   * The process-wide daemon
   */
  static shared(): ReclaimDaemon {
    if (!ReclaimDaemon.instance) {
      ReclaimDaemon.instance = new ReclaimDaemon();
    }
    return ReclaimDaemon.instance;
  }

  /**
   * Queue a cleanup action. Actions queued after the loop stopped are dropped.
   */
  enqueue(action: CleanupAction): void {
    if (!this.running) return;
    this.queue.push(action);
    if (this.wake) {
      const wake = this.wake;
      this.wake = null;
      wake();
    }
  }

  /**
   * Resolves once the queue is drained and the loop is waiting, or stopped.
   */
  idle(): Promise<void> {
    if (!this.running || (this.waiting && this.queue.length === 0)) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  /**
   * Stop the loop once the current action finishes. Queued actions are dropped.
   */
  stop(): Promise<void> {
    this.running = false;
    this.queue.length = 0;
    if (this.wake) {
      const wake = this.wake;
      this.wake = null;
      wake();
    }
    return this.loop;
  }

  get failure(): FatalError | undefined {
    return this.fatal;
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): { pending: number; completed: number; failed: number } {
    return { pending: this.queue.length, completed: this.completed, failed: this.failed };
  }

  private async run(): Promise<void> {
    while (this.running) {
      const action = this.queue.shift();
      if (!action) {
        this.waiting = true;
        this.settleIdle();
        await new Promise<void>(resolve => {
          this.wake = resolve;
        });
        this.waiting = false;
        continue;
      }

      try {
        action();
        this.completed++;
      } catch (error) {
        if (error instanceof FatalError) {
          this.halt(error);
          return;
        }
        this.failed++;
        this.trace.record('runtime.reclaim.action_failed', {
          error: error instanceof Error ? error.message : String(error),
        }, { severity: 'warn' });
      }
    }
    this.settleIdle();
  }

  private halt(error: FatalError): void {
    this.running = false;
    this.fatal = error;
    this.queue.length = 0;
    this.trace.record('runtime.reclaim.fatal', { error: error.message }, { severity: 'critical' });
    this.settleIdle();
    this.emit('fatal', error);
  }

  private settleIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
