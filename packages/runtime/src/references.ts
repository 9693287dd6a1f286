/**
 * Collectible References
 *
 * A collectible reference lets a cache hold a value without keeping it
 * alive. When the value goes away, the cleanup action attached to it is
 * handed to the reclaim daemon, which runs it exactly once.
 */

import { ReclaimDaemon, type CleanupAction } from './daemon.js';

export interface Collectible<T extends object> {
  /** The referent, or undefined once it has been reclaimed */
  deref(): T | undefined;
}

export interface Collector {
  /**
   * Start watching a referent. The action must not hold the referent
   * strongly, or it will never be reclaimed.
   */
  watch<T extends object>(referent: T, action: CleanupAction): Collectible<T>;
}

/**
 * Reclamation driven by the garbage collector.
 */
export class WeakCollector implements Collector {
  private readonly registry: FinalizationRegistry<CleanupAction>;

  constructor(readonly daemon: ReclaimDaemon = ReclaimDaemon.shared()) {
    this.registry = new FinalizationRegistry(action => daemon.enqueue(action));
  }

  watch<T extends object>(referent: T, action: CleanupAction): Collectible<T> {
    this.registry.register(referent, action);
    return new WeakRef(referent);
  }
}

class ManualReference<T extends object> implements Collectible<T> {
  constructor(private target: T | undefined) {}

  deref(): T | undefined {
    return this.target;
  }

  clear(): void {
    this.target = undefined;
  }
}

interface ManualEntry {
  reference: { clear(): void };
  action: CleanupAction;
}

/**
 * Reclamation on request. Referents are held strongly until `reclaim` is
 * called for them, which makes reclamation order deterministic.
 */
export class ManualCollector implements Collector {
  private readonly entries = new Map<object, ManualEntry[]>();

  constructor(readonly daemon: ReclaimDaemon = ReclaimDaemon.shared()) {}

  watch<T extends object>(referent: T, action: CleanupAction): Collectible<T> {
    const reference = new ManualReference(referent);
    const list = this.entries.get(referent) ?? [];
    list.push({ reference, action });
    this.entries.set(referent, list);
    return reference;
  }

  /**
   * Treat a referent as unreachable: clear every reference to it and queue
   * their cleanup actions. Returns the number of references cleared.
   */
  reclaim(referent: object): number {
    const list = this.entries.get(referent);
    if (!list) return 0;
    this.entries.delete(referent);
    for (const { reference, action } of list) {
      reference.clear();
      this.daemon.enqueue(action);
    }
    return list.length;
  }

  /** Number of referents still watched */
  get watched(): number {
    return this.entries.size;
  }
}
