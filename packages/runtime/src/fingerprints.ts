/**
 * Fingerprint Repository
 *
 * Certificate fingerprints learned for peers. Consulted opportunistically:
 * a missing or conflicting entry never blocks a call.
 */

import { LRUCache } from 'lru-cache';
import { peerKey, type Fingerprint, type PeerAddress } from '@carp/protocol';

export interface FingerprintRepository {
  record(peer: PeerAddress, print: Fingerprint): void;
  lookup(peer: PeerAddress): Fingerprint | undefined;
}

export interface MemoryFingerprintOptions {
  /** Maximum number of peers remembered */
  capacity?: number;
}

/**
 * Bounded in-memory repository; the least recently used peers are evicted.
 */
export class MemoryFingerprintRepository implements FingerprintRepository {
  private readonly prints: LRUCache<string, Fingerprint>;

  constructor(options: MemoryFingerprintOptions = {}) {
    this.prints = new LRUCache<string, Fingerprint>({
      max: options.capacity ?? 1024,
    });
  }

  record(peer: PeerAddress, print: Fingerprint): void {
    this.prints.set(peerKey(peer), print);
  }

  lookup(peer: PeerAddress): Fingerprint | undefined {
    return this.prints.get(peerKey(peer));
  }

  get size(): number {
    return this.prints.size;
  }

  clear(): void {
    this.prints.clear();
  }
}
