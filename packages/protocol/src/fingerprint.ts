/**
 * Peer identities and certificate fingerprints
 */

import { createHash } from 'crypto';

// =============================================================================
// Peer Identity
// =============================================================================

export interface PeerAddress {
  /** Host name or address literal, as written in the endpoint */
  host: string;
  /** TCP port, defaulted from the scheme when the endpoint omits it */
  port: number;
}

const DEFAULT_PORTS: Record<string, number> = {
  'http:': 80,
  'https:': 443,
};

/**
 * Get the peer an endpoint is served by.
 */
export function peerOf(endpoint: URL): PeerAddress {
  const host = endpoint.hostname.replace(/^\[(.*)\]$/, '$1');
  const port = endpoint.port
    ? Number(endpoint.port)
    : DEFAULT_PORTS[endpoint.protocol] ?? 0;
  return { host, port };
}

/**
 * Map key for a peer
 */
export function peerKey(peer: PeerAddress): string {
  return `${peer.host.toLowerCase()}:${peer.port}`;
}

// =============================================================================
// Fingerprint
// =============================================================================

/**
 * An algorithm-tagged digest of a peer's certificate.
 */
export class Fingerprint {
  private constructor(
    readonly algorithm: string,
    private readonly digest: Uint8Array
  ) {}

  /**
   * Create a fingerprint from its bytes. Values are truncated to octets.
   */
  static of(algorithm: string, bytes: Iterable<number>): Fingerprint {
    return new Fingerprint(algorithm, Uint8Array.from(bytes, b => b & 0xff));
  }

  /**
   * Compute the fingerprint of a DER-encoded certificate. The algorithm may
   * be given as `SHA-256` or `sha256`.
   */
  static ofCertificate(algorithm: string, der: Uint8Array): Fingerprint {
    const digest = createHash(algorithm.replace(/-/g, '').toLowerCase())
      .update(der)
      .digest();
    return new Fingerprint(algorithm, new Uint8Array(digest));
  }

  /** Digest octets, each in 0..255 */
  get bytes(): number[] {
    return Array.from(this.digest);
  }

  equals(other: Fingerprint): boolean {
    if (this.algorithm !== other.algorithm) return false;
    if (this.digest.length !== other.digest.length) return false;
    return this.digest.every((b, i) => b === other.digest[i]);
  }

  toString(): string {
    const hex = Array.from(this.digest, b => b.toString(16).padStart(2, '0'));
    return `${this.algorithm}:${hex.join(':')}`;
  }
}

// =============================================================================
// Fingerprint Table
// =============================================================================

/**
 * Per-call mapping from peer to fingerprint. Each invocation builds its own
 * table, so no synchronization is involved.
 */
export class FingerprintTable {
  private readonly entries = new Map<string, { peer: PeerAddress; print: Fingerprint }>();

  set(peer: PeerAddress, print: Fingerprint): void {
    this.entries.set(peerKey(peer), { peer, print });
  }

  get(peer: PeerAddress): Fingerprint | undefined {
    return this.entries.get(peerKey(peer))?.print;
  }

  has(peer: PeerAddress): boolean {
    return this.entries.has(peerKey(peer));
  }

  get size(): number {
    return this.entries.size;
  }

  *[Symbol.iterator](): IterableIterator<[PeerAddress, Fingerprint]> {
    for (const { peer, print } of this.entries.values()) {
      yield [peer, print];
    }
  }
}
