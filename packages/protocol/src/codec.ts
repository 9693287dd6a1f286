/**
 * Codec contracts
 *
 * One encoder/decoder pair exists per schema type. Both receive a per-call
 * context carrying the call's fingerprint table.
 */

import type { FingerprintTable } from './fingerprint.js';
import type { ExternalName } from './names.js';
import type { WireValue } from './wire/types.js';

export interface EncodingContext {
  /** Peers referenced so far by this request, with their fingerprints */
  readonly prints: FingerprintTable;

  /**
   * Get the endpoint to pass for a receiver of an interface type, recording
   * the fingerprint of its peer when one is known.
   */
  establishCallback(type: ExternalName, receiver: unknown): URL;
}

export interface DecodingContext {
  /** Fingerprints the peer sent with the message being decoded */
  readonly prints: FingerprintTable;

  /**
   * Get a proxy of an interface type for a received endpoint.
   */
  seek(type: ExternalName, endpoint: URL): unknown;
}

export interface Encoder {
  encode(value: unknown, ctx: EncodingContext): WireValue;
}

export interface Decoder {
  decode(value: WireValue, ctx: DecodingContext): unknown;
}
