/**
 * CARP wire utilities
 */

import { isInteger, parse as parseLossless, stringify as stringifyLossless } from 'lossless-json';
import { validate as isUuid } from 'uuid';
import { Fingerprint, FingerprintTable } from '../fingerprint.js';
import { ProtocolException } from '../errors.js';
import type {
  PrintEntry,
  StatusOutcome,
  WireObject,
  WireRequest,
  WireResponse,
  WireValue,
} from './types.js';
import { JSON_CONTENT_TYPE } from './types.js';

export function isWireObject(value: unknown): value is WireObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Map an HTTP status code to its outcome.
 */
export function statusOutcomeOf(status: number): StatusOutcome {
  switch (status) {
    case 200:
      return 'ok';
    case 204:
      return 'empty';
    case 404:
      return 'not-found';
    case 422:
      return 'unprocessable';
    case 500:
      return 'internal-error';
    default:
      return 'other';
  }
}

/**
 * Check whether a content-type header names JSON, ignoring parameters.
 */
export function isJsonContentType(contentType: string | null | undefined): boolean {
  if (!contentType) return false;
  const mime = contentType.split(';')[0].trim().toLowerCase();
  return mime === JSON_CONTENT_TYPE;
}

// =============================================================================
// JSON Text
// =============================================================================

/**
 * Integers that a double cannot hold exactly are read as bigint, every
 * other number as a number.
 */
export function parseWireNumber(text: string): number | bigint {
  if (isInteger(text)) {
    const n = Number(text);
    return Number.isSafeInteger(n) ? n : BigInt(text);
  }
  return parseFloat(text);
}

/**
 * Parse JSON text without rounding wide integers.
 *
 * @throws SyntaxError if the text is not JSON
 */
export function parseWireJson(text: string): unknown {
  return parseLossless(text, null, parseWireNumber);
}

/**
 * Serialize a value as JSON, writing bigint values as plain integers.
 */
export function stringifyWire(value: unknown, space?: number): string {
  const text = stringifyLossless(value, undefined, space);
  if (text === undefined) {
    throw new TypeError(`Cannot serialize ${typeof value} as JSON`);
  }
  return text;
}

/**
 * Create a request message
 */
export function createRequest(
  callName: string,
  req: WireObject,
  prints: FingerprintTable
): WireRequest {
  return {
    'req-type': callName,
    req,
    prints: encodePrints(prints),
  };
}

// =============================================================================
// Fingerprint Exchange
// =============================================================================

export function encodePrints(table: FingerprintTable): PrintEntry[] {
  const entries: PrintEntry[] = [];
  for (const [peer, print] of table) {
    entries.push({
      host: peer.host,
      port: peer.port,
      print: { algo: print.algorithm, val: print.bytes },
    });
  }
  return entries;
}

/**
 * Decode the `prints` array of a message.
 *
 * @throws ProtocolException if an entry is malformed
 */
export function decodePrints(value: WireValue | undefined): FingerprintTable {
  const table = new FingerprintTable();
  if (value === undefined) return table;
  if (!Array.isArray(value)) {
    throw new ProtocolException('prints is not an array');
  }

  for (const entry of value) {
    if (!isWireObject(entry)) {
      throw new ProtocolException('print entry is not an object');
    }
    const { host, port, print } = entry;
    if (typeof host !== 'string' || typeof port !== 'number' || !Number.isInteger(port)) {
      throw new ProtocolException('print entry lacks host or port');
    }
    if (!isWireObject(print) || typeof print.algo !== 'string' || !Array.isArray(print.val)) {
      throw new ProtocolException(`malformed print for ${host}:${port}`);
    }
    const octets: number[] = [];
    for (const b of print.val) {
      if (typeof b !== 'number' || !Number.isInteger(b) || b < 0 || b > 255) {
        throw new ProtocolException(`print octet out of range for ${host}:${port}`);
      }
      octets.push(b);
    }
    table.set({ host, port }, Fingerprint.of(print.algo, octets));
  }

  return table;
}

// =============================================================================
// Response Bodies
// =============================================================================

/**
 * Validate a parsed success body.
 *
 * @throws ProtocolException if the body is not a response message
 */
export function parseResponse(body: unknown): WireResponse & { printTable: FingerprintTable } {
  if (!isWireObject(body)) {
    throw new ProtocolException('response is not an object');
  }
  const type = body['rsp-type'];
  if (typeof type !== 'string') {
    throw new ProtocolException('response lacks rsp-type');
  }
  const rsp = body.rsp ?? {};
  if (!isWireObject(rsp)) {
    throw new ProtocolException(`rsp of ${type} is not an object`);
  }
  const printTable = decodePrints(body.prints);
  return {
    'rsp-type': type,
    rsp,
    prints: encodePrints(printTable),
    printTable,
  };
}

export function parseStatusModification(body: unknown): { params: Record<string, string>; message: string } {
  if (!isWireObject(body)) {
    throw new ProtocolException('status modification body is not an object');
  }
  const params: Record<string, string> = {};
  const rawParams = body.params ?? {};
  if (!isWireObject(rawParams)) {
    throw new ProtocolException('params is not an object');
  }
  for (const [key, value] of Object.entries(rawParams)) {
    if (typeof value !== 'string') {
      throw new ProtocolException(`param ${key} is not a string`);
    }
    params[key] = value;
  }
  const message = body.message;
  if (typeof message !== 'string') {
    throw new ProtocolException('status modification lacks message');
  }
  return { params, message };
}

/**
 * Extract the error id of an internal-error body, normalized to lower case.
 */
export function parseInternalErrorId(body: unknown): string {
  if (!isWireObject(body) || typeof body.error !== 'string' || !isUuid(body.error)) {
    throw new ProtocolException('internal error body lacks a UUID');
  }
  return body.error.toLowerCase();
}
