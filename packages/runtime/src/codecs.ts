/**
 * Standard Codecs
 *
 * Encoders and decoders for every schema kind. Native values:
 *
 * | kind        | native                                   | wire            |
 * |-------------|------------------------------------------|-----------------|
 * | boolean     | boolean                                  | boolean         |
 * | integer     | number, or bigint beyond the safe range  | number          |
 * | real        | finite number                            | number          |
 * | string      | string                                   | string          |
 * | uuid        | string                                   | string          |
 * | sequence    | array                                    | array           |
 * | set         | Set (arrays accepted when encoding)      | array           |
 * | map         | Map (objects accepted when encoding)     | object          |
 * | structure   | object keyed by lowerCamel field names   | object          |
 * | enumerated  | constant name                            | string          |
 * | interface   | proxy                                    | endpoint string |
 *
 * Bad native arguments raise TypeError; bad wire values raise
 * ProtocolException.
 */

import { validate as isUuid } from 'uuid';
import {
  MissingFieldException,
  ProtocolException,
  SchemaDefectError,
  isWireObject,
  type DecodingContext,
  type Decoder,
  type EncodingContext,
  type Encoder,
  type ExternalName,
  type Member,
  type TypeModel,
  type WireObject,
  type WireValue,
} from '@carp/protocol';
import type { LinkContext, ResolutionScope, TypeRecord } from '@carp/schema';

export interface Codec extends Encoder, Decoder {}

/**
 * Supplies the codec of a schema type. Types are looked up synchronously,
 * so everything reachable must have been resolved beforehand.
 */
export interface WireCodec {
  codecFor(model: TypeModel, scope: ResolutionScope): Codec;
}

/** Source of link contexts; a TypeResolver qualifies */
export interface Linker {
  linkContext(scope: ResolutionScope): LinkContext;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) &&
    !(value instanceof Map) && !(value instanceof Set);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function expected(what: string, value: unknown): TypeError {
  return new TypeError(`Expected ${what}, got ${describe(value)}`);
}

function unexpected(what: string, value: WireValue): ProtocolException {
  return new ProtocolException(`Expected ${what} on the wire, got ${describe(value)}`);
}

// =============================================================================
// Scalars
// =============================================================================

const booleanCodec: Codec = {
  encode(value) {
    if (typeof value !== 'boolean') throw expected('boolean', value);
    return value;
  },
  decode(value) {
    if (typeof value !== 'boolean') throw unexpected('boolean', value);
    return value;
  },
};

const realCodec: Codec = {
  encode(value) {
    if (typeof value !== 'number' || !Number.isFinite(value)) throw expected('finite number', value);
    return value;
  },
  decode(value) {
    if (typeof value === 'bigint') return Number(value);
    if (typeof value !== 'number') throw unexpected('number', value);
    return value;
  },
};

const stringCodec: Codec = {
  encode(value) {
    if (typeof value !== 'string') throw expected('string', value);
    return value;
  },
  decode(value) {
    if (typeof value !== 'string') throw unexpected('string', value);
    return value;
  },
};

const uuidCodec: Codec = {
  encode(value) {
    if (typeof value !== 'string' || !isUuid(value)) throw expected('UUID string', value);
    return value.toLowerCase();
  },
  decode(value) {
    if (typeof value !== 'string' || !isUuid(value)) throw unexpected('UUID', value);
    return value.toLowerCase();
  },
};

function integerValue(value: unknown): bigint | undefined {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value);
  return undefined;
}

/** A number when a double holds it exactly, otherwise the bigint */
function narrowInteger(n: bigint): number | bigint {
  const asNumber = Number(n);
  return Number.isSafeInteger(asNumber) ? asNumber : n;
}

function integerCodec(min?: number | bigint, max?: number | bigint): Codec {
  const low = min === undefined ? undefined : BigInt(min);
  const high = max === undefined ? undefined : BigInt(max);
  const inRange = (n: bigint) => (low === undefined || n >= low) && (high === undefined || n <= high);
  const range = `integer in ${min ?? '-∞'}..${max ?? '∞'}`;
  return {
    encode(value) {
      const n = integerValue(value);
      if (n === undefined || !inRange(n)) {
        throw expected(range, value);
      }
      return narrowInteger(n);
    },
    decode(value) {
      const n = integerValue(value);
      if (n === undefined || !inRange(n)) {
        throw unexpected(range, value);
      }
      return narrowInteger(n);
    },
  };
}

function enumeratedCodec(constants: readonly string[]): Codec {
  const known = new Set(constants);
  return {
    encode(value) {
      if (typeof value !== 'string' || !known.has(value)) {
        throw expected(`one of ${constants.join(', ')}`, value);
      }
      return value;
    },
    decode(value) {
      if (typeof value !== 'string' || !known.has(value)) {
        throw new ProtocolException(`Unknown constant ${JSON.stringify(value)}`);
      }
      return value;
    },
  };
}

// =============================================================================
// Collections
// =============================================================================

function sequenceCodec(element: Codec): Codec {
  return {
    encode(value, ctx) {
      if (!Array.isArray(value)) throw expected('array', value);
      return value.map((v: unknown) => element.encode(v, ctx));
    },
    decode(value, ctx) {
      if (!Array.isArray(value)) throw unexpected('array', value);
      return value.map(v => element.decode(v, ctx));
    },
  };
}

function setCodec(element: Codec): Codec {
  return {
    encode(value, ctx) {
      let items: unknown[];
      if (value instanceof Set) {
        items = [...value];
      } else if (Array.isArray(value)) {
        items = [...new Set<unknown>(value)];
      } else {
        throw expected('set', value);
      }
      return items.map(v => element.encode(v, ctx));
    },
    decode(value, ctx) {
      if (!Array.isArray(value)) throw unexpected('array', value);
      return new Set(value.map(v => element.decode(v, ctx)));
    },
  };
}

function mapCodec(key: Codec, mapped: Codec): Codec {
  return {
    encode(value, ctx) {
      let entries: Array<[unknown, unknown]>;
      if (value instanceof Map) {
        entries = [...value.entries()];
      } else if (isPlainRecord(value)) {
        entries = Object.entries(value);
      } else {
        throw expected('map', value);
      }

      const out: WireObject = {};
      for (const [k, v] of entries) {
        const wireKey = key.encode(k, ctx);
        if (typeof wireKey !== 'string') throw expected('string-like map key', k);
        out[wireKey] = mapped.encode(v, ctx);
      }
      return out;
    },
    decode(value, ctx) {
      if (!isWireObject(value)) throw unexpected('object', value);
      const result = new Map<unknown, unknown>();
      for (const [k, v] of Object.entries(value)) {
        result.set(key.decode(k, ctx), mapped.decode(v, ctx));
      }
      return result;
    },
  };
}

// =============================================================================
// Structures
// =============================================================================

export interface FieldCodec {
  /** Native property name */
  property: string;
  /** Wire key */
  key: string;
  required: boolean;
  codec: Codec;
}

function structureCodec(fields: readonly FieldCodec[]): Codec {
  return {
    encode(value, ctx) {
      if (!isPlainRecord(value)) throw expected('object', value);
      const out: WireObject = {};
      for (const field of fields) {
        const v = value[field.property];
        if (v === undefined || v === null) {
          if (field.required) throw new TypeError(`Missing required field ${field.property}`);
          continue;
        }
        out[field.key] = field.codec.encode(v, ctx);
      }
      return out;
    },
    decode(value, ctx) {
      if (!isWireObject(value)) throw unexpected('object', value);
      const result: Record<string, unknown> = {};
      for (const field of fields) {
        const v = value[field.key];
        if (v === undefined || v === null) {
          if (field.required) throw new MissingFieldException(field.key);
          continue;
        }
        result[field.property] = field.codec.decode(v, ctx);
      }
      return Object.freeze(result);
    },
  };
}

// =============================================================================
// Interfaces
// =============================================================================

function endpointCodec(type: ExternalName): Codec {
  return {
    encode(value, ctx: EncodingContext) {
      return ctx.establishCallback(type, value).toString();
    },
    decode(value, ctx: DecodingContext) {
      if (typeof value !== 'string') throw unexpected('endpoint string', value);
      let endpoint: URL;
      try {
        endpoint = new URL(value);
      } catch (error) {
        throw new ProtocolException(`Malformed endpoint ${JSON.stringify(value)}`, { cause: error });
      }
      return ctx.seek(type, endpoint);
    },
  };
}

// =============================================================================
// Provider
// =============================================================================

/**
 * Codecs for the standard schema kinds. Codecs of named types are built
 * once per type record and shared.
 */
export class StandardCodecProvider implements WireCodec {
  private readonly named = new Map<TypeRecord, Codec>();

  constructor(private readonly linker: Linker) {}

  codecFor(model: TypeModel, scope: ResolutionScope): Codec {
    switch (model.kind) {
      case 'boolean':
        return booleanCodec;
      case 'integer':
        return integerCodec(model.min, model.max);
      case 'real':
        return realCodec;
      case 'string':
        return stringCodec;
      case 'uuid':
        return uuidCodec;
      case 'sequence':
        return sequenceCodec(this.codecFor(model.element, scope));
      case 'set':
        return setCodec(this.codecFor(model.element, scope));
      case 'map':
        return mapCodec(this.codecFor(model.key, scope), this.codecFor(model.value, scope));
      case 'structure':
        return structureCodec(this.fieldCodecs(model.fields, scope));
      case 'enumerated':
        return enumeratedCodec(model.constants);
      case 'reference':
        return this.referenceCodec(model.name, scope);
      case 'interface':
        throw new SchemaDefectError('Interface types are only passed by name');
    }
  }

  /** Codecs for the members of a structure or response, in declared order */
  fieldCodecs(members: readonly Member[], scope: ResolutionScope): FieldCodec[] {
    return members.map(member => ({
      property: member.name.asMethodName(),
      key: member.name.toString(),
      required: member.required,
      codec: this.codecFor(member.type, scope),
    }));
  }

  /** The codec of a named type, resolved on first use */
  private referenceCodec(name: ExternalName, scope: ResolutionScope): Codec {
    const link = this.linker.linkContext(scope);
    let target: Codec | undefined;
    const resolve = (): Codec => {
      target ??= this.namedCodec(link.seek(name));
      return target;
    };
    return {
      encode: (value, ctx) => resolve().encode(value, ctx),
      decode: (value, ctx) => resolve().decode(value, ctx),
    };
  }

  private namedCodec(record: TypeRecord): Codec {
    let codec = this.named.get(record);
    if (!codec) {
      codec = record.model.kind === 'interface'
        ? endpointCodec(record.name)
        : this.codecFor(record.model, record.scope);
      this.named.set(record, codec);
    }
    return codec;
  }
}
