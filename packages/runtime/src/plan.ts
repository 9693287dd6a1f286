/**
 * Call Plans
 *
 * The immutable description of how to call an interface type: for each call
 * the encoders of its parameters in declared order, and for each response
 * variant a decoder that rebuilds the native response.
 */

import {
  type ExternalName,
  SchemaDefectError,
  type CallModel,
  type DecodingContext,
  type Decoder,
  type Encoder,
  type InterfaceModel,
  type WireObject,
} from '@carp/protocol';
import type { LinkContext, TypeRecord } from '@carp/schema';
import type { FieldSetter, ResponseBindings, ResponseConstructor } from './bindings.js';
import type { WireCodec } from './codecs.js';

export interface OutParam {
  readonly name: ExternalName;
  readonly required: boolean;
  readonly encoder: Encoder;
}

export interface InParam {
  readonly name: ExternalName;
  readonly decoder: Decoder;
  readonly setter: FieldSetter<unknown>;
}

/**
 * Rebuilds one response variant from its wire fields. Fields are applied in
 * declared order; when none is present the builder is never created.
 */
export class ResponseDecoder {
  constructor(
    readonly variant: ExternalName,
    readonly params: readonly InParam[],
    private readonly construct: ResponseConstructor
  ) {}

  decode(rsp: WireObject, ctx: DecodingContext): unknown {
    let builder: unknown;
    let started = false;

    for (const param of this.params) {
      const raw = rsp[param.name.toString()];
      if (raw === undefined || raw === null) continue;

      const value = param.decoder.decode(raw, ctx);
      if (started) {
        builder = param.setter.apply(builder, value);
      } else {
        builder = param.setter.init(value);
        started = true;
      }
    }

    return started ? this.construct.complete(builder) : this.construct.empty();
  }
}

/** What a success without a body means for a call */
export type EmptyResult =
  | { kind: 'value'; value: unknown }
  | { kind: 'reject' };

export interface CallSpec {
  readonly name: ExternalName;
  /** Native method name */
  readonly method: string;
  readonly outParams: readonly OutParam[];
  /** Keyed by variant name */
  readonly responses: ReadonlyMap<string, ResponseDecoder>;
  readonly emptyResult: EmptyResult;
}

export interface CallPlanContext {
  codecs: WireCodec;
  bindings: ResponseBindings;
  link: LinkContext;
}

function interfaceModelOf(record: TypeRecord): InterfaceModel {
  if (record.model.kind !== 'interface') {
    throw new SchemaDefectError(`${record.name} is a ${record.model.kind}, not an interface`);
  }
  return record.model;
}

/**
 * Own calls first, then those of inherited interfaces breadth first. The
 * nearest declaration of a call name wins.
 */
function collectCalls(record: TypeRecord, link: LinkContext): Array<[TypeRecord, CallModel]> {
  const calls = new Map<string, [TypeRecord, CallModel]>();
  const visited = new Set<string>();
  const queue: TypeRecord[] = [record];

  for (let current = queue.shift(); current; current = queue.shift()) {
    if (visited.has(current.name.toString())) continue;
    visited.add(current.name.toString());

    const model = interfaceModelOf(current);
    for (const call of model.calls) {
      const key = call.name.toString();
      if (!calls.has(key)) calls.set(key, [current, call]);
    }
    for (const parent of model.inherits) {
      queue.push(link.seek(parent));
    }
  }

  return [...calls.values()];
}

export class CallPlan {
  private constructor(
    readonly interfaceType: TypeRecord,
    readonly calls: ReadonlyMap<string, CallSpec>
  ) {}

  /**
   * Build the plan of an interface type. Every type it reaches must already
   * be resolved.
   *
   * @throws SchemaDefectError if the type is not an interface or its calls
   * are inconsistent
   */
  static build(interfaceType: TypeRecord, context: CallPlanContext): CallPlan {
    const { codecs, bindings, link } = context;
    const calls = new Map<string, CallSpec>();

    for (const [owner, call] of collectCalls(interfaceType, link)) {
      const method = call.name.asMethodName();
      if (calls.has(method)) {
        throw new SchemaDefectError(`Calls of ${interfaceType.name} clash on method name ${method}`);
      }

      const outParams: OutParam[] = call.params.map(param => Object.freeze({
        name: param.name,
        required: param.required,
        encoder: codecs.codecFor(param.type, owner.scope),
      }));

      const responses = new Map<string, ResponseDecoder>();
      for (const response of call.responses) {
        const construct = bindings.constructorFor(interfaceType, call, response);
        const params: InParam[] = response.fields.map(field => Object.freeze({
          name: field.name,
          decoder: codecs.codecFor(field.type, owner.scope),
          setter: construct.setter(field.name),
        }));
        responses.set(response.name.toString(), new ResponseDecoder(response.name, params, construct));
      }

      calls.set(method, Object.freeze({
        name: call.name,
        method,
        outParams: Object.freeze(outParams),
        responses,
        emptyResult: CallPlan.emptyResultOf(call, responses),
      }));
    }

    return new CallPlan(interfaceType, calls);
  }

  /**
   * No variants: null. A single variant without fields: its empty value.
   * Anything else cannot be answered by an empty body.
   */
  private static emptyResultOf(call: CallModel, responses: ReadonlyMap<string, ResponseDecoder>): EmptyResult {
    if (call.responses.length === 0) {
      return { kind: 'value', value: null };
    }
    const only = call.responses.length === 1 ? call.responses[0] : undefined;
    if (only && only.fields.length === 0) {
      const decoder = responses.get(only.name.toString());
      if (!decoder) {
        throw new SchemaDefectError(`No decoder for response ${only.name} of ${call.name}`);
      }
      return { kind: 'value', value: decoder.decode({}, EMPTY_DECODING) };
    }
    return { kind: 'reject' };
  }
}

/** Decoding an object without fields never consults the context */
const EMPTY_DECODING: DecodingContext = {
  get prints(): never {
    throw new SchemaDefectError('Empty response consulted its decoding context');
  },
  seek(): never {
    throw new SchemaDefectError('Empty response consulted its decoding context');
  },
};
