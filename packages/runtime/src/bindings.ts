/**
 * Response Bindings
 *
 * How decoded response fields become native response values. Each response
 * variant gets a constructor that either produces the empty value directly
 * (no field present) or accumulates fields into a builder and completes it.
 */

import type { CallModel, ExternalName, ResponseModel } from '@carp/protocol';
import type { TypeRecord } from '@carp/schema';

export interface FieldSetter<B> {
  /** Start a builder with the first present field */
  init(value: unknown): B;
  /** Add a further field to a builder */
  apply(builder: B, value: unknown): B;
}

export interface ResponseConstructor<R = unknown, B = unknown> {
  /** The value of the variant with no fields present */
  empty(): R;
  setter(field: ExternalName): FieldSetter<B>;
  complete(builder: B): R;
}

export interface ResponseBindings {
  constructorFor(
    interfaceType: TypeRecord,
    call: CallModel,
    response: ResponseModel
  ): ResponseConstructor;
}

/**
 * The default native form of a response: the variant name and its fields,
 * keyed by lowerCamel field name.
 */
export interface VariantValue {
  readonly type: string;
  readonly value: Readonly<Record<string, unknown>>;
}

/** Build a response value the way the default bindings do */
export function variant(type: string, value: Record<string, unknown> = {}): VariantValue {
  return Object.freeze({ type, value: Object.freeze({ ...value }) });
}

type Fields = Record<string, unknown>;

class VariantConstructor implements ResponseConstructor<VariantValue, Fields> {
  private readonly emptyValue: VariantValue;

  constructor(private readonly type: string) {
    this.emptyValue = variant(type);
  }

  empty(): VariantValue {
    return this.emptyValue;
  }

  setter(field: ExternalName): FieldSetter<Fields> {
    const property = field.asMethodName();
    return {
      init: value => ({ [property]: value }),
      apply: (builder, value) => {
        builder[property] = value;
        return builder;
      },
    };
  }

  complete(builder: Fields): VariantValue {
    return Object.freeze({ type: this.type, value: Object.freeze(builder) });
  }
}

/**
 * Responses as frozen `{ type, value }` objects; the empty value of each
 * variant is a single shared instance.
 */
export const variantBindings: ResponseBindings = {
  constructorFor(_interfaceType, _call, response) {
    return new VariantConstructor(response.name.toString());
  },
};
