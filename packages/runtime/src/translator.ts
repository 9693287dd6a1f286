/**
 * Call Translator
 *
 * Binds a call plan to the wire exchange and produces proxies: for a given
 * endpoint, one async method per call, each capturing that endpoint.
 */

import type { TypeRecord } from '@carp/schema';
import type { WireExchange } from './exchange.js';
import type { CallPlan } from './plan.js';

export type RemoteMethod = (...args: unknown[]) => Promise<unknown>;

/**
 * A stand-in for a remote receiver. Equality is identity; `String(proxy)`
 * gives `carp:<endpoint>`.
 */
export type CarpProxy = Readonly<Record<string, RemoteMethod>>;

const created = new WeakSet<object>();

/** Whether a value is a proxy made by some call translator */
export function isCarpProxy(value: unknown): value is CarpProxy {
  return typeof value === 'object' && value !== null && created.has(value);
}

export class CallTranslator {
  constructor(
    readonly plan: CallPlan,
    private readonly exchange: WireExchange
  ) {}

  get interfaceType(): TypeRecord {
    return this.plan.interfaceType;
  }

  /** Invocation closures for an endpoint, keyed by method name */
  bind(endpoint: URL): Record<string, RemoteMethod> {
    const methods: Record<string, RemoteMethod> = {};
    for (const [method, call] of this.plan.calls) {
      methods[method] = (...args: unknown[]) =>
        this.exchange.invoke(this.plan.interfaceType, endpoint, call, args);
    }
    return methods;
  }

  createProxy(endpoint: URL): CarpProxy {
    const proxy = this.bind(endpoint);
    if (!Object.hasOwn(proxy, 'toString')) {
      Object.defineProperty(proxy, 'toString', {
        value: () => `carp:${endpoint}`,
        enumerable: false,
      });
    }
    created.add(proxy);
    return Object.freeze(proxy);
  }
}
