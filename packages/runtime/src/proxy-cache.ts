/**
 * Proxy Cache
 *
 * Proxies keyed by (interface type, endpoint), held collectibly, plus a
 * reverse map from proxy to endpoint used to pass a received proxy on as an
 * argument. Reverse entries are keyed weakly by the proxy itself.
 *
 * Both maps change in synchronous sections only. A reclaim action removes
 * the forward entry only while it still holds the reclaimed reference, so a
 * proxy created after reclamation survives the late cleanup.
 */

import type { TypeRecord } from '@carp/schema';
import { TraceCollector } from '@carp/trace';
import type { Collectible, Collector } from './references.js';
import type { CallTranslatorCache } from './translator-cache.js';
import type { CarpProxy } from './translator.js';

interface ReverseEntry {
  endpoint: URL;
  ref: Collectible<CarpProxy>;
}

export class ProxyCache {
  private readonly forward = new Map<TypeRecord, Map<string, Collectible<CarpProxy>>>();
  private readonly reverse = new Map<TypeRecord, WeakMap<object, ReverseEntry>>();
  private readonly trace: TraceCollector;

  constructor(
    private readonly translators: CallTranslatorCache,
    private readonly collector: Collector,
    trace?: TraceCollector
  ) {
    this.trace = trace ?? new TraceCollector();
  }

  getProxy(interfaceType: TypeRecord, endpoint: URL): CarpProxy {
    const key = endpoint.toString();
    let byEndpoint = this.forward.get(interfaceType);
    if (!byEndpoint) {
      byEndpoint = new Map();
      this.forward.set(interfaceType, byEndpoint);
    }

    const live = byEndpoint.get(key)?.deref();
    if (live) return live;

    const proxy = this.translators.get(interfaceType).createProxy(new URL(key));
    const owner = byEndpoint;
    const name = interfaceType.name.toString();
    const ref: Collectible<CarpProxy> = this.collector.watch(proxy, () => {
      if (owner.get(key) !== ref) return;
      owner.delete(key);
      this.trace.record('runtime.proxy.reclaimed', { type: name, endpoint: key }, { severity: 'debug' });
    });

    byEndpoint.set(key, ref);
    let locations = this.reverse.get(interfaceType);
    if (!locations) {
      locations = new WeakMap();
      this.reverse.set(interfaceType, locations);
    }
    locations.set(proxy, { endpoint: new URL(key), ref });

    this.trace.record('runtime.proxy.created', { type: name, endpoint: key }, { severity: 'debug' });
    return proxy;
  }

  /**
   * The endpoint a live proxy of the type stands for, or undefined when the
   * value is not such a proxy.
   */
  getLocation(interfaceType: TypeRecord, proxy: unknown): URL | undefined {
    if (typeof proxy !== 'object' || proxy === null) return undefined;
    const entry = this.reverse.get(interfaceType)?.get(proxy);
    if (!entry || entry.ref.deref() !== proxy) return undefined;
    return new URL(entry.endpoint.toString());
  }

  /** Number of endpoints cached for a type */
  countFor(interfaceType: TypeRecord): number {
    return this.forward.get(interfaceType)?.size ?? 0;
  }
}
