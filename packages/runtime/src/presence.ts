/**
 * Client Presence
 *
 * The entry point of the client runtime. Wires configuration, tracing,
 * type resolution, codecs, transport and the reclaimable caches together
 * and hands out proxies for remote receivers.
 */

import {
  MissingTypeException,
  peerKey,
  peerOf,
  type DecodingContext,
  type EncodingContext,
  type ExternalName,
  type FingerprintTable,
} from '@carp/protocol';
import {
  ScopeArena,
  TypeResolver,
  scopeChainFromPaths,
  type ResolutionScope,
  type TypeRecord,
} from '@carp/schema';
import { TraceCollector } from '@carp/trace';
import { variantBindings, type ResponseBindings } from './bindings.js';
import { StandardCodecProvider, type WireCodec } from './codecs.js';
import { resolveClientConfig, type ClientConfig } from './config.js';
import { ReclaimDaemon } from './daemon.js';
import { WireExchange, type ContextFactory } from './exchange.js';
import { MemoryFingerprintRepository, type FingerprintRepository } from './fingerprints.js';
import { CallPlan } from './plan.js';
import { ProxyCache } from './proxy-cache.js';
import { WeakCollector, type Collector } from './references.js';
import { CallTranslatorCache } from './translator-cache.js';
import { CallTranslator, type CarpProxy } from './translator.js';
import { HttpTransportClient, type TransportClient } from './transport.js';

export interface ClientPresenceOptions {
  config?: ClientConfig;
  /**
   * Resolver and the scope types are resolved from. When absent, a chain
   * of directory scopes is built from `scope_paths`.
   */
  resolver?: TypeResolver;
  scope?: ResolutionScope;
  transport?: TransportClient;
  fingerprints?: FingerprintRepository;
  codecs?: WireCodec;
  bindings?: ResponseBindings;
  collector?: Collector;
  trace?: TraceCollector;
}

export class ClientPresence implements ContextFactory {
  private readonly config: Required<ClientConfig>;
  private readonly trace: TraceCollector;
  private readonly ownsTrace: boolean;
  readonly resolver: TypeResolver;
  readonly scope: ResolutionScope;
  private readonly fingerprints: FingerprintRepository;
  private readonly translators: CallTranslatorCache;
  private readonly proxies: ProxyCache;
  private closed = false;

  constructor(options: ClientPresenceOptions = {}) {
    this.config = resolveClientConfig(options.config ?? {});

    this.ownsTrace = !options.trace;
    this.trace = options.trace ?? new TraceCollector({
      component: 'carp.runtime',
      output_dir: this.config.trace_dir,
      file_output: this.config.trace_to_file,
      min_severity: this.config.trace_min_severity,
    });

    if (options.scope) {
      if (!options.resolver) {
        throw new Error('A scope can only be given together with its resolver');
      }
      this.resolver = options.resolver;
      this.scope = options.scope;
    } else {
      this.resolver = options.resolver ?? new TypeResolver(new ScopeArena(), { trace: this.trace });
      this.scope = scopeChainFromPaths(this.resolver.arena, this.config.scope_paths);
    }

    this.fingerprints = options.fingerprints ?? new MemoryFingerprintRepository({
      capacity: this.config.fingerprint_capacity,
    });

    const transport = options.transport ?? new HttpTransportClient({
      request_timeout_ms: this.config.request_timeout_ms,
      user_agent: this.config.user_agent,
    });
    const exchange = new WireExchange({ transport, contexts: this, trace: this.trace });

    const codecs = options.codecs ?? new StandardCodecProvider(this.resolver);
    const bindings = options.bindings ?? variantBindings;
    const collector = options.collector ?? new WeakCollector(ReclaimDaemon.shared());

    this.translators = new CallTranslatorCache(
      record => new CallTranslator(
        CallPlan.build(record, { codecs, bindings, link: this.resolver.linkContext(record.scope) }),
        exchange
      ),
      collector,
      this.trace
    );
    this.proxies = new ProxyCache(this.translators, collector, this.trace);

    this.trace.record('system.startup', {
      scope: this.scope.name,
      request_timeout_ms: this.config.request_timeout_ms,
    });
  }

  /**
   * Get the proxy of an interface type for an endpoint. While the returned
   * proxy is reachable, the same instance is returned for the same pair.
   */
  async getProxy(typeName: ExternalName | string, endpoint: URL | string): Promise<CarpProxy> {
    if (this.closed) {
      throw new Error('Client presence is closed');
    }
    const location = typeof endpoint === 'string' ? new URL(endpoint) : endpoint;
    const record = await this.resolver.resolveClosure(typeName, this.scope);
    if (record.model.kind !== 'interface') {
      throw new TypeError(`${record.name} is not an interface type`);
    }
    return this.proxies.getProxy(record, location);
  }

  /**
   * The endpoint a proxy stands for, or undefined for anything else.
   */
  getLocation(typeName: ExternalName | string, proxy: unknown): URL | undefined {
    let record: TypeRecord;
    try {
      record = this.resolver.lookup(typeName, this.scope);
    } catch (error) {
      // No proxy of a type that was never resolved can exist
      if (error instanceof MissingTypeException) return undefined;
      throw error;
    }
    return this.proxies.getLocation(record, proxy);
  }

  getTrace(): TraceCollector {
    return this.trace;
  }

  getConfig(): Readonly<Required<ClientConfig>> {
    return this.config;
  }

  // ---------------------------------------------------------------------------
  // Codec contexts
  // ---------------------------------------------------------------------------

  encoding(interfaceType: TypeRecord, prints: FingerprintTable): EncodingContext {
    return {
      prints,
      establishCallback: (type: ExternalName, receiver: unknown): URL => {
        const record = this.resolver.lookup(type, interfaceType.scope);
        const location = this.proxies.getLocation(record, receiver);
        if (!location) {
          throw new TypeError(`Argument is not a proxy of ${type}`);
        }
        const peer = peerOf(location);
        const known = this.fingerprints.lookup(peer);
        if (known) prints.set(peer, known);
        return location;
      },
    };
  }

  decoding(interfaceType: TypeRecord, endpoint: URL, prints: FingerprintTable): DecodingContext {
    return {
      prints,
      seek: (type: ExternalName, location: URL): unknown => {
        const record = this.resolver.lookup(type, interfaceType.scope);
        this.pin(location, prints, endpoint);
        return this.proxies.getProxy(record, location);
      },
    };
  }

  /** Learn the print sent for a returned endpoint's peer, or flag a conflict */
  private pin(location: URL, prints: FingerprintTable, from: URL): void {
    const peer = peerOf(location);
    const received = prints.get(peer);
    if (!received) return;

    const known = this.fingerprints.lookup(peer);
    if (!known) {
      this.fingerprints.record(peer, received);
      this.trace.record('runtime.fingerprint.recorded', {
        peer: peerKey(peer),
        print: received.toString(),
      }, { severity: 'debug' });
    } else if (!known.equals(received)) {
      this.trace.record('runtime.fingerprint.mismatch', {
        peer: peerKey(peer),
        known: known.toString(),
        received: received.toString(),
        from: from.toString(),
      }, { severity: 'warn' });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.trace.record('system.shutdown', {});
    if (this.ownsTrace) {
      await this.trace.close();
    }
  }
}
