/**
 * CARP Runtime Package
 *
 * Client-side invocation runtime: proxies, call translation, the wire
 * exchange and the reclaimable caches behind them.
 */

export { ClientPresence } from './presence.js';
export type { ClientPresenceOptions } from './presence.js';

export {
  DEFAULT_CLIENT_CONFIG,
  validateClientConfig,
  loadClientConfig,
  configFromEnv,
  resolveClientConfig,
} from './config.js';
export type { ClientConfig } from './config.js';

export { StandardCodecProvider } from './codecs.js';
export type { Codec, WireCodec, Linker, FieldCodec } from './codecs.js';

export { variant, variantBindings } from './bindings.js';
export type {
  FieldSetter,
  ResponseConstructor,
  ResponseBindings,
  VariantValue,
} from './bindings.js';

export { CallPlan, ResponseDecoder } from './plan.js';
export type { CallPlanContext, CallSpec, EmptyResult, InParam, OutParam } from './plan.js';

export { CallTranslator, isCarpProxy } from './translator.js';
export type { CarpProxy, RemoteMethod } from './translator.js';

export { WireExchange } from './exchange.js';
export type { ContextFactory, WireExchangeOptions } from './exchange.js';

export { HttpTransportClient } from './transport.js';
export type {
  TransportClient,
  TransportResponse,
  HttpTransportOptions,
  FetchFunction,
} from './transport.js';

export { MemoryFingerprintRepository } from './fingerprints.js';
export type { FingerprintRepository, MemoryFingerprintOptions } from './fingerprints.js';

export { ReclaimDaemon } from './daemon.js';
export type { CleanupAction, ReclaimDaemonOptions } from './daemon.js';

export { WeakCollector, ManualCollector } from './references.js';
export type { Collectible, Collector } from './references.js';

export { CallTranslatorCache } from './translator-cache.js';
export type { TranslatorFactory } from './translator-cache.js';

export { ProxyCache } from './proxy-cache.js';
