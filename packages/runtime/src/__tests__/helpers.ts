/**
 * Shared fixtures for runtime tests
 */

import {
  JSON_CONTENT_TYPE,
  statusOutcomeOf,
  type WireRequest,
} from '@carp/protocol';
import { MemoryModuleSource, ScopeArena, TypeResolver, type ResolutionScope } from '@carp/schema';
import { TraceCollector } from '@carp/trace';
import type { VariantValue } from '../bindings.js';
import { ReclaimDaemon } from '../daemon.js';
import { ManualCollector } from '../references.js';
import { ClientPresence, type ClientPresenceOptions } from '../presence.js';
import type { TransportClient, TransportResponse } from '../transport.js';

export const ECHO_MODULE = {
  target: 'echo-bindings',
  types: {
    'echo-service': {
      kind: 'interface',
      calls: {
        say: {
          params: { msg: 'string' },
          responses: { ok: { fields: { echo: 'string' } } },
        },
        ping: null,
        touch: { responses: { done: null } },
        refer: {
          params: { peer: 'echo-service' },
          responses: { ok: { fields: { echo: 'string' } } },
        },
        find: {
          params: { name: 'string', hint: { type: 'string', required: false } },
          responses: {
            found: { fields: { service: 'echo-service', note: { type: 'string', required: false } } },
            nothing: null,
          },
        },
        describe: {
          responses: {
            summary: {
              fields: {
                note: { type: 'string', required: false },
                tally: { type: 'integer', required: false },
              },
            },
          },
        },
      },
    },
    'loud-service': {
      kind: 'interface',
      inherits: ['echo-service'],
      calls: {
        shout: {
          params: { msg: 'string' },
          responses: { ok: { fields: { echo: 'string' } } },
        },
      },
    },
    greeting: {
      kind: 'structure',
      fields: { text: 'string' },
    },
  },
};

export const ERROR_ID = '0192d2b4-5c7e-7a3b-9f10-1234567890ab';

export function jsonResponse(status: number, body?: unknown): TransportResponse {
  return {
    outcome: statusOutcomeOf(status),
    status,
    contentType: JSON_CONTENT_TYPE,
    body: body === undefined ? '' : JSON.stringify(body),
  };
}

export type Responder = (endpoint: URL, request: WireRequest) => TransportResponse | Promise<TransportResponse>;

/**
 * Records requests and answers them with a settable responder.
 */
export class FakeTransport implements TransportClient {
  readonly requests: Array<{ endpoint: string; request: WireRequest }> = [];

  constructor(public responder: Responder = () => jsonResponse(204)) {}

  async post(endpoint: URL, request: WireRequest): Promise<TransportResponse> {
    this.requests.push({ endpoint: endpoint.toString(), request });
    return this.responder(endpoint, request);
  }
}

export interface TestPresence {
  presence: ClientPresence;
  transport: FakeTransport;
  collector: ManualCollector;
  daemon: ReclaimDaemon;
  trace: TraceCollector;
  resolver: TypeResolver;
  scope: ResolutionScope;
}

export function createTestPresence(options: Partial<ClientPresenceOptions> = {}): TestPresence {
  const trace = new TraceCollector({ component: 'test.runtime' });
  const arena = new ScopeArena();
  const scope = arena.createScope('test', new MemoryModuleSource({ 'org.echo': ECHO_MODULE }));
  const resolver = new TypeResolver(arena, { trace });
  const daemon = new ReclaimDaemon({ trace });
  const collector = new ManualCollector(daemon);
  const transport = new FakeTransport();

  const presence = new ClientPresence({
    resolver,
    scope,
    transport,
    collector,
    trace,
    ...options,
  });

  return { presence, transport, collector, daemon, trace, resolver, scope };
}

export function isVariant(value: unknown): value is VariantValue {
  return typeof value === 'object' && value !== null && 'type' in value && 'value' in value;
}
