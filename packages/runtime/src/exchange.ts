/**
 * Wire Exchange
 *
 * Performs one call: encodes the arguments into a request, posts it, and
 * turns the status outcome into a decoded response or a typed error.
 */

import {
  FingerprintTable,
  InternalServerException,
  MissingEndpointException,
  ProtocolException,
  RemoteInvocationException,
  StatusModificationException,
  TransportException,
  createRequest,
  isCarpError,
  isJsonContentType,
  parseInternalErrorId,
  parseResponse,
  parseStatusModification,
  parseWireJson,
  type DecodingContext,
  type EncodingContext,
  type WireObject,
} from '@carp/protocol';
import type { TypeRecord } from '@carp/schema';
import { TraceCollector } from '@carp/trace';
import type { CallSpec } from './plan.js';
import type { TransportClient, TransportResponse } from './transport.js';

/**
 * Builds the per-call codec contexts. The interface type tells which scope
 * types met while coding are looked up from.
 */
export interface ContextFactory {
  encoding(interfaceType: TypeRecord, prints: FingerprintTable): EncodingContext;
  decoding(interfaceType: TypeRecord, endpoint: URL, prints: FingerprintTable): DecodingContext;
}

export interface WireExchangeOptions {
  transport: TransportClient;
  contexts: ContextFactory;
  trace?: TraceCollector;
}

function parseJson(body: string, what: string): unknown {
  try {
    return parseWireJson(body);
  } catch (error) {
    throw new ProtocolException(`Malformed JSON in ${what}`, { cause: error });
  }
}

export class WireExchange {
  private readonly transport: TransportClient;
  private readonly contexts: ContextFactory;
  private readonly trace: TraceCollector;

  constructor(options: WireExchangeOptions) {
    this.transport = options.transport;
    this.contexts = options.contexts;
    this.trace = options.trace ?? new TraceCollector();
  }

  /**
   * Invoke a call on an endpoint with positional arguments. Absent optional
   * arguments are left out of the request.
   */
  async invoke(
    interfaceType: TypeRecord,
    endpoint: URL,
    call: CallSpec,
    args: readonly unknown[]
  ): Promise<unknown> {
    const started = Date.now();
    const target = endpoint.toString();
    const callName = call.name.toString();

    try {
      const prints = new FingerprintTable();
      const encoding = this.contexts.encoding(interfaceType, prints);
      const req: WireObject = {};
      call.outParams.forEach((param, i) => {
        const value = args[i];
        if (value === undefined || value === null) {
          if (param.required) {
            throw new TypeError(`Missing argument ${param.name} of ${callName}`);
          }
          return;
        }
        req[param.name.toString()] = param.encoder.encode(value, encoding);
      });

      this.trace.record('runtime.call.started', {
        endpoint: target,
        call: callName,
        prints: prints.size,
      }, { severity: 'debug' });

      let response: TransportResponse;
      try {
        response = await this.transport.post(endpoint, createRequest(callName, req, prints));
      } catch (error) {
        throw isCarpError(error) ? error : new TransportException(target, error);
      }

      const result = this.interpret(interfaceType, endpoint, call, response);
      this.trace.record('runtime.call.completed', {
        endpoint: target,
        call: callName,
        status: response.status,
        duration_ms: Date.now() - started,
      }, { severity: 'debug' });
      return result;
    } catch (error) {
      this.trace.record('runtime.call.failed', {
        endpoint: target,
        call: callName,
        error: error instanceof Error ? error.message : String(error),
        code: isCarpError(error) ? error.code : undefined,
        duration_ms: Date.now() - started,
      }, { severity: 'warn' });
      throw error;
    }
  }

  private interpret(
    interfaceType: TypeRecord,
    endpoint: URL,
    call: CallSpec,
    response: TransportResponse
  ): unknown {
    switch (response.outcome) {
      case 'empty':
        if (call.emptyResult.kind === 'value') return call.emptyResult.value;
        throw new RemoteInvocationException(`empty response to ${call.name} from ${endpoint}`);
      case 'not-found':
        throw new MissingEndpointException(endpoint.toString());
      default:
        break;
    }

    if (!isJsonContentType(response.contentType)) {
      throw new ProtocolException(
        `unexpected content type ${response.contentType ?? '(none)'} from ${endpoint}`
      );
    }

    switch (response.outcome) {
      case 'ok': {
        const message = parseResponse(parseJson(response.body, 'response'));
        const decoder = call.responses.get(message['rsp-type']);
        if (!decoder) {
          throw new ProtocolException(`unknown response type ${message['rsp-type']} to ${call.name}`);
        }
        const decoding = this.contexts.decoding(interfaceType, endpoint, message.printTable);
        return decoder.decode(message.rsp, decoding);
      }
      case 'unprocessable': {
        const { params, message } = parseStatusModification(parseJson(response.body, 'status modification'));
        throw new StatusModificationException(params, message);
      }
      case 'internal-error':
        throw new InternalServerException(parseInternalErrorId(parseJson(response.body, 'error body')));
      default:
        throw new RemoteInvocationException(`bad code ${response.status} from ${endpoint}`);
    }
  }
}
