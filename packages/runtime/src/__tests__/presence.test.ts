/**
 * Client Presence Tests
 *
 * End-to-end calls through proxies against an in-process transport.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  Fingerprint,
  InternalServerException,
  MissingEndpointException,
  ProtocolException,
  RemoteInvocationException,
  StatusModificationException,
  TransportException,
} from '@carp/protocol';
import { variant, variantBindings, type ResponseBindings } from '../bindings.js';
import { MemoryFingerprintRepository } from '../fingerprints.js';
import {
  ERROR_ID,
  createTestPresence,
  isVariant,
  jsonResponse,
  type TestPresence,
} from './helpers.js';

const ECHO = 'org.echo.echo-service';
const PEER = 'http://peer.test/echo';

describe('ClientPresence', () => {
  let t: TestPresence;

  beforeEach(() => {
    t = createTestPresence();
  });

  afterEach(async () => {
    await t.presence.close();
  });

  describe('Calls', () => {
    it('should encode a request and decode the response variant', async () => {
      t.transport.responder = () => jsonResponse(200, { 'rsp-type': 'ok', rsp: { echo: 'hi' }, prints: [] });
      const proxy = await t.presence.getProxy(ECHO, PEER);

      const result = await proxy.say('hi');

      expect(t.transport.requests).toEqual([
        { endpoint: PEER, request: { 'req-type': 'say', req: { msg: 'hi' }, prints: [] } },
      ]);
      expect(result).toEqual(variant('ok', { echo: 'hi' }));
    });

    it('should leave absent optional arguments out', async () => {
      t.transport.responder = () => jsonResponse(200, { 'rsp-type': 'nothing' });
      const proxy = await t.presence.getProxy(ECHO, PEER);

      expect(await proxy.find('x')).toEqual(variant('nothing'));
      expect(t.transport.requests[0].request.req).toEqual({ name: 'x' });
    });

    it('should refuse a missing required argument before sending', async () => {
      const proxy = await t.presence.getProxy(ECHO, PEER);

      await expect(proxy.say()).rejects.toThrow('Missing argument msg of say');
      expect(t.transport.requests).toHaveLength(0);
    });

    it('should record call events', async () => {
      t.transport.responder = () => jsonResponse(204);
      const proxy = await t.presence.getProxy(ECHO, PEER);
      await proxy.ping();

      const [completed] = t.trace.getEventsOfType('runtime.call.completed');
      expect(completed.payload.call).toBe('ping');
      expect(completed.payload.status).toBe(204);
    });

    it('should expose inherited calls', async () => {
      const loud = await t.presence.getProxy('org.echo.loud-service', 'http://peer.test/loud');

      expect(Object.keys(loud).sort()).toEqual(['describe', 'find', 'ping', 'refer', 'say', 'shout', 'touch']);
      expect(String(loud)).toBe('carp:http://peer.test/loud');
    });

    it('should refuse proxies for types that are not interfaces', async () => {
      await expect(t.presence.getProxy('org.echo.greeting', PEER)).rejects.toThrow(
        'org.echo.greeting is not an interface type'
      );
    });
  });

  describe('Wide integers', () => {
    it('should decode a 64-bit integer without rounding', async () => {
      t.transport.responder = () => ({
        outcome: 'ok',
        status: 200,
        contentType: 'application/json',
        body: '{"rsp-type":"summary","rsp":{"tally":9007199254740993}}',
      });
      const proxy = await t.presence.getProxy(ECHO, PEER);

      expect(await proxy.describe()).toEqual(variant('summary', { tally: 9007199254740993n }));
    });
  });

  describe('Status outcomes', () => {
    it('should map not-found to MissingEndpointException', async () => {
      t.transport.responder = () => jsonResponse(404);
      const proxy = await t.presence.getProxy(ECHO, PEER);

      const error = await proxy.say('hi').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(MissingEndpointException);
      expect(error instanceof MissingEndpointException && error.endpoint).toBe(PEER);
    });

    it('should map internal errors to InternalServerException with the error id', async () => {
      t.transport.responder = () => jsonResponse(500, { error: ERROR_ID });
      const proxy = await t.presence.getProxy(ECHO, PEER);

      const error = await proxy.say('hi').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(InternalServerException);
      expect(error instanceof InternalServerException && error.errorId).toBe(ERROR_ID);
    });

    it('should map unprocessable to StatusModificationException', async () => {
      t.transport.responder = () => jsonResponse(422, { params: { field: 'bad' }, message: 'nope' });
      const proxy = await t.presence.getProxy(ECHO, PEER);

      const error = await proxy.say('hi').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(StatusModificationException);
      if (!(error instanceof StatusModificationException)) return;
      expect(error.params).toEqual({ field: 'bad' });
      expect(error.message).toBe('nope');
    });

    it('should map other statuses to RemoteInvocationException', async () => {
      t.transport.responder = () => jsonResponse(418, {});
      const proxy = await t.presence.getProxy(ECHO, PEER);

      const error = await proxy.say('hi').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(RemoteInvocationException);
      expect(error).not.toBeInstanceOf(ProtocolException);
      expect(error instanceof Error && error.message).toBe(`bad code 418 from ${PEER}`);
    });

    it('should reject bodies that are not JSON', async () => {
      t.transport.responder = () => ({ outcome: 'ok', status: 200, contentType: 'text/html', body: '<html>' });
      const proxy = await t.presence.getProxy(ECHO, PEER);

      await expect(proxy.say('hi')).rejects.toThrow(`unexpected content type text/html from ${PEER}`);
    });

    it('should reject malformed JSON and unknown variants', async () => {
      const proxy = await t.presence.getProxy(ECHO, PEER);

      t.transport.responder = () => ({ ...jsonResponse(200), body: '{"rsp-type":' });
      await expect(proxy.say('hi')).rejects.toBeInstanceOf(ProtocolException);

      t.transport.responder = () => jsonResponse(200, { 'rsp-type': 'surprise', rsp: {} });
      await expect(proxy.say('hi')).rejects.toThrow('unknown response type surprise to say');
    });

    it('should wrap transport failures', async () => {
      const refused = new Error('connection refused');
      t.transport.responder = () => {
        throw refused;
      };
      const proxy = await t.presence.getProxy(ECHO, PEER);

      const error = await proxy.say('hi').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(TransportException);
      expect(error instanceof TransportException && error.cause).toBe(refused);
      expect(t.trace.getEventsOfType('runtime.call.failed')[0].payload.code).toBe('TRANSPORT');
    });
  });

  describe('Empty responses', () => {
    it('should answer null for calls without response variants', async () => {
      t.transport.responder = () => jsonResponse(204);
      const proxy = await t.presence.getProxy(ECHO, PEER);

      expect(await proxy.ping()).toBeNull();
    });

    it('should answer the empty variant for a single variant without fields', async () => {
      const proxy = await t.presence.getProxy(ECHO, PEER);

      t.transport.responder = () => jsonResponse(204);
      const empty = await proxy.touch();
      t.transport.responder = () => jsonResponse(200, { 'rsp-type': 'done', rsp: {} });
      const decoded = await proxy.touch();

      expect(empty).toEqual(variant('done'));
      expect(decoded).toBe(empty);
    });

    it('should reject an empty body when the call expects fields', async () => {
      t.transport.responder = () => jsonResponse(204);
      const proxy = await t.presence.getProxy(ECHO, PEER);

      const error = await proxy.say('hi').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(RemoteInvocationException);
      expect(error instanceof Error && error.message).toBe(`empty response to say from ${PEER}`);
    });

    it('should build a response with no fields present without touching any setter', async () => {
      const summaryEmpty = Object.freeze({ kind: 'summary-default' });
      const init = vi.fn();
      const apply = vi.fn();
      const complete = vi.fn();
      const empty = vi.fn(() => summaryEmpty);
      const bindings: ResponseBindings = {
        constructorFor(interfaceType, call, response) {
          if (response.name.toString() !== 'summary') {
            return variantBindings.constructorFor(interfaceType, call, response);
          }
          return { empty, setter: () => ({ init, apply }), complete };
        },
      };

      const custom = createTestPresence({ bindings });
      custom.transport.responder = () => jsonResponse(200, { 'rsp-type': 'summary', rsp: {} });
      const proxy = await custom.presence.getProxy(ECHO, PEER);

      expect(await proxy.describe()).toBe(summaryEmpty);
      expect(empty).toHaveBeenCalledTimes(1);
      expect(init).not.toHaveBeenCalled();
      expect(apply).not.toHaveBeenCalled();
      expect(complete).not.toHaveBeenCalled();

      await custom.presence.close();
    });

    it('should share the empty instance and build others incrementally', async () => {
      const proxy = await t.presence.getProxy(ECHO, PEER);

      t.transport.responder = () => jsonResponse(200, { 'rsp-type': 'summary', rsp: {} });
      const first = await proxy.describe();
      const second = await proxy.describe();
      expect(first).toEqual(variant('summary'));
      expect(second).toBe(first);

      t.transport.responder = () => jsonResponse(200, { 'rsp-type': 'summary', rsp: { tally: 3, note: 'x' } });
      expect(await proxy.describe()).toEqual(variant('summary', { note: 'x', tally: 3 }));
    });
  });

  describe('Endpoints as values', () => {
    it('should pass proxies as endpoint references with known fingerprints', async () => {
      const fingerprints = new MemoryFingerprintRepository();
      fingerprints.record({ host: 'other.test', port: 8443 }, Fingerprint.of('SHA-256', [1, 2, 3]));
      const withPrints = createTestPresence({ fingerprints });
      withPrints.transport.responder = () => jsonResponse(200, { 'rsp-type': 'ok', rsp: { echo: 'ok' } });

      const other = await withPrints.presence.getProxy(ECHO, 'http://other.test:8443/svc');
      const proxy = await withPrints.presence.getProxy(ECHO, PEER);
      await proxy.refer(other);

      expect(withPrints.transport.requests[0].request).toEqual({
        'req-type': 'refer',
        req: { peer: 'http://other.test:8443/svc' },
        prints: [{ host: 'other.test', port: 8443, print: { algo: 'SHA-256', val: [1, 2, 3] } }],
      });

      await withPrints.presence.close();
    });

    it('should refuse values that are not proxies', async () => {
      const proxy = await t.presence.getProxy(ECHO, PEER);

      await expect(proxy.refer({ not: 'a proxy' })).rejects.toThrow(`Argument is not a proxy of ${ECHO}`);
      expect(t.transport.requests).toHaveLength(0);
    });

    it('should turn returned endpoints into proxies and pin their fingerprints', async () => {
      const fingerprints = new MemoryFingerprintRepository();
      const pinned = createTestPresence({ fingerprints });
      const proxy = await pinned.presence.getProxy(ECHO, PEER);

      const answer = (val: number[]) => () => jsonResponse(200, {
        'rsp-type': 'found',
        rsp: { service: 'http://third.test/svc' },
        prints: [{ host: 'third.test', port: 80, print: { algo: 'SHA-256', val } }],
      });

      pinned.transport.responder = answer([9, 9]);
      const result = await proxy.find('third');
      const third = await pinned.presence.getProxy(ECHO, 'http://third.test/svc');

      expect(isVariant(result) && result.value.service).toBe(third);
      expect(fingerprints.lookup({ host: 'third.test', port: 80 })?.toString()).toBe('SHA-256:09:09');

      pinned.transport.responder = answer([8, 8]);
      expect(await proxy.find('third')).toEqual(variant('found', { service: third }));

      const [mismatch] = pinned.trace.getEventsOfType('runtime.fingerprint.mismatch');
      expect(mismatch.payload).toEqual({
        peer: 'third.test:80',
        known: 'SHA-256:09:09',
        received: 'SHA-256:08:08',
        from: PEER,
      });
      expect(fingerprints.lookup({ host: 'third.test', port: 80 })?.toString()).toBe('SHA-256:09:09');

      await pinned.presence.close();
    });
  });

  describe('Locations', () => {
    it('should map proxies back to their endpoints', async () => {
      const proxy = await t.presence.getProxy(ECHO, PEER);

      expect(t.presence.getLocation(ECHO, proxy)?.toString()).toBe(PEER);
      expect(t.presence.getLocation(ECHO, {})).toBeUndefined();
      expect(t.presence.getLocation(ECHO, 'http://peer.test/echo')).toBeUndefined();
    });

    it('should find no endpoint before the type has been resolved', () => {
      expect(t.presence.getLocation(ECHO, {})).toBeUndefined();
      expect(t.presence.getLocation('org.nothing.thing', {})).toBeUndefined();
    });
  });
});
