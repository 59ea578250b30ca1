/**
 * Tests for EventAdapter
 */

import { describe, it, expect, vi } from 'vitest';
import { EventAdapter, normalizeHeaders, requestOccurrence, type DispatchTarget } from '../../../src/adapter/event-adapter.js';
import type { EngineFlow, EngineRequest } from '../../../src/adapter/types.js';
import type { TrafficOccurrence } from '../../../src/hooks/dispatcher.js';
import type { Verdict } from '../../../src/hooks/types.js';
import { passThrough } from '../../../src/hooks/verdict.js';

const request: EngineRequest = {
  method: 'post',
  scheme: 'https',
  host: 'API.Example.com',
  port: 443,
  path: '/v1/items?page=2',
  headers: { 'Content-Type': 'application/json', Accept: ['text/html', 'application/json'], 'X-Empty': undefined },
  body: '{"a":1}',
};

const flow: EngineFlow = {
  id: 'flow-7',
  request,
  client: { address: { ip: '192.168.1.10', port: 52000 }, sni: 'API.Example.com' },
  server: { address: { ip: '93.184.216.34', port: 443 } },
};

class RecordingTarget implements DispatchTarget {
  readonly seen: TrafficOccurrence[] = [];

  constructor(private readonly verdict: Verdict = passThrough(1)) {}

  async handle(occurrence: TrafficOccurrence): Promise<Verdict> {
    this.seen.push(occurrence);
    return this.verdict;
  }
}

describe('EventAdapter', () => {
  describe('onRequest()', () => {
    it('should normalize the request into attributes', async () => {
      const target = new RecordingTarget();
      await new EventAdapter(target).onRequest(flow);

      expect(target.seen).toHaveLength(1);
      const [occurrence] = target.seen;
      expect(occurrence?.kind).toBe('request-received');
      expect(occurrence?.flowId).toBe('flow-7');
      expect(occurrence?.attributes).toEqual({
        host: 'api.example.com',
        path: '/v1/items?page=2',
        url: 'https://api.example.com/v1/items?page=2',
        method: 'POST',
        scheme: 'https',
        port: 443,
        headers: { 'content-type': 'application/json', accept: 'text/html, application/json' },
        contentType: 'application/json',
        clientIp: '192.168.1.10',
        clientPort: 52000,
        serverIp: '93.184.216.34',
        sniHost: 'api.example.com',
        body: '{"a":1}',
      });
      expect(Object.isFrozen(occurrence?.attributes)).toBe(true);
      expect(Object.isFrozen(occurrence?.attributes.headers)).toBe(true);
    });

    it('should keep a non-default port in the url', () => {
      const occurrence = requestOccurrence({
        id: 'f',
        request: { method: 'GET', scheme: 'http', host: 'localhost', port: 8080, path: '/' },
      });
      expect(occurrence.attributes.url).toBe('http://localhost:8080/');
      expect(occurrence.attributes.headers).toBeUndefined();
      expect('clientIp' in occurrence.attributes).toBe(false);
    });
  });

  describe('onResponse()', () => {
    it('should use response headers and status', async () => {
      const target = new RecordingTarget();
      await new EventAdapter(target).onResponse({
        ...flow,
        response: { statusCode: 502, headers: { 'Content-Type': 'text/plain' }, body: 'bad gateway' },
      });

      const attributes = target.seen[0]?.attributes;
      expect(target.seen[0]?.kind).toBe('response-received');
      expect(attributes?.statusCode).toBe(502);
      expect(attributes?.headers).toEqual({ 'content-type': 'text/plain' });
      expect(attributes?.contentType).toBe('text/plain');
      expect(attributes?.body).toBe('bad gateway');
      expect(attributes?.host).toBe('api.example.com');
    });
  });

  describe('onWebSocketMessage()', () => {
    it('should carry direction and payload', async () => {
      const target = new RecordingTarget();
      await new EventAdapter(target).onWebSocketMessage(
        { ...flow, request: { ...request, method: 'GET', scheme: 'wss', port: 443, path: '/socket' } },
        { fromClient: false, content: 'ping' },
      );
      expect(target.seen[0]?.kind).toBe('websocket-message');
      expect(target.seen[0]?.attributes.wsDirection).toBe('server');
      expect(target.seen[0]?.attributes.body).toBe('ping');
      expect(target.seen[0]?.attributes.url).toBe('wss://api.example.com/socket');
    });
  });

  describe('other callbacks', () => {
    it('should emit tls-established and connection-closed', async () => {
      const target = new RecordingTarget();
      const adapter = new EventAdapter(target);
      await adapter.onTlsEstablished({ id: 'c', client: { sni: 'Secure.Example' } });
      await adapter.onConnectionClosed({ id: 'c' });

      expect(target.seen.map((occurrence) => occurrence.kind)).toEqual(['tls-established', 'connection-closed']);
      expect(target.seen[0]?.attributes).toEqual({ sniHost: 'secure.example' });
      expect(target.seen[1]?.attributes).toEqual({});
    });
  });

  describe('toAction()', () => {
    it('should map each verdict action', () => {
      expect(EventAdapter.toAction(passThrough(1))).toEqual({ type: 'continue' });
      expect(EventAdapter.toAction({ ...passThrough(1), action: 'block', block: { statusCode: 451, reason: 'legal' } })).toEqual({
        type: 'block',
        statusCode: 451,
        reason: 'legal',
      });
      expect(EventAdapter.toAction({ ...passThrough(1), action: 'respond', response: { statusCode: 204 } })).toEqual({
        type: 'respond',
        statusCode: 204,
        headers: {},
        body: '',
      });
      expect(
        EventAdapter.toAction({
          ...passThrough(1),
          action: 'modify',
          headerEdits: [
            { op: 'set', name: 'x-a', value: '1' },
            { op: 'remove', name: 'cookie' },
          ],
          body: 'rewritten',
        }),
      ).toEqual({
        type: 'modify',
        headers: [
          { type: 'set', name: 'x-a', value: '1' },
          { type: 'remove', name: 'cookie' },
        ],
        body: 'rewritten',
      });
    });
  });

  describe('fail-open', () => {
    it('should continue when dispatch throws', async () => {
      const target: DispatchTarget = { handle: () => Promise.reject(new Error('engine down')) };
      await expect(new EventAdapter(target).onRequest(flow)).resolves.toEqual({ type: 'continue' });
    });

    it('should continue when the verdict misses the reaction budget', async () => {
      vi.useFakeTimers();
      try {
        const target: DispatchTarget = { handle: () => new Promise<Verdict>(() => undefined) };
        const pending = new EventAdapter(target, { reactionTimeoutMs: 25 }).onRequest(flow);
        await vi.advanceTimersByTimeAsync(25);
        await expect(pending).resolves.toEqual({ type: 'continue' });
      } finally {
        vi.useRealTimers();
      }
    });

    it('should pass a verdict that arrives in time', async () => {
      const target = new RecordingTarget({ ...passThrough(1), action: 'block', block: { statusCode: 403, reason: 'no' } });
      await expect(new EventAdapter(target, { reactionTimeoutMs: 1000 }).onRequest(flow)).resolves.toEqual({
        type: 'block',
        statusCode: 403,
        reason: 'no',
      });
    });
  });
});

describe('normalizeHeaders()', () => {
  it('should lower-case names and join repeated values', () => {
    expect(normalizeHeaders({ 'Set-Cookie': ['a=1', 'b=2'], Host: 'x' })).toEqual({ 'set-cookie': 'a=1, b=2', host: 'x' });
    expect(normalizeHeaders(undefined)).toBeUndefined();
  });
});
