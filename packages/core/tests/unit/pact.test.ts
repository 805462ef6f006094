/**
 * Unit tests for reading and writing pact documents.
 *
 * Tests cover:
 * - Specification detection from metadata
 * - V2, V3 and V4 document forms
 * - Message pacts
 * - Interaction keys and deep copies
 */

import { describe, it, expect } from 'vitest';
import {
  clonePact,
  interactionKey,
  parseQueryString,
  readPact,
  readPactText,
  writePact,
} from '../../src/models/pact.js';
import type { HttpInteraction, Pact } from '../../src/types.js';

const V2_DOCUMENT = {
  consumer: { name: 'web' },
  provider: { name: 'widgets' },
  interactions: [
    {
      description: 'a request for widgets',
      providerState: 'widgets exist',
      request: {
        method: 'get',
        path: '/widgets',
        query: 'a=1&b=2&b=3',
        headers: { Accept: 'application/json, text/plain' },
      },
      response: {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
        body: { id: 1, name: 'Sprocket' },
        matchingRules: { '$.body.name': { match: 'type' } },
      },
    },
  ],
  metadata: { pactSpecification: { version: '2.0.0' } },
};

function read(json: unknown): Pact {
  const result = readPact(json);
  if (!result.ok) throw new Error(result.error);
  return result.pact;
}

function firstHttp(pact: Pact): HttpInteraction {
  const interaction = pact.interactions[0];
  if (interaction?.type !== 'Synchronous/HTTP') throw new Error('expected an HTTP interaction');
  return interaction;
}

describe('readPact', () => {
  it('should read a V2 document', () => {
    const pact = read(V2_DOCUMENT);
    expect(pact.specification).toBe('V2');
    expect(pact.consumer).toEqual({ name: 'web' });
    expect(pact.provider).toEqual({ name: 'widgets' });

    const interaction = firstHttp(pact);
    expect(interaction.providerStates).toEqual([{ name: 'widgets exist', params: {} }]);
    expect(interaction.request.method).toBe('GET');
    expect(interaction.request.query).toEqual({ a: ['1'], b: ['2', '3'] });
    expect(interaction.request.headers).toEqual({ Accept: ['application/json', 'text/plain'] });
    expect(interaction.response.body).toEqual({
      kind: 'json',
      value: { id: 1, name: 'Sprocket' },
      contentType: 'application/json',
    });
    expect(interaction.response.matchingRules.toJson('V3')).toEqual({
      body: { '$.name': { combine: 'AND', matchers: [{ match: 'type' }] } },
    });
  });

  it('should detect the specification from each metadata form', () => {
    const base = { consumer: { name: 'c' }, provider: { name: 'p' } };
    expect(read({ ...base, metadata: { 'pact-specification': { version: '1.1.0' } } }).specification).toBe('V1_1');
    expect(read({ ...base, metadata: { pactSpecificationVersion: '2.0.0' } }).specification).toBe('V2');
    expect(read({ ...base, metadata: { pactSpecification: { version: '4.0' } } }).specification).toBe('V4');
    expect(read({ ...base, metadata: { pactSpecification: { version: '9.0.0' } } }).specification).toBe('V3');
    expect(read(base).specification).toBe('V3');
  });

  it('should read V4 bodies and interaction types', () => {
    const pact = read({
      consumer: { name: 'web' },
      provider: { name: 'widgets' },
      interactions: [
        {
          type: 'Synchronous/HTTP',
          key: 'abc123',
          pending: true,
          description: 'binary download',
          request: { method: 'GET', path: '/file' },
          response: { status: 200, body: { content: 'AAEC', contentType: 'application/octet-stream', encoded: 'base64' } },
        },
        {
          type: 'Asynchronous/Messages',
          description: 'a widget event',
          contents: { content: { id: 1 }, contentType: 'application/json', encoded: false },
          metadata: { topic: 'widgets' },
        },
      ],
      metadata: { pactSpecification: { version: '4.0' } },
    });

    const http = firstHttp(pact);
    expect(http.key).toBe('abc123');
    expect(http.pending).toBe(true);
    expect(http.response.body).toEqual({ kind: 'binary', base64: 'AAEC', contentType: 'application/octet-stream' });

    const message = pact.interactions[1];
    expect(message?.type).toBe('Asynchronous/Messages');
    if (message?.type === 'Asynchronous/Messages') {
      expect(message.contents).toEqual({ kind: 'json', value: { id: 1 }, contentType: 'application/json' });
      expect(message.metadata).toEqual({ topic: 'widgets' });
    }
  });

  it('should read V3 message pacts', () => {
    const pact = read({
      consumer: { name: 'worker' },
      provider: { name: 'widgets' },
      messages: [{ description: 'a widget event', contents: { id: 1 }, metadata: { contentType: 'application/json' } }],
      metadata: { pactSpecification: { version: '3.0.0' } },
    });
    expect(pact.interactions).toHaveLength(1);
    expect(pact.interactions[0]?.type).toBe('Asynchronous/Messages');
  });

  it('should reject a document without a consumer', () => {
    const result = readPact({ provider: { name: 'widgets' } });
    expect(result).toEqual({ ok: false, error: 'Invalid pact document:\n  - consumer: Required' });
  });

  it('should reject malformed matching rules', () => {
    const result = readPact({
      consumer: { name: 'c' },
      provider: { name: 'p' },
      interactions: [{ description: 'x', request: {}, response: { matchingRules: { body: { '$.a': { matchers: [{ match: 'bogus' }] } } } } }],
    });
    expect(result).toEqual({
      ok: false,
      error: "Invalid matching rules for interaction 0: 'bogus' is not a valid matching rule type",
    });
  });
});

describe('readPactText', () => {
  it('should report text that is not JSON', () => {
    const result = readPactText('{ not json');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.startsWith('Invalid pact JSON: ')).toBe(true);
  });
});

describe('parseQueryString', () => {
  it('should decode keys and values', () => {
    expect(parseQueryString('q=a+b&x=%2F&x=&flag')).toEqual({ q: ['a b'], x: ['/', ''], flag: [''] });
  });
});

describe('writePact', () => {
  it('should write the V2 form', () => {
    const json = writePact(read(V2_DOCUMENT));
    expect(json).toEqual({
      consumer: { name: 'web' },
      provider: { name: 'widgets' },
      interactions: [
        {
          description: 'a request for widgets',
          providerState: 'widgets exist',
          request: {
            method: 'GET',
            path: '/widgets',
            query: 'a=1&b=2&b=3',
            headers: { Accept: 'application/json, text/plain' },
          },
          response: {
            status: 200,
            headers: { 'Content-Type': 'application/json' },
            body: { id: 1, name: 'Sprocket' },
            matchingRules: { '$.body.name': { match: 'type' } },
          },
        },
      ],
      metadata: { pactSpecification: { version: '2.0.0' } },
    });
  });

  it('should write the V3 form', () => {
    const json = writePact(read(V2_DOCUMENT), 'V3');
    expect(json['interactions']).toEqual([
      {
        description: 'a request for widgets',
        providerStates: [{ name: 'widgets exist' }],
        request: {
          method: 'GET',
          path: '/widgets',
          query: { a: ['1'], b: ['2', '3'] },
          headers: { Accept: 'application/json, text/plain' },
        },
        response: {
          status: 200,
          headers: { 'Content-Type': 'application/json' },
          body: { id: 1, name: 'Sprocket' },
          matchingRules: { body: { '$.name': { combine: 'AND', matchers: [{ match: 'type' }] } } },
        },
      },
    ]);
    expect(json['metadata']).toEqual({ pactSpecification: { version: '3.0.0' } });
  });

  it('should write the V4 form with keys and wrapped bodies', () => {
    const pact = read(V2_DOCUMENT);
    const interactions = writePact(pact, 'V4')['interactions'];
    expect(Array.isArray(interactions)).toBe(true);
    if (!Array.isArray(interactions)) return;
    expect(interactions[0]).toMatchObject({
      type: 'Synchronous/HTTP',
      key: interactionKey(firstHttp(pact)),
      pending: false,
      request: { headers: { Accept: ['application/json', 'text/plain'] } },
      response: {
        status: 200,
        headers: { 'Content-Type': ['application/json'] },
        body: { content: { id: 1, name: 'Sprocket' }, contentType: 'application/json', encoded: false },
      },
    });
  });

  it('should put V3 messages under messages', () => {
    const pact = read({
      consumer: { name: 'worker' },
      provider: { name: 'widgets' },
      messages: [{ description: 'a widget event', contents: { id: 1 }, metadata: { contentType: 'application/json' } }],
    });
    const json = writePact(pact, 'V3');
    expect(json['interactions']).toBeUndefined();
    expect(json['messages']).toEqual([
      { description: 'a widget event', contents: { id: 1 }, metadata: { contentType: 'application/json' } },
    ]);
  });

  it('should write an empty V4 message body as null content', () => {
    const pact = read({
      consumer: { name: 'worker' },
      provider: { name: 'widgets' },
      messages: [{ description: 'a ping' }],
    });
    const interactions = writePact(pact, 'V4')['interactions'];
    expect(Array.isArray(interactions) ? interactions[0] : undefined).toMatchObject({
      type: 'Asynchronous/Messages',
      contents: { content: null },
    });
  });

  it('should replace legacy specification metadata', () => {
    const pact = read({
      consumer: { name: 'c' },
      provider: { name: 'p' },
      metadata: { pactSpecificationVersion: '2.0.0', client: { name: 'accord' } },
    });
    expect(writePact(pact, 'V3')['metadata']).toEqual({
      client: { name: 'accord' },
      pactSpecification: { version: '3.0.0' },
    });
  });
});

describe('interactionKey', () => {
  it('should prefer an explicit key', () => {
    const interaction = { ...firstHttp(read(V2_DOCUMENT)), key: 'fixed' };
    expect(interactionKey(interaction)).toBe('fixed');
  });

  it('should hash description and states into 16 hex digits', () => {
    const interaction = firstHttp(read(V2_DOCUMENT));
    const key = interactionKey(interaction);
    expect(key).toMatch(/^[0-9a-f]{16}$/);
    expect(interactionKey(firstHttp(read(V2_DOCUMENT)))).toBe(key);
    expect(interactionKey({ ...interaction, description: 'another' })).not.toBe(key);
  });
});

describe('clonePact', () => {
  it('should copy without sharing state', () => {
    const original = read(V2_DOCUMENT);
    const copy = clonePact(original);
    expect(copy.specification).toBe('V2');
    expect(writePact(copy)).toEqual(writePact(original));

    firstHttp(copy).request.headers['X-Extra'] = ['1'];
    expect(firstHttp(original).request.headers['X-Extra']).toBeUndefined();
  });
});
