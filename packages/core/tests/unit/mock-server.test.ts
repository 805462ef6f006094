/**
 * Unit tests for the mock server and its port-keyed control surface.
 *
 * Tests cover:
 * - Creation return codes
 * - Matched, mismatched and unexpected requests
 * - Missing requests and ambiguous matches
 * - Generators, CORS pre-flight and event publishing
 * - Cleanup and writing the pact
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import {
  cleanupAllMockServers,
  cleanupMockServer,
  createMockServer,
  getMockServer,
  mockServerLogs,
  mockServerMatched,
  mockServerMismatches,
  parseBindAddress,
  writePactFile,
} from '../../src/mock-server/server-manager.js';
import { getLastError } from '../../src/errors.js';
import { createEventBus } from '../../src/event-bus.js';

interface InteractionJson {
  description: string;
  request: Record<string, unknown>;
  response: Record<string, unknown>;
}

function pactJson(...interactions: InteractionJson[]): string {
  return JSON.stringify({
    consumer: { name: 'web' },
    provider: { name: 'widgets' },
    interactions,
    metadata: { pactSpecification: { version: '3.0.0' } },
  });
}

const GET_WIDGETS: InteractionJson = {
  description: 'a request for widgets',
  request: { method: 'GET', path: '/widgets' },
  response: { status: 200, headers: { 'Content-Type': 'application/json' }, body: { id: 1 } },
};

async function start(json: string, options: Parameters<typeof createMockServer>[3] = {}): Promise<number> {
  const port = await createMockServer(json, '127.0.0.1:0', false, options);
  if (port <= 0) throw new Error(`mock server failed (${port}): ${getLastError() ?? ''}`);
  return port;
}

describe('parseBindAddress', () => {
  it('should split host and port', () => {
    expect(parseBindAddress('127.0.0.1:8080')).toEqual({ host: '127.0.0.1', port: 8080 });
    expect(parseBindAddress('[::1]:0')).toEqual({ host: '::1', port: 0 });
    expect(parseBindAddress(':1234')).toEqual({ host: '127.0.0.1', port: 1234 });
  });

  it('should reject malformed addresses', () => {
    expect(parseBindAddress('localhost')).toBeUndefined();
    expect(parseBindAddress('localhost:70000')).toBeUndefined();
  });
});

describe('createMockServer', () => {
  afterEach(async () => {
    await cleanupAllMockServers();
  });

  it('should return -1 for empty input', async () => {
    expect(await createMockServer('', '127.0.0.1:0')).toBe(-1);
    expect(getLastError()).toBe('Pact JSON is empty');
  });

  it('should return -2 for an invalid pact', async () => {
    expect(await createMockServer('{', '127.0.0.1:0')).toBe(-2);
    expect(getLastError()).toContain('Invalid pact JSON');
  });

  it('should return -5 for a malformed bind address', async () => {
    expect(await createMockServer(pactJson(GET_WIDGETS), 'nonsense')).toBe(-5);
  });

  it('should return -6 when TLS is requested without a key and certificate', async () => {
    expect(await createMockServer(pactJson(GET_WIDGETS), '127.0.0.1:0', true)).toBe(-6);
  });

  it('should return the bound port', async () => {
    const port = await createMockServer(pactJson(GET_WIDGETS), '127.0.0.1:0');
    expect(port).toBeGreaterThan(0);
    expect(getMockServer(port)?.state).toBe('running');
  });
});

describe('mock server requests', () => {
  afterEach(async () => {
    await cleanupAllMockServers();
  });

  it('should answer a matching request with the recorded response', async () => {
    const port = await start(pactJson(GET_WIDGETS));
    const res = await fetch(`http://127.0.0.1:${port}/widgets`);
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/json');
    expect(await res.json()).toEqual({ id: 1 });

    expect(mockServerMatched(port)).toBe(true);
    expect(mockServerMismatches(port)).toBe('[]');
  });

  it('should record an unexpected request as not found', async () => {
    const port = await start(pactJson(GET_WIDGETS));
    const res = await fetch(`http://127.0.0.1:${port}/other`);
    expect(res.status).toBe(500);
    expect(res.headers.get('x-pact')).toBe('Unexpected-Request');
    const body = await res.json();
    expect(body.error).toBe('Unexpected request : GET /other');

    expect(mockServerMatched(port)).toBe(false);
    const mismatches = JSON.parse(mockServerMismatches(port) ?? '[]');
    expect(mismatches).toHaveLength(1);
    expect(mismatches[0]).toMatchObject({ type: 'request-not-found', method: 'GET', path: '/other' });
  });

  it('should record a body mismatch against the closest interaction', async () => {
    const port = await start(pactJson({
      description: 'create a widget',
      request: { method: 'POST', path: '/widgets', headers: { 'Content-Type': 'application/json' }, body: { name: 'a' } },
      response: { status: 201 },
    }));
    const res = await fetch(`http://127.0.0.1:${port}/widgets`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name: 'b' }),
    });
    expect(res.status).toBe(500);
    expect(res.headers.get('x-pact')).toBe('Request-Mismatch');

    const mismatches = JSON.parse(mockServerMismatches(port) ?? '[]');
    expect(mismatches).toHaveLength(1);
    expect(mismatches[0].type).toBe('request-mismatch');
    expect(mismatches[0].interaction).toBe('create a widget');
    expect(mismatches[0].mismatches[0]).toMatchObject({ type: 'BodyMismatch', path: '$.name', expected: 'a', actual: 'b' });
  });

  it('should list interactions that were never requested', async () => {
    const port = await start(pactJson(GET_WIDGETS));
    expect(mockServerMatched(port)).toBe(false);
    expect(JSON.parse(mockServerMismatches(port) ?? '[]')).toEqual([
      { type: 'missing-request', interaction: 'a request for widgets', method: 'GET', path: '/widgets' },
    ]);
  });

  it('should use the first of several matching interactions', async () => {
    const port = await start(pactJson(
      { ...GET_WIDGETS, description: 'first' },
      { ...GET_WIDGETS, description: 'second' },
    ));
    await fetch(`http://127.0.0.1:${port}/widgets`);
    expect(getMockServer(port)?.outcomeTable()).toEqual([
      { type: 'request-match', interaction: 'first', method: 'GET', path: '/widgets', ambiguous: ['second'] },
    ]);
  });

  it('should apply response generators', async () => {
    const port = await start(pactJson({
      ...GET_WIDGETS,
      response: {
        ...GET_WIDGETS.response,
        generators: { body: { '$.id': { type: 'RandomInt', min: 7, max: 7 } } },
      },
    }));
    const res = await fetch(`http://127.0.0.1:${port}/widgets`);
    expect(await res.json()).toEqual({ id: 7 });
  });

  it('should echo the request path through a RequestPath generator', async () => {
    const port = await start(pactJson({
      description: 'a request for any widget',
      request: {
        method: 'GET',
        path: '/widgets/1',
        matchingRules: { path: { matchers: [{ match: 'regex', regex: '^/widgets/\\d+$' }] } },
      },
      response: {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
        body: { self: '/widgets/1', id: '1' },
        generators: { body: { '$.self': { type: 'RequestPath' }, '$.id': { type: 'RequestPath', regex: '(\\d+)$' } } },
      },
    }));
    const res = await fetch(`http://127.0.0.1:${port}/widgets/42`);
    expect(await res.json()).toEqual({ self: '/widgets/42', id: '42' });
  });

  it('should answer CORS pre-flight requests when enabled', async () => {
    const port = await start(pactJson(GET_WIDGETS), { cors: true });
    const res = await fetch(`http://127.0.0.1:${port}/widgets`, { method: 'OPTIONS' });
    expect(res.status).toBe(204);
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
    expect(res.headers.get('access-control-allow-methods')).toBe('GET, POST, PUT, PATCH, DELETE, HEAD, OPTIONS');
  });

  it('should publish lifecycle events on the bus', async () => {
    const bus = createEventBus();
    const events: string[] = [];
    bus.subscribe('mock-server', (msg) => { events.push(msg.event); });

    const port = await start(pactJson(GET_WIDGETS), { bus });
    await fetch(`http://127.0.0.1:${port}/widgets`);
    await cleanupMockServer(port);

    expect(events.filter((event) => event !== 'log')).toEqual(['started', 'request', 'match', 'stopped']);
  });

  it('should capture log lines', async () => {
    const port = await start(pactJson(GET_WIDGETS));
    await fetch(`http://127.0.0.1:${port}/widgets`);
    expect(mockServerLogs(port)).toContain("Request matched interaction 'a request for widgets'");
  });
});

describe('cleanupMockServer', () => {
  it('should return true once and false afterwards', async () => {
    const port = await start(pactJson(GET_WIDGETS));
    expect(await cleanupMockServer(port)).toBe(true);
    expect(await cleanupMockServer(port)).toBe(false);
    expect(mockServerMatched(port)).toBe(false);
    expect(getLastError()).toBe(`No mock server is running on port ${port}`);
  });
});

describe('writePactFile', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'accord-mock-test-'));
  });

  afterEach(async () => {
    await cleanupAllMockServers();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should write the pact of a running server', async () => {
    const port = await start(pactJson(GET_WIDGETS));
    expect(await writePactFile(port, tmpDir)).toBe(0);
    const json = JSON.parse(await fs.readFile(path.join(tmpDir, 'web-widgets.json'), 'utf-8'));
    expect(json.interactions[0].description).toBe('a request for widgets');
    expect(json.metadata.pactSpecification.version).toBe('3.0.0');
  });

  it('should return 3 for an unknown port', async () => {
    expect(await writePactFile(1, tmpDir)).toBe(3);
  });
});
