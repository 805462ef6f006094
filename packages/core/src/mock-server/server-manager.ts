/**
 * @module mock-server/server-manager
 * Port-keyed control surface over running mock servers.
 *
 * Functions here never throw: failures come back as negative ports,
 * status codes or `false`, with the reason in the last-error slot.
 *
 * | createMockServer | meaning                      |
 * |------------------|------------------------------|
 * | > 0              | bound port                   |
 * | -1               | missing or unreadable input  |
 * | -2               | pact JSON is not a valid pact |
 * | -3               | listener failed to start     |
 * | -4               | internal fault               |
 * | -5               | bind address is invalid      |
 * | -6               | TLS could not be configured  |
 *
 * | writePactFile | meaning                          |
 * |---------------|----------------------------------|
 * | 0             | written                          |
 * | 1             | internal fault                   |
 * | 2             | IO failure or merge conflict     |
 * | 3             | no mock server on that port      |
 */

import { AccordError, clearLastError, setLastError } from '../errors.js';
import { clonePact, readPactText } from '../models/pact.js';
import { writePactFile as writePactToDirectory } from '../pact-writer.js';
import type { Bus, Pact, PactSpecification, RequestOutcome } from '../types.js';
import { MockServer, type MockServerTls } from './mock-server.js';

export interface CreateMockServerOptions {
  /** Key and certificate used when TLS is requested. */
  tls?: MockServerTls;
  cors?: boolean;
  logRequests?: boolean;
  bus?: Bus;
  random?: () => number;
  /** Specification used when the pact is written out. */
  specification?: PactSpecification;
}

interface ManagedServer {
  server: MockServer;
  specification: PactSpecification;
}

const servers = new Map<number, ManagedServer>();

// =====================================================================
// Address parsing
// =====================================================================

/** Split `host:port` or `[v6]:port`. */
export function parseBindAddress(address: string): { host: string; port: number } | undefined {
  const match = /^(?:\[([^\]]+)\]|([^:]*)):(\d{1,5})$/.exec(address.trim());
  if (!match) return undefined;
  const host = match[1] ?? match[2] ?? '';
  const port = Number(match[3]);
  if (port > 65535) return undefined;
  return { host: host === '' ? '127.0.0.1' : host, port };
}

// =====================================================================
// Creation
// =====================================================================

/**
 * Start a mock server for a pact given as JSON text.
 *
 * @param address - `host:port`; port 0 lets the OS choose
 * @param tls - serve HTTPS with the key and certificate from `options.tls`
 * @returns the bound port, or a negative error code
 */
export async function createMockServer(
  pactJson: string,
  address: string,
  tls = false,
  options: CreateMockServerOptions = {},
): Promise<number> {
  clearLastError();
  if (!pactJson.trim()) {
    setLastError('INVALID_PACT', 'Pact JSON is empty');
    return -1;
  }
  const result = readPactText(pactJson);
  if (!result.ok) {
    setLastError('INVALID_PACT', result.error);
    return -2;
  }
  return createMockServerForPact(result.pact, address, tls, options);
}

/** Start a mock server for an in-memory pact. The pact is copied first. */
export async function createMockServerForPact(
  pact: Pact,
  address: string,
  tls = false,
  options: CreateMockServerOptions = {},
): Promise<number> {
  const bind = parseBindAddress(address);
  if (!bind) {
    setLastError('BIND_FAILURE', `'${address}' is not a valid bind address`);
    return -5;
  }
  if (tls && !options.tls) {
    setLastError('TLS_CONFIG_FAILURE', 'TLS was requested but no key and certificate were configured');
    return -6;
  }

  let snapshot: Pact;
  try {
    snapshot = clonePact(pact);
  } catch (err) {
    setLastError('INTERNAL_FAULT', `Failed to copy pact: ${(err as Error).message}`);
    return -4;
  }

  const server = new MockServer(snapshot, {
    host: bind.host,
    port: bind.port,
    cors: options.cors,
    tls: tls ? options.tls : undefined,
    logRequests: options.logRequests,
    bus: options.bus,
    random: options.random,
  });
  try {
    const port = await server.start();
    servers.set(port, { server, specification: options.specification ?? pact.specification });
    return port;
  } catch (err) {
    if (err instanceof AccordError) {
      setLastError(err.code, err.message);
      if (err.code === 'TLS_CONFIG_FAILURE') return -6;
      if (err.code === 'BIND_FAILURE') return -3;
      return -4;
    }
    setLastError('INTERNAL_FAULT', (err as Error).message);
    return -4;
  }
}

// =====================================================================
// Queries
// =====================================================================

/** The running server on a port, if any. */
export function getMockServer(port: number): MockServer | undefined {
  return servers.get(port)?.server;
}

export function mockServerMatched(port: number): boolean {
  const entry = servers.get(port);
  if (!entry) {
    setLastError('NOT_FOUND', `No mock server is running on port ${port}`);
    return false;
  }
  return entry.server.matched();
}

/**
 * Mismatches of a server as a JSON array.
 *
 * @returns undefined when no server runs on the port
 */
export function mockServerMismatches(port: number): string | undefined {
  const entry = servers.get(port);
  if (!entry) {
    setLastError('NOT_FOUND', `No mock server is running on port ${port}`);
    return undefined;
  }
  const mismatches: RequestOutcome[] = entry.server.mismatches();
  return JSON.stringify(mismatches);
}

/** Log lines captured by the server on a port, newline separated. */
export function mockServerLogs(port: number): string | undefined {
  const entry = servers.get(port);
  if (!entry) {
    setLastError('NOT_FOUND', `No mock server is running on port ${port}`);
    return undefined;
  }
  return entry.server.logs().join('\n');
}

// =====================================================================
// Teardown & persistence
// =====================================================================

/**
 * Stop the server on a port and forget it.
 *
 * @returns true the first time, false once the port is gone
 */
export async function cleanupMockServer(port: number): Promise<boolean> {
  const entry = servers.get(port);
  if (!entry) {
    setLastError('NOT_FOUND', `No mock server is running on port ${port}`);
    return false;
  }
  servers.delete(port);
  try {
    await entry.server.stop();
  } catch (err) {
    setLastError('INTERNAL_FAULT', `Failed to stop mock server on port ${port}: ${(err as Error).message}`);
  }
  return true;
}

/** Write the pact of the server on `port` into `directory`. */
export async function writePactFile(port: number, directory: string, overwrite = false): Promise<number> {
  const entry = servers.get(port);
  if (!entry) {
    setLastError('NOT_FOUND', `No mock server is running on port ${port}`);
    return 3;
  }
  try {
    await writePactToDirectory(entry.server.pact, directory, { overwrite, specification: entry.specification });
    return 0;
  } catch (err) {
    if (err instanceof AccordError && (err.code === 'IO_ERROR' || err.code === 'PACT_FILE_CONFLICT')) {
      setLastError(err.code, err.message);
      return 2;
    }
    setLastError('INTERNAL_FAULT', (err as Error).message);
    return 1;
  }
}

/** Stop every server; used on process shutdown and between tests. */
export async function cleanupAllMockServers(): Promise<void> {
  const ports = [...servers.keys()];
  await Promise.all(ports.map((port) => cleanupMockServer(port)));
}
