/**
 * @module mock-server/mock-server
 * HTTP(S) mock server replaying the interactions of one pact.
 *
 * Every inbound request is matched against the pact's HTTP interactions
 * with the request matcher. A full match is answered with the recorded
 * response (generators applied in consumer mode); anything else gets a
 * 500 diagnostic and a mismatch entry in the outcome table.
 *
 * Lifecycle: created -> starting -> running -> stopped. Stopping waits for
 * requests already accepted before the listener is released.
 */

import https from 'node:https';
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import { AccordError } from '../errors.js';
import { CHANNELS } from '../event-bus.js';
import { generateResponse } from '../generators/generator-engine.js';
import { bodyFromBuffer, bodyToBuffer, bodyContentType, headerValue } from '../models/body.js';
import { emptyRequest, parseQueryString } from '../models/pact.js';
import { matchRequest } from '../matching/request-matcher.js';
import type { Bus, HttpInteraction, HttpRequest, JsonObject, LogLevel, Mismatch, MultiValueMap, Pact, RequestOutcome } from '../types.js';

// =====================================================================
// Types
// =====================================================================

export type MockServerState = 'created' | 'starting' | 'running' | 'stopped';

export interface MockServerTls {
  key: string | Buffer;
  cert: string | Buffer;
}

export interface MockServerOptions {
  host?: string;
  /** 0 lets the OS pick a free port. */
  port?: number;
  /** Answer unmatched CORS pre-flight requests and add allow-origin headers. */
  cors?: boolean;
  tls?: MockServerTls;
  /** Log every request at info level instead of debug. */
  logRequests?: boolean;
  bus?: Bus;
  /** Random source for generated response values. */
  random?: () => number;
}

interface Candidate {
  index: number;
  interaction: HttpInteraction;
  mismatches: Mismatch[];
}

const CORS_HEADERS = 'Content-Type, Authorization, Accept, X-Requested-With';
const CORS_METHODS = 'GET, POST, PUT, PATCH, DELETE, HEAD, OPTIONS';

// =====================================================================
// Request conversion
// =====================================================================

function headersOf(request: FastifyRequest): MultiValueMap {
  const headers: MultiValueMap = {};
  for (const [key, value] of Object.entries(request.headers)) {
    if (value === undefined) continue;
    headers[key] = Array.isArray(value) ? value : [value];
  }
  return headers;
}

function decodePath(raw: string): string {
  try {
    return decodeURI(raw);
  } catch {
    return raw;
  }
}

/** Convert a Fastify request into the model's HTTP request. */
export function toHttpRequest(request: FastifyRequest): HttpRequest {
  const separator = request.url.indexOf('?');
  const rawPath = separator < 0 ? request.url : request.url.slice(0, separator);
  const rawQuery = separator < 0 ? '' : request.url.slice(separator + 1);
  let query: MultiValueMap;
  try {
    query = parseQueryString(rawQuery);
  } catch {
    query = { [rawQuery]: [''] };
  }
  const headers = headersOf(request);
  const data = Buffer.isBuffer(request.body) ? request.body : undefined;
  return {
    ...emptyRequest(),
    method: request.method.toUpperCase(),
    path: decodePath(rawPath),
    query,
    headers,
    body: bodyFromBuffer(data, headerValue(headers, 'content-type')),
  };
}

function requestSummary(request: HttpRequest): JsonObject {
  return { method: request.method, path: request.path, query: request.query, headers: request.headers };
}

function isRouteMismatch(mismatch: Mismatch): boolean {
  return mismatch.type === 'MethodMismatch' || mismatch.type === 'PathMismatch';
}

// =====================================================================
// MockServer
// =====================================================================

export class MockServer {
  private app: FastifyInstance | undefined;
  private currentState: MockServerState = 'created';
  private boundPort = 0;
  private readonly outcomes: RequestOutcome[] = [];
  /** Indexes of interactions with at least one recorded outcome. */
  private readonly touched = new Set<number>();
  private readonly matchedCounts = new Map<number, number>();
  private readonly logLines: string[] = [];
  private readonly interactions: HttpInteraction[];

  constructor(
    readonly pact: Pact,
    private readonly options: MockServerOptions = {},
  ) {
    this.interactions = pact.interactions.filter((i): i is HttpInteraction => i.type === 'Synchronous/HTTP');
  }

  get state(): MockServerState {
    return this.currentState;
  }

  get port(): number {
    return this.boundPort;
  }

  get url(): string {
    const host = this.options.host ?? '127.0.0.1';
    return `${this.options.tls ? 'https' : 'http'}://${host}:${this.boundPort}`;
  }

  /**
   * Bind the listener.
   *
   * @returns the bound port
   * @throws {AccordError} TLS_CONFIG_FAILURE when the key or certificate is
   *   rejected, BIND_FAILURE when the address cannot be bound
   */
  async start(): Promise<number> {
    if (this.currentState !== 'created') {
      throw new AccordError('CONFIGURATION_ERROR', `Mock server can not be started from state '${this.currentState}'`);
    }
    this.currentState = 'starting';
    const app = this.buildApp();
    this.app = app;
    try {
      await app.listen({ port: this.options.port ?? 0, host: this.options.host ?? '127.0.0.1' });
    } catch (err) {
      this.currentState = 'stopped';
      throw new AccordError('BIND_FAILURE', `Failed to bind mock server: ${(err as Error).message}`, {
        host: this.options.host ?? '127.0.0.1',
        port: this.options.port ?? 0,
      });
    }
    const address = app.server.address();
    this.boundPort = typeof address === 'object' && address !== null ? address.port : this.options.port ?? 0;
    this.currentState = 'running';
    this.log('info', `Mock server for ${this.pact.consumer.name} -> ${this.pact.provider.name} listening on ${this.url}`);
    this.options.bus?.emit(CHANNELS.mockServer, { event: 'started', data: { port: this.boundPort, url: this.url } });
    return this.boundPort;
  }

  /** Release the listener once in-flight requests are answered. */
  async stop(): Promise<void> {
    if (this.currentState === 'stopped') return;
    this.currentState = 'stopped';
    if (this.app) await this.app.close();
    this.log('info', `Mock server on port ${this.boundPort} stopped`);
    this.options.bus?.emit(CHANNELS.mockServer, { event: 'stopped', data: { port: this.boundPort } });
  }

  /**
   * True when every interaction was matched at least once and no request
   * failed to match.
   */
  matched(): boolean {
    if (this.outcomes.some((outcome) => outcome.type !== 'request-match')) return false;
    return this.interactions.every((_, index) => (this.matchedCounts.get(index) ?? 0) > 0);
  }

  /** Failed outcomes plus a `missing-request` entry for each interaction never touched. */
  mismatches(): RequestOutcome[] {
    const result = this.outcomes.filter((outcome) => outcome.type !== 'request-match');
    this.interactions.forEach((interaction, index) => {
      if (this.touched.has(index)) return;
      result.push({
        type: 'missing-request',
        interaction: interaction.description,
        method: interaction.request.method.toUpperCase(),
        path: interaction.request.path,
      });
    });
    return result;
  }

  /** Every recorded outcome in arrival order. */
  outcomeTable(): RequestOutcome[] {
    return [...this.outcomes];
  }

  logs(): string[] {
    return [...this.logLines];
  }

  // ── Fastify wiring ──────────────────────────────────────────────────

  private buildApp(): FastifyInstance {
    const tls = this.options.tls;
    let app: FastifyInstance;
    try {
      app = tls
        ? Fastify({
            logger: false,
            exposeHeadRoutes: false,
            serverFactory: (handler) => https.createServer({ key: tls.key, cert: tls.cert }, handler),
          })
        : Fastify({ logger: false, exposeHeadRoutes: false });
    } catch (err) {
      this.currentState = 'stopped';
      throw new AccordError('TLS_CONFIG_FAILURE', `Failed to configure TLS: ${(err as Error).message}`);
    }

    app.removeAllContentTypeParsers();
    app.addContentTypeParser('*', { parseAs: 'buffer' }, (_req, body, done) => {
      done(null, body);
    });

    app.addHook('onRequest', async (request) => {
      this.log(this.options.logRequests ? 'info' : 'debug', `Received request ${request.method} ${request.url}`);
    });

    app.all('/*', async (request, reply) => this.handle(request, reply));
    return app;
  }

  private async handle(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
    const actual = toHttpRequest(request);
    this.options.bus?.emit(CHANNELS.mockServer, {
      event: 'request',
      data: { port: this.boundPort, method: actual.method, path: actual.path },
    });
    if (this.options.cors) {
      void reply.header('Access-Control-Allow-Origin', headerValue(actual.headers, 'origin') ?? '*');
    }

    const candidates = this.interactions.map((interaction, index): Candidate => ({
      index,
      interaction,
      mismatches: matchRequest(interaction.request, actual),
    }));
    const full = candidates.filter((candidate) => candidate.mismatches.length === 0);
    const [winner, ...others] = full;
    if (winner) return this.respond(winner, others, actual, reply);

    if (this.options.cors && actual.method === 'OPTIONS') {
      this.log('debug', `Answering CORS pre-flight for ${actual.path}`);
      return reply
        .status(204)
        .header('Access-Control-Allow-Methods', CORS_METHODS)
        .header('Access-Control-Allow-Headers', headerValue(actual.headers, 'access-control-request-headers') ?? CORS_HEADERS)
        .send();
    }

    return this.reject(candidates, actual, reply);
  }

  private respond(winner: Candidate, others: Candidate[], actual: HttpRequest, reply: FastifyReply): FastifyReply {
    const description = winner.interaction.description;
    const outcome: RequestOutcome = { type: 'request-match', interaction: description, method: actual.method, path: actual.path };
    if (others.length > 0) {
      const ambiguous = others.map((candidate) => candidate.interaction.description);
      this.record(winner.index, { ...outcome, ambiguous });
      this.log('warn', `Request ${actual.method} ${actual.path} matched ${others.length + 1} interactions; using '${description}'`);
    } else {
      this.record(winner.index, outcome);
    }
    this.matchedCounts.set(winner.index, (this.matchedCounts.get(winner.index) ?? 0) + 1);
    this.log('info', `Request matched interaction '${description}'`);
    this.options.bus?.emit(CHANNELS.mockServer, { event: 'match', data: { port: this.boundPort, interaction: description } });

    const response = generateResponse(winner.interaction.response, {
      mode: 'consumer',
      random: this.options.random,
      mockServer: { url: this.url, port: this.boundPort },
      requestPath: actual.path,
    });
    void reply.status(response.status);
    for (const [key, values] of Object.entries(response.headers)) {
      void reply.header(key, values.length === 1 ? values[0] : values);
    }
    const contentType = bodyContentType(response.body);
    if (contentType && headerValue(response.headers, 'content-type') === undefined) {
      void reply.header('Content-Type', contentType);
    }
    const data = bodyToBuffer(response.body);
    return data ? reply.send(data) : reply.send();
  }

  private reject(candidates: Candidate[], actual: HttpRequest, reply: FastifyReply): FastifyReply {
    const ranked = [...candidates].sort((a, b) =>
      Number(a.mismatches.some(isRouteMismatch)) - Number(b.mismatches.some(isRouteMismatch))
      || new Set(a.mismatches.map((m) => m.type)).size - new Set(b.mismatches.map((m) => m.type)).size
      || a.index - b.index);
    const closest = ranked[0];

    let outcome: RequestOutcome;
    let mismatches: Mismatch[];
    if (!closest || closest.mismatches.some(isRouteMismatch)) {
      mismatches = closest?.mismatches ?? [];
      outcome = {
        type: 'request-not-found',
        interaction: closest?.interaction.description,
        method: actual.method,
        path: actual.path,
        request: requestSummary(actual),
        mismatches,
      };
    } else {
      mismatches = closest.mismatches;
      outcome = {
        type: 'request-mismatch',
        interaction: closest.interaction.description,
        method: actual.method,
        path: actual.path,
        mismatches,
      };
    }
    const notFound = outcome.type === 'request-not-found';
    this.record(closest?.index, outcome);
    this.log('warn', notFound
      ? `No interaction found for ${actual.method} ${actual.path}`
      : `Request ${actual.method} ${actual.path} did not match interaction '${outcome.interaction ?? ''}'`);
    this.options.bus?.emit(CHANNELS.mockServer, { event: 'mismatch', data: { port: this.boundPort, outcome } });

    return reply
      .status(500)
      .header('X-Pact', notFound ? 'Unexpected-Request' : 'Request-Mismatch')
      .header('Content-Type', 'application/json; charset=utf-8')
      .send({
        error: notFound
          ? `Unexpected request : ${actual.method} ${actual.path}`
          : `Request-Mismatch : ${actual.method} ${actual.path}`,
        mismatches,
      });
  }

  private record(index: number | undefined, outcome: RequestOutcome): void {
    if (index !== undefined) this.touched.add(index);
    this.outcomes.push(outcome);
  }

  private log(level: LogLevel, message: string): void {
    this.logLines.push(`${new Date().toISOString()} ${level.toUpperCase()} ${message}`);
    this.options.bus?.log(CHANNELS.mockServer, level, message);
  }
}
