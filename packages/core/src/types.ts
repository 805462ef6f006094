/**
 * @module types
 * Shared type definitions for accord.
 *
 * Pact documents, HTTP parts, messages, mismatches, events and reporting
 * types live here so every subsystem speaks the same vocabulary.
 */

import type { MatchingRules } from './models/matching-rules.js';
import type { Generators } from './models/generators.js';

// ==================== JSON values ====================

/** JSON-like value tree used for bodies, payloads and metadata. */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

/** JSON object with insertion-ordered unique keys. */
export interface JsonObject {
  [key: string]: JsonValue;
}

/** Narrow an unknown value parsed from JSON to a {@link JsonObject}. */
export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ==================== Pact specification ====================

export type PactSpecification = 'V1' | 'V1_1' | 'V2' | 'V3' | 'V4';

export const PACT_SPECIFICATIONS: readonly PactSpecification[] = ['V1', 'V1_1', 'V2', 'V3', 'V4'];

// ==================== Bodies ====================

/**
 * Request, response or message contents.
 *
 * JSON content is kept as a parsed tree; other text stays a string and
 * binary payloads are carried base64-encoded.
 */
export type Body =
  | { kind: 'missing' }
  | { kind: 'json'; value: JsonValue; contentType: string }
  | { kind: 'text'; text: string; contentType?: string }
  | { kind: 'binary'; base64: string; contentType: string };

export const MISSING_BODY: Body = { kind: 'missing' };

// ==================== HTTP parts ====================

/** Multi-valued string map used for headers and query parameters. */
export type MultiValueMap = Record<string, string[]>;

export interface HttpRequest {
  method: string;
  path: string;
  query: MultiValueMap;
  headers: MultiValueMap;
  body: Body;
  matchingRules: MatchingRules;
  generators: Generators;
}

export interface HttpResponse {
  status: number;
  headers: MultiValueMap;
  body: Body;
  matchingRules: MatchingRules;
  generators: Generators;
}

export interface ProviderState {
  name: string;
  params: JsonObject;
}

// ==================== Interactions ====================

interface InteractionBase {
  /** Unique key (V4); derived from description and states when absent. */
  key?: string;
  description: string;
  providerStates: ProviderState[];
  pending: boolean;
  comments: JsonObject;
}

/** Recorded HTTP request/response expectation. */
export interface HttpInteraction extends InteractionBase {
  type: 'Synchronous/HTTP';
  request: HttpRequest;
  response: HttpResponse;
}

/** Recorded asynchronous message expectation. */
export interface MessageInteraction extends InteractionBase {
  type: 'Asynchronous/Messages';
  contents: Body;
  metadata: JsonObject;
  matchingRules: MatchingRules;
  generators: Generators;
}

export type Interaction = HttpInteraction | MessageInteraction;

/** A consumer/provider contract. */
export interface Pact {
  consumer: { name: string };
  provider: { name: string };
  interactions: Interaction[];
  metadata: JsonObject;
  specification: PactSpecification;
}

// ==================== Mismatches ====================

/** One failed comparison reported by the request/response matcher. */
export type Mismatch =
  | { type: 'MethodMismatch'; expected: string; actual: string; mismatch: string }
  | { type: 'PathMismatch'; expected: string; actual: string; mismatch: string }
  | { type: 'StatusMismatch'; expected: number; actual: number; mismatch: string }
  | { type: 'QueryMismatch'; parameter: string; expected: string; actual: string; mismatch: string }
  | { type: 'HeaderMismatch'; key: string; expected: string; actual: string; mismatch: string }
  | { type: 'BodyTypeMismatch'; expected: string; actual: string; mismatch: string }
  | { type: 'BodyMismatch'; path: string; expected: JsonValue; actual: JsonValue; mismatch: string }
  | { type: 'MetadataMismatch'; key: string; expected: string; actual: string; mismatch: string };

export type MismatchType = Mismatch['type'];

// ==================== Events ====================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogRecord {
  level: LogLevel;
  message: string;
  timestamp: number;
}

/** One entry of a mock server's outcome table. */
export type RequestOutcome =
  | { type: 'request-match'; interaction: string; method: string; path: string; ambiguous?: string[] }
  | { type: 'request-mismatch'; interaction: string; method: string; path: string; mismatches: Mismatch[] }
  | { type: 'request-not-found'; interaction?: string; method: string; path: string; request: JsonObject; mismatches: Mismatch[] }
  | { type: 'missing-request'; interaction: string; method: string; path: string };

export type MockServerBusMessage =
  | { event: 'started'; data: { port: number; url: string } }
  | { event: 'stopped'; data: { port: number } }
  | { event: 'request'; data: { port: number; method: string; path: string } }
  | { event: 'match'; data: { port: number; interaction: string } }
  | { event: 'mismatch'; data: { port: number; outcome: RequestOutcome } }
  | { event: 'log'; data: LogRecord };

export interface VerifierBusMessage {
  event: VerificationEvent['type'];
  data: VerificationEvent;
}

/** Message type carried by each channel. */
export interface BusChannels {
  'mock-server': MockServerBusMessage;
  verifier: VerifierBusMessage;
}

export type BusChannel = keyof BusChannels;

export interface Bus {
  emit<C extends BusChannel>(channel: C, message: BusChannels[C]): void;
  subscribe<C extends BusChannel>(channel: C, handler: (msg: BusChannels[C]) => void): () => void;
  /** Publish a `log` event on a channel. */
  log(channel: BusChannel, level: LogLevel, message: string): void;
  /** Subscribe to the `log` events of a channel only. */
  onLog(channel: BusChannel, handler: (record: LogRecord) => void): () => void;
}

// ==================== Verification reporting ====================

/** Failure classes an interaction can end with during verification. */
export type VerificationFailureKind = 'mismatch' | 'provider-connection' | 'state-change' | 'internal';

export type VerificationEvent =
  | { type: 'source_start'; source: string; consumer: string; provider: string; timestamp: number }
  | { type: 'interaction_pass'; source: string; description: string; duration: number; pending: boolean; timestamp: number }
  | { type: 'interaction_fail'; source: string; description: string; kind: VerificationFailureKind;
      error: string; mismatches: Mismatch[]; duration: number; pending: boolean; timestamp: number }
  | { type: 'interaction_skip'; source: string; description: string; reason: string; timestamp: number }
  | { type: 'source_end'; source: string; passed: number; failed: number; skipped: number; duration: number; timestamp: number }
  | { type: 'log'; level: LogLevel; message: string; timestamp: number };

export interface InteractionReport {
  description: string;
  status: 'passed' | 'failed' | 'skipped';
  pending: boolean;
  duration: number;
  kind?: VerificationFailureKind;
  error?: string;
  mismatches?: Mismatch[];
}

export interface SourceReport {
  source: string;
  passed: number;
  failed: number;
  skipped: number;
  duration: number;
  interactions: InteractionReport[];
}

export interface VerificationReport {
  provider: string;
  timestamp: number;
  duration: number;
  sources: SourceReport[];
  totals: { passed: number; failed: number; skipped: number; pendingFailures: number };
}

export interface Reporter {
  id: string;
  onEvent(event: VerificationEvent): void;
  generate(): VerificationReport;
}
