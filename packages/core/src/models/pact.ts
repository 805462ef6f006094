/**
 * @module models/pact
 * Reading and writing pact documents.
 *
 * Reads every specification version from V1 to V4 into the in-memory
 * {@link Pact} model and writes V2 (flat rules), V3 or V4 documents.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { bodyFromPactJson, bodyToPactJson } from './body.js';
import { Generators } from './generators.js';
import { MatchingRules } from './matching-rules.js';
import {
  isJsonObject,
  MISSING_BODY,
  type HttpInteraction,
  type HttpRequest,
  type HttpResponse,
  type Interaction,
  type JsonObject,
  type JsonValue,
  type MessageInteraction,
  type MultiValueMap,
  type Pact,
  type PactSpecification,
  type ProviderState,
} from '../types.js';

// =====================================================================
// Document schema
// =====================================================================

const ParticipantSchema = z.object({
  name: z.string().min(1).describe('Participant name'),
}).passthrough();

/** Top-level shape of a pact document; interaction contents are read leniently. */
export const PactDocumentSchema = z.object({
  consumer: ParticipantSchema.describe('The consumer that recorded the contract'),
  provider: ParticipantSchema.describe('The provider the contract is verified against'),
  interactions: z.array(z.record(z.unknown())).optional().describe('HTTP interactions (V1-V3) or all interactions (V4)'),
  messages: z.array(z.record(z.unknown())).optional().describe('Asynchronous messages (V3 message pacts)'),
  metadata: z.record(z.unknown()).optional().describe('Document metadata including pactSpecification.version'),
}).passthrough();

export type PactReadResult = { ok: true; pact: Pact } | { ok: false; error: string };

const VERSION_NAMES: Record<PactSpecification, string> = {
  V1: '1.0.0',
  V1_1: '1.1.0',
  V2: '2.0.0',
  V3: '3.0.0',
  V4: '4.0',
};

export function isV2OrEarlier(spec: PactSpecification): boolean {
  return spec === 'V1' || spec === 'V1_1' || spec === 'V2';
}

/** Parse a `pactSpecification.version` string. */
export function specificationFromVersion(version: string): PactSpecification | undefined {
  const [major, minor] = version.split('.');
  switch (major) {
    case '1': return minor === '1' ? 'V1_1' : 'V1';
    case '2': return 'V2';
    case '3': return 'V3';
    case '4': return 'V4';
    default: return undefined;
  }
}

function detectSpecification(metadata: JsonObject): PactSpecification {
  for (const key of ['pactSpecification', 'pact-specification']) {
    const section = metadata[key];
    if (isJsonObject(section) && typeof section['version'] === 'string') {
      return specificationFromVersion(section['version']) ?? 'V3';
    }
  }
  const legacy = metadata['pactSpecificationVersion'];
  if (typeof legacy === 'string') return specificationFromVersion(legacy) ?? 'V3';
  return 'V3';
}

// =====================================================================
// Reading
// =====================================================================

/** Parse `a=1&b=2&b=3` into a multi-valued map. */
export function parseQueryString(query: string): MultiValueMap {
  const result: MultiValueMap = {};
  for (const pair of query.split('&')) {
    if (pair === '') continue;
    const [rawKey = '', ...rest] = pair.split('=');
    const key = decodeURIComponent(rawKey.replace(/\+/g, ' '));
    const value = decodeURIComponent(rest.join('=').replace(/\+/g, ' '));
    (result[key] ??= []).push(value);
  }
  return result;
}

export function queryToString(query: MultiValueMap): string {
  return Object.entries(query)
    .flatMap(([key, values]) => values.map((value) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`))
    .join('&');
}

function multiValueFromJson(json: JsonValue | undefined, splitCommas: boolean): MultiValueMap {
  const result: MultiValueMap = {};
  if (!isJsonObject(json)) return result;
  for (const [key, value] of Object.entries(json)) {
    if (Array.isArray(value)) {
      result[key] = value.map((v) => (typeof v === 'string' ? v : JSON.stringify(v)));
    } else if (typeof value === 'string') {
      result[key] = splitCommas ? value.split(',').map((v) => v.trim()) : [value];
    } else if (value !== null) {
      result[key] = [JSON.stringify(value)];
    }
  }
  return result;
}

function queryFromJson(json: JsonValue | undefined): MultiValueMap {
  if (typeof json === 'string') return parseQueryString(json);
  return multiValueFromJson(json, false);
}

function providerStatesFromJson(json: JsonObject): ProviderState[] {
  const states = json['providerStates'];
  if (Array.isArray(states)) {
    return states.filter(isJsonObject).map((state) => ({
      name: typeof state['name'] === 'string' ? state['name'] : '',
      params: isJsonObject(state['params']) ? state['params'] : {},
    }));
  }
  const legacy = json['providerState'] ?? json['provider_state'];
  return typeof legacy === 'string' && legacy !== '' ? [{ name: legacy, params: {} }] : [];
}

function rulesFromJson(json: JsonValue | undefined, spec: PactSpecification, where: string): MatchingRules {
  const rules = MatchingRules.fromJson(json, spec);
  if (typeof rules === 'string') throw new Error(`Invalid matching rules for ${where}: ${rules}`);
  return rules;
}

function requestFromJson(json: JsonObject, spec: PactSpecification, where: string): HttpRequest {
  const headers = multiValueFromJson(json['headers'], true);
  return {
    method: typeof json['method'] === 'string' ? json['method'].toUpperCase() : 'GET',
    path: typeof json['path'] === 'string' ? json['path'] : '/',
    query: queryFromJson(json['query']),
    headers,
    body: bodyFromPactJson(json['body'], headers, spec === 'V4'),
    matchingRules: rulesFromJson(json['matchingRules'], spec, where),
    generators: Generators.fromJson(json['generators']),
  };
}

function responseFromJson(json: JsonObject, spec: PactSpecification, where: string): HttpResponse {
  const headers = multiValueFromJson(json['headers'], true);
  return {
    status: typeof json['status'] === 'number' ? json['status'] : 200,
    headers,
    body: bodyFromPactJson(json['body'], headers, spec === 'V4'),
    matchingRules: rulesFromJson(json['matchingRules'], spec, where),
    generators: Generators.fromJson(json['generators']),
  };
}

function commonFromJson(json: JsonObject): Omit<HttpInteraction, 'type' | 'request' | 'response'> {
  const key = json['key'];
  return {
    ...(typeof key === 'string' ? { key } : {}),
    description: typeof json['description'] === 'string' ? json['description'] : '',
    providerStates: providerStatesFromJson(json),
    pending: json['pending'] === true,
    comments: isJsonObject(json['comments']) ? json['comments'] : {},
  };
}

function httpInteractionFromJson(json: JsonObject, spec: PactSpecification, index: number): HttpInteraction {
  const where = `interaction ${index}`;
  return {
    type: 'Synchronous/HTTP',
    ...commonFromJson(json),
    request: requestFromJson(isJsonObject(json['request']) ? json['request'] : {}, spec, where),
    response: responseFromJson(isJsonObject(json['response']) ? json['response'] : {}, spec, where),
  };
}

function messageFromJson(json: JsonObject, spec: PactSpecification, index: number): MessageInteraction {
  const metadata = isJsonObject(json['metadata']) ? json['metadata'] : {};
  const contentType = metadata['contentType'] ?? metadata['content-type'];
  const headers: MultiValueMap = typeof contentType === 'string' ? { 'Content-Type': [contentType] } : {};
  return {
    type: 'Asynchronous/Messages',
    ...commonFromJson(json),
    contents: bodyFromPactJson(json['contents'], headers, spec === 'V4'),
    metadata,
    matchingRules: rulesFromJson(json['matchingRules'], spec, `message ${index}`),
    generators: Generators.fromJson(json['generators']),
  };
}

/** Read a pact document from parsed JSON. */
export function readPact(json: unknown): PactReadResult {
  const parsed = PactDocumentSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
    return { ok: false, error: `Invalid pact document:\n${issues}` };
  }
  if (!isJsonObject(json)) return { ok: false, error: 'Invalid pact document: expected a JSON object' };
  const metadata = isJsonObject(json['metadata']) ? json['metadata'] : {};
  const specification = detectSpecification(metadata);
  const interactions: Interaction[] = [];
  try {
    const list = Array.isArray(json['interactions']) ? json['interactions'].filter(isJsonObject) : [];
    list.forEach((entry, i) => {
      const type = entry['type'];
      if (type === 'Asynchronous/Messages') interactions.push(messageFromJson(entry, specification, i));
      else if (type === undefined || type === 'Synchronous/HTTP') interactions.push(httpInteractionFromJson(entry, specification, i));
    });
    const messages = Array.isArray(json['messages']) ? json['messages'].filter(isJsonObject) : [];
    messages.forEach((entry, i) => interactions.push(messageFromJson(entry, specification, i)));
  } catch (err) {
    return { ok: false, error: (err as Error).message };
  }
  return {
    ok: true,
    pact: {
      consumer: { name: parsed.data.consumer.name },
      provider: { name: parsed.data.provider.name },
      interactions,
      metadata,
      specification,
    },
  };
}

/** Parse pact JSON text. */
export function readPactText(text: string): PactReadResult {
  try {
    return readPact(JSON.parse(text));
  } catch (err) {
    return { ok: false, error: `Invalid pact JSON: ${(err as Error).message}` };
  }
}

// =====================================================================
// Writing
// =====================================================================

/** Stable key for an interaction: its own, or a hash of description and states. */
export function interactionKey(interaction: Interaction): string {
  if (interaction.key) return interaction.key;
  const hash = createHash('sha256');
  hash.update(interaction.type);
  hash.update(interaction.description);
  for (const state of interaction.providerStates) {
    hash.update(state.name);
    hash.update(JSON.stringify(state.params));
  }
  return hash.digest('hex').slice(0, 16);
}

function headersToJson(headers: MultiValueMap, v4: boolean): JsonObject {
  const json: JsonObject = {};
  for (const [key, values] of Object.entries(headers)) {
    json[key] = v4 ? [...values] : values.join(', ');
  }
  return json;
}

function queryToJson(query: MultiValueMap, spec: PactSpecification): JsonValue | undefined {
  if (Object.keys(query).length === 0) return undefined;
  if (isV2OrEarlier(spec)) return queryToString(query);
  const json: JsonObject = {};
  for (const [key, values] of Object.entries(query)) json[key] = [...values];
  return json;
}

function statesToJson(states: ProviderState[], spec: PactSpecification, json: JsonObject): void {
  if (states.length === 0) return;
  if (isV2OrEarlier(spec)) {
    const first = states[0];
    if (first) json['providerState'] = first.name;
    return;
  }
  json['providerStates'] = states.map((state): JsonObject =>
    Object.keys(state.params).length > 0 ? { name: state.name, params: state.params } : { name: state.name });
}

function partToJson(
  part: HttpRequest | HttpResponse,
  spec: PactSpecification,
  json: JsonObject,
): JsonObject {
  const v4 = spec === 'V4';
  if (Object.keys(part.headers).length > 0) json['headers'] = headersToJson(part.headers, v4);
  const body = bodyToPactJson(part.body, v4);
  if (body !== undefined) json['body'] = body;
  if (!part.matchingRules.isEmpty()) json['matchingRules'] = part.matchingRules.toJson(spec);
  if (!isV2OrEarlier(spec) && !part.generators.isEmpty()) json['generators'] = part.generators.toJson();
  return json;
}

function httpInteractionToJson(interaction: HttpInteraction, spec: PactSpecification): JsonObject {
  const json: JsonObject = {};
  if (spec === 'V4') {
    json['type'] = 'Synchronous/HTTP';
    json['key'] = interactionKey(interaction);
    json['pending'] = interaction.pending;
  }
  json['description'] = interaction.description;
  statesToJson(interaction.providerStates, spec, json);

  const { request, response } = interaction;
  const requestJson: JsonObject = { method: request.method, path: request.path };
  const query = queryToJson(request.query, spec);
  if (query !== undefined) requestJson['query'] = query;
  json['request'] = partToJson(request, spec, requestJson);
  json['response'] = partToJson(response, spec, { status: response.status });
  if (spec === 'V4' && Object.keys(interaction.comments).length > 0) json['comments'] = interaction.comments;
  return json;
}

function messageToJson(message: MessageInteraction, spec: PactSpecification): JsonObject {
  const v4 = spec === 'V4';
  const json: JsonObject = {};
  if (v4) {
    json['type'] = 'Asynchronous/Messages';
    json['key'] = interactionKey(message);
    json['pending'] = message.pending;
  }
  json['description'] = message.description;
  statesToJson(message.providerStates, spec, json);
  const contents = bodyToPactJson(message.contents, v4);
  json['contents'] = contents ?? (v4 ? { content: null } : null);
  json['metadata'] = message.metadata;
  if (!message.matchingRules.isEmpty()) json['matchingRules'] = message.matchingRules.toJson(spec);
  if (!message.generators.isEmpty()) json['generators'] = message.generators.toJson();
  if (v4 && Object.keys(message.comments).length > 0) json['comments'] = message.comments;
  return json;
}

/** One interaction in the document form of `spec`. */
export function interactionToJson(interaction: Interaction, spec: PactSpecification): JsonObject {
  return interaction.type === 'Synchronous/HTTP'
    ? httpInteractionToJson(interaction, spec)
    : messageToJson(interaction, spec);
}

/**
 * Serialise a pact. Messages go under `messages` for V3 and under
 * `interactions` for V4; V2 and earlier carry HTTP interactions only.
 */
export function writePact(pact: Pact, spec: PactSpecification = pact.specification): JsonObject {
  const http = pact.interactions.filter((i): i is HttpInteraction => i.type === 'Synchronous/HTTP');
  const messages = pact.interactions.filter((i): i is MessageInteraction => i.type === 'Asynchronous/Messages');
  const json: JsonObject = {
    consumer: { name: pact.consumer.name },
    provider: { name: pact.provider.name },
  };
  if (spec === 'V4') {
    json['interactions'] = [
      ...http.map((i) => httpInteractionToJson(i, spec)),
      ...messages.map((m) => messageToJson(m, spec)),
    ];
  } else {
    if (http.length > 0 || messages.length === 0) json['interactions'] = http.map((i) => httpInteractionToJson(i, spec));
    if (messages.length > 0 && !isV2OrEarlier(spec)) json['messages'] = messages.map((m) => messageToJson(m, spec));
  }
  const metadata: JsonObject = { ...pact.metadata };
  delete metadata['pact-specification'];
  delete metadata['pactSpecificationVersion'];
  metadata['pactSpecification'] = { version: VERSION_NAMES[spec] };
  json['metadata'] = metadata;
  return json;
}

/** Deep copy through the V4 document form. */
export function clonePact(pact: Pact): Pact {
  const copy = readPact(writePact(pact, 'V4'));
  if (!copy.ok) throw new Error(copy.error);
  return { ...copy.pact, specification: pact.specification };
}

export function emptyRequest(): HttpRequest {
  return {
    method: 'GET',
    path: '/',
    query: {},
    headers: {},
    body: MISSING_BODY,
    matchingRules: new MatchingRules(),
    generators: new Generators(),
  };
}

export function emptyResponse(): HttpResponse {
  return {
    status: 200,
    headers: {},
    body: MISSING_BODY,
    matchingRules: new MatchingRules(),
    generators: new Generators(),
  };
}
