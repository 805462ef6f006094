/**
 * @module handles/pact-handles
 * Handle-based builder surface for pacts, interactions and messages.
 *
 * Consumer test libraries build pacts one call at a time through integer
 * handles. Every mutator returns a boolean: false means the handle is
 * unknown, frozen by a running mock server, or the input was rejected.
 * The reason is left in the last-error slot.
 */

import { AccordError, setLastError } from '../errors.js';
import { generateBody } from '../generators/generator-engine.js';
import { DocPath } from '../models/doc-path.js';
import { headerValue, isJsonContentType, bodyFromString } from '../models/body.js';
import { Generators, type GeneratorCategory } from '../models/generators.js';
import { processIntegrationJson, processScalar, type IntegrationTarget } from '../models/integration-json.js';
import { MatchingRules, RULE_CATEGORIES, type RuleCategoryName } from '../models/matching-rules.js';
import { emptyRequest, emptyResponse, interactionToJson, writePact } from '../models/pact.js';
import { createMockServerForPact, type CreateMockServerOptions } from '../mock-server/server-manager.js';
import { writePactFile } from '../pact-writer.js';
import {
  isJsonObject,
  MISSING_BODY,
  PACT_SPECIFICATIONS,
  type Body,
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
import { HandleRegistry } from './registry.js';

export type InteractionPart = 'request' | 'response';

interface InteractionEntry {
  pact: number;
  interaction: HttpInteraction;
}

interface MessageEntry {
  pact: number;
  message: MessageInteraction;
}

const pacts = new HandleRegistry<Pact>('Pact');
const interactions = new HandleRegistry<InteractionEntry>('Interaction');
const messagePacts = new HandleRegistry<Pact>('Message pact');
const messages = new HandleRegistry<MessageEntry>('Message');

// =====================================================================
// Helpers
// =====================================================================

function parseParamValue(value: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(value);
    return parsed;
  } catch {
    return value;
  }
}

function addState(states: ProviderState[], name: string, params: JsonObject = {}): void {
  states.push({ name, params });
}

function addStateParam(states: ProviderState[], name: string, key: string, value: string): void {
  const existing = [...states].reverse().find((state) => state.name === name);
  if (existing) existing.params[key] = parseParamValue(value);
  else addState(states, name, { [key]: parseParamValue(value) });
}

function parseParams(json: string): JsonObject | undefined {
  try {
    const parsed: unknown = JSON.parse(json);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function partOf(interaction: HttpInteraction, part: InteractionPart): HttpRequest | HttpResponse {
  return part === 'request' ? interaction.request : interaction.response;
}

function targetFor(part: HttpRequest | HttpResponse | MessageInteraction, category: RuleCategoryName & GeneratorCategory): IntegrationTarget {
  return { rules: part.matchingRules.category(category), generators: part.generators, generatorCategory: category };
}

function setMultiValue(map: MultiValueMap, name: string, index: number, value: string): void {
  const values = map[name] ?? [];
  while (values.length <= index) values.push('');
  values[index] = value;
  map[name] = values;
}

/** Body for `contentType`, recording embedded matchers into `target`. */
function buildBody(contentType: string, body: string, target: IntegrationTarget): Body | string {
  if (!isJsonContentType(contentType)) return bodyFromString(body, contentType);
  let json: JsonValue;
  try {
    json = JSON.parse(body);
  } catch (err) {
    return `Body is not valid JSON: ${(err as Error).message}`;
  }
  const result = processIntegrationJson(json, target);
  if (!result.ok) return result.error;
  return { kind: 'json', value: result.value, contentType };
}

function ensureContentType(headers: MultiValueMap, contentType: string): void {
  if (headerValue(headers, 'content-type') === undefined) headers['Content-Type'] = [contentType];
}

function newPactOf(consumer: string, provider: string): Pact {
  return {
    consumer: { name: consumer },
    provider: { name: provider },
    interactions: [],
    metadata: {},
    specification: 'V3',
  };
}

function fail(code: 'INVALID_ARGUMENTS' | 'PARSE_ERROR', message: string): false {
  setLastError(code, message);
  return false;
}

/**
 * Add `interaction` to the pact. An existing interaction with the same
 * description is replaced in place and returned.
 */
function placeInteraction(pact: Pact, interaction: Interaction): Interaction | undefined {
  const index = pact.interactions.findIndex((existing) => existing.description === interaction.description);
  if (index < 0) {
    pact.interactions.push(interaction);
    return undefined;
  }
  const replaced = pact.interactions[index];
  pact.interactions[index] = interaction;
  return replaced;
}

function retireHandles<T>(registry: HandleRegistry<T>, matches: (entry: T) => boolean): void {
  for (const handle of registry.handles()) {
    const entry = registry.get(handle);
    if (entry !== undefined && matches(entry)) registry.release(handle);
  }
}

function descriptionTaken(pact: Pact | undefined, self: Interaction, description: string): boolean {
  return pact?.interactions.some((other) => other !== self && other.description === description) ?? false;
}

function duplicateDescription(description: string): false {
  return fail('INVALID_ARGUMENTS', `An interaction with the description '${description}' already exists in this pact`);
}

// =====================================================================
// Pacts & interactions
// =====================================================================

/** Start a new pact between `consumer` and `provider`. */
export function newPact(consumer: string, provider: string): number {
  return pacts.allocate(newPactOf(consumer, provider));
}

/**
 * Add an HTTP interaction to a pact.
 *
 * @returns the interaction handle, or 0 when the pact handle is unusable
 */
export function newInteraction(pact: number, description: string): number {
  const interaction: HttpInteraction = {
    type: 'Synchronous/HTTP',
    description,
    providerStates: [],
    pending: false,
    comments: {},
    request: emptyRequest(),
    response: emptyResponse(),
  };
  const added = pacts.withMutable(pact, (value) => {
    const replaced = placeInteraction(value, interaction);
    if (replaced) retireHandles(interactions, (entry) => entry.interaction === replaced);
  });
  return added ? interactions.allocate({ pact, interaction }) : 0;
}

/** Rename an interaction. Fails when another interaction in the pact already has `description`. */
export function uponReceiving(interaction: number, description: string): boolean {
  return interactions.withMutable(interaction, ({ pact, interaction: value }) => {
    if (descriptionTaken(pacts.get(pact), value, description)) return duplicateDescription(description);
    value.description = description;
    return true;
  });
}

export function given(interaction: number, state: string): boolean {
  return interactions.withMutable(interaction, ({ interaction: value }) => {
    addState(value.providerStates, state);
  });
}

/** Add a parameter to the latest state named `state`, creating it if needed. Values that parse as JSON are stored parsed. */
export function givenWithParam(interaction: number, state: string, name: string, value: string): boolean {
  return interactions.withMutable(interaction, ({ interaction: target }) => {
    addStateParam(target.providerStates, state, name, value);
  });
}

/** Add a state whose parameters are given as a JSON object. */
export function givenWithParams(interaction: number, state: string, params: string): boolean {
  const parsed = parseParams(params);
  if (!parsed) return fail('INVALID_ARGUMENTS', `Provider state parameters must be a JSON object, got '${params}'`);
  return interactions.withMutable(interaction, ({ interaction: target }) => {
    addState(target.providerStates, state, parsed);
  });
}

/** Set method and path. The path may be a matcher object written as JSON. */
export function withRequest(interaction: number, method: string, path: string): boolean {
  return interactions.withMutable(interaction, ({ interaction: target }) => {
    const request = target.request;
    const result = processScalar(path, DocPath.empty(), targetFor(request, 'path'));
    if (!result.ok) return fail('PARSE_ERROR', result.error);
    request.method = method.toUpperCase();
    request.path = typeof result.value === 'string' ? result.value : path;
    return true;
  });
}

export function withQueryParameter(interaction: number, name: string, index: number, value: string): boolean {
  return interactions.withMutable(interaction, ({ interaction: target }) => {
    const request = target.request;
    const result = processScalar(value, DocPath.root().join(name), targetFor(request, 'query'));
    if (!result.ok) return fail('PARSE_ERROR', result.error);
    setMultiValue(request.query, name, index, typeof result.value === 'string' ? result.value : value);
    return true;
  });
}

export function withHeader(interaction: number, part: InteractionPart, name: string, index: number, value: string): boolean {
  return interactions.withMutable(interaction, ({ interaction: target }) => {
    const http = partOf(target, part);
    const result = processScalar(value, DocPath.root().join(name), targetFor(http, 'header'));
    if (!result.ok) return fail('PARSE_ERROR', result.error);
    setMultiValue(http.headers, name, index, typeof result.value === 'string' ? result.value : value);
    return true;
  });
}

export function responseStatus(interaction: number, status: number): boolean {
  if (!Number.isInteger(status) || status < 100 || status > 599) {
    return fail('INVALID_ARGUMENTS', `${status} is not a valid HTTP status`);
  }
  return interactions.withMutable(interaction, ({ interaction: target }) => {
    target.response.status = status;
  });
}

/**
 * Set the body of a request or response.
 * JSON bodies may embed matcher objects; their rules and generators are
 * recorded against the part.
 */
export function withBody(interaction: number, part: InteractionPart, contentType: string, body: string): boolean {
  return interactions.withMutable(interaction, ({ interaction: target }) => {
    const http = partOf(target, part);
    const built = buildBody(contentType, body, targetFor(http, 'body'));
    if (typeof built === 'string') return fail('PARSE_ERROR', built);
    http.body = built;
    ensureContentType(http.headers, contentType);
    return true;
  });
}

/** Binary body, matched by detected content type rather than bytes. */
export function withBinaryFile(interaction: number, part: InteractionPart, contentType: string, data: Buffer): boolean {
  return interactions.withMutable(interaction, ({ interaction: target }) => {
    const http = partOf(target, part);
    http.body = data.length === 0 ? MISSING_BODY : { kind: 'binary', base64: data.toString('base64'), contentType };
    http.matchingRules.category('body').addRule(DocPath.root(), { kind: 'content-type', contentType });
    ensureContentType(http.headers, contentType);
  });
}

/** Merge matching rules given in the category JSON form into a part. */
export function withMatchingRules(interaction: number, part: InteractionPart, rulesJson: string): boolean {
  let json: unknown;
  try {
    json = JSON.parse(rulesJson);
  } catch (err) {
    return fail('PARSE_ERROR', `Matching rules are not valid JSON: ${(err as Error).message}`);
  }
  const rules = MatchingRules.fromJson(json, 'V3');
  if (typeof rules === 'string') return fail('PARSE_ERROR', rules);
  return interactions.withMutable(interaction, ({ interaction: target }) => {
    const http = partOf(target, part);
    for (const name of RULE_CATEGORIES) {
      const category = rules.rulesForCategory(name);
      if (category) http.matchingRules.addCategory(category);
    }
  });
}

export function setKey(interaction: number, key: string): boolean {
  return interactions.withMutable(interaction, ({ interaction: target }) => {
    target.key = key;
  });
}

export function setPending(interaction: number, pending: boolean): boolean {
  return interactions.withMutable(interaction, ({ interaction: target }) => {
    target.pending = pending;
  });
}

/** Set a comment; `undefined` removes it. Values that parse as JSON are stored parsed. */
export function setComment(interaction: number, key: string, value: string | undefined): boolean {
  return interactions.withMutable(interaction, ({ interaction: target }) => {
    if (value === undefined) delete target.comments[key];
    else target.comments[key] = parseParamValue(value);
  });
}

export function withSpecification(pact: number, specification: PactSpecification): boolean {
  if (!PACT_SPECIFICATIONS.includes(specification)) {
    return fail('INVALID_ARGUMENTS', `Unknown pact specification '${specification}'`);
  }
  return pacts.withMutable(pact, (value) => {
    value.specification = specification;
  });
}

/** Record `metadata[namespace][name] = value`. */
export function withPactMetadata(pact: number, namespace: string, name: string, value: string): boolean {
  return pacts.withMutable(pact, (target) => {
    const section = target.metadata[namespace];
    const entries: JsonObject = isJsonObject(section) ? section : {};
    entries[name] = value;
    target.metadata[namespace] = entries;
  });
}

/** The pact in its document form. */
export function pactHandleToJson(pact: number): string | undefined {
  const value = pacts.get(pact) ?? messagePacts.get(pact);
  if (!value) {
    setLastError('NOT_FOUND', `Pact handle ${pact} is not valid`);
    return undefined;
  }
  return JSON.stringify(writePact(value));
}

/** The pact behind a handle, for callers inside the core. */
export function pactForHandle(pact: number): Pact | undefined {
  return pacts.get(pact);
}

// =====================================================================
// Messages
// =====================================================================

export function newMessagePact(consumer: string, provider: string): number {
  return messagePacts.allocate(newPactOf(consumer, provider));
}

/** @returns the message handle, or 0 when the pact handle is unusable */
export function newMessage(pact: number, description: string): number {
  const message: MessageInteraction = {
    type: 'Asynchronous/Messages',
    description,
    providerStates: [],
    pending: false,
    comments: {},
    contents: MISSING_BODY,
    metadata: {},
    matchingRules: new MatchingRules(),
    generators: new Generators(),
  };
  const added = messagePacts.withMutable(pact, (value) => {
    const replaced = placeInteraction(value, message);
    if (replaced) retireHandles(messages, (entry) => entry.message === replaced);
  });
  return added ? messages.allocate({ pact, message }) : 0;
}

export function messageExpectsToReceive(message: number, description: string): boolean {
  return messages.withMutable(message, ({ pact, message: target }) => {
    if (descriptionTaken(messagePacts.get(pact), target, description)) return duplicateDescription(description);
    target.description = description;
    return true;
  });
}

export function messageGiven(message: number, state: string): boolean {
  return messages.withMutable(message, ({ message: target }) => {
    addState(target.providerStates, state);
  });
}

export function messageGivenWithParam(message: number, state: string, name: string, value: string): boolean {
  return messages.withMutable(message, ({ message: target }) => {
    addStateParam(target.providerStates, state, name, value);
  });
}

export function messageWithContents(message: number, contentType: string, contents: string): boolean {
  return messages.withMutable(message, ({ message: target }) => {
    const built = buildBody(contentType, contents, targetFor(target, 'body'));
    if (typeof built === 'string') return fail('PARSE_ERROR', built);
    target.contents = built;
    target.metadata['contentType'] = contentType;
    return true;
  });
}

export function messageWithMetadata(message: number, key: string, value: string): boolean {
  return messages.withMutable(message, ({ message: target }) => {
    target.metadata[key] = value;
  });
}

/**
 * The message with its generators applied, as a V3 message document.
 *
 * @returns undefined when the handle is unknown
 */
export function messageReify(message: number): string | undefined {
  const entry = messages.get(message);
  if (!entry) {
    setLastError('NOT_FOUND', `Message handle ${message} is not valid`);
    return undefined;
  }
  const source = entry.message;
  const generated: MessageInteraction = {
    ...source,
    contents: generateBody(source.contents, source.generators.get('body'), { mode: 'consumer' }),
  };
  return JSON.stringify(interactionToJson(generated, 'V3'));
}

// =====================================================================
// Persistence & lifecycle
// =====================================================================

async function writeFrom(registry: HandleRegistry<Pact>, pact: number, directory: string, overwrite: boolean): Promise<number> {
  const value = registry.get(pact);
  if (!value) {
    setLastError('NOT_FOUND', `Pact handle ${pact} is not valid`);
    return 3;
  }
  try {
    await writePactFile(value, directory, { overwrite });
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

/** Write a pact: 0 ok, 1 internal fault, 2 IO failure or conflict, 3 unknown handle. */
export function pactHandleWriteFile(pact: number, directory: string, overwrite = false): Promise<number> {
  return writeFrom(pacts, pact, directory, overwrite);
}

export function writeMessagePactFile(pact: number, directory: string, overwrite = false): Promise<number> {
  return writeFrom(messagePacts, pact, directory, overwrite);
}

/** Release a pact handle and every interaction handle created from it. */
export function freePactHandle(pact: number): boolean {
  if (!pacts.release(pact)) {
    setLastError('NOT_FOUND', `Pact handle ${pact} is not valid`);
    return false;
  }
  for (const handle of interactions.handles()) {
    if (interactions.get(handle)?.pact === pact) interactions.release(handle);
  }
  return true;
}

export function freeMessagePactHandle(pact: number): boolean {
  if (!messagePacts.release(pact)) {
    setLastError('NOT_FOUND', `Message pact handle ${pact} is not valid`);
    return false;
  }
  for (const handle of messages.handles()) {
    if (messages.get(handle)?.pact === pact) messages.release(handle);
  }
  return true;
}

/**
 * Start a mock server for a pact handle. On success the pact and its
 * interactions are frozen; later mutators on them return false.
 *
 * @returns the bound port, or a negative error code as for `createMockServer`
 */
export async function createMockServerForHandle(
  pact: number,
  address: string,
  tls = false,
  options: CreateMockServerOptions = {},
): Promise<number> {
  const value = pacts.get(pact);
  if (!value) {
    setLastError('NOT_FOUND', `Pact handle ${pact} is not valid`);
    return -1;
  }
  const port = await createMockServerForPact(value, address, tls, options);
  if (port > 0) {
    pacts.freeze(pact);
    for (const handle of interactions.handles()) {
      if (interactions.get(handle)?.pact === pact) interactions.freeze(handle);
    }
  }
  return port;
}
