/**
 * @module generators/generator-engine
 * Produces example values from generators.
 *
 * Generation never fails: when a generator cannot produce a value (bad
 * pattern, unknown provider-state key, no mock server URL) the placeholder
 * already present in the document is kept.
 */

import RandExp from 'randexp';
import seedrandom from 'seedrandom';
import { v4 as uuidv4 } from 'uuid';
import { DocPath } from '../models/doc-path.js';
import type { DataType, Generator, GeneratorCategory, Generators } from '../models/generators.js';
import {
  DEFAULT_DATE_FORMAT,
  DEFAULT_DATETIME_FORMAT,
  DEFAULT_TIME_FORMAT,
  evaluateDateExpression,
  formatDateTime,
} from '../matching/datetime.js';
import { isJsonObject, type Body, type HttpRequest, type HttpResponse, type JsonObject, type JsonValue, type MultiValueMap } from '../types.js';

// =====================================================================
// Context
// =====================================================================

/** Consumer mode runs in the mock server, provider mode in the verifier. */
export type GeneratorMode = 'consumer' | 'provider';

export interface GeneratorContext {
  mode: GeneratorMode;
  /** Random source in [0, 1); seeded sources make output repeatable. */
  random?: () => number;
  /** Base URL of the running mock server, for MockServerURL. */
  mockServer?: { url: string; port: number };
  /** Path of the request being answered, for RequestPath. */
  requestPath?: string;
  /** Values returned by provider-state setup, for ProviderState. */
  providerState?: JsonObject;
  baseDate?: Date;
  baseTime?: Date;
  baseDateTime?: Date;
}

/** Random source for a seed; `Math.random` when no seed is given. */
export function createRandom(seed?: string): () => number {
  return seed === undefined ? Math.random : seedrandom(seed);
}

function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick(random: () => number, chars: string): string {
  return chars.charAt(randomInt(random, 0, chars.length - 1));
}

const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const HEX = '0123456789ABCDEF';
const DIGITS = '0123456789';

// =====================================================================
// Value generators
// =====================================================================

/** Generator types that only apply in one mode. */
function appliesInMode(generator: Generator, mode: GeneratorMode): boolean {
  if (generator.type === 'ProviderState') return mode === 'provider';
  if (generator.type === 'MockServerURL' || generator.type === 'RequestPath') return mode === 'consumer';
  return true;
}

/**
 * Random string that matches a pattern. Leading `^` and trailing `$`
 * anchors are ignored.
 */
export function generateRegexValue(
  regex: string,
  random: () => number = Math.random,
): { ok: true; value: string } | { ok: false; error: string } {
  try {
    const pattern = regex.replace(/^\^/, '').replace(/(?<!\\)\$$/, '');
    const randexp = new RandExp(pattern);
    randexp.max = 20;
    randexp.randInt = (from: number, to: number): number => randomInt(random, from, to);
    return { ok: true, value: randexp.gen() };
  } catch (err) {
    return { ok: false, error: `Could not generate a value for '${regex}': ${(err as Error).message}` };
  }
}

function randomDecimal(random: () => number, digits: number): number {
  if (digits <= 0) return 0;
  let text = pick(random, '123456789');
  for (let i = 1; i < digits; i++) text += pick(random, DIGITS);
  if (digits === 1) return Number(text);
  const point = randomInt(random, 1, digits - 1);
  return Number(`${text.slice(0, point)}.${text.slice(point)}`);
}

function uuid(random: () => number, format: Extract<Generator, { type: 'Uuid' }>): string {
  const bytes = Array.from({ length: 16 }, () => randomInt(random, 0, 255));
  const value = uuidv4({ random: bytes });
  switch (format.format) {
    case 'simple': return value.replace(/-/g, '');
    case 'upper-case-hyphenated': return value.toUpperCase();
    case 'URN': return `urn:uuid:${value}`;
    default: return value;
  }
}

function coerce(value: JsonValue, dataType: DataType | undefined): JsonValue {
  const text = typeof value === 'string' ? value : JSON.stringify(value);
  switch (dataType) {
    case 'STRING':
      return text;
    case 'INTEGER': {
      const n = Number.parseInt(text, 10);
      return Number.isNaN(n) ? value : n;
    }
    case 'DECIMAL':
    case 'FLOAT': {
      const n = Number.parseFloat(text);
      return Number.isNaN(n) ? value : n;
    }
    case 'BOOLEAN':
      return text === 'true' ? true : text === 'false' ? false : value;
    default:
      return value;
  }
}

function providerStateValue(expression: string, state: JsonObject): JsonValue | undefined {
  if (!expression.includes('${')) {
    return state[expression];
  }
  const whole = /^\$\{([^}]*)\}$/.exec(expression);
  if (whole?.[1] !== undefined) {
    return state[whole[1]] ?? '';
  }
  return expression.replace(/\$\{([^}]*)\}/g, (_match, name: string) => {
    const value = state[name];
    if (value === undefined || value === null) return '';
    return typeof value === 'string' ? value : JSON.stringify(value);
  });
}

function dateValue(
  generator: Extract<Generator, { type: 'Date' | 'Time' | 'DateTime' }>,
  base: Date,
  fallback: string,
): string | undefined {
  let date = base;
  if (generator.expression) {
    const evaluated = evaluateDateExpression(generator.expression, base);
    if (!evaluated.ok) return undefined;
    date = evaluated.date;
  }
  try {
    return formatDateTime(date, generator.format ?? fallback);
  } catch {
    return undefined;
  }
}

/** The request path, or the part of it captured by the first group of `regex`. */
function requestPathValue(path: string, regex: string | undefined): string | undefined {
  if (regex === undefined) return path;
  try {
    const match = new RegExp(regex).exec(path);
    if (!match) return undefined;
    return match[1] ?? match[0];
  } catch {
    return undefined;
  }
}

/**
 * Produce a value for one generator.
 *
 * @param placeholder - value kept when the generator cannot produce one
 */
export function generateValue(generator: Generator, context: GeneratorContext, placeholder: JsonValue = null): JsonValue {
  if (!appliesInMode(generator, context.mode)) return placeholder;
  const random = context.random ?? Math.random;
  switch (generator.type) {
    case 'RandomInt':
      return randomInt(random, generator.min, generator.max);
    case 'Uuid':
      return uuid(random, generator);
    case 'RandomDecimal':
      return randomDecimal(random, generator.digits);
    case 'RandomHexadecimal':
      return Array.from({ length: generator.digits }, () => pick(random, HEX)).join('');
    case 'RandomString':
      return Array.from({ length: generator.size }, () => pick(random, ALPHANUMERIC)).join('');
    case 'Regex': {
      const result = generateRegexValue(generator.regex, random);
      return result.ok ? result.value : placeholder;
    }
    case 'Date':
      return dateValue(generator, context.baseDate ?? new Date(), DEFAULT_DATE_FORMAT) ?? placeholder;
    case 'Time':
      return dateValue(generator, context.baseTime ?? new Date(), DEFAULT_TIME_FORMAT) ?? placeholder;
    case 'DateTime':
      return dateValue(generator, context.baseDateTime ?? new Date(), DEFAULT_DATETIME_FORMAT) ?? placeholder;
    case 'RandomBoolean':
      return random() >= 0.5;
    case 'ProviderState': {
      if (!context.providerState) return placeholder;
      const value = providerStateValue(generator.expression, context.providerState);
      return value === undefined ? placeholder : coerce(value, generator.dataType);
    }
    case 'MockServerURL': {
      if (!context.mockServer) return placeholder;
      try {
        const match = new RegExp(generator.regex).exec(generator.example);
        return match?.[1] !== undefined ? `${context.mockServer.url}${match[1]}` : placeholder;
      } catch {
        return placeholder;
      }
    }
    case 'RequestPath':
      if (context.requestPath === undefined) return placeholder;
      return requestPathValue(context.requestPath, generator.regex) ?? placeholder;
    case 'ArrayContains':
      if (!Array.isArray(placeholder)) return placeholder;
      return generator.variants.reduce<JsonValue>((list, variant) => {
        if (!Array.isArray(list) || list[variant.index] === undefined) return list;
        const copy = [...list];
        copy[variant.index] = applyGenerators(list[variant.index] ?? null, variant.generators, context);
        return copy;
      }, placeholder);
  }
}

// =====================================================================
// Applying generators to documents
// =====================================================================

function replaceAt(value: JsonValue, path: DocPath, index: number, fn: (current: JsonValue) => JsonValue): JsonValue {
  const token = path.tokens[index];
  if (token === undefined) return fn(value);
  switch (token.kind) {
    case 'root':
      return replaceAt(value, path, index + 1, fn);
    case 'field': {
      if (!isJsonObject(value) || !(token.name in value)) return value;
      return { ...value, [token.name]: replaceAt(value[token.name] ?? null, path, index + 1, fn) };
    }
    case 'index': {
      if (!Array.isArray(value) || token.index >= value.length) return value;
      const copy = [...value];
      copy[token.index] = replaceAt(value[token.index] ?? null, path, index + 1, fn);
      return copy;
    }
    case 'star':
    case 'star-index': {
      if (Array.isArray(value)) return value.map((item) => replaceAt(item, path, index + 1, fn));
      if (isJsonObject(value) && token.kind === 'star') {
        const copy: JsonObject = {};
        for (const [key, item] of Object.entries(value)) copy[key] = replaceAt(item, path, index + 1, fn);
        return copy;
      }
      return value;
    }
  }
}

/** Return a copy of the value with every generator applied at its path. */
export function applyGenerators(value: JsonValue, generators: Array<[DocPath, Generator]>, context: GeneratorContext): JsonValue {
  let result = value;
  for (const [path, generator] of generators) {
    const target = path.isEmpty() ? DocPath.root() : path;
    result = replaceAt(result, target, 0, (current) => generateValue(generator, context, current));
  }
  return result;
}

export function generateBody(body: Body, generators: Array<[DocPath, Generator]>, context: GeneratorContext): Body {
  if (generators.length === 0) return body;
  if (body.kind === 'json') {
    return { ...body, value: applyGenerators(body.value, generators, context) };
  }
  if (body.kind === 'text') {
    const root = generators.find(([path]) => path.isRoot() || path.isEmpty());
    if (!root) return body;
    const value = generateValue(root[1], context, body.text);
    return { ...body, text: typeof value === 'string' ? value : JSON.stringify(value) };
  }
  return body;
}

function generateMultiValue(
  map: MultiValueMap,
  generators: Generators,
  category: GeneratorCategory,
  context: GeneratorContext,
): MultiValueMap {
  const entries = generators.get(category);
  if (entries.length === 0) return map;
  const result: MultiValueMap = { ...map };
  for (const [path, generator] of entries) {
    const key = path.toKeyString();
    const current = result[key];
    if (!current) continue;
    result[key] = current.map((value) => {
      const generated = generateValue(generator, context, value);
      return typeof generated === 'string' ? generated : JSON.stringify(generated);
    });
  }
  return result;
}

function singleValue(generators: Generators, category: GeneratorCategory, current: JsonValue, context: GeneratorContext): JsonValue {
  const [entry] = generators.get(category);
  return entry ? generateValue(entry[1], context, current) : current;
}

/** Request with its generators applied; used by the verifier in provider mode. */
export function generateRequest(request: HttpRequest, context: GeneratorContext): HttpRequest {
  const { generators } = request;
  if (generators.isEmpty()) return request;
  const path = singleValue(generators, 'path', request.path, context);
  const method = singleValue(generators, 'method', request.method, context);
  return {
    ...request,
    method: typeof method === 'string' ? method : request.method,
    path: typeof path === 'string' ? path : request.path,
    query: generateMultiValue(request.query, generators, 'query', context),
    headers: generateMultiValue(request.headers, generators, 'header', context),
    body: generateBody(request.body, generators.get('body'), context),
  };
}

/** Response with its generators applied; used by the mock server in consumer mode. */
export function generateResponse(response: HttpResponse, context: GeneratorContext): HttpResponse {
  const { generators } = response;
  const arrayContains = response.matchingRules.rulesForCategory('body')?.generators() ?? [];
  if (generators.isEmpty() && arrayContains.length === 0) return response;
  const status = singleValue(generators, 'status', response.status, context);
  return {
    ...response,
    status: typeof status === 'number' ? status : response.status,
    headers: generateMultiValue(response.headers, generators, 'header', context),
    body: generateBody(response.body, [...generators.get('body'), ...arrayContains], context),
  };
}
