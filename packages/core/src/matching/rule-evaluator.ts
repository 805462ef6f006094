/**
 * @module matching/rule-evaluator
 * Single-value rule evaluation.
 *
 * `matchValue` applies one rule to one value without descending into
 * children; collection handling (array bounds, arrayContains, eachKey,
 * eachValue, values) lives in `matching/body-matcher`.
 */

import { isDeepStrictEqual } from 'node:util';
import semver from 'semver';
import type { HttpStatus, MatchingRule } from '../models/matching-rules.js';
import type { JsonValue } from '../types.js';
import { validateDateTime } from './datetime.js';

// =====================================================================
// Formatting
// =====================================================================

/** Display form used in mismatch descriptions: strings quoted, everything else JSON. */
export function formatValue(value: JsonValue | undefined): string {
  if (value === undefined) return 'missing';
  return typeof value === 'string' ? `'${value}'` : JSON.stringify(value);
}

export function typeName(value: JsonValue | undefined): string {
  if (value === undefined) return 'Missing';
  if (value === null) return 'Null';
  if (Array.isArray(value)) return 'List';
  switch (typeof value) {
    case 'boolean': return 'Boolean';
    case 'number': return Number.isInteger(value) ? 'Integer' : 'Decimal';
    case 'string': return 'String';
    default: return 'Map';
  }
}

/** Coarse type tag; integers and decimals share the Number tag. */
function tag(value: JsonValue): string {
  const name = typeName(value);
  return name === 'Integer' || name === 'Decimal' ? 'Number' : name;
}

/** Text a scalar is coerced to for regex and include rules. */
function asText(value: JsonValue): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

// =====================================================================
// Regex
// =====================================================================

export type RegexResult = { ok: true; regex: RegExp } | { ok: false; error: string };

/** Compile a pattern anchored to match the whole input. */
export function compileRegex(pattern: string): RegexResult {
  try {
    return { ok: true, regex: new RegExp(`^(?:${pattern})$`) };
  } catch (err) {
    return { ok: false, error: `Invalid regular expression '${pattern}': ${(err as Error).message}` };
  }
}

/** True when the pattern is valid and matches the whole example. */
export function checkRegex(pattern: string, example: string): boolean {
  const compiled = compileRegex(pattern);
  return compiled.ok && compiled.regex.test(example);
}

// =====================================================================
// Status codes
// =====================================================================

export function statusMatches(status: HttpStatus, code: number): boolean {
  if (Array.isArray(status)) return status.includes(code);
  switch (status) {
    case 'info': return code >= 100 && code < 200;
    case 'success': return code >= 200 && code < 300;
    case 'redirect': return code >= 300 && code < 400;
    case 'clientError': return code >= 400 && code < 500;
    case 'serverError': return code >= 500 && code < 600;
    case 'nonError': return code < 400;
    case 'error': return code >= 400;
  }
}

// =====================================================================
// Content types
// =====================================================================

const MAGIC_NUMBERS: Array<[string, number[]]> = [
  ['image/png', [0x89, 0x50, 0x4e, 0x47]],
  ['image/jpeg', [0xff, 0xd8, 0xff]],
  ['image/gif', [0x47, 0x49, 0x46, 0x38]],
  ['application/pdf', [0x25, 0x50, 0x44, 0x46]],
  ['application/zip', [0x50, 0x4b, 0x03, 0x04]],
  ['application/gzip', [0x1f, 0x8b]],
];

/** Best guess at the content type of some bytes. */
export function detectContentType(data: Buffer): string {
  for (const [type, magic] of MAGIC_NUMBERS) {
    if (magic.every((byte, i) => data[i] === byte)) return type;
  }
  const text = data.toString('utf8');
  if (text.includes('\uFFFD')) return 'application/octet-stream';
  const trimmed = text.trim();
  if (trimmed.startsWith('<?xml')) return 'application/xml';
  if (/^<!doctype html|^<html/i.test(trimmed)) return 'text/html';
  try {
    JSON.parse(trimmed);
    return 'application/json';
  } catch {
    return 'text/plain';
  }
}

function baseType(contentType: string): string {
  return contentType.split(';')[0]?.trim().toLowerCase() ?? '';
}

// =====================================================================
// Numbers
// =====================================================================

const INTEGER_TEXT = /^-?\d+$/;
const DECIMAL_TEXT = /^-?\d+\.\d+$/;
const NUMBER_TEXT = /^-?\d+(\.\d+)?([eE][+-]?\d+)?$/;

function numericMismatch(rule: 'number' | 'integer' | 'decimal', actual: JsonValue): string | undefined {
  const label = rule === 'number' ? 'a number' : rule === 'integer' ? 'an integer' : 'a decimal number';
  if (typeof actual === 'number') {
    if (rule === 'integer' && !Number.isInteger(actual)) return `Expected ${actual} to be ${label}`;
    if (rule === 'decimal' && Number.isInteger(actual)) return `Expected ${actual} to be ${label}`;
    return undefined;
  }
  if (typeof actual === 'string') {
    const pattern = rule === 'number' ? NUMBER_TEXT : rule === 'integer' ? INTEGER_TEXT : DECIMAL_TEXT;
    return pattern.test(actual) ? undefined : `Expected '${actual}' to be ${label}`;
  }
  return `Expected ${formatValue(actual)} (${typeName(actual)}) to be ${label}`;
}

// =====================================================================
// Rule evaluation
// =====================================================================

function sizeOf(value: JsonValue): number | undefined {
  return Array.isArray(value) ? value.length : undefined;
}

function items(n: number): string {
  return n === 1 ? '1 item' : `${n} items`;
}

function typeMismatch(expected: JsonValue, actual: JsonValue): string | undefined {
  if (tag(expected) === tag(actual)) return undefined;
  return `Expected ${formatValue(actual)} (${typeName(actual)}) to be the same type as ${formatValue(expected)} (${typeName(expected)})`;
}

/**
 * Apply one rule to a single value.
 *
 * @param cascaded - the rule was inherited from a parent path, so size
 *   bounds are not applied
 * @returns undefined when the value satisfies the rule, otherwise a
 *   description of the mismatch
 */
export function matchValue(
  rule: MatchingRule,
  expected: JsonValue,
  actual: JsonValue,
  cascaded = false,
): string | undefined {
  switch (rule.kind) {
    case 'equality':
      return isDeepStrictEqual(expected, actual)
        ? undefined
        : `Expected ${formatValue(actual)} to be equal to ${formatValue(expected)}`;
    case 'regex': {
      const compiled = compileRegex(rule.regex);
      if (!compiled.ok) return compiled.error;
      const text = asText(actual);
      return text !== undefined && compiled.regex.test(text)
        ? undefined
        : `Expected ${formatValue(actual)} to match '${rule.regex}'`;
    }
    case 'type':
      return typeMismatch(expected, actual);
    case 'min-type':
    case 'max-type':
    case 'min-max-type': {
      const mismatch = typeMismatch(expected, actual);
      if (mismatch || cascaded) return mismatch;
      const size = sizeOf(actual);
      if (size === undefined) return undefined;
      if (rule.kind !== 'max-type' && size < rule.min) {
        return `Expected ${formatValue(actual)} (size ${size}) to have at least ${items(rule.min)}`;
      }
      if (rule.kind !== 'min-type' && size > rule.max) {
        return `Expected ${formatValue(actual)} (size ${size}) to have at most ${items(rule.max)}`;
      }
      return undefined;
    }
    case 'timestamp':
    case 'date':
    case 'time': {
      if (typeof actual !== 'string') {
        return `Expected ${formatValue(actual)} (${typeName(actual)}) to be a ${rule.kind} string matching '${rule.format}'`;
      }
      const error = validateDateTime(actual, rule.format);
      return error === undefined ? undefined : `Expected '${actual}' to match a ${rule.kind} of '${rule.format}': ${error}`;
    }
    case 'include': {
      const text = asText(actual);
      return text !== undefined && text.includes(rule.value)
        ? undefined
        : `Expected ${formatValue(actual)} to include '${rule.value}'`;
    }
    case 'number':
    case 'integer':
    case 'decimal':
      return numericMismatch(rule.kind, actual);
    case 'null':
      return actual === null ? undefined : `Expected ${formatValue(actual)} to be a null value`;
    case 'boolean':
      return typeof actual === 'boolean' || actual === 'true' || actual === 'false'
        ? undefined
        : `Expected ${formatValue(actual)} to be a boolean`;
    case 'content-type': {
      const text = asText(actual);
      if (text === undefined) return `Expected ${formatValue(actual)} to be of type '${rule.contentType}'`;
      const detected = detectContentType(Buffer.from(text, 'utf8'));
      return baseType(detected) === baseType(rule.contentType)
        ? undefined
        : `Expected binary contents to have content type '${rule.contentType}' but detected contents was '${detected}'`;
    }
    case 'not-empty': {
      const empty = actual === null || actual === ''
        || (Array.isArray(actual) && actual.length === 0)
        || (typeof actual === 'object' && actual !== null && !Array.isArray(actual) && Object.keys(actual).length === 0);
      return empty ? `Expected ${formatValue(actual)} (${typeName(actual)}) to not be empty` : undefined;
    }
    case 'semver':
      return typeof actual === 'string' && semver.valid(actual) !== null
        ? undefined
        : `Expected ${formatValue(actual)} to be a semantic version`;
    case 'status-code':
      return typeof actual === 'number' && statusMatches(rule.status, actual)
        ? undefined
        : `Expected status code ${formatValue(actual)} to be a ${Array.isArray(rule.status) ? `one of ${rule.status.join(', ')}` : `${rule.status} status`}`;
    case 'values':
      return typeMismatch(expected, actual);
    case 'array-contains':
      return Array.isArray(actual) ? undefined : `Expected ${formatValue(actual)} (${typeName(actual)}) to be a List`;
    case 'each-key':
    case 'each-value':
      return typeof actual === 'object' && actual !== null
        ? undefined
        : `Expected ${formatValue(actual)} (${typeName(actual)}) to be a Map or List`;
  }
}
