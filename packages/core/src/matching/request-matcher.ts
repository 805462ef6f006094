/**
 * @module matching/request-matcher
 * Comparison of whole requests, responses and messages.
 *
 * Each part (method, path, query, headers, status, body, metadata) is
 * compared independently and every mismatch is returned.
 */

import type { MatchingRuleCategory, MatchingRules, RuleList } from '../models/matching-rules.js';
import type {
  Body,
  HttpRequest,
  HttpResponse,
  JsonObject,
  JsonValue,
  Mismatch,
  MessageInteraction,
  MultiValueMap,
} from '../types.js';
import { matchBody } from './body-matcher.js';
import { matchValue } from './rule-evaluator.js';

// =====================================================================
// Helpers
// =====================================================================

/** Apply a rule list to a string, honouring AND/OR logic. */
function applyToString(list: RuleList, expected: JsonValue, actual: JsonValue): string[] {
  const failures: string[] = [];
  for (const rule of list.rules) {
    const failure = matchValue(rule, expected, actual);
    if (failure === undefined) {
      if (list.logic === 'OR') return [];
    } else {
      failures.push(failure);
    }
  }
  return failures;
}

function keyRules(category: MatchingRuleCategory | undefined, key: string): RuleList | undefined {
  if (!category) return undefined;
  const segments = ['$', key];
  return category.matcherIsDefined(segments) ? category.selectBestMatcher(segments) : undefined;
}

function findKey(map: MultiValueMap, key: string): string | undefined {
  const lower = key.toLowerCase();
  return Object.keys(map).find((k) => k.toLowerCase() === lower);
}

function splitHeaderValues(values: string[]): string[] {
  return values.flatMap((value) => value.split(',')).map((value) => value.trim()).filter((value) => value !== '');
}

/** Content types compare on base type and on the parameters the expected value names. */
function contentTypeMatches(expected: string, actual: string): boolean {
  const parse = (value: string): [string, Map<string, string>] => {
    const [base = '', ...params] = value.split(';').map((part) => part.trim());
    const map = new Map<string, string>();
    for (const param of params) {
      const [name = '', paramValue = ''] = param.split('=').map((part) => part.trim().toLowerCase());
      if (name) map.set(name, paramValue.replace(/^"|"$/g, ''));
    }
    return [base.toLowerCase(), map];
  };
  const [expectedBase, expectedParams] = parse(expected);
  const [actualBase, actualParams] = parse(actual);
  if (expectedBase !== actualBase) return false;
  return [...expectedParams].every(([name, value]) => actualParams.get(name) === value);
}

// =====================================================================
// Request parts
// =====================================================================

export function matchMethod(expected: string, actual: string, rules: MatchingRules): Mismatch[] {
  const list = rules.rulesForCategory('method')?.asRuleList();
  const failures = list
    ? applyToString(list, expected, actual)
    : expected.toUpperCase() === actual.toUpperCase() ? [] : [`Expected method of ${expected.toUpperCase()} but received ${actual.toUpperCase()}`];
  return failures.map((mismatch) => ({ type: 'MethodMismatch', expected: expected.toUpperCase(), actual: actual.toUpperCase(), mismatch }));
}

export function matchPath(expected: string, actual: string, rules: MatchingRules): Mismatch[] {
  const list = rules.rulesForCategory('path')?.asRuleList();
  const failures = list
    ? applyToString(list, expected, actual)
    : expected === actual ? [] : [`Expected path '${expected}' but was '${actual}'`];
  return failures.map((mismatch) => ({ type: 'PathMismatch', expected, actual, mismatch }));
}

export function matchQuery(expected: MultiValueMap, actual: MultiValueMap, rules: MatchingRules): Mismatch[] {
  const category = rules.rulesForCategory('query');
  const result: Mismatch[] = [];
  for (const [parameter, expectedValues] of Object.entries(expected)) {
    const actualValues = actual[parameter];
    const expectedText = expectedValues.join(',');
    if (actualValues === undefined) {
      result.push({ type: 'QueryMismatch', parameter, expected: expectedText, actual: '',
        mismatch: `Expected query parameter '${parameter}' but was missing` });
      continue;
    }
    const actualText = actualValues.join(',');
    const list = keyRules(category, parameter);
    if (list) {
      actualValues.forEach((value, i) => {
        for (const failure of applyToString(list, expectedValues[i] ?? expectedValues[0] ?? '', value)) {
          result.push({ type: 'QueryMismatch', parameter, expected: expectedText, actual: actualText, mismatch: failure });
        }
      });
    } else if (expectedText !== actualText) {
      result.push({ type: 'QueryMismatch', parameter, expected: expectedText, actual: actualText,
        mismatch: `Expected query parameter '${parameter}' with value '${expectedText}' but was '${actualText}'` });
    }
  }
  for (const [parameter, values] of Object.entries(actual)) {
    if (!(parameter in expected)) {
      result.push({ type: 'QueryMismatch', parameter, expected: '', actual: values.join(','),
        mismatch: `Unexpected query parameter '${parameter}' received` });
    }
  }
  return result;
}

/** Expected headers must be present; extra actual headers are ignored. */
export function matchHeaders(expected: MultiValueMap, actual: MultiValueMap, rules: MatchingRules): Mismatch[] {
  const category = rules.rulesForCategory('header');
  const result: Mismatch[] = [];
  for (const [key, expectedRaw] of Object.entries(expected)) {
    const actualKey = findKey(actual, key);
    const expectedText = expectedRaw.join(', ');
    if (actualKey === undefined) {
      result.push({ type: 'HeaderMismatch', key, expected: expectedText, actual: '',
        mismatch: `Expected a header '${key}' but was missing` });
      continue;
    }
    const actualRaw = actual[actualKey] ?? [];
    const actualText = actualRaw.join(', ');
    const list = keyRules(category, key) ?? keyRules(category, actualKey);
    if (list) {
      for (const failure of applyToString(list, expectedText, actualText)) {
        result.push({ type: 'HeaderMismatch', key, expected: expectedText, actual: actualText,
          mismatch: `Mismatch with header '${key}': ${failure}` });
      }
      continue;
    }
    const matches = key.toLowerCase() === 'content-type'
      ? contentTypeMatches(expectedText, actualText)
      : splitHeaderValues(expectedRaw).join(',') === splitHeaderValues(actualRaw).join(',');
    if (!matches) {
      result.push({ type: 'HeaderMismatch', key, expected: expectedText, actual: actualText,
        mismatch: `Expected header '${key}' to have value '${expectedText}' but was '${actualText}'` });
    }
  }
  return result;
}

export function matchStatus(expected: number, actual: number, rules: MatchingRules): Mismatch[] {
  const list = rules.rulesForCategory('status')?.asRuleList();
  const failures = list
    ? applyToString(list, expected, actual)
    : expected === actual ? [] : [`expected ${expected} but was ${actual}`];
  return failures.map((mismatch) => ({ type: 'StatusMismatch', expected, actual, mismatch }));
}

// =====================================================================
// Whole messages
// =====================================================================

/** Compare an incoming request with an expected one. Unexpected body keys are mismatches. */
export function matchRequest(expected: HttpRequest, actual: HttpRequest): Mismatch[] {
  const rules = expected.matchingRules;
  return [
    ...matchMethod(expected.method, actual.method, rules),
    ...matchPath(expected.path, actual.path, rules),
    ...matchQuery(expected.query, actual.query, rules),
    ...matchHeaders(expected.headers, actual.headers, rules),
    ...matchBody(expected.body, actual.body, rules.rulesForCategory('body'), false),
  ];
}

/** Compare a provider response with the expected one. Extra body keys are tolerated. */
export function matchResponse(expected: HttpResponse, actual: HttpResponse): Mismatch[] {
  const rules = expected.matchingRules;
  return [
    ...matchStatus(expected.status, actual.status, rules),
    ...matchHeaders(expected.headers, actual.headers, rules),
    ...matchBody(expected.body, actual.body, rules.rulesForCategory('body'), true),
  ];
}

/** Compare produced message contents and metadata with the expected message. */
export function matchMessage(expected: MessageInteraction, actualContents: Body, actualMetadata: JsonObject): Mismatch[] {
  const result = matchBody(expected.contents, actualContents, expected.matchingRules.rulesForCategory('body'), true);
  const category = expected.matchingRules.rulesForCategory('metadata');
  for (const [key, value] of Object.entries(expected.metadata)) {
    if (key.toLowerCase() === 'contenttype' || key.toLowerCase() === 'content-type') continue;
    const actualValue = actualMetadata[key];
    const expectedText = typeof value === 'string' ? value : JSON.stringify(value);
    if (actualValue === undefined) {
      result.push({ type: 'MetadataMismatch', key, expected: expectedText, actual: '',
        mismatch: `Expected message metadata '${key}' but was missing` });
      continue;
    }
    const actualText = typeof actualValue === 'string' ? actualValue : JSON.stringify(actualValue);
    const list = keyRules(category, key);
    const failures = list
      ? applyToString(list, value, actualValue)
      : expectedText === actualText ? [] : [`Expected metadata key '${key}' to have value '${expectedText}' but was '${actualText}'`];
    for (const failure of failures) {
      result.push({ type: 'MetadataMismatch', key, expected: expectedText, actual: actualText, mismatch: failure });
    }
  }
  return result;
}
