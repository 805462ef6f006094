/**
 * @module matching/body-matcher
 * Recursive comparison of value trees under matching rules.
 *
 * Every node is compared; a failure never stops the walk, so one pass
 * reports all mismatches. Rules are looked up per node with best-matcher
 * selection, and rules inherited from a parent path apply as cascaded.
 */

import { DocPath, type PathSegments } from '../models/doc-path.js';
import {
  isTypeRule,
  MatchingRuleCategory,
  type MatchingRule,
  type MatchingRuleDefinition,
  type RuleList,
} from '../models/matching-rules.js';
import { isJsonObject, type Body, type JsonObject, type JsonValue, type Mismatch } from '../types.js';
import { detectContentType, formatValue, matchValue, typeName } from './rule-evaluator.js';

// =====================================================================
// Types
// =====================================================================

/** A failed comparison at one node, with any member failures nested under it. */
export interface RuleMismatch {
  path: string;
  expected: JsonValue;
  actual: JsonValue;
  description: string;
  children?: RuleMismatch[];
}

export type MatchResult = { matched: true } | { matched: false; mismatches: RuleMismatch[] };

export interface MatchContext {
  rules: MatchingRuleCategory;
  /** Extra keys in actual maps are tolerated (responses and messages). */
  allowUnexpectedKeys: boolean;
}

/** Rules that only make sense at the exact path they were declared on. */
const NON_CASCADING = new Set<MatchingRule['kind']>(['values', 'each-key', 'each-value', 'array-contains']);

function segmentsOf(path: DocPath): PathSegments {
  return path.tokens.map((token) => {
    switch (token.kind) {
      case 'root': return '$';
      case 'field': return token.name;
      case 'index': return String(token.index);
      default: return '*';
    }
  });
}

function mismatch(path: DocPath, expected: JsonValue | undefined, actual: JsonValue | undefined, description: string): RuleMismatch {
  return { path: path.toString(), expected: expected ?? null, actual: actual ?? null, description };
}

function rebase(mismatches: RuleMismatch[], path: DocPath): RuleMismatch[] {
  const prefix = path.toString();
  return mismatches.map((m) => ({
    ...m,
    path: m.path.replace(/^\$/, prefix),
    ...(m.children ? { children: rebase(m.children, path) } : {}),
  }));
}

// =====================================================================
// Rule application
// =====================================================================

function applicableRules(list: RuleList): MatchingRule[] {
  return list.cascaded ? list.rules.filter((rule) => !NON_CASCADING.has(rule.kind)) : list.rules;
}

/** Apply a rule list to the node itself, honouring AND/OR logic. */
function applyRules(path: DocPath, expected: JsonValue, actual: JsonValue, list: RuleList): RuleMismatch[] {
  const failures: string[] = [];
  let anyPassed = false;
  for (const rule of applicableRules(list)) {
    const failure = matchValue(rule, expected, actual, list.cascaded);
    if (failure === undefined) anyPassed = true;
    else failures.push(failure);
  }
  if (list.logic === 'OR' && anyPassed) return [];
  return failures.map((description) => mismatch(path, expected, actual, description));
}

function ruleListAt(path: DocPath, context: MatchContext): RuleList | undefined {
  const segments = segmentsOf(path);
  return context.rules.matcherIsDefined(segments) ? context.rules.selectBestMatcher(segments) : undefined;
}

function hasRule(list: RuleList | undefined, kind: MatchingRule['kind']): boolean {
  return list !== undefined && applicableRules(list).some((rule) => rule.kind === kind);
}

/** Compare a value against a nested definition, as used by eachKey and eachValue. */
function matchDefinition(
  path: DocPath,
  definition: MatchingRuleDefinition,
  expected: JsonValue | undefined,
  actual: JsonValue,
  context: MatchContext,
): RuleMismatch[] {
  const rules = new MatchingRuleCategory('body');
  for (const rule of definition.rules) {
    if (rule.kind !== 'reference') rules.addRule(DocPath.root(), rule);
  }
  if (rules.isEmpty() && expected === undefined) return [];
  const example = definition.value !== '' && definition.value !== null ? definition.value : expected ?? definition.value;
  return rebase(compareJson(DocPath.root(), example, actual, { ...context, rules }), path);
}

// =====================================================================
// Comparison
// =====================================================================

/**
 * Compare an expected value tree with an actual one.
 *
 * @returns every mismatch found; empty when the trees match
 */
export function compareJson(path: DocPath, expected: JsonValue, actual: JsonValue, context: MatchContext): RuleMismatch[] {
  const list = ruleListAt(path, context);
  if (isJsonObject(expected)) {
    if (isJsonObject(actual)) return compareMaps(path, expected, actual, context, list);
    if (list) return applyRules(path, expected, actual, list);
    return [mismatch(path, expected, actual,
      `Type mismatch: Expected Map ${formatValue(expected)} but received ${typeName(actual)} ${formatValue(actual)}`)];
  }
  if (Array.isArray(expected)) {
    if (Array.isArray(actual)) return compareLists(path, expected, actual, context, list);
    if (list) return applyRules(path, expected, actual, list);
    return [mismatch(path, expected, actual,
      `Type mismatch: Expected List ${formatValue(expected)} but received ${typeName(actual)} ${formatValue(actual)}`)];
  }
  if (list) return applyRules(path, expected, actual, list);
  if (expected === actual) return [];
  return [mismatch(path, expected, actual,
    `Expected ${formatValue(expected)} (${typeName(expected)}) but received ${formatValue(actual)} (${typeName(actual)})`)];
}

function compareMaps(
  path: DocPath,
  expected: JsonObject,
  actual: JsonObject,
  context: MatchContext,
  list: RuleList | undefined,
): RuleMismatch[] {
  const result: RuleMismatch[] = list ? applyRules(path, expected, actual, list) : [];
  const firstExpected = Object.values(expected)[0];

  if (list) {
    for (const rule of applicableRules(list)) {
      if (rule.kind === 'each-key') {
        const children = Object.keys(actual).flatMap((key) =>
          matchDefinition(path.join(key), rule.definition, undefined, key, context));
        if (children.length > 0) {
          result.push({ ...mismatch(path, expected, actual, `${children.length} key(s) of ${formatValue(actual)} did not match`), children });
        }
      } else if (rule.kind === 'each-value') {
        const children = Object.entries(actual).flatMap(([key, value]) =>
          matchDefinition(path.join(key), rule.definition, expected[key] ?? firstExpected, value, context));
        if (children.length > 0) {
          result.push({ ...mismatch(path, expected, actual, `${children.length} value(s) of ${formatValue(actual)} did not match`), children });
        }
      }
    }
  }

  if (hasRule(list, 'each-key') || hasRule(list, 'each-value')) return result;

  if (hasRule(list, 'values')) {
    for (const [key, value] of Object.entries(actual)) {
      const example = expected[key] ?? firstExpected;
      if (example !== undefined) result.push(...compareJson(path.join(key), example, value, context));
    }
    return result;
  }

  const expectedKeys = Object.keys(expected);
  if (expectedKeys.length === 0 && Object.keys(actual).length > 0 && !list) {
    result.push(mismatch(path, expected, actual, `Expected an empty Map but received ${formatValue(actual)}`));
    return result;
  }

  for (const [key, value] of Object.entries(expected)) {
    const actualValue = actual[key];
    if (actualValue === undefined) {
      result.push(mismatch(path.join(key), value, undefined, `Expected entry ${key}=${formatValue(value)} but was missing`));
    } else {
      result.push(...compareJson(path.join(key), value, actualValue, context));
    }
  }

  const typeGoverned = list !== undefined && list.rules.some(isTypeRule);
  const unexpected = Object.keys(actual).filter((key) => !(key in expected));
  if (!context.allowUnexpectedKeys && !typeGoverned && unexpected.length > 0) {
    result.push(mismatch(path, expected, actual,
      `Expected a Map with keys [${expectedKeys.join(', ')}] but received one with keys [${Object.keys(actual).join(', ')}]`));
  }
  return result;
}

function compareLists(
  path: DocPath,
  expected: JsonValue[],
  actual: JsonValue[],
  context: MatchContext,
  list: RuleList | undefined,
): RuleMismatch[] {
  if (!list) {
    const result: RuleMismatch[] = [];
    const shared = Math.min(expected.length, actual.length);
    for (let i = 0; i < shared; i++) {
      result.push(...compareJson(path.pushIndex(i), expected[i] ?? null, actual[i] ?? null, context));
    }
    if (expected.length !== actual.length) {
      result.push(mismatch(path, expected, actual,
        `Expected a List with ${expected.length} elements but received ${actual.length} elements`));
    }
    return result;
  }

  const result = applyRules(path, expected, actual, list);
  const rules = applicableRules(list);

  const arrayContains = rules.filter((rule) => rule.kind === 'array-contains');
  if (arrayContains.length > 0) {
    for (const rule of arrayContains) {
      if (rule.kind === 'array-contains') result.push(...matchArrayContains(path, rule.variants, expected, actual, context));
    }
    return result;
  }

  for (const rule of rules) {
    if (rule.kind === 'each-value') {
      const children = actual.flatMap((value, i) =>
        matchDefinition(path.pushIndex(i), rule.definition, expected[i] ?? expected[0], value, context));
      if (children.length > 0) {
        result.push({ ...mismatch(path, expected, actual, `${children.length} item(s) of ${formatValue(actual)} did not match`), children });
      }
    }
  }
  if (hasRule(list, 'each-value')) return result;

  if (rules.some((rule) => isTypeRule(rule) || rule.kind === 'values')) {
    actual.forEach((value, i) => {
      const example = expected[i] ?? expected[0];
      if (example !== undefined) result.push(...compareJson(path.pushIndex(i), example, value, context));
    });
  }
  return result;
}

/**
 * Each variant must match some element of the actual list; the first
 * element that matches is taken. Element order does not matter.
 */
function matchArrayContains(
  path: DocPath,
  variants: Array<{ index: number; rules: MatchingRuleCategory }>,
  expected: JsonValue[],
  actual: JsonValue[],
  context: MatchContext,
): RuleMismatch[] {
  const result: RuleMismatch[] = [];
  for (const variant of variants) {
    const example = expected[variant.index];
    if (example === undefined) {
      result.push(mismatch(path, expected, actual, `ArrayContains: variant ${variant.index} is not in the expected list`));
      continue;
    }
    const variantContext: MatchContext = { rules: variant.rules, allowUnexpectedKeys: context.allowUnexpectedKeys };
    const found = actual.some((element) => compareJson(DocPath.root(), example, element, variantContext).length === 0);
    if (!found) {
      const searched = actual.length === 0 ? 'the list was empty' : `searched indexes 0..${actual.length - 1}`;
      result.push(mismatch(path, example, actual,
        `Variant at index ${variant.index} (${formatValue(example)}) was not found in the actual list (${searched})`));
    }
  }
  return result;
}

// =====================================================================
// Entry points
// =====================================================================

/**
 * Evaluate one rule against a value, descending into children the way a
 * rule declared at `path` would.
 */
export function evaluate(
  rule: MatchingRule,
  expected: JsonValue,
  actual: JsonValue,
  path = '$',
  allowUnexpectedKeys = true,
): MatchResult {
  const rules = new MatchingRuleCategory('body');
  rules.addRule(DocPath.root(), rule);
  const mismatches = compareJson(DocPath.root(), expected, actual, { rules, allowUnexpectedKeys });
  if (mismatches.length === 0) return { matched: true };
  const base = DocPath.tryParse(path);
  return { matched: false, mismatches: base.ok ? rebase(mismatches, base.path) : mismatches };
}

/** Leaf mismatches of a nested tree, in walk order. */
export function flattenMismatches(mismatches: RuleMismatch[]): RuleMismatch[] {
  return mismatches.flatMap((m) => (m.children && m.children.length > 0 ? flattenMismatches(m.children) : [m]));
}

function toBodyMismatches(mismatches: RuleMismatch[]): Mismatch[] {
  return flattenMismatches(mismatches).map((m) => ({
    type: 'BodyMismatch',
    path: m.path,
    expected: m.expected,
    actual: m.actual,
    mismatch: m.description,
  }));
}

function baseType(contentType: string | undefined): string | undefined {
  return contentType?.split(';')[0]?.trim().toLowerCase();
}

/**
 * Compare request, response or message contents.
 *
 * A missing expected body accepts anything. Differing content types are a
 * BodyTypeMismatch; JSON is compared node by node, text and binary as a
 * whole under any rule at `$`.
 */
export function matchBody(expected: Body, actual: Body, rules: MatchingRuleCategory | undefined, allowUnexpectedKeys: boolean): Mismatch[] {
  if (expected.kind === 'missing') return [];
  const context: MatchContext = { rules: rules ?? new MatchingRuleCategory('body'), allowUnexpectedKeys };
  if (actual.kind === 'missing') {
    if (expected.kind === 'json' && expected.value === null) return [];
    return [{ type: 'BodyMismatch', path: '$', expected: bodyAsValue(expected), actual: null, mismatch: 'Expected a body but was missing' }];
  }

  const expectedType = baseType(expected.contentType);
  const actualType = baseType(actual.contentType);
  if (expectedType && actualType && expectedType !== actualType && !(expected.kind === 'json' && actual.kind === 'json')) {
    return [{
      type: 'BodyTypeMismatch',
      expected: expectedType,
      actual: actualType,
      mismatch: `Expected a body of '${expectedType}' but the actual content type was '${actualType}'`,
    }];
  }

  if (expected.kind === 'json' && actual.kind === 'json') {
    return toBodyMismatches(compareJson(DocPath.root(), expected.value, actual.value, context));
  }
  if (expected.kind === 'binary' || actual.kind === 'binary') {
    const list = context.rules.selectBestMatcher(['$']);
    const contentTypeRule = list?.rules.find((rule) => rule.kind === 'content-type');
    if (contentTypeRule?.kind === 'content-type') {
      const detected = detectContentType(Buffer.from(actual.kind === 'binary' ? actual.base64 : bodyText(actual), actual.kind === 'binary' ? 'base64' : 'utf8'));
      return baseType(detected) === baseType(contentTypeRule.contentType) ? [] : [{
        type: 'BodyMismatch', path: '$', expected: contentTypeRule.contentType, actual: detected,
        mismatch: `Expected binary contents to have content type '${contentTypeRule.contentType}' but detected contents was '${detected}'`,
      }];
    }
  }
  const expectedValue = bodyAsValue(expected);
  const actualValue = bodyAsValue(actual);
  return toBodyMismatches(compareJson(DocPath.root(), expectedValue, actualValue, context));
}

function bodyText(body: Body): string {
  switch (body.kind) {
    case 'missing': return '';
    case 'json': return JSON.stringify(body.value);
    case 'text': return body.text;
    case 'binary': return Buffer.from(body.base64, 'base64').toString('utf8');
  }
}

function bodyAsValue(body: Body): JsonValue {
  if (body.kind === 'json') return body.value;
  if (body.kind === 'binary') return body.base64;
  return bodyText(body);
}
