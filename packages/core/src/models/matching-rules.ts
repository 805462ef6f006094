/**
 * @module models/matching-rules
 * Matching rule variants, rule lists and per-category rule collections.
 *
 * Rules are a closed union discriminated on `kind`; evaluation lives in
 * `matching/rule-evaluator`. This module owns the data model, best-matcher
 * selection by path weight, and the V2/V3 pact JSON forms.
 */

import { DocPath, type PathSegments } from './doc-path.js';
import { generatorFromJson, generatorToJson, type Generator } from './generators.js';
import { isJsonObject, type JsonObject, type JsonValue, type PactSpecification } from '../types.js';

// =====================================================================
// Rule variants
// =====================================================================

/** Groups of HTTP status codes, or an explicit code list. */
export type HttpStatus =
  | 'info'
  | 'success'
  | 'redirect'
  | 'clientError'
  | 'serverError'
  | 'nonError'
  | 'error'
  | number[];

/** One `arrayContains` variant: the example index it was taken from and its own rules. */
export interface ArrayContainsVariant {
  index: number;
  rules: MatchingRuleCategory;
  generators: Array<[DocPath, Generator]>;
}

/** Example value type recorded by the expression parser. */
export type ValueType = 'unknown' | 'string' | 'number' | 'integer' | 'decimal' | 'boolean';

/** Named reference to a reusable definition, written `matching($'name')`. */
export interface MatchingReference {
  kind: 'reference';
  name: string;
}

/**
 * Parsed matcher expression: example value, ordered rules and at most one
 * generator. No rules and no generator means "match by equality".
 */
export interface MatchingRuleDefinition {
  value: JsonValue;
  valueType: ValueType;
  rules: Array<MatchingRule | MatchingReference>;
  generator?: Generator;
}

export type MatchingRule =
  | { kind: 'equality' }
  | { kind: 'regex'; regex: string }
  | { kind: 'type' }
  | { kind: 'min-type'; min: number }
  | { kind: 'max-type'; max: number }
  | { kind: 'min-max-type'; min: number; max: number }
  | { kind: 'timestamp'; format: string }
  | { kind: 'time'; format: string }
  | { kind: 'date'; format: string }
  | { kind: 'include'; value: string }
  | { kind: 'number' }
  | { kind: 'integer' }
  | { kind: 'decimal' }
  | { kind: 'null' }
  | { kind: 'boolean' }
  | { kind: 'content-type'; contentType: string }
  | { kind: 'array-contains'; variants: ArrayContainsVariant[] }
  | { kind: 'values' }
  | { kind: 'status-code'; status: HttpStatus }
  | { kind: 'not-empty' }
  | { kind: 'semver' }
  | { kind: 'each-key'; definition: MatchingRuleDefinition }
  | { kind: 'each-value'; definition: MatchingRuleDefinition };

export type MatchingRuleKind = MatchingRule['kind'];

export type RuleLogic = 'AND' | 'OR';

/** Rules attached to one path, combined with AND or OR. */
export interface RuleList {
  rules: MatchingRule[];
  logic: RuleLogic;
  /** True when the list was selected through a parent path rather than an exact one. */
  cascaded: boolean;
}

export function emptyRuleList(logic: RuleLogic = 'AND'): RuleList {
  return { rules: [], logic, cascaded: false };
}

export function isTypeRule(rule: MatchingRule): boolean {
  return rule.kind === 'type' || rule.kind === 'min-type' || rule.kind === 'max-type' || rule.kind === 'min-max-type';
}

// =====================================================================
// Rule JSON
// =====================================================================

export type RuleJsonResult = { ok: true; rule: MatchingRule } | { ok: false; error: string };

const HTTP_STATUS_NAMES = ['info', 'success', 'redirect', 'clientError', 'serverError', 'nonError', 'error'] as const;

function jsonToString(value: JsonValue | undefined): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value ?? null);
}

function jsonToNumber(value: JsonValue | undefined): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) return Number(value);
  return undefined;
}

function statusFromJson(value: JsonValue | undefined): HttpStatus | undefined {
  if (Array.isArray(value)) {
    const codes = value.map((code) => jsonToNumber(code));
    return codes.every((code): code is number => code !== undefined) ? codes : undefined;
  }
  return HTTP_STATUS_NAMES.find((name) => name === value);
}

function definitionFromJson(json: JsonObject): MatchingRuleDefinition | string {
  const rules: MatchingRule[] = [];
  const list = Array.isArray(json['rules']) ? json['rules'] : [];
  for (const entry of list) {
    const result = matchingRuleFromJson(entry);
    if (!result.ok) return result.error;
    rules.push(result.rule);
  }
  const value = json['value'] ?? '';
  const generator = generatorFromJson(json['generator']);
  return {
    value,
    valueType: 'unknown',
    rules,
    ...(generator ? { generator } : {}),
  };
}

function definitionToJson(definition: MatchingRuleDefinition): JsonObject {
  const json: JsonObject = {
    value: definition.value,
    rules: definition.rules
      .filter((rule): rule is MatchingRule => rule.kind !== 'reference')
      .map((rule) => matchingRuleToJson(rule)),
  };
  if (definition.generator) json['generator'] = generatorToJson(definition.generator);
  return json;
}

/**
 * Create a rule from its pact JSON form.
 *
 * Accepts the legacy aliases (`real`, bare `min`/`max`, `datetime`, a
 * `format` attribute) and infers the rule type from the attributes when
 * `match` is absent.
 */
export function matchingRuleFromJson(json: JsonValue): RuleJsonResult {
  if (!isJsonObject(json)) {
    return { ok: false, error: `Matching rule attributes ${JSON.stringify(json)} are not valid` };
  }
  const match = json['match'];
  let ruleType = typeof match === 'string' ? match : undefined;
  if (ruleType === undefined) {
    if (json['regex'] !== undefined) ruleType = 'regex';
    else if (json['min'] !== undefined && json['max'] !== undefined) ruleType = 'type';
    else if (json['min'] !== undefined) ruleType = 'min';
    else if (json['max'] !== undefined) ruleType = 'max';
    else if (json['timestamp'] !== undefined) ruleType = 'timestamp';
    else if (json['time'] !== undefined) ruleType = 'time';
    else if (json['date'] !== undefined) ruleType = 'date';
    else return { ok: false, error: `Matching rule missing 'match' field and unable to guess its type: ${JSON.stringify(json)}` };
  }

  const min = jsonToNumber(json['min']);
  const max = jsonToNumber(json['max']);
  switch (ruleType) {
    case 'regex':
      return json['regex'] === undefined
        ? { ok: false, error: 'Regex matcher missing \'regex\' field' }
        : { ok: true, rule: { kind: 'regex', regex: jsonToString(json['regex']) } };
    case 'equality':
      return { ok: true, rule: { kind: 'equality' } };
    case 'include':
      return json['value'] === undefined
        ? { ok: false, error: 'Include matcher missing \'value\' field' }
        : { ok: true, rule: { kind: 'include', value: jsonToString(json['value']) } };
    case 'type':
      if (min !== undefined && max !== undefined) return { ok: true, rule: { kind: 'min-max-type', min, max } };
      if (min !== undefined) return { ok: true, rule: { kind: 'min-type', min } };
      if (max !== undefined) return { ok: true, rule: { kind: 'max-type', max } };
      return { ok: true, rule: { kind: 'type' } };
    case 'min':
      return min === undefined
        ? { ok: false, error: 'Min matcher missing \'min\' field' }
        : { ok: true, rule: { kind: 'min-type', min } };
    case 'max':
      return max === undefined
        ? { ok: false, error: 'Max matcher missing \'max\' field' }
        : { ok: true, rule: { kind: 'max-type', max } };
    case 'number':
    case 'integer':
    case 'decimal':
    case 'boolean':
    case 'null':
    case 'values':
    case 'semver':
      return { ok: true, rule: { kind: ruleType } };
    case 'real':
      return { ok: true, rule: { kind: 'decimal' } };
    case 'notEmpty':
      return { ok: true, rule: { kind: 'not-empty' } };
    case 'timestamp':
    case 'datetime': {
      const format = json['format'] ?? json[ruleType];
      return format === undefined
        ? { ok: false, error: 'Timestamp matcher missing \'timestamp\' or \'format\' field' }
        : { ok: true, rule: { kind: 'timestamp', format: jsonToString(format) } };
    }
    case 'date':
    case 'time': {
      const format = json['format'] ?? json[ruleType];
      if (format === undefined) {
        const label = ruleType === 'date' ? 'Date' : 'Time';
        return { ok: false, error: `${label} matcher missing '${ruleType}' or 'format' field` };
      }
      return { ok: true, rule: { kind: ruleType, format: jsonToString(format) } };
    }
    case 'contentType':
      return json['value'] === undefined
        ? { ok: false, error: 'ContentType matcher missing \'value\' field' }
        : { ok: true, rule: { kind: 'content-type', contentType: jsonToString(json['value']) } };
    case 'arrayContains': {
      const variants = json['variants'];
      if (!Array.isArray(variants)) {
        return { ok: false, error: 'ArrayContains matcher missing \'variants\' field' };
      }
      const parsed: ArrayContainsVariant[] = [];
      for (const variant of variants) {
        if (!isJsonObject(variant)) continue;
        const rules = new MatchingRuleCategory('body');
        if (variant['rules'] !== undefined) {
          const error = rules.addRulesFromJson(variant['rules']);
          if (error) return { ok: false, error: `Unable to parse matching rules: ${error}` };
        } else {
          rules.addRule(DocPath.empty(), { kind: 'equality' });
        }
        const generators: Array<[DocPath, Generator]> = [];
        const generatorJson = variant['generators'];
        if (isJsonObject(generatorJson)) {
          for (const [key, value] of Object.entries(generatorJson)) {
            const path = DocPath.tryParse(key);
            const generator = generatorFromJson(value);
            if (path.ok && generator) generators.push([path.path, generator]);
          }
        }
        parsed.push({ index: jsonToNumber(variant['index']) ?? 0, rules, generators });
      }
      return { ok: true, rule: { kind: 'array-contains', variants: parsed } };
    }
    case 'statusCode': {
      const status = statusFromJson(json['status']);
      return status === undefined
        ? { ok: false, error: `StatusCode matcher has an invalid 'status' field: ${JSON.stringify(json['status'] ?? null)}` }
        : { ok: true, rule: { kind: 'status-code', status } };
    }
    case 'eachKey':
    case 'eachValue': {
      const definition = definitionFromJson(json);
      if (typeof definition === 'string') return { ok: false, error: definition };
      return { ok: true, rule: { kind: ruleType === 'eachKey' ? 'each-key' : 'each-value', definition } };
    }
    default:
      return { ok: false, error: `'${ruleType}' is not a valid matching rule type` };
  }
}

/** Serialise a rule to its pact JSON form. */
export function matchingRuleToJson(rule: MatchingRule): JsonObject {
  switch (rule.kind) {
    case 'equality':
    case 'type':
    case 'number':
    case 'integer':
    case 'decimal':
    case 'boolean':
    case 'null':
    case 'values':
    case 'semver':
      return { match: rule.kind };
    case 'regex':
      return { match: 'regex', regex: rule.regex };
    case 'min-type':
      return { match: 'type', min: rule.min };
    case 'max-type':
      return { match: 'type', max: rule.max };
    case 'min-max-type':
      return { match: 'type', min: rule.min, max: rule.max };
    case 'timestamp':
      return { match: 'timestamp', timestamp: rule.format };
    case 'time':
      return { match: 'time', time: rule.format };
    case 'date':
      return { match: 'date', date: rule.format };
    case 'include':
      return { match: 'include', value: rule.value };
    case 'content-type':
      return { match: 'contentType', value: rule.contentType };
    case 'not-empty':
      return { match: 'notEmpty' };
    case 'status-code':
      return { match: 'statusCode', status: Array.isArray(rule.status) ? [...rule.status] : rule.status };
    case 'array-contains':
      return {
        match: 'arrayContains',
        variants: rule.variants.map((variant) => {
          const json: JsonObject = { index: variant.index, rules: variant.rules.toV3Json() };
          if (variant.generators.length > 0) {
            const generators: JsonObject = {};
            for (const [path, generator] of variant.generators) {
              generators[path.toString()] = generatorToJson(generator);
            }
            json['generators'] = generators;
          }
          return json;
        }),
      };
    case 'each-key':
      return { match: 'eachKey', ...definitionToJson(rule.definition) };
    case 'each-value':
      return { match: 'eachValue', ...definitionToJson(rule.definition) };
  }
}

// =====================================================================
// Rule categories
// =====================================================================

export type RuleCategoryName = 'method' | 'path' | 'header' | 'query' | 'body' | 'status' | 'metadata';

export const RULE_CATEGORIES: readonly RuleCategoryName[] = [
  'method', 'path', 'header', 'query', 'body', 'status', 'metadata',
];

/** Categories whose rules are keyed by a path into a collection. */
const COLLECTION_CATEGORIES: ReadonlySet<RuleCategoryName> = new Set(['header', 'query', 'body', 'metadata']);

interface RuleEntry {
  path: DocPath;
  list: RuleList;
}

/** All rules of one category, keyed by canonical path text. */
export class MatchingRuleCategory {
  private readonly entries = new Map<string, RuleEntry>();

  constructor(readonly name: RuleCategoryName) {}

  addRule(path: DocPath, rule: MatchingRule, logic: RuleLogic = 'AND'): void {
    const key = path.toString();
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { path, list: emptyRuleList(logic) };
      this.entries.set(key, entry);
    }
    entry.list.rules.push(rule);
  }

  addRuleList(path: DocPath, list: RuleList): void {
    for (const rule of list.rules) {
      this.addRule(path, rule, list.logic);
    }
  }

  /** Add every rule of another category, appending to lists on shared paths. */
  addAll(other: MatchingRuleCategory): void {
    for (const entry of other.entries.values()) {
      this.addRuleList(entry.path, entry.list);
    }
  }

  isEmpty(): boolean {
    return this.entries.size === 0;
  }

  get size(): number {
    return this.entries.size;
  }

  paths(): DocPath[] {
    return [...this.entries.values()].map((entry) => entry.path);
  }

  /** Rule list registered at exactly this path. */
  rulesAt(path: DocPath): RuleList | undefined {
    return this.entries.get(path.toString())?.list;
  }

  filter(predicate: (path: DocPath, list: RuleList) => boolean): MatchingRuleCategory {
    const category = new MatchingRuleCategory(this.name);
    for (const entry of this.entries.values()) {
      if (predicate(entry.path, entry.list)) category.addRuleList(entry.path, entry.list);
    }
    return category;
  }

  /** Rules whose path matches the segments; the whole category for scalar categories. */
  resolveMatchersForPath(path: PathSegments): MatchingRuleCategory {
    if (!COLLECTION_CATEGORIES.has(this.name)) return this;
    return this.filter((docPath) => docPath.matchesPath(path));
  }

  matcherIsDefined(path: PathSegments): boolean {
    return !this.resolveMatchersForPath(path).isEmpty();
  }

  /** True when a `*` or `[*]` rule sits directly under the given parent path. */
  wildcardMatcherIsDefined(path: PathSegments): boolean {
    return this.filter((docPath) => {
      const last = docPath.tokens[docPath.tokens.length - 1];
      return (last?.kind === 'star' || last?.kind === 'star-index')
        && docPath.length === path.length + 1
        && docPath.matchesPath([...path, last.kind === 'star' ? '*' : '0']);
    }).size > 0;
  }

  typeMatcherDefined(): boolean {
    return [...this.entries.values()].some((entry) => entry.list.rules.some(isTypeRule));
  }

  valuesMatcherDefined(): boolean {
    return [...this.entries.values()].some((entry) => entry.list.rules.some((rule) => rule.kind === 'values'));
  }

  /**
   * Pick the rule list that applies to the given segments.
   *
   * Body and metadata rules are weighted per path token (exact 2, wildcard 1)
   * and the heaviest `weight * length` wins; `cascaded` is set when the
   * winning expression is shorter than the path. Other categories resolve
   * by path and return the first list.
   */
  selectBestMatcher(path: PathSegments): RuleList | undefined {
    if (this.name === 'body' || this.name === 'metadata') {
      let best: { list: RuleList; score: number; length: number } | undefined;
      for (const entry of this.entries.values()) {
        const [weight, length] = entry.path.pathWeight(path);
        if (weight <= 0) continue;
        const score = weight * length;
        if (!best || score > best.score) best = { list: entry.list, score, length };
      }
      return best ? { ...best.list, cascaded: best.length !== path.length } : undefined;
    }
    const first = this.resolveMatchersForPath(path).entries.values().next();
    return first.done ? undefined : first.value.list;
  }

  /** Whole category as a single list: the first registered one. */
  asRuleList(): RuleList | undefined {
    const first = this.entries.values().next();
    return first.done ? undefined : first.value.list;
  }

  /** Generators carried by `arrayContains` variants, keyed by base path. */
  generators(): Array<[DocPath, Generator]> {
    const result: Array<[DocPath, Generator]> = [];
    for (const entry of this.entries.values()) {
      for (const rule of entry.list.rules) {
        if (rule.kind === 'array-contains' && rule.variants.some((v) => v.generators.length > 0)) {
          result.push([entry.path, {
            type: 'ArrayContains',
            variants: rule.variants.map((v) => ({ index: v.index, generators: v.generators })),
          }]);
        }
      }
    }
    return result;
  }

  clone(): MatchingRuleCategory {
    const copy = new MatchingRuleCategory(this.name);
    for (const entry of this.entries.values()) {
      copy.entries.set(entry.path.toString(), {
        path: entry.path,
        list: { rules: [...entry.list.rules], logic: entry.list.logic, cascaded: entry.list.cascaded },
      });
    }
    return copy;
  }

  toV3Json(): JsonObject {
    const json: JsonObject = {};
    const keyed = this.name !== 'body';
    for (const entry of this.entries.values()) {
      const listJson: JsonObject = {
        combine: entry.list.logic,
        matchers: entry.list.rules.map((rule) => matchingRuleToJson(rule)),
      };
      if (!COLLECTION_CATEGORIES.has(this.name) && entry.path.isEmpty()) return listJson;
      json[keyed ? entry.path.toKeyString() : entry.path.toString()] = listJson;
    }
    return json;
  }

  /** Flat V2 entries (`$.body.a`, `$.headers.X`, `$.path`); only the first rule of each list survives. */
  toV2Json(): JsonObject {
    const json: JsonObject = {};
    for (const entry of this.entries.values()) {
      const first = entry.list.rules[0];
      const ruleJson = first ? matchingRuleToJson(first) : {};
      switch (this.name) {
        case 'path':
          json['$.path'] = ruleJson;
          break;
        case 'body':
          json[entry.path.toString().replace(/^\$/, '$.body')] = ruleJson;
          break;
        case 'header':
          json[`$.headers.${entry.path.toKeyString()}`] = ruleJson;
          break;
        default:
          json[`$.${this.name}.${entry.path.toKeyString()}`] = ruleJson;
      }
    }
    return json;
  }

  /**
   * Add rules from V3 JSON: either `{ "<path>": { combine, matchers } }` or,
   * for scalar categories, a single `{ combine, matchers }` object.
   *
   * @returns an error message, or undefined on success
   */
  addRulesFromJson(json: JsonValue): string | undefined {
    if (!isJsonObject(json)) return undefined;
    if (json['matchers'] !== undefined) {
      return this.addRuleListFromJson(DocPath.empty(), json);
    }
    for (const [key, value] of Object.entries(json)) {
      const path = DocPath.tryParse(key);
      if (!path.ok) return path.error;
      const error = this.addRuleListFromJson(path.path, value);
      if (error) return error;
    }
    return undefined;
  }

  private addRuleListFromJson(path: DocPath, json: JsonValue): string | undefined {
    if (!isJsonObject(json)) return undefined;
    const logic: RuleLogic = jsonToString(json['combine'] ?? 'AND').toUpperCase() === 'OR' ? 'OR' : 'AND';
    const matchers = json['matchers'];
    if (!Array.isArray(matchers)) return undefined;
    for (const matcher of matchers) {
      const result = matchingRuleFromJson(matcher);
      if (!result.ok) return result.error;
      this.addRule(path, result.rule, logic);
    }
    return undefined;
  }
}

// =====================================================================
// MatchingRules
// =====================================================================

/** Rules for every category of one HTTP part or message. */
export class MatchingRules {
  private readonly categories = new Map<RuleCategoryName, MatchingRuleCategory>();

  /**
   * Read rules in either the V2 flat form or the V3/V4 category form.
   *
   * @returns the rules, or an error message when a rule is malformed
   */
  static fromJson(json: unknown, spec: PactSpecification = 'V3'): MatchingRules | string {
    const rules = new MatchingRules();
    if (!isJsonObject(json)) return rules;
    const flat = spec === 'V1' || spec === 'V1_1' || spec === 'V2' || Object.keys(json).some((k) => k.startsWith('$'));
    for (const [key, value] of Object.entries(json)) {
      if (flat) {
        const error = rules.addV2Rule(key, value);
        if (error) return error;
      } else {
        const name = key === 'content' ? 'body' : key;
        const category = RULE_CATEGORIES.find((c) => c === name);
        if (!category) continue;
        const error = rules.category(category).addRulesFromJson(value);
        if (error) return error;
      }
    }
    return rules;
  }

  /** Category by name, created empty on first access. */
  category(name: RuleCategoryName): MatchingRuleCategory {
    let category = this.categories.get(name);
    if (!category) {
      category = new MatchingRuleCategory(name);
      this.categories.set(name, category);
    }
    return category;
  }

  /** Category by name without creating it. */
  rulesForCategory(name: RuleCategoryName): MatchingRuleCategory | undefined {
    const category = this.categories.get(name);
    return category && !category.isEmpty() ? category : undefined;
  }

  addCategory(category: MatchingRuleCategory): void {
    this.category(category.name).addAll(category);
  }

  matcherIsDefined(name: RuleCategoryName, path: PathSegments): boolean {
    return this.rulesForCategory(name)?.matcherIsDefined(path) ?? false;
  }

  isEmpty(): boolean {
    for (const category of this.categories.values()) {
      if (!category.isEmpty()) return false;
    }
    return true;
  }

  clone(): MatchingRules {
    const copy = new MatchingRules();
    for (const [name, category] of this.categories) {
      copy.categories.set(name, category.clone());
    }
    return copy;
  }

  toJson(spec: PactSpecification): JsonObject {
    const json: JsonObject = {};
    const v2 = spec === 'V1' || spec === 'V1_1' || spec === 'V2';
    for (const name of RULE_CATEGORIES) {
      const category = this.categories.get(name);
      if (!category || category.isEmpty()) continue;
      if (v2) Object.assign(json, category.toV2Json());
      else json[name] = category.toV3Json();
    }
    return json;
  }

  private addV2Rule(key: string, value: JsonValue): string | undefined {
    const rule = matchingRuleFromJson(value);
    if (!rule.ok) return rule.error;
    const match = /^\$\.(body|headers|header|query|path|status|method)(.*)$/.exec(key);
    if (!match) return undefined;
    const section = match[1] === 'headers' ? 'header' : match[1];
    const rest = match[2] ?? '';
    const name = RULE_CATEGORIES.find((c) => c === section);
    if (!name) return undefined;
    if (name === 'body') {
      const path = DocPath.tryParse(`$${rest}`);
      if (!path.ok) return path.error;
      this.category('body').addRule(path.path, rule.rule);
    } else if (name === 'header' || name === 'query') {
      const field = rest.replace(/^\./, '').replace(/^\['(.*)'\]$/, '$1');
      this.category(name).addRule(DocPath.root().join(field), rule.rule);
    } else {
      this.category(name).addRule(DocPath.empty(), rule.rule);
    }
    return undefined;
  }
}
