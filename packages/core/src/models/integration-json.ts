/**
 * @module models/integration-json
 * Bodies with embedded matchers, as sent by consumer test libraries.
 *
 * An object carrying `pact:matcher:type` describes a matcher: its `value`
 * becomes the example, the remaining attributes the rule, and an optional
 * `pact:generator:type` a generator at the same path. Other `pact:*` keys
 * are dropped.
 */

import { DocPath } from './doc-path.js';
import { generatorFromJson, Generators, type Generator, type GeneratorCategory } from './generators.js';
import {
  matchingRuleFromJson,
  MatchingRuleCategory,
  type ArrayContainsVariant,
} from './matching-rules.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types.js';

const MATCHER_TYPE = 'pact:matcher:type';
const GENERATOR_TYPE = 'pact:generator:type';

/** Matcher types whose array value stands for every element. */
const TYPE_MATCHERS = new Set(['type', 'min', 'max']);

/** Sink for rules and generators found while processing. */
export interface IntegrationTarget {
  rules: MatchingRuleCategory;
  generators: Generators;
  /** Category generators are recorded under. */
  generatorCategory: GeneratorCategory;
}

export type IntegrationResult = { ok: true; value: JsonValue } | { ok: false; error: string };

class IntegrationError extends Error {}

function attributes(json: JsonObject): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(json)) {
    if (!key.startsWith('pact:') && key !== 'value') result[key] = value;
  }
  return result;
}

function generatorAt(json: JsonObject): Generator | undefined {
  const type = json[GENERATOR_TYPE];
  if (typeof type !== 'string') return undefined;
  return generatorFromJson({ ...attributes(json), type });
}

function scratch(target: IntegrationTarget): IntegrationTarget {
  return { ...target, rules: new MatchingRuleCategory(target.rules.name), generators: target.generators.clone() };
}

function processMatcher(json: JsonObject, path: DocPath, target: IntegrationTarget): JsonValue {
  const matcherType = json[MATCHER_TYPE];
  const type = typeof matcherType === 'string' ? matcherType : '';
  const value = json['value'] ?? null;

  const generator = generatorAt(json);
  if (generator) target.generators.add(target.generatorCategory, path, generator);

  if (type === 'arrayContains') {
    const variants = Array.isArray(json['variants']) ? json['variants'] : [];
    const examples: JsonValue[] = [];
    const parsed: ArrayContainsVariant[] = variants.map((variant, index) => {
      const variantTarget: IntegrationTarget = {
        rules: new MatchingRuleCategory('body'),
        generators: new Generators(),
        generatorCategory: 'body',
      };
      examples.push(processValue(variant, DocPath.root(), variantTarget));
      if (variantTarget.rules.isEmpty()) variantTarget.rules.addRule(DocPath.empty(), { kind: 'equality' });
      return {
        index,
        rules: variantTarget.rules,
        generators: variantTarget.generators.get('body'),
      };
    });
    target.rules.addRule(path, { kind: 'array-contains', variants: parsed });
    return examples;
  }

  const rule = matchingRuleFromJson({ ...attributes(json), match: type });
  if (!rule.ok) throw new IntegrationError(`Invalid matcher at ${path.toString()}: ${rule.error}`);
  target.rules.addRule(path, rule.rule);

  if (Array.isArray(value) && TYPE_MATCHERS.has(type)) {
    return value.map((item, i) =>
      processValue(item, path.pushStarIndex(), i === 0 ? target : scratch(target)));
  }
  return processValue(value, path, target);
}

function processValue(value: JsonValue, path: DocPath, target: IntegrationTarget): JsonValue {
  if (Array.isArray(value)) {
    return value.map((item, i) => processValue(item, path.pushIndex(i), target));
  }
  if (!isJsonObject(value)) return value;
  if (MATCHER_TYPE in value) return processMatcher(value, path, target);
  const result: JsonObject = {};
  for (const [key, item] of Object.entries(value)) {
    if (key.startsWith('pact:')) continue;
    result[key] = processValue(item, path.join(key), target);
  }
  return result;
}

/**
 * Strip matchers from a body, recording their rules and generators.
 *
 * @returns the example body, or an error when a matcher is malformed
 */
export function processIntegrationJson(value: JsonValue, target: IntegrationTarget, path: DocPath = DocPath.root()): IntegrationResult {
  try {
    return { ok: true, value: processValue(value, path, target) };
  } catch (err) {
    if (err instanceof IntegrationError) return { ok: false, error: err.message };
    throw err;
  }
}

/**
 * Read a single scalar that may be a matcher object written as JSON text,
 * as used for paths, query parameters and headers.
 *
 * @returns the example string
 */
export function processScalar(text: string, path: DocPath, target: IntegrationTarget): IntegrationResult {
  let json: JsonValue;
  try {
    json = JSON.parse(text);
  } catch {
    return { ok: true, value: text };
  }
  if (!isJsonObject(json) || !(MATCHER_TYPE in json)) return { ok: true, value: text };
  const result = processIntegrationJson(json, target, path);
  if (!result.ok) return result;
  return { ok: true, value: typeof result.value === 'string' ? result.value : JSON.stringify(result.value) };
}
