/**
 * @module expressions/definition-result
 * Handle-style view over a parsed matcher expression.
 *
 * `parseMatcherDefinition` never fails: a malformed expression yields a
 * result whose `error` is set and whose other accessors are empty.
 */

import { generatorToJson, type Generator } from '../models/generators.js';
import {
  matchingRuleToJson,
  type MatchingReference,
  type MatchingRule,
  type MatchingRuleDefinition,
  type ValueType,
} from '../models/matching-rules.js';
import type { JsonObject, JsonValue } from '../types.js';
import { parseMatcherExpression } from './parser.js';

export type MatchingRuleEntry =
  | { kind: 'rule'; rule: MatchingRule; json: JsonObject }
  | { kind: 'reference'; name: string };

/**
 * One-shot forward cursor over the rules of a definition.
 * Once exhausted it stays exhausted; re-parse to start over.
 */
export class MatchingRuleIterator implements IterableIterator<MatchingRuleEntry> {
  private index = 0;

  constructor(private readonly rules: ReadonlyArray<MatchingRule | MatchingReference>) {}

  next(): IteratorResult<MatchingRuleEntry> {
    const rule = this.rules[this.index];
    if (rule === undefined) return { done: true, value: undefined };
    this.index++;
    if (rule.kind === 'reference') {
      return { done: false, value: { kind: 'reference', name: rule.name } };
    }
    return { done: false, value: { kind: 'rule', rule, json: matchingRuleToJson(rule) } };
  }

  [Symbol.iterator](): IterableIterator<MatchingRuleEntry> {
    return this;
  }
}

function valueAsString(value: JsonValue): string {
  if (value === null) return '';
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export class DefinitionResult {
  private iterator: MatchingRuleIterator | undefined;

  constructor(
    readonly error: string | undefined,
    readonly definition: MatchingRuleDefinition | undefined,
  ) {}

  /** Example value rendered as a string; undefined when parsing failed. */
  get value(): string | undefined {
    return this.definition ? valueAsString(this.definition.value) : undefined;
  }

  get valueType(): ValueType {
    return this.definition?.valueType ?? 'unknown';
  }

  get generator(): Generator | undefined {
    return this.definition?.generator;
  }

  get generatorJson(): JsonObject | undefined {
    const generator = this.generator;
    return generator ? generatorToJson(generator) : undefined;
  }

  /** The rule cursor. Every call returns the same cursor. */
  rules(): MatchingRuleIterator {
    if (!this.iterator) this.iterator = new MatchingRuleIterator(this.definition?.rules ?? []);
    return this.iterator;
  }
}

/** Parse an expression into a {@link DefinitionResult}. */
export function parseMatcherDefinition(expression: string): DefinitionResult {
  const result = parseMatcherExpression(expression);
  return result.ok
    ? new DefinitionResult(undefined, result.definition)
    : new DefinitionResult(result.error.message, undefined);
}
