/**
 * Unit tests for the matcher expression parser.
 *
 * Tests cover:
 * - Every matcher keyword
 * - Comma-joined definitions
 * - Error messages, tokens and byte offsets
 * - Rendering definitions back to text
 * - The handle-style DefinitionResult view
 */

import { describe, it, expect } from 'vitest';
import { parseMatcherExpression, renderMatcherExpression } from '../../src/expressions/parser.js';
import { parseMatcherDefinition } from '../../src/expressions/definition-result.js';
import type { MatchingRuleDefinition } from '../../src/models/matching-rules.js';

function parseOk(expression: string): MatchingRuleDefinition {
  const result = parseMatcherExpression(expression);
  if (!result.ok) throw new Error(result.error.message);
  return result.definition;
}

describe('parseMatcherExpression', () => {
  describe('matching(...)', () => {
    it('should parse a type matcher with a string example', () => {
      expect(parseOk("matching(type, 'Name')")).toEqual({
        value: 'Name',
        valueType: 'string',
        rules: [{ kind: 'type' }],
      });
    });

    it('should parse equalTo with every primitive', () => {
      expect(parseOk('matching(equalTo, 10)')).toMatchObject({ value: 10, valueType: 'integer' });
      expect(parseOk('matching(equalTo, 1.25)')).toMatchObject({ value: 1.25, valueType: 'decimal' });
      expect(parseOk('matching(equalTo, false)')).toMatchObject({ value: false, valueType: 'boolean' });
      expect(parseOk('matching(equalTo, null)')).toMatchObject({ value: null, valueType: 'unknown' });
      expect(parseOk('matching(equalTo, 10)').rules).toEqual([{ kind: 'equality' }]);
    });

    it('should parse numeric matchers', () => {
      expect(parseOk('matching(number, 100)')).toEqual({ value: 100, valueType: 'number', rules: [{ kind: 'number' }] });
      expect(parseOk('matching(integer, -5)')).toEqual({ value: -5, valueType: 'integer', rules: [{ kind: 'integer' }] });
      expect(parseOk('matching(decimal, 1.5)')).toEqual({ value: 1.5, valueType: 'decimal', rules: [{ kind: 'decimal' }] });
    });

    it('should reject a decimal example for an integer matcher', () => {
      const result = parseMatcherExpression('matching(integer, 1.5)');
      expect(result.ok).toBe(false);
    });

    it('should attach a generator to date and time matchers', () => {
      expect(parseOk("matching(datetime, 'yyyy-MM-dd HH:mm:ss', '2024-01-31 10:00:00')")).toEqual({
        value: '2024-01-31 10:00:00',
        valueType: 'string',
        rules: [{ kind: 'timestamp', format: 'yyyy-MM-dd HH:mm:ss' }],
        generator: { type: 'DateTime', format: 'yyyy-MM-dd HH:mm:ss' },
      });
      expect(parseOk("matching(date, 'yyyy-MM-dd', '2024-01-31')").generator).toEqual({ type: 'Date', format: 'yyyy-MM-dd' });
      expect(parseOk("matching(time, 'HH:mm', '10:30')").generator).toEqual({ type: 'Time', format: 'HH:mm' });
    });

    it('should unescape backslashes in regex strings', () => {
      expect(parseOk("matching(regex, '\\\\d+', '100')")).toEqual({
        value: '100',
        valueType: 'string',
        rules: [{ kind: 'regex', regex: '\\d+' }],
      });
    });

    it('should parse include, boolean, semver and contentType', () => {
      expect(parseOk("matching(include, 'abc')").rules).toEqual([{ kind: 'include', value: 'abc' }]);
      expect(parseOk('matching(boolean, true)')).toEqual({ value: true, valueType: 'boolean', rules: [{ kind: 'boolean' }] });
      expect(parseOk("matching(semver, '1.2.3')").rules).toEqual([{ kind: 'semver' }]);
      expect(parseOk("matching(contentType, 'application/json', '{}')")).toEqual({
        value: '{}',
        valueType: 'unknown',
        rules: [{ kind: 'content-type', contentType: 'application/json' }],
      });
    });

    it('should parse a reference', () => {
      expect(parseOk("matching($'widget')")).toEqual({
        value: '',
        valueType: 'unknown',
        rules: [{ kind: 'reference', name: 'widget' }],
      });
    });
  });

  describe('notEmpty, eachKey and eachValue', () => {
    it('should parse notEmpty', () => {
      expect(parseOk("notEmpty('x')")).toEqual({ value: 'x', valueType: 'unknown', rules: [{ kind: 'not-empty' }] });
    });

    it('should nest a definition inside eachKey', () => {
      expect(parseOk("eachKey(matching(regex, '[a-z]+', 'abc'))")).toEqual({
        value: '',
        valueType: 'unknown',
        rules: [{
          kind: 'each-key',
          definition: { value: 'abc', valueType: 'string', rules: [{ kind: 'regex', regex: '[a-z]+' }] },
        }],
      });
    });

    it('should nest a definition inside eachValue', () => {
      const definition = parseOk("eachValue(matching(type, 'v'))");
      expect(definition.rules).toEqual([
        { kind: 'each-value', definition: { value: 'v', valueType: 'string', rules: [{ kind: 'type' }] } },
      ]);
    });
  });

  describe('comma-joined definitions', () => {
    it('should concatenate rules and keep the first non-empty value', () => {
      expect(parseOk("notEmpty('a'), matching(type, 'b')")).toEqual({
        value: 'a',
        valueType: 'string',
        rules: [{ kind: 'not-empty' }, { kind: 'type' }],
      });
    });

    it('should take the value of a later clause when the first is empty', () => {
      const definition = parseOk("matching($'widget'), matching(integer, 3)");
      expect(definition.value).toBe(3);
      expect(definition.valueType).toBe('integer');
    });

    it('should reject two different generators', () => {
      const result = parseMatcherExpression("matching(date, 'yyyy', '2000'), matching(time, 'HH', '10')");
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toContain('conflicting generators');
    });
  });

  describe('errors', () => {
    it('should report end of input with its offset', () => {
      const result = parseMatcherExpression('matching(type,');
      expect(result).toEqual({
        ok: false,
        error: {
          message: "'matching(type,' is not a valid value definition: expected a primitive value, got end of input at offset 14",
          token: '',
          offset: 14,
        },
      });
    });

    it('should report an unknown matcher type', () => {
      const result = parseMatcherExpression('matching(foo, 1)');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.token).toBe('foo');
        expect(result.error.offset).toBe(9);
      }
    });

    it('should report an unknown expression keyword at offset 0', () => {
      const result = parseMatcherExpression('unknown(1)');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.token).toBe('unknown');
        expect(result.error.offset).toBe(0);
      }
    });

    it('should report an unterminated string', () => {
      const result = parseMatcherExpression("matching(type, 'abc");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.token).toBe("'abc");
        expect(result.error.offset).toBe(15);
        expect(result.error.message).toContain('unterminated string literal');
      }
    });

    it('should count offsets in UTF-8 bytes', () => {
      const result = parseMatcherExpression("matching(type, 'é') x");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.token).toBe('x');
        expect(result.error.offset).toBe(21);
      }
    });

    it('should reject an empty expression', () => {
      const result = parseMatcherExpression('');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.offset).toBe(0);
    });
  });
});

describe('renderMatcherExpression', () => {
  it.each([
    "matching(type, 'Name')",
    'matching(integer, -5)',
    'matching(decimal, 1.5)',
    "matching(datetime, 'yyyy-MM-dd HH:mm:ss', '2024-01-31 10:00:00')",
    "matching(regex, '\\\\d+', '100')",
    "matching(contentType, 'application/json', '{}')",
    "matching($'widget')",
    "eachKey(matching(type, 'k'))",
    "matching(type, 'a'), notEmpty('a')",
  ])('should render %s back to the same text', (expression) => {
    expect(renderMatcherExpression(parseOk(expression))).toBe(expression);
  });

  it('should render whole-number decimals with a fraction', () => {
    expect(renderMatcherExpression({ value: 2, valueType: 'decimal', rules: [{ kind: 'decimal' }] })).toBe('matching(decimal, 2.0)');
  });

  it('should return undefined for rules without a textual form', () => {
    expect(renderMatcherExpression({ value: [], valueType: 'unknown', rules: [{ kind: 'min-type', min: 1 }] })).toBeUndefined();
    expect(renderMatcherExpression({ value: '', valueType: 'unknown', rules: [] })).toBeUndefined();
  });
});

describe('parseMatcherDefinition', () => {
  it('should expose the value as a string', () => {
    const result = parseMatcherDefinition('matching(number, 100)');
    expect(result.error).toBeUndefined();
    expect(result.value).toBe('100');
    expect(result.valueType).toBe('number');
    expect(result.generatorJson).toBeUndefined();
  });

  it('should expose the generator as pact JSON', () => {
    const result = parseMatcherDefinition("matching(date, 'yyyy-MM-dd', '2024-01-31')");
    expect(result.generatorJson).toEqual({ type: 'Date', format: 'yyyy-MM-dd' });
  });

  it('should iterate rules once', () => {
    const result = parseMatcherDefinition("matching(type, 'a'), matching($'ref')");
    const first = [...result.rules()];
    expect(first).toEqual([
      { kind: 'rule', rule: { kind: 'type' }, json: { match: 'type' } },
      { kind: 'reference', name: 'ref' },
    ]);
    expect([...result.rules()]).toEqual([]);
    expect(result.rules().next().done).toBe(true);
  });

  it('should carry the error and empty accessors on failure', () => {
    const result = parseMatcherDefinition('matching(');
    expect(result.error).toContain('is not a valid value definition');
    expect(result.value).toBeUndefined();
    expect(result.valueType).toBe('unknown');
    expect([...result.rules()]).toEqual([]);
  });
});
