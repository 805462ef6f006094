/**
 * Unit tests for the matching rule engine.
 *
 * Tests cover:
 * - Single-value rules (matchValue)
 * - Type and size rules cascading into children
 * - arrayContains, eachKey and eachValue
 * - Map key handling and body content types
 */

import { describe, it, expect } from 'vitest';
import { matchValue, checkRegex, detectContentType } from '../../src/matching/rule-evaluator.js';
import { evaluate, matchBody, compareJson, flattenMismatches } from '../../src/matching/body-matcher.js';
import { DocPath } from '../../src/models/doc-path.js';
import { MatchingRuleCategory, matchingRuleFromJson, type MatchingRule } from '../../src/models/matching-rules.js';
import type { JsonValue } from '../../src/types.js';

function rule(json: JsonValue): MatchingRule {
  const result = matchingRuleFromJson(json);
  if (!result.ok) throw new Error(result.error);
  return result.rule;
}

function bodyRules(entries: Record<string, MatchingRule>): MatchingRuleCategory {
  const category = new MatchingRuleCategory('body');
  for (const [path, r] of Object.entries(entries)) {
    category.addRule(DocPath.parse(path), r);
  }
  return category;
}

describe('matchValue', () => {
  it('should compare equality deeply', () => {
    expect(matchValue({ kind: 'equality' }, { a: [1, 2] }, { a: [1, 2] })).toBeUndefined();
    expect(matchValue({ kind: 'equality' }, 'x', 'y')).toBe("Expected 'y' to be equal to 'x'");
  });

  it('should match the whole string against a regex', () => {
    expect(matchValue({ kind: 'regex', regex: '\\d+' }, '1', '123')).toBeUndefined();
    expect(matchValue({ kind: 'regex', regex: '\\d+' }, '1', '123abc')).toBe("Expected '123abc' to match '\\d+'");
    expect(matchValue({ kind: 'regex', regex: '\\d+' }, '1', 42)).toBeUndefined();
  });

  it('should report an invalid regex', () => {
    expect(matchValue({ kind: 'regex', regex: '(' }, '', 'a')).toContain("Invalid regular expression '('");
  });

  it('should tell integers from decimals', () => {
    expect(matchValue({ kind: 'integer' }, 1, 7)).toBeUndefined();
    expect(matchValue({ kind: 'integer' }, 1, 1.5)).toBe('Expected 1.5 to be an integer');
    expect(matchValue({ kind: 'decimal' }, 1.5, 2)).toBe('Expected 2 to be a decimal number');
    expect(matchValue({ kind: 'decimal' }, 1.5, '2.25')).toBeUndefined();
    expect(matchValue({ kind: 'number' }, 1, 'abc')).toBe("Expected 'abc' to be a number");
  });

  it('should apply size bounds of min and max type rules', () => {
    expect(matchValue({ kind: 'min-type', min: 2 }, [1], [1])).toBe('Expected [1] (size 1) to have at least 2 items');
    expect(matchValue({ kind: 'max-type', max: 1 }, [1], [1, 2])).toBe('Expected [1,2] (size 2) to have at most 1 item');
    expect(matchValue({ kind: 'min-max-type', min: 1, max: 3 }, [1], [1, 2])).toBeUndefined();
  });

  it('should skip size bounds when cascaded', () => {
    expect(matchValue({ kind: 'min-type', min: 2 }, [1], [1], true)).toBeUndefined();
  });

  it('should validate dates against their format', () => {
    expect(matchValue({ kind: 'date', format: 'yyyy-MM-dd' }, '', '2024-01-31')).toBeUndefined();
    expect(matchValue({ kind: 'date', format: 'yyyy-MM-dd' }, '', '31/01/2024'))
      .toMatch(/^Expected '31\/01\/2024' to match a date of 'yyyy-MM-dd'/);
    expect(matchValue({ kind: 'time', format: 'HH:mm' }, '', 10)).toBe("Expected 10 (Integer) to be a time string matching 'HH:mm'");
  });

  it('should hold numeric fields to the width of their pattern letters', () => {
    expect(matchValue({ kind: 'date', format: 'yyyy-MM-dd' }, '', '2021-2-3'))
      .toBe("Expected '2021-2-3' to match a date of 'yyyy-MM-dd': '2021-2-3' does not match the pattern 'yyyy-MM-dd'");
    expect(matchValue({ kind: 'date', format: 'yyyy-MM-dd' }, '', '2021-02-03')).toBeUndefined();
    expect(matchValue({ kind: 'time', format: 'HH:mm' }, '', '9:05')).toBeDefined();
    expect(matchValue({ kind: 'date', format: 'd/M/yyyy' }, '', '3/2/2021')).toBeUndefined();
    expect(matchValue({ kind: 'date', format: 'dd MMM yyyy' }, '', '03 Feb 2021')).toBeUndefined();
    expect(matchValue({ kind: 'timestamp', format: "yyyy-MM-dd'T'HH:mm" }, '', '2021-02-03T10:30')).toBeUndefined();
  });

  it('should check include, null, boolean and semver', () => {
    expect(matchValue({ kind: 'include', value: 'ell' }, '', 'hello')).toBeUndefined();
    expect(matchValue({ kind: 'include', value: 'xyz' }, '', 'hello')).toBe("Expected 'hello' to include 'xyz'");
    expect(matchValue({ kind: 'null' }, null, null)).toBeUndefined();
    expect(matchValue({ kind: 'null' }, null, 0)).toBe('Expected 0 to be a null value');
    expect(matchValue({ kind: 'boolean' }, true, 'false')).toBeUndefined();
    expect(matchValue({ kind: 'semver' }, '', '1.2.3')).toBeUndefined();
    expect(matchValue({ kind: 'semver' }, '', '1.2')).toBe("Expected '1.2' to be a semantic version");
  });

  it('should match status code classes', () => {
    expect(matchValue({ kind: 'status-code', status: 'success' }, 200, 204)).toBeUndefined();
    expect(matchValue({ kind: 'status-code', status: 'success' }, 200, 404)).toBe('Expected status code 404 to be a success status');
    expect(matchValue({ kind: 'status-code', status: [200, 201] }, 200, 202)).toBe('Expected status code 202 to be a one of 200, 201');
  });

  it('should reject empty values for notEmpty', () => {
    expect(matchValue({ kind: 'not-empty' }, [], [1])).toBeUndefined();
    expect(matchValue({ kind: 'not-empty' }, [], [])).toBe('Expected [] (List) to not be empty');
    expect(matchValue({ kind: 'not-empty' }, '', '')).toBe("Expected '' (String) to not be empty");
  });
});

describe('checkRegex', () => {
  it('should anchor the pattern', () => {
    expect(checkRegex('[a-z]+', 'abc')).toBe(true);
    expect(checkRegex('[a-z]+', 'abc1')).toBe(false);
    expect(checkRegex('(', 'abc')).toBe(false);
  });
});

describe('detectContentType', () => {
  it('should detect common formats', () => {
    expect(detectContentType(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d]))).toBe('image/png');
    expect(detectContentType(Buffer.from('{"a":1}'))).toBe('application/json');
    expect(detectContentType(Buffer.from('<?xml version="1.0"?><a/>'))).toBe('application/xml');
    expect(detectContentType(Buffer.from('hello'))).toBe('text/plain');
  });
});

describe('evaluate', () => {
  it('should match values of the same type', () => {
    expect(evaluate({ kind: 'type' }, 1, 2)).toEqual({ matched: true });
  });

  it('should mismatch values of a different type', () => {
    expect(evaluate({ kind: 'type' }, 1, '1')).toEqual({
      matched: false,
      mismatches: [{
        path: '$',
        expected: 1,
        actual: '1',
        description: "Expected '1' (String) to be the same type as 1 (Integer)",
      }],
    });
  });

  it('should be reflexive for equality', () => {
    const value = { id: 1, tags: ['a', 'b'], owner: null };
    expect(evaluate({ kind: 'equality' }, value, value)).toEqual({ matched: true });
  });

  it('should rebase mismatch paths', () => {
    const result = evaluate({ kind: 'type' }, 1, 'x', '$.id');
    expect(result.matched).toBe(false);
    if (!result.matched) expect(result.mismatches[0]?.path).toBe('$.id');
  });

  describe('arrayContains', () => {
    const arrayContains = rule({ match: 'arrayContains', variants: [{ index: 0 }, { index: 1 }] });

    it('should find every variant regardless of order', () => {
      expect(evaluate(arrayContains, ['a', 'b'], ['b', 'a', 'c'])).toEqual({ matched: true });
    });

    it('should report each variant that was not found', () => {
      expect(evaluate(arrayContains, ['a', 'b'], ['a'])).toEqual({
        matched: false,
        mismatches: [{
          path: '$',
          expected: 'b',
          actual: ['a'],
          description: "Variant at index 1 ('b') was not found in the actual list (searched indexes 0..0)",
        }],
      });
    });

    it('should use variant rules', () => {
      const typed = rule({
        match: 'arrayContains',
        variants: [{ index: 0, rules: { '$.id': { matchers: [{ match: 'integer' }] } } }],
      });
      expect(evaluate(typed, [{ id: 1 }], [{ id: 'x' }, { id: 99 }])).toEqual({ matched: true });
    });
  });

  describe('eachKey and eachValue', () => {
    it('should apply eachValue to every entry', () => {
      const eachValue = rule({ match: 'eachValue', rules: [{ match: 'type' }], value: 'x' });
      const result = evaluate(eachValue, { a: 'x' }, { b: 'y', c: 1 });
      expect(result.matched).toBe(false);
      if (!result.matched) {
        expect(result.mismatches).toHaveLength(1);
        expect(result.mismatches[0]?.description).toBe('1 value(s) of {"b":"y","c":1} did not match');
        expect(flattenMismatches(result.mismatches)).toEqual([{
          path: '$.c',
          expected: 'x',
          actual: 1,
          description: "Expected 1 (Integer) to be the same type as 'x' (String)",
        }]);
      }
    });

    it('should apply eachKey to every key', () => {
      const eachKey = rule({ match: 'eachKey', rules: [{ match: 'regex', regex: '[a-z]+' }], value: 'abc' });
      expect(evaluate(eachKey, {}, { abc: 1, def: 2 })).toEqual({ matched: true });
      const result = evaluate(eachKey, {}, { abc: 1, D9: 2 });
      expect(result.matched).toBe(false);
      if (!result.matched) {
        expect(flattenMismatches(result.mismatches).map((m) => m.description)).toEqual(["Expected 'D9' to match '[a-z]+'"]);
      }
    });
  });
});

describe('compareJson', () => {
  const strict = (rules = new MatchingRuleCategory('body')) => ({ rules, allowUnexpectedKeys: false });

  it('should report missing keys', () => {
    expect(compareJson(DocPath.root(), { a: 1, b: 2 }, { a: 1 }, strict())).toEqual([{
      path: '$.b',
      expected: 2,
      actual: null,
      description: 'Expected entry b=2 but was missing',
    }]);
  });

  it('should report unexpected keys only when they are not allowed', () => {
    const mismatches = compareJson(DocPath.root(), { a: 1 }, { a: 1, c: 3 }, strict());
    expect(mismatches.map((m) => m.description)).toEqual(['Expected a Map with keys [a] but received one with keys [a, c]']);
    expect(compareJson(DocPath.root(), { a: 1 }, { a: 1, c: 3 }, { ...strict(), allowUnexpectedKeys: true })).toEqual([]);
  });

  it('should cascade a type rule from a list to its items', () => {
    const rules = bodyRules({ '$.items': { kind: 'min-type', min: 1 } });
    const expected = { items: [{ id: 1 }] };
    expect(compareJson(DocPath.root(), expected, { items: [{ id: 5 }, { id: 6 }] }, strict(rules))).toEqual([]);

    const mismatches = compareJson(DocPath.root(), expected, { items: [{ id: 'x' }] }, strict(rules));
    expect(mismatches.map((m) => m.path)).toEqual(['$.items[0].id']);
  });

  it('should apply the size bound only at the declared path', () => {
    const rules = bodyRules({ '$.items': { kind: 'min-type', min: 1 } });
    const mismatches = compareJson(DocPath.root(), { items: [{ id: 1 }] }, { items: [] }, strict(rules));
    expect(mismatches).toEqual([{
      path: '$.items',
      expected: [{ id: 1 }],
      actual: [],
      description: 'Expected [] (size 0) to have at least 1 item',
    }]);
  });

  it('should prefer the more specific rule', () => {
    const rules = bodyRules({
      '$.items[*].id': { kind: 'integer' },
      '$.items': { kind: 'type' },
    });
    const mismatches = compareJson(DocPath.root(), { items: [{ id: 1 }] }, { items: [{ id: 1.5 }] }, strict(rules));
    expect(mismatches.map((m) => m.description)).toEqual(['Expected 1.5 to be an integer']);
  });

  it('should report list length differences without rules', () => {
    const mismatches = compareJson(DocPath.root(), [1, 2], [1], strict());
    expect(mismatches.map((m) => m.description)).toEqual(['Expected a List with 2 elements but received 1 elements']);
  });
});

describe('matchBody', () => {
  it('should accept anything when no body is expected', () => {
    expect(matchBody({ kind: 'missing' }, { kind: 'text', text: 'x' }, undefined, false)).toEqual([]);
  });

  it('should report a missing body', () => {
    const mismatches = matchBody({ kind: 'text', text: 'hi', contentType: 'text/plain' }, { kind: 'missing' }, undefined, false);
    expect(mismatches).toEqual([{ type: 'BodyMismatch', path: '$', expected: 'hi', actual: null, mismatch: 'Expected a body but was missing' }]);
  });

  it('should report differing content types', () => {
    const mismatches = matchBody(
      { kind: 'text', text: 'hi', contentType: 'text/plain' },
      { kind: 'text', text: '<a/>', contentType: 'application/xml' },
      undefined,
      false,
    );
    expect(mismatches).toEqual([{
      type: 'BodyTypeMismatch',
      expected: 'text/plain',
      actual: 'application/xml',
      mismatch: "Expected a body of 'text/plain' but the actual content type was 'application/xml'",
    }]);
  });

  it('should flatten JSON mismatches into body mismatches', () => {
    const mismatches = matchBody(
      { kind: 'json', value: { id: 1 }, contentType: 'application/json' },
      { kind: 'json', value: { id: 2 }, contentType: 'application/json; charset=utf-8' },
      undefined,
      true,
    );
    expect(mismatches).toEqual([{
      type: 'BodyMismatch',
      path: '$.id',
      expected: 1,
      actual: 2,
      mismatch: 'Expected 1 (Integer) but received 2 (Integer)',
    }]);
  });

  it('should check binary bodies by detected content type', () => {
    const rules = bodyRules({ '$': { kind: 'content-type', contentType: 'image/png' } });
    const png = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00]).toString('base64');
    expect(matchBody(
      { kind: 'binary', base64: 'AAAA', contentType: 'image/png' },
      { kind: 'binary', base64: png, contentType: 'image/png' },
      rules,
      false,
    )).toEqual([]);
  });
});
