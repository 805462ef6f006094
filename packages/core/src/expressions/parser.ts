/**
 * @module expressions/parser
 * Parser for matcher-definition expressions.
 *
 * Turns strings such as `matching(datetime, 'yyyy-MM-dd', '2000-01-01')` or
 * `matching(type, 'abc'), notEmpty('abc')` into a {@link MatchingRuleDefinition}.
 * Parsing is pure: failures come back as {@link ExpressionParseError} values
 * carrying the offending token and its byte offset.
 *
 * Grammar:
 * ```
 * definition  := expression (',' expression)*
 * expression  := 'matching' '(' rule ')' | 'notEmpty' '(' string ')'
 *              | 'eachKey' '(' expression ')' | 'eachValue' '(' expression ')'
 * rule        := ('equalTo' | 'type') ',' primitive
 *              | ('number' | 'integer' | 'decimal') ',' number
 *              | ('datetime' | 'date' | 'time') ',' string ',' string
 *              | 'regex' ',' string ',' string | 'include' ',' string
 *              | 'boolean' ',' bool | 'semver' ',' string
 *              | 'contentType' ',' string ',' string | '$' string
 * ```
 */

import { isDeepStrictEqual } from 'node:util';
import type { Generator } from '../models/generators.js';
import type {
  MatchingReference,
  MatchingRule,
  MatchingRuleDefinition,
  ValueType,
} from '../models/matching-rules.js';
import type { JsonValue } from '../types.js';

// =====================================================================
// Types
// =====================================================================

/** Failure to parse an expression. */
export interface ExpressionParseError {
  message: string;
  /** Text of the token where parsing stopped; empty at end of input. */
  token: string;
  /** UTF-8 byte offset of that token. */
  offset: number;
}

export type ExpressionParseResult =
  | { ok: true; definition: MatchingRuleDefinition }
  | { ok: false; error: ExpressionParseError };

type TokenKind = 'lparen' | 'rparen' | 'comma' | 'dollar' | 'string' | 'id' | 'int' | 'decimal' | 'boolean' | 'null' | 'eos';

interface Token {
  kind: TokenKind;
  /** Source text of the token. */
  text: string;
  /** Unquoted contents for strings, text otherwise. */
  value: string;
  /** Character index into the expression. */
  index: number;
}

class ParseFailure extends Error {
  constructor(message: string, readonly token: Token) {
    super(message);
  }
}

// =====================================================================
// Value types
// =====================================================================

/** Combine the value types of two merged definitions. */
export function mergeValueTypes(current: ValueType, other: ValueType): ValueType {
  if (current === 'string' || other === 'string') return 'string';
  if (other === 'unknown') return current;
  if (current === 'unknown') return other;
  if (current === 'boolean') return other;
  if (other === 'boolean') return current;
  if (current === 'decimal' || other === 'decimal') return 'decimal';
  if (current === 'integer' || other === 'integer') return 'integer';
  return 'number';
}

// =====================================================================
// Lexer
// =====================================================================

const PUNCTUATION: Record<string, TokenKind> = { '(': 'lparen', ')': 'rparen', ',': 'comma', '$': 'dollar' };

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < expression.length) {
    const ch = expression.charAt(i);
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    const punctuation = PUNCTUATION[ch];
    if (punctuation) {
      tokens.push({ kind: punctuation, text: ch, value: ch, index: i });
      i++;
      continue;
    }
    if (ch === '\'') {
      let value = '';
      let j = i + 1;
      let closed = false;
      while (j < expression.length) {
        const c = expression.charAt(j);
        if (c === '\\' && j + 1 < expression.length) {
          value += expression.charAt(j + 1);
          j += 2;
        } else if (c === '\'') {
          closed = true;
          break;
        } else {
          value += c;
          j++;
        }
      }
      const text = expression.slice(i, closed ? j + 1 : j);
      if (!closed) {
        throw new ParseFailure('unterminated string literal', { kind: 'string', text, value, index: i });
      }
      tokens.push({ kind: 'string', text, value, index: i });
      i = j + 1;
      continue;
    }
    const rest = expression.slice(i);
    const number = /^-?[0-9]+(\.[0-9]+)?/.exec(rest);
    if (number) {
      const text = number[0];
      tokens.push({ kind: number[1] ? 'decimal' : 'int', text, value: text, index: i });
      i += text.length;
      continue;
    }
    const id = /^[a-zA-Z]+/.exec(rest);
    if (id) {
      const text = id[0];
      const kind: TokenKind = text === 'true' || text === 'false' ? 'boolean' : text === 'null' ? 'null' : 'id';
      tokens.push({ kind, text, value: text, index: i });
      i += text.length;
      continue;
    }
    throw new ParseFailure(`unexpected character '${ch}'`, { kind: 'id', text: ch, value: ch, index: i });
  }
  tokens.push({ kind: 'eos', text: '', value: '', index: expression.length });
  return tokens;
}

// =====================================================================
// Parser
// =====================================================================

interface RuleClause {
  value: JsonValue;
  valueType: ValueType;
  rule: MatchingRule | MatchingReference;
  generator?: Generator;
}

function describe(token: Token): string {
  return token.kind === 'eos' ? 'end of input' : `'${token.text}'`;
}

function literalValue(token: Token, valueType: ValueType): JsonValue {
  switch (valueType) {
    case 'integer':
    case 'decimal':
    case 'number':
      return Number(token.text);
    case 'boolean':
      return token.text === 'true';
    default:
      return token.value;
  }
}

class ExpressionParser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): MatchingRuleDefinition {
    let definition = this.expression();
    while (this.peek().kind !== 'eos') {
      const next = this.next();
      if (next.kind !== 'comma') {
        throw new ParseFailure(`expected ',' or end of input, got ${describe(next)}`, next);
      }
      const start = this.peek();
      definition = mergeDefinitions(definition, this.expression(), start);
    }
    return definition;
  }

  private peek(): Token {
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1] ?? { kind: 'eos', text: '', value: '', index: 0 };
  }

  private next(): Token {
    const token = this.peek();
    if (this.pos < this.tokens.length - 1) this.pos++;
    return token;
  }

  private expect(kind: TokenKind, label: string): Token {
    const token = this.next();
    if (token.kind !== kind) {
      throw new ParseFailure(`expected ${label}, got ${describe(token)}`, token);
    }
    return token;
  }

  private expression(): MatchingRuleDefinition {
    const token = this.next();
    if (token.kind === 'id') {
      switch (token.text) {
        case 'matching': {
          this.expect('lparen', '\'(\'');
          const clause = this.rule();
          this.expect('rparen', '\')\'');
          return {
            value: clause.value,
            valueType: clause.valueType,
            rules: [clause.rule],
            ...(clause.generator ? { generator: clause.generator } : {}),
          };
        }
        case 'notEmpty': {
          this.expect('lparen', '\'(\'');
          const value = this.expect('string', 'a string').value;
          this.expect('rparen', '\')\'');
          return { value, valueType: 'unknown', rules: [{ kind: 'not-empty' }] };
        }
        case 'eachKey':
        case 'eachValue': {
          this.expect('lparen', '\'(\'');
          const inner = this.expression();
          this.expect('rparen', '\')\'');
          return {
            value: '',
            valueType: 'unknown',
            rules: [{ kind: token.text === 'eachKey' ? 'each-key' : 'each-value', definition: inner }],
          };
        }
      }
    }
    throw new ParseFailure(
      `expected a type of matching rule (matching, notEmpty, eachKey, eachValue), got ${describe(token)}`,
      token,
    );
  }

  private rule(): RuleClause {
    const token = this.next();
    if (token.kind === 'dollar') {
      const name = this.expect('string', 'a reference name').value;
      return { value: '', valueType: 'unknown', rule: { kind: 'reference', name } };
    }
    if (token.kind !== 'id') {
      throw new ParseFailure(`expected the type of matcher, got ${describe(token)}`, token);
    }
    this.expect('comma', '\',\'');
    switch (token.text) {
      case 'equalTo':
        return { ...this.primitive(), rule: { kind: 'equality' } };
      case 'type':
        return { ...this.primitive(), rule: { kind: 'type' } };
      case 'number': {
        const value = this.numeric(['int', 'decimal'], 'a number');
        return { value: Number(value.text), valueType: 'number', rule: { kind: 'number' } };
      }
      case 'integer': {
        const value = this.numeric(['int'], 'an integer');
        return { value: Number(value.text), valueType: 'integer', rule: { kind: 'integer' } };
      }
      case 'decimal': {
        const value = this.numeric(['int', 'decimal'], 'a decimal number');
        return { value: Number(value.text), valueType: 'decimal', rule: { kind: 'decimal' } };
      }
      case 'datetime':
      case 'date':
      case 'time': {
        const format = this.expect('string', 'a format string').value;
        this.expect('comma', '\',\'');
        const value = this.expect('string', 'a string').value;
        if (token.text === 'datetime') {
          return { value, valueType: 'string', rule: { kind: 'timestamp', format }, generator: { type: 'DateTime', format } };
        }
        if (token.text === 'date') {
          return { value, valueType: 'string', rule: { kind: 'date', format }, generator: { type: 'Date', format } };
        }
        return { value, valueType: 'string', rule: { kind: 'time', format }, generator: { type: 'Time', format } };
      }
      case 'regex': {
        const regex = this.expect('string', 'a regular expression').value;
        this.expect('comma', '\',\'');
        const value = this.expect('string', 'a string').value;
        return { value, valueType: 'string', rule: { kind: 'regex', regex } };
      }
      case 'include': {
        const value = this.expect('string', 'a string').value;
        return { value, valueType: 'string', rule: { kind: 'include', value } };
      }
      case 'boolean': {
        const value = this.expect('boolean', 'a boolean');
        return { value: value.text === 'true', valueType: 'boolean', rule: { kind: 'boolean' } };
      }
      case 'semver': {
        const value = this.expect('string', 'a version string').value;
        return { value, valueType: 'string', rule: { kind: 'semver' } };
      }
      case 'contentType': {
        const contentType = this.expect('string', 'a content type').value;
        this.expect('comma', '\',\'');
        const value = this.expect('string', 'a string').value;
        return { value, valueType: 'unknown', rule: { kind: 'content-type', contentType } };
      }
      default:
        throw new ParseFailure(`expected the type of matcher, got ${describe(token)}`, token);
    }
  }

  private primitive(): { value: JsonValue; valueType: ValueType } {
    const token = this.next();
    switch (token.kind) {
      case 'string':
        return { value: token.value, valueType: 'string' };
      case 'null':
        return { value: null, valueType: 'unknown' };
      case 'int':
        return { value: literalValue(token, 'integer'), valueType: 'integer' };
      case 'decimal':
        return { value: literalValue(token, 'decimal'), valueType: 'decimal' };
      case 'boolean':
        return { value: literalValue(token, 'boolean'), valueType: 'boolean' };
      default:
        throw new ParseFailure(`expected a primitive value, got ${describe(token)}`, token);
    }
  }

  private numeric(kinds: TokenKind[], label: string): Token {
    const token = this.next();
    if (!kinds.includes(token.kind)) {
      throw new ParseFailure(`expected ${label}, got ${describe(token)}`, token);
    }
    return token;
  }
}

function isEmptyValue(value: JsonValue): boolean {
  return value === '' || value === null;
}

/**
 * Merge a comma-joined definition into the accumulated one.
 *
 * The first non-empty value wins and rules are concatenated. Two different
 * generators for the same value cannot be combined.
 */
function mergeDefinitions(
  current: MatchingRuleDefinition,
  other: MatchingRuleDefinition,
  at: Token,
): MatchingRuleDefinition {
  if (current.generator && other.generator && !isDeepStrictEqual(current.generator, other.generator)) {
    throw new ParseFailure(
      `conflicting generators: ${current.generator.type} and ${other.generator.type} cannot both apply to one value`,
      at,
    );
  }
  const generator = current.generator ?? other.generator;
  return {
    value: isEmptyValue(current.value) ? other.value : current.value,
    valueType: mergeValueTypes(current.valueType, other.valueType),
    rules: [...current.rules, ...other.rules],
    ...(generator ? { generator } : {}),
  };
}

// =====================================================================
// Public API
// =====================================================================

/**
 * Parse a matcher-definition expression.
 *
 * @example
 * ```ts
 * const result = parseMatcherExpression("matching(number, 100)");
 * if (result.ok) console.log(result.definition.rules); // [{ kind: 'number' }]
 * ```
 */
export function parseMatcherExpression(expression: string): ExpressionParseResult {
  try {
    const definition = new ExpressionParser(tokenize(expression)).parse();
    return { ok: true, definition };
  } catch (err) {
    if (err instanceof ParseFailure) {
      const offset = Buffer.byteLength(expression.slice(0, err.token.index), 'utf8');
      return {
        ok: false,
        error: {
          message: `'${expression}' is not a valid value definition: ${err.message} at offset ${offset}`,
          token: err.token.text,
          offset,
        },
      };
    }
    throw err;
  }
}

// =====================================================================
// Rendering
// =====================================================================

function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, '\\\'')}'`;
}

function renderPrimitive(value: JsonValue, valueType: ValueType): string | undefined {
  if (value === null) return 'null';
  if (typeof value === 'string') return quote(value);
  if (typeof value === 'boolean') return String(value);
  if (typeof value === 'number') return renderNumber(value, valueType);
  return undefined;
}

function renderNumber(value: JsonValue, valueType: ValueType): string | undefined {
  if (typeof value !== 'number') return undefined;
  return valueType === 'decimal' && Number.isInteger(value) ? `${value}.0` : String(value);
}

function asText(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function renderClause(
  rule: MatchingRule | MatchingReference,
  value: JsonValue,
  valueType: ValueType,
): string | undefined {
  switch (rule.kind) {
    case 'equality': {
      const primitive = renderPrimitive(value, valueType);
      return primitive === undefined ? undefined : `matching(equalTo, ${primitive})`;
    }
    case 'type': {
      const primitive = renderPrimitive(value, valueType);
      return primitive === undefined ? undefined : `matching(type, ${primitive})`;
    }
    case 'number':
    case 'integer':
    case 'decimal': {
      const number = renderNumber(value, rule.kind);
      return number === undefined ? undefined : `matching(${rule.kind}, ${number})`;
    }
    case 'timestamp':
      return `matching(datetime, ${quote(rule.format)}, ${quote(asText(value))})`;
    case 'date':
    case 'time':
      return `matching(${rule.kind}, ${quote(rule.format)}, ${quote(asText(value))})`;
    case 'regex':
      return `matching(regex, ${quote(rule.regex)}, ${quote(asText(value))})`;
    case 'include':
      return `matching(include, ${quote(rule.value)})`;
    case 'boolean':
      return typeof value === 'boolean' ? `matching(boolean, ${value})` : undefined;
    case 'semver':
      return `matching(semver, ${quote(asText(value))})`;
    case 'content-type':
      return `matching(contentType, ${quote(rule.contentType)}, ${quote(asText(value))})`;
    case 'not-empty':
      return `notEmpty(${quote(asText(value))})`;
    case 'reference':
      return `matching($${quote(rule.name)})`;
    case 'each-key':
    case 'each-value': {
      const inner = renderMatcherExpression(rule.definition);
      if (inner === undefined) return undefined;
      return `${rule.kind === 'each-key' ? 'eachKey' : 'eachValue'}(${inner})`;
    }
    default:
      return undefined;
  }
}

/**
 * Render a definition back to expression text, the inverse of
 * {@link parseMatcherExpression}.
 *
 * @returns the expression, or undefined when a rule has no textual form
 *   (min/max type, arrayContains, statusCode, values, null)
 */
export function renderMatcherExpression(definition: MatchingRuleDefinition): string | undefined {
  const clauses: string[] = [];
  for (const rule of definition.rules) {
    const clause = renderClause(rule, definition.value, definition.valueType);
    if (clause === undefined) return undefined;
    clauses.push(clause);
  }
  return clauses.length > 0 ? clauses.join(', ') : undefined;
}
