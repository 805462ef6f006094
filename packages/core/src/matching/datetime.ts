/**
 * @module matching/datetime
 * Date and time formats for matching and generation.
 *
 * Pact formats use the Java `SimpleDateFormat` pattern letters. They are
 * translated to date-fns tokens, then parsed or formatted with date-fns.
 */

import { add, format as formatDate, isValid, parse, parseISO, setHours, startOfDay, type Duration } from 'date-fns';

export const DEFAULT_DATE_FORMAT = 'yyyy-MM-dd';
export const DEFAULT_TIME_FORMAT = 'HH:mm:ss';
export const DEFAULT_DATETIME_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSSxxx";

const DATE_FNS_OPTIONS = { useAdditionalWeekYearTokens: true, useAdditionalDayOfYearTokens: true };

/**
 * Translate a Java-style pattern to date-fns tokens.
 * Quoted literals are copied unchanged.
 */
export function toDateFnsFormat(pattern: string): string {
  let result = '';
  let quoted = false;
  for (const ch of pattern) {
    if (ch === '\'') {
      quoted = !quoted;
      result += ch;
    } else if (quoted) {
      result += ch;
    } else if (ch === 'Z') {
      // Java Z is an RFC 822 offset (+0000)
      if (!result.endsWith('xx')) result += 'xx';
    } else if (ch === 'u') {
      result += 'i';
    } else {
      result += ch;
    }
  }
  return result;
}

/** Pattern letters whose fields are written as digits. */
const NUMERIC_LETTERS = new Set(['y', 'M', 'd', 'D', 'H', 'h', 'k', 'K', 'm', 's', 'S', 'u', 'w', 'W', 'F']);

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function fieldShape(letter: string, count: number): string {
  if (!NUMERIC_LETTERS.has(letter) || (letter === 'M' && count > 2)) return '.+?';
  if (count === 1) return '\\d+';
  return letter === 'y' && count > 2 ? `\\d{${count},}` : `\\d{${count}}`;
}

/**
 * Regex of the value's layout: repeated numeric letters fix the digit
 * count (`MM` is two digits), text fields match anything.
 */
function patternShape(pattern: string): RegExp {
  let source = '';
  let index = 0;
  while (index < pattern.length) {
    const ch = pattern.charAt(index);
    if (ch === '\'') {
      const end = pattern.indexOf('\'', index + 1);
      const literal = end < 0 ? pattern.slice(index + 1) : pattern.slice(index + 1, end);
      source += literal === '' ? '\'' : escapeRegex(literal);
      index = end < 0 ? pattern.length : end + 1;
    } else if (/[A-Za-z]/.test(ch)) {
      let count = 1;
      while (pattern.charAt(index + count) === ch) count++;
      source += fieldShape(ch, count);
      index += count;
    } else {
      source += escapeRegex(ch);
      index++;
    }
  }
  return new RegExp(`^${source}$`);
}

/**
 * Check that a value parses under a pattern.
 *
 * @returns undefined when it does, otherwise the reason it does not
 */
export function validateDateTime(value: string, pattern: string): string | undefined {
  const mismatch = `'${value}' does not match the pattern '${pattern}'`;
  try {
    if (pattern === '') return isValid(parseISO(value)) ? undefined : mismatch;
    const parsed = parse(value, toDateFnsFormat(pattern), new Date(2000, 0, 1), DATE_FNS_OPTIONS);
    return isValid(parsed) && patternShape(pattern).test(value) ? undefined : mismatch;
  } catch (err) {
    return `Invalid date/time pattern '${pattern}': ${(err as Error).message}`;
  }
}

/** Format a date with a Java-style pattern. */
export function formatDateTime(date: Date, pattern: string): string {
  return formatDate(date, toDateFnsFormat(pattern), DATE_FNS_OPTIONS);
}

/** Current date and time rendered with the pattern, or the ISO default. */
export function generateDatetimeString(pattern: string = DEFAULT_DATETIME_FORMAT): { ok: true; value: string } | { ok: false; error: string } {
  try {
    return { ok: true, value: formatDateTime(new Date(), pattern) };
  } catch (err) {
    return { ok: false, error: `Invalid date/time pattern '${pattern}': ${(err as Error).message}` };
  }
}

// =====================================================================
// Relative date expressions
// =====================================================================

const UNITS: Record<string, keyof Duration> = {
  year: 'years', month: 'months', week: 'weeks', day: 'days',
  hour: 'hours', minute: 'minutes', second: 'seconds',
};

function baseDate(keyword: string, now: Date): Date | undefined {
  switch (keyword) {
    case 'now': return now;
    case 'today': return startOfDay(now);
    case 'tomorrow': return add(startOfDay(now), { days: 1 });
    case 'yesterday': return add(startOfDay(now), { days: -1 });
    case 'midnight': return startOfDay(now);
    case 'noon': return setHours(startOfDay(now), 12);
    default: return undefined;
  }
}

/**
 * Evaluate expressions such as `now`, `today + 1 day` or
 * `tomorrow - 2 hours + 30 minutes` against a base instant.
 */
export function evaluateDateExpression(expression: string, now: Date): { ok: true; date: Date } | { ok: false; error: string } {
  const text = expression.trim().toLowerCase();
  const head = /^([a-z]+)/.exec(text);
  const base = head?.[1] !== undefined ? baseDate(head[1], now) : undefined;
  let date = base ?? now;
  let rest = base ? text.slice(head?.[1]?.length ?? 0) : text;

  const offset = /^\s*([+-])\s*(\d+)\s*([a-z]+?)s?\b/;
  while (rest.trim() !== '') {
    const match = offset.exec(rest);
    const unit = match?.[3] !== undefined ? UNITS[match[3]] : undefined;
    if (!match || !unit) {
      return { ok: false, error: `Invalid date expression '${expression}' at '${rest.trim()}'` };
    }
    const amount = Number(match[2]) * (match[1] === '-' ? -1 : 1);
    date = add(date, { [unit]: amount });
    rest = rest.slice(match[0].length);
  }
  return { ok: true, date };
}
