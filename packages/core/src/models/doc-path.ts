/**
 * @module models/doc-path
 * Path expressions addressing nodes in a body or header map.
 *
 * Grammar: `$` followed by any number of `.field`, `['field']`, `[n]`,
 * `.*` or `[*]` segments. A bare identifier (`name`) is read as `$.name`.
 */

// =====================================================================
// Tokens
// =====================================================================

export type PathToken =
  | { kind: 'root' }
  | { kind: 'field'; name: string }
  | { kind: 'index'; index: number }
  | { kind: 'star' }
  | { kind: 'star-index' };

export type PathParseResult =
  | { ok: true; path: DocPath }
  | { ok: false; error: string };

const IDENTIFIER = /^[_A-Za-z][_A-Za-z0-9]*$/;

function isIdentifierChar(ch: string): boolean {
  return /[\p{L}\p{N}_\-:#@]/u.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/** Weight of one path fragment against one token: 2 exact, 1 wildcard, 0 none. */
function matchesToken(fragment: string, token: PathToken): number {
  switch (token.kind) {
    case 'root':
      return fragment === '$' ? 2 : 0;
    case 'field':
      return fragment === token.name ? 2 : 0;
    case 'index':
      return /^\d+$/.test(fragment) && Number(fragment) === token.index ? 2 : 0;
    case 'star-index':
      return /^\d+$/.test(fragment) ? 1 : 0;
    case 'star':
      return 1;
  }
}

function writeField(expr: string, name: string): string {
  return IDENTIFIER.test(name) ? `${expr}.${name}` : `${expr}['${name}']`;
}

/** Canonical text of a token list: identifiers dotted, other keys bracket-quoted. */
function render(tokens: readonly PathToken[]): string {
  let expr = '';
  for (const token of tokens) {
    switch (token.kind) {
      case 'root': expr += '$'; break;
      case 'field': expr = writeField(expr, token.name); break;
      case 'index': expr += `[${token.index}]`; break;
      case 'star': expr += '.*'; break;
      case 'star-index': expr += '[*]'; break;
    }
  }
  return expr;
}

// =====================================================================
// Parser
// =====================================================================

class PathParser {
  private pos = 0;
  private readonly tokens: PathToken[] = [];

  constructor(private readonly path: string) {}

  parse(): PathToken[] {
    const first = this.path[0];
    if (first === undefined) return this.tokens;
    if (first === '$') {
      this.tokens.push({ kind: 'root' });
      this.pos = 1;
    } else if (/[\p{L}\p{N}]/u.test(first)) {
      this.tokens.push({ kind: 'root' });
      this.identifier();
    } else {
      throw new Error(`Path expression "${this.path}" does not start with a root marker "$"`);
    }

    while (this.pos < this.path.length) {
      const ch = this.path.charAt(this.pos);
      const index = this.pos;
      this.pos++;
      if (ch === '.') {
        this.pathIdentifier(index);
      } else if (ch === '[') {
        this.bracketPath(index);
      } else {
        throw new Error(`Expected a "." or "[" instead of "${ch}" in path expression "${this.path}" at index ${index}`);
      }
    }
    return this.tokens;
  }

  private identifier(): void {
    let id = '';
    while (this.pos < this.path.length) {
      const ch = this.path.charAt(this.pos);
      if (isIdentifierChar(ch)) {
        id += ch;
        this.pos++;
      } else if (ch === '.' || ch === '\'' || ch === '[') {
        break;
      } else {
        throw new Error(`"${ch}" is not allowed in an identifier in path expression "${this.path}" at index ${this.pos}`);
      }
    }
    this.tokens.push({ kind: 'field', name: id });
  }

  private pathIdentifier(dotIndex: number): void {
    if (this.pos >= this.path.length) {
      throw new Error(`Expected a path after "." in path expression "${this.path}" at index ${dotIndex}`);
    }
    const ch = this.path.charAt(this.pos);
    if (ch === '*') {
      this.pos++;
      this.tokens.push({ kind: 'star' });
    } else if (isIdentifierChar(ch)) {
      this.identifier();
    } else {
      throw new Error(`Expected either a "*" or path identifier in path expression "${this.path}" at index ${this.pos}`);
    }
  }

  private bracketPath(bracketIndex: number): void {
    if (this.pos >= this.path.length) {
      throw new Error(`Expected a "'" (single quote) or a digit in path expression "${this.path}" after index ${bracketIndex}`);
    }
    const ch = this.path.charAt(this.pos);
    if (ch === '\'') {
      this.pos++;
      this.stringPath();
    } else if (isDigit(ch)) {
      this.indexPath();
    } else if (ch === '*') {
      this.pos++;
      this.tokens.push({ kind: 'star-index' });
    } else if (ch === ']') {
      throw new Error(`Empty bracket expressions are not allowed in path expression "${this.path}" at index ${this.pos}`);
    } else {
      throw new Error(`Indexes can only consist of numbers or a "*", found "${ch}" instead in path expression "${this.path}" at index ${this.pos}`);
    }

    if (this.pos >= this.path.length) {
      throw new Error(`Unterminated brackets in path expression "${this.path}" at index ${this.path.length - 1}`);
    }
    const close = this.path.charAt(this.pos);
    if (close !== ']') {
      throw new Error(`Unterminated brackets, found "${close}" instead of "]" in path expression "${this.path}" at index ${this.pos}`);
    }
    this.pos++;
  }

  private stringPath(): void {
    const end = this.path.indexOf('\'', this.pos);
    if (end < 0) {
      throw new Error(`Unterminated string in path expression "${this.path}" at index ${this.path.length - 1}`);
    }
    if (end === this.pos) {
      throw new Error(`Empty strings are not allowed in path expression "${this.path}" at index ${end}`);
    }
    this.tokens.push({ kind: 'field', name: this.path.slice(this.pos, end) });
    this.pos = end + 1;
  }

  private indexPath(): void {
    let digits = '';
    while (this.pos < this.path.length && isDigit(this.path.charAt(this.pos))) {
      digits += this.path.charAt(this.pos);
      this.pos++;
    }
    if (this.pos < this.path.length && this.path.charAt(this.pos) !== ']') {
      throw new Error(`Indexes can only consist of numbers or a "*", found "${this.path.charAt(this.pos)}" instead in path expression "${this.path}" at index ${this.pos}`);
    }
    this.tokens.push({ kind: 'index', index: Number(digits) });
  }
}

// =====================================================================
// DocPath
// =====================================================================

/** Immutable parsed path expression. */
export class DocPath {
  private constructor(
    readonly tokens: readonly PathToken[],
    private readonly expr: string,
  ) {}

  /**
   * Parse a path expression.
   *
   * @throws {Error} with the offending character and index when malformed
   */
  static parse(expr: string): DocPath {
    const tokens = new PathParser(expr).parse();
    return new DocPath(tokens, render(tokens));
  }

  static tryParse(expr: string): PathParseResult {
    try {
      return { ok: true, path: DocPath.parse(expr) };
    } catch (err) {
      return { ok: false, error: (err as Error).message };
    }
  }

  static root(): DocPath {
    return new DocPath([{ kind: 'root' }], '$');
  }

  static empty(): DocPath {
    return new DocPath([], '');
  }

  get length(): number {
    return this.tokens.length;
  }

  isRoot(): boolean {
    return this.tokens.length === 1 && this.tokens[0]?.kind === 'root';
  }

  isEmpty(): boolean {
    return this.tokens.length === 0;
  }

  /** Last field name, when the path ends in a field token. */
  lastField(): string | undefined {
    const last = this.tokens[this.tokens.length - 1];
    return last?.kind === 'field' ? last.name : undefined;
  }

  join(field: string): DocPath {
    if (field === '*') return this.pushStar();
    return new DocPath([...this.tokens, { kind: 'field', name: field }], writeField(this.expr, field));
  }

  pushIndex(index: number): DocPath {
    return new DocPath([...this.tokens, { kind: 'index', index }], `${this.expr}[${index}]`);
  }

  pushStar(): DocPath {
    return new DocPath([...this.tokens, { kind: 'star' }], `${this.expr}.*`);
  }

  pushStarIndex(): DocPath {
    return new DocPath([...this.tokens, { kind: 'star-index' }], `${this.expr}[*]`);
  }

  /**
   * Weight of this expression against concrete path segments.
   *
   * Returns `[weight, tokenCount]`. The weight is the product of the
   * per-token weights and is zero when any token fails or when the
   * expression is longer than the path.
   */
  pathWeight(path: readonly string[]): [number, number] {
    if (path.length < this.tokens.length) return [0, this.tokens.length];
    let weight = 1;
    this.tokens.forEach((token, i) => {
      weight *= matchesToken(path[i] ?? '', token);
    });
    return [weight, this.tokens.length];
  }

  matchesPath(path: readonly string[]): boolean {
    return this.pathWeight(path)[0] > 0;
  }

  matchesPathExactly(path: readonly string[]): boolean {
    return this.tokens.length === path.length && this.matchesPath(path);
  }

  /** True when the expression contains `*` or `[*]`. */
  hasWildcard(): boolean {
    return this.tokens.some((t) => t.kind === 'star' || t.kind === 'star-index');
  }

  /**
   * Key form used by header, query and metadata categories: the bare field
   * name for `$.name`, the full expression otherwise.
   */
  toKeyString(): string {
    const [first, second] = this.tokens;
    if (this.tokens.length === 2 && first?.kind === 'root' && second?.kind === 'field') {
      return second.name;
    }
    return this.expr;
  }

  equals(other: DocPath): boolean {
    return this.toString() === other.toString();
  }

  toString(): string {
    return this.expr;
  }
}

/** Concrete segments for a body location, e.g. `['$', 'items', '0']`. */
export type PathSegments = readonly string[];
