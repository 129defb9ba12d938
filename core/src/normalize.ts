/**
 * Value Normalizer
 *
 * String cells that encode a tuple literal, e.g. `"(1, 'x', True)"`, are
 * decoded into structured {@link Tuple} values. Anything that fails to parse
 * is returned unchanged; normalization never throws.
 *
 * Accepted literals:
 * - integers: `42`, `-7`, `1_000`, `0x1F`, `0o17`, `0b101`
 * - floats: `1.5`, `.5`, `2.`, `1e3`, `-2.5E-3`
 * - strings: single or double quoted, backslash escapes
 * - keywords: `True`, `False`, `None` and `true`, `false`, `null`
 */

import {
  isCellList,
  isTuple,
  tuple,
  type BranchNode,
  type CellValue,
  type NestedNode,
  type NestedResult,
  type Scalar,
  type TupleItem,
} from './types.js';

// =============================================================================
// Literal Parser
// =============================================================================

const KEYWORDS: ReadonlyMap<string, TupleItem> = new Map<string, TupleItem>([
  ['True', true],
  ['False', false],
  ['None', null],
  ['true', true],
  ['false', false],
  ['null', null],
]);

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  t: '\t',
  r: '\r',
  b: '\b',
  f: '\f',
  v: '\v',
  a: '\x07',
};

const INTEGER_RE = /^[+-]?(?:0[xX](?:_?[0-9a-fA-F])+|0[oO](?:_?[0-7])+|0[bB](?:_?[01])+|0(?:_?0)*|[1-9](?:_?[0-9])*)$/;
const FLOAT_RE = /^[+-]?(?:(?:[0-9](?:_?[0-9])*\.(?:[0-9](?:_?[0-9])*)?|\.[0-9](?:_?[0-9])*)(?:[eE][+-]?[0-9](?:_?[0-9])*)?|[0-9](?:_?[0-9])*[eE][+-]?[0-9](?:_?[0-9])*)$/;

class LiteralSyntaxError extends Error {}

/**
 * Recursive-descent reader over a single tuple literal.
 */
class TupleReader {
  private pos = 0;

  constructor(private readonly src: string) {}

  read(): TupleItem[] {
    this.skipSpace();
    this.expect('(');
    const items: TupleItem[] = [];
    let sawComma = false;

    this.skipSpace();
    while (this.peek() !== ')') {
      items.push(this.readItem());
      this.skipSpace();
      if (this.peek() === ',') {
        this.pos++;
        sawComma = true;
        this.skipSpace();
        continue;
      }
      if (this.peek() !== ')') {
        throw new LiteralSyntaxError(`Unexpected "${this.peek()}" at ${this.pos}`);
      }
    }
    this.expect(')');
    this.skipSpace();

    if (this.pos !== this.src.length) {
      throw new LiteralSyntaxError(`Trailing input at ${this.pos}`);
    }
    // "(1)" is a parenthesized scalar, not a tuple
    if (!sawComma) {
      throw new LiteralSyntaxError('Tuple requires a comma');
    }
    return items;
  }

  private readItem(): TupleItem {
    const ch = this.peek();
    if (ch === "'" || ch === '"') {
      return this.readString(ch);
    }
    return this.readBare();
  }

  private readString(quote: string): string {
    this.pos++;
    let out = '';
    while (this.pos < this.src.length) {
      const ch = this.src[this.pos++];
      if (ch === quote) {
        return out;
      }
      if (ch === '\n') {
        throw new LiteralSyntaxError('Unterminated string');
      }
      if (ch === '\\') {
        out += this.readEscape();
        continue;
      }
      out += ch;
    }
    throw new LiteralSyntaxError('Unterminated string');
  }

  private readEscape(): string {
    if (this.pos >= this.src.length) {
      throw new LiteralSyntaxError('Dangling escape');
    }
    const ch = this.src[this.pos++];
    const simple = SIMPLE_ESCAPES[ch];
    if (simple !== undefined) {
      return simple;
    }
    if (/[0-7]/.test(ch)) return this.readOctal(ch);
    if (ch === 'x') return this.readCodePoint(2);
    if (ch === 'u') return this.readCodePoint(4);
    if (ch === 'U') return this.readCodePoint(8);
    // Unknown escapes keep the backslash
    return `\\${ch}`;
  }

  private readCodePoint(width: number): string {
    const hex = this.src.slice(this.pos, this.pos + width);
    if (hex.length !== width || !/^[0-9a-fA-F]+$/.test(hex)) {
      throw new LiteralSyntaxError(`Bad escape at ${this.pos}`);
    }
    this.pos += width;
    const code = parseInt(hex, 16);
    if (code > 0x10ffff) {
      throw new LiteralSyntaxError(`Code point out of range at ${this.pos}`);
    }
    return String.fromCodePoint(code);
  }

  private readOctal(first: string): string {
    let digits = first;
    while (digits.length < 3 && /[0-7]/.test(this.peek())) {
      digits += this.src[this.pos++];
    }
    return String.fromCharCode(parseInt(digits, 8));
  }

  private readBare(): TupleItem {
    const start = this.pos;
    while (this.pos < this.src.length && !/[\s,()'"]/.test(this.src[this.pos])) {
      this.pos++;
    }
    const token = this.src.slice(start, this.pos);
    if (token === '') {
      throw new LiteralSyntaxError(`Expected a value at ${start}`);
    }

    const keyword = KEYWORDS.get(token);
    if (keyword !== undefined) {
      return keyword;
    }
    return parseNumber(token);
  }

  private peek(): string {
    return this.src[this.pos] ?? '';
  }

  private expect(ch: string): void {
    if (this.peek() !== ch) {
      throw new LiteralSyntaxError(`Expected "${ch}" at ${this.pos}`);
    }
    this.pos++;
  }

  private skipSpace(): void {
    while (this.pos < this.src.length && /\s/.test(this.src[this.pos])) {
      this.pos++;
    }
  }
}

function parseNumber(token: string): number {
  if (INTEGER_RE.test(token)) {
    const negative = token.startsWith('-');
    const body = token.replace(/^[+-]/, '').replace(/_/g, '');
    const value = /^0[xXoObB]/.test(body) ? Number(body.toLowerCase()) : Number(body);
    if (!Number.isSafeInteger(value)) {
      throw new LiteralSyntaxError(`Integer out of safe range: ${token}`);
    }
    return negative ? -value : value;
  }
  if (FLOAT_RE.test(token)) {
    return Number(token.replace(/_/g, ''));
  }
  throw new LiteralSyntaxError(`Not a literal: ${token}`);
}

/**
 * Whether a string has the outward shape of a tuple literal.
 */
export function looksLikeTuple(text: string): boolean {
  const stripped = text.trim();
  return stripped.startsWith('(') && stripped.endsWith(')') && stripped.includes(',');
}

/**
 * Parse a tuple literal, or return undefined when the text is not one.
 */
export function parseTupleLiteral(text: string): TupleItem[] | undefined {
  try {
    return new TupleReader(text.trim()).read();
  } catch (error) {
    if (error instanceof LiteralSyntaxError) {
      return undefined;
    }
    throw error;
  }
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Decode a tuple-shaped string; every other value passes through.
 * Arrays are normalized element-wise, tuples are returned as they are.
 */
export function normalizeValue(value: CellValue): CellValue {
  if (typeof value === 'string') {
    if (!looksLikeTuple(value)) {
      return value;
    }
    const items = parseTupleLiteral(value);
    return items === undefined ? value : tuple(items);
  }
  if (isTuple(value)) {
    return value;
  }
  if (isCellList(value)) {
    return value.map(normalizeValue);
  }
  return value;
}

function normalizeNode(node: NestedNode): NestedNode {
  switch (node.kind) {
    case 'branch':
      return normalizeBranch(node);
    case 'value':
      return { kind: 'value', value: normalizeValue(node.value) };
    case 'record': {
      const fields = new Map<string, CellValue>();
      for (const [name, value] of node.fields) {
        fields.set(name, normalizeValue(value));
      }
      return { kind: 'record', fields };
    }
    default: {
      const _exhaustiveCheck: never = node;
      throw new Error(`Unhandled node: ${JSON.stringify(_exhaustiveCheck)}`);
    }
  }
}

function normalizeBranch(branch: BranchNode): BranchNode {
  const children = new Map<Scalar, NestedNode>();
  for (const [key, child] of branch.children) {
    children.set(key, normalizeNode(child));
  }
  return { kind: 'branch', children };
}

/**
 * Normalize every leaf of a nested result, returning a new result.
 */
export function normalizeResult(result: NestedResult): NestedResult {
  return { depth: result.depth, root: normalizeBranch(result.root) };
}
