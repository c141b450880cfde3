/**
 * Filter expression lexer and parser.
 *
 * Expressions are a flat list of clauses joined by AND / OR and folded
 * strictly left to right: `a AND b OR c` means `(a AND b) OR c`. There is no
 * precedence and no grouping beyond `not(...)`, so the parser produces an
 * ordered list of (connector, clause) terms rather than a tree.
 */

import { FilterSyntaxError } from './errors.js';
import type {
  ChainedTerm,
  FilterClause,
  FilterField,
  FirstTerm,
  ParsedFilter,
} from './types.js';

export type TokenKind = 'and' | 'or' | 'not' | 'not-open' | 'close' | 'word';

export interface Token {
  kind: TokenKind;
  text: string;
  /** 0-based offset in the source expression. */
  position: number;
}

const FILTER_FIELDS: readonly FilterField[] = ['component', 'message', 'timestamp', 'ts'];

const NOT_OPEN_REGEX = /^not\s*\(/i;

const FIELD_PREFIX_REGEX = /^([A-Za-z]+):/;

const WHITESPACE_REGEX = /\s/;

function isFilterField(value: string): value is FilterField {
  return FILTER_FIELDS.some((field) => field === value);
}

function isWhitespace(ch: string | undefined): boolean {
  return ch === undefined || WHITESPACE_REGEX.test(ch);
}

/** True where a pattern word must end. */
function endsWord(source: string, index: number, depth: number): boolean {
  const ch = source[index];
  return (
    WHITESPACE_REGEX.test(ch) ||
    ch === '!' ||
    source.startsWith('||', index) ||
    source.startsWith('&&', index) ||
    (depth > 0 && ch === ')')
  );
}

/**
 * Classifies a word. AND / OR / NOT are keywords only when they stand alone
 * between whitespace.
 */
function classifyWord(source: string, text: string, start: number, end: number): TokenKind {
  const standalone = isWhitespace(source[start - 1]) && isWhitespace(source[end]);
  if (!standalone) {
    return 'word';
  }

  switch (text.toUpperCase()) {
    case 'AND':
      return 'and';
    case 'OR':
      return 'or';
    case 'NOT':
      return 'not';
    default:
      return 'word';
  }
}

/**
 * Splits a filter expression into tokens.
 *
 * `||`, `&&` and `!` are symbols wherever they appear. `not(` opens a group,
 * inside which `)` closes it.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let depth = 0;
  let index = 0;

  while (index < source.length) {
    const ch = source[index];

    if (WHITESPACE_REGEX.test(ch)) {
      index++;
      continue;
    }

    if (source.startsWith('||', index) || source.startsWith('&&', index)) {
      tokens.push({
        kind: ch === '|' ? 'or' : 'and',
        text: source.slice(index, index + 2),
        position: index,
      });
      index += 2;
      continue;
    }

    if (ch === '!') {
      tokens.push({ kind: 'not', text: ch, position: index });
      index++;
      continue;
    }

    if (depth > 0 && ch === ')') {
      tokens.push({ kind: 'close', text: ch, position: index });
      depth--;
      index++;
      continue;
    }

    const open = NOT_OPEN_REGEX.exec(source.slice(index));
    if (open) {
      tokens.push({ kind: 'not-open', text: open[0], position: index });
      depth++;
      index += open[0].length;
      continue;
    }

    const start = index;
    while (index < source.length && !endsWord(source, index, depth)) {
      index++;
    }
    const text = source.slice(start, index);
    tokens.push({ kind: classifyWord(source, text, start, index), text, position: start });
  }

  return tokens;
}

/**
 * Single-pass parser over the token list.
 */
class FilterParser {
  private cursor = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: readonly Token[]
  ) {}

  parse(): ParsedFilter {
    if (this.tokens.length === 0) {
      throw FilterSyntaxError.empty(this.source);
    }

    const first: FirstTerm = { connector: 'FIRST', clause: this.parseClause() };
    const rest: ChainedTerm[] = [];

    let token = this.peek();
    while (token) {
      if (token.kind !== 'and' && token.kind !== 'or') {
        throw FilterSyntaxError.missingConnector(this.source, token.position, token.text);
      }
      this.cursor++;

      if (!this.peek()) {
        throw FilterSyntaxError.danglingConnector(this.source, token.position, token.text);
      }
      rest.push({ connector: token.kind === 'and' ? 'AND' : 'OR', clause: this.parseClause() });

      token = this.peek();
    }

    return { source: this.source, terms: [first, ...rest] };
  }

  private peek(): Token | undefined {
    return this.cursor < this.tokens.length ? this.tokens[this.cursor] : undefined;
  }

  private parseClause(): FilterClause {
    const token = this.peek();

    if (token?.kind === 'not') {
      this.cursor++;
      if (!this.peek()) {
        throw FilterSyntaxError.nothingToNegate(this.source, token.position, token.text);
      }
      return { negated: true, ...this.parseAtom() };
    }

    if (token?.kind === 'not-open') {
      this.cursor++;
      if (!this.peek()) {
        throw FilterSyntaxError.unterminatedGroup(this.source, token.position);
      }

      const atom = this.parseAtom();
      const close = this.peek();
      if (!close) {
        throw FilterSyntaxError.unterminatedGroup(this.source, token.position);
      }
      if (close.kind !== 'close') {
        throw FilterSyntaxError.expectedClose(this.source, close.position, close.text);
      }
      this.cursor++;

      return { negated: true, ...atom };
    }

    return { negated: false, ...this.parseAtom() };
  }

  /** Consecutive words form one phrase pattern, keeping the whitespace typed between them. */
  private parseAtom(): Pick<FilterClause, 'field' | 'pattern'> {
    const words: Token[] = [];
    let token = this.peek();
    while (token?.kind === 'word') {
      words.push(token);
      this.cursor++;
      token = this.peek();
    }

    if (words.length === 0) {
      if (!token) {
        throw FilterSyntaxError.expectedPattern(this.source, this.source.length, '');
      }
      throw FilterSyntaxError.expectedPattern(this.source, token.position, token.text);
    }

    const first = words[0];
    const last = words[words.length - 1];
    const text = this.source.slice(first.position, last.position + last.text.length);
    const prefix = FIELD_PREFIX_REGEX.exec(first.text);
    const field = prefix ? prefix[1].toLowerCase() : '';

    if (prefix && isFilterField(field)) {
      const pattern = text.slice(prefix[0].length).trim();
      if (pattern === '') {
        throw FilterSyntaxError.emptyPattern(this.source, first.position, first.text);
      }
      return { field, pattern };
    }

    return { field: null, pattern: text };
  }
}

/**
 * Parses one filter expression.
 * @throws FilterSyntaxError if the expression is malformed
 */
export function parseFilter(source: string): ParsedFilter {
  return new FilterParser(source, tokenize(source)).parse();
}

/**
 * Parses independently supplied expressions; callers AND-combine the results.
 * @throws FilterSyntaxError on the first malformed expression
 */
export function parseFilters(sources: readonly string[]): ParsedFilter[] {
  return sources.map((source) => parseFilter(source));
}
