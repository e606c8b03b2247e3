/**
 * Minimal SQL tokenizer for the safety validator.
 *
 * Only distinguishes what the checks need: bare words, quoted identifiers,
 * string literals, numbers, comments and single-character punctuation.
 * It is not a grammar.
 */

export type TokenType = 'word' | 'quoted' | 'string' | 'number' | 'comment' | 'punct';

export interface Token {
  readonly type: TokenType;
  /** Source text for words, numbers, punctuation and comments; inner text for quoted tokens. */
  readonly value: string;
  /** Lowercased `value`. */
  readonly lower: string;
  readonly start: number;
  readonly end: number;
}

export type LexProblem = 'UnterminatedLiteral' | 'BackslashEscape';

export type LexResult =
  | { ok: true; tokens: Token[] }
  | { ok: false; problem: LexProblem; fragment: string };

const WORD_START = /[A-Za-z_]/;
const WORD_PART = /[A-Za-z0-9_$]/;
const DIGIT = /[0-9]/;
const WHITESPACE = /\s/;

const FRAGMENT_LENGTH = 40;

function token(type: TokenType, value: string, start: number, end: number): Token {
  return { type, value, lower: value.toLowerCase(), start, end };
}

function fragmentAt(sql: string, start: number): string {
  return sql.slice(start, start + FRAGMENT_LENGTH);
}

/**
 * Scan a quoted run starting at `start`, where `quote` opens and closes it and
 * a doubled quote is an escaped quote. Returns the index just past the closing
 * quote, or -1 if the run never closes.
 */
function scanQuoted(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return -1;
}

export function tokenize(sql: string): LexResult {
  const tokens: Token[] = [];
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (WHITESPACE.test(ch)) {
      i++;
      continue;
    }

    // Line comments: -- and #
    if ((ch === '-' && next === '-') || ch === '#') {
      const newline = sql.indexOf('\n', i);
      const end = newline === -1 ? sql.length : newline;
      tokens.push(token('comment', sql.slice(i, end), i, end));
      i = end;
      continue;
    }

    // Block comments; an unclosed one runs to the end of input
    if (ch === '/' && next === '*') {
      const close = sql.indexOf('*/', i + 2);
      const end = close === -1 ? sql.length : close + 2;
      tokens.push(token('comment', sql.slice(i, end), i, end));
      i = end;
      continue;
    }

    if (ch === "'") {
      const end = scanQuoted(sql, i, "'");
      if (end === -1) {
        return { ok: false, problem: 'UnterminatedLiteral', fragment: fragmentAt(sql, i) };
      }
      const inner = sql.slice(i + 1, end - 1);
      if (inner.includes('\\')) {
        return { ok: false, problem: 'BackslashEscape', fragment: sql.slice(i, end) };
      }
      tokens.push(token('string', inner.replace(/''/g, "'"), i, end));
      i = end;
      continue;
    }

    if (ch === '"' || ch === '`') {
      const end = scanQuoted(sql, i, ch);
      if (end === -1) {
        return { ok: false, problem: 'UnterminatedLiteral', fragment: fragmentAt(sql, i) };
      }
      const inner = sql.slice(i + 1, end - 1).split(ch + ch).join(ch);
      tokens.push(token('quoted', inner, i, end));
      i = end;
      continue;
    }

    if (WORD_START.test(ch)) {
      let end = i + 1;
      while (end < sql.length && WORD_PART.test(sql[end])) end++;
      tokens.push(token('word', sql.slice(i, end), i, end));
      i = end;
      continue;
    }

    if (DIGIT.test(ch) || (ch === '.' && next !== undefined && DIGIT.test(next))) {
      let end = i + 1;
      while (end < sql.length && /[0-9.eE]/.test(sql[end])) end++;
      tokens.push(token('number', sql.slice(i, end), i, end));
      i = end;
      continue;
    }

    tokens.push(token('punct', ch, i, i + 1));
    i++;
  }

  return { ok: true, tokens };
}
