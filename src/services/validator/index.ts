/**
 * SQL safety validator.
 *
 * A pure function from candidate SQL to a verdict. Checks run in a fixed
 * order and stop at the first failure:
 *
 * 1. statement shape
 * 2. forbidden keywords
 * 3. forbidden constructs
 * 4. table-reference extraction
 * 5. table allowlist
 * 6. row limit
 *
 * The only rewrite ever applied is appending `LIMIT <default>` when the
 * statement has no top-level limit of its own.
 */

import type { Rejection, RejectReason } from '../../types/models.js';
import { tokenize, type Token } from './lexer.js';

export interface ValidatorOptions {
  /** Ceiling for an explicit limit. */
  maxLimit: number;
  /** Limit appended when the statement has none. */
  defaultLimit: number;
}

export interface AcceptedVerdict {
  readonly status: 'accepted';
  readonly sanitizedSql: string;
  /** Tables referenced by the statement, in order of first appearance. */
  readonly tables: readonly string[];
}

export interface RejectedVerdict {
  readonly status: 'rejected';
  readonly rejection: Rejection;
}

export type SafetyVerdict = AcceptedVerdict | RejectedVerdict;

export const FORBIDDEN_KEYWORDS: ReadonlySet<string> = new Set([
  'insert',
  'update',
  'delete',
  'drop',
  'alter',
  'truncate',
  'create',
  'grant',
  'revoke',
  'copy',
  'vacuum',
  'analyze',
  'lock',
]);

const SET_OPERATORS = new Set(['union', 'intersect', 'except']);
const LOCK_MODES = new Set(['update', 'share', 'no', 'key']);
const SYSTEM_SCHEMAS = new Set(['information_schema', 'performance_schema']);
const SYSTEM_QUALIFIERS = new Set(['mysql', 'sys']);
const DEFAULT_SCHEMAS = new Set(['public', 'main']);

// Words that may sit directly before "(" without making it a function call.
const NON_CALL_WORDS = new Set([
  'all', 'and', 'any', 'as', 'between', 'by', 'case', 'distinct', 'else', 'exists',
  'from', 'having', 'in', 'is', 'join', 'lateral', 'like', 'not', 'on', 'or',
  'over', 'select', 'some', 'then', 'using', 'values', 'when', 'where',
]);

// Words that end a FROM item instead of naming its alias.
const ALIAS_STOP_WORDS = new Set([
  'cross', 'except', 'fetch', 'for', 'from', 'full', 'group', 'having', 'inner',
  'intersect', 'join', 'lateral', 'left', 'limit', 'natural', 'offset', 'on',
  'order', 'outer', 'right', 'union', 'using', 'where', 'window',
]);

const FRAGMENT_LENGTH = 40;

type Check = Rejection | null;

function reject(reason: RejectReason, message: string, offendingFragment?: string): Rejection {
  return offendingFragment === undefined ? { reason, message } : { reason, message, offendingFragment };
}

function isWord(token: Token | undefined, lower: string): boolean {
  return token !== undefined && token.type === 'word' && token.lower === lower;
}

function isPunct(token: Token | undefined, value: string): boolean {
  return token !== undefined && token.type === 'punct' && token.value === value;
}

function isName(token: Token | undefined): token is Token {
  return token !== undefined && (token.type === 'word' || token.type === 'quoted');
}

// ============================================================================
// 1. STATEMENT SHAPE
// ============================================================================

function checkShape(sql: string, code: Token[]): Check {
  if (code.length === 0) {
    return reject('EmptyQuery', 'The query contains no SQL statement.');
  }

  const separator = code.find((t) => isPunct(t, ';'));
  if (separator) {
    return reject(
      'MultipleStatements',
      'Only a single SQL statement is allowed; statement separators (;) are rejected.',
      sql.slice(separator.start, separator.start + FRAGMENT_LENGTH)
    );
  }

  const first = code[0];
  if (first.type !== 'word' || (first.lower !== 'select' && first.lower !== 'with')) {
    return reject(
      'NotReadOnly',
      'Only SELECT statements are allowed. This service is read-only; rephrase the question to retrieve data instead of changing it.',
      first.value
    );
  }

  return null;
}

// ============================================================================
// 2. FORBIDDEN KEYWORDS
// ============================================================================

function checkKeywords(code: Token[]): Check {
  for (const t of code) {
    if (t.type === 'word' && FORBIDDEN_KEYWORDS.has(t.lower)) {
      return reject(
        'ForbiddenKeyword',
        `Forbidden keyword detected: ${t.lower.toUpperCase()}. Only read-only SELECT queries are supported.`,
        t.value
      );
    }
  }
  return null;
}

// ============================================================================
// 3. FORBIDDEN CONSTRUCTS
// ============================================================================

function isSystemCatalog(tokens: Token[], i: number): boolean {
  const t = tokens[i];
  if (!isName(t)) return false;
  if (SYSTEM_SCHEMAS.has(t.lower) || t.lower.startsWith('pg_') || t.lower.startsWith('sqlite_')) {
    return true;
  }
  return SYSTEM_QUALIFIERS.has(t.lower) && isPunct(tokens[i + 1], '.');
}

function checkConstructs(tokens: Token[]): Check {
  const comment = tokens.find((t) => t.type === 'comment');
  if (comment) {
    return reject('ForbiddenConstruct', 'SQL comments are not allowed.', comment.value.slice(0, FRAGMENT_LENGTH));
  }

  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];

    if (t.type === 'word') {
      if (SET_OPERATORS.has(t.lower)) {
        return reject(
          'ForbiddenConstruct',
          'Set operations (UNION, INTERSECT, EXCEPT) are not allowed; ask one question per query.',
          t.value
        );
      }
      // A WITH that opens the statement or a parenthesized subquery is a CTE
      if (t.lower === 'with' && (i === 0 || isPunct(tokens[i - 1], '('))) {
        return reject('ForbiddenConstruct', 'Common table expressions (WITH) are not allowed.', t.value);
      }
      if (t.lower === 'into') {
        return reject('ForbiddenConstruct', 'INTO clauses are not allowed.', t.value);
      }
      const next = tokens[i + 1];
      if (t.lower === 'for' && next !== undefined && next.type === 'word' && LOCK_MODES.has(next.lower)) {
        return reject(
          'ForbiddenConstruct',
          'Row-locking clauses (FOR UPDATE, FOR SHARE) are not allowed.',
          `${t.value} ${next.value}`
        );
      }
    }

    if (isSystemCatalog(tokens, i)) {
      return reject('ForbiddenConstruct', 'System catalogs and metadata schemas are not accessible.', t.value);
    }
  }

  return null;
}

// ============================================================================
// 4. TABLE-REFERENCE EXTRACTION
// ============================================================================

type FrameKind = 'call' | 'query' | 'group';

interface Frame {
  kind: FrameKind;
  /** The parenthesis opened a FROM item, so a list may continue after it closes. */
  fromItem: boolean;
}

// Words that open a parenthesized query rather than a join group.
const QUERY_STARTS = new Set(['select', 'with', 'table', 'values']);

function parenKind(code: Token[], i: number): FrameKind {
  const next = code[i + 1];
  if (next !== undefined && next.type === 'word' && QUERY_STARTS.has(next.lower)) return 'query';
  const prev = code[i - 1];
  if (prev !== undefined && (prev.type === 'quoted' || (prev.type === 'word' && !NON_CALL_WORDS.has(prev.lower)))) {
    return 'call';
  }
  return 'group';
}

function isDistinctFrom(code: Token[], i: number): boolean {
  return isWord(code[i - 1], 'distinct') && (isWord(code[i - 2], 'is') || isWord(code[i - 2], 'not'));
}

function readQualifiedName(code: Token[], start: number): { name: string; next: number } {
  const parts = [code[start].lower];
  let j = start + 1;
  while (isPunct(code[j], '.') && isName(code[j + 1])) {
    parts.push(code[j + 1].lower);
    j += 2;
  }
  if (parts.length === 2 && DEFAULT_SCHEMAS.has(parts[0])) {
    parts.shift();
  }
  return { name: parts.join('.'), next: j };
}

function skipAlias(code: Token[], j: number): number {
  const t = code[j];
  if (isWord(t, 'as')) {
    return isName(code[j + 1]) ? j + 2 : j + 1;
  }
  if (t !== undefined && (t.type === 'quoted' || (t.type === 'word' && !ALIAS_STOP_WORDS.has(t.lower)))) {
    return j + 1;
  }
  return j;
}

/**
 * Skip an alias column list such as `(a, b)`. Returns null when the
 * parentheses hold anything besides names and commas.
 */
function skipColumnList(code: Token[], open: number): number | null {
  let j = open + 1;
  while (isName(code[j])) {
    j++;
    if (isPunct(code[j], ')')) return j + 1;
    if (!isPunct(code[j], ',')) return null;
    j++;
  }
  return null;
}

interface FromListEnd {
  next: number;
  /** Kind of the parenthesis at `next` when it opens or continues a FROM item. */
  open: FrameKind | null;
  /** Keyword or comma whose FROM item could not be read. */
  unreadable: Token | null;
}

/**
 * Read a FROM/JOIN item list starting at `start`, where `lead` is the token
 * that introduced it. Stops at anything that is not a name, alias or comma.
 */
function readFromList(code: Token[], start: number, tables: string[], afterItem: boolean, lead: Token): FromListEnd {
  let j = start;
  let expectItem = !afterItem;
  let introducer = lead;

  for (;;) {
    if (expectItem) {
      while (isWord(code[j], 'lateral') || isWord(code[j], 'only')) j++;
      const t = code[j];
      if (isPunct(t, '(')) {
        return { next: j, open: parenKind(code, j) === 'query' ? 'query' : 'group', unreadable: null };
      }
      if (!isName(t)) return { next: j, open: null, unreadable: introducer };
      const { name, next } = readQualifiedName(code, j);
      tables.push(name);
      // Table function arguments
      if (isPunct(code[next], '(')) return { next, open: 'call', unreadable: null };
      j = next;
    }

    j = skipAlias(code, j);
    if (isPunct(code[j], '(')) {
      const end = skipColumnList(code, j);
      if (end === null) return { next: j, open: null, unreadable: code[j] };
      j = end;
    }

    if (!isPunct(code[j], ',')) break;
    introducer = code[j];
    j++;
    expectItem = true;
  }

  return { next: j, open: null, unreadable: null };
}

export interface TableExtraction {
  /** Tables in order of first appearance, deduplicated. */
  tables: string[];
  /** Token introducing the first FROM item that is neither a name nor a parenthesis. */
  unreadable: Token | null;
}

/**
 * Table names referenced by FROM, JOIN and TABLE at any depth. Fails closed:
 * a FROM item it cannot classify is reported instead of skipped.
 */
export function extractTableReferences(code: Token[]): TableExtraction {
  const tables: string[] = [];
  const stack: Frame[] = [];
  let pending: FrameKind | null = null;
  let i = 0;

  const done = (unreadable: Token | null): TableExtraction => ({ tables: Array.from(new Set(tables)), unreadable });

  while (i < code.length) {
    const t = code[i];

    if (isPunct(t, '(')) {
      const frame: Frame = { kind: pending ?? parenKind(code, i), fromItem: pending !== null };
      stack.push(frame);
      pending = null;
      i++;
      // Parenthesized join: (a JOIN b ON ...)
      if (frame.fromItem && frame.kind === 'group') {
        const read = readFromList(code, i, tables, false, t);
        if (read.unreadable) return done(read.unreadable);
        i = read.next;
        pending = read.open;
      }
      continue;
    }

    if (isPunct(t, ')')) {
      const frame = stack.pop();
      i++;
      if (frame?.fromItem) {
        const read = readFromList(code, i, tables, true, t);
        if (read.unreadable) return done(read.unreadable);
        i = read.next;
        pending = read.open;
      }
      continue;
    }

    if (isWord(t, 'from') || isWord(t, 'join')) {
      const top = stack[stack.length - 1];
      if (t.lower === 'from' && (top?.kind === 'call' || isDistinctFrom(code, i))) {
        i++;
        continue;
      }
      const read = readFromList(code, i + 1, tables, false, t);
      if (read.unreadable) return done(read.unreadable);
      i = read.next;
      pending = read.open;
      continue;
    }

    // TABLE name, shorthand for SELECT * FROM name
    if (isWord(t, 'table') && !isPunct(code[i - 1], '.')) {
      if (!isName(code[i + 1])) return done(t);
      const { name, next } = readQualifiedName(code, i + 1);
      tables.push(name);
      i = next;
      continue;
    }

    i++;
  }

  return done(null);
}

// ============================================================================
// 5. TABLE ALLOWLIST
// ============================================================================

function checkAllowlist(tables: string[], allowedTables: ReadonlySet<string>): Check {
  const permitted = Array.from(allowedTables).sort();

  for (const table of tables) {
    if (allowedTables.has(table)) continue;
    const message =
      permitted.length > 0
        ? `Access to table '${table}' is not permitted. Permitted tables: ${permitted.join(', ')}.`
        : `Access to table '${table}' is not permitted. Your role has no table access.`;
    return { reason: 'TableNotAllowed', message, offendingFragment: table, permittedTables: permitted };
  }

  return null;
}

// ============================================================================
// 6. ROW LIMIT
// ============================================================================

interface LimitScan {
  rejection: Rejection | null;
  hasLimit: boolean;
}

function parseCount(token: Token | undefined): number | null {
  if (token === undefined || token.type !== 'number' || !/^\d+$/.test(token.value)) {
    return null;
  }
  return Number(token.value);
}

function scanLimit(sql: string, code: Token[], maxLimit: number): LimitScan {
  let depth = 0;
  let hasLimit = false;
  let offset: Token | null = null;

  const exceeds = (value: number, from: Token, to: Token): LimitScan => ({
    hasLimit: true,
    rejection: reject(
      'LimitExceeded',
      `Requested limit of ${value} rows exceeds the maximum of ${maxLimit}. Ask for at most ${maxLimit} rows or narrow the question.`,
      sql.slice(from.start, to.end)
    ),
  });
  const invalid = (from: Token, message: string): LimitScan => ({
    hasLimit: true,
    rejection: reject('InvalidLimit', message, sql.slice(from.start, from.start + FRAGMENT_LENGTH)),
  });

  for (let i = 0; i < code.length; i++) {
    const t = code[i];
    if (isPunct(t, '(')) depth++;
    else if (isPunct(t, ')')) depth--;
    if (depth !== 0 || t.type !== 'word') continue;

    if (t.lower === 'limit') {
      hasLimit = true;
      // LIMIT n [OFFSET m]  |  LIMIT offset, n
      const pair = isPunct(code[i + 2], ',');
      const countAt = pair ? i + 3 : i + 1;
      const value = parseCount(code[countAt]);
      const after = code[countAt + 1];
      const ends = after === undefined || (!pair && isWord(after, 'offset'));
      if (value === null || (pair && parseCount(code[i + 1]) === null) || !ends) {
        return invalid(t, 'LIMIT must be a whole number of rows.');
      }
      if (value > maxLimit) return exceeds(value, t, code[countAt]);
      i = countAt;
    } else if (t.lower === 'fetch' && (isWord(code[i + 1], 'first') || isWord(code[i + 1], 'next'))) {
      hasLimit = true;
      // FETCH FIRST [n] ROW[S] ONLY
      const countToken = code[i + 2];
      if (isWord(countToken, 'row') || isWord(countToken, 'rows')) continue;
      const value = parseCount(countToken);
      if (value === null || !(isWord(code[i + 3], 'row') || isWord(code[i + 3], 'rows'))) {
        return invalid(t, 'FETCH FIRST must be a whole number of rows.');
      }
      if (value > maxLimit) return exceeds(value, t, countToken);
    } else if (t.lower === 'offset') {
      offset = t;
    }
  }

  if (offset && !hasLimit) {
    return invalid(offset, 'OFFSET requires an explicit LIMIT.');
  }

  return { rejection: null, hasLimit };
}

// ============================================================================
// VALIDATE
// ============================================================================

/**
 * Decide whether candidate SQL may run for a caller with `allowedTables`.
 * Deterministic: identical inputs always yield identical verdicts.
 */
export function validateCandidate(
  sql: string,
  allowedTables: ReadonlySet<string>,
  options: ValidatorOptions
): SafetyVerdict {
  const trimmed = sql.trim();
  if (trimmed.length === 0) {
    return { status: 'rejected', rejection: reject('EmptyQuery', 'The query is empty.') };
  }

  const lexed = tokenize(trimmed);
  if (!lexed.ok) {
    const message =
      lexed.problem === 'UnterminatedLiteral'
        ? 'The query contains an unterminated quoted literal.'
        : 'Backslash escapes inside string literals are not allowed.';
    return { status: 'rejected', rejection: reject('MalformedStatement', message, lexed.fragment) };
  }

  const tokens = lexed.tokens;
  const code = tokens.filter((t) => t.type !== 'comment');

  const early = checkShape(trimmed, code) ?? checkKeywords(code) ?? checkConstructs(tokens);
  if (early) {
    return { status: 'rejected', rejection: early };
  }

  const { tables, unreadable } = extractTableReferences(code);
  if (unreadable) {
    return {
      status: 'rejected',
      rejection: reject(
        'MalformedStatement',
        'Could not determine which tables the query reads. Every FROM item must name a table or a subquery.',
        trimmed.slice(unreadable.start, unreadable.start + FRAGMENT_LENGTH)
      ),
    };
  }

  const denied = checkAllowlist(tables, allowedTables);
  if (denied) {
    return { status: 'rejected', rejection: denied };
  }

  const limit = scanLimit(trimmed, code, options.maxLimit);
  if (limit.rejection) {
    return { status: 'rejected', rejection: limit.rejection };
  }

  return {
    status: 'accepted',
    sanitizedSql: limit.hasLimit ? trimmed : `${trimmed} LIMIT ${options.defaultLimit}`,
    tables,
  };
}
