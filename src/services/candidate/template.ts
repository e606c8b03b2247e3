/**
 * Deterministic template producer.
 *
 * Matches a question against a small ordered set of intent patterns, using
 * only tables and columns from the caller's filtered schema. When nothing
 * matches it returns null rather than guessing.
 */

import type { CatalogSnapshot, TableEntry } from '../schema-catalog.js';

export interface TemplateMatch {
  /** Name of the pattern that produced the SQL, for logs. */
  pattern: string;
  sql: string;
}

interface Aggregate {
  fn: 'SUM' | 'AVG' | 'MIN' | 'MAX';
  alias: string;
}

const COUNT_WORDS = /\b(how many|count|number of)\b/;
const TOP_N = /\b(top|first|limit)\s+(\d+)\b/;
const SAMPLE_WORDS = /\b(sample|samples|example|examples|preview)\b/;
const LIST_WORDS = /\b(show|list|display|get|find|give|fetch|all|which|what)\b/;
const GROUP_PREFIX = /\b(?:by|per|for each)\s+/g;
const QUOTED_VALUE = /'([^']*)'|"([^"]*)"/;
const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const AGGREGATES: [RegExp, Aggregate][] = [
  [/\b(total|sum)\b/, { fn: 'SUM', alias: 'total' }],
  [/\b(average|avg|mean)\b/, { fn: 'AVG', alias: 'average' }],
  [/\b(minimum|min)\b/, { fn: 'MIN', alias: 'minimum' }],
  [/\b(maximum|max)\b/, { fn: 'MAX', alias: 'maximum' }],
];

const SAMPLE_LIMIT = 10;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function quoteIdent(name: string): string {
  return PLAIN_IDENTIFIER.test(name) ? name : `"${name.replace(/"/g, '""')}"`;
}

function termPattern(term: string): RegExp {
  return new RegExp(`(^|[^a-z0-9_])${escapeRegExp(term)}($|[^a-z0-9_])`);
}

/**
 * Position of the first whole-word mention of `name` (or its spaced form,
 * `created_at` → `created at`), or -1.
 */
function mentionIndex(q: string, name: string): number {
  const lower = name.toLowerCase();
  const forms = lower.includes('_') ? [lower, lower.replace(/_/g, ' ')] : [lower];
  let best = -1;
  for (const form of forms) {
    const match = termPattern(form).exec(q);
    if (match) {
      const index = match.index + match[1].length;
      if (best === -1 || index < best) best = index;
    }
  }
  return best;
}

function mentions(q: string, name: string): boolean {
  return mentionIndex(q, name) !== -1;
}

function tableForms(name: string): string[] {
  const forms = [name, `${name}s`];
  if (name.endsWith('s') && name.length > 1) forms.push(name.slice(0, -1));
  return forms;
}

function columnNames(entry: TableEntry): string[] {
  return Object.keys(entry.columns);
}

function longestFirst(names: string[]): string[] {
  return [...names].sort((a, b) => b.length - a.length || a.localeCompare(b));
}

/**
 * Pick the table a question is about: one it names, else the only table
 * owning the columns it names, else the only table there is.
 */
export function resolveTable(q: string, schema: CatalogSnapshot): TableEntry | null {
  const entries = Array.from(schema.tables.values()).sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of longestFirstEntries(entries)) {
    if (tableForms(entry.name).some((form) => mentions(q, form))) {
      return entry;
    }
  }

  const owners = entries.filter((entry) => columnNames(entry).some((col) => mentions(q, col)));
  if (owners.length === 1) return owners[0];

  return entries.length === 1 ? entries[0] : null;
}

function longestFirstEntries(entries: TableEntry[]): TableEntry[] {
  return [...entries].sort((a, b) => b.name.length - a.name.length || a.name.localeCompare(b.name));
}

/**
 * Column named right after "by", "per" or "for each".
 */
function groupColumn(q: string, entry: TableEntry): string | null {
  const columns = longestFirst(columnNames(entry));
  for (const match of q.matchAll(GROUP_PREFIX)) {
    const rest = q.slice((match.index ?? 0) + match[0].length);
    for (const col of columns) {
      if (mentionIndex(rest, col) === 0) return col;
    }
  }
  return null;
}

function measureColumn(q: string, entry: TableEntry, exclude: string | null): string | null {
  for (const col of longestFirst(columnNames(entry))) {
    if (col !== exclude && mentions(q, col)) return col;
  }
  return null;
}

// ============================================================================
// PATTERNS (checked in order)
// ============================================================================

function countRows(q: string, entry: TableEntry): string | null {
  if (!COUNT_WORDS.test(q)) return null;
  const table = quoteIdent(entry.name);
  const group = groupColumn(q, entry);
  if (group) {
    const col = quoteIdent(group);
    return `SELECT ${col}, COUNT(*) AS count FROM ${table} GROUP BY ${col}`;
  }
  return `SELECT COUNT(*) AS count FROM ${table}`;
}

function aggregate(q: string, entry: TableEntry, grouped: boolean): string | null {
  const found = AGGREGATES.find(([pattern]) => pattern.test(q));
  if (!found) return null;
  const { fn, alias } = found[1];
  const table = quoteIdent(entry.name);
  const group = groupColumn(q, entry);
  if (grouped !== (group !== null)) return null;

  const measure = measureColumn(q, entry, group);
  if (!measure) return null;

  const expr = `${fn}(${quoteIdent(measure)}) AS ${alias}`;
  if (group) {
    const col = quoteIdent(group);
    return `SELECT ${col}, ${expr} FROM ${table} GROUP BY ${col}`;
  }
  return `SELECT ${expr} FROM ${table}`;
}

function topN(q: string, entry: TableEntry): string | null {
  const match = TOP_N.exec(q);
  if (!match) return null;
  const table = quoteIdent(entry.name);
  const order = groupColumn(q, entry);
  const orderBy = order ? ` ORDER BY ${quoteIdent(order)} DESC` : '';
  return `SELECT * FROM ${table}${orderBy} LIMIT ${match[2]}`;
}

function sampleRows(q: string, entry: TableEntry): string | null {
  if (!SAMPLE_WORDS.test(q)) return null;
  return `SELECT * FROM ${quoteIdent(entry.name)} LIMIT ${SAMPLE_LIMIT}`;
}

function listRows(q: string, text: string, entry: TableEntry): string | null {
  if (!LIST_WORDS.test(q)) return null;
  const columns = columnNames(entry);

  // Optional equality filter: the last column mentioned before a quoted value
  let filter = '';
  let filterColumn: string | null = null;
  const quoted = QUOTED_VALUE.exec(text);
  if (quoted) {
    const value = quoted[1] ?? quoted[2] ?? '';
    const before = q.slice(0, quoted.index);
    let bestIndex = -1;
    for (const col of columns) {
      const index = lastMentionIndex(before, col);
      if (index > bestIndex) {
        bestIndex = index;
        filterColumn = col;
      }
    }
    if (filterColumn) {
      filter = ` WHERE ${quoteIdent(filterColumn)} = '${value.replace(/'/g, "''")}'`;
    }
  }

  const textWithoutValue = quoted ? q.slice(0, quoted.index) + q.slice(quoted.index + quoted[0].length) : q;
  const selected = columns.filter((col) => col !== filterColumn && mentions(textWithoutValue, col));
  const projection = selected.length > 0 ? selected.map(quoteIdent).join(', ') : '*';

  return `SELECT ${projection} FROM ${quoteIdent(entry.name)}${filter}`;
}

function lastMentionIndex(text: string, name: string): number {
  let last = -1;
  let offset = 0;
  while (offset <= text.length) {
    const index = mentionIndex(text.slice(offset), name);
    if (index === -1) break;
    last = offset + index;
    offset = last + 1;
  }
  return last;
}

export class TemplateProducer {
  /**
   * Build SQL for a question, or null when no pattern applies.
   */
  produce(question: string, schema: CatalogSnapshot): TemplateMatch | null {
    const text = question.trim();
    const q = text.toLowerCase();
    const entry = resolveTable(q, schema);
    if (!entry) return null;

    const attempts: [string, () => string | null][] = [
      ['count', () => countRows(q, entry)],
      ['aggregate-by', () => aggregate(q, entry, true)],
      ['aggregate', () => aggregate(q, entry, false)],
      ['top-n', () => topN(q, entry)],
      ['sample', () => sampleRows(q, entry)],
      ['list', () => listRows(q, text, entry)],
    ];

    for (const [pattern, attempt] of attempts) {
      const sql = attempt();
      if (sql) return { pattern, sql };
    }
    return null;
  }
}
