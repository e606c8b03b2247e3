/**
 * Clean up raw producer output before validation.
 * Cosmetic only; the validator decides what is safe.
 */

const FENCE = /^```[A-Za-z]*\s*([\s\S]*?)\s*```$/;
const SQL_LABEL = /^sql\s*:\s*/i;

/**
 * Collapse runs of whitespace to one space, leaving quoted text alone.
 */
export function collapseWhitespace(text: string): string {
  let out = '';
  let quote: string | null = null;
  let pendingSpace = false;

  for (const ch of text) {
    if (quote) {
      out += ch;
      if (ch === quote) quote = null;
      continue;
    }
    if (/\s/.test(ch)) {
      pendingSpace = out.length > 0;
      continue;
    }
    if (pendingSpace) {
      out += ' ';
      pendingSpace = false;
    }
    if (ch === "'" || ch === '"' || ch === '`') quote = ch;
    out += ch;
  }

  return out;
}

/**
 * Strip code fences, an `SQL:` label and trailing semicolons, then collapse
 * whitespace outside quoted literals.
 *
 * @example
 * normalizeSql('```sql\nSELECT *\n  FROM sales;\n```') // 'SELECT * FROM sales'
 */
export function normalizeSql(raw: string): string {
  let sql = raw.trim();

  const fenced = FENCE.exec(sql);
  if (fenced) {
    sql = fenced[1];
  }

  sql = sql.replace(SQL_LABEL, '').trim();
  sql = sql.replace(/[;\s]+$/, '');

  return collapseWhitespace(sql);
}
