/**
 * Generation engine: natural language → SQL through an LLM.
 */

import type { LanguageModel } from 'ai';
import { GenerationUnavailableError, describeError } from '../../types/errors.js';
import { callLLM } from '../llm.js';
import { formatSchemaForPrompt, type CatalogSnapshot } from '../schema-catalog.js';
import { normalizeSql } from './normalize.js';

/**
 * External NL → SQL engine.
 *
 * @throws GenerationUnavailableError
 */
export interface GenerationEngine {
  generate(question: string, schema: CatalogSnapshot, signal: AbortSignal): Promise<string>;
}

const STATEMENT_KEYWORDS = new Set([
  'select', 'with', 'insert', 'update', 'delete', 'drop', 'alter', 'create',
  'truncate', 'grant', 'revoke', 'copy', 'vacuum', 'analyze', 'lock', 'explain',
]);

const SQL_GENERATION_SYSTEM_PROMPT = `You translate questions into a single read-only SQL SELECT statement.

Rules:
- Use only the tables and columns listed in the schema, with their exact names
- Return one SELECT statement and nothing else: no explanation, no comments
- No semicolons, UNION, WITH or INTO
- Add LIMIT only when the question asks for a specific number of rows`;

/**
 * Reject output that cannot be a statement at all. Whether it is a safe
 * statement is the validator's call.
 */
export function looksLikeStatement(sql: string): boolean {
  const first = /^[A-Za-z]+/.exec(sql);
  return first !== null && STATEMENT_KEYWORDS.has(first[0].toLowerCase());
}

export class LlmGenerationEngine implements GenerationEngine {
  constructor(private readonly model: LanguageModel) {}

  async generate(question: string, schema: CatalogSnapshot, signal: AbortSignal): Promise<string> {
    if (schema.tables.size === 0) {
      throw new GenerationUnavailableError('Unavailable', 'No tables are visible to this role', []);
    }

    const prompt = `Schema:\n${formatSchemaForPrompt(schema)}\n\nQuestion: ${question}\n\nSQL:`;

    let text: string;
    try {
      text = await callLLM(this.model, prompt, SQL_GENERATION_SYSTEM_PROMPT, {
        temperature: 0.0,
        maxOutputTokens: 512,
        abortSignal: signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw new GenerationUnavailableError('Timeout', 'SQL generation was aborted at its deadline');
      }
      throw new GenerationUnavailableError('Unavailable', `SQL generation failed: ${describeError(error)}`);
    }

    return normalizeSql(text);
  }
}
