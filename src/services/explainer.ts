/**
 * Plain-English explanations of query results.
 */

import type { LanguageModel } from 'ai';
import type { ExecutionResult } from '../types/models.js';
import { describeError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { callLLM } from './llm.js';

export interface Explainer {
  explain(question: string, sql: string, result: ExecutionResult): Promise<string>;
}

const SAMPLE_ROWS = 5;

const EXPLANATION_SYSTEM_PROMPT = `You summarize SQL query results for a non-technical reader.
Answer in two or three sentences, based only on the rows shown. Do not mention SQL.`;

/**
 * "Retrieved 3 record(s) with columns: id, name, email..."
 */
export function summarizeResult(result: ExecutionResult): string {
  const shown = result.columns.slice(0, 3).join(', ');
  const more = result.columns.length > 3 ? '...' : '';
  return `Retrieved ${result.rowCount} record(s) with columns: ${shown}${more}.`;
}

export class SummaryExplainer implements Explainer {
  async explain(_question: string, _sql: string, result: ExecutionResult): Promise<string> {
    return summarizeResult(result);
  }
}

/**
 * LLM-written explanation; any failure falls back to the summary.
 */
export class LlmExplainer implements Explainer {
  constructor(
    private readonly model: LanguageModel,
    private readonly timeoutMs: number
  ) {}

  async explain(question: string, sql: string, result: ExecutionResult): Promise<string> {
    const sample = JSON.stringify(result.rows.slice(0, SAMPLE_ROWS));
    const prompt =
      `Question: ${question}\n` +
      `SQL: ${sql}\n` +
      `Rows returned: ${result.rowCount}\n` +
      `First rows: ${sample}`;

    try {
      const text = await callLLM(this.model, prompt, EXPLANATION_SYSTEM_PROMPT, {
        temperature: 0.2,
        maxOutputTokens: 256,
        abortSignal: AbortSignal.timeout(this.timeoutMs),
      });
      const trimmed = text.trim();
      return trimmed.length > 0 ? trimmed : summarizeResult(result);
    } catch (error) {
      logger.warn(`Explanation generation failed, using summary: ${describeError(error)}`);
      return summarizeResult(result);
    }
  }
}
