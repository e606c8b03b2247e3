/**
 * Candidate producer: generation first, templates as the fallback.
 */

import type { Candidate, Rejection } from '../../types/models.js';
import { GenerationUnavailableError, describeError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { CatalogSnapshot } from '../schema-catalog.js';
import { looksLikeStatement, type GenerationEngine } from './generation.js';
import { normalizeSql } from './normalize.js';
import type { TemplateProducer } from './template.js';

export type ProducerMode = 'generation' | 'template';

export interface CandidateProducerOptions {
  mode: ProducerMode;
  generationTimeoutMs: number;
}

export type ProduceResult =
  | { ok: true; candidate: Candidate }
  | { ok: false; rejection: Rejection };

export const TEMPLATE_UNMATCHED_MESSAGE =
  'Could not understand the question. Try naming a table and asking for a count, a total or average of a column, top N rows, or sample rows.';

export class CandidateProducer {
  constructor(
    private readonly templates: TemplateProducer,
    private readonly engine: GenerationEngine | null,
    private readonly options: CandidateProducerOptions
  ) {}

  get mode(): ProducerMode {
    return this.engine ? this.options.mode : 'template';
  }

  async produce(question: string, schema: CatalogSnapshot): Promise<ProduceResult> {
    if (this.engine && this.options.mode === 'generation') {
      try {
        const sql = await this.generateWithDeadline(this.engine, question, schema);
        return { ok: true, candidate: { sql, source: 'generated' } };
      } catch (error) {
        const kind = error instanceof GenerationUnavailableError ? error.kind : 'Unavailable';
        logger.warn(`Generation ${kind}, falling back to templates: ${describeError(error).split('\n')[0]}`);
      }
    }

    const match = this.templates.produce(question, schema);
    if (!match) {
      return { ok: false, rejection: { reason: 'TemplateUnmatched', message: TEMPLATE_UNMATCHED_MESSAGE } };
    }

    logger.debug(`Template '${match.pattern}' matched`);
    return { ok: true, candidate: { sql: normalizeSql(match.sql), source: 'template' } };
  }

  /**
   * The engine gets an abort signal, but the deadline does not depend on it
   * honouring that signal.
   */
  private async generateWithDeadline(
    engine: GenerationEngine,
    question: string,
    schema: CatalogSnapshot
  ): Promise<string> {
    const { generationTimeoutMs } = this.options;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new GenerationUnavailableError('Timeout', `Generation exceeded ${generationTimeoutMs}ms`));
      }, generationTimeoutMs);
    });

    const pending = engine.generate(question, schema, controller.signal);
    try {
      const sql = normalizeSql(await Promise.race([pending, deadline]));
      if (!looksLikeStatement(sql)) {
        throw new GenerationUnavailableError('Malformed', `Output is not an SQL statement: ${sql.slice(0, 80)}`);
      }
      return sql;
    } catch (error) {
      pending.catch((late: unknown) => {
        logger.debug(`Generation settled after deadline: ${describeError(late)}`);
      });
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
