/**
 * Query-safety pipeline.
 *
 * question + identity → policy scope → result cache → candidate producer →
 * safety validator → bounded executor → cache store → response.
 *
 * Every stage failure is translated into a structured rejection here; nothing
 * thrown by a stage escapes `handleQuestion`.
 */

import type {
  AnswerResponse,
  CacheStats,
  Identity,
  QuestionResponse,
  RejectedResponse,
  Rejection,
  RejectionKind,
} from '../types/models.js';
import { describeError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { AccessPolicy } from './access-policy.js';
import type { CandidateProducer } from './candidate/producer.js';
import type { BoundedExecutor } from './executor.js';
import type { Explainer } from './explainer.js';
import type { QueryLog } from './query-log.js';
import type { ResultCache } from './result-cache.js';
import type { CatalogSnapshot, SchemaCatalog } from './schema-catalog.js';
import { validateCandidate, type ValidatorOptions } from './validator/index.js';

export interface PipelineDeps {
  catalog: SchemaCatalog;
  policy: AccessPolicy;
  producer: CandidateProducer;
  executor: BoundedExecutor;
  cache: ResultCache;
  explainer: Explainer;
  queryLog: QueryLog;
}

export interface PipelineOptions extends ValidatorOptions {
  maxQuestionLength: number;
}

export const EXECUTION_FAILURE_MESSAGE = 'The query could not be executed. Try rephrasing the question.';
export const EXECUTION_TIMEOUT_MESSAGE =
  'The query took too long and was cancelled. Try narrowing the question, for example with a filter or a smaller limit.';
export const CATALOG_UNAVAILABLE_MESSAGE = 'The database schema is temporarily unavailable. Try again shortly.';

function rejected(kind: RejectionKind, rejection: Rejection, sql?: string): RejectedResponse {
  return {
    status: 'rejected',
    kind,
    reject_reason: rejection.reason,
    message: rejection.message,
    ...(rejection.offendingFragment !== undefined ? { offending_fragment: rejection.offendingFragment } : {}),
    ...(rejection.permittedTables !== undefined ? { permitted_tables: rejection.permittedTables } : {}),
    ...(sql !== undefined ? { sql } : {}),
  };
}

export class QueryPipeline {
  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: PipelineOptions
  ) {}

  async handleQuestion(identity: Identity, question: string): Promise<QuestionResponse> {
    const started = performance.now();
    let response: QuestionResponse;
    try {
      response = await this.answer(identity, question);
    } catch (error) {
      logger.error({ err: error }, 'Unexpected pipeline failure');
      response = rejected('ExecutionFailure', { reason: 'ExecutionFailure', message: EXECUTION_FAILURE_MESSAGE });
    }

    this.deps.queryLog.record({
      timestamp: new Date().toISOString(),
      user_id: identity.userId,
      role: identity.role,
      question,
      sql: response.sql ?? null,
      status: response.status,
      latency_ms: Math.round((performance.now() - started) * 100) / 100,
      rows_returned: response.status === 'ok' ? response.row_count : 0,
      cache_hit: response.status === 'ok' && response.cache_hit,
      reject_reason: response.status === 'rejected' ? response.reject_reason : null,
    });

    return response;
  }

  cacheStats(): CacheStats {
    return this.deps.cache.stats();
  }

  clearCache(): number {
    return this.deps.cache.clear();
  }

  private async answer(identity: Identity, question: string): Promise<QuestionResponse> {
    const { catalog, policy, producer, executor, cache, explainer } = this.deps;

    const trimmed = question.trim();
    if (trimmed.length === 0) {
      return rejected('ValidationRejected', { reason: 'EmptyQuestion', message: 'The question is empty.' });
    }
    if (trimmed.length > this.options.maxQuestionLength) {
      return rejected('ValidationRejected', {
        reason: 'QuestionTooLong',
        message: `The question is longer than ${this.options.maxQuestionLength} characters. Shorten it and try again.`,
      });
    }

    let snapshot: CatalogSnapshot;
    try {
      snapshot = await catalog.getSnapshot();
    } catch (error) {
      logger.error(`Schema catalog unavailable: ${describeError(error)}`);
      return rejected('ExecutionFailure', { reason: 'CatalogUnavailable', message: CATALOG_UNAVAILABLE_MESSAGE });
    }

    const scope = policy.scope(identity.role, snapshot);

    const cached = cache.get(identity, trimmed);
    if (cached) {
      logger.debug(`Result cache hit for user ${identity.userId}`);
      return {
        status: 'ok',
        sql: cached.sql,
        columns: cached.columns,
        rows: cached.rows,
        row_count: cached.rows.length,
        cache_hit: true,
        ...(cached.explanation !== undefined ? { explanation: cached.explanation } : {}),
      };
    }

    const produced = await producer.produce(trimmed, scope.schema);
    if (!produced.ok) {
      logger.info(`No candidate for question from user ${identity.userId}: ${produced.rejection.reason}`);
      return rejected('TemplateUnmatched', produced.rejection);
    }
    const { candidate } = produced;

    const verdict = validateCandidate(candidate.sql, scope.allowedTables, this.options);
    if (verdict.status === 'rejected') {
      logger.info(
        { reason: verdict.rejection.reason, source: candidate.source, user: identity.userId },
        'Candidate rejected by safety validator'
      );
      return rejected('ValidationRejected', verdict.rejection, candidate.sql);
    }

    const outcome = await executor.run(verdict);
    if (outcome.status === 'failed') {
      const { kind, detail } = outcome.failure;
      if (kind === 'Timeout') {
        logger.warn(`Statement timed out for user ${identity.userId}: ${detail}`);
        return rejected(
          'ExecutionTimeout',
          { reason: 'ExecutionTimeout', message: EXECUTION_TIMEOUT_MESSAGE },
          verdict.sanitizedSql
        );
      }
      logger.error({ kind, detail, sql: verdict.sanitizedSql }, 'Query execution failed');
      return rejected('ExecutionFailure', { reason: 'ExecutionFailure', message: EXECUTION_FAILURE_MESSAGE });
    }

    const { result } = outcome;
    const explanation = await explainer.explain(trimmed, verdict.sanitizedSql, result);

    cache.put(identity, trimmed, {
      sql: verdict.sanitizedSql,
      columns: [...result.columns],
      rows: [...result.rows],
      explanation,
    });

    const answer: AnswerResponse = {
      status: 'ok',
      sql: verdict.sanitizedSql,
      columns: result.columns,
      rows: result.rows,
      row_count: result.rowCount,
      cache_hit: false,
      source: candidate.source,
      explanation,
    };
    return answer;
  }
}
