/**
 * Bounded query execution.
 *
 * Runs an accepted verdict through the read-only database channel under a
 * hard deadline. Never retries.
 */

import type { ExecutionResult } from '../types/models.js';
import { DatabaseError, type DatabaseFailureKind, describeError } from '../types/errors.js';
import { toJsonRow } from '../types/utils.js';
import { logger } from '../utils/logger.js';
import type { DatabaseChannel } from './database.js';
import type { AcceptedVerdict } from './validator/index.js';

export interface ExecutorOptions {
  statementTimeoutMs: number;
  /** Rows materialized at most; matches the validator's limit ceiling. */
  maxRows: number;
}

export interface ExecutionFailure {
  kind: DatabaseFailureKind;
  /** Driver text, for server logs only. */
  detail: string;
}

export type ExecutionOutcome =
  | { status: 'ok'; result: ExecutionResult }
  | { status: 'failed'; failure: ExecutionFailure };

export class BoundedExecutor {
  constructor(
    private readonly channel: DatabaseChannel,
    private readonly options: ExecutorOptions
  ) {}

  /**
   * Execute a sanitized query. Accepts only a verdict the validator accepted.
   */
  async run(verdict: AcceptedVerdict): Promise<ExecutionOutcome> {
    const { statementTimeoutMs, maxRows } = this.options;
    const pending = this.channel.runReadOnly(verdict.sanitizedSql, statementTimeoutMs);
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new DatabaseError('Timeout', `Statement exceeded ${statementTimeoutMs}ms deadline`));
      }, statementTimeoutMs);
    });

    try {
      const raw = await Promise.race([pending, deadline]);
      const rows = raw.rows.slice(0, maxRows).map(toJsonRow);
      return {
        status: 'ok',
        result: { columns: raw.columns, rows, rowCount: rows.length },
      };
    } catch (error) {
      // The channel may still settle after the deadline; its outcome is only logged.
      pending.catch((late: unknown) => {
        logger.debug(`Statement settled after deadline: ${describeError(late)}`);
      });
      const failure =
        error instanceof DatabaseError
          ? { kind: error.kind, detail: error.detail }
          : { kind: 'RejectedByDatabase' as const, detail: describeError(error) };
      return { status: 'failed', failure };
    } finally {
      clearTimeout(timer);
    }
  }
}
