/**
 * Wires configuration into the pipeline's long-lived services.
 */

import type { Knex } from 'knex';
import type { Config } from './config.js';
import { loadAccessPolicy, type AccessPolicy } from './services/access-policy.js';
import { CandidateProducer } from './services/candidate/producer.js';
import { LlmGenerationEngine } from './services/candidate/generation.js';
import { TemplateProducer } from './services/candidate/template.js';
import {
  closeDatabase,
  createDatabase,
  KnexChannel,
  KnexSchemaIntrospector,
  type DatabaseChannel,
} from './services/database.js';
import { BoundedExecutor } from './services/executor.js';
import { LlmExplainer, SummaryExplainer, type Explainer } from './services/explainer.js';
import { createLanguageModel } from './services/llm.js';
import { QueryPipeline } from './services/pipeline.js';
import { QueryLog } from './services/query-log.js';
import { ResultCache } from './services/result-cache.js';
import { SchemaCatalog } from './services/schema-catalog.js';
import { SqliteWorkerChannel } from './services/sqlite-channel.js';
import { logger } from './utils/logger.js';

export interface Services {
  db: Knex;
  catalog: SchemaCatalog;
  policy: AccessPolicy;
  queryLog: QueryLog;
  pipeline: QueryPipeline;
}

/**
 * SQLite files are read on a worker thread so the statement deadline can stop
 * them; an in-memory database only exists on the knex connection.
 */
function createChannel(cfg: Config, db: Knex): DatabaseChannel {
  if (cfg.DATABASE_TYPE === 'sqlite3' && cfg.DATABASE_PATH !== ':memory:') {
    return new SqliteWorkerChannel(cfg.DATABASE_PATH);
  }
  return new KnexChannel(db);
}

/**
 * Build every service from configuration. Does not touch the database.
 *
 * @throws ConfigurationError if the access policy cannot be loaded
 */
export function createServices(cfg: Config): Services {
  for (const warning of cfg.WARNINGS) {
    logger.warn(warning);
  }

  const policy = loadAccessPolicy(cfg.ACCESS_POLICY_PATH);
  const db = createDatabase(cfg.KNEX_CONFIG);
  const catalog = new SchemaCatalog(new KnexSchemaIntrospector(db), {
    ttlSeconds: cfg.SCHEMA_CACHE_TTL_S,
  });

  const model = cfg.LLM_CONFIG ? createLanguageModel(cfg.LLM_CONFIG) : null;
  const engine = model && cfg.GENERATION_MODE === 'generation' ? new LlmGenerationEngine(model) : null;
  const producer = new CandidateProducer(new TemplateProducer(), engine, {
    mode: cfg.GENERATION_MODE,
    generationTimeoutMs: cfg.GENERATION_TIMEOUT_MS,
  });

  const explainer: Explainer =
    model && cfg.EXPLANATIONS === 'llm'
      ? new LlmExplainer(model, cfg.GENERATION_TIMEOUT_MS)
      : new SummaryExplainer();

  const queryLog = new QueryLog(cfg.QUERY_LOG_MAX_ENTRIES);
  const pipeline = new QueryPipeline(
    {
      catalog,
      policy,
      producer,
      executor: new BoundedExecutor(createChannel(cfg, db), {
        statementTimeoutMs: cfg.STATEMENT_TIMEOUT_MS,
        maxRows: cfg.MAX_LIMIT,
      }),
      cache: new ResultCache({
        maxEntries: cfg.RESULT_CACHE_MAX_ENTRIES,
        ttlSeconds: cfg.RESULT_CACHE_TTL_S,
      }),
      explainer,
      queryLog,
    },
    {
      maxLimit: cfg.MAX_LIMIT,
      defaultLimit: cfg.DEFAULT_LIMIT,
      maxQuestionLength: cfg.MAX_QUESTION_LENGTH,
    }
  );

  logger.info(`Candidate producer mode: ${producer.mode}`);
  return { db, catalog, policy, queryLog, pipeline };
}

export async function closeServices(services: Services): Promise<void> {
  await closeDatabase(services.db);
}
