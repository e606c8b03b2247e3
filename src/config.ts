/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';
import type { Knex } from 'knex';
import { ConfigurationError } from './types/errors.js';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const rootDir = join(__dirname, '..');

// Load .env file if it exists
const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

const upperCase = (value: unknown) => (typeof value === 'string' ? value.toUpperCase() : value);

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z
  .object({
    // Database Configuration
    DATABASE_TYPE: z.enum(['sqlite3', 'pg']).default('sqlite3'),
    DATABASE_PATH: z.string().default('./data/warehouse.db'),
    DATABASE_URL: z.string().optional(),

    // Candidate generation
    GENERATION_MODE: z.enum(['generation', 'template']).default('generation'),
    LLM_PROVIDER: z.enum(['anthropic', 'openai']).default('anthropic'),
    LLM_MODEL: z.string().optional(),
    ANTHROPIC_API_KEY: z.string().optional(),
    OPENAI_API_KEY: z.string().optional(),
    GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    EXPLANATIONS: z.enum(['llm', 'summary']).default('summary'),

    // Query constraints
    STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    DEFAULT_LIMIT: z.coerce.number().int().positive().default(100),
    MAX_LIMIT: z.coerce.number().int().positive().default(1000),
    MAX_QUESTION_LENGTH: z.coerce.number().int().positive().default(500),

    // Caches
    SCHEMA_CACHE_TTL_S: z.coerce.number().int().positive().default(3600),
    RESULT_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(1000),
    RESULT_CACHE_TTL_S: z.coerce.number().int().positive().default(3600),
    QUERY_LOG_MAX_ENTRIES: z.coerce.number().int().positive().default(1000),

    // Access policy
    ACCESS_POLICY_PATH: z
      .string()
      .optional()
      .describe('JSON file mapping roles to table allowlists'),

    // Server Configuration
    LOG_LEVEL: z.preprocess(
      upperCase,
      z.enum(['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'SILENT']).default('INFO')
    ),
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().positive().default(8000),
  })
  .refine((c) => c.DEFAULT_LIMIT <= c.MAX_LIMIT, {
    message: 'DEFAULT_LIMIT must not exceed MAX_LIMIT',
    path: ['DEFAULT_LIMIT'],
  });

/**
 * Type for base configuration object.
 */
type BaseConfig = z.infer<typeof ConfigSchema>;

export type LLMProvider = BaseConfig['LLM_PROVIDER'];

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey: string;
}

/**
 * Extended configuration with parsed KNEX_CONFIG and LLM_CONFIG.
 */
export interface Config
  extends Omit<
    BaseConfig,
    | 'DATABASE_PATH'
    | 'DATABASE_URL'
    | 'LLM_PROVIDER'
    | 'LLM_MODEL'
    | 'ANTHROPIC_API_KEY'
    | 'OPENAI_API_KEY'
    | 'ACCESS_POLICY_PATH'
  > {
  KNEX_CONFIG: Knex.Config;
  /** Null when no API key is configured for the selected provider. */
  LLM_CONFIG: LLMConfig | null;
  ACCESS_POLICY_PATH: string;
  /** Non-fatal problems noticed while loading, logged at start-up. */
  WARNINGS: string[];
}

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  anthropic: 'claude-sonnet-4-5-20250929',
  openai: 'gpt-4o-mini',
};

/**
 * Parse and validate configuration from environment variables.
 *
 * @throws ConfigurationError when a variable is invalid or a required one is missing
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Configuration validation failed:',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const baseConfig = parsed.data;
  const warnings: string[] = [];

  // Build Knex config based on database type
  let knexConfig: Knex.Config;
  switch (baseConfig.DATABASE_TYPE) {
    case 'sqlite3':
      knexConfig = {
        client: 'better-sqlite3',
        connection: {
          filename: baseConfig.DATABASE_PATH,
        },
        useNullAsDefault: true,
      };
      break;

    case 'pg':
      if (!baseConfig.DATABASE_URL) {
        throw new ConfigurationError('DATABASE_URL is required when DATABASE_TYPE is pg');
      }
      knexConfig = {
        client: 'pg',
        connection: baseConfig.DATABASE_URL,
        pool: { min: 2, max: 10 },
      };
      break;
  }

  // Determine API key based on provider
  const apiKey =
    baseConfig.LLM_PROVIDER === 'anthropic'
      ? baseConfig.ANTHROPIC_API_KEY
      : baseConfig.OPENAI_API_KEY;

  let llmConfig: LLMConfig | null = null;
  if (apiKey) {
    llmConfig = {
      provider: baseConfig.LLM_PROVIDER,
      model: baseConfig.LLM_MODEL ?? DEFAULT_MODELS[baseConfig.LLM_PROVIDER],
      apiKey,
    };
  }

  let generationMode = baseConfig.GENERATION_MODE;
  if (generationMode === 'generation' && !llmConfig) {
    warnings.push(
      `No API key for LLM_PROVIDER=${baseConfig.LLM_PROVIDER}; falling back to GENERATION_MODE=template`
    );
    generationMode = 'template';
  }

  let explanations = baseConfig.EXPLANATIONS;
  if (explanations === 'llm' && !llmConfig) {
    warnings.push('EXPLANATIONS=llm needs an LLM API key; using summary explanations');
    explanations = 'summary';
  }

  const {
    DATABASE_PATH,
    DATABASE_URL,
    LLM_PROVIDER,
    LLM_MODEL,
    ANTHROPIC_API_KEY,
    OPENAI_API_KEY,
    ACCESS_POLICY_PATH,
    ...rest
  } = baseConfig;

  return {
    ...rest,
    GENERATION_MODE: generationMode,
    EXPLANATIONS: explanations,
    KNEX_CONFIG: knexConfig,
    LLM_CONFIG: llmConfig,
    ACCESS_POLICY_PATH: ACCESS_POLICY_PATH
      ? resolve(ACCESS_POLICY_PATH)
      : join(rootDir, 'config', 'access-policy.json'),
    WARNINGS: warnings,
  };
}

function resolveConfig(): Config {
  try {
    return loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Global configuration instance.
 */
export const config = resolveConfig();
