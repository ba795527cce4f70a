/**
 * Configuration management using Zod for validation.
 *
 * `loadConfig()` returns a plain value; callers pass it down explicitly
 * instead of importing a process-wide instance.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';
import type { Knex } from 'knex';
import { ConfigError } from './types/errors.js';
import {
  PROVIDER_KINDS,
  isProviderKind,
  type ProviderConfig,
  type ProviderKind,
} from './types/models.js';

const DEFAULT_PRIORITY: ProviderKind[] = ['gemini', 'ollama', 'groq', 'anthropic', 'openai'];

const providerList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((part) => part.trim().toLowerCase())
      .filter((part) => part.length > 0)
  )
  .pipe(z.array(z.enum(PROVIDER_KINDS)).min(1));

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // Provider selection
  LLM_PROVIDER: z
    .string()
    .default('auto')
    .transform((value) => value.trim().toLowerCase())
    .refine((value) => value === 'auto' || isProviderKind(value), {
      message: `must be "auto" or one of ${PROVIDER_KINDS.join(', ')}`,
    }),
  LLM_PRIORITY: providerList.default(DEFAULT_PRIORITY.join(',')),

  // Provider credentials and models
  GOOGLE_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default('gemini-2.0-flash'),
  GROQ_API_KEY: z.string().optional(),
  GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().default('codellama:7b-instruct'),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default('claude-sonnet-4-5-20250929'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o'),

  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  OLLAMA_CHECK_TIMEOUT_MS: z.coerce.number().int().positive().default(3_000),

  // Database Configuration
  DATABASE_TYPE: z.enum(['sqlite3', 'pg', 'mysql2']).default('sqlite3'),
  DATABASE_PATH: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  SCHEMA_DESCRIPTION_PATH: z.string().optional(),

  // Pipeline behaviour
  PROMPT_DIR: z.string().optional(),
  DEFAULT_ROW_LIMIT: z.coerce.number().int().positive().default(10),
  LONG_QUESTION_WORDS: z.coerce.number().int().nonnegative().default(6),
  MAX_QUESTION_LENGTH: z.coerce.number().int().positive().default(500),
  HELP_MESSAGE: z.string().optional(),
  OFF_TOPIC_MESSAGE: z.string().optional(),

  // Server Configuration
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'SILENT'])
    .default('INFO'),
  PORT: z.coerce.number().int().positive().default(8000),
});

type BaseConfig = z.infer<typeof ConfigSchema>;

export type DatabaseType = BaseConfig['DATABASE_TYPE'];

export interface Config {
  /** Provider to pin for every request, or undefined for priority order */
  pinnedProvider?: ProviderKind;
  providers: ProviderConfig[];
  llm: {
    timeoutMs: number;
    maxOutputTokens: number;
    checkTimeoutMs: number;
  };
  database: {
    type: DatabaseType;
    knex: Knex.Config;
  };
  schemaDescriptionPath?: string;
  promptDir?: string;
  defaultRowLimit: number;
  longQuestionWords: number;
  maxQuestionLength: number;
  responses: {
    help?: string;
    offTopic?: string;
  };
  logLevel: BaseConfig['LOG_LEVEL'];
  port: number;
}

/**
 * Load `.env` from the working directory if present. Existing environment
 * variables win over file values.
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
  const envPath = join(cwd, '.env');
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }
}

function buildKnexConfig(base: BaseConfig, issues: string[]): Knex.Config {
  switch (base.DATABASE_TYPE) {
    case 'sqlite3':
      if (!base.DATABASE_PATH) {
        issues.push('DATABASE_PATH is required when DATABASE_TYPE is sqlite3');
      }
      return {
        client: 'better-sqlite3',
        connection: { filename: base.DATABASE_PATH ?? ':memory:' },
        useNullAsDefault: true,
      };

    case 'pg':
      if (!base.DATABASE_URL) {
        issues.push('DATABASE_URL is required when DATABASE_TYPE is pg');
      }
      return {
        client: 'pg',
        connection: base.DATABASE_URL,
        pool: { min: 0, max: 10 },
      };

    case 'mysql2':
      if (!base.DATABASE_URL) {
        issues.push('DATABASE_URL is required when DATABASE_TYPE is mysql2');
      }
      return {
        client: 'mysql2',
        connection: base.DATABASE_URL,
        pool: { min: 0, max: 10 },
      };
  }
}

/**
 * Build provider entries in priority order. Every kind is listed even
 * without credentials; availability is decided per request.
 */
function buildProviderConfigs(base: BaseConfig): ProviderConfig[] {
  const byKind: Record<ProviderKind, ProviderConfig> = {
    gemini: {
      name: 'gemini',
      kind: 'gemini',
      model: base.GEMINI_MODEL,
      apiKey: base.GOOGLE_API_KEY,
    },
    groq: { name: 'groq', kind: 'groq', model: base.GROQ_MODEL, apiKey: base.GROQ_API_KEY },
    ollama: {
      name: 'ollama',
      kind: 'ollama',
      model: base.OLLAMA_MODEL,
      baseUrl: base.OLLAMA_BASE_URL,
    },
    anthropic: {
      name: 'anthropic',
      kind: 'anthropic',
      model: base.ANTHROPIC_MODEL,
      apiKey: base.ANTHROPIC_API_KEY,
    },
    openai: {
      name: 'openai',
      kind: 'openai',
      model: base.OPENAI_MODEL,
      apiKey: base.OPENAI_API_KEY,
    },
  };

  const ordered = [...new Set(base.LLM_PRIORITY)];
  return ordered.map((kind) => byKind[kind]);
}

/**
 * Parse and validate configuration from environment variables.
 *
 * @throws ConfigError listing every problem found
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const base = parsed.data;

  const issues: string[] = [];
  const knexConfig = buildKnexConfig(base, issues);
  const providers = buildProviderConfigs(base);

  const pinned = isProviderKind(base.LLM_PROVIDER) ? base.LLM_PROVIDER : undefined;
  if (pinned && !providers.some((p) => p.kind === pinned)) {
    issues.push(`LLM_PROVIDER "${pinned}" is not listed in LLM_PRIORITY`);
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return {
    pinnedProvider: pinned,
    providers,
    llm: {
      timeoutMs: base.LLM_TIMEOUT_MS,
      maxOutputTokens: base.LLM_MAX_TOKENS,
      checkTimeoutMs: base.OLLAMA_CHECK_TIMEOUT_MS,
    },
    database: {
      type: base.DATABASE_TYPE,
      knex: knexConfig,
    },
    schemaDescriptionPath: base.SCHEMA_DESCRIPTION_PATH,
    promptDir: base.PROMPT_DIR,
    defaultRowLimit: base.DEFAULT_ROW_LIMIT,
    longQuestionWords: base.LONG_QUESTION_WORDS,
    maxQuestionLength: base.MAX_QUESTION_LENGTH,
    responses: {
      help: base.HELP_MESSAGE,
      offTopic: base.OFF_TOPIC_MESSAGE,
    },
    logLevel: base.LOG_LEVEL,
    port: base.PORT,
  };
}
