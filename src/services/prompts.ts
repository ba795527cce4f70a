/**
 * Prompt templates for SQL generation, one per provider kind.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import type { ProviderKind } from '../types/models.js';
import type { SqlDialect } from './database.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

/**
 * Template for hosted models that follow instructions closely.
 */
export const STRICT_SQL_PROMPT = `You are a {dialect} SQL expert. Generate ONLY a pure SQL query.

Context:
- Your output is executed as-is against a read-only analytics database
- Anything other than the SQL statement makes the request fail

DATABASE INFORMATION:
{schema}

Question: {question}

MANDATORY RULES:
1. Respond with pure SQL only: no markdown, no code fences, no backticks
2. Do not add explanations, comments or any other text
3. Write a single read-only statement (SELECT or WITH); never modify data or schema
4. For count queries: use COUNT(*) without LIMIT
5. For other queries: add LIMIT {row_limit} unless the question asks for a different number of rows
6. For rankings: ORDER BY the ranked value, optionally with RANK() OVER (ORDER BY ...)
7. Give computed columns a readable alias (e.g. total_spent, order_count)
8. Use table and column names exactly as listed above

SQL:`;

/**
 * Shorter template for small local models.
 */
export const LOCAL_SQL_PROMPT = `You are a SQL expert. Generate clean {dialect} SQL queries.

DATABASE INFORMATION:
{schema}

Question: {question}

Rules:
1. SQL only, no explanations
2. Add LIMIT {row_limit} to SELECT queries that do not count rows
3. Only SELECT statements

SQL:`;

const BUILT_IN: Record<ProviderKind, string> = {
  gemini: STRICT_SQL_PROMPT,
  groq: STRICT_SQL_PROMPT,
  anthropic: STRICT_SQL_PROMPT,
  openai: STRICT_SQL_PROMPT,
  ollama: LOCAL_SQL_PROMPT,
};

export const GENERIC_TEMPLATE_FILE = 'sql_prompt_template.txt';

export function templateFileFor(kind: ProviderKind): string {
  return `${kind}_sql_prompt.txt`;
}

export interface PromptContext {
  schema: string;
  question: string;
  rowLimit: number;
  dialect: SqlDialect;
}

const DIALECT_LABELS: Record<SqlDialect, string> = {
  sqlite: 'SQLite',
  postgres: 'PostgreSQL',
  mysql: 'MySQL',
  generic: 'ANSI',
};

/**
 * Substitute `{schema}`, `{question}`, `{row_limit}` and `{dialect}` in a
 * single pass, so placeholder-like text inside the values stays literal.
 */
export function renderPrompt(template: string, context: PromptContext): string {
  const values: Record<string, string> = {
    schema: context.schema,
    question: context.question,
    row_limit: String(context.rowLimit),
    dialect: DIALECT_LABELS[context.dialect],
  };
  return template.replace(
    /\{(schema|question|row_limit|dialect)\}/g,
    (_match, key: string) => values[key]
  );
}

/**
 * Resolves the template for each provider kind. With a prompt directory,
 * `<kind>_sql_prompt.txt` wins over `sql_prompt_template.txt`, which wins
 * over the built-in template.
 */
export class PromptLibrary {
  private readonly promptDir?: string;
  private readonly log: Logger;
  private readonly templates = new Map<ProviderKind, string>();

  constructor(options: { promptDir?: string; logger?: Logger } = {}) {
    this.promptDir = options.promptDir;
    this.log = options.logger ?? rootLogger;
  }

  private readTemplate(file: string): string | null {
    if (!this.promptDir) {
      return null;
    }
    const path = join(this.promptDir, file);
    if (!existsSync(path)) {
      return null;
    }
    const text = readFileSync(path, 'utf-8').trim();
    if (text.length === 0) {
      this.log.warn(`Ignoring empty prompt template ${path}`);
      return null;
    }
    this.log.debug(`Loaded prompt template ${path}`);
    return text;
  }

  templateFor(kind: ProviderKind): string {
    const cached = this.templates.get(kind);
    if (cached !== undefined) {
      return cached;
    }
    const template =
      this.readTemplate(templateFileFor(kind)) ??
      this.readTemplate(GENERIC_TEMPLATE_FILE) ??
      BUILT_IN[kind];
    this.templates.set(kind, template);
    return template;
  }

  build(kind: ProviderKind, context: PromptContext): string {
    return renderPrompt(this.templateFor(kind), context);
  }
}
