/**
 * SQL generation orchestrator.
 *
 * One attempt per request:
 * 1. Selects a provider (pinned or first available)
 * 2. Builds the provider's prompt
 * 3. Generates and sanitizes the SQL
 * 4. Executes it
 * 5. Coerces the result
 *
 * A failure at any step ends the request. There is no retry on the same
 * provider and no move to another one.
 */

import {
  ExecutionFailedError,
  GenerationError,
  ProviderFailedError,
} from '../types/errors.js';
import type { GeneratedSQL, RawResult } from '../types/models.js';
import { tryCoerce, type CoercionOutcome } from './coercion.js';
import type { SqlExecutor } from './database.js';
import { selectProvider, type TextGenerator } from './llm.js';
import type { PromptLibrary } from './prompts.js';
import { assertReadOnly, sanitizeSql } from './sanitize.js';
import type { RequestTrace } from './trace.js';

export interface OrchestratorDeps {
  providers: readonly TextGenerator[];
  executor: SqlExecutor;
  prompts: PromptLibrary;
  rowLimit: number;
}

export interface GenerateOptions {
  pinnedProvider?: string;
  trace: RequestTrace;
}

export interface GenerationOutcome {
  generated: GeneratedSQL;
  coercion: CoercionOutcome;
}

function describeRaw(result: RawResult): string {
  return result.kind === 'rows'
    ? `Returned ${result.rows.length} rows`
    : `Returned text result (${result.text.length} characters)`;
}

export class SqlOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  /**
   * Generate SQL for a question, execute it and coerce the result.
   *
   * @throws GenerationError subclasses; the error is recorded in the trace
   * before it propagates
   */
  async generateAndExecute(
    question: string,
    schemaDescription: string,
    options: GenerateOptions
  ): Promise<GenerationOutcome> {
    const { trace } = options;
    try {
      return await this.run(question, schemaDescription, options);
    } catch (error) {
      if (error instanceof GenerationError) {
        trace.error('error', `${error.kind}: ${error.detail}`);
      }
      throw error;
    }
  }

  private async run(
    question: string,
    schemaDescription: string,
    { pinnedProvider, trace }: GenerateOptions
  ): Promise<GenerationOutcome> {
    const { providers, executor, prompts, rowLimit } = this.deps;

    const provider = await selectProvider(providers, pinnedProvider);
    trace.info(
      'provider',
      `Using ${provider.name} (${provider.kind}/${provider.model})` +
        (pinnedProvider ? ' [pinned]' : '')
    );

    const prompt = prompts.build(provider.kind, {
      schema: schemaDescription,
      question,
      rowLimit,
      dialect: executor.dialect,
    });

    let raw: string;
    try {
      raw = await provider.generate(prompt);
    } catch (error) {
      throw error instanceof GenerationError
        ? error
        : new ProviderFailedError(provider.name, error);
    }
    trace.info('model_output', raw);

    const sql = sanitizeSql(raw, provider.name);
    trace.info('sanitized_sql', sql);
    assertReadOnly(sql, provider.name);

    let result: RawResult;
    try {
      result = await executor.execute(sql);
    } catch (error) {
      throw new ExecutionFailedError(provider.name, sql, error);
    }
    trace.info('execution', describeRaw(result));

    const coercion = tryCoerce(result, sql);
    if (coercion.ok) {
      trace.info(
        'coercion',
        `Coerced ${coercion.result.rows.length} rows x ${coercion.result.columns.length} columns`
      );
    } else {
      trace.warn('coercion', `${coercion.error.kind}: ${coercion.error.message}`);
    }

    return { generated: { sql, provider: provider.name, raw }, coercion };
  }
}
