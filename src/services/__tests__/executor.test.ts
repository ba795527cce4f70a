import { describe, it, expect } from 'vitest';
import { SqlOrchestrator } from '../executor.js';
import { PromptLibrary } from '../prompts.js';
import { RequestTrace } from '../trace.js';
import {
  ExecutionFailedError,
  ProviderFailedError,
  ProviderUnavailableError,
  UnsafeSqlError,
} from '../../types/errors.js';
import type { RawResult } from '../../types/models.js';
import { fakeExecutor, fakeProvider, type FakeExecutor, type FakeProvider } from './fakes.js';

const SCHEMA = 'customers(name TEXT, total NUMERIC)';
const TEXT_RESULT: RawResult = { kind: 'text', text: "[('Ann', Decimal('10.50'))]" };

function orchestrator(providers: FakeProvider[], executor: FakeExecutor) {
  return new SqlOrchestrator({
    providers,
    executor,
    prompts: new PromptLibrary(),
    rowLimit: 10,
  });
}

describe('SqlOrchestrator', () => {
  it('generates, executes and coerces in one attempt', async () => {
    const provider = fakeProvider('gemini', { output: 'SELECT name, total FROM customers;' });
    const executor = fakeExecutor(TEXT_RESULT);
    const trace = new RequestTrace();

    const outcome = await orchestrator([provider], executor).generateAndExecute(
      'Which customers spent the most?',
      SCHEMA,
      { trace }
    );

    expect(outcome.generated).toEqual({
      sql: 'SELECT name, total FROM customers',
      provider: 'gemini',
      raw: 'SELECT name, total FROM customers;',
    });
    expect(executor.execute).toHaveBeenCalledWith('SELECT name, total FROM customers');
    expect(outcome.coercion.ok).toBe(true);
    if (outcome.coercion.ok) {
      expect(outcome.coercion.result.columns).toEqual(['name', 'total']);
    }

    expect(trace.steps.map((s) => [s.step, s.message])).toEqual([
      ['provider', 'Using gemini (gemini/test-model)'],
      ['model_output', 'SELECT name, total FROM customers;'],
      ['sanitized_sql', 'SELECT name, total FROM customers'],
      ['execution', 'Returned text result (27 characters)'],
      ['coercion', 'Coerced 1 rows x 2 columns'],
    ]);
  });

  it('builds the prompt from the schema, question, dialect and row limit', async () => {
    const provider = fakeProvider('gemini');
    await orchestrator([provider], fakeExecutor(TEXT_RESULT)).generateAndExecute(
      'top customers',
      SCHEMA,
      { trace: new RequestTrace() }
    );

    const prompt = provider.generate.mock.calls[0][0];
    expect(prompt).toContain('You are a SQLite SQL expert.');
    expect(prompt).toContain(SCHEMA);
    expect(prompt).toContain('Question: top customers');
    expect(prompt).toContain('add LIMIT 10 unless');
  });

  it('uses the pinned provider', async () => {
    const gemini = fakeProvider('gemini');
    const groq = fakeProvider('groq', { kind: 'groq' });
    const trace = new RequestTrace();

    const outcome = await orchestrator([gemini, groq], fakeExecutor(TEXT_RESULT))
      .generateAndExecute('top customers', SCHEMA, { pinnedProvider: 'groq', trace });

    expect(outcome.generated.provider).toBe('groq');
    expect(gemini.generate).not.toHaveBeenCalled();
    expect(trace.steps[0].message).toBe('Using groq (groq/test-model) [pinned]');
  });

  it('fails before any model call when no provider is available', async () => {
    const provider = fakeProvider('gemini', { available: false });
    const executor = fakeExecutor(TEXT_RESULT);
    const trace = new RequestTrace();

    await expect(
      orchestrator([provider], executor).generateAndExecute('q', SCHEMA, { trace })
    ).rejects.toBeInstanceOf(ProviderUnavailableError);
    expect(provider.generate).not.toHaveBeenCalled();
    expect(executor.execute).not.toHaveBeenCalled();
    expect(trace.steps.map((s) => [s.step, s.level])).toEqual([['error', 'error']]);
  });

  it('does not retry or move to another provider after a failure', async () => {
    const first = fakeProvider('gemini', { error: new Error('quota exceeded') });
    const second = fakeProvider('groq', { kind: 'groq' });

    const error = await orchestrator([first, second], fakeExecutor(TEXT_RESULT))
      .generateAndExecute('q', SCHEMA, { trace: new RequestTrace() })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderFailedError);
    if (error instanceof ProviderFailedError) {
      expect(error.detail).toBe('Provider "gemini" failed: quota exceeded');
    }
    expect(first.generate).toHaveBeenCalledTimes(1);
    expect(second.generate).not.toHaveBeenCalled();
  });

  it('refuses statements that write', async () => {
    const provider = fakeProvider('gemini', {
      output: 'WITH gone AS (DELETE FROM customers RETURNING *) SELECT * FROM gone',
    });
    const executor = fakeExecutor(TEXT_RESULT);

    await expect(
      orchestrator([provider], executor).generateAndExecute('q', SCHEMA, {
        trace: new RequestTrace(),
      })
    ).rejects.toBeInstanceOf(UnsafeSqlError);
    expect(executor.execute).not.toHaveBeenCalled();
  });

  it('reports execution failures with the provider and SQL', async () => {
    const provider = fakeProvider('gemini', { output: 'SELECT missing FROM customers' });
    const executor = fakeExecutor(() => {
      throw new Error('no such column: missing');
    });
    const trace = new RequestTrace();

    const error = await orchestrator([provider], executor)
      .generateAndExecute('q', SCHEMA, { trace })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExecutionFailedError);
    if (error instanceof ExecutionFailedError) {
      expect(error.provider).toBe('gemini');
      expect(error.sql).toBe('SELECT missing FROM customers');
    }
    const last = trace.steps[trace.size - 1];
    expect(last.step).toBe('error');
    expect(last.message).toBe('ExecutionFailed: Query failed: no such column: missing');
  });

  it('returns a coercion failure instead of throwing', async () => {
    const executor = fakeExecutor({ kind: 'text', text: '[(1, 2), (3,)]' });
    const trace = new RequestTrace();

    const outcome = await orchestrator([fakeProvider('gemini')], executor).generateAndExecute(
      'q',
      SCHEMA,
      { trace }
    );

    expect(outcome.coercion.ok).toBe(false);
    const last = trace.steps[trace.size - 1];
    expect([last.step, last.level, last.message]).toEqual([
      'coercion',
      'warn',
      'IrregularShape: Row 2 has 1 values, expected 2',
    ]);
  });
});
