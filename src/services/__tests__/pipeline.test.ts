import { describe, it, expect } from 'vitest';
import { Conversation, QueryPipeline, createPipeline } from '../pipeline.js';
import { IntentClassifier } from '../intent.js';
import { MetadataIntercept, tableListSql } from '../metadata.js';
import { SqlOrchestrator } from '../executor.js';
import { PromptLibrary } from '../prompts.js';
import {
  DEFAULT_HELP_MESSAGE,
  DEFAULT_OFF_TOPIC_MESSAGE,
  resolveResponses,
} from '../responses.js';
import { FALLBACK_SUMMARY } from '../formatter.js';
import { loadConfig } from '../../config.js';
import { fakeExecutor, fakeProvider, type FakeExecutor, type FakeProvider } from './fakes.js';

const SCHEMA = 'orders(o_orderkey INTEGER, total_price NUMERIC)';

function pipeline(provider: FakeProvider, executor: FakeExecutor) {
  return new QueryPipeline({
    classifier: new IntentClassifier(),
    intercept: new MetadataIntercept(executor),
    orchestrator: new SqlOrchestrator({
      providers: [provider],
      executor,
      prompts: new PromptLibrary(),
      rowLimit: 10,
    }),
    responses: resolveResponses(),
    maxQuestionLength: 200,
  });
}

describe('QueryPipeline.handleTurn', () => {
  it('answers help requests without a model or database', async () => {
    const provider = fakeProvider('gemini');
    const executor = fakeExecutor({ kind: 'rows', columns: [], rows: [] });

    const response = await pipeline(provider, executor).handleTurn('How can you help me?', SCHEMA);

    expect(response.classification.kind).toBe('HelpRequest');
    expect(response.presentation.shape).toBe('message');
    expect(response.presentation.rows).toEqual([[DEFAULT_HELP_MESSAGE]]);
    expect(response.presentation.summary).toBe('');
    expect(response.trace.map((e) => e.step)).toEqual([
      'question',
      'classification',
      'presentation',
    ]);
    expect(provider.generate).not.toHaveBeenCalled();
    expect(executor.execute).not.toHaveBeenCalled();
  });

  it('declines off-topic questions', async () => {
    const provider = fakeProvider('gemini');
    const executor = fakeExecutor({ kind: 'rows', columns: [], rows: [] });

    const response = await pipeline(provider, executor).handleTurn('Tell me a joke', SCHEMA);

    expect(response.classification.kind).toBe('OffTopic');
    expect(response.presentation.headline).toBe(DEFAULT_OFF_TOPIC_MESSAGE);
    expect(response.trace[response.trace.length - 1].message).toBe('message: OffTopic');
    expect(provider.generate).not.toHaveBeenCalled();
  });

  it('lists tables without calling a model', async () => {
    const provider = fakeProvider('gemini');
    const executor = fakeExecutor({
      kind: 'rows',
      columns: ['TABLE_NAME', 'TABLE_TYPE'],
      rows: [{ TABLE_NAME: 'orders', TABLE_TYPE: 'BASE TABLE' }],
    });

    const response = await pipeline(provider, executor).handleTurn('Show tables', SCHEMA);

    expect(provider.generate).not.toHaveBeenCalled();
    expect(response.provider).toBe('metadata');
    expect(response.sql).toBe(tableListSql('sqlite'));
    expect(response.classification.basis).toBe('metadata-intercept');
    expect(response.presentation.shape).toBe('table-list');
    expect(response.presentation.rows).toEqual([['1', 'orders', 'BASE TABLE']]);
    expect(response.trace.map((e) => [e.step, e.message])).toEqual([
      ['question', 'Show tables'],
      ['metadata', 'Matched "show tables"; answered without a language model'],
      ['classification', 'DatabaseQuery (metadata-intercept)'],
      ['sanitized_sql', tableListSql('sqlite')],
      ['presentation', 'table-list: 1 records found'],
    ]);
  });

  it('turns a data question into a currency table', async () => {
    const provider = fakeProvider('gemini', {
      output:
        '```sql\nSELECT o_orderkey, total_price FROM orders ' +
        'ORDER BY total_price DESC LIMIT 10\n```',
    });
    const executor = fakeExecutor({
      kind: 'rows',
      columns: ['o_orderkey', 'total_price'],
      rows: [
        { o_orderkey: 1, total_price: 1500.5 },
        { o_orderkey: 2, total_price: 99.99 },
      ],
    });

    const response = await pipeline(provider, executor).handleTurn(
      'What are the 10 orders with the highest value?',
      SCHEMA
    );

    expect(response.error).toBeUndefined();
    expect(response.provider).toBe('gemini');
    expect(response.sql).toBe(
      'SELECT o_orderkey, total_price FROM orders ORDER BY total_price DESC LIMIT 10'
    );
    expect(response.presentation).toEqual({
      shape: 'currency',
      headers: ['Order ID', 'Total Price'],
      rows: [
        ['1', '$1,500.50'],
        ['2', '$99.99'],
      ],
      alignments: ['right', 'right'],
      summary: '2 records found',
    });
    expect(response.trace.map((e) => e.step)).toEqual([
      'question',
      'classification',
      'provider',
      'model_output',
      'sanitized_sql',
      'execution',
      'coercion',
      'presentation',
    ]);
  });

  it('shows the raw text when the result cannot be coerced', async () => {
    const executor = fakeExecutor({ kind: 'text', text: '[(1, 2), (3,)]' });

    const response = await pipeline(fakeProvider('gemini'), executor).handleTurn(
      'show me sales this month',
      SCHEMA
    );

    expect(response.error).toBeUndefined();
    expect(response.presentation).toEqual({
      shape: 'fallback',
      headers: ['Result'],
      rows: [['[(1, 2), (3,)]']],
      alignments: ['left'],
      summary: FALLBACK_SUMMARY,
    });
  });

  it('returns execution failures as an error response', async () => {
    const executor = fakeExecutor(() => {
      throw new Error('no such table: sales');
    });

    const response = await pipeline(fakeProvider('gemini'), executor).handleTurn(
      'show me sales this month',
      SCHEMA
    );

    expect(response.error).toEqual({
      kind: 'ExecutionFailed',
      message: 'Query failed: no such table: sales',
      provider: 'gemini',
      sql: 'SELECT 1',
    });
    expect(response.presentation.shape).toBe('error');
    expect(response.presentation.headline).toBe('Query failed: no such table: sales');
  });

  it('reports a missing provider', async () => {
    const provider = fakeProvider('gemini', { available: false });
    const executor = fakeExecutor({ kind: 'rows', columns: [], rows: [] });

    const response = await pipeline(provider, executor).handleTurn(
      'show me sales this month',
      SCHEMA
    );

    expect(response.error?.kind).toBe('ProviderUnavailable');
    expect(response.presentation.shape).toBe('error');
    expect(executor.execute).not.toHaveBeenCalled();
  });

  it('rejects questions over the length limit', async () => {
    const provider = fakeProvider('gemini');
    const executor = fakeExecutor({ kind: 'rows', columns: [], rows: [] });

    const response = await pipeline(provider, executor).handleTurn('x'.repeat(201), SCHEMA);

    expect(response.error).toEqual({
      kind: 'QuestionTooLong',
      message: 'Question is too long (201 characters, at most 200)',
    });
    expect(executor.execute).not.toHaveBeenCalled();
    expect(provider.generate).not.toHaveBeenCalled();
  });

  it('flags questions answered by the long-question default', async () => {
    const response = await pipeline(
      fakeProvider('gemini'),
      fakeExecutor({ kind: 'rows', columns: ['n'], rows: [{ n: 1 }] })
    ).handleTurn('Could you please tell me something interesting about Paris?', SCHEMA);

    const classification = response.trace.find((e) => e.step === 'classification');
    expect(classification?.level).toBe('warn');
    expect(classification?.message).toMatch(
      /^Ambiguous question resolved by default: DatabaseQuery \(long-question-default;/
    );
  });
});

describe('Conversation', () => {
  it('numbers turns and keeps only the previous response', async () => {
    const conversation = new Conversation(
      pipeline(fakeProvider('gemini'), fakeExecutor({ kind: 'rows', columns: [], rows: [] })),
      SCHEMA
    );

    expect(conversation.previous).toBeNull();
    await conversation.ask('How can you help me?');
    const second = await conversation.ask('Tell me a joke');

    expect(conversation.turns).toBe(2);
    expect(conversation.previous).toBe(second);
    expect(second.classification.question.turn).toBe(2);
  });
});

describe('createPipeline', () => {
  it('wires a pipeline from configuration', async () => {
    const config = loadConfig({ DATABASE_PATH: ':memory:', HELP_MESSAGE: 'Ask about orders.' });
    const provider = fakeProvider('gemini');
    const built = createPipeline(config, fakeExecutor({ kind: 'rows', columns: [], rows: [] }), {
      providers: [provider],
    });

    const response = await built.handleTurn('How can you help me?', SCHEMA);
    expect(response.presentation.headline).toBe('Ask about orders.');
  });
});
