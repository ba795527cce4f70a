/**
 * Question pipeline: one user turn from raw text to a presentable table.
 *
 * Metadata intercept → intent classifier → canned response or SQL
 * generation → result coercion → presentation.
 */

import type { Config } from '../config.js';
import { GenerationError } from '../types/errors.js';
import {
  createQuestion,
  type ClassificationResult,
  type IntentScores,
  type PresentationTable,
  type Question,
  type TurnResponse,
} from '../types/models.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { tryCoerce, type CoercionOutcome } from './coercion.js';
import type { SqlExecutor } from './database.js';
import { SqlOrchestrator } from './executor.js';
import { format, formatFallback } from './formatter.js';
import { IntentClassifier } from './intent.js';
import { buildProviders, type TextGenerator } from './llm.js';
import { METADATA_PROVIDER, MetadataIntercept } from './metadata.js';
import { PromptLibrary } from './prompts.js';
import { messageTable, resolveResponses, type CannedResponses } from './responses.js';
import { RequestTrace } from './trace.js';

const NO_SCORES: IntentScores = Object.freeze({ database: 0, help: 0, offTopic: 0 });

export interface PipelineDeps {
  classifier: IntentClassifier;
  intercept: MetadataIntercept;
  orchestrator: SqlOrchestrator;
  responses: CannedResponses;
  logger?: Logger;
  maxQuestionLength?: number;
}

export class QueryPipeline {
  private readonly log: Logger;

  constructor(private readonly deps: PipelineDeps) {
    this.log = deps.logger ?? rootLogger;
  }

  /**
   * Handle one question. Generation failures are returned in `error`, not
   * thrown; only unexpected errors propagate.
   */
  async handleTurn(
    question: Question | string,
    schemaDescription: string,
    pinnedProvider?: string
  ): Promise<TurnResponse> {
    const q = typeof question === 'string' ? createQuestion(question, 1) : question;
    const trace = new RequestTrace({ logger: this.log, turn: q.turn });
    trace.info('question', q.text);

    const maxLength = this.deps.maxQuestionLength;
    if (maxLength !== undefined && q.text.length > maxLength) {
      const classification = this.deps.classifier.classify(q);
      const message = `Question is too long (${q.text.length} characters, at most ${maxLength})`;
      trace.error('error', message);
      return {
        classification,
        presentation: messageTable(message, 'error'),
        trace: trace.steps,
        error: { kind: 'QuestionTooLong', message },
      };
    }

    const intercepted = await this.tryMetadata(q, trace);
    if (intercepted) {
      return intercepted;
    }

    const classification = this.deps.classifier.classify(q);
    const { kind, basis, scores } = classification;
    const summary =
      `${kind} (${basis}; database=${scores.database}, help=${scores.help}, ` +
      `offTopic=${scores.offTopic})`;
    if (basis === 'long-question-default') {
      trace.warn('classification', `Ambiguous question resolved by default: ${summary}`);
    } else {
      trace.info('classification', summary);
    }

    switch (classification.kind) {
      case 'HelpRequest':
        return this.message(classification, this.deps.responses.help, trace);
      case 'OffTopic':
        return this.message(classification, this.deps.responses.offTopic, trace);
      case 'DatabaseQuery':
        break;
    }

    try {
      const outcome = await this.deps.orchestrator.generateAndExecute(
        q.text,
        schemaDescription,
        { pinnedProvider, trace }
      );
      return this.present(
        classification,
        outcome.coercion,
        outcome.generated.sql,
        outcome.generated.provider,
        trace
      );
    } catch (error) {
      if (error instanceof GenerationError) {
        return this.failure(classification, error, trace);
      }
      throw error;
    }
  }

  private async tryMetadata(q: Question, trace: RequestTrace): Promise<TurnResponse | null> {
    const classification: ClassificationResult = {
      kind: 'DatabaseQuery',
      question: q,
      scores: NO_SCORES,
      basis: 'metadata-intercept',
    };

    try {
      const answer = await this.deps.intercept.tryHandle(q.text);
      if (!answer) {
        return null;
      }
      trace.info('metadata', `Matched "${answer.trigger}"; answered without a language model`);
      trace.info('classification', 'DatabaseQuery (metadata-intercept)');
      trace.info('sanitized_sql', answer.sql);
      const coercion = tryCoerce(answer.result, answer.sql);
      return this.present(classification, coercion, answer.sql, METADATA_PROVIDER, trace);
    } catch (error) {
      if (error instanceof GenerationError) {
        trace.error('error', `${error.kind}: ${error.detail}`);
        return this.failure(classification, error, trace);
      }
      throw error;
    }
  }

  private present(
    classification: ClassificationResult,
    coercion: CoercionOutcome,
    sql: string,
    provider: string,
    trace: RequestTrace
  ): TurnResponse {
    let presentation: PresentationTable;
    if (coercion.ok) {
      presentation = format(coercion.result, classification.question.text, sql);
    } else {
      presentation = formatFallback(coercion.rawText);
    }
    trace.info('presentation', `${presentation.shape}: ${presentation.summary}`);

    return { classification, presentation, trace: trace.steps, sql, provider };
  }

  private message(
    classification: ClassificationResult,
    text: string,
    trace: RequestTrace
  ): TurnResponse {
    trace.info('presentation', `message: ${classification.kind}`);
    return { classification, presentation: messageTable(text), trace: trace.steps };
  }

  private failure(
    classification: ClassificationResult,
    error: GenerationError,
    trace: RequestTrace
  ): TurnResponse {
    return {
      classification,
      presentation: messageTable(error.detail, 'error'),
      trace: trace.steps,
      sql: error.sql,
      provider: error.provider,
      error: {
        kind: error.kind,
        message: error.detail,
        provider: error.provider,
        sql: error.sql,
      },
    };
  }
}

/**
 * Wire a pipeline from configuration around a SQL executor.
 */
export function createPipeline(
  config: Config,
  executor: SqlExecutor,
  options: { providers?: readonly TextGenerator[]; logger?: Logger } = {}
): QueryPipeline {
  const logger = options.logger ?? rootLogger;
  const providers = options.providers ?? buildProviders(config, logger);

  return new QueryPipeline({
    classifier: new IntentClassifier({ longQuestionWords: config.longQuestionWords }),
    intercept: new MetadataIntercept(executor),
    orchestrator: new SqlOrchestrator({
      providers,
      executor,
      prompts: new PromptLibrary({ promptDir: config.promptDir, logger }),
      rowLimit: config.defaultRowLimit,
    }),
    responses: resolveResponses(config.responses),
    logger,
    maxQuestionLength: config.maxQuestionLength,
  });
}

/**
 * A sequence of turns sharing a schema description. Only the immediately
 * preceding response is kept.
 */
export class Conversation {
  private turn = 0;
  private last: TurnResponse | null = null;

  constructor(
    private readonly pipeline: QueryPipeline,
    private readonly schemaDescription: string,
    private readonly pinnedProvider?: string
  ) {}

  async ask(text: string): Promise<TurnResponse> {
    this.turn++;
    const response = await this.pipeline.handleTurn(
      createQuestion(text, this.turn),
      this.schemaDescription,
      this.pinnedProvider
    );
    this.last = response;
    return response;
  }

  get previous(): TurnResponse | null {
    return this.last;
  }

  get turns(): number {
    return this.turn;
  }
}
