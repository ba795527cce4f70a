/**
 * Core data model shared by the pipeline stages.
 */

import type { Decimal } from 'decimal.js';

// ============================================================================
// QUESTIONS AND CLASSIFICATION
// ============================================================================

/**
 * A user question. Immutable once created; `turn` increases per conversation.
 */
export interface Question {
  readonly text: string;
  readonly turn: number;
}

export function createQuestion(text: string, turn: number): Question {
  return Object.freeze({ text, turn });
}

/**
 * Number of matched phrases per keyword category.
 */
export interface IntentScores {
  readonly database: number;
  readonly help: number;
  readonly offTopic: number;
}

/**
 * Which rule produced a classification.
 * `long-question-default` is the ambiguous case resolved by default policy.
 */
export type ClassificationBasis =
  | 'keywords'
  | 'long-question-default'
  | 'short-question-default'
  | 'metadata-intercept';

interface ClassificationBase {
  readonly question: Question;
  readonly scores: IntentScores;
  readonly basis: ClassificationBasis;
}

export interface DatabaseQueryClassification extends ClassificationBase {
  readonly kind: 'DatabaseQuery';
}

export interface HelpRequestClassification extends ClassificationBase {
  readonly kind: 'HelpRequest';
}

export interface OffTopicClassification extends ClassificationBase {
  readonly kind: 'OffTopic';
}

export type ClassificationResult =
  | DatabaseQueryClassification
  | HelpRequestClassification
  | OffTopicClassification;

// ============================================================================
// PROVIDERS AND GENERATED SQL
// ============================================================================

export const PROVIDER_KINDS = ['gemini', 'groq', 'ollama', 'anthropic', 'openai'] as const;

/**
 * gemini and groq are the hosted backends, ollama the local one;
 * anthropic and openai are available through the same SDK.
 */
export type ProviderKind = (typeof PROVIDER_KINDS)[number];

export function isProviderKind(value: string): value is ProviderKind {
  return PROVIDER_KINDS.some((kind) => kind === value);
}

export interface ProviderConfig {
  readonly name: string;
  readonly kind: ProviderKind;
  readonly model: string;
  readonly apiKey?: string;
  readonly baseUrl?: string;
}

export interface GeneratedSQL {
  /** Sanitized statement that was executed */
  readonly sql: string;
  /** Provider name that produced it */
  readonly provider: string;
  /** Unmodified model output, kept for diagnostics */
  readonly raw: string;
}

// ============================================================================
// RESULTS
// ============================================================================

/**
 * Typed cell value. Numbers are always integers; everything with a
 * fractional part is a Decimal.
 */
export type CellValue = string | number | Decimal | null;

/**
 * Result payload as returned by an execution path.
 */
export type RawResult =
  | {
      readonly kind: 'rows';
      readonly columns: readonly string[];
      readonly rows: ReadonlyArray<Readonly<Record<string, unknown>>>;
      /** Columns whose string values hold numbers (e.g. Postgres NUMERIC) */
      readonly numericColumns?: readonly string[];
    }
  | {
      readonly kind: 'text';
      readonly text: string;
    };

/**
 * Rows are positional and aligned with `columns`, so every record has the
 * same column set in the same order.
 */
export interface QueryResult {
  readonly columns: readonly string[];
  readonly rows: ReadonlyArray<readonly CellValue[]>;
}

export function toRecords(result: QueryResult): Map<string, CellValue>[] {
  return result.rows.map(
    (row) => new Map(result.columns.map((column, i) => [column, row[i] ?? null]))
  );
}

// ============================================================================
// PRESENTATION AND RESPONSES
// ============================================================================

export type PresentationShape =
  | 'currency'
  | 'table-list'
  | 'count'
  | 'generic'
  | 'fallback'
  | 'message'
  | 'error';

export type ColumnAlignment = 'left' | 'right';

export interface PresentationTable {
  readonly shape: PresentationShape;
  readonly headers: readonly string[];
  readonly rows: ReadonlyArray<readonly string[]>;
  readonly alignments: readonly ColumnAlignment[];
  readonly summary: string;
  /** One-line rendering for single values and canned messages */
  readonly headline?: string;
}

export type TraceLevel = 'info' | 'warn' | 'error';

export type TraceStep =
  | 'question'
  | 'metadata'
  | 'classification'
  | 'provider'
  | 'model_output'
  | 'sanitized_sql'
  | 'execution'
  | 'coercion'
  | 'presentation'
  | 'error';

export interface TraceEntry {
  readonly seq: number;
  readonly step: TraceStep;
  readonly level: TraceLevel;
  readonly message: string;
  readonly at: string;
}

export interface TurnError {
  readonly kind: string;
  readonly message: string;
  readonly provider?: string;
  readonly sql?: string;
}

export interface TurnResponse {
  readonly classification: ClassificationResult;
  readonly presentation: PresentationTable;
  readonly trace: readonly TraceEntry[];
  readonly sql?: string;
  readonly provider?: string;
  readonly error?: TurnError;
}
