/**
 * Keyword-based intent classification.
 *
 * Decides whether a question is a data request, a question about the
 * assistant itself, or small talk, before any SQL is generated.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type {
  ClassificationBasis,
  ClassificationResult,
  IntentScores,
  Question,
} from '../types/models.js';

const KEYWORDS_URL = new URL('../../data/intent-keywords.json', import.meta.url);

const phraseList = z
  .array(z.string().trim().min(1))
  .transform((phrases) => [...new Set(phrases.map((p) => p.toLowerCase()))]);

const KeywordTablesSchema = z.object({
  database: phraseList,
  help: phraseList,
  offTopic: phraseList,
});

/**
 * Category → phrases. Phrases are lowercased and de-duplicated on load.
 */
export type KeywordTables = z.infer<typeof KeywordTablesSchema>;

export type IntentCategory = keyof KeywordTables;

/**
 * Validate a keyword table definition.
 *
 * @throws ZodError when a category is missing or holds empty phrases
 */
export function parseKeywordTables(input: unknown): KeywordTables {
  return KeywordTablesSchema.parse(input);
}

/**
 * Read keyword tables from a JSON file (defaults to the bundled tables).
 */
export function loadKeywordTables(path: string | URL = KEYWORDS_URL): KeywordTables {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseKeywordTables(parsed);
}

export const DEFAULT_LONG_QUESTION_WORDS = 6;

export interface IntentClassifierOptions {
  keywords?: KeywordTables;
  /** Unmatched questions with more words than this are treated as data requests */
  longQuestionWords?: number;
}

function countMatches(text: string, phrases: readonly string[]): number {
  let hits = 0;
  for (const phrase of phrases) {
    if (text.includes(phrase)) {
      hits++;
    }
  }
  return hits;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * Pure classifier over immutable keyword tables. Safe to share between
 * concurrent requests.
 */
export class IntentClassifier {
  private readonly keywords: KeywordTables;
  private readonly longQuestionWords: number;

  constructor(options: IntentClassifierOptions = {}) {
    this.keywords = options.keywords ?? loadKeywordTables();
    this.longQuestionWords = options.longQuestionWords ?? DEFAULT_LONG_QUESTION_WORDS;
  }

  /**
   * Count matched phrases per category for a question.
   */
  score(text: string): IntentScores {
    const lowered = text.toLowerCase();
    return {
      database: countMatches(lowered, this.keywords.database),
      help: countMatches(lowered, this.keywords.help),
      offTopic: countMatches(lowered, this.keywords.offTopic),
    };
  }

  classify(question: Question): ClassificationResult {
    const scores = this.score(question.text);

    const result = (
      kind: ClassificationResult['kind'],
      basis: ClassificationBasis
    ): ClassificationResult => ({ kind, question, scores, basis });

    if (scores.help > 0 && scores.database <= scores.help) {
      return result('HelpRequest', 'keywords');
    }
    // Database intent wins whenever both database and off-topic cues appear
    if (scores.offTopic > 0 && scores.database === 0) {
      return result('OffTopic', 'keywords');
    }
    if (scores.database > 0) {
      return result('DatabaseQuery', 'keywords');
    }
    if (countWords(question.text) > this.longQuestionWords) {
      return result('DatabaseQuery', 'long-question-default');
    }
    return result('OffTopic', 'short-question-default');
  }
}
