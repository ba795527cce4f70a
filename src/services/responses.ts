/**
 * Canned responses for questions that never reach the database.
 */

import type { PresentationShape, PresentationTable } from '../types/models.js';

export const DEFAULT_HELP_MESSAGE = [
  'I answer questions about the data in the connected warehouse by turning them into SQL.',
  'Try for example:',
  '  • "Show all tables"',
  '  • "How many customers are there?"',
  '  • "What are the 10 orders with the highest value?"',
  '  • "Average account balance per region"',
].join('\n');

export const DEFAULT_OFF_TOPIC_MESSAGE =
  'I can only answer questions about the data in the warehouse. ' +
  'Ask about tables, customers, orders or sales, or type "help" for examples.';

export interface CannedResponses {
  readonly help: string;
  readonly offTopic: string;
}

export function resolveResponses(
  overrides: { help?: string; offTopic?: string } = {}
): CannedResponses {
  return {
    help: overrides.help?.trim() || DEFAULT_HELP_MESSAGE,
    offTopic: overrides.offTopic?.trim() || DEFAULT_OFF_TOPIC_MESSAGE,
  };
}

/**
 * One-cell table for a text message. Messages are not query results, so
 * they carry no record-count summary.
 */
export function messageTable(
  text: string,
  shape: Extract<PresentationShape, 'message' | 'error'> = 'message'
): PresentationTable {
  return {
    shape,
    headers: [shape === 'error' ? 'Error' : 'Message'],
    rows: [[text]],
    alignments: ['left'],
    summary: '',
    headline: text,
  };
}
