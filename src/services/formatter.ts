/**
 * Presentation formatting: picks a display shape from lexical cues in the
 * question and SQL, then renders every cell as a display string.
 */

import { Decimal } from 'decimal.js';
import type {
  CellValue,
  ColumnAlignment,
  PresentationShape,
  PresentationTable,
  QueryResult,
} from '../types/models.js';

const MONEY_TERMS = ['value', 'price', 'revenue', 'spent', 'total', 'amount', 'sales', 'cost'];
const COUNT_QUESTION = /\b(?:how many|count|number of)\b/;
const COUNT_NOUN_SKIP = new Set([
  'the',
  'of',
  'all',
  'distinct',
  'different',
  'unique',
  'total',
  'are',
  'is',
]);

const MONEY_COLUMN =
  /price|revenue|amount|value|cost|spen[dt]|sales|balance|paid|(?:^|_)total$/i;
const QUANTITY_COLUMN = new RegExp(
  '(?:^|_)(?:qty|quantity|units?|year|month|day|week|hour|age|rank|score|pct|percent(?:age)?)' +
    '(?:_|$)',
  'i'
);
const COUNT_COLUMN = /(?:^|_)(?:count|cnt)$|^(?:count|cnt)_|^num_/i;
const ID_COLUMN = /(?:^|_)id$|key$/i;

const HEADER_LOOKUP: Record<string, string> = {
  id: 'ID',
  count: 'Count',
  cnt: 'Count',
  qty: 'Quantity',
  amt: 'Amount',
  desc: 'Description',
};

export const FALLBACK_SUMMARY = '1 records found (formatting fallback: raw result shown)';

export function summarize(rowCount: number): string {
  return `${rowCount} records found`;
}

// ============================================================================
// CELL RENDERING
// ============================================================================

function isNumericCell(value: CellValue): value is number | Decimal {
  return typeof value === 'number' || Decimal.isDecimal(value);
}

function groupDigits(plain: string): string {
  const [whole, fraction] = plain.split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return fraction === undefined ? grouped : `${grouped}.${fraction}`;
}

/**
 * `1234.5` → `$1,234.50`; negative amounts keep the sign before the symbol.
 */
export function formatCurrency(value: number | Decimal): string {
  const amount = new Decimal(value);
  const fixed = amount.abs().toFixed(2);
  const sign = amount.isNegative() && fixed !== '0.00' ? '-' : '';
  return `${sign}$${groupDigits(fixed)}`;
}

/**
 * Thousands-grouped number without a currency symbol.
 */
export function formatGrouped(value: number | Decimal): string {
  const amount = new Decimal(value);
  const sign = amount.isNegative() && !amount.isZero() ? '-' : '';
  return `${sign}${groupDigits(amount.abs().toFixed())}`;
}

function formatPlain(value: CellValue): string {
  if (value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return value.toFixed();
}

// ============================================================================
// HEADERS
// ============================================================================

function words(column: string): string[] {
  return column
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/[\s_]+/)
    .filter((word) => word.length > 0);
}

export function titleCase(column: string): string {
  return words(column)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Human label for a technical column name: `*_id` and `*key` become
 * `<Name> ID`, count columns `Count`, short table prefixes (`c_`, `o_`)
 * are dropped.
 */
export function humanizeHeader(column: string): string {
  const lowered = column.toLowerCase();
  const known = HEADER_LOOKUP[lowered];
  if (known !== undefined) {
    return known;
  }
  if (COUNT_COLUMN.test(column)) {
    return 'Count';
  }

  const stripped = /^[a-z]{1,2}_[a-z]/i.test(column)
    ? column.replace(/^[a-z]{1,2}_/i, '')
    : column;

  const idMatch = /^(.+?)(?:_id|_?key)$/i.exec(stripped);
  if (idMatch) {
    return `${titleCase(idMatch[1])} ID`;
  }
  return titleCase(stripped);
}

// ============================================================================
// SHAPE INFERENCE
// ============================================================================

interface ColumnProfile {
  name: string;
  numeric: boolean;
  integral: boolean;
  /** Some value carries a fractional part */
  fractional: boolean;
}

function hasFraction(value: CellValue): boolean {
  if (typeof value === 'number') {
    return !Number.isInteger(value);
  }
  return Decimal.isDecimal(value) && !value.isInteger();
}

function profile(result: QueryResult): ColumnProfile[] {
  return result.columns.map((name, i) => {
    const values = result.rows.map((row) => row[i]).filter((v) => v !== null);
    const numeric = values.length > 0 && values.every(isNumericCell);
    const integral = numeric && values.every((v) => typeof v === 'number');
    const fractional = numeric && values.some(hasFraction);
    return { name, numeric, integral, fractional };
  });
}

function alignmentOf(column: ColumnProfile): ColumnAlignment {
  return column.numeric ? 'right' : 'left';
}

function mentionsAny(text: string, terms: readonly string[]): boolean {
  return terms.some((term) => text.includes(term));
}

function isCountQuestion(question: string, sql: string): boolean {
  return COUNT_QUESTION.test(question.toLowerCase()) || /\bCOUNT\s*\(/i.test(sql);
}

/**
 * Noun being counted, taken from the words after "how many" / "number of"
 * / "count".
 */
export function countNoun(question: string): string {
  const lowered = question.toLowerCase();
  const match = /\b(?:how many|number of|count(?: of)?)\s+([\s\S]*)$/.exec(lowered);
  if (!match) {
    return 'records';
  }
  const candidates = match[1]
    .split(/\s+/)
    .map((word) => word.replace(/[^a-z0-9_-]/g, ''))
    .filter((word) => word.length > 0);
  return candidates.find((word) => !COUNT_NOUN_SKIP.has(word)) ?? 'records';
}

function table(
  shape: PresentationShape,
  headers: string[],
  rows: string[][],
  alignments: ColumnAlignment[],
  headline?: string
): PresentationTable {
  return { shape, headers, rows, alignments, summary: summarize(rows.length), headline };
}

function currencyShape(
  result: QueryResult,
  profiles: ColumnProfile[],
  countQuestion: boolean
): PresentationTable | null {
  const candidates = profiles.map(
    (p) =>
      p.numeric &&
      !COUNT_COLUMN.test(p.name) &&
      !ID_COLUMN.test(p.name) &&
      !QUANTITY_COLUMN.test(p.name) &&
      !(countQuestion && p.integral)
  );
  // Named money columns win; otherwise only columns holding fractional amounts
  const named = profiles.map((p, i) => candidates[i] && MONEY_COLUMN.test(p.name));
  const money = named.some(Boolean)
    ? named
    : profiles.map((p, i) => candidates[i] && p.fractional);
  if (!money.some(Boolean)) {
    return null;
  }

  return table(
    'currency',
    result.columns.map(humanizeHeader),
    result.rows.map((row) =>
      row.map((value, i) =>
        money[i] && isNumericCell(value) ? formatCurrency(value) : formatPlain(value)
      )
    ),
    profiles.map(alignmentOf)
  );
}

function isTableList(result: QueryResult): boolean {
  const columns = result.columns.map((c) => c.toLowerCase());
  return columns.length === 2 && columns[0] === 'table_name' && columns[1] === 'table_type';
}

function tableListShape(result: QueryResult): PresentationTable {
  return table(
    'table-list',
    ['#', 'Table', 'Type'],
    result.rows.map((row, i) => [String(i + 1), formatPlain(row[0]), formatPlain(row[1])]),
    ['right', 'left', 'left']
  );
}

function countShape(result: QueryResult, question: string): PresentationTable {
  const value = result.rows[0][0];
  const display = isNumericCell(value) ? formatGrouped(value) : formatPlain(value);
  const label = `Total ${countNoun(question)}`;
  return table(
    'count',
    ['Description', 'Count'],
    [[label, display]],
    ['left', 'right'],
    `${label}: ${display}`
  );
}

/**
 * Title-cased headers; numeric columns right-aligned; null shown as empty.
 */
export function formatGeneric(result: QueryResult): PresentationTable {
  const profiles = profile(result);
  return table(
    'generic',
    result.columns.map(titleCase),
    result.rows.map((row) => row.map(formatPlain)),
    profiles.map(alignmentOf)
  );
}

function shape(result: QueryResult, question: string, sql: string): PresentationTable {
  const profiles = profile(result);
  const cues = `${question} ${sql}`.toLowerCase();
  const countQuestion = isCountQuestion(question, sql);

  if (mentionsAny(cues, MONEY_TERMS)) {
    const currency = currencyShape(result, profiles, countQuestion);
    if (currency) {
      return currency;
    }
  }
  if (isTableList(result)) {
    return tableListShape(result);
  }
  if (countQuestion && result.rows.length === 1 && result.columns.length === 1) {
    return countShape(result, question);
  }
  return formatGeneric(result);
}

/**
 * Render a coerced result. Never throws for a well-formed QueryResult: any
 * failure while shaping falls back to the generic table.
 */
export function format(result: QueryResult, question: string, sql: string): PresentationTable {
  try {
    return shape(result, question, sql);
  } catch (error) {
    if (error instanceof Error) {
      return formatGeneric(result);
    }
    throw error;
  }
}

/**
 * Single-column table holding the unparsed result text.
 */
export function formatFallback(rawText: string): PresentationTable {
  return {
    shape: 'fallback',
    headers: ['Result'],
    rows: [[rawText]],
    alignments: ['left'],
    summary: FALLBACK_SUMMARY,
  };
}
