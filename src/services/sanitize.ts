/**
 * Extraction and sanitization of model-emitted SQL.
 *
 * Applied to every provider's output, whichever template produced it.
 */

import { UnparseableSqlError, UnsafeSqlError } from '../types/errors.js';
import { indexOfTopLevel, maskStringLiterals, stripSqlComments } from './sql-text.js';

const SQL_START = /^(SELECT|WITH|SHOW)\b/i;
const LABEL_PREFIX = /^(?:SQLQuery|SQL|Query)\s*:\s*/i;
const CHAIN_TRAILER = /^\s*(?:SQLResult|Answer)\s*:/i;
const FENCE = /```(?:[\w+-]*[^\S\n]*\n)?([\s\S]*?)(?:```|$)/g;
// A language tag left on the fence line, as in ```sql SELECT 1```
const LANGUAGE_TAG = /^(?:sql|sqlite|postgres(?:ql)?|pgsql|mysql|tsql|plsql)(?=\s)\s*/i;
// Statement start inside a sentence; upper case only, since "with" and "show" are also prose
const INLINE_SQL_START = /\b(?:SELECT|WITH|SHOW)\b/;
// Lines that carry a statement on past a blank line
const SQL_CONTINUATION = new RegExp(
  '^(?:(?:SELECT|WITH|FROM|WHERE|GROUP|ORDER|HAVING|LIMIT|OFFSET|FETCH|UNION|INTERSECT|' +
    'EXCEPT|JOIN|INNER|LEFT|RIGHT|FULL|CROSS|ON|AND|OR|CASE|WHEN|THEN|ELSE|END|AS)\\b' +
    '|--|/\\*|[(),])',
  'i'
);

// REPLACE is also a string function, so only the statement form is blocked
const WRITE_PATTERNS: ReadonlyArray<readonly [string, RegExp]> = [
  ...[
    'UPDATE',
    'DELETE',
    'DROP',
    'ALTER',
    'INSERT',
    'CREATE',
    'TRUNCATE',
    'MERGE',
    'GRANT',
    'REVOKE',
    'PRAGMA',
    'ATTACH',
    'DETACH',
    'COPY',
    'CALL',
  ].map((keyword) => [keyword, new RegExp(`\\b${keyword}\\b`)] as const),
  ['REPLACE', /\bREPLACE\s+INTO\b/],
];

function startsWithSql(text: string): boolean {
  return SQL_START.test(text.replace(LABEL_PREFIX, ''));
}

/**
 * Keep the enclosed text of the first fenced block that holds SQL, or of
 * the first block when none does. Unfenced text is returned unchanged.
 */
function unfence(text: string): string {
  if (!text.includes('```')) {
    return text;
  }

  const blocks = [...text.matchAll(FENCE)].map((match) =>
    (match[1] ?? '').trim().replace(LANGUAGE_TAG, '')
  );
  const withSql = blocks.find((block) =>
    block.split('\n').some((line) => startsWithSql(line.trim()))
  );
  return (withSql ?? blocks[0] ?? '').trim();
}

/**
 * Drop restatements like "Here is the SQL query:" that precede the first
 * line starting with a statement keyword, or, when no line starts with
 * one, everything before the first upper-case statement keyword.
 */
function dropPreamble(text: string): string {
  const lines = text.split('\n');
  const first = lines.findIndex((line) => startsWithSql(line.trim()));
  if (first === -1) {
    const inline = INLINE_SQL_START.exec(text);
    return inline ? text.slice(inline.index) : text;
  }
  const kept = lines.slice(first);
  kept[0] = kept[0].trim().replace(LABEL_PREFIX, '');
  return kept.join('\n');
}

/**
 * Cut chain-style trailers and everything after the first statement.
 */
function truncateStatement(text: string): string {
  const lines = text.split('\n');
  const trailer = lines.findIndex((line) => CHAIN_TRAILER.test(line));
  const body = trailer === -1 ? text : lines.slice(0, trailer).join('\n');

  const end = indexOfTopLevel(body, ';');
  return dropTrailingProse(end === -1 ? body : body.slice(0, end));
}

/**
 * Cut at the first blank line whose next non-blank line does not continue
 * the statement, e.g. an explanation written after a query without `;`.
 */
function dropTrailingProse(text: string): string {
  const lines = text.split('\n');
  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trim() !== '') {
      continue;
    }
    const next = lines.slice(i + 1).find((line) => line.trim() !== '');
    if (next !== undefined && !SQL_CONTINUATION.test(next.trim())) {
      return lines.slice(0, i).join('\n');
    }
  }
  return text;
}

/**
 * Extract a single SQL statement from raw model output.
 *
 * @throws UnparseableSqlError when the cleaned text is not a SQL statement
 */
export function sanitizeSql(raw: string, provider?: string): string {
  let text = raw.trim();
  text = unfence(text);
  text = dropPreamble(text);
  text = text.replace(/`/g, '');
  text = truncateStatement(text).trim();

  if (!SQL_START.test(text)) {
    throw new UnparseableSqlError(raw, provider);
  }
  return text;
}

/**
 * Reject statements that would modify data or schema.
 *
 * Keywords inside string literals and comments are ignored.
 *
 * @throws UnsafeSqlError naming the first offending keyword
 */
export function assertReadOnly(sql: string, provider?: string): void {
  const upper = maskStringLiterals(stripSqlComments(sql)).toUpperCase();

  for (const [keyword, pattern] of WRITE_PATTERNS) {
    if (pattern.test(upper)) {
      throw new UnsafeSqlError(keyword, sql, provider);
    }
  }

  if (!SQL_START.test(upper.trim())) {
    throw new UnsafeSqlError('a non-query statement', sql, provider);
  }
}
