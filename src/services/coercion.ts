/**
 * Result coercion: turns whatever an execution path returned into a
 * uniformly typed QueryResult.
 *
 * Structured rows are normalized cell by cell. The text form is the printed
 * representation of a list of tuples, e.g.
 * `[('Customer#0001', Decimal('555285.16')), ('Customer#0002', None)]`.
 */

import { Decimal } from 'decimal.js';
import { CoercionError } from '../types/errors.js';
import type { CellValue, QueryResult, RawResult } from '../types/models.js';
import { maskStringLiterals, splitTopLevel, stripSqlComments, walkTopLevel } from './sql-text.js';

export type CoercionOutcome =
  | { readonly ok: true; readonly result: QueryResult }
  | { readonly ok: false; readonly error: CoercionError; readonly rawText: string };

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const NULL_TOKENS = new Set(['None', 'NULL', 'null']);
const WRAPPER = /^([A-Za-z_][\w.]*)\(([\s\S]*)\)$/;

// ============================================================================
// SCALARS
// ============================================================================

function integerOrDecimal(text: string): number | Decimal {
  const n = Number(text);
  return Number.isSafeInteger(n) ? n : new Decimal(text);
}

/**
 * Parse numeric text: integers become numbers, everything else a Decimal.
 * Returns null when the text is not a plain number.
 */
export function parseNumericText(text: string): number | Decimal | null {
  const trimmed = text.trim();
  if (INTEGER.test(trimmed)) {
    return integerOrDecimal(trimmed);
  }
  if (DECIMAL.test(trimmed)) {
    return new Decimal(trimmed);
  }
  return null;
}

function stringifyObject(value: object): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch (error) {
    // bigint members and cycles cannot be serialized
    if (error instanceof TypeError) {
      return String(value);
    }
    throw error;
  }
}

/**
 * Normalize one structured cell.
 *
 * @param numeric Strings in this column carry numbers (e.g. NUMERIC columns
 * returned as text by the driver)
 */
export function normalizeValue(value: unknown, numeric = false): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (Decimal.isDecimal(value)) {
    return value;
  }

  switch (typeof value) {
    case 'number':
      if (!Number.isFinite(value)) {
        return String(value);
      }
      return Number.isSafeInteger(value) ? value : new Decimal(String(value));
    case 'bigint':
      return integerOrDecimal(value.toString());
    case 'boolean':
      return value ? 1 : 0;
    case 'string':
      return numeric ? parseNumericText(value) ?? value : value;
    case 'object':
      if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? null : value.toISOString();
      }
      if (value instanceof Uint8Array) {
        return Buffer.from(value).toString('hex');
      }
      return stringifyObject(value);
    default:
      return String(value);
  }
}

// ============================================================================
// PRINTED TUPLES
// ============================================================================

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '0': '\0',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

/**
 * Remove the quotes of a printed string literal and resolve its escapes.
 */
export function unquote(token: string): string {
  const quote = token[0];
  const body = token.slice(1, -1);
  let out = '';

  for (let i = 0; i < body.length; i++) {
    const char = body[i];

    if (char === quote && body[i + 1] === quote) {
      out += quote;
      i++;
      continue;
    }
    if (char !== '\\' || i === body.length - 1) {
      out += char;
      continue;
    }

    const next = body[i + 1];
    const hexLength = next === 'x' ? 2 : next === 'u' ? 4 : 0;
    if (hexLength > 0) {
      const hex = body.slice(i + 2, i + 2 + hexLength);
      if (hex.length === hexLength && /^[0-9a-fA-F]+$/.test(hex)) {
        out += String.fromCharCode(parseInt(hex, 16));
        i += 1 + hexLength;
        continue;
      }
    }

    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      out += simple;
    } else {
      out += char + next;
    }
    i++;
  }

  return out;
}

function isQuoted(token: string): boolean {
  const quote = token[0];
  return token.length >= 2 && (quote === "'" || quote === '"') && token.endsWith(quote);
}

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

function parseDateArgs(args: string, token: string): number[] {
  const parts = (splitTopLevel(args, ',') ?? [])
    .map((part) => part.trim())
    .filter((part) => part.length > 0 && !part.includes('='));
  if (parts.length < 3 || !parts.every((part) => INTEGER.test(part))) {
    throw new CoercionError('Malformed', `Cannot read date value ${token}`);
  }
  return parts.map(Number);
}

function parseWrapped(name: string, args: string, token: string): CellValue {
  const shortName = name.split('.').pop() ?? name;

  if (shortName.endsWith('Decimal')) {
    const inner = args.trim();
    const literal = isQuoted(inner) ? unquote(inner) : inner;
    if (!DECIMAL.test(literal.trim())) {
      throw new CoercionError('Malformed', `Cannot read decimal value ${token}`);
    }
    return new Decimal(literal.trim());
  }

  if (name === 'datetime.date' || name === 'date') {
    const [y, m, d] = parseDateArgs(args, token);
    return `${pad(y, 4)}-${pad(m)}-${pad(d)}`;
  }

  if (name === 'datetime.datetime' || name === 'datetime') {
    const [y, m, d, h = 0, mi = 0, s = 0, us = 0] = parseDateArgs(args, token);
    const fraction = us > 0 ? `.${pad(us, 6)}` : '';
    return `${pad(y, 4)}-${pad(m)}-${pad(d)}T${pad(h)}:${pad(mi)}:${pad(s)}${fraction}`;
  }

  return token;
}

/**
 * Type one printed tuple element.
 */
export function parseCell(element: string): CellValue {
  const token = element.trim();
  if (token.length === 0) {
    throw new CoercionError('Malformed', 'Empty value in tuple');
  }

  if (NULL_TOKENS.has(token)) {
    return null;
  }
  if (isQuoted(token)) {
    return unquote(token);
  }

  const wrapped = WRAPPER.exec(token);
  if (wrapped) {
    return parseWrapped(wrapped[1], wrapped[2], token);
  }

  if (INTEGER.test(token)) {
    return integerOrDecimal(token);
  }
  if (DECIMAL.test(token)) {
    return new Decimal(token);
  }
  if (token === 'True' || token === 'False') {
    return token === 'True' ? 1 : 0;
  }
  return token;
}

/**
 * Split on top-level commas, dropping the trailing empty part a
 * one-element tuple like `(1,)` leaves behind.
 */
function splitElements(text: string, what: string): string[] {
  const parts = splitTopLevel(text, ',', { backslashEscapes: true });
  if (parts === null) {
    throw new CoercionError('Malformed', `Unbalanced quotes or brackets in ${what}`);
  }
  if (parts.length > 1 && parts[parts.length - 1].trim() === '') {
    parts.pop();
  }
  if (parts.length === 1 && parts[0].trim() === '') {
    return [];
  }
  return parts;
}

function parseTuple(text: string): CellValue[] {
  const token = text.trim();
  if (!token.startsWith('(') || !token.endsWith(')')) {
    throw new CoercionError('Malformed', `Expected a tuple, got ${token.slice(0, 40)}`);
  }
  return splitElements(token.slice(1, -1), 'tuple').map(parseCell);
}

/**
 * Parse a printed list of tuples into positional rows.
 *
 * @throws CoercionError on malformed text or tuples of unequal length
 */
export function parseTupleList(text: string): CellValue[][] {
  const trimmed = text.trim();

  let rows: CellValue[][];
  if (trimmed.startsWith('[')) {
    if (!trimmed.endsWith(']')) {
      throw new CoercionError('Malformed', 'Result list is not closed');
    }
    rows = splitElements(trimmed.slice(1, -1), 'result list').map(parseTuple);
  } else if (trimmed.startsWith('(')) {
    rows = [parseTuple(trimmed)];
  } else {
    throw new CoercionError('Malformed', 'Result text is not a list of tuples');
  }

  const arity = rows[0]?.length ?? 0;
  rows.forEach((row, i) => {
    if (row.length !== arity) {
      throw new CoercionError(
        'IrregularShape',
        `Row ${i + 1} has ${row.length} values, expected ${arity}`
      );
    }
  });
  return rows;
}

// ============================================================================
// COLUMN NAMES FROM THE SELECT LIST
// ============================================================================

const IDENT = String.raw`(?:"[^"]+"|\x60[^\x60]+\x60|\[[^\]]+\]|[A-Za-z_][\w$]*)`;
const EXPLICIT_ALIAS = new RegExp(String.raw`\bAS\s+(${IDENT})\s*$`, 'i');
const QUALIFIED_NAME = new RegExp(String.raw`^(?:${IDENT}\s*\.\s*)*(${IDENT})$`);
const IMPLICIT_ALIAS = new RegExp(String.raw`^([\s\S]*?[\w)"\]\x60])\s+(${IDENT})$`);
const NOT_ALIASES = new Set(['END', 'ASC', 'DESC', 'NULL', 'TRUE', 'FALSE']);
const LIST_END = /\b(?:FROM|WHERE|GROUP|ORDER|HAVING|LIMIT|UNION|INTERSECT|EXCEPT|QUALIFY|WINDOW)\b|;/g;

function unwrapIdentifier(ident: string): string {
  const first = ident[0];
  if (first === '"' || first === '`' || first === '[') {
    return ident.slice(1, -1);
  }
  return ident;
}

function nameOfItem(item: string): string | null {
  const explicit = EXPLICIT_ALIAS.exec(item);
  if (explicit) {
    return unwrapIdentifier(explicit[1]);
  }
  const qualified = QUALIFIED_NAME.exec(item);
  if (qualified) {
    return unwrapIdentifier(qualified[1]);
  }
  const implicit = IMPLICIT_ALIAS.exec(item);
  if (implicit && !NOT_ALIASES.has(implicit[2].toUpperCase())) {
    return unwrapIdentifier(implicit[2]);
  }
  return null;
}

function depthsOf(text: string): number[] {
  const depths = new Array<number>(text.length).fill(-1);
  walkTopLevel(text, (_char, index, depth) => {
    depths[index] = depth;
  });
  return depths;
}

/**
 * Output names of a statement's first top-level SELECT list: the alias,
 * else the last segment of a column reference, else null for an unnamed
 * expression. Returns null when the list cannot be read or contains `*`.
 */
export function selectListColumns(sql: string): (string | null)[] | null {
  const text = stripSqlComments(sql);
  const masked = maskStringLiterals(text).toUpperCase();
  const depths = depthsOf(masked);

  const selects = [...masked.matchAll(/\bSELECT\b/g)];
  const select = selects.find((m) => depths[m.index ?? 0] === 0);
  if (!select) {
    return null;
  }
  const start = (select.index ?? 0) + select[0].length;

  let end = text.length;
  for (const match of masked.slice(start).matchAll(LIST_END)) {
    const index = start + (match.index ?? 0);
    if (depths[index] === 0) {
      end = index;
      break;
    }
  }

  const list = text
    .slice(start, end)
    .trim()
    .replace(/^(?:DISTINCT|ALL)\b\s*/i, '')
    .replace(/^TOP\s+\d+\s*/i, '');
  const items = splitTopLevel(list, ',');
  if (items === null || list.length === 0) {
    return null;
  }

  const names: (string | null)[] = [];
  for (const raw of items) {
    const item = raw.trim();
    if (item === '*' || item.endsWith('.*')) {
      return null;
    }
    names.push(nameOfItem(item));
  }
  return names;
}

function columnNames(arity: number, sql: string | undefined): string[] {
  const fromSql = sql ? selectListColumns(sql) : null;
  const named =
    fromSql && (fromSql.length === arity || arity === 0)
      ? fromSql.map((name, i) => name ?? `column_${i + 1}`)
      : Array.from({ length: arity }, (_, i) => `column_${i + 1}`);

  const seen = new Set<string>();
  return named.map((name, i) => {
    const unique = seen.has(name) ? `${name}_${i + 1}` : name;
    seen.add(unique);
    return unique;
  });
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

/**
 * Coerce a raw execution result into typed rows.
 *
 * @param sql Statement that produced the result; names text-form columns
 * @throws CoercionError when the text form cannot be parsed
 */
export function coerce(raw: RawResult, sql?: string): QueryResult {
  if (raw.kind === 'text') {
    const rows = parseTupleList(raw.text);
    return { columns: columnNames(rows[0]?.length ?? 0, sql), rows };
  }

  const columns =
    raw.columns.length > 0 ? [...raw.columns] : Object.keys(raw.rows[0] ?? {});
  const numeric = new Set(raw.numericColumns ?? []);

  return {
    columns,
    rows: raw.rows.map((row) =>
      columns.map((column) => normalizeValue(row[column], numeric.has(column)))
    ),
  };
}

export function rawTextOf(raw: RawResult): string {
  return raw.kind === 'text' ? raw.text : stringifyObject(raw.rows);
}

/**
 * Like `coerce`, but reports a CoercionError as a value so the caller can
 * fall back to showing the raw text.
 */
export function tryCoerce(raw: RawResult, sql?: string): CoercionOutcome {
  try {
    return { ok: true, result: coerce(raw, sql) };
  } catch (error) {
    if (error instanceof CoercionError) {
      return { ok: false, error, rawText: rawTextOf(raw) };
    }
    throw error;
  }
}
