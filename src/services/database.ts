/**
 * Database access using Knex.js for multi-database support.
 * Supports SQLite (better-sqlite3), PostgreSQL and MySQL.
 */

import { readFile } from 'fs/promises';
import { knex, type Knex } from 'knex';
import { SchemaInspector } from 'knex-schema-inspector';
import type { RawResult } from '../types/models.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

/**
 * SQL flavour of the connected database. `generic` covers warehouses
 * reached through other execution paths.
 */
export type SqlDialect = 'sqlite' | 'postgres' | 'mysql' | 'generic';

/**
 * The SQL-execution service the pipeline calls.
 */
export interface SqlExecutor {
  readonly dialect: SqlDialect;
  execute(sql: string): Promise<RawResult>;
}

// Postgres type OIDs returned as text by pg: INT8, NUMERIC
const PG_NUMERIC_OIDS = new Set([20, 1700]);
// mysql2 column types returned as text: DECIMAL, LONGLONG, NEWDECIMAL
const MYSQL_NUMERIC_TYPES = new Set([0, 8, 246]);

type Row = Record<string, unknown>;

function isRecord(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRowArray(value: unknown): value is Row[] {
  return Array.isArray(value) && value.every(isRecord);
}

interface FieldInfo {
  name: string;
  numeric: boolean;
}

function readFields(value: unknown, typeKey: string, numericTypes: Set<number>): FieldInfo[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const fields: FieldInfo[] = [];
  for (const field of value) {
    if (isRecord(field) && typeof field.name === 'string') {
      const type = field[typeKey];
      fields.push({
        name: field.name,
        numeric: typeof type === 'number' && numericTypes.has(type),
      });
    }
  }
  return fields;
}

function rowsResult(rows: Row[], fields: FieldInfo[]): RawResult {
  const columns = fields.length > 0 ? fields.map((f) => f.name) : Object.keys(rows[0] ?? {});
  const numericColumns = fields.filter((f) => f.numeric).map((f) => f.name);
  return {
    kind: 'rows',
    columns,
    rows,
    numericColumns: numericColumns.length > 0 ? numericColumns : undefined,
  };
}

/**
 * Normalize the dialect-specific result of `knex.raw()`.
 * Order matters: more specific structures are checked first.
 */
export function normalizeRawResult(result: unknown): RawResult {
  // Stringified output from an execution path that prints its rows
  if (typeof result === 'string') {
    return { kind: 'text', text: result };
  }

  // PostgreSQL: { rows: [...], fields: [{ name, dataTypeID }] }
  if (isRecord(result) && isRowArray(result.rows)) {
    return rowsResult(result.rows, readFields(result.fields, 'dataTypeID', PG_NUMERIC_OIDS));
  }

  // MySQL: [[rows], [fields]]
  if (Array.isArray(result) && result.length === 2 && isRowArray(result[0])) {
    return rowsResult(result[0], readFields(result[1], 'columnType', MYSQL_NUMERIC_TYPES));
  }

  // SQLite: array of rows directly
  if (isRowArray(result)) {
    return rowsResult(result, []);
  }

  return { kind: 'rows', columns: [], rows: [] };
}

export function dialectOf(client: Knex.Config['client']): SqlDialect {
  const name = typeof client === 'string' ? client : '';
  if (name === 'better-sqlite3' || name === 'sqlite3') {
    return 'sqlite';
  }
  if (name === 'pg' || name === 'postgres' || name === 'postgresql') {
    return 'postgres';
  }
  if (name === 'mysql2' || name === 'mysql') {
    return 'mysql';
  }
  return 'generic';
}

/**
 * SqlExecutor backed by a Knex instance.
 */
export class KnexSqlExecutor implements SqlExecutor {
  readonly dialect: SqlDialect;
  private readonly log: Logger;

  constructor(
    private readonly db: Knex,
    options: { dialect?: SqlDialect; logger?: Logger } = {}
  ) {
    this.dialect = options.dialect ?? dialectOf(db.client.config.client);
    this.log = options.logger ?? rootLogger;
  }

  async execute(sql: string): Promise<RawResult> {
    const started = Date.now();
    const result: unknown = await this.db.raw(sql);
    const normalized = normalizeRawResult(result);
    this.log.debug(
      {
        dialect: this.dialect,
        rows: normalized.kind === 'rows' ? normalized.rows.length : undefined,
        ms: Date.now() - started,
      },
      'Query executed'
    );
    return normalized;
  }
}

/**
 * Open a connection and check it with a trivial query.
 */
export async function openDatabase(
  config: Knex.Config,
  log: Logger = rootLogger
): Promise<Knex> {
  const db = knex(config);
  try {
    await db.raw('SELECT 1');
  } catch (error) {
    log.error({ err: error }, 'Failed to connect to database');
    await db.destroy();
    throw error;
  }
  log.info(`Database initialized: ${String(config.client)}`);
  return db;
}

// ============================================================================
// SCHEMA DESCRIPTION
// ============================================================================

export interface SchemaColumn {
  name: string;
  type: string;
  nullable: boolean;
}

export interface SchemaTable {
  name: string;
  columns: SchemaColumn[];
}

export interface SchemaForeignKey {
  table: string;
  column: string;
  foreignTable: string;
  foreignColumn: string;
}

/**
 * Plain-text schema description injected into prompts.
 */
export function renderSchemaDescription(
  dialect: SqlDialect,
  tables: SchemaTable[],
  foreignKeys: SchemaForeignKey[] = []
): string {
  const lines: string[] = [
    `Database schema (${dialect}):`,
    '',
    'Available tables and their columns:',
  ];

  for (const table of tables) {
    const columns = table.columns
      .map((c) => `${c.name} ${c.type}${c.nullable ? '' : ' NOT NULL'}`)
      .join(', ');
    lines.push(`- ${table.name}: ${columns}`);
  }

  if (foreignKeys.length > 0) {
    lines.push('');
    lines.push('Table Relationships (Foreign Keys):');
    for (const fk of foreignKeys) {
      lines.push(`- ${fk.table}.${fk.column} -> ${fk.foreignTable}.${fk.foreignColumn}`);
    }
    lines.push('');
    lines.push('Note: Use JOINs when querying across related tables.');
  }

  lines.push('');
  lines.push('Instructions: Use actual column names exactly as shown above.');
  return lines.join('\n');
}

/**
 * Builds the schema description by inspecting the live database.
 */
export class SchemaDescriber {
  private readonly inspector: ReturnType<typeof SchemaInspector>;
  private readonly log: Logger;

  constructor(
    db: Knex,
    private readonly dialect: SqlDialect,
    log: Logger = rootLogger
  ) {
    this.inspector = SchemaInspector(db);
    this.log = log;
  }

  async describe(): Promise<string> {
    const names = await this.inspector.tables();

    // Fetch all table columns in parallel
    const tables = await Promise.all(
      names.map(async (name): Promise<SchemaTable> => {
        const columns = await this.inspector.columnInfo(name);
        return {
          name,
          columns: columns.map((col) => ({
            name: col.name,
            type: col.data_type,
            nullable: col.is_nullable,
          })),
        };
      })
    );

    let foreignKeys: SchemaForeignKey[] = [];
    try {
      const fks = await this.inspector.foreignKeys();
      foreignKeys = fks.map((fk) => ({
        table: fk.table,
        column: fk.column,
        foreignTable: fk.foreign_key_table,
        foreignColumn: fk.foreign_key_column,
      }));
    } catch (error) {
      // Foreign keys are not available on every dialect
      this.log.warn(`Could not fetch foreign keys: ${String(error)}`);
    }

    this.log.info(
      `Described ${tables.length} tables, ${foreignKeys.length} foreign key relationships`
    );
    return renderSchemaDescription(this.dialect, tables, foreignKeys);
  }
}

/**
 * Schema description from a file when one is configured, else from the
 * live database.
 */
export async function loadSchemaDescription(options: {
  path?: string;
  db?: Knex;
  dialect: SqlDialect;
  logger?: Logger;
}): Promise<string> {
  if (options.path) {
    const text = await readFile(options.path, 'utf-8');
    return text.trim();
  }
  if (!options.db) {
    return '';
  }
  return new SchemaDescriber(options.db, options.dialect, options.logger).describe();
}
