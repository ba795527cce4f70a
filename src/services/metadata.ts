/**
 * Deterministic handling of "list the tables" questions.
 *
 * These questions are answered with one fixed introspection query and
 * never reach a language model, so only table names and kinds are ever
 * shown: no timestamps, row counts or grants from the catalog.
 */

import { ExecutionFailedError } from '../types/errors.js';
import type { RawResult } from '../types/models.js';
import type { SqlDialect, SqlExecutor } from './database.js';

export const METADATA_PROVIDER = 'metadata';

export const TABLE_LIST_COLUMNS: readonly string[] = ['TABLE_NAME', 'TABLE_TYPE'];

export const TABLE_LIST_TRIGGERS: readonly string[] = [
  'show tables',
  'show me tables',
  'show all tables',
  'show me all tables',
  'list tables',
  'list all tables',
  'what tables',
  'which tables',
  'display tables',
  'get tables',
  'tables list',
];

const TABLE_LIST_SQL: Record<SqlDialect, string> = {
  postgres:
    'SELECT table_name AS "TABLE_NAME", table_type AS "TABLE_TYPE" ' +
    'FROM information_schema.tables WHERE table_schema = current_schema() ORDER BY table_name',
  mysql:
    'SELECT TABLE_NAME, TABLE_TYPE FROM information_schema.tables ' +
    'WHERE TABLE_SCHEMA = DATABASE() ORDER BY TABLE_NAME',
  sqlite:
    'SELECT name AS TABLE_NAME, ' +
    "CASE type WHEN 'view' THEN 'VIEW' ELSE 'BASE TABLE' END AS TABLE_TYPE " +
    "FROM sqlite_master WHERE type IN ('table', 'view') AND name NOT LIKE 'sqlite_%' ORDER BY name",
  generic:
    'SELECT TABLE_NAME, TABLE_TYPE FROM INFORMATION_SCHEMA.TABLES ' +
    'WHERE TABLE_SCHEMA = CURRENT_SCHEMA() ORDER BY TABLE_NAME',
};

export function tableListSql(dialect: SqlDialect): string {
  return TABLE_LIST_SQL[dialect];
}

/**
 * Trigger phrase contained in the question (case-insensitive), if any.
 */
export function matchTableListTrigger(question: string): string | null {
  const lowered = question.toLowerCase();
  return TABLE_LIST_TRIGGERS.find((trigger) => lowered.includes(trigger)) ?? null;
}

export interface MetadataAnswer {
  readonly trigger: string;
  readonly sql: string;
  readonly result: RawResult;
}

export class MetadataIntercept {
  constructor(private readonly executor: SqlExecutor) {}

  /**
   * Answer a table-listing question, or return null so the caller can
   * continue with SQL generation.
   *
   * @throws ExecutionFailedError when the introspection query fails
   */
  async tryHandle(question: string): Promise<MetadataAnswer | null> {
    const trigger = matchTableListTrigger(question);
    if (trigger === null) {
      return null;
    }

    const sql = tableListSql(this.executor.dialect);
    try {
      const result = await this.executor.execute(sql);
      // An empty schema yields no rows to take column names from
      if (result.kind === 'rows' && result.columns.length === 0) {
        return { trigger, sql, result: { ...result, columns: TABLE_LIST_COLUMNS } };
      }
      return { trigger, sql, result };
    } catch (error) {
      throw new ExecutionFailedError(METADATA_PROVIDER, sql, error);
    }
  }
}
