/**
 * Wires configuration, database, providers and pipeline together.
 */

import type { Knex } from 'knex';
import type { Config } from './config.js';
import {
  KnexSqlExecutor,
  dialectOf,
  loadSchemaDescription,
  openDatabase,
  type SqlDialect,
} from './services/database.js';
import { buildProviders, type TextGenerator } from './services/llm.js';
import { createPipeline, type QueryPipeline } from './services/pipeline.js';
import type { Logger } from './utils/logger.js';

export interface Runtime {
  config: Config;
  db: Knex;
  dialect: SqlDialect;
  providers: TextGenerator[];
  pipeline: QueryPipeline;
  schemaDescription: string;
  close(): Promise<void>;
}

export async function bootstrap(config: Config, logger: Logger): Promise<Runtime> {
  const db = await openDatabase(config.database.knex, logger);
  try {
    const dialect = dialectOf(config.database.knex.client);
    const executor = new KnexSqlExecutor(db, { dialect, logger });
    const schemaDescription = await loadSchemaDescription({
      path: config.schemaDescriptionPath,
      db,
      dialect,
      logger,
    });
    const providers = buildProviders(config, logger);
    const pipeline = createPipeline(config, executor, { providers, logger });

    return {
      config,
      db,
      dialect,
      providers,
      pipeline,
      schemaDescription,
      close: () => db.destroy(),
    };
  } catch (error) {
    await db.destroy();
    throw error;
  }
}
