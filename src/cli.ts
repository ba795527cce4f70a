#!/usr/bin/env node
/**
 * warehouse-chat CLI
 * Ask a SQL warehouse questions from the terminal
 */

import { cac } from 'cac';
import prompts from 'prompts';
import { bootstrap, type Runtime } from './bootstrap.js';
import { loadConfig, loadEnvFile } from './config.js';
import { runDiagnostics } from './cli/diagnostics.js';
import * as logger from './cli/logger.js';
import { renderResponse } from './cli/render.js';
import { DEFAULT_SEED_COUNTS, parseCount, seedDemoDatabase } from './cli/seed-database.js';
import { startServer } from './index.js';
import { buildProviders, describeProviders } from './services/llm.js';
import { Conversation } from './services/pipeline.js';
import { ConfigError } from './types/errors.js';
import { createLogger } from './utils/logger.js';

interface AskOptions {
  provider?: string;
  trace?: boolean;
  sql?: boolean;
  verbose?: boolean;
}

const EXIT_WORDS = new Set(['exit', 'quit', ':q']);

const cli = cac('warehouse-chat');

cli.version('0.1.0');
cli.help();

function fail(message: string, error: unknown): void {
  if (error instanceof ConfigError) {
    logger.error(message, error.issues.join('; '));
  } else {
    logger.error(message, error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
}

async function withRuntime(
  verbose: boolean | undefined,
  run: (runtime: Runtime) => Promise<void>
): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  const runtime = await bootstrap(config, createLogger(verbose ? 'debug' : 'warn'));
  try {
    await run(runtime);
  } finally {
    await runtime.close();
  }
}

/**
 * warehouse-chat ask <question>
 * Answer one question and exit
 */
cli
  .command('ask <question>', 'Answer a single question')
  .option('--provider <name>', 'Use only this provider')
  .option('--trace', 'Show the provenance trace')
  .option('--sql', 'Show the SQL that produced the answer')
  .option('--verbose', 'Debug logging')
  .action(async (question: string, options: AskOptions) => {
    try {
      await withRuntime(options.verbose, async (runtime) => {
        const spinner = logger.spinner('Thinking...');
        const response = await runtime.pipeline.handleTurn(
          question,
          runtime.schemaDescription,
          options.provider ?? runtime.config.pinnedProvider
        );
        spinner.stop();
        console.log(renderResponse(response, { trace: options.trace, sql: options.sql }));
        if (response.error) {
          process.exitCode = 1;
        }
      });
    } catch (error) {
      fail('Query failed', error);
    }
  });

/**
 * warehouse-chat chat
 * Interactive session; `:sql` shows the previous answer's SQL
 */
cli
  .command('chat', 'Interactive question session')
  .option('--provider <name>', 'Use only this provider')
  .option('--trace', 'Show the provenance trace after each answer')
  .option('--verbose', 'Debug logging')
  .action(async (options: AskOptions) => {
    try {
      await withRuntime(options.verbose, async (runtime) => {
        const conversation = new Conversation(
          runtime.pipeline,
          runtime.schemaDescription,
          options.provider ?? runtime.config.pinnedProvider
        );

        logger.printBanner();
        logger.info(
          'Type a question, ":sql" for the last query, ":trace" for its trace, "exit" to quit.'
        );
        logger.newline();

        for (;;) {
          const answer = await prompts({ type: 'text', name: 'question', message: 'You' });
          const text: unknown = answer.question;
          if (typeof text !== 'string' || EXIT_WORDS.has(text.trim().toLowerCase())) {
            break;
          }
          const trimmed = text.trim();
          if (!trimmed) {
            continue;
          }

          const previous = conversation.previous;
          if (trimmed === ':sql') {
            if (previous?.sql) {
              logger.sql(previous.sql);
            } else {
              logger.warn('No SQL yet');
            }
            continue;
          }
          if (trimmed === ':trace') {
            if (previous) {
              console.log(renderResponse(previous, { trace: true }));
            } else {
              logger.warn('No answer yet');
            }
            continue;
          }

          const spinner = logger.spinner('Thinking...');
          const response = await conversation.ask(trimmed);
          spinner.stop();
          console.log(renderResponse(response, { trace: options.trace }));
          logger.newline();
        }
      });
    } catch (error) {
      fail('Chat failed', error);
    }
  });

/**
 * warehouse-chat providers
 * List configured providers in priority order
 */
cli.command('providers', 'List configured providers and their availability').action(async () => {
  try {
    loadEnvFile();
    const config = loadConfig();
    const statuses = await describeProviders(buildProviders(config, createLogger('warn')));
    logger.section('Providers (priority order)');
    for (const status of statuses) {
      const pinned = config.pinnedProvider === status.kind ? ' [pinned]' : '';
      logger.row(`${status.name}${pinned}`, status.model, status.available);
    }
  } catch (error) {
    fail('Could not list providers', error);
  }
});

/**
 * warehouse-chat serve
 * Start the HTTP API
 */
cli
  .command('serve', 'Start the HTTP API server')
  .option('-p, --port <port>', 'Server port')
  .action(async (options: { port?: number | string }) => {
    try {
      await startServer(options.port === undefined ? undefined : Number(options.port));
    } catch (error) {
      fail('Failed to start server', error);
    }
  });

/**
 * warehouse-chat doctor
 * Run diagnostics
 */
cli.command('doctor', 'Check configuration, database and providers').action(async () => {
  try {
    loadEnvFile();
    const healthy = await runDiagnostics(createLogger('silent'));
    if (!healthy) {
      process.exitCode = 1;
    }
  } catch (error) {
    fail('Diagnostics failed', error);
  }
});

/**
 * warehouse-chat seed [path]
 * Create a demo SQLite warehouse
 */
cli
  .command('seed [path]', 'Create a demo SQLite warehouse with sample sales data')
  .option('--orders <count>', 'Number of orders', { default: DEFAULT_SEED_COUNTS.orders })
  .action((path: string | undefined, options: { orders: number | string }) => {
    const target = path ?? './warehouse.db';
    try {
      const orders = parseCount(options.orders, '--orders');
      seedDemoDatabase(target, { ...DEFAULT_SEED_COUNTS, orders });
      logger.success(`Demo warehouse written to ${target}`);
      logger.info(`Set DATABASE_PATH=${target} in .env to use it`);
    } catch (error) {
      fail('Seeding failed', error);
    }
  });

cli.parse();
