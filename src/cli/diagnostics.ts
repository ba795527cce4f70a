/**
 * Health diagnostics: configuration, database connection and providers.
 */

import { existsSync } from 'fs';
import { join } from 'path';
import Table from 'cli-table3';
import chalk from 'chalk';
import { loadConfig, type Config } from '../config.js';
import { openDatabase } from '../services/database.js';
import { buildProviders, describeProviders, type TextGenerator } from '../services/llm.js';
import { ConfigError } from '../types/errors.js';
import type { Logger } from '../utils/logger.js';
import * as logger from './logger.js';

export interface DiagnosticCheck {
  name: string;
  passed: boolean;
  message: string;
  fix?: string;
}

export function checkNodeVersion(version: string = process.version): DiagnosticCheck {
  const major = Number.parseInt(version.replace(/^v/, '').split('.')[0] ?? '', 10);
  const passed = major >= 20;
  return {
    name: 'Node.js Version',
    passed,
    message: `Node ${version}`,
    fix: passed ? undefined : 'Upgrade to Node.js 20 or higher',
  };
}

/**
 * Validate configuration; on failure every issue is reported in one check.
 */
export function checkConfig(env: NodeJS.ProcessEnv): {
  check: DiagnosticCheck;
  config?: Config;
} {
  try {
    const config = loadConfig(env);
    return {
      check: {
        name: 'Configuration',
        passed: true,
        message: `Database ${config.database.type}, providers ${config.providers
          .map((p) => p.name)
          .join(', ')}`,
      },
      config,
    };
  } catch (error) {
    if (error instanceof ConfigError) {
      return {
        check: {
          name: 'Configuration',
          passed: false,
          message: error.issues.join('\n'),
          fix: 'Fix the variables above in .env (see .env.example)',
        },
      };
    }
    throw error;
  }
}

export async function checkProviders(
  providers: readonly TextGenerator[]
): Promise<DiagnosticCheck[]> {
  const statuses = await describeProviders(providers);
  return statuses.map((status) => ({
    name: `Provider ${status.name}`,
    passed: status.available,
    message: status.available ? `${status.model} available` : `${status.model} not available`,
    fix: status.available
      ? undefined
      : status.kind === 'ollama'
        ? 'Start Ollama or remove it from LLM_PRIORITY'
        : `Set the API key for ${status.name}`,
  }));
}

async function checkDatabase(config: Config, log: Logger): Promise<DiagnosticCheck> {
  try {
    const db = await openDatabase(config.database.knex, log);
    await db.destroy();
    return { name: 'Database', passed: true, message: `Connected (${config.database.type})` };
  } catch (error) {
    return {
      name: 'Database',
      passed: false,
      message: error instanceof Error ? error.message : String(error),
      fix: 'Check DATABASE_PATH or DATABASE_URL',
    };
  }
}

/**
 * Run every check and print the results table.
 *
 * @returns whether all checks passed
 */
export async function runDiagnostics(log: Logger): Promise<boolean> {
  logger.printBanner();
  logger.section('Running Diagnostics');

  const envExists = existsSync(join(process.cwd(), '.env'));
  const checks: DiagnosticCheck[] = [
    {
      name: 'Environment File',
      passed: envExists,
      message: envExists ? '.env file found' : '.env file not found',
      fix: envExists ? undefined : 'Copy .env.example to .env',
    },
    checkNodeVersion(),
  ];

  const { check, config } = checkConfig(process.env);
  checks.push(check);
  if (config) {
    const spinner = logger.spinner('Checking database and providers...');
    checks.push(await checkDatabase(config, log));
    checks.push(...(await checkProviders(buildProviders(config, log))));
    spinner.stop();
  }

  displayDiagnostics(checks);

  // Providers are alternatives: one available is enough
  const providerChecks = checks.filter((c) => c.name.startsWith('Provider '));
  const required = checks.filter(
    (c) => !c.name.startsWith('Provider ') && c.name !== 'Environment File'
  );
  const healthy =
    required.every((c) => c.passed) &&
    (providerChecks.length === 0 || providerChecks.some((c) => c.passed));

  if (healthy) {
    logger.box('Ready to answer questions.', 'Diagnostics Complete', true);
  } else {
    logger.box('Fix the failing checks above to continue.', 'Diagnostics Complete', false);
  }
  return healthy;
}

function displayDiagnostics(checks: DiagnosticCheck[]): void {
  const table = new Table({
    head: [chalk.bold('Check'), chalk.bold('Status'), chalk.bold('Details')],
    colWidths: [25, 10, 50],
    wordWrap: true,
    style: {
      head: ['cyan'],
      border: ['gray'],
    },
  });

  for (const check of checks) {
    const status = check.passed ? chalk.green('✔ PASS') : chalk.red('✖ FAIL');
    const details = check.passed
      ? chalk.dim(check.message)
      : `${check.message}${check.fix ? `\n${chalk.yellow('Fix:')} ${check.fix}` : ''}`;
    table.push([check.name, status, details]);
  }

  console.log(table.toString());
}
