/**
 * Terminal rendering of turn responses.
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import type { PresentationTable, TraceEntry, TurnResponse } from '../types/models.js';

export interface RenderOptions {
  /** Show the provenance trace under the table */
  trace?: boolean;
  /** Show the SQL that produced the result */
  sql?: boolean;
}

/**
 * Render a presentation table. Message and error shapes print their text
 * as a single line instead of a bordered table.
 */
export function renderTable(presentation: PresentationTable): string {
  if (presentation.shape === 'message') {
    return presentation.headline ?? '';
  }
  if (presentation.shape === 'error') {
    return chalk.red(`✖ ${presentation.headline ?? ''}`);
  }

  const table = new Table({
    head: presentation.headers.map((header) => chalk.bold(header)),
    colAligns: [...presentation.alignments],
    style: {
      head: ['cyan'],
      border: ['gray'],
    },
  });
  for (const row of presentation.rows) {
    table.push([...row]);
  }

  const lines = [table.toString()];
  if (presentation.headline) {
    lines.push(chalk.bold(presentation.headline));
  }
  if (presentation.summary) {
    lines.push(chalk.dim(presentation.summary));
  }
  return lines.join('\n');
}

const LEVEL_MARKS = {
  info: chalk.blue('·'),
  warn: chalk.yellow('!'),
  error: chalk.red('✖'),
} as const;

export function formatTraceEntry(entry: TraceEntry): string {
  const message = entry.message.includes('\n')
    ? entry.message.replace(/\n/g, '\n      ')
    : entry.message;
  return `  ${LEVEL_MARKS[entry.level]} ${chalk.gray(entry.step.padEnd(15))} ${message}`;
}

export function renderResponse(response: TurnResponse, options: RenderOptions = {}): string {
  const parts = [renderTable(response.presentation)];

  if (options.sql && response.sql) {
    parts.push('', chalk.gray('-- SQL' + (response.provider ? ` (${response.provider})` : '')));
    parts.push(chalk.cyan(response.sql));
  }

  if (options.trace) {
    parts.push('', chalk.gray('Trace:'));
    for (const entry of response.trace) {
      parts.push(formatTraceEntry(entry));
    }
  }

  return parts.join('\n');
}
