/**
 * Terminal output for the CLI: status lines, spinners and boxed notices.
 * Structured logs go through pino; this is only what a person reads.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';

const accent = gradient(['#00F5FF', '#00D4FF', '#00B4FF']);
const RULE_WIDTH = 50;

type Status = 'ok' | 'fail' | 'warn' | 'info';

const MARKS: Record<Status, string> = {
  ok: chalk.green('✔'),
  fail: chalk.red('✖'),
  warn: chalk.yellow('⚠'),
  info: chalk.blue('ℹ'),
};

function print(...lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

function rule(): string {
  return chalk.gray('─'.repeat(RULE_WIDTH));
}

export function printBanner(): void {
  print(
    '',
    `  ${accent('warehouse-chat')}`,
    `  ${chalk.gray('ask your warehouse in plain language')}`
  );
}

export function success(message: string): void {
  print(`${MARKS.ok} ${message}`);
}

/**
 * Failure line, with the underlying reason dimmed beneath it.
 */
export function error(message: string, reason?: string): void {
  print(`${MARKS.fail} ${message}`);
  if (reason) {
    print(`  ${chalk.yellow('→')} ${chalk.dim(reason)}`);
  }
}

export function warn(message: string): void {
  print(`${MARKS.warn} ${message}`);
}

export function info(message: string): void {
  print(`${MARKS.info} ${message}`);
}

export function spinner(text: string): Ora {
  return ora({ text, color: 'cyan', spinner: 'dots' }).start();
}

export function box(message: string, title: string, healthy: boolean): void {
  print(
    boxen(message, {
      title,
      titleAlignment: 'center',
      padding: 1,
      margin: { top: 1, bottom: 1, left: 0, right: 0 },
      borderStyle: 'round',
      borderColor: healthy ? 'green' : 'red',
    })
  );
}

/**
 * SQL between two rules, e.g. the statement behind the last answer.
 */
export function sql(statement: string): void {
  print(rule(), chalk.cyan(statement), rule());
}

export function section(title: string): void {
  print('', accent(`▶ ${title}`), rule());
}

export function newline(): void {
  print('');
}

/**
 * `✔ label: value` status row; used for provider listings.
 */
export function row(label: string, value: string, ok = true): void {
  print(`  ${ok ? MARKS.ok : MARKS.fail} ${chalk.bold(label)}: ${chalk.cyan(value)}`);
}
