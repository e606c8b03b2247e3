/**
 * Terminal output helpers for the querywarden CLI.
 */

import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';
import Table from 'cli-table3';
import type { JsonObject, JsonValue } from '../types/utils.js';

const coolGradient = gradient(['#00F5FF', '#00D4FF', '#00B4FF']);

/**
 * Print the querywarden banner.
 */
export function printBanner(): void {
  console.log(`\n  ${coolGradient('querywarden')}  ${chalk.gray('safe natural-language SQL')}\n`);
}

export function success(message: string): void {
  console.log(`${chalk.green('✔')} ${message}`);
}

/**
 * Error message with an optional hint underneath.
 */
export function error(message: string, suggestion?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

export function warn(message: string): void {
  console.log(`${chalk.yellow('⚠')} ${message}`);
}

export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

export function spinner(text: string): ReturnType<typeof ora> {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  }).start();
}

/**
 * Print a boxed message.
 */
export function box(message: string, title?: string): void {
  console.log(
    boxen(message, {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: 'cyan',
      title,
      titleAlignment: 'center',
    })
  );
}

export function section(title: string): void {
  console.log('');
  console.log(coolGradient(`▶ ${title}`));
  console.log(chalk.gray('─'.repeat(50)));
}

export function newline(): void {
  console.log('');
}

/**
 * Print a labelled value.
 */
export function row(label: string, value: string, ok: boolean = true): void {
  const icon = ok ? chalk.green('✔') : chalk.red('✖');
  console.log(`  ${icon} ${chalk.bold(label)}: ${chalk.cyan(value)}`);
}

function formatCell(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return 'NULL';
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

/**
 * Result rows as a cli-table3 table, one row per result row.
 */
export function resultTable(columns: readonly string[], rows: readonly JsonObject[]) {
  const output = new Table({
    head: columns.map((column) => chalk.bold(column)),
    style: {
      head: ['cyan'],
      border: ['gray'],
    },
  });

  for (const r of rows) {
    output.push(columns.map((column) => formatCell(r[column])));
  }

  return output;
}

export function table(columns: readonly string[], rows: readonly JsonObject[]): void {
  console.log(resultTable(columns, rows).toString());
}
