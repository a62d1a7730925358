/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import { formatErrorChain } from '@vmerger/core';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export function printBlock(title: string, body: string): void {
  console.log(chalk.bold(title));
  console.log(body.trimEnd());
}

/**
 * Print an error and every cause beneath it to stderr
 */
export function printErrorChain(error: unknown): void {
  const [first, ...causes] = formatErrorChain(error);
  console.error(chalk.red(first));
  for (const line of causes) {
    console.error(chalk.gray(line));
  }
}
