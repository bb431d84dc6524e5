/**
 * Terminal formatting helpers for command output
 */

import chalk from 'chalk';
import type { Decision } from '../agents/types.js';
import type { ActionOutcome } from '../actions/applier.js';

/**
 * Strip ANSI codes for length calculation
 */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Success message with green checkmark
 */
export function success(message: string): string {
  return chalk.green('✓') + ' ' + message;
}

/**
 * Warning message with yellow warning sign
 */
export function warning(message: string): string {
  return chalk.yellow('⚠') + ' ' + message;
}

export function header(text: string): string {
  const decoration = chalk.gray('─'.repeat(40));
  return `\n${decoration}\n${chalk.bold.cyan(text)}\n${decoration}\n`;
}

export function dim(text: string): string {
  return chalk.gray(text);
}

export function keyValue(key: string, value: string, keyWidth?: number): string {
  const width = keyWidth ?? 18;
  return `${chalk.cyan(key.padEnd(width))} ${value}`;
}

/**
 * Progress bar, 20 cells wide
 */
export function progress(current: number, total: number, label?: string): string {
  const percentage = total > 0 ? Math.round((current / total) * 100) : 100;
  const filled = Math.round(percentage / 5);
  const bar = chalk.green('█'.repeat(filled)) + chalk.gray('░'.repeat(20 - filled));
  const labelText = label ? `${label} ` : '';
  return `${labelText}[${bar}] ${percentage}%`;
}

export function percent(ratio: number, digits: number = 1): string {
  return `${(ratio * 100).toFixed(digits)}%`;
}

/**
 * Colour a similarity by how close the match is
 */
export function similarity(score: number): string {
  const text = `${Math.round(score * 100)}% match`;
  if (score >= 0.8) return chalk.green(text);
  if (score >= 0.5) return chalk.yellow(text);
  if (score >= 0.3) return chalk.cyan(text);
  return chalk.red(text);
}

/**
 * Plain-column table; cell widths ignore ANSI colour codes.
 */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, col) =>
    Math.max(stripAnsi(h).length, ...rows.map((row) => stripAnsi(row[col] ?? '').length))
  );

  const renderRow = (cells: string[]): string =>
    cells
      .map((cell, col) => cell + ' '.repeat(widths[col] - stripAnsi(cell).length))
      .join('  ');

  return [
    chalk.bold(renderRow(headers)),
    chalk.gray(widths.map((w) => '─'.repeat(w)).join('  ')),
    ...rows.map(renderRow),
  ].join('\n');
}

export function formatDecision(decision: Decision): string {
  return `${chalk.white(decision.plan)} ${chalk.gray(`(${decision.confidenceLevel})`)}`;
}

export function formatOutcome(outcome: ActionOutcome): string {
  return outcome.succeeded ? `  ${chalk.green('•')} ${outcome.message}` : `  ${chalk.red('•')} ${outcome.message}`;
}
