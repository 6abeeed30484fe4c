import chalk from 'chalk';
import logSymbols from 'log-symbols';
import Table from 'cli-table3';
import type { EnvironmentCheck } from '../../utils/environment-validator.js';

/**
 * Color scheme for consistent theming
 */
export const colors = {
  primary: chalk.cyan,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  dim: chalk.dim,
  bold: chalk.bold,
} as const;

/**
 * Format file size in human-readable format
 */
export function formatFileSize(bytes: number): string {
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  if (bytes <= 0) return '0 B';

  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), sizes.length - 1);
  const size = (bytes / Math.pow(1024, i)).toFixed(1);

  return `${size} ${sizes[i]}`;
}

/**
 * Status cell of an environment check
 */
export function formatCheckStatus(check: EnvironmentCheck): string {
  if (check.ok) {
    return `${logSymbols.success} ${colors.success('ok')}`;
  }
  return check.required
    ? `${logSymbols.error} ${colors.error('missing')}`
    : `${logSymbols.warning} ${colors.warning('missing')}`;
}

/**
 * Create a formatted table for environment checks
 */
export function createCheckTable(checks: EnvironmentCheck[]): string {
  const table = new Table({
    head: [
      colors.bold('Check'),
      colors.bold('Status'),
      colors.bold('Required'),
      colors.bold('Detail'),
    ],
    colWidths: [20, 14, 10, 45],
    wordWrap: true,
    style: {
      head: [],
      border: [],
    },
  });

  for (const check of checks) {
    table.push([
      colors.primary(check.name),
      formatCheckStatus(check),
      check.required ? 'yes' : colors.dim('no'),
      colors.dim(check.detail),
    ]);
  }

  return table.toString();
}
