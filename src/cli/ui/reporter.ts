import chalk from 'chalk';
import logSymbols from 'log-symbols';
import type { LaunchReporter } from '../../services/launcher.js';

/**
 * Launch status lines go out verbatim; errors in red on stderr, notes dimmed
 */
export const consoleReporter: LaunchReporter = {
  line(message: string): void {
    console.log(message);
  },
  error(message: string): void {
    console.error(chalk.red(message));
  },
  note(message: string): void {
    console.log(chalk.dim(message));
  },
};

/**
 * Display error message with proper formatting
 */
export function displayError(message: string, details?: string): void {
  console.error(`${logSymbols.error} ${chalk.red('Error:')} ${message}`);

  if (details) {
    console.error(`${chalk.dim('Details:')} ${details}`);
  }
}

/**
 * Display success message with proper formatting
 */
export function displaySuccess(message: string, details?: string): void {
  console.log(`${logSymbols.success} ${chalk.green(message)}`);

  if (details) {
    console.log(`${chalk.dim('   ')}${chalk.dim(details)}`);
  }
}

export function displayWarning(message: string): void {
  console.log(`${logSymbols.warning} ${chalk.yellow(message)}`);
}
