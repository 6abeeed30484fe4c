import chalk from 'chalk';
import { validateLaunchEnvironment } from '../../utils/environment-validator.js';
import { activatePythonEnvironment } from '../../utils/python-env.js';
import { NodeCommandRunner, type CommandRunner } from '../../utils/process-runner.js';
import type { AppConfig } from '../../utils/config.js';
import { createCheckTable } from '../utils/formatters.js';
import { displayError, displaySuccess, displayWarning } from '../ui/reporter.js';

export interface DoctorCommandOptions {
  docker: boolean;
}

/**
 * Doctor command - probe everything the launcher and the bridge depend on
 */
export async function doctorCommand(
  config: AppConfig,
  options: DoctorCommandOptions,
  runner: CommandRunner = new NodeCommandRunner()
): Promise<number> {
  const python = activatePythonEnvironment(config.venvDir);
  const edition = options.docker ? 'Docker edition' : 'local edition';

  console.log(chalk.bold.cyan(`\n🩺 Environment check (${edition})\n`));
  if (python.activated) {
    console.log(chalk.dim(`   Python environment: ${python.binDir}\n`));
  }

  const validation = await validateLaunchEnvironment(runner, config, {
    docker: options.docker,
    env: python.env,
  });

  console.log(createCheckTable(validation.checks));
  console.log();

  for (const warning of validation.warnings) {
    displayWarning(warning);
  }

  if (!validation.isValid) {
    displayError(`Cannot start the ${edition}`, validation.errors.join('; '));
    return 1;
  }

  displaySuccess(`Ready to start the ${edition}`);
  return 0;
}
