import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, type AppConfig } from '../utils/config.js';
import { startCommand } from './commands/start.js';
import { bridgeCommand } from './commands/bridge.js';
import { doctorCommand } from './commands/doctor.js';
import {
  DEFAULT_DOCKER_WORKFLOW_FILE,
  DEFAULT_WORKFLOW_FILE,
  generateWorkflowCommand,
  migrateWorkflowCommand,
} from './commands/workflow.js';

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

/**
 * Build the command tree. Every action stores its exit status through `setExitCode`.
 */
export function createProgram(getConfig: () => AppConfig, setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('docuforge')
    .description('Launch the DocuForge n8n pipeline and its AI bridge')
    .version('1.0.0');

  program
    .command('start')
    .description('Start n8n locally, or in Docker with the AI bridge in the foreground')
    .option('--docker', 'use the Docker edition (docker-compose + AI bridge)', false)
    .option('--no-tunnel', 'start local n8n without --tunnel')
    .action(async (options: { docker: boolean; tunnel: boolean }) => {
      setExitCode(await startCommand(getConfig(), options));
    });

  program
    .command('bridge')
    .description('Serve the AI bridge (/health, /rank, /voiceover, /assemble)')
    .option('-p, --port <port>', 'port to listen on', parsePort)
    .option('--host <host>', 'interface to bind')
    .action(async (options: { port?: number; host?: string }) => {
      setExitCode(await bridgeCommand(getConfig(), options));
    });

  program
    .command('doctor')
    .description('Check the container engine, n8n, CLIP, ffmpeg and tts')
    .option('--docker', 'check requirements of the Docker edition', false)
    .action(async (options: { docker: boolean }) => {
      setExitCode(await doctorCommand(getConfig(), options));
    });

  const workflow = program
    .command('workflow')
    .description('Generate or migrate n8n workflow documents');

  workflow
    .command('generate')
    .description('Write the bridge-backed documentary pipeline workflow')
    .option('-o, --output <file>', 'output file', DEFAULT_WORKFLOW_FILE)
    .option('--name <name>', 'workflow name')
    .option('--bridge-url <url>', 'bridge URL as seen from n8n')
    .option('-f, --force', 'overwrite an existing file', false)
    .action(async (options: { output: string; name?: string; bridgeUrl?: string; force: boolean }) => {
      setExitCode(await generateWorkflowCommand(getConfig(), options));
    });

  workflow
    .command('migrate')
    .description('Replace script-calling executeCommand nodes with bridge HTTP requests')
    .option('-i, --input <file>', 'workflow to migrate', DEFAULT_WORKFLOW_FILE)
    .option('-o, --output <file>', 'migrated workflow', DEFAULT_DOCKER_WORKFLOW_FILE)
    .option('--bridge-url <url>', 'bridge URL as seen from n8n')
    .action(async (options: { input: string; output: string; bridgeUrl?: string }) => {
      setExitCode(await migrateWorkflowCommand(getConfig(), options));
    });

  return program;
}

/**
 * Main CLI entry point; resolves with the process exit status
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  let exitCode = 0;
  let config: AppConfig | undefined;

  const program = createProgram(
    () => {
      config ??= loadConfig();
      return config;
    },
    code => {
      exitCode = code;
    }
  );

  await program.parseAsync(argv);
  return exitCode;
}

/**
 * CLI Error handler
 */
export function handleCLIError(error: unknown): void {
  console.error('\n' + chalk.red('❌ Fatal Error:'));

  if (error instanceof Error) {
    console.error(chalk.red(`   ${error.message}`));

    // Show stack trace in development
    if (process.env.NODE_ENV === 'development') {
      console.error(chalk.dim('\nStack trace:'));
      console.error(chalk.dim(error.stack));
    }
  } else {
    console.error(chalk.red(`   ${String(error)}`));
  }

  console.error('\n' + chalk.yellow('💡 Troubleshooting tips:'));
  console.error(chalk.yellow('   • Run docuforge doctor to check the environment'));
  console.error(chalk.yellow('   • Check the settings in your .env file'));
  console.error(chalk.yellow('   • Try running with NODE_ENV=development for more details'));
  console.error();
}
