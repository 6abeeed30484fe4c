import { isSpawnFailure, splitCommand, type CommandRunner, type CommandResult } from '../utils/process-runner.js';
import { activatePythonEnvironment } from '../utils/python-env.js';
import { isClipInstalled, isContainerEngineRunning } from '../utils/environment-validator.js';
import { killPortProcesses, type PortCleanupResult } from '../utils/port-cleanup.js';
import type { AppConfig } from '../utils/config.js';

/**
 * Where launch progress goes; the console reporter decorates it with chalk
 */
export interface LaunchReporter {
  line(message: string): void;
  error(message: string): void;
  note(message: string): void;
}

export interface LaunchOptions {
  docker: boolean;
  tunnel: boolean;
}

export interface LauncherDependencies {
  runner: CommandRunner;
  config: AppConfig;
  reporter: LaunchReporter;
  /** Serves the AI bridge and resolves once it has been shut down */
  runBridge: (config: AppConfig, env: NodeJS.ProcessEnv) => Promise<void>;
  cleanupPort?: (runner: CommandRunner, port: number) => Promise<PortCleanupResult>;
  baseEnv?: NodeJS.ProcessEnv;
}

export const MESSAGES = {
  localBanner: '🚀 Starting DocuForge AI...',
  dockerBanner: '🚀 Starting DocuForge AI (Docker Edition)...',
  clipMissing: '⚠️  Warning: CLIP not fully installed. Video ranking might be random.',
  clipReady: '✅ AI Ranking Engine Ready',
  launchingN8n: '🌐 Launching n8n...',
  dockerNotRunning: '❌ Error: Docker is not running. Please start Docker Desktop.',
  cleaningUp: '🧹 Cleaning up previous instances...',
  startingContainer: '🐳 Starting n8n container...',
  keepTerminalOpen: 'ℹ️  Keep this terminal open to maintain the AI connection.',
  pressCtrlC: '   (Press Ctrl+C to stop)',
} as const;

export function bridgeStartingMessage(port: number): string {
  return `✅ AI Bridge is starting on port ${port}...`;
}

/**
 * Starts n8n natively (local edition) or through Docker Compose with the
 * AI bridge in the foreground (Docker edition). Resolves with the exit status.
 */
export class Launcher {
  private runner: CommandRunner;
  private config: AppConfig;
  private reporter: LaunchReporter;
  private runBridge: LauncherDependencies['runBridge'];
  private cleanupPort: NonNullable<LauncherDependencies['cleanupPort']>;
  private baseEnv: NodeJS.ProcessEnv;

  constructor(deps: LauncherDependencies) {
    this.runner = deps.runner;
    this.config = deps.config;
    this.reporter = deps.reporter;
    this.runBridge = deps.runBridge;
    this.cleanupPort = deps.cleanupPort ?? killPortProcesses;
    this.baseEnv = deps.baseEnv ?? process.env;
  }

  async launch(options: LaunchOptions): Promise<number> {
    return options.docker ? this.launchDocker() : this.launchLocal(options.tunnel);
  }

  async launchLocal(tunnel: boolean): Promise<number> {
    this.reporter.line(MESSAGES.localBanner);

    const { env } = activatePythonEnvironment(this.config.venvDir, this.baseEnv);

    if (await isClipInstalled(this.runner, this.config.pythonExecutable, env)) {
      this.reporter.line(MESSAGES.clipReady);
    } else {
      this.reporter.line(MESSAGES.clipMissing);
    }

    this.reporter.line(MESSAGES.launchingN8n);
    const n8nEnv: NodeJS.ProcessEnv = {
      ...env,
      N8N_USER_MANAGEMENT_JWT_SECRET: this.config.n8nJwtSecret,
    };
    const args = tunnel ? ['start', '--tunnel'] : ['start'];

    try {
      return await this.runner.runForeground(this.config.n8nBin, args, { env: n8nEnv });
    } catch (error) {
      if (isSpawnFailure(error)) {
        this.reporter.error(`❌ Error: n8n executable not found at ${this.config.n8nBin}. Install it with: npm install n8n`);
        return 1;
      }
      throw error;
    }
  }

  async launchDocker(): Promise<number> {
    this.reporter.line(MESSAGES.dockerBanner);

    const { env } = activatePythonEnvironment(this.config.venvDir, this.baseEnv);

    if (!(await isContainerEngineRunning(this.runner, env))) {
      this.reporter.error(MESSAGES.dockerNotRunning);
      return 1;
    }

    this.reporter.line(MESSAGES.cleaningUp);
    await this.composeDown(env);
    const cleanup = await this.cleanupPort(this.runner, this.config.bridgePort);
    if (cleanup.killed.length > 0) {
      this.reporter.note(`   Stopped ${cleanup.killed.length} process(es) on port ${cleanup.port}`);
    }
    for (const failure of cleanup.failures) {
      this.reporter.note(`   Port cleanup skipped: ${failure}`);
    }

    this.reporter.line(MESSAGES.startingContainer);
    await this.composeUp(env);

    this.reporter.line(bridgeStartingMessage(this.config.bridgePort));
    this.reporter.line(MESSAGES.keepTerminalOpen);
    this.reporter.line(MESSAGES.pressCtrlC);
    this.reporter.line('');

    await this.runBridge(this.config, env);
    return 0;
  }

  /**
   * `docker-compose down`; failures are only noted
   */
  private async composeDown(env: NodeJS.ProcessEnv): Promise<void> {
    const [command, ...baseArgs] = splitCommand(this.config.composeCommand);
    try {
      const result = await this.runner.run(command, [...baseArgs, 'down'], { env });
      if (result.exitCode !== 0) {
        this.reporter.note(`   ${this.config.composeCommand} down exited with code ${result.exitCode}`);
      }
    } catch (error) {
      this.reporter.note(`   ${this.config.composeCommand} down skipped: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * `docker-compose up -d`; the container's lifecycle belongs to the engine from here on
   */
  private async composeUp(env: NodeJS.ProcessEnv): Promise<void> {
    const [command, ...baseArgs] = splitCommand(this.config.composeCommand);
    let result: CommandResult;
    try {
      result = await this.runner.run(command, [...baseArgs, 'up', '-d'], { env });
    } catch (error) {
      this.reporter.error(`⚠️  ${this.config.composeCommand} up failed: ${error instanceof Error ? error.message : String(error)}`);
      return;
    }
    if (result.exitCode !== 0) {
      this.reporter.error(`⚠️  ${this.config.composeCommand} up exited with code ${result.exitCode}`);
      if (result.stderr.trim()) {
        this.reporter.note(result.stderr.trim());
      }
    }
  }
}
