import { spawn } from 'child_process';
import os from 'os';

/**
 * Captured result of a finished child process
 */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  timeoutMs?: number;
}

export interface ForegroundOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Where SIGINT/SIGTERM are received; defaults to this process */
  signals?: NodeJS.EventEmitter;
}

/**
 * Command execution error class
 */
export class CommandError extends Error {
  constructor(message: string, public code: 'SPAWN_FAILED' | 'TIMEOUT', public details?: unknown) {
    super(message);
    this.name = 'CommandError';
  }
}

/**
 * Seam for everything that shells out: container CLI, port inspection,
 * n8n, python probes, the ranker, tts.
 */
export interface CommandRunner {
  /**
   * Run a command to completion and capture its output
   */
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;

  /**
   * Run a command attached to this terminal and resolve with its exit code
   */
  runForeground(command: string, args: string[], options?: ForegroundOptions): Promise<number>;
}

/**
 * True when the command could not be started at all (missing executable, bad permissions)
 */
export function isSpawnFailure(error: unknown): boolean {
  return error instanceof CommandError && error.code === 'SPAWN_FAILED';
}

/**
 * Split a configured command line ("docker compose", "python3 ranker.py") into executable and arguments
 */
export function splitCommand(commandLine: string): [string, ...string[]] {
  const [command = '', ...args] = commandLine.trim().split(/\s+/);
  return [command, ...args];
}

/**
 * child_process backed runner
 */
export class NodeCommandRunner implements CommandRunner {
  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        env: options.env ?? process.env,
        cwd: options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;
      let timeout: NodeJS.Timeout | undefined;

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        reject(new CommandError(`Failed to start ${command}: ${error.message}`, 'SPAWN_FAILED', error));
      });

      child.on('close', (code) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        resolve({
          exitCode: code ?? 1,
          stdout,
          stderr,
        });
      });

      if (options.timeoutMs !== undefined) {
        timeout = setTimeout(() => {
          if (settled) return;
          settled = true;
          child.kill('SIGTERM');
          reject(new CommandError(`${command} timed out after ${options.timeoutMs}ms`, 'TIMEOUT', { stdout, stderr }));
        }, options.timeoutMs);
      }
    });
  }

  async runForeground(command: string, args: string[], options: ForegroundOptions = {}): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        env: options.env ?? process.env,
        cwd: options.cwd,
        stdio: 'inherit',
      });

      // Ctrl+C already reaches the child through the terminal's process group;
      // only keep this process alive. SIGTERM is addressed to us alone.
      const signals: NodeJS.EventEmitter = options.signals ?? process;
      const ignoreInterrupt = () => {};
      const forwardTerminate = () => {
        child.kill('SIGTERM');
      };
      signals.on('SIGINT', ignoreInterrupt);
      signals.on('SIGTERM', forwardTerminate);
      const detach = () => {
        signals.off('SIGINT', ignoreInterrupt);
        signals.off('SIGTERM', forwardTerminate);
      };

      child.on('error', (error) => {
        detach();
        reject(new CommandError(`Failed to start ${command}: ${error.message}`, 'SPAWN_FAILED', error));
      });

      // A signalled child maps to the shell's 128+n convention
      child.on('close', (code, signal) => {
        detach();
        if (code !== null) {
          resolve(code);
        } else if (signal !== null) {
          resolve(128 + os.constants.signals[signal]);
        } else {
          resolve(1);
        }
      });
    });
  }
}
