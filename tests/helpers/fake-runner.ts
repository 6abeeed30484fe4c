import {
  CommandError,
  type CommandResult,
  type CommandRunner,
  type ForegroundOptions,
  type RunOptions,
} from '../../src/utils/process-runner.js';

export interface RecordedCall {
  command: string;
  args: string[];
  options?: RunOptions | ForegroundOptions;
  foreground: boolean;
}

type Handler = (command: string, args: string[]) => CommandResult | number | Error | undefined;

export const ok = (stdout = ''): CommandResult => ({ exitCode: 0, stdout, stderr: '' });
export const failed = (exitCode = 1, stderr = ''): CommandResult => ({ exitCode, stdout: '', stderr });
export const notFound = (command: string): CommandError =>
  new CommandError(`Failed to start ${command}: spawn ${command} ENOENT`, 'SPAWN_FAILED');

/**
 * In-memory CommandRunner; records every call and answers through a handler.
 * An unanswered `run` exits 0, an unanswered foreground command exits 0.
 */
export class FakeRunner implements CommandRunner {
  calls: RecordedCall[] = [];

  constructor(private handler: Handler = () => undefined) {}

  async run(command: string, args: string[], options?: RunOptions): Promise<CommandResult> {
    this.calls.push({ command, args, options, foreground: false });
    const answer = this.handler(command, args);
    if (answer instanceof Error) {
      throw answer;
    }
    if (typeof answer === 'number') {
      return { exitCode: answer, stdout: '', stderr: '' };
    }
    return answer ?? ok();
  }

  async runForeground(command: string, args: string[], options?: ForegroundOptions): Promise<number> {
    this.calls.push({ command, args, options, foreground: true });
    const answer = this.handler(command, args);
    if (answer instanceof Error) {
      throw answer;
    }
    if (typeof answer === 'number') {
      return answer;
    }
    return answer?.exitCode ?? 0;
  }

  commandLines(): string[] {
    return this.calls.map(call => [call.command, ...call.args].join(' '));
  }
}
