import type { CommandRunner } from './process-runner.js';

export interface PortCleanupResult {
  port: number;
  pids: number[];
  killed: number[];
  failures: string[];
}

export type KillFunction = (pid: number, signal: NodeJS.Signals) => void;

/**
 * PIDs listening on a TCP port, via `lsof -ti:<port>`.
 * lsof exits 1 when nothing is bound; that is an empty list, not an error.
 */
export async function findPortProcesses(runner: CommandRunner, port: number): Promise<number[]> {
  const result = await runner.run('lsof', [`-ti:${port}`]);
  if (result.exitCode !== 0) {
    return [];
  }

  return result.stdout
    .split('\n')
    .map(line => parseInt(line.trim(), 10))
    .filter(pid => Number.isInteger(pid) && pid > 0);
}

/**
 * Best-effort SIGKILL of whatever holds the port. Never throws.
 */
export async function killPortProcesses(
  runner: CommandRunner,
  port: number,
  kill: KillFunction = (pid, signal) => { process.kill(pid, signal); }
): Promise<PortCleanupResult> {
  const result: PortCleanupResult = { port, pids: [], killed: [], failures: [] };

  try {
    result.pids = await findPortProcesses(runner, port);
  } catch (error) {
    result.failures.push(`lsof: ${error instanceof Error ? error.message : String(error)}`);
    return result;
  }

  for (const pid of result.pids) {
    try {
      kill(pid, 'SIGKILL');
      result.killed.push(pid);
    } catch (error) {
      result.failures.push(`${pid}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  return result;
}
