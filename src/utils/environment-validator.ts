import { existsSync } from 'fs';
import path from 'path';
import { isSpawnFailure, splitCommand, type CommandRunner } from './process-runner.js';
import { resolveRankerCommand, type AppConfig } from './config.js';

export interface EnvironmentCheck {
  name: string;
  ok: boolean;
  required: boolean;
  detail: string;
}

export interface EnvironmentValidation {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  checks: EnvironmentCheck[];
}

/**
 * Run a probe command; any non-zero exit or spawn failure counts as unavailable
 */
async function probe(
  runner: CommandRunner,
  command: string,
  args: string[],
  env?: NodeJS.ProcessEnv
): Promise<boolean> {
  try {
    const result = await runner.run(command, args, { env, timeoutMs: 30000 });
    return result.exitCode === 0;
  } catch (error) {
    if (!isSpawnFailure(error)) {
      console.warn(`Probe "${command} ${args.join(' ')}" failed:`, error instanceof Error ? error.message : String(error));
    }
    return false;
  }
}

/**
 * `docker info` succeeds only when the daemon is reachable
 */
export async function isContainerEngineRunning(runner: CommandRunner, env?: NodeJS.ProcessEnv): Promise<boolean> {
  return probe(runner, 'docker', ['info'], env);
}

export async function isClipInstalled(
  runner: CommandRunner,
  pythonExecutable: string,
  env?: NodeJS.ProcessEnv
): Promise<boolean> {
  return probe(runner, pythonExecutable, ['-c', 'import clip'], env);
}

export async function isExecutableAvailable(
  runner: CommandRunner,
  commandLine: string,
  versionArgs: string[],
  env?: NodeJS.ProcessEnv
): Promise<boolean> {
  const [command, ...args] = splitCommand(commandLine);
  return probe(runner, command, [...args, ...versionArgs], env);
}

/**
 * The ranker's interpreter must start and its script file (first argument with an extension) must exist
 */
export async function checkRanker(
  runner: CommandRunner,
  command: [string, ...string[]],
  env?: NodeJS.ProcessEnv
): Promise<EnvironmentCheck> {
  const [executable, ...args] = command;
  const script = args.find(arg => /\.\w+$/.test(arg));
  const check = { name: 'Clip ranker', required: false };

  if (script !== undefined && !existsSync(path.resolve(script))) {
    return { ...check, ok: false, detail: `Not found at ${script}` };
  }
  if (!(await probe(runner, executable, ['--version'], env))) {
    return { ...check, ok: false, detail: `${executable} not found on PATH` };
  }
  return { ...check, ok: true, detail: command.join(' ') };
}

/**
 * Tools behind the bridge endpoints; none of them is required to start
 */
export async function checkBridgeTools(
  runner: CommandRunner,
  config: AppConfig,
  env?: NodeJS.ProcessEnv
): Promise<EnvironmentCheck[]> {
  const checks: EnvironmentCheck[] = [];

  const clipReady = await isClipInstalled(runner, config.pythonExecutable, env);
  checks.push({
    name: 'CLIP',
    ok: clipReady,
    required: false,
    detail: clipReady ? 'AI Ranking Engine Ready' : 'Video ranking might be random',
  });
  checks.push(await checkRanker(runner, resolveRankerCommand(config), env));

  const tools: Array<[string, string, string[]]> = [
    ['ffmpeg', 'ffmpeg', ['-version']],
    ['ffprobe', 'ffprobe', ['-version']],
    ['tts', config.ttsExecutable, ['--help']],
  ];
  for (const [name, commandLine, versionArgs] of tools) {
    const available = await isExecutableAvailable(runner, commandLine, versionArgs, env);
    checks.push({
      name,
      ok: available,
      required: false,
      detail: available ? commandLine : `${commandLine} not found on PATH`,
    });
  }

  return checks;
}

/**
 * Probe everything the launcher and the bridge shell out to.
 * The container engine is required for the Docker edition, the n8n
 * executable for the local one; the rest only degrade the pipeline.
 */
export async function validateLaunchEnvironment(
  runner: CommandRunner,
  config: AppConfig,
  options: { docker: boolean; env?: NodeJS.ProcessEnv }
): Promise<EnvironmentValidation> {
  const { docker, env } = options;
  const checks: EnvironmentCheck[] = [];

  const engineRunning = await isContainerEngineRunning(runner, env);
  checks.push({
    name: 'Container engine',
    ok: engineRunning,
    required: docker,
    detail: engineRunning ? 'docker info succeeded' : 'Docker is not running',
  });

  const n8nAvailable = await isExecutableAvailable(runner, config.n8nBin, ['--version'], env);
  checks.push({
    name: 'n8n executable',
    ok: n8nAvailable,
    required: !docker,
    detail: n8nAvailable ? config.n8nBin : `Not found at ${config.n8nBin}`,
  });

  checks.push(...(await checkBridgeTools(runner, config, env)));

  const errors = checks.filter(check => check.required && !check.ok).map(check => `${check.name}: ${check.detail}`);
  const warnings = checks.filter(check => !check.required && !check.ok).map(check => `${check.name}: ${check.detail}`);

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
    checks,
  };
}
