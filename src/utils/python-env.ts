import { existsSync } from 'fs';
import path from 'path';

export interface PythonEnvironment {
  env: NodeJS.ProcessEnv;
  activated: boolean;
  binDir?: string;
}

/**
 * Equivalent of sourcing <venv>/bin/activate for child processes:
 * the venv's bin directory goes first on PATH and VIRTUAL_ENV is set.
 * A missing venv leaves the environment untouched.
 */
export function activatePythonEnvironment(
  venvDir: string,
  baseEnv: NodeJS.ProcessEnv = process.env
): PythonEnvironment {
  const venvRoot = path.resolve(venvDir);
  const binDir = path.join(venvRoot, 'bin');

  if (!existsSync(binDir)) {
    return { env: { ...baseEnv }, activated: false };
  }

  const currentPath = baseEnv.PATH ?? '';
  const env: NodeJS.ProcessEnv = {
    ...baseEnv,
    VIRTUAL_ENV: venvRoot,
    PATH: currentPath ? `${binDir}${path.delimiter}${currentPath}` : binDir,
  };
  delete env.PYTHONHOME;

  return { env, activated: true, binDir };
}
