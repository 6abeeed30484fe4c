import { fileURLToPath } from 'url';
import { z } from 'zod';
import { splitCommand } from './process-runner.js';

/**
 * CLIP ranker shipped with the package (scripts/clip_ranker.py), resolved the same from src/ and dist/
 */
export const DEFAULT_RANKER_SCRIPT = fileURLToPath(new URL('../../scripts/clip_ranker.py', import.meta.url));

/**
 * Runtime configuration schema
 */
const AppConfigSchema = z.object({
  bridgePort: z.coerce.number().int().min(1).max(65535).default(5001),
  bridgeHost: z.string().min(1).default('0.0.0.0'),
  venvDir: z.string().min(1).default('./venv'),
  pythonExecutable: z.string().min(1).default('python3'),
  n8nBin: z.string().min(1).default('./node_modules/.bin/n8n'),
  n8nJwtSecret: z.string().min(1).default('docuforge_secret_123'),
  composeCommand: z.string().min(1).default('docker-compose'),
  workDir: z.string().min(1).default('/tmp/docuforge'),
  /** Unset means the bundled script under the configured Python */
  rankerCommand: z.string().min(1).optional(),
  rankerTimeoutMs: z.coerce.number().int().positive().default(300000),
  ttsExecutable: z.string().min(1).default('tts'),
  ttsModel: z.string().min(1).default('tts_models/en/ljspeech/vits'),
  lutPath: z.string().min(1).default('/usr/local/share/luts/documentary.cube'),
  assemblyTimeoutSeconds: z.coerce.number().int().positive().default(600),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Environment variable → config key
 */
const ENV_MAP: Record<string, keyof AppConfig> = {
  BRIDGE_PORT: 'bridgePort',
  BRIDGE_HOST: 'bridgeHost',
  VENV_DIR: 'venvDir',
  PYTHON_EXECUTABLE: 'pythonExecutable',
  N8N_BIN: 'n8nBin',
  N8N_JWT_SECRET: 'n8nJwtSecret',
  COMPOSE_COMMAND: 'composeCommand',
  WORK_DIR: 'workDir',
  RANKER_COMMAND: 'rankerCommand',
  RANKER_TIMEOUT_MS: 'rankerTimeoutMs',
  TTS_EXECUTABLE: 'ttsExecutable',
  TTS_MODEL: 'ttsModel',
  LUT_PATH: 'lutPath',
  ASSEMBLY_TIMEOUT_SECONDS: 'assemblyTimeoutSeconds',
};

/**
 * Configuration error class
 */
export class ConfigError extends Error {
  constructor(message: string, public errors: string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build the configuration from environment variables and defaults.
 * Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: Partial<Record<keyof AppConfig, string>> = {};

  for (const [envKey, configKey] of Object.entries(ENV_MAP)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      raw[configKey] = value.trim();
    }
  }

  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const envNames = new Map<string, string>(Object.entries(ENV_MAP).map(([envKey, configKey]) => [configKey, envKey]));
    const errors = parsed.error.errors.map(issue => {
      const key = String(issue.path[0] ?? '');
      return `${envNames.get(key) ?? key}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, errors);
  }

  return parsed.data;
}

/**
 * Bridge URL as seen from inside the n8n container
 */
export function getContainerBridgeUrl(config: Pick<AppConfig, 'bridgePort'>): string {
  return `http://host.docker.internal:${config.bridgePort}`;
}

/**
 * Executable and arguments of the ranker; the JSON payload is appended last
 */
export function resolveRankerCommand(
  config: Pick<AppConfig, 'rankerCommand' | 'pythonExecutable'>
): [string, ...string[]] {
  if (config.rankerCommand !== undefined) {
    return splitCommand(config.rankerCommand);
  }
  return [config.pythonExecutable, DEFAULT_RANKER_SCRIPT];
}
