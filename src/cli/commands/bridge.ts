import { runBridgeUntilSignal } from '../../api/bridge-server.js';
import { activatePythonEnvironment } from '../../utils/python-env.js';
import type { AppConfig } from '../../utils/config.js';

export interface BridgeCommandOptions {
  port?: number;
  host?: string;
}

/**
 * Bridge command - serve the AI bridge without touching n8n or Docker
 */
export async function bridgeCommand(config: AppConfig, options: BridgeCommandOptions): Promise<number> {
  const effective: AppConfig = {
    ...config,
    bridgePort: options.port ?? config.bridgePort,
    bridgeHost: options.host ?? config.bridgeHost,
  };
  const { env } = activatePythonEnvironment(effective.venvDir);

  await runBridgeUntilSignal(effective, env);
  return 0;
}
