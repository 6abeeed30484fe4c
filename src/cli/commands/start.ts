import { Launcher } from '../../services/launcher.js';
import { runBridgeUntilSignal } from '../../api/bridge-server.js';
import { NodeCommandRunner, type CommandRunner } from '../../utils/process-runner.js';
import type { AppConfig } from '../../utils/config.js';
import { consoleReporter } from '../ui/reporter.js';

export interface StartCommandOptions {
  docker: boolean;
  tunnel: boolean;
}

/**
 * Start command - launch n8n locally, or in Docker with the AI bridge in the foreground
 */
export async function startCommand(
  config: AppConfig,
  options: StartCommandOptions,
  runner: CommandRunner = new NodeCommandRunner()
): Promise<number> {
  const launcher = new Launcher({
    runner,
    config,
    reporter: consoleReporter,
    runBridge: runBridgeUntilSignal,
  });

  return launcher.launch(options);
}
