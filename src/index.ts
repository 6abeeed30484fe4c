import 'dotenv/config';
import { runBridgeUntilSignal } from './api/bridge-server.js';
import { loadConfig } from './utils/config.js';
import { activatePythonEnvironment } from './utils/python-env.js';
import { checkBridgeTools } from './utils/environment-validator.js';
import { NodeCommandRunner } from './utils/process-runner.js';

/**
 * Standalone AI bridge server (what `docuforge bridge` runs), with a startup report
 * of the tools the endpoints shell out to
 */
async function start(): Promise<void> {
  const config = loadConfig();
  const python = activatePythonEnvironment(config.venvDir);
  console.log(python.activated ? `✓ Python environment: ${python.binDir}` : 'Python environment not found, using PATH');

  const checks = await checkBridgeTools(new NodeCommandRunner(), config, python.env);
  for (const check of checks) {
    console.log(`${check.ok ? '✓' : '⚠️ '} ${check.name}: ${check.detail}`);
  }

  await runBridgeUntilSignal(config, python.env);
  console.log('AI bridge stopped');
}

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
  process.exit(1);
});

start().catch(error => {
  console.error('Failed to start AI bridge:', error instanceof Error ? error.message : error);
  process.exit(1);
});
