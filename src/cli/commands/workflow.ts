import { existsSync, statSync } from 'fs';
import path from 'path';
import { buildPipelineWorkflow } from '../../services/workflow-builder.js';
import { migrateWorkflowFile, writeWorkflowFile } from '../../services/workflow-migrator.js';
import { WorkflowError } from '../../types/workflow.js';
import { getContainerBridgeUrl, type AppConfig } from '../../utils/config.js';
import { formatFileSize } from '../utils/formatters.js';
import { displayError, displaySuccess } from '../ui/reporter.js';

export const DEFAULT_WORKFLOW_FILE = 'docuforge_workflow.json';
export const DEFAULT_DOCKER_WORKFLOW_FILE = 'docuforge_docker_workflow.json';

export interface GenerateWorkflowOptions {
  output: string;
  name?: string;
  bridgeUrl?: string;
  force: boolean;
}

export interface MigrateWorkflowOptions {
  input: string;
  output: string;
  bridgeUrl?: string;
}

/**
 * Ask before replacing an existing file; never overwrite silently without a TTY
 */
async function confirmOverwrite(filePath: string): Promise<boolean> {
  if (!process.stdin.isTTY) {
    return false;
  }
  const { confirm } = await import('@inquirer/prompts');
  return confirm({
    message: `${filePath} already exists. Overwrite?`,
    default: false,
  });
}

/**
 * Generate command - write the bridge-backed pipeline workflow for import into n8n
 */
export async function generateWorkflowCommand(config: AppConfig, options: GenerateWorkflowOptions): Promise<number> {
  const outputPath = path.resolve(options.output);

  if (existsSync(outputPath) && !options.force && !(await confirmOverwrite(outputPath))) {
    displayError(`${outputPath} already exists`, 'Pass --force to overwrite it');
    return 1;
  }

  const workflow = buildPipelineWorkflow({
    name: options.name,
    bridgeHost: options.bridgeUrl ?? getContainerBridgeUrl(config),
  });
  await writeWorkflowFile(outputPath, workflow);

  displaySuccess(
    'Safe Workflow Generated',
    `${workflow.nodes.length} nodes → ${outputPath} (${formatFileSize(statSync(outputPath).size)})`
  );
  return 0;
}

/**
 * Migrate command - turn script-calling executeCommand nodes into bridge HTTP calls
 */
export async function migrateWorkflowCommand(config: AppConfig, options: MigrateWorkflowOptions): Promise<number> {
  try {
    const result = await migrateWorkflowFile(options.input, options.output, {
      bridgeUrl: options.bridgeUrl ?? getContainerBridgeUrl(config),
    });

    for (const node of result.migrated) {
      console.log(`Migrating Node: ${node.name} -> HTTP POST /${node.endpoint}`);
    }
    displaySuccess(`Migration complete. ${result.migrated.length} nodes updated. Saved to ${options.output}`);
    return 0;
  } catch (error) {
    if (error instanceof WorkflowError) {
      displayError(error.message);
      return 1;
    }
    throw error;
  }
}
