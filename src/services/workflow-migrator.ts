import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import {
  HTTP_REQUEST_TYPE_VERSION,
  NODE_TYPES,
  WorkflowError,
  WorkflowSchema,
  type BridgeEndpoint,
  type Workflow,
  type WorkflowNode,
} from '../types/workflow.js';
import { formatZodIssues } from '../utils/validation.js';
import { DEFAULT_BRIDGE_HOST, createBridgeRequestParameters } from './workflow-builder.js';

export const MIGRATED_WORKFLOW_NAME = 'DocuForge AI (Docker Edition)';

/** Video processing can take minutes */
const BRIDGE_REQUEST_TIMEOUT_MS = 300000;

/**
 * Script called by an executeCommand node → bridge endpoint and the body expression
 * that carries the same data the script received as its JSON argument
 */
const SCRIPT_ROUTES: Array<{ script: string; endpoint: BridgeEndpoint; jsonBody: string }> = [
  { script: 'clip_ranker.py', endpoint: 'rank', jsonBody: '={{ $input.all() }}' },
  { script: 'generate_voiceover.py', endpoint: 'voiceover', jsonBody: '={{ $json }}' },
  { script: 'assemble_video.py', endpoint: 'assemble', jsonBody: "={{ $('Parse Voiceover Result').item.json }}" },
];

export interface MigrationOptions {
  bridgeUrl?: string;
  name?: string;
}

export interface MigratedNode {
  name: string;
  endpoint: BridgeEndpoint;
}

export interface MigrationResult {
  workflow: Workflow;
  migrated: MigratedNode[];
}

function routeFor(node: WorkflowNode): (typeof SCRIPT_ROUTES)[number] | undefined {
  if (node.type !== NODE_TYPES.executeCommand) {
    return undefined;
  }
  const command = node.parameters.command;
  if (typeof command !== 'string') {
    return undefined;
  }
  return SCRIPT_ROUTES.find(route => command.includes(route.script));
}

/**
 * Replace script-calling executeCommand nodes with HTTP requests to the bridge.
 * Node id, name and position are kept so connections stay valid.
 */
export function migrateWorkflow(workflow: Workflow, options: MigrationOptions = {}): MigrationResult {
  const bridgeUrl = options.bridgeUrl ?? DEFAULT_BRIDGE_HOST;
  const migrated: MigratedNode[] = [];

  const nodes = workflow.nodes.map(node => {
    const route = routeFor(node);
    if (!route) {
      return node;
    }

    migrated.push({ name: node.name, endpoint: route.endpoint });
    return {
      ...node,
      type: NODE_TYPES.httpRequest,
      typeVersion: HTTP_REQUEST_TYPE_VERSION,
      parameters: {
        ...createBridgeRequestParameters(bridgeUrl, route.endpoint, route.jsonBody),
        bodyParameters: { parameters: [] },
        options: { timeout: BRIDGE_REQUEST_TIMEOUT_MS },
      },
    };
  });

  return {
    workflow: {
      ...workflow,
      name: options.name ?? MIGRATED_WORKFLOW_NAME,
      nodes,
    },
    migrated,
  };
}

/**
 * Read and validate an exported workflow document
 */
export async function readWorkflowFile(filePath: string): Promise<Workflow> {
  if (!existsSync(filePath)) {
    throw new WorkflowError(`${filePath} not found.`, 'NOT_FOUND', { filePath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new WorkflowError(
      `${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_JSON',
      error
    );
  }

  const parsed = WorkflowSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WorkflowError(
      `${filePath} is not an n8n workflow: ${formatZodIssues(parsed.error).join('; ')}`,
      'INVALID_WORKFLOW'
    );
  }

  return parsed.data;
}

export async function writeWorkflowFile(filePath: string, workflow: Workflow): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(workflow, null, 2) + '\n', 'utf-8');
}

export async function migrateWorkflowFile(
  inputPath: string,
  outputPath: string,
  options: MigrationOptions = {}
): Promise<MigrationResult> {
  const workflow = await readWorkflowFile(inputPath);
  const result = migrateWorkflow(workflow, options);
  await writeWorkflowFile(outputPath, result.workflow);
  return result;
}
