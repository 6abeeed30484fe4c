import { z } from 'zod';

/**
 * n8n node as stored in an exported workflow document
 */
export const WorkflowNodeSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string(),
  typeVersion: z.number(),
  position: z.tuple([z.number(), z.number()]),
  parameters: z.record(z.unknown()).default({}),
  credentials: z.record(z.unknown()).nullable().optional(),
}).passthrough();

export type WorkflowNode = z.infer<typeof WorkflowNodeSchema>;

export type ConnectionTarget = {
  node: string;
  type: 'main';
  index: number;
};

/**
 * Connections keyed by source node name; `main[outputIndex]` lists the targets of that output
 */
export type WorkflowConnections = Record<string, { main: ConnectionTarget[][] }>;

const ConnectionTargetSchema = z.object({
  node: z.string(),
  type: z.string(),
  index: z.number().int(),
}).passthrough();

export const WorkflowSchema = z.object({
  name: z.string(),
  nodes: z.array(WorkflowNodeSchema),
  // Keyed by connection type: "main", or "ai_tool" and friends on AI nodes
  connections: z.record(z.record(z.array(z.array(ConnectionTargetSchema).nullable()))).default({}),
  settings: z.record(z.unknown()).default({}),
  staticData: z.unknown().optional(),
}).passthrough();

export type Workflow = z.infer<typeof WorkflowSchema>;

export const NODE_TYPES = {
  webhook: 'n8n-nodes-base.webhook',
  code: 'n8n-nodes-base.code',
  httpRequest: 'n8n-nodes-base.httpRequest',
  executeCommand: 'n8n-nodes-base.executeCommand',
  respondToWebhook: 'n8n-nodes-base.respondToWebhook',
} as const;

export const HTTP_REQUEST_TYPE_VERSION = 4.2;

export type BridgeEndpoint = 'rank' | 'voiceover' | 'assemble';

/**
 * Workflow error class
 */
export class WorkflowError extends Error {
  constructor(message: string, public code: string, public details?: unknown) {
    super(message);
    this.name = 'WorkflowError';
  }
}
