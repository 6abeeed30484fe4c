import { randomUUID } from 'crypto';
import {
  HTTP_REQUEST_TYPE_VERSION,
  NODE_TYPES,
  type BridgeEndpoint,
  type Workflow,
  type WorkflowConnections,
  type WorkflowNode,
} from '../types/workflow.js';

export const DEFAULT_WORKFLOW_NAME = 'DocuForge AI (Docker Final v2)';
export const DEFAULT_BRIDGE_HOST = 'http://host.docker.internal:5001';

export interface WorkflowBuildOptions {
  name?: string;
  bridgeHost?: string;
  idFactory?: () => string;
}

const ANALYZE_SCRIPT_CODE = `
const script = $input.item.json.body?.script || $input.item.json.query?.script;
if (!script || script.length < 10) throw new Error("Script too short");
const sentences = script.split(/[.!?]+/).map(s => s.trim()).filter(s => s.length > 5);
const scenes = sentences.map((s, i) => ({
    sceneId: i + 1,
    sceneText: s,
    keywords: s.split(' ').slice(0, 5).join(' '),
    duration: Math.ceil(s.split(' ').length / 2)
}));
return { json: { projectId: \`proj_\${Date.now()}\`, scenes, totalScenes: scenes.length } };
`;

const SPLIT_SCENES_CODE = 'return $input.item.json.scenes.map(scene => ({ json: scene }));';

const PROCESS_PEXELS_CODE = `
const videos = $input.item.json.videos || [];
if (videos.length === 0) return { json: { error: "No videos" } };
const scene = $('Split Into Scenes').item.json;
return { json: {
    videoUrl: videos[0].video_files[0].link,
    thumbnailUrl: videos[0].image,
    sceneId: scene.sceneId,
    sceneText: scene.sceneText
}};
`;

/**
 * Bridge call node: POST <host>/<endpoint> with a raw JSON body expression
 */
export function createBridgeRequestParameters(
  bridgeHost: string,
  endpoint: BridgeEndpoint,
  jsonBody: string
): Record<string, unknown> {
  return {
    method: 'POST',
    url: `${bridgeHost.replace(/\/+$/, '')}/${endpoint}`,
    sendBody: true,
    contentType: 'json',
    specifyBody: 'json',
    jsonBody,
  };
}

/**
 * Wire nodes one after another on output 0
 */
export function connectLinear(names: string[]): WorkflowConnections {
  const connections: WorkflowConnections = {};

  for (let i = 0; i < names.length - 1; i++) {
    const source = names[i];
    const target = names[i + 1];
    connections[source] = {
      main: [[{ node: target, type: 'main', index: 0 }]],
    };
  }

  return connections;
}

/**
 * Build the documentary pipeline: webhook → scene split → Pexels search →
 * bridge ranking, voiceover and assembly → webhook response
 */
export function buildPipelineWorkflow(options: WorkflowBuildOptions = {}): Workflow {
  const name = options.name ?? DEFAULT_WORKFLOW_NAME;
  const bridgeHost = options.bridgeHost ?? DEFAULT_BRIDGE_HOST;
  const idFactory = options.idFactory ?? randomUUID;

  let x = 200;
  const node = (
    nodeName: string,
    type: string,
    parameters: Record<string, unknown>,
    extra: Partial<Pick<WorkflowNode, 'typeVersion' | 'credentials'>> = {}
  ): WorkflowNode => {
    const created: WorkflowNode = {
      id: idFactory(),
      name: nodeName,
      type,
      typeVersion: extra.typeVersion ?? 1,
      position: [x, 300],
      parameters,
    };
    if (extra.credentials) {
      created.credentials = extra.credentials;
    }
    x += 200;
    return created;
  };

  const nodes: WorkflowNode[] = [
    node('Webhook - Script Input', NODE_TYPES.webhook, {
      path: 'docuforge-webhook',
      responseMode: 'lastNode',
      options: {},
    }),
    node('Analyze Script', NODE_TYPES.code, { jsCode: ANALYZE_SCRIPT_CODE }),
    node('Split Into Scenes', NODE_TYPES.code, { jsCode: SPLIT_SCENES_CODE }),
    node('Search Pexels', NODE_TYPES.httpRequest, {
      url: 'https://api.pexels.com/videos/search',
      authentication: 'genericCredentialType',
      genericAuthType: 'httpHeaderAuth',
      sendQuery: true,
      queryParameters: {
        parameters: [{ name: 'query', value: '={{ $json.keywords }}' }],
      },
    }, {
      typeVersion: HTTP_REQUEST_TYPE_VERSION,
      credentials: { httpHeaderAuth: { id: 'pexels-key', name: 'Pexels API' } },
    }),
    node('Process Pexels', NODE_TYPES.code, { jsCode: PROCESS_PEXELS_CODE }),
    node('Rank Clips (Bridge)', NODE_TYPES.httpRequest,
      createBridgeRequestParameters(bridgeHost, 'rank', '={{ $input.all() }}'),
      { typeVersion: HTTP_REQUEST_TYPE_VERSION }),
    node('Generate Voiceover', NODE_TYPES.httpRequest,
      createBridgeRequestParameters(bridgeHost, 'voiceover', '={{ $json }}'),
      { typeVersion: HTTP_REQUEST_TYPE_VERSION }),
    node('Assemble Video', NODE_TYPES.httpRequest,
      createBridgeRequestParameters(bridgeHost, 'assemble', '={{ $json }}'),
      { typeVersion: HTTP_REQUEST_TYPE_VERSION }),
    node('Respond to Webhook', NODE_TYPES.respondToWebhook, {
      respondWith: 'json',
      responseBody: "={{ JSON.stringify({ status: 'done', video: $json.outputPath }) }}",
    }),
  ];

  return {
    name,
    nodes,
    connections: connectLinear(nodes.map(n => n.name)),
    settings: {},
    staticData: null,
  };
}
