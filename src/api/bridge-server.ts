import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { Server } from 'http';
import { z } from 'zod';
import {
  AssembleRequestSchema,
  RankRequestSchema,
  VoiceoverRequestSchema,
  type BridgeErrorBody,
} from '../types/bridge.js';
import { ClipRanker, RankingError } from '../services/clip-ranker.js';
import { VoiceoverError, VoiceoverGenerator } from '../services/voiceover-generator.js';
import { AssemblyError, VideoAssembler } from '../services/video-assembler.js';
import { ProjectFileManager } from '../utils/file-manager.js';
import { NodeCommandRunner, type CommandRunner } from '../utils/process-runner.js';
import { formatZodIssues, sanitizeForLog } from '../utils/validation.js';
import { resolveRankerCommand, type AppConfig } from '../utils/config.js';

export const HEALTH_MESSAGE = 'DocuForge AI Bridge is running';

/**
 * Services behind the bridge endpoints
 */
export interface BridgeServices {
  ranker: Pick<ClipRanker, 'rank'>;
  voiceover: Pick<VoiceoverGenerator, 'generate'>;
  assembler: Pick<VideoAssembler, 'assemble'>;
}

/** Error codes caused by the request rather than the machine */
const CLIENT_ERROR_CODES = new Set(['NO_SCENES', 'NO_CLIPS', 'INVALID_VOICEOVER_PATH']);

/**
 * Wire production services from configuration
 */
export function createBridgeServices(
  config: AppConfig,
  options: { runner?: CommandRunner; env?: NodeJS.ProcessEnv } = {}
): BridgeServices {
  const runner = options.runner ?? new NodeCommandRunner();
  const files = new ProjectFileManager(config.workDir);

  return {
    ranker: new ClipRanker({
      runner,
      command: resolveRankerCommand(config),
      env: options.env,
      timeoutMs: config.rankerTimeoutMs,
    }),
    voiceover: new VoiceoverGenerator({
      runner,
      files,
      ttsExecutable: config.ttsExecutable,
      ttsModel: config.ttsModel,
      env: options.env,
    }),
    assembler: new VideoAssembler({
      files,
      lutPath: config.lutPath,
      timeoutSeconds: config.assemblyTimeoutSeconds,
    }),
  };
}

function hasStatus(error: unknown): error is { status: number; message: string } {
  return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number';
}

/**
 * Map any thrown value to an HTTP status and JSON body
 */
export function toErrorResponse(error: unknown): { status: number; body: BridgeErrorBody } {
  if (error instanceof z.ZodError) {
    return { status: 400, body: { error: 'Invalid request body', details: formatZodIssues(error) } };
  }

  if (error instanceof RankingError) {
    if (error.code === 'INVALID_OUTPUT') {
      return { status: 500, body: { error: error.message, raw: error.details?.raw ?? '' } };
    }
    return { status: 500, body: { error: error.message, stderr: error.details?.stderr ?? '' } };
  }

  if (error instanceof VoiceoverError || error instanceof AssemblyError) {
    return {
      status: CLIENT_ERROR_CODES.has(error.code) ? 400 : 500,
      body: { error: error.message },
    };
  }

  // body-parser errors (malformed JSON, payload too large) carry their own status
  if (hasStatus(error) && error.status >= 400 && error.status < 500) {
    return { status: error.status, body: { error: error.message } };
  }

  return {
    status: 500,
    body: { error: error instanceof Error ? error.message : String(error) },
  };
}

type AsyncHandler = (req: express.Request, res: express.Response) => Promise<void>;

function asyncHandler(handler: AsyncHandler): express.RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

/**
 * Express application exposing /health, /rank, /voiceover and /assemble
 */
export function createBridgeApp(services: BridgeServices): express.Application {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '10mb' }));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      console.log(`${req.method} ${sanitizeForLog(req.originalUrl)} - ${res.statusCode} (${duration}ms)`);
    });

    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', message: HEALTH_MESSAGE });
  });

  app.post('/rank', asyncHandler(async (req, res) => {
    const input = RankRequestSchema.parse(req.body);
    res.json(await services.ranker.rank(input));
  }));

  app.post('/voiceover', asyncHandler(async (req, res) => {
    const input = VoiceoverRequestSchema.parse(req.body);
    res.json(await services.voiceover.generate(input));
  }));

  app.post('/assemble', asyncHandler(async (req, res) => {
    const input = AssembleRequestSchema.parse(req.body);
    res.json(await services.assembler.assemble(input));
  }));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({ error: `Route ${req.method} ${req.originalUrl} not found` });
  });

  // Error handler
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const { status, body } = toErrorResponse(err);
    if (status >= 500) {
      console.error(`Bridge error on ${req.method} ${req.originalUrl}:`, err);
    }
    res.status(status).json(body);
  });

  return app;
}

/**
 * Listen on host:port; rejects when the port is taken
 */
export async function startBridgeServer(
  app: express.Application,
  port: number,
  host: string
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

export async function closeBridgeServer(server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}

/**
 * Serve the bridge in the foreground until SIGINT/SIGTERM
 */
export async function runBridgeUntilSignal(
  config: AppConfig,
  env?: NodeJS.ProcessEnv,
  signals: NodeJS.EventEmitter = process
): Promise<void> {
  const app = createBridgeApp(createBridgeServices(config, { env }));

  console.log(`🚀 DocuForge AI Bridge starting on port ${config.bridgePort}...`);
  const server = await startBridgeServer(app, config.bridgePort, config.bridgeHost);

  await new Promise<void>((resolve, reject) => {
    const onInterrupt = () => shutdown('SIGINT');
    const onTerminate = () => shutdown('SIGTERM');
    const shutdown = (signal: NodeJS.Signals) => {
      console.log(`\nReceived ${signal}, stopping AI bridge...`);
      signals.off('SIGINT', onInterrupt);
      signals.off('SIGTERM', onTerminate);
      closeBridgeServer(server).then(resolve, reject);
    };
    signals.on('SIGINT', onInterrupt);
    signals.on('SIGTERM', onTerminate);

    const address = server.address();
    const port = address !== null && typeof address === 'object' ? address.port : config.bridgePort;
    console.log(`AI bridge listening on http://${config.bridgeHost}:${port}`);
  });
}
