import { z } from 'zod';
import { ProjectIdSchema, SceneIdSchema } from '../utils/validation.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * n8n's `$input.all()` serializes items as { json, pairedItem }; rank the json payload
 */
export function unwrapItemEnvelope(value: unknown): unknown {
  if (isRecord(value) && !('sceneText' in value) && isRecord(value.json)) {
    return value.json;
  }
  return value;
}

/**
 * A stock clip candidate for one scene. Unknown fields are kept and echoed back.
 */
export const RankItemSchema = z.preprocess(
  unwrapItemEnvelope,
  z.object({
    videoId: z.union([z.string(), z.number()]).optional(),
    sceneText: z.string().optional(),
    thumbnailUrl: z.string().optional(),
  }).passthrough()
);

export type RankItem = z.infer<typeof RankItemSchema>;

export type RankedItem = RankItem & { relevanceScore: number };

/**
 * /rank accepts a single item or a list
 */
export const RankRequestSchema = z.union([z.array(RankItemSchema), RankItemSchema]);

export type RankRequest = z.infer<typeof RankRequestSchema>;

/**
 * /voiceover request
 */
export const VoiceoverRequestSchema = z.object({
  projectId: ProjectIdSchema.default('unknown'),
  scenes: z.array(z.object({
    sceneText: z.string().optional(),
  }).passthrough()),
}).passthrough();

export type VoiceoverRequest = z.infer<typeof VoiceoverRequestSchema>;

export type VoiceoverStatus = 'generated' | 'mock_silence' | 'failed_all';

export interface VoiceoverResult {
  voiceoverPath: string | null;
  duration: number;
  status: VoiceoverStatus;
  projectId: string;
}

/**
 * /assemble request
 */
export const AssembleRequestSchema = z.object({
  projectId: ProjectIdSchema.default('unknown'),
  scenes: z.array(z.object({
    sceneId: SceneIdSchema,
  }).passthrough()),
  voiceover: z.object({
    voiceoverPath: z.string().nullable().optional(),
  }).passthrough().optional(),
}).passthrough();

export type AssembleRequest = z.infer<typeof AssembleRequestSchema>;

export interface AssemblyResult {
  projectId: string;
  outputPath: string;
  duration: number;
  resolution: string;
  fileSize: number;
  clipCount: number;
  hasVoiceover: boolean;
  status: 'completed';
}

/**
 * Error body returned by every bridge endpoint
 */
export interface BridgeErrorBody {
  error: string;
  details?: string[];
  stderr?: string;
  raw?: string;
}
