import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import {
  HEALTH_MESSAGE,
  closeBridgeServer,
  createBridgeApp,
  startBridgeServer,
  toErrorResponse,
} from '../../../src/api/bridge-server.js';
import { ClipRanker, RankingError } from '../../../src/services/clip-ranker.js';
import { VoiceoverError } from '../../../src/services/voiceover-generator.js';
import { AssemblyError } from '../../../src/services/video-assembler.js';
import { FakeRunner, failed, ok } from '../../helpers/fake-runner.js';

describe('AI bridge API', () => {
  let runnerAnswer: () => ReturnType<typeof ok> = () => ok('[]');
  const runner = new FakeRunner(() => runnerAnswer());
  const voiceover = { generate: vi.fn() };
  const assembler = { assemble: vi.fn() };
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = createBridgeApp({
      ranker: new ClipRanker({ runner, command: 'ranker' }),
      voiceover,
      assembler,
    });
    server = await startBridgeServer(app, 0, '127.0.0.1');
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Bridge did not bind a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await closeBridgeServer(server);
  });

  beforeEach(() => {
    vi.clearAllMocks();
    runner.calls = [];
  });

  const post = (route: string, body: unknown) =>
    fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    });

  describe('GET /health', () => {
    it('should report that the bridge is running', async () => {
      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toEqual({ status: 'ok', message: HEALTH_MESSAGE });
    });
  });

  describe('POST /rank', () => {
    it('should rank n8n items and echo them back with scores', async () => {
      runnerAnswer = () => ok('[{"relevanceScore": 88.123}]');

      const response = await post('/rank', [
        { json: { videoId: 7, sceneText: 'Desert at dawn', thumbnailUrl: 'https://example.com/7.jpg' }, pairedItem: { item: 0 } },
      ]);

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toEqual([
        { videoId: 7, sceneText: 'Desert at dawn', thumbnailUrl: 'https://example.com/7.jpg', relevanceScore: 88.12 },
      ]);
      expect(runner.calls[0].args).toEqual([
        JSON.stringify([{ videoId: 7, sceneText: 'Desert at dawn', thumbnailUrl: 'https://example.com/7.jpg' }]),
      ]);
    });

    it('should accept a single object', async () => {
      const response = await post('/rank', { videoId: 'x1' });

      await expect(response.json()).resolves.toEqual([{ videoId: 'x1', relevanceScore: 0 }]);
      expect(runner.calls).toHaveLength(0);
    });

    it('should return 500 with stderr when the ranker fails', async () => {
      runnerAnswer = () => failed(2, 'model load failed');
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});

      const response = await post('/rank', [{ sceneText: 'Forest', thumbnailUrl: 'https://example.com/f.jpg' }]);

      expect(response.status).toBe(500);
      await expect(response.json()).resolves.toEqual({ error: 'Script failed', stderr: 'model load failed' });
      consoleError.mockRestore();
    });
  });

  describe('POST /voiceover', () => {
    it('should default the project ID and return the generator result', async () => {
      const result = { voiceoverPath: '/tmp/docuforge/unknown/unknown_voiceover.wav', duration: 0, status: 'generated', projectId: 'unknown' };
      voiceover.generate.mockResolvedValue(result);

      const response = await post('/voiceover', { scenes: [{ sceneText: 'Hello' }] });

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toEqual(result);
      expect(voiceover.generate).toHaveBeenCalledWith({ projectId: 'unknown', scenes: [{ sceneText: 'Hello' }] });
    });

    it('should return 400 for an empty scene list', async () => {
      voiceover.generate.mockRejectedValue(new VoiceoverError('No scenes provided', 'NO_SCENES'));

      const response = await post('/voiceover', { projectId: 'p1', scenes: [] });

      expect(response.status).toBe(400);
      await expect(response.json()).resolves.toEqual({ error: 'No scenes provided' });
    });
  });

  describe('POST /assemble', () => {
    it('should reject unsafe project IDs before touching the disk', async () => {
      const response = await post('/assemble', { projectId: '../etc', scenes: [{ sceneId: 1 }] });

      expect(response.status).toBe(400);
      await expect(response.json()).resolves.toEqual({
        error: 'Invalid request body',
        details: ['projectId: Project ID contains invalid characters'],
      });
      expect(assembler.assemble).not.toHaveBeenCalled();
    });

    it('should return 500 when rendering fails', async () => {
      assembler.assemble.mockRejectedValue(new AssemblyError('Assembly failed: broken pipe', 'FFMPEG_FAILED'));
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});

      const response = await post('/assemble', { projectId: 'p1', scenes: [{ sceneId: 1 }] });

      expect(response.status).toBe(500);
      await expect(response.json()).resolves.toEqual({ error: 'Assembly failed: broken pipe' });
      consoleError.mockRestore();
    });
  });

  describe('errors', () => {
    it('should return 400 for malformed JSON', async () => {
      const response = await post('/rank', '{"sceneText": ');

      expect(response.status).toBe(400);
    });

    it('should return 404 for unknown routes', async () => {
      const response = await fetch(`${baseUrl}/generate`);

      expect(response.status).toBe(404);
      await expect(response.json()).resolves.toEqual({ error: 'Route GET /generate not found' });
    });
  });
});

describe('toErrorResponse', () => {
  it('should expose raw ranker output for invalid JSON', () => {
    const error = new RankingError('Invalid JSON output from script', 'INVALID_OUTPUT', { raw: 'oops' });

    expect(toErrorResponse(error)).toEqual({
      status: 500,
      body: { error: 'Invalid JSON output from script', raw: 'oops' },
    });
  });

  it('should treat missing clips as a client error', () => {
    expect(toErrorResponse(new AssemblyError('No video clips found to assemble', 'NO_CLIPS')).status).toBe(400);
  });

  it('should fall back to 500 for unknown errors', () => {
    expect(toErrorResponse('boom')).toEqual({ status: 500, body: { error: 'boom' } });
  });
});
