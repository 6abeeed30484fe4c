import { describe, it, expect } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  checkBridgeTools,
  checkRanker,
  isClipInstalled,
  isContainerEngineRunning,
  isExecutableAvailable,
  validateLaunchEnvironment,
} from '../../../src/utils/environment-validator.js';
import { DEFAULT_RANKER_SCRIPT, loadConfig } from '../../../src/utils/config.js';
import { CommandError } from '../../../src/utils/process-runner.js';
import { FakeRunner, failed, notFound } from '../../helpers/fake-runner.js';

describe('Environment validator', () => {
  const config = loadConfig({});

  describe('probes', () => {
    it('should report a running container engine when docker info succeeds', async () => {
      const runner = new FakeRunner();

      await expect(isContainerEngineRunning(runner)).resolves.toBe(true);
      expect(runner.commandLines()).toEqual(['docker info']);
    });

    it('should treat a non-zero exit as unavailable', async () => {
      const runner = new FakeRunner(() => failed(1));

      await expect(isContainerEngineRunning(runner)).resolves.toBe(false);
    });

    it('should treat a missing executable as unavailable', async () => {
      const runner = new FakeRunner(command => notFound(command));

      await expect(isClipInstalled(runner, 'python3')).resolves.toBe(false);
      expect(runner.commandLines()).toEqual(['python3 -c import clip']);
    });

    it('should treat a timed out probe as unavailable', async () => {
      const runner = new FakeRunner(() => new CommandError('docker timed out after 30000ms', 'TIMEOUT'));

      await expect(isContainerEngineRunning(runner)).resolves.toBe(false);
    });

    it('should split configured command lines', async () => {
      const runner = new FakeRunner();

      await isExecutableAvailable(runner, 'docker compose', ['version']);

      expect(runner.calls[0].command).toBe('docker');
      expect(runner.calls[0].args).toEqual(['compose', 'version']);
    });
  });

  describe('checkRanker', () => {
    it('should accept the bundled ranker script', async () => {
      const runner = new FakeRunner();

      const check = await checkRanker(runner, ['python3', DEFAULT_RANKER_SCRIPT]);

      expect(check).toEqual({
        name: 'Clip ranker',
        required: false,
        ok: true,
        detail: `python3 ${DEFAULT_RANKER_SCRIPT}`,
      });
      expect(runner.commandLines()).toEqual(['python3 --version']);
    });

    it('should report a missing script without probing the interpreter', async () => {
      const runner = new FakeRunner();
      const missing = path.join(os.tmpdir(), 'docuforge-missing', 'ranker.py');

      const check = await checkRanker(runner, ['python3', missing]);

      expect(check.ok).toBe(false);
      expect(check.detail).toBe(`Not found at ${missing}`);
      expect(runner.calls).toHaveLength(0);
    });

    it('should report a missing interpreter', async () => {
      const runner = new FakeRunner(command => notFound(command));
      const script = path.join(os.tmpdir(), `docuforge-ranker-${process.pid}.py`);
      await fs.writeFile(script, 'print("[]")');

      try {
        const check = await checkRanker(runner, ['python9', script]);

        expect(check.ok).toBe(false);
        expect(check.detail).toBe('python9 not found on PATH');
      } finally {
        await fs.rm(script, { force: true });
      }
    });
  });

  describe('checkBridgeTools', () => {
    it('should check CLIP, the ranker, ffmpeg, ffprobe and tts as optional', async () => {
      const runner = new FakeRunner(command => (command === 'tts' ? notFound('tts') : undefined));

      const checks = await checkBridgeTools(runner, config);

      expect(checks).toEqual([
        { name: 'CLIP', ok: true, required: false, detail: 'AI Ranking Engine Ready' },
        { name: 'Clip ranker', ok: true, required: false, detail: `python3 ${DEFAULT_RANKER_SCRIPT}` },
        { name: 'ffmpeg', ok: true, required: false, detail: 'ffmpeg' },
        { name: 'ffprobe', ok: true, required: false, detail: 'ffprobe' },
        { name: 'tts', ok: false, required: false, detail: 'tts not found on PATH' },
      ]);
    });
  });

  describe('validateLaunchEnvironment', () => {
    it('should require the container engine for the Docker edition', async () => {
      const runner = new FakeRunner((command, args) => (command === 'docker' && args[0] === 'info' ? failed(1) : undefined));

      const result = await validateLaunchEnvironment(runner, config, { docker: true });

      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual(['Container engine: Docker is not running']);
      expect(result.warnings).toEqual([]);
    });

    it('should require n8n only for the local edition', async () => {
      const runner = new FakeRunner(command => (command === config.n8nBin ? notFound(command) : undefined));

      const local = await validateLaunchEnvironment(runner, config, { docker: false });
      const docker = await validateLaunchEnvironment(runner, config, { docker: true });

      expect(local.errors).toEqual(['n8n executable: Not found at ./node_modules/.bin/n8n']);
      expect(docker.isValid).toBe(true);
      expect(docker.warnings).toEqual(['n8n executable: Not found at ./node_modules/.bin/n8n']);
    });

    it('should warn when CLIP is missing without failing', async () => {
      const runner = new FakeRunner((command, args) => (args.includes('import clip') ? failed(1) : undefined));

      const result = await validateLaunchEnvironment(runner, config, { docker: false });

      expect(result.isValid).toBe(true);
      expect(result.warnings).toEqual(['CLIP: Video ranking might be random']);
      expect(result.checks.map(check => check.name)).toEqual([
        'Container engine',
        'n8n executable',
        'CLIP',
        'Clip ranker',
        'ffmpeg',
        'ffprobe',
        'tts',
      ]);
    });
  });
});
