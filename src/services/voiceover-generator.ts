import ffmpeg from 'fluent-ffmpeg';
import type { CommandRunner } from '../utils/process-runner.js';
import type { ProjectFileManager } from '../utils/file-manager.js';
import type { VoiceoverRequest, VoiceoverResult } from '../types/bridge.js';

const MOCK_SILENCE_SECONDS = 10;

/**
 * Voiceover error class
 */
export class VoiceoverError extends Error {
  constructor(message: string, public code: string, public details?: unknown) {
    super(message);
    this.name = 'VoiceoverError';
  }
}

export type SilenceGenerator = (outputPath: string, durationSeconds: number) => Promise<void>;

export interface VoiceoverGeneratorOptions {
  runner: CommandRunner;
  files: ProjectFileManager;
  ttsExecutable: string;
  ttsModel: string;
  env?: NodeJS.ProcessEnv;
  silenceGenerator?: SilenceGenerator;
}

/**
 * Create a silent mono 44.1 kHz WAV track
 */
export const createSilentTrack: SilenceGenerator = (outputPath, durationSeconds) => {
  return new Promise<void>((resolve, reject) => {
    ffmpeg()
      .input('anullsrc=r=44100:cl=mono')
      .inputOptions(['-f', 'lavfi'])
      .duration(durationSeconds)
      .output(outputPath)
      .on('end', () => resolve())
      .on('error', reject)
      .run();
  });
};

/**
 * Narrates the scene script with Coqui TTS, falling back to a silent track
 * so the rest of the pipeline can still run.
 */
export class VoiceoverGenerator {
  private runner: CommandRunner;
  private files: ProjectFileManager;
  private ttsExecutable: string;
  private ttsModel: string;
  private env?: NodeJS.ProcessEnv;
  private silenceGenerator: SilenceGenerator;

  constructor(options: VoiceoverGeneratorOptions) {
    this.runner = options.runner;
    this.files = options.files;
    this.ttsExecutable = options.ttsExecutable;
    this.ttsModel = options.ttsModel;
    this.env = options.env;
    this.silenceGenerator = options.silenceGenerator ?? createSilentTrack;
  }

  async generate(request: VoiceoverRequest): Promise<VoiceoverResult> {
    const { projectId, scenes } = request;

    if (scenes.length === 0) {
      throw new VoiceoverError('No scenes provided', 'NO_SCENES');
    }

    await this.files.createProjectDirectory(projectId);
    const voiceoverPath = this.files.getVoiceoverPath(projectId);
    const fullText = scenes.map(scene => scene.sceneText ?? '').join(' ');

    console.log(`Generating voiceover for: ${fullText.substring(0, 50)}...`);

    if (await this.synthesize(fullText, voiceoverPath)) {
      return { voiceoverPath, duration: 0, status: 'generated', projectId };
    }

    console.warn('Coqui TTS not found or failed. Creating silence mockup.');

    try {
      await this.silenceGenerator(voiceoverPath, MOCK_SILENCE_SECONDS);
      return { voiceoverPath, duration: 0, status: 'mock_silence', projectId };
    } catch (error) {
      console.error('Silent track generation failed:', error instanceof Error ? error.message : String(error));
      return { voiceoverPath: null, duration: 0, status: 'failed_all', projectId };
    }
  }

  /**
   * True when tts wrote the file
   */
  private async synthesize(text: string, outputPath: string): Promise<boolean> {
    const args = [
      '--text', text,
      '--out_path', outputPath,
      '--model_name', this.ttsModel,
    ];

    try {
      const result = await this.runner.run(this.ttsExecutable, args, {
        env: this.env,
        timeoutMs: 10 * 60 * 1000,
      });
      if (result.exitCode !== 0) {
        console.warn(`tts exited with code ${result.exitCode}: ${result.stderr.substring(0, 300)}`);
        return false;
      }
      return true;
    } catch (error) {
      console.warn('tts could not run:', error instanceof Error ? error.message : String(error));
      return false;
    }
  }
}
