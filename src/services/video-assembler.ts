import ffmpeg from 'fluent-ffmpeg';
import { existsSync } from 'fs';
import type { ProjectFileManager } from '../utils/file-manager.js';
import type { AssembleRequest, AssemblyResult } from '../types/bridge.js';

const OUTPUT_RESOLUTION = '1920x1080';
const SCALE_AND_PAD = 'scale=1920:1080:force_original_aspect_ratio=decrease,pad=1920:1080:(ow-iw)/2:(oh-ih)/2';

const ENCODING_OPTIONS = [
  '-c:v', 'libx264', '-preset', 'medium', '-crf', '23',
  '-c:a', 'aac', '-b:a', '192k', '-ar', '44100',
  '-movflags', '+faststart',
];

/**
 * Inputs, filter graph and output options of one ffmpeg render
 */
export interface AssemblyPlan {
  inputs: string[];
  complexFilter: string[];
  outputOptions: string[];
  outputPath: string;
}

/**
 * Assembly error class
 */
export class AssemblyError extends Error {
  constructor(message: string, public code: string, public details?: unknown) {
    super(message);
    this.name = 'AssemblyError';
  }
}

/**
 * Renders plans and probes results; fluent-ffmpeg in production
 */
export interface FfmpegExecutor {
  render(plan: AssemblyPlan, timeoutSeconds: number): Promise<void>;
  probeDuration(filePath: string): Promise<number>;
}

export class FluentFfmpegExecutor implements FfmpegExecutor {
  async render(plan: AssemblyPlan, timeoutSeconds: number): Promise<void> {
    const command = ffmpeg({ timeout: timeoutSeconds });
    for (const input of plan.inputs) {
      command.input(input);
    }

    await new Promise<void>((resolve, reject) => {
      command
        .complexFilter(plan.complexFilter)
        .outputOptions(plan.outputOptions)
        .output(plan.outputPath)
        .on('start', (commandLine: string) => console.log(`Command: ${commandLine}`))
        .on('end', () => resolve())
        .on('error', reject)
        .run();
    });
  }

  async probeDuration(filePath: string): Promise<number> {
    return new Promise((resolve) => {
      ffmpeg.ffprobe(filePath, (err, metadata) => {
        if (err) {
          console.warn(`ffprobe failed for ${filePath}: ${err.message}`);
          resolve(0);
          return;
        }
        resolve(Number(metadata.format.duration) || 0);
      });
    });
  }
}

/**
 * One clip: scale/pad (+ optional LUT grade), clip audio ducked to 0.3 under the voiceover
 */
export function buildSingleClipPlan(
  clipPath: string,
  voiceoverPath: string | null,
  outputPath: string,
  lutPath: string | null = null
): AssemblyPlan {
  const inputs = voiceoverPath ? [clipPath, voiceoverPath] : [clipPath];
  const videoFilter = lutPath ? `${SCALE_AND_PAD},lut3d=${lutPath}` : SCALE_AND_PAD;
  const complexFilter = [`[0:v]${videoFilter}[vout]`];

  let audioMap: string;
  if (voiceoverPath) {
    complexFilter.push(
      '[0:a]volume=0.3[a1]',
      '[1:a]volume=1.0[a2]',
      '[a1][a2]amix=inputs=2:duration=longest[aout]'
    );
    audioMap = '[aout]';
  } else {
    audioMap = '0:a?';
  }

  return {
    inputs,
    complexFilter,
    outputOptions: ['-map', '[vout]', '-map', audioMap, ...ENCODING_OPTIONS],
    outputPath,
  };
}

/**
 * Several clips: scale/pad each, concatenate video and audio,
 * then duck the clip audio to 0.2 under the voiceover
 */
export function buildMultiClipPlan(
  clipPaths: string[],
  voiceoverPath: string | null,
  outputPath: string
): AssemblyPlan {
  const count = clipPaths.length;
  const inputs = voiceoverPath ? [...clipPaths, voiceoverPath] : [...clipPaths];
  const complexFilter = clipPaths.map((_, index) => `[${index}:v]${SCALE_AND_PAD}[v${index}]`);

  const videoStreams = clipPaths.map((_, index) => `[v${index}]`).join('');
  complexFilter.push(`${videoStreams}concat=n=${count}:v=1:a=0[vout]`);

  const audioStreams = clipPaths.map((_, index) => `[${index}:a]`).join('');
  if (voiceoverPath) {
    complexFilter.push(
      `${audioStreams}concat=n=${count}:v=0:a=1[audioconcat]`,
      '[audioconcat]volume=0.2[a1]',
      `[${count}:a]volume=1.0[a2]`,
      '[a1][a2]amix=inputs=2:duration=longest[aout]'
    );
  } else {
    complexFilter.push(`${audioStreams}concat=n=${count}:v=0:a=1[aout]`);
  }

  return {
    inputs,
    complexFilter,
    outputOptions: ['-map', '[vout]', '-map', '[aout]', ...ENCODING_OPTIONS],
    outputPath,
  };
}

export interface VideoAssemblerOptions {
  files: ProjectFileManager;
  lutPath?: string;
  timeoutSeconds?: number;
  executor?: FfmpegExecutor;
}

/**
 * Combines the downloaded scene clips and the voiceover into the final documentary
 */
export class VideoAssembler {
  private files: ProjectFileManager;
  private lutPath?: string;
  private timeoutSeconds: number;
  private executor: FfmpegExecutor;

  constructor(options: VideoAssemblerOptions) {
    this.files = options.files;
    this.lutPath = options.lutPath;
    this.timeoutSeconds = options.timeoutSeconds ?? 600;
    this.executor = options.executor ?? new FluentFfmpegExecutor();
  }

  async assemble(request: AssembleRequest): Promise<AssemblyResult> {
    const { projectId, scenes } = request;

    if (scenes.length === 0) {
      throw new AssemblyError('No scenes to assemble', 'NO_SCENES');
    }

    const voiceoverPath = this.resolveVoiceover(request.voiceover?.voiceoverPath);

    await this.files.createProjectDirectory(projectId);
    const outputPath = this.files.getOutputPath(projectId);

    const { found, missing } = this.files.findSceneClips(projectId, scenes.map(scene => scene.sceneId));
    for (const sceneId of missing) {
      console.warn(`Warning: Missing clip for scene ${sceneId}`);
    }

    if (found.length === 0) {
      throw new AssemblyError('No video clips found to assemble', 'NO_CLIPS', { missing });
    }

    const lutPath = this.lutPath && existsSync(this.lutPath) ? this.lutPath : null;
    const plan = found.length === 1
      ? buildSingleClipPlan(found[0], voiceoverPath, outputPath, lutPath)
      : buildMultiClipPlan(found, voiceoverPath, outputPath);

    console.log(`Assembling video with ${found.length} clips...`);

    try {
      await this.executor.render(plan, this.timeoutSeconds);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (/timeout/i.test(message)) {
        throw new AssemblyError(
          `Video assembly timed out (>${Math.round(this.timeoutSeconds / 60)} minutes)`,
          'TIMEOUT',
          error
        );
      }
      throw new AssemblyError(`Assembly failed: ${message}`, 'FFMPEG_FAILED', error);
    }

    const duration = await this.executor.probeDuration(outputPath);
    const fileSize = await this.files.getFileSize(outputPath);

    return {
      projectId,
      outputPath,
      duration,
      resolution: OUTPUT_RESOLUTION,
      fileSize,
      clipCount: found.length,
      hasVoiceover: voiceoverPath !== null,
      status: 'completed',
    };
  }

  /**
   * The voiceover must sit under the work dir; a path that is not on disk is dropped
   */
  private resolveVoiceover(voiceoverPath: string | null | undefined): string | null {
    if (!voiceoverPath) {
      return null;
    }

    if (!this.files.isInsideWorkDir(voiceoverPath)) {
      throw new AssemblyError('Voiceover path must be inside the work directory', 'INVALID_VOICEOVER_PATH', {
        voiceoverPath,
      });
    }

    if (!existsSync(voiceoverPath)) {
      console.warn(`Voiceover not found at ${voiceoverPath}, assembling without it`);
      return null;
    }

    return voiceoverPath;
  }
}
