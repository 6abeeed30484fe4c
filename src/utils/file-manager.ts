import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import path from 'path';
import { validateFilePath } from './validation.js';

export interface SceneClips {
  found: string[];
  missing: Array<string | number>;
}

/**
 * File manager for per-project working directories
 * (<workDir>/<projectId>/clip_<sceneId>.mp4, voiceover, final render)
 */
export class ProjectFileManager {
  private workDir: string;

  constructor(workDir: string) {
    this.workDir = path.resolve(workDir);
  }

  getProjectDirectory(projectId: string): string {
    return path.join(this.workDir, projectId);
  }

  /**
   * Create project directory with proper permissions
   */
  async createProjectDirectory(projectId: string): Promise<string> {
    const projectDir = this.getProjectDirectory(projectId);

    try {
      await fs.mkdir(projectDir, { recursive: true, mode: 0o755 });
      return projectDir;
    } catch (error) {
      throw new Error(`Failed to create project directory: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  getClipPath(projectId: string, sceneId: string | number): string {
    return path.join(this.getProjectDirectory(projectId), `clip_${sceneId}.mp4`);
  }

  getVoiceoverPath(projectId: string): string {
    return path.join(this.getProjectDirectory(projectId), `${projectId}_voiceover.wav`);
  }

  getOutputPath(projectId: string): string {
    return path.join(this.getProjectDirectory(projectId), `${projectId}_final.mp4`);
  }

  /**
   * Resolve scene clips in scene order, separating the ones not on disk
   */
  findSceneClips(projectId: string, sceneIds: Array<string | number>): SceneClips {
    const found: string[] = [];
    const missing: Array<string | number> = [];

    for (const sceneId of sceneIds) {
      const clipPath = this.getClipPath(projectId, sceneId);
      if (existsSync(clipPath)) {
        found.push(clipPath);
      } else {
        missing.push(sceneId);
      }
    }

    return { found, missing };
  }

  isInsideWorkDir(filePath: string): boolean {
    return validateFilePath(filePath, this.workDir);
  }

  /**
   * Size in bytes, 0 when the file does not exist
   */
  async getFileSize(filePath: string): Promise<number> {
    if (!existsSync(filePath)) {
      return 0;
    }
    const stats = await fs.stat(filePath);
    return stats.size;
  }
}
