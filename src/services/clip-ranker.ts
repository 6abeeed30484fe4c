import { isSpawnFailure, splitCommand, type CommandRunner, type CommandResult } from '../utils/process-runner.js';
import type { RankItem, RankRequest, RankedItem } from '../types/bridge.js';

export interface ClipRankerOptions {
  runner: CommandRunner;
  /** "python3 ranker.py" or [executable, ...args]; the JSON payload is appended as the last argument */
  command: string | [string, ...string[]];
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

/**
 * Ranking error class
 */
export class RankingError extends Error {
  constructor(message: string, public code: 'SCRIPT_FAILED' | 'INVALID_OUTPUT', public details?: { stderr?: string; raw?: string }) {
    super(message);
    this.name = 'RankingError';
  }
}

/**
 * Clamp to [0, 100] and round to two decimals; anything non-numeric scores 0
 */
export function clampScore(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return 0;
  }
  const clamped = Math.min(100, Math.max(0, value));
  return Math.round(clamped * 100) / 100;
}

/**
 * Positional scores used when no model is available: 100, 95, 90, ...
 */
export function fallbackScores(items: RankItem[]): RankedItem[] {
  return items.map((item, index) => ({
    ...item,
    relevanceScore: Math.max(0, 100 - index * 5),
  }));
}

export function normalizeRankInput(input: RankRequest): RankItem[] {
  return Array.isArray(input) ? input : [input];
}

function isRankable(item: RankItem): boolean {
  return Boolean(item.sceneText) && Boolean(item.thumbnailUrl);
}

/**
 * Scores stock clip thumbnails against scene text through the external
 * CLIP ranker command. The model itself lives outside this process.
 */
export class ClipRanker {
  private runner: CommandRunner;
  private command: [string, ...string[]];
  private env?: NodeJS.ProcessEnv;
  private timeoutMs: number;

  constructor(options: ClipRankerOptions) {
    this.runner = options.runner;
    this.command = typeof options.command === 'string' ? splitCommand(options.command) : options.command;
    this.env = options.env;
    this.timeoutMs = options.timeoutMs ?? 5 * 60 * 1000;
  }

  async rank(input: RankRequest): Promise<RankedItem[]> {
    const items = normalizeRankInput(input);
    const rankableIndexes = items
      .map((item, index) => (isRankable(item) ? index : -1))
      .filter(index => index >= 0);

    if (rankableIndexes.length === 0) {
      return items.map(item => ({ ...item, relevanceScore: 0 }));
    }

    const payload = rankableIndexes.map(index => items[index]);
    const result = await this.runRanker(payload);

    if (result === null) {
      console.warn(`Ranker command "${this.command[0]}" is not available, using positional scores`);
      return fallbackScores(items);
    }

    if (result.exitCode !== 0) {
      throw new RankingError('Script failed', 'SCRIPT_FAILED', { stderr: result.stderr });
    }

    const scores = this.parseScores(result.stdout, payload.length);
    const scoreByIndex = new Map<number, number>();
    rankableIndexes.forEach((itemIndex, position) => {
      scoreByIndex.set(itemIndex, scores[position] ?? 0);
    });

    return items.map((item, index) => ({
      ...item,
      relevanceScore: scoreByIndex.get(index) ?? 0,
    }));
  }

  /**
   * Null when the ranker executable cannot be started
   */
  private async runRanker(payload: RankItem[]): Promise<CommandResult | null> {
    const [executable, ...baseArgs] = this.command;

    try {
      return await this.runner.run(executable, [...baseArgs, JSON.stringify(payload)], {
        env: this.env,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      if (isSpawnFailure(error)) {
        return null;
      }
      throw new RankingError('Script failed', 'SCRIPT_FAILED', {
        stderr: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private parseScores(stdout: string, expectedLength: number): number[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout.trim());
    } catch {
      console.error('Failed to parse ranker output:', stdout);
      throw new RankingError('Invalid JSON output from script', 'INVALID_OUTPUT', { raw: stdout });
    }

    if (!Array.isArray(parsed) || parsed.length !== expectedLength) {
      throw new RankingError('Invalid JSON output from script', 'INVALID_OUTPUT', { raw: stdout });
    }

    return parsed.map((entry: unknown) => {
      if (typeof entry === 'object' && entry !== null && 'relevanceScore' in entry) {
        return clampScore(entry.relevanceScore);
      }
      return 0;
    });
  }
}
