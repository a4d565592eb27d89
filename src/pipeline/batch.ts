/**
 * Batch runner: produce one video per input, strictly in order. The first
 * failure stops the batch; videos already written are left in place.
 */
import * as fs from 'fs';
import * as path from 'path';
import { VIDEO_EXTENSION } from '../config.js';
import { logger } from '../utils/logger.js';
import type { VisualizationRequest } from '../visualization/types.js';
import { produceVideo, type ProducedVideo } from './producer.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface SharedOptions {
  imagePath?: string;
  visualization: VisualizationRequest;
  durationSeconds?: number;
  verbose: boolean;
  coverFromAudio: boolean;
  /** Only honoured for single-input runs. */
  coverOut?: string;
}

export interface AppConfig {
  inputs: string[];
  outDir?: string;
  shared: SharedOptions;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

/**
 * `music/song.mp3` → `music/song.mp4`, or `<outDir>/song.mp4` when an output
 * directory is given (created if missing).
 */
export function deriveOutputPath(audioPath: string, outDir?: string): string {
  const { dir, name } = path.parse(audioPath);
  const fileName = `${name}.${VIDEO_EXTENSION}`;
  if (!outDir) return path.join(dir, fileName);

  fs.mkdirSync(outDir, { recursive: true });
  return path.join(outDir, fileName);
}

// ── Public API ─────────────────────────────────────────────────────────────────

export async function runBatch(app: AppConfig): Promise<ProducedVideo[]> {
  const produced: ProducedVideo[] = [];

  for (const [i, audioPath] of app.inputs.entries()) {
    const outputPath = deriveOutputPath(audioPath, app.outDir);
    logger.info(`Processing: ${audioPath}`, { item: i + 1, of: app.inputs.length, outputPath });

    produced.push(await produceVideo({
      audioPath,
      outputPath,
      imagePath: app.shared.imagePath,
      coverFromAudio: app.shared.coverFromAudio,
      coverOut: app.inputs.length > 1 ? undefined : app.shared.coverOut,
      visualization: app.shared.visualization,
      targetDurationSeconds: app.shared.durationSeconds,
      verbose: app.shared.verbose,
    }));
  }

  logger.info('Batch complete', { count: produced.length });
  return produced;
}
