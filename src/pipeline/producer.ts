/**
 * Video production: one audio file in, one MP4 (plus thumbnail) out.
 *
 * Steps:
 * 1. Check the audio exists and resolve the background image.
 * 2. Probe the audio duration unless a target duration was given.
 * 3. Composite background + visualization into a scratch MP4.
 * 4. Remux: copy that video stream, re-encode the original audio, stop at
 *    the shorter input.
 * 5. Emit the thumbnail, drop scratch files, validate the output.
 */
import * as fs from 'fs';
import { COMPOSITE_ENCODING, REMUX_ENCODING } from '../config.js';
import { logger } from '../utils/logger.js';
import { EncodeError, errorMessage } from '../utils/errors.js';
import { removeIfExists, scratchPath } from '../utils/scratch.js';
import { resolveCover, type ResolvedCover } from '../media/cover.js';
import { probeDuration, runFfmpeg } from '../media/ffmpeg.js';
import { writeThumbnail } from '../media/thumbnail.js';
import { synthesize } from '../visualization/layout.js';
import { formatPosition, type VisualizationRequest } from '../visualization/types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface VideoJob {
  audioPath: string;
  outputPath: string;
  /** Explicit background; ignored when missing on disk or coverFromAudio is set. */
  imagePath?: string;
  coverFromAudio: boolean;
  /** Keep the extracted cover here instead of deleting it. */
  coverOut?: string;
  visualization: VisualizationRequest;
  targetDurationSeconds?: number;
  verbose: boolean;
}

export interface ProducedVideo {
  outputPath: string;
  thumbnailPath: string;
  sizeBytes: number;
  cover: ResolvedCover;
}

// ── Stage arguments ───────────────────────────────────────────────────────────

export function compositeArgs(
  imagePath: string,
  audioPath: string,
  filterComplex: string,
  durationSeconds: number,
  outputPath: string,
): string[] {
  const enc = COMPOSITE_ENCODING;
  return [
    '-i', imagePath,
    '-i', audioPath,
    '-filter_complex', filterComplex,
    '-c:v', enc.videoCodec,
    '-c:a', enc.audioCodec,
    '-preset', enc.preset,
    '-tune', enc.tune,
    ...(durationSeconds > 0 ? ['-t', String(durationSeconds)] : []),
    '-pix_fmt', enc.pixelFormat,
    outputPath,
  ];
}

export function remuxArgs(videoPath: string, audioPath: string, outputPath: string): string[] {
  return [
    '-i', videoPath,
    '-i', audioPath,
    '-map', '0:v:0',
    '-map', '1:a:0',
    '-c:v', 'copy',
    '-c:a', REMUX_ENCODING.audioCodec,
    '-shortest',
    outputPath,
  ];
}

// ── Helpers ───────────────────────────────────────────────────────────────────

async function discard(filePath: string, what: string): Promise<void> {
  try {
    if (await removeIfExists(filePath)) logger.debug(`Producer: removed ${what}`, { filePath });
  } catch (err) {
    logger.warn(`Producer: could not remove ${what}`, { filePath, error: errorMessage(err) });
  }
}

async function validateOutput(outputPath: string): Promise<number> {
  let size: number;
  try {
    size = (await fs.promises.stat(outputPath)).size;
  } catch (err) {
    throw new EncodeError('OutputValidationFailed', `Failed to create output file: ${outputPath}`, err);
  }
  if (size === 0) {
    await discard(outputPath, 'empty output');
    throw new EncodeError('OutputValidationFailed', `Output file was created but has zero size: ${outputPath}`);
  }
  return size;
}

// ── Public API ─────────────────────────────────────────────────────────────────

export async function produceVideo(job: VideoJob): Promise<ProducedVideo> {
  if (!fs.existsSync(job.audioPath)) {
    throw new EncodeError('InputNotFound', `Audio file not found: ${job.audioPath}`);
  }

  const cover = await resolveCover({
    audioPath: job.audioPath,
    explicitImage: job.imagePath,
    forceExtract: job.coverFromAudio,
    saveExtractedTo: job.coverOut,
    verbose: job.verbose,
  });

  const tempVideo = scratchPath('temp_video', 'mp4');
  try {
    const duration = job.targetDurationSeconds ?? await probeDuration(job.audioPath);
    if (duration <= 0) {
      logger.warn('Producer: audio duration unknown, encoding until the audio ends', { audioPath: job.audioPath });
    }

    const graph = synthesize(job.visualization);
    logger.info('Producer: step 1, creating visualization video', {
      audioPath: job.audioPath,
      image: cover.path,
      type: job.visualization.type,
      position: formatPosition(job.visualization.position),
      duration,
      tempVideo,
    });
    logger.debug('Producer: filter graph', { filterComplex: graph.filterComplex });

    await runFfmpeg(
      compositeArgs(cover.path, job.audioPath, graph.filterComplex, duration, tempVideo),
      { label: 'Step 1: FFmpeg visualization creation', verbose: job.verbose },
    );

    if (!fs.existsSync(tempVideo)) {
      throw new EncodeError('SubprocessExecutionFailed', `Failed to create temporary file at ${tempVideo}`);
    }

    logger.info('Producer: step 2, combining with audio', { outputPath: job.outputPath });
    let thumbnailPath: string;
    try {
      await runFfmpeg(
        remuxArgs(tempVideo, job.audioPath, job.outputPath),
        { label: 'Step 2: FFmpeg audio combination', verbose: job.verbose },
      );
      thumbnailPath = await writeThumbnail(cover.path, job.audioPath, job.outputPath, job.verbose);
    } catch (err) {
      // ffmpeg may have written part of the file before failing
      await discard(job.outputPath, 'partial output');
      throw err;
    }
    const sizeBytes = await validateOutput(job.outputPath);

    logger.info('Producer: video created', { outputPath: job.outputPath, sizeBytes });
    return { outputPath: job.outputPath, thumbnailPath, sizeBytes, cover };
  } finally {
    await discard(tempVideo, 'temporary video');
    if (cover.ownership === 'temporary') await discard(cover.path, 'extracted cover');
  }
}
