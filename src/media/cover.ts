/**
 * Cover art resolution: decide which image sits behind the visualization,
 * pulling it out of the audio file when no usable image was given.
 *
 * Extraction tries the cheap, lossless route first (the picture frames in
 * the file's tags, written out byte for byte) and only then asks ffmpeg to
 * decode a frame from an attached-picture or plain video stream.
 */
import * as fs from 'fs';
import * as path from 'path';
import { parseFile } from 'music-metadata';
import type { IPicture } from 'music-metadata';
import { logger } from '../utils/logger.js';
import { EncodeError, errorMessage } from '../utils/errors.js';
import { scratchPath } from '../utils/scratch.js';
import { isEngineAvailable, probeVideoStream, runFfmpeg } from './ffmpeg.js';

// ── Types ─────────────────────────────────────────────────────────────────────

/**
 * `temporary` covers were written to scratch space by this module and are the
 * caller's to delete; `user-specified` paths are never removed.
 */
export type CoverOwnership = 'temporary' | 'user-specified';

export type CoverSource = 'explicit' | 'metadata' | 'engine';

export interface ResolvedCover {
  path: string;
  ownership: CoverOwnership;
  source: CoverSource;
}

export interface CoverRequest {
  audioPath: string;
  explicitImage?: string;
  /** Extract from the audio even when an explicit image exists. */
  forceExtract: boolean;
  /** Keep the extracted cover at this path instead of scratch space. */
  saveExtractedTo?: string;
  verbose?: boolean;
}

// ── Extension mapping ─────────────────────────────────────────────────────────

const MIME_EXTENSIONS: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/jpg':  'jpg',
  'image/png':  'png',
  'image/webp': 'webp',
};

export function extensionForMime(mime: string): string {
  return MIME_EXTENSIONS[mime] ?? 'bin';
}

/** Anything that is not png/webp is decoded to JPEG, including video codecs. */
export function extensionForCodec(codec: string): string {
  if (codec === 'png') return 'png';
  if (codec === 'webp') return 'webp';
  return 'jpg';
}

// ── Decision ──────────────────────────────────────────────────────────────────

export function needsExtraction(explicitImage: string | undefined, forceExtract: boolean): boolean {
  return forceExtract || !explicitImage || !fs.existsSync(explicitImage);
}

// ── Tier 1: tag pictures ──────────────────────────────────────────────────────

export function pickCoverPicture(pictures: IPicture[] | undefined): IPicture | null {
  if (!pictures || pictures.length === 0) return null;
  return pictures.find((p) => p.type === 'Cover (front)') ?? pictures[0] ?? null;
}

export async function extractViaMetadata(audioPath: string, saveTo?: string): Promise<string> {
  const metadata = await parseFile(audioPath, { skipCovers: false, duration: false });
  const picture = pickCoverPicture(metadata.common.picture);
  if (!picture) throw new Error('No embedded picture found in tags');

  const out = saveTo ?? scratchPath('cover', extensionForMime(picture.format));
  await fs.promises.mkdir(path.dirname(out), { recursive: true });
  await fs.promises.writeFile(out, picture.data);
  logger.info('Cover: extracted from tags', { out, format: picture.format, type: picture.type });
  return out;
}

// ── Tier 2: engine frame grab ─────────────────────────────────────────────────

export async function extractViaEngine(
  audioPath: string,
  saveTo?: string,
  verbose = false,
): Promise<string> {
  // Prefer a real cover; a plain video stream covers video files used as audio
  const stream =
    (await probeVideoStream(audioPath, 'v:attached_pic')) ??
    (await probeVideoStream(audioPath, 'v:0'));
  if (!stream) throw new Error('No attached picture or video stream found');

  const out = saveTo ?? scratchPath('cover', extensionForCodec(stream.codec));
  await fs.promises.mkdir(path.dirname(out), { recursive: true });
  // No stream copy: compressed video frames must be re-encoded into a still format
  await runFfmpeg(
    ['-i', audioPath, '-an', '-map', `0:${stream.index}`, '-frames:v', '1', out],
    { label: 'Cover extraction', verbose },
  );
  logger.info('Cover: extracted with ffmpeg', { out, codec: stream.codec, stream: stream.index });
  return out;
}

/** Run both tiers in order; the thrown error names both causes. */
export async function extractCover(
  audioPath: string,
  saveTo?: string,
  verbose = false,
): Promise<{ path: string; source: CoverSource }> {
  try {
    return { path: await extractViaMetadata(audioPath, saveTo), source: 'metadata' };
  } catch (tagErr) {
    logger.debug('Cover: tag extraction failed', { audioPath, error: errorMessage(tagErr) });

    if (!(await isEngineAvailable())) {
      throw new EncodeError(
        'CoverNotFound',
        `Cover not found via tags (${errorMessage(tagErr)}) and ffmpeg not available for fallback`,
        tagErr,
      );
    }
    try {
      return { path: await extractViaEngine(audioPath, saveTo, verbose), source: 'engine' };
    } catch (engineErr) {
      throw new EncodeError(
        'CoverNotFound',
        `Cover not found via tags (${errorMessage(tagErr)}); ffmpeg fallback also failed: ${errorMessage(engineErr)}`,
        engineErr,
      );
    }
  }
}

// ── Public API ─────────────────────────────────────────────────────────────────

export async function resolveCover(req: CoverRequest): Promise<ResolvedCover> {
  if (!needsExtraction(req.explicitImage, req.forceExtract) && req.explicitImage) {
    return { path: req.explicitImage, ownership: 'user-specified', source: 'explicit' };
  }

  if (req.explicitImage && !req.forceExtract) {
    logger.warn('Cover: image not found, falling back to embedded art', { image: req.explicitImage });
  }

  const { path, source } = await extractCover(req.audioPath, req.saveExtractedTo, req.verbose ?? false);
  return {
    path,
    ownership: req.saveExtractedTo ? 'user-specified' : 'temporary',
    source,
  };
}
