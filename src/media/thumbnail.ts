/**
 * Thumbnail emission: a still named after the audio file, written next to
 * the produced video. PNG sources stay PNG; everything else becomes JPEG.
 */
import * as fs from 'fs';
import * as path from 'path';
import { THUMBNAIL } from '../config.js';
import { logger } from '../utils/logger.js';
import { runFfmpeg } from './ffmpeg.js';

export type ThumbnailFormat = 'jpg' | 'png';

function sourceExtension(imagePath: string): string {
  return path.extname(imagePath).slice(1).toLowerCase();
}

export function thumbnailFormatFor(imagePath: string): ThumbnailFormat {
  return sourceExtension(imagePath) === 'png' ? 'png' : 'jpg';
}

/** `<video dir>/<audio base name>.<jpg|png>` */
export function thumbnailPathFor(
  imagePath: string,
  audioPath: string,
  outputVideoPath: string,
): string {
  const stem = path.parse(audioPath).name;
  return path.join(path.dirname(outputVideoPath), `${stem}.${thumbnailFormatFor(imagePath)}`);
}

/** True when the source bytes can be used as the thumbnail without re-encoding. */
export function canCopyAsIs(imagePath: string): boolean {
  const ext = sourceExtension(imagePath);
  const format = thumbnailFormatFor(imagePath);
  return format === 'png' ? ext === 'png' : ext === 'jpg' || ext === 'jpeg';
}

export async function writeThumbnail(
  imagePath: string,
  audioPath: string,
  outputVideoPath: string,
  verbose: boolean,
): Promise<string> {
  const dest = thumbnailPathFor(imagePath, audioPath, outputVideoPath);

  if (canCopyAsIs(imagePath)) {
    if (path.resolve(imagePath) !== path.resolve(dest)) {
      await fs.promises.copyFile(imagePath, dest);
    }
  } else {
    const quality = thumbnailFormatFor(imagePath) === 'jpg'
      ? ['-q:v', String(THUMBNAIL.jpegQuality)]
      : [];
    await runFfmpeg(['-i', imagePath, '-frames:v', '1', ...quality, dest], {
      label: 'Thumbnail',
      verbose,
    });
  }

  logger.info('Thumbnail saved', { path: dest });
  return dest;
}
