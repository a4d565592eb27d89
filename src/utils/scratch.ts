import { randomBytes } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { env } from '../config.js';

/**
 * Path for a scratch file under TEMP_DIR, unique to this process. The random
 * suffix keeps names apart when a pid is reused or two calls land in the same
 * millisecond.
 */
export function scratchPath(label: string, ext: string): string {
  const dir = env.TEMP_DIR;
  fs.mkdirSync(dir, { recursive: true });
  const suffix = randomBytes(4).toString('hex');
  return path.join(dir, `${label}_${process.pid}_${Date.now()}_${suffix}.${ext}`);
}

/** Remove a file if present; resolves false when it was already gone. */
export async function removeIfExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.unlink(filePath);
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw err;
  }
}
