#!/usr/bin/env node
/**
 * wavecast: entry point.
 *
 * Parses argv into an AppConfig, checks that ffmpeg can be run and produces
 * one video per input. Any failure is printed as a single message and the
 * process exits with status 1.
 */
import { logger } from './utils/logger.js';
import { EncodeError, errorMessage, isEncodeError } from './utils/errors.js';
import { isEngineAvailable } from './media/ffmpeg.js';
import { parseCliArgs, usage } from './cli/args.js';
import { runBatch } from './pipeline/batch.js';

async function main(): Promise<void> {
  const app = await parseCliArgs(process.argv.slice(2));
  if (!app) {
    process.stdout.write(usage());
    return;
  }

  if (!(await isEngineAvailable())) {
    throw new EncodeError(
      'SubprocessSpawnFailed',
      "FFmpeg not found. Please install FFmpeg and make sure it's in your PATH.",
    );
  }

  logger.info('wavecast: starting', { inputs: app.inputs.length, outDir: app.outDir ?? null });
  await runBatch(app);
}

main().catch((err) => {
  if (isEncodeError(err)) {
    logger.error(err.message, { kind: err.kind });
  } else {
    logger.error('Fatal error', { error: errorMessage(err) });
  }
  process.exit(1);
});
