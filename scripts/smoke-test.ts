#!/usr/bin/env tsx
/**
 * End-to-end smoke test for wavecast against the locally installed ffmpeg.
 * Generates a short tone and a background image, renders every layout
 * family and checks the produced files with ffprobe.
 * Run: npm run smoke-test
 *
 * Exit codes:
 *   0: all tests pass
 *   1: one or more tests failed
 */
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { isEngineAvailable, probeMedia, runFfmpeg } from '../src/media/ffmpeg.js';
import { produceVideo, type VideoJob } from '../src/pipeline/producer.js';
import type { VisualizationRequest } from '../src/visualization/types.js';

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

// ── Test runner ───────────────────────────────────────────────────────────────

let allPass = true;
let testNumber = 0;

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  testNumber++;
  const label = `Test ${testNumber.toString().padStart(2, ' ')}: ${name}`;
  process.stdout.write(`  ${label}… `);
  try {
    await fn();
    console.log(`${GREEN}PASS${RESET}`);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.log(`${RED}FAIL${RESET}`);
    console.error(`           ${YELLOW}${msg}${RESET}`);
    allPass = false;
  }
}

// ── Fixtures ──────────────────────────────────────────────────────────────────

const workDir  = mkdtempSync(join(tmpdir(), 'wavecast-smoke-'));
const tone     = join(workDir, 'tone.mp3');
const tagged   = join(workDir, 'tagged.mp3');
const bgPng    = join(workDir, 'bg.png');
const bgJpg    = join(workDir, 'bg.jpg');

const viz = (overrides: Partial<VisualizationRequest>): VisualizationRequest => ({
  type: 'waveform',
  position: { kind: 'bottom' },
  colorScheme: 'viridis',
  width: 1280,
  height: 180,
  margin: 50,
  ...overrides,
});

const job = (audioPath: string, name: string, overrides: Partial<VideoJob>): VideoJob => ({
  audioPath,
  outputPath: join(workDir, `${name}.mp4`),
  coverFromAudio: false,
  visualization: viz({}),
  verbose: false,
  ...overrides,
});

async function expectPlayable(outputPath: string, maxSeconds: number): Promise<void> {
  const report = await probeMedia(outputPath);
  if (report.videoStreams !== 1 || report.audioStreams !== 1) {
    throw new Error(`Expected 1 video + 1 audio stream, got ${report.videoStreams} + ${report.audioStreams}`);
  }
  if (report.videoCodec !== 'h264' || report.audioCodec !== 'aac') {
    throw new Error(`Unexpected codecs: ${report.videoCodec ?? 'none'} / ${report.audioCodec ?? 'none'}`);
  }
  if (report.durationSeconds <= 0 || report.durationSeconds > maxSeconds + 0.5) {
    throw new Error(`Unexpected duration ${report.durationSeconds}s (max ${maxSeconds}s)`);
  }
}

// ── Run tests ─────────────────────────────────────────────────────────────────

console.log(`\n${BOLD}=== wavecast: Smoke Tests ===${RESET}\n`);

await test('FFmpeg installed and accessible', async () => {
  if (!(await isEngineAvailable())) {
    throw new Error('ffmpeg not found; install with: sudo apt install ffmpeg or brew install ffmpeg');
  }
});

await test('Generate fixtures (tone, backgrounds, tagged MP3)', async () => {
  const quiet = { verbose: false };
  await runFfmpeg(['-f', 'lavfi', '-i', 'sine=frequency=440:duration=3', '-c:a', 'libmp3lame', tone], { label: 'Tone', ...quiet });
  await runFfmpeg(['-f', 'lavfi', '-i', 'color=c=navy:s=640x480', '-frames:v', '1', bgPng], { label: 'Background', ...quiet });
  await runFfmpeg(['-f', 'lavfi', '-i', 'color=c=maroon:s=500x500', '-frames:v', '1', bgJpg], { label: 'Cover', ...quiet });
  await runFfmpeg(
    ['-i', tone, '-i', bgJpg, '-map', '0:a', '-map', '1:v', '-c', 'copy', '-id3v2_version', '3',
      '-metadata:s:v', 'comment=Cover (front)', '-disposition:v', 'attached_pic', tagged],
    { label: 'Tagging', ...quiet },
  );
});

await test('Waveform at the bottom over an explicit image', async () => {
  const result = await produceVideo(job(tone, 'waveform', { imagePath: bgPng }));
  await expectPlayable(result.outputPath, 3);
  if (result.thumbnailPath !== join(workDir, 'tone.png') || !existsSync(result.thumbnailPath)) {
    throw new Error(`Thumbnail missing: ${result.thumbnailPath}`);
  }
});

await test('Spectrum on the left over embedded cover art', async () => {
  const result = await produceVideo(job(tagged, 'spectrum', {
    coverFromAudio: true,
    visualization: viz({ type: 'spectrum', position: { kind: 'left' }, colorScheme: 'fire', width: 600, height: 160 }),
  }));
  await expectPlayable(result.outputPath, 3);
  if (existsSync(result.cover.path)) throw new Error('Temporary cover was not removed');
});

await test('Both, centered, saving the extracted cover', async () => {
  const coverOut = join(workDir, 'saved-cover.jpg');
  const result = await produceVideo(job(tagged, 'both', {
    coverFromAudio: true,
    coverOut,
    visualization: viz({ type: 'both', position: { kind: 'center' }, height: 360 }),
  }));
  await expectPlayable(result.outputPath, 3);
  if (!existsSync(coverOut)) throw new Error(`Cover not kept at ${coverOut}`);
});

await test('Duration cap of one second', async () => {
  const result = await produceVideo(job(tone, 'capped', {
    imagePath: bgJpg,
    targetDurationSeconds: 1,
    visualization: viz({ position: { kind: 'custom', x: 20, y: 20 }, width: 400, height: 100 }),
  }));
  await expectPlayable(result.outputPath, 1);
});

await test('Missing audio is rejected', async () => {
  try {
    await produceVideo(job(join(workDir, 'missing.mp3'), 'missing', {}));
  } catch (err) {
    if (err instanceof Error && err.message.startsWith('Audio file not found')) return;
    throw err;
  }
  throw new Error('Expected produceVideo to fail');
});

// ── Summary ───────────────────────────────────────────────────────────────────

rmSync(workDir, { recursive: true, force: true });

console.log('');
if (allPass) {
  console.log(`${GREEN}${BOLD}All ${testNumber} smoke tests passed.${RESET}\n`);
} else {
  console.error(`${RED}${BOLD}One or more smoke tests failed.${RESET}`);
  console.error(`${YELLOW}Re-run with LOG_LEVEL=debug for the ffmpeg arguments: npm run smoke-test${RESET}\n`);
  process.exit(1);
}
