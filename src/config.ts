import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Engine binaries
  FFMPEG_PATH:                   z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH:                  z.string().min(1).default('ffprobe'),

  // Local storage
  TEMP_DIR:                      z.string().min(1).default(path.join(os.tmpdir(), 'wavecast')),

  // Logging
  LOG_LEVEL:                     z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:                    z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${missing}`);
}

export const env = parsed.data;

// ── Canvas ────────────────────────────────────────────────────────────────────
// Every background is letterboxed onto this frame before compositing.

export const CANVAS = {
  width:  1280,
  height: 720,
} as const;

// ── Visualization ─────────────────────────────────────────────────────────────

export const WAVEFORM_STYLE = {
  mode:  'line',
  rate:  25,
  color: 'white',
} as const;

export const SPECTRUM_ANALYSIS = {
  mode:       'combined',
  scale:      'cbrt',
  slide:      'scroll',
  fscale:     'lin',
  winFunc:    'hamming',
  overlap:    0,
  fps:        'auto',
  startHz:    100,
  stopHz:     10_000,
} as const;

// ── Encoding ──────────────────────────────────────────────────────────────────

export const COMPOSITE_ENCODING = {
  videoCodec:  'libx264',
  audioCodec:  'aac',
  preset:      'ultrafast',
  tune:        'stillimage',
  pixelFormat: 'yuv420p',
} as const;

export const REMUX_ENCODING = {
  audioCodec: 'aac',
} as const;

export const VIDEO_EXTENSION = 'mp4';

export const THUMBNAIL = {
  jpegQuality: 2,   // ffmpeg -q:v scale, lower is better
} as const;

// ── CLI defaults ──────────────────────────────────────────────────────────────

export const VISUALIZATION_DEFAULTS = {
  type:        'waveform',
  position:    'bottom',
  colorScheme: 'viridis',
  width:       1280,
  height:      180,
  margin:      50,
} as const;
