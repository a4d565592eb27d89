/**
 * Command-line parsing: argv to a validated AppConfig. Enum options go
 * through the visualization parsers, numbers through zod, and the input
 * pattern is expanded with glob before anything runs.
 */
import * as fs from 'fs';
import { parseArgs } from 'util';
import { glob } from 'glob';
import { z } from 'zod';
import { VISUALIZATION_DEFAULTS } from '../config.js';
import { logger } from '../utils/logger.js';
import { EncodeError, errorMessage } from '../utils/errors.js';
import type { AppConfig } from '../pipeline/batch.js';
import {
  SPECTRUM_COLOR_SCHEMES,
  parseColorScheme,
  parsePosition,
  parseVisualizationType,
} from '../visualization/types.js';

export function usage(): string {
  const colors = SPECTRUM_COLOR_SCHEMES.map((c) => `'${c}'`).join('|');
  const d = VISUALIZATION_DEFAULTS;
  return [
    'Usage: wavecast <audio_file_or_glob> [options]',
    '',
    'Examples:',
    '  wavecast song.mp3                         # writes song.mp4 next to song.mp3',
    '  wavecast "*.mp3"                          # batch converts all MP3s in cwd',
    '  wavecast "music/*.mp3" --out-dir out/     # batch to a different directory',
    '  wavecast track.mp3 --image cover.jpg      # explicit image',
    '  wavecast track.mp3 --cover-from-audio     # force embedded art',
    '',
    'Options:',
    '  --image <path>        Optional explicit background image',
    '  --cover-from-audio    Ignore --image and extract embedded cover art from the audio',
    '  --cover-out <path>    Also save the extracted cover image (single input only)',
    '  --out-dir <dir>       Write outputs to this directory (filenames still derived)',
    `  --type <type>         'wave' (default), 'spectrum', or 'both'`,
    '  --duration <sec>      Max duration seconds (optional)',
    `  --position <pos>      'top' | 'bottom' | 'left' | 'right' | 'center' | 'xy(x,y)' (default: ${d.position})`,
    `  --color <scheme>      ${colors} (default: ${d.colorScheme})`,
    `  --width <px>          Viz width (default ${d.width})`,
    `  --height <px>         Viz height (default ${d.height})`,
    `  --margin <px>         Margin (default ${d.margin})`,
    '  --verbose             Show ffmpeg output',
    '  --help                Show this message',
    '',
  ].join('\n');
}

// ── Numbers ───────────────────────────────────────────────────────────────────

const PixelSize = z.coerce.number().int().positive();
const PixelOffset = z.coerce.number().int().nonnegative();
const Seconds = z.coerce.number().positive().finite();

function parseNumber(raw: string | undefined, flag: string, schema: z.ZodNumber, fallback: number): number;
function parseNumber(raw: string | undefined, flag: string, schema: z.ZodNumber): number | undefined;
function parseNumber(raw: string | undefined, flag: string, schema: z.ZodNumber, fallback?: number): number | undefined {
  if (raw === undefined) return fallback;
  const parsed = schema.safeParse(raw.trim() === '' ? Number.NaN : raw);
  if (!parsed.success) {
    throw new EncodeError('ConfigurationError', `Invalid value for --${flag}: ${raw}`);
  }
  return parsed.data;
}

// ── Inputs ────────────────────────────────────────────────────────────────────

/** Expand each pattern to files; a pattern that matches nothing must be a file itself. */
export async function expandInputs(patterns: string[]): Promise<string[]> {
  const inputs: string[] = [];
  for (const pattern of patterns) {
    const matches = (await glob(pattern, { nodir: true })).sort();
    if (matches.length > 0) {
      inputs.push(...matches);
      continue;
    }
    if (fs.existsSync(pattern) && fs.statSync(pattern).isFile()) {
      inputs.push(pattern);
      continue;
    }
    throw new EncodeError('ConfigurationError', `No files matched pattern or file not found: ${pattern}`);
  }
  return [...new Set(inputs)];
}

// ── Public API ─────────────────────────────────────────────────────────────────

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        'image':            { type: 'string' },
        'cover-from-audio': { type: 'boolean' },
        'cover-out':        { type: 'string' },
        'out-dir':          { type: 'string' },
        'type':             { type: 'string' },
        'duration':         { type: 'string' },
        'position':         { type: 'string' },
        'color':            { type: 'string' },
        'width':            { type: 'string' },
        'height':           { type: 'string' },
        'margin':           { type: 'string' },
        'verbose':          { type: 'boolean' },
        'help':             { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    // unknown flags and missing option values
    throw new EncodeError('ConfigurationError', errorMessage(err), err);
  }
}

/** Returns null when usage was requested (or nothing was passed). */
export async function parseCliArgs(argv: string[]): Promise<AppConfig | null> {
  const parsed = readArgv(argv);
  const { values, positionals } = parsed;
  if (values.help || positionals.length === 0) return null;

  const d = VISUALIZATION_DEFAULTS;
  const visualization = {
    type:        parseVisualizationType(values.type ?? d.type),
    position:    parsePosition(values.position ?? d.position),
    colorScheme: parseColorScheme(values.color ?? d.colorScheme),
    width:       parseNumber(values.width, 'width', PixelSize, d.width),
    height:      parseNumber(values.height, 'height', PixelSize, d.height),
    margin:      parseNumber(values.margin, 'margin', PixelOffset, d.margin),
  };
  const durationSeconds = parseNumber(values.duration, 'duration', Seconds);

  const inputs = await expandInputs(positionals);

  let coverOut = values['cover-out'];
  if (inputs.length > 1 && coverOut !== undefined) {
    logger.warn('--cover-out is ignored in batch mode (multiple inputs)');
    coverOut = undefined;
  }

  return {
    inputs,
    outDir: values['out-dir'],
    shared: {
      imagePath: values.image,
      visualization,
      durationSeconds,
      verbose: values.verbose ?? false,
      coverFromAudio: values['cover-from-audio'] ?? false,
      coverOut,
    },
  };
}
