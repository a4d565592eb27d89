/**
 * Engine process layer: every ffmpeg/ffprobe invocation goes through here.
 *
 * ffmpeg runs non-interactive and always overwrites its output. Outside
 * verbose mode its stderr is read line by line: progress lines are shown in
 * place, and any line carrying an error marker fails the run even when the
 * exit status is 0, since filter-graph failures do not always set one.
 */
import { execFile, spawn } from 'child_process';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { promisify } from 'util';
import { z } from 'zod';
import { env } from '../config.js';
import { EncodeError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const execFileAsync = promisify(execFile);

// ── Diagnostic stream ──────────────────────────────────────────────────────────

export type DiagnosticLineKind = 'error' | 'progress' | 'other';

export function classifyDiagnosticLine(line: string): DiagnosticLineKind {
  if (line.includes('Error') || line.includes('error')) return 'error';
  if (line.includes('frame=') || line.includes('time=')) return 'progress';
  return 'other';
}

export interface DiagnosticSummary {
  errorLines: string[];
  progressLines: number;
}

/**
 * Drain an ffmpeg stderr stream until it closes. Both `\n` and the bare `\r`
 * ffmpeg uses between progress updates end a line.
 */
export async function consumeDiagnostics(
  stream: Readable,
  label: string,
  onProgress: (line: string) => void = logger.status,
): Promise<DiagnosticSummary> {
  const summary: DiagnosticSummary = { errorLines: [], progressLines: 0 };
  const lines = createInterface({ input: stream, crlfDelay: Infinity });

  for await (const line of lines) {
    switch (classifyDiagnosticLine(line)) {
      case 'error':
        logger.error(`FFmpeg error [${label}]`, { line });
        summary.errorLines.push(line);
        break;
      case 'progress':
        onProgress(line);
        summary.progressLines++;
        break;
      case 'other':
        break;
    }
  }
  return summary;
}

// ── ffmpeg ─────────────────────────────────────────────────────────────────────

export interface RunOptions {
  /** Human-readable step name used in logs and error messages. */
  label: string;
  /** Pass ffmpeg's output straight through instead of filtering it. */
  verbose: boolean;
}

export async function runFfmpeg(args: string[], opts: RunOptions): Promise<void> {
  const fullArgs = ['-y', '-nostdin', ...args];
  logger.debug(`FFmpeg [${opts.label}]`, { args: fullArgs });

  const child = spawn(env.FFMPEG_PATH, fullArgs, {
    stdio: opts.verbose ? 'inherit' : ['ignore', 'ignore', 'pipe'],
  });

  const exited = new Promise<number | null>((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (code) => resolve(code));
  });
  const diagnostics = child.stderr
    ? consumeDiagnostics(child.stderr, opts.label)
    : Promise.resolve<DiagnosticSummary>({ errorLines: [], progressLines: 0 });

  let code: number | null;
  let summary: DiagnosticSummary;
  try {
    [summary, code] = await Promise.all([diagnostics, exited]);
  } catch (err) {
    throw new EncodeError(
      'SubprocessSpawnFailed',
      `${opts.label} failed: could not start ${env.FFMPEG_PATH} (${errorMessage(err)})`,
      err,
    );
  } finally {
    logger.endStatus();
  }

  if (code !== 0) {
    throw new EncodeError(
      'SubprocessExecutionFailed',
      `${opts.label} failed: ffmpeg exited with code ${code ?? 'null'}`,
    );
  }
  const firstError = summary.errorLines[0];
  if (firstError !== undefined) {
    throw new EncodeError('SubprocessExecutionFailed', `${opts.label} failed: ${firstError}`);
  }
}

/** True when `ffmpeg -version` can be run at all. */
export async function isEngineAvailable(): Promise<boolean> {
  try {
    await execFileAsync(env.FFMPEG_PATH, ['-version']);
    return true;
  } catch (err) {
    logger.debug('FFmpeg: version check failed', { error: errorMessage(err) });
    return false;
  }
}

// ── ffprobe ────────────────────────────────────────────────────────────────────

async function runFfprobe(args: string[], label: string): Promise<string> {
  const fullArgs = ['-v', 'error', ...args];
  logger.debug(`FFprobe [${label}]`, { args: fullArgs });
  try {
    const { stdout } = await execFileAsync(env.FFPROBE_PATH, fullArgs, { maxBuffer: 16 * 1024 * 1024 });
    return stdout.trim();
  } catch (err) {
    const e = err as { code?: unknown; stdout?: string };
    if (e.code === 'ENOENT') {
      throw new EncodeError(
        'SubprocessSpawnFailed',
        `FFprobe ${label} failed: could not start ${env.FFPROBE_PATH}`,
        err,
      );
    }
    // ffprobe exits non-zero on unreadable input; whatever it printed is still the answer
    return (e.stdout ?? '').trim();
  }
}

/** Container-level duration in seconds, or 0 when it cannot be read. */
export async function probeDuration(mediaPath: string): Promise<number> {
  const raw = await runFfprobe(
    ['-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', mediaPath],
    'duration',
  );
  const duration = parseFloat(raw);
  return Number.isFinite(duration) ? duration : 0;
}

export type VideoStreamSelector = 'v:attached_pic' | 'v:0';

export interface ProbedStream {
  index: number;
  codec: string;
}

/** First stream matching `selector`, or null when the file has none. */
export async function probeVideoStream(
  mediaPath: string,
  selector: VideoStreamSelector,
): Promise<ProbedStream | null> {
  const raw = await runFfprobe(
    ['-select_streams', selector, '-show_entries', 'stream=index,codec_name', '-of', 'csv=p=0', mediaPath],
    `stream ${selector}`,
  );
  const first = raw.split('\n')[0]?.trim() ?? '';
  const [indexStr, codec] = first.split(',');
  const index = Number(indexStr);
  if (!codec || !Number.isInteger(index)) return null;
  return { index, codec: codec.trim() };
}

const ProbeReportSchema = z.object({
  streams: z.array(z.object({
    index:      z.number(),
    codec_type: z.string().optional(),
    codec_name: z.string().optional(),
  })).default([]),
  format: z.object({
    duration: z.string().optional(),
  }).default({}),
});

export interface MediaReport {
  videoStreams: number;
  audioStreams: number;
  videoCodec: string | null;
  audioCodec: string | null;
  durationSeconds: number;
}

export function summarizeProbeReport(json: unknown): MediaReport {
  const parsed = ProbeReportSchema.safeParse(json);
  if (!parsed.success) {
    throw new EncodeError('OutputValidationFailed', `Unexpected ffprobe report: ${parsed.error.message}`);
  }
  const { streams, format } = parsed.data;
  const video = streams.filter((s) => s.codec_type === 'video');
  const audio = streams.filter((s) => s.codec_type === 'audio');
  const duration = parseFloat(format.duration ?? '');
  return {
    videoStreams: video.length,
    audioStreams: audio.length,
    videoCodec: video[0]?.codec_name ?? null,
    audioCodec: audio[0]?.codec_name ?? null,
    durationSeconds: Number.isFinite(duration) ? duration : 0,
  };
}

/** Full stream + format report, used to validate produced files. */
export async function probeMedia(mediaPath: string): Promise<MediaReport> {
  const raw = await runFfprobe(['-show_streams', '-show_format', '-of', 'json', mediaPath], 'report');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new EncodeError('OutputValidationFailed', `FFprobe report for ${mediaPath} is not JSON`, err);
  }
  return summarizeProbeReport(json);
}
