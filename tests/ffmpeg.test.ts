import { EventEmitter } from 'events';
import { PassThrough, Readable } from 'stream';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { spawnMock, execFileAsyncMock } = vi.hoisted(() => ({
  spawnMock: vi.fn(),
  execFileAsyncMock: vi.fn(),
}));

vi.mock('child_process', async () => {
  const { promisify } = await import('util');
  const execFile = Object.assign(() => undefined, { [promisify.custom]: execFileAsyncMock });
  return { spawn: spawnMock, execFile };
});

import {
  classifyDiagnosticLine,
  consumeDiagnostics,
  isEngineAvailable,
  probeDuration,
  probeMedia,
  probeVideoStream,
  runFfmpeg,
  summarizeProbeReport,
} from '../src/media/ffmpeg.js';
import { EncodeError } from '../src/utils/errors.js';

class FakeChild extends EventEmitter {
  constructor(public readonly stderr: PassThrough | null = new PassThrough()) {
    super();
  }

  /** Write `output` to stderr, close it, then report `code`. */
  finish(output: string, code: number | null): void {
    setImmediate(() => {
      this.stderr?.end(output);
      setImmediate(() => this.emit('close', code));
    });
  }
}

function spawnWith(output: string, code: number | null): FakeChild {
  const child = new FakeChild();
  spawnMock.mockReturnValueOnce(child);
  child.finish(output, code);
  return child;
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected the promise to reject');
}

beforeEach(() => {
  spawnMock.mockReset();
  execFileAsyncMock.mockReset();
  vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('classifyDiagnosticLine', () => {
  it('flags either spelling of the error marker', () => {
    expect(classifyDiagnosticLine('Error opening input file in.mp3')).toBe('error');
    expect(classifyDiagnosticLine('[AVFilterGraph] some error occurred')).toBe('error');
  });

  it('recognises progress lines', () => {
    expect(classifyDiagnosticLine('frame=  120 fps= 60 q=-1.0 size=  256kB')).toBe('progress');
    expect(classifyDiagnosticLine('size=     512kB time=00:00:04.00 bitrate= 1048.6kbits/s')).toBe('progress');
  });

  it('lets an error marker win over progress markers', () => {
    expect(classifyDiagnosticLine('frame=10 time=00:00:01 Error while decoding')).toBe('error');
  });

  it('ignores everything else', () => {
    expect(classifyDiagnosticLine('Stream mapping:')).toBe('other');
    expect(classifyDiagnosticLine('')).toBe('other');
  });
});

describe('consumeDiagnostics', () => {
  it('splits on carriage returns and newlines', async () => {
    const seen: string[] = [];
    const stream = Readable.from(['frame=1 time=0\rframe=2 time=1\rInput #0\nSome error here\n']);

    const summary = await consumeDiagnostics(stream, 'Test', (line) => seen.push(line));

    expect(seen).toEqual(['frame=1 time=0', 'frame=2 time=1']);
    expect(summary).toEqual({ errorLines: ['Some error here'], progressLines: 2 });
  });

  it('returns an empty summary for a silent stream', async () => {
    const summary = await consumeDiagnostics(Readable.from([]), 'Test', () => undefined);
    expect(summary).toEqual({ errorLines: [], progressLines: 0 });
  });
});

describe('runFfmpeg', () => {
  it('resolves on a clean run and prepends the non-interactive flags', async () => {
    spawnWith('frame=1 time=00:00:00.04\n', 0);

    await runFfmpeg(['-i', 'in.mp3', 'out.mp4'], { label: 'Step', verbose: false });

    expect(spawnMock).toHaveBeenCalledWith(
      expect.any(String),
      ['-y', '-nostdin', '-i', 'in.mp3', 'out.mp4'],
      { stdio: ['ignore', 'ignore', 'pipe'] },
    );
  });

  it('fails on an error line even when the exit status is 0', async () => {
    spawnWith('Input #0\n[fc#0] Error reinitializing filters!\n', 0);

    const err = await rejection(runFfmpeg(['-i', 'x'], { label: 'Step 1', verbose: false }));

    expect(err).toBeInstanceOf(EncodeError);
    expect(err).toMatchObject({
      kind: 'SubprocessExecutionFailed',
      message: 'Step 1 failed: [fc#0] Error reinitializing filters!',
    });
  });

  it('fails on a nonzero exit status', async () => {
    spawnWith('', 1);

    const err = await rejection(runFfmpeg([], { label: 'Step 2', verbose: false }));

    expect(err).toMatchObject({
      kind: 'SubprocessExecutionFailed',
      message: 'Step 2 failed: ffmpeg exited with code 1',
    });
  });

  it('reports a process that never started', async () => {
    const child = new FakeChild();
    spawnMock.mockReturnValueOnce(child);
    setImmediate(() => {
      child.emit('error', new Error('spawn ffmpeg ENOENT'));
      child.stderr?.end();
    });

    const err = await rejection(runFfmpeg([], { label: 'Thumbnail', verbose: false }));

    expect(err).toMatchObject({ kind: 'SubprocessSpawnFailed' });
    expect(err).toHaveProperty('message', expect.stringMatching(/^Thumbnail failed: could not start .*\(spawn ffmpeg ENOENT\)$/));
  });

  it('inherits stdio in verbose mode', async () => {
    const child = new FakeChild(null);
    spawnMock.mockReturnValueOnce(child);
    setImmediate(() => child.emit('close', 0));

    await runFfmpeg(['-version'], { label: 'Step', verbose: true });

    expect(spawnMock).toHaveBeenCalledWith(expect.any(String), ['-y', '-nostdin', '-version'], { stdio: 'inherit' });
  });
});

describe('isEngineAvailable', () => {
  it('is true when the version check runs', async () => {
    execFileAsyncMock.mockResolvedValueOnce({ stdout: 'ffmpeg version 6.1', stderr: '' });
    await expect(isEngineAvailable()).resolves.toBe(true);
  });

  it('is false when it cannot', async () => {
    execFileAsyncMock.mockRejectedValueOnce(Object.assign(new Error('not found'), { code: 'ENOENT' }));
    await expect(isEngineAvailable()).resolves.toBe(false);
  });
});

describe('probeDuration', () => {
  it('parses the container duration', async () => {
    execFileAsyncMock.mockResolvedValueOnce({ stdout: '12.500000\n', stderr: '' });

    await expect(probeDuration('song.mp3')).resolves.toBe(12.5);
    expect(execFileAsyncMock).toHaveBeenCalledWith(
      expect.any(String),
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', 'song.mp3'],
      { maxBuffer: 16 * 1024 * 1024 },
    );
  });

  it('falls back to 0 for an unreadable duration', async () => {
    execFileAsyncMock.mockResolvedValueOnce({ stdout: 'N/A\n', stderr: '' });
    await expect(probeDuration('song.mp3')).resolves.toBe(0);
  });

  it('uses what ffprobe printed before exiting nonzero', async () => {
    execFileAsyncMock.mockRejectedValueOnce(Object.assign(new Error('exit 1'), { code: 1, stdout: '3.0\n' }));
    await expect(probeDuration('song.mp3')).resolves.toBe(3);
  });

  it('fails when ffprobe is missing', async () => {
    execFileAsyncMock.mockRejectedValueOnce(Object.assign(new Error('spawn ffprobe ENOENT'), { code: 'ENOENT' }));
    await expect(probeDuration('song.mp3')).rejects.toMatchObject({ kind: 'SubprocessSpawnFailed' });
  });
});

describe('probeVideoStream', () => {
  it('returns the first matching stream', async () => {
    execFileAsyncMock.mockResolvedValueOnce({ stdout: '1,mjpeg\n2,png\n', stderr: '' });

    await expect(probeVideoStream('song.mp3', 'v:attached_pic')).resolves.toEqual({ index: 1, codec: 'mjpeg' });
    expect(execFileAsyncMock).toHaveBeenCalledWith(
      expect.any(String),
      ['-v', 'error', '-select_streams', 'v:attached_pic', '-show_entries', 'stream=index,codec_name',
        '-of', 'csv=p=0', 'song.mp3'],
      { maxBuffer: 16 * 1024 * 1024 },
    );
  });

  it('returns null when nothing matches', async () => {
    execFileAsyncMock.mockResolvedValueOnce({ stdout: '\n', stderr: '' });
    await expect(probeVideoStream('song.mp3', 'v:0')).resolves.toBeNull();
  });
});

describe('summarizeProbeReport', () => {
  it('counts streams and reads the first codec of each kind', () => {
    const report = summarizeProbeReport({
      streams: [
        { index: 0, codec_type: 'video', codec_name: 'h264' },
        { index: 1, codec_type: 'audio', codec_name: 'aac' },
      ],
      format: { duration: '10.010000' },
    });

    expect(report).toEqual({
      videoStreams: 1,
      audioStreams: 1,
      videoCodec: 'h264',
      audioCodec: 'aac',
      durationSeconds: 10.01,
    });
  });

  it('treats missing sections as empty', () => {
    expect(summarizeProbeReport({})).toEqual({
      videoStreams: 0,
      audioStreams: 0,
      videoCodec: null,
      audioCodec: null,
      durationSeconds: 0,
    });
  });

  it('rejects a malformed report', () => {
    expect(() => summarizeProbeReport({ streams: 'none' })).toThrowError(/^Unexpected ffprobe report: /);
  });
});

describe('probeMedia', () => {
  it('rejects output that is not JSON', async () => {
    execFileAsyncMock.mockResolvedValueOnce({ stdout: 'garbage', stderr: '' });
    await expect(probeMedia('out.mp4')).rejects.toMatchObject({
      kind: 'OutputValidationFailed',
      message: 'FFprobe report for out.mp4 is not JSON',
    });
  });
});
