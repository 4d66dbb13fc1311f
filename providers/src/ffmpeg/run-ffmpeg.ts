import { execFile } from 'node:child_process';
import { createReelsmithError, ErrorCode } from '@reelsmith/core';
import type { FfmpegProgressSnapshot } from './types.js';

const MAX_FFMPEG_STDIO_BUFFER_BYTES = 256 * 1024 * 1024;

export interface RunFfmpegOptions {
  signal?: AbortSignal;
  onProgress?: (snapshot: FfmpegProgressSnapshot) => void;
}

/**
 * Non-zero exit (or kill) of an FFmpeg or FFprobe process. Callers map it to
 * the domain error that fits the operation.
 */
export class FfmpegProcessError extends Error {
  readonly exitCode?: number;
  readonly terminationSignal?: string;
  readonly stderr: string;

  constructor(
    message: string,
    details: { exitCode?: number; terminationSignal?: string; stderr: string; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.name = 'FfmpegProcessError';
    this.exitCode = details.exitCode;
    this.terminationSignal = details.terminationSignal;
    this.stderr = details.stderr;
  }
}

function errorField(error: unknown, field: string): unknown {
  if (typeof error !== 'object' || error === null || !(field in error)) {
    return undefined;
  }
  return Reflect.get(error, field);
}

/**
 * Runs an FFmpeg-family binary and resolves with its stdout.
 *
 * @throws ReelsmithError (FFMPEG_NOT_FOUND) when the binary cannot be spawned
 * @throws FfmpegProcessError when the process fails
 */
export async function runFfmpeg(
  binary: string,
  args: string[],
  options: RunFfmpegOptions = {}
): Promise<Buffer> {
  const { signal, onProgress } = options;
  let streamedStderr = '';
  let stderrLineBuffer = '';

  const consumeStderrChunk = (chunk: string): void => {
    streamedStderr += chunk;
    stderrLineBuffer += chunk;

    const lines = stderrLineBuffer.split(/\r?\n|\r/g);
    stderrLineBuffer = lines.pop() ?? '';

    if (!onProgress) {
      return;
    }
    for (const rawLine of lines) {
      const parsed = parseFfmpegProgressLine(rawLine);
      if (parsed) {
        onProgress(parsed);
      }
    }
  };

  try {
    return await new Promise<Buffer>((resolve, reject) => {
      const child = execFile(
        binary,
        args,
        { encoding: 'buffer', maxBuffer: MAX_FFMPEG_STDIO_BUFFER_BYTES, signal },
        (error, stdout) => {
          if (error) {
            reject(error);
            return;
          }
          resolve(stdout);
        }
      );

      child.stderr?.on('data', (chunk) => {
        consumeStderrChunk(String(chunk));
      });
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const code = errorField(error, 'code');

    if (code === 'ENOENT') {
      throw createReelsmithError(
        ErrorCode.FFMPEG_NOT_FOUND,
        `Cannot run '${binary}'. Ensure FFmpeg is installed and in your PATH.`,
        {
          context: binary,
          suggestion: 'Install FFmpeg or point REELSMITH_FFMPEG_PATH / REELSMITH_FFPROBE_PATH at it.',
          cause: error,
        }
      );
    }

    const stderrField = errorField(error, 'stderr');
    const stderr =
      streamedStderr ||
      (Buffer.isBuffer(stderrField) ? stderrField.toString('utf8') : '') ||
      (typeof stderrField === 'string' ? stderrField : '');
    const exitCode = typeof code === 'number' ? code : undefined;
    const signalField = errorField(error, 'signal');
    const terminationSignal = typeof signalField === 'string' ? signalField : undefined;

    const exitInfo = terminationSignal
      ? `Process killed by signal: ${terminationSignal}`
      : exitCode !== undefined
        ? `Exit code: ${exitCode}`
        : 'Unknown exit reason';

    throw new FfmpegProcessError(
      stderr ? `${binary} failed. ${exitInfo}\n${stderr.trim()}` : `${binary} failed. ${exitInfo}\n${message}`,
      { exitCode, terminationSignal, stderr, cause: error }
    );
  }
}

export function parseFfmpegProgressLine(line: string): FfmpegProgressSnapshot | null {
  const timeMatch = line.match(/time=(\d{2}):(\d{2}):(\d{2}(?:\.\d+)?)/);
  if (!timeMatch) {
    return null;
  }

  const hours = Number(timeMatch[1]);
  const minutes = Number(timeMatch[2]);
  const seconds = Number(timeMatch[3]);
  const timeSeconds = hours * 3600 + minutes * 60 + seconds;

  const fpsMatch = line.match(/fps=\s*([0-9.]+)/);
  const speedMatch = line.match(/speed=\s*([0-9.]+)x/);

  return {
    timeSeconds,
    fps: fpsMatch ? Number(fpsMatch[1]) : null,
    speed: speedMatch ? Number(speedMatch[1]) : null,
  };
}

const INPUT_BANNER = /^\s*Input #\d+,/;
const ERROR_MARKER =
  /error|invalid data|no such file|could not|failed|moov atom not found|corrupt|truncat/i;

/**
 * Finds which input the process choked on. Only stderr lines that report an
 * error count; the `Input #N ... from '<path>'` banners ffmpeg prints for every
 * input it opened do not. Returns undefined unless exactly one input is named.
 */
export function findFailingInput(stderr: string, inputFiles: readonly string[]): string | undefined {
  const named = new Set<string>();
  for (const line of stderr.split(/\r?\n|\r/g)) {
    if (INPUT_BANNER.test(line) || !ERROR_MARKER.test(line)) {
      continue;
    }
    for (const file of inputFiles) {
      if (line.includes(file)) {
        named.add(file);
      }
    }
  }
  if (named.size !== 1) {
    return undefined;
  }
  const [failing] = named;
  return failing;
}
