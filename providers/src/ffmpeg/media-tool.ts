import { mkdir, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
  createReelsmithError,
  ErrorCode,
  isReelsmithError,
  samplesToMs,
  type AudioAsset,
  type AudioTrackRef,
  type ErrorCodeValue,
  type ExportSpec,
  type Logger,
  type MediaTool,
  type NormalizedAudio,
  type SceneRenderSpec,
  type VideoAsset,
} from '@reelsmith/core';
import { buildDecodeArgs, pcmBufferToSamples, samplesToPcmBuffer } from './audio-codec.js';
import { buildExportCommand } from './export-command.js';
import { buildProbeArgs, parseProbeOutput, type ProbeResult } from './probe.js';
import { FfmpegProcessError, findFailingInput, runFfmpeg } from './run-ffmpeg.js';
import { buildSceneCommand } from './scene-command.js';
import { FFMPEG_DEFAULTS, type FfmpegToolConfig } from './types.js';

const PROGRESS_PERCENT_STEP = 10;

export interface FfmpegMediaToolOptions {
  config?: Partial<FfmpegToolConfig>;
  logger?: Partial<Logger>;
  signal?: AbortSignal;
}

async function assertFileExists(filePath: string): Promise<void> {
  try {
    await stat(filePath);
  } catch (error) {
    throw createReelsmithError(ErrorCode.MISSING_ASSET, `File not found: ${filePath}`, {
      context: filePath,
      cause: error,
    });
  }
}

/**
 * Converts a process failure into the domain error for the operation. Errors
 * that are already domain errors (a missing binary) pass through.
 */
function toDomainError(
  error: unknown,
  code: ErrorCodeValue,
  message: string,
  options: { sceneIndex?: number; context?: string } = {}
): unknown {
  if (isReelsmithError(error)) {
    return error;
  }
  if (error instanceof FfmpegProcessError) {
    return createReelsmithError(code, `${message}\n${error.message}`, {
      ...options,
      exitCode: error.exitCode,
      cause: error,
    });
  }
  return createReelsmithError(code, `${message}\n${error instanceof Error ? error.message : String(error)}`, {
    ...options,
    cause: error,
  });
}

/**
 * MediaTool backed by the FFmpeg and FFprobe binaries.
 */
export function createFfmpegMediaTool(options: FfmpegMediaToolOptions = {}): MediaTool {
  const config: FfmpegToolConfig = { ...FFMPEG_DEFAULTS, ...options.config };
  const logger = options.logger ?? {};
  const { signal } = options;

  async function probe(filePath: string): Promise<ProbeResult> {
    const stdout = await runFfmpeg(config.ffprobePath, buildProbeArgs(filePath), { signal });
    const result = parseProbeOutput(stdout.toString('utf8'));
    if (!result) {
      throw new FfmpegProcessError(`ffprobe reported no duration for ${filePath}`, {
        stderr: '',
      });
    }
    return result;
  }

  return {
    async decodeAudio(audioPath: string): Promise<AudioAsset> {
      await assertFileExists(audioPath);
      let stdout: Buffer;
      try {
        stdout = await runFfmpeg(
          config.ffmpegPath,
          buildDecodeArgs(audioPath, config.decodeSampleRate),
          { signal }
        );
      } catch (error) {
        throw toDomainError(error, ErrorCode.AUDIO_DECODE_FAILED, `Cannot decode audio ${audioPath}.`, {
          context: audioPath,
        });
      }

      const samples = pcmBufferToSamples(stdout);
      logger.debug?.('ffmpeg.audio.decoded', { audioPath, samples: samples.length });
      return {
        path: audioPath,
        samples,
        sampleRate: config.decodeSampleRate,
        durationMs: samplesToMs(samples.length, config.decodeSampleRate),
      };
    },

    async probeVideo(videoPath: string): Promise<VideoAsset> {
      await assertFileExists(videoPath);
      let result: ProbeResult;
      try {
        result = await probe(videoPath);
      } catch (error) {
        throw toDomainError(error, ErrorCode.SOURCE_DECODE_FAILED, `Cannot probe ${videoPath}.`, {
          context: videoPath,
        });
      }
      if (result.width === undefined || result.height === undefined) {
        throw createReelsmithError(
          ErrorCode.SOURCE_DECODE_FAILED,
          `${videoPath} has no video stream.`,
          { context: videoPath }
        );
      }
      return {
        path: videoPath,
        durationMs: result.durationMs,
        width: result.width,
        height: result.height,
      };
    },

    async writeAudio(audio: NormalizedAudio, outputPath: string): Promise<AudioTrackRef> {
      await mkdir(path.dirname(outputPath), { recursive: true });
      await writeFile(outputPath, samplesToPcmBuffer(audio.samples));
      return {
        path: outputPath,
        sampleRate: audio.sampleRate,
        channels: 1,
        encoding: 's16le',
        durationMs: audio.durationMs,
      };
    },

    async renderScene(spec: SceneRenderSpec): Promise<string> {
      const command = buildSceneCommand(spec, config);
      await mkdir(path.dirname(command.outputPath), { recursive: true });
      logger.debug?.('ffmpeg.scene.command', {
        sceneIndex: spec.sceneIndex,
        command: [command.ffmpegPath, ...command.args].join(' '),
      });

      try {
        await runFfmpeg(command.ffmpegPath, command.args, { signal });
      } catch (error) {
        const failingInput =
          error instanceof FfmpegProcessError
            ? findFailingInput(
                error.stderr,
                spec.segments.map((segment) => segment.source.path)
              )
            : undefined;
        throw toDomainError(
          error,
          ErrorCode.SOURCE_DECODE_FAILED,
          `Rendering scene ${spec.sceneIndex} failed.`,
          { sceneIndex: spec.sceneIndex, context: failingInput }
        );
      }
      return command.outputPath;
    },

    async probeDuration(clipPath: string): Promise<number> {
      try {
        return (await probe(clipPath)).durationMs;
      } catch (error) {
        throw toDomainError(error, ErrorCode.MISSING_ASSET, `Cannot measure ${clipPath}.`, {
          context: clipPath,
        });
      }
    },

    async encode(spec: ExportSpec): Promise<string> {
      const command = buildExportCommand(spec, config);
      await mkdir(path.dirname(command.outputPath), { recursive: true });
      logger.debug?.('ffmpeg.export.command', {
        command: [command.ffmpegPath, ...command.args].join(' '),
      });

      const totalSeconds = spec.totalDurationMs / 1000;
      let lastBucket = -1;
      try {
        await runFfmpeg(command.ffmpegPath, command.args, {
          signal,
          onProgress: (snapshot) => {
            const percent = Math.min(100, Math.floor((snapshot.timeSeconds / totalSeconds) * 100));
            const bucket = Math.floor(percent / PROGRESS_PERCENT_STEP);
            if (bucket <= lastBucket) {
              return;
            }
            lastBucket = bucket;
            logger.info?.('ffmpeg.export.progress', {
              percent,
              speed: snapshot.speed,
              fps: snapshot.fps,
            });
          },
        });
      } catch (error) {
        throw toDomainError(error, ErrorCode.EXPORT_FAILED, `Export to ${spec.outputPath} failed.`, {
          context: spec.outputPath,
        });
      }
      return command.outputPath;
    },
  };
}
