import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createReelsmithError, ErrorCode } from '../errors/index.js';
import type {
  AudioTrackRef,
  ExportSpec,
  MediaTool,
  SceneRenderSpec,
} from '../media/types.js';
import type { AudioAsset, NormalizedAudio, VideoAsset } from '../types.js';

export interface FakeMediaToolOptions {
  /** Decoded audio keyed by path */
  audio?: Record<string, AudioAsset>;
  /** Probed footage keyed by path */
  videos?: Record<string, VideoAsset>;
  /** Sources whose decode fails during scene render */
  brokenSources?: string[];
  /** Clips whose probe fails with SOURCE_DECODE_FAILED */
  undecodableVideos?: string[];
  /** Milliseconds each scene render waits before resolving, keyed by scene index */
  renderDelays?: Record<number, number>;
  /** Added to every probed clip duration */
  durationDriftMs?: number;
  /** Makes encode fail with this tool exit status */
  encodeExitCode?: number;
}

export interface FakeMediaTool extends MediaTool {
  readonly renderCalls: SceneRenderSpec[];
  readonly encodeCalls: ExportSpec[];
  readonly writtenAudio: AudioTrackRef[];
  /** Scene indices in the order their renders resolved */
  readonly completionOrder: number[];
}

/**
 * In-process MediaTool for tests. Nothing is decoded or encoded; rendered
 * clips live in memory and only the final export touches the filesystem.
 */
export function createFakeMediaTool(options: FakeMediaToolOptions = {}): FakeMediaTool {
  const clipDurations = new Map<string, number>();
  const brokenSources = new Set(options.brokenSources ?? []);
  const renderCalls: SceneRenderSpec[] = [];
  const encodeCalls: ExportSpec[] = [];
  const writtenAudio: AudioTrackRef[] = [];
  const completionOrder: number[] = [];

  return {
    renderCalls,
    encodeCalls,
    writtenAudio,
    completionOrder,

    async decodeAudio(audioPath: string): Promise<AudioAsset> {
      const asset = options.audio?.[audioPath];
      if (!asset) {
        throw createReelsmithError(
          ErrorCode.AUDIO_DECODE_FAILED,
          `Cannot decode audio at ${audioPath}.`,
          { context: audioPath }
        );
      }
      return asset;
    },

    async probeVideo(videoPath: string): Promise<VideoAsset> {
      if (options.undecodableVideos?.includes(videoPath)) {
        throw createReelsmithError(ErrorCode.SOURCE_DECODE_FAILED, `Cannot decode ${videoPath}.`, {
          context: videoPath,
        });
      }
      const asset = options.videos?.[videoPath];
      if (!asset) {
        throw createReelsmithError(ErrorCode.MISSING_ASSET, `No footage at ${videoPath}.`, {
          context: videoPath,
        });
      }
      return asset;
    },

    async writeAudio(audio: NormalizedAudio, outputPath: string): Promise<AudioTrackRef> {
      const ref: AudioTrackRef = {
        path: outputPath,
        sampleRate: audio.sampleRate,
        channels: 1,
        encoding: 's16le',
        durationMs: audio.durationMs,
      };
      writtenAudio.push(ref);
      return ref;
    },

    async renderScene(spec: SceneRenderSpec): Promise<string> {
      renderCalls.push(spec);
      const broken = spec.segments.find((segment) => brokenSources.has(segment.source.path));
      if (broken) {
        throw createReelsmithError(
          ErrorCode.SOURCE_DECODE_FAILED,
          `Cannot decode ${broken.source.path}.`,
          { sceneIndex: spec.sceneIndex, context: broken.source.path }
        );
      }
      const delay = options.renderDelays?.[spec.sceneIndex] ?? 0;
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
      const rendered = spec.segments.reduce((sum, segment) => sum + segment.durationMs, 0);
      clipDurations.set(spec.outputPath, rendered + (options.durationDriftMs ?? 0));
      completionOrder.push(spec.sceneIndex);
      return spec.outputPath;
    },

    async probeDuration(clipPath: string): Promise<number> {
      const duration = clipDurations.get(clipPath);
      if (duration === undefined) {
        throw createReelsmithError(ErrorCode.MISSING_ASSET, `No rendered clip at ${clipPath}.`, {
          context: clipPath,
        });
      }
      return duration;
    },

    async encode(spec: ExportSpec): Promise<string> {
      encodeCalls.push(spec);
      if (options.encodeExitCode !== undefined) {
        throw createReelsmithError(ErrorCode.EXPORT_FAILED, 'Encoder exited with an error.', {
          exitCode: options.encodeExitCode,
          context: spec.outputPath,
        });
      }
      await mkdir(path.dirname(spec.outputPath), { recursive: true });
      await writeFile(spec.outputPath, `fake-export:${spec.totalDurationMs}`);
      return spec.outputPath;
    },
  };
}
