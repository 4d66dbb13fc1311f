import path from 'node:path';
import { frameIntervalMs, type ComposeConfig } from '../config.js';
import {
  createReelsmithError,
  ErrorCode,
  hasErrorCode,
  type ReelsmithError,
} from '../errors/index.js';
import type { Logger } from '../logger.js';
import type {
  AudioTrackRef,
  MediaTool,
  RenderSegment,
  SceneRenderSpec,
  SegmentFit,
} from '../media/types.js';
import { spanLength } from '../timeline/scene-timeline.js';
import type { RenderedClip, Scene, SceneTimeline, VideoAsset } from '../types.js';
import { buildSceneCaption } from './captions.js';

export interface SceneRendererOptions {
  tool: MediaTool;
  config: ComposeConfig;
  logger?: Partial<Logger>;
}

export interface SceneRenderRequest {
  scene: Scene;
  timeline: SceneTimeline;
  audio: AudioTrackRef;
  /** Present only for the scene drawn as the avatar slot */
  avatar?: VideoAsset;
  workDir: string;
}

export interface SceneRenderer {
  render(request: SceneRenderRequest): Promise<RenderedClip>;
}

export function resolveSegmentFit(sourceDurationMs: number, spanMs: number): SegmentFit {
  return sourceDurationMs < spanMs ? 'loop' : 'trim';
}

/**
 * Lays out the video segments for one scene: a single looped avatar segment,
 * or the A/B split with the primary filling half A and the secondary (or the
 * primary again) filling half B. `avatarCropBottomPx` trims the avatar
 * frame before scaling.
 */
export function planSceneSegments(
  scene: Scene,
  timeline: SceneTimeline,
  avatar?: VideoAsset,
  avatarCropBottomPx = 0
): RenderSegment[] {
  if (avatar) {
    const segment: RenderSegment = {
      role: 'avatar',
      source: avatar,
      startMs: 0,
      durationMs: timeline.totalDurationMs,
      fit: resolveSegmentFit(avatar.durationMs, timeline.totalDurationMs),
    };
    return [avatarCropBottomPx > 0 ? { ...segment, cropBottomPx: avatarCropBottomPx } : segment];
  }

  const secondary = scene.secondarySource ?? scene.primarySource;
  const lengthA = spanLength(timeline.halfA);
  const lengthB = spanLength(timeline.halfB);

  return [
    {
      role: 'primary',
      source: scene.primarySource,
      startMs: timeline.halfA.startMs,
      durationMs: lengthA,
      fit: resolveSegmentFit(scene.primarySource.durationMs, lengthA),
    },
    {
      role: 'secondary',
      source: secondary,
      startMs: timeline.halfB.startMs,
      durationMs: lengthB,
      fit: resolveSegmentFit(secondary.durationMs, lengthB),
    },
  ];
}

/**
 * Swaps the source that failed to decode for the other half's source.
 * Returns null when the failing source cannot be identified or has no distinct
 * alternate (avatar scenes, or scenes whose halves share one clip).
 */
export function substituteFailedSource(
  spec: SceneRenderSpec,
  error: ReelsmithError
): SceneRenderSpec | null {
  const failedIndex = spec.segments.findIndex(
    (segment) => segment.role !== 'avatar' && segment.source.path === error.context
  );
  if (failedIndex < 0) {
    return null;
  }
  const alternate = spec.segments.find(
    (segment, index) => index !== failedIndex && segment.source.path !== error.context
  );
  if (!alternate) {
    return null;
  }

  return {
    ...spec,
    segments: spec.segments.map((segment, index) =>
      index === failedIndex
        ? {
            ...segment,
            source: alternate.source,
            fit: resolveSegmentFit(alternate.source.durationMs, segment.durationMs),
          }
        : segment
    ),
  };
}

export function sceneClipPath(workDir: string, sceneIndex: number): string {
  return path.join(workDir, `scene-${sceneIndex}.mp4`);
}

export function createSceneRenderer(options: SceneRendererOptions): SceneRenderer {
  const { tool, config } = options;
  const logger = options.logger ?? {};
  const toleranceMs = frameIntervalMs(config);

  async function renderWithRetry(spec: SceneRenderSpec): Promise<string> {
    try {
      return await tool.renderScene(spec);
    } catch (error) {
      if (!hasErrorCode(error, ErrorCode.SOURCE_DECODE_FAILED)) {
        throw error;
      }
      const retrySpec = substituteFailedSource(spec, error);
      if (!retrySpec) {
        throw error;
      }
      logger.warn?.('render.scene.retry', {
        sceneIndex: spec.sceneIndex,
        failedSource: error.context,
        substitute: retrySpec.segments.map((segment) => segment.source.path),
      });
      return tool.renderScene(retrySpec);
    }
  }

  return {
    async render(request: SceneRenderRequest): Promise<RenderedClip> {
      const { scene, timeline, audio, avatar, workDir } = request;

      if (audio.durationMs !== timeline.totalDurationMs) {
        throw createReelsmithError(
          ErrorCode.TIMING_VIOLATION,
          `Scene ${scene.index} audio lasts ${audio.durationMs} ms but its timeline spans ${timeline.totalDurationMs} ms.`,
          { sceneIndex: scene.index }
        );
      }

      const spec: SceneRenderSpec = {
        sceneIndex: scene.index,
        outputPath: sceneClipPath(workDir, scene.index),
        durationMs: timeline.totalDurationMs,
        segments: planSceneSegments(scene, timeline, avatar, config.avatar.cropBottomPx),
        audio,
        frame: config.video,
        caption: buildSceneCaption(scene.narrationText, config.captions),
      };

      logger.debug?.('render.scene.start', {
        sceneIndex: scene.index,
        durationMs: spec.durationMs,
        avatar: Boolean(avatar),
        segments: spec.segments.map((segment) => ({
          role: segment.role,
          source: segment.source.path,
          durationMs: segment.durationMs,
          fit: segment.fit,
        })),
      });

      const outputPath = await renderWithRetry(spec);
      const measuredMs = await tool.probeDuration(outputPath);
      const driftMs = Math.abs(measuredMs - timeline.totalDurationMs);
      if (driftMs > toleranceMs) {
        throw createReelsmithError(
          ErrorCode.TIMING_VIOLATION,
          `Scene ${scene.index} rendered to ${measuredMs} ms, expected ${timeline.totalDurationMs} ms (tolerance ${toleranceMs.toFixed(2)} ms).`,
          { sceneIndex: scene.index, context: outputPath }
        );
      }

      logger.info?.('render.scene.done', {
        sceneIndex: scene.index,
        durationMs: timeline.totalDurationMs,
        measuredMs,
        avatar: Boolean(avatar),
      });

      // The clip keeps the timeline duration; the measured drift is under a frame.
      return {
        sceneIndex: scene.index,
        path: outputPath,
        durationMs: timeline.totalDurationMs,
        hasAvatar: Boolean(avatar),
      };
    },
  };
}
