import { mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import { normalizeAudio } from '../audio/normalizer.js';
import type { ComposeConfig } from '../config.js';
import { createReelsmithError, ErrorCode, hasErrorCode } from '../errors/index.js';
import { exportTimeline } from '../export/exporter.js';
import type { Logger } from '../logger.js';
import type { MediaTool } from '../media/types.js';
import { mathRandomSource, type RandomSource } from '../random.js';
import { createSceneRenderer, sceneClipPath } from '../render/scene-renderer.js';
import { assembleScene, type SceneScript, type SceneSources } from '../sources.js';
import { stitchClips } from '../stitch/transition-stitcher.js';
import { selectAvatarSlot } from '../timeline/avatar-slot.js';
import { buildSceneTimeline } from '../timeline/scene-timeline.js';
import type {
  Clock,
  ComposeProgressEvent,
  ComposeStage,
  FinalTimeline,
  NormalizedAudio,
  RenderedClip,
  Scene,
  SceneTimeline,
  VideoAsset,
} from '../types.js';
import { runScenePool } from './scene-pool.js';

export interface ComposeRequest {
  scenes: SceneScript[];
  outputPath: string;
  /** Scratch directory for per-scene audio and clips */
  workDir: string;
  avatarPath?: string;
  config: ComposeConfig;
  /** Remove the work directory after a successful export */
  cleanWorkDir?: boolean;
}

export interface ComposeDependencies extends SceneSources {
  tool: MediaTool;
  random?: RandomSource;
  logger?: Partial<Logger>;
  clock?: Clock;
  onProgress?: (event: ComposeProgressEvent) => void;
}

export interface ComposeResult {
  outputPath: string;
  timeline: FinalTimeline;
  /** Scene rendered from the avatar loop, or null when none was */
  avatarSceneIndex: number | null;
  clips: RenderedClip[];
}

export interface PlannedScene {
  index: number;
  narration: string;
  audioDurationMs: number;
  trimmedLeadingMs: number;
  trimmedTrailingMs: number;
  timeline: SceneTimeline;
  primaryPath: string;
  secondaryPath?: string;
  hasAvatar: boolean;
}

export interface CompositionPlan {
  scenes: PlannedScene[];
  avatarSceneIndex: number | null;
  /** Transition plan over the nominal clip durations */
  timeline: FinalTimeline;
}

interface PreparedScene {
  scene: Scene;
  audio: NormalizedAudio;
  timeline: SceneTimeline;
}

interface RunContext {
  request: ComposeRequest;
  deps: ComposeDependencies;
  logger: Partial<Logger>;
  random: RandomSource;
  emit(
    type: ComposeProgressEvent['type'],
    stage: ComposeStage,
    message: string,
    sceneIndex?: number
  ): void;
}

function createRunContext(request: ComposeRequest, deps: ComposeDependencies): RunContext {
  const clock = deps.clock ?? { now: () => new Date().toISOString() };
  return {
    request,
    deps,
    logger: deps.logger ?? {},
    random: deps.random ?? mathRandomSource,
    emit(type, stage, message, sceneIndex) {
      deps.onProgress?.({ type, stage, timestamp: clock.now(), message, sceneIndex });
    },
  };
}

function validateRequest(request: ComposeRequest): void {
  if (request.scenes.length === 0) {
    throw createReelsmithError(ErrorCode.INVALID_PROJECT, 'A composition needs at least one scene.');
  }
}

async function prepareScene(sceneIndex: number, ctx: RunContext): Promise<PreparedScene> {
  const script = ctx.request.scenes[sceneIndex];
  if (!script) {
    throw createReelsmithError(ErrorCode.INVALID_SCENE_ORDER, `No scene at index ${sceneIndex}.`, {
      sceneIndex,
    });
  }
  const scene = await assembleScene(sceneIndex, script, ctx.deps);
  const audio = normalizeAudio(sceneIndex, scene.audio, ctx.request.config.audio);
  const timeline = buildSceneTimeline({
    sceneIndex,
    totalDurationMs: audio.durationMs,
    hasSecondarySource: scene.secondarySource !== undefined,
    rounding: ctx.request.config.splitRounding,
  });

  ctx.logger.debug?.('compose.scene.prepared', {
    sceneIndex,
    durationMs: audio.durationMs,
    splitPointMs: timeline.splitPointMs,
    trimmedLeadingMs: audio.trimmedLeadingMs,
    trimmedTrailingMs: audio.trimmedTrailingMs,
  });
  return { scene, audio, timeline };
}

/**
 * Draws the avatar slot and resolves the avatar clip for it. A missing avatar
 * fails the run only when the config requires one; otherwise the slot falls
 * back to stock footage.
 */
async function resolveAvatarSlot(
  ctx: RunContext
): Promise<{ sceneIndex: number; asset: VideoAsset } | null> {
  const { request, deps } = ctx;
  const slot = selectAvatarSlot(request.scenes.length, ctx.random, request.config.avatar);
  if (slot === null) {
    ctx.logger.debug?.('compose.avatar.none', { sceneCount: request.scenes.length });
    return null;
  }

  let asset: VideoAsset | undefined;
  if (request.avatarPath) {
    try {
      asset = await deps.footage.resolveAvatar(request.avatarPath);
    } catch (error) {
      if (!hasErrorCode(error, ErrorCode.MISSING_ASSET)) {
        throw error;
      }
    }
  }

  if (!asset) {
    if (request.config.avatar.required) {
      throw createReelsmithError(
        ErrorCode.MISSING_AVATAR_ASSET,
        `Scene ${slot} was drawn for the avatar but no avatar clip is available.`,
        {
          sceneIndex: slot,
          context: request.avatarPath,
          suggestion: 'Set "avatar" in the project or disable avatar.required.',
        }
      );
    }
    const message = `No avatar clip available; scene ${slot} uses stock footage.`;
    ctx.logger.warn?.('compose.avatar.missing', { sceneIndex: slot, avatarPath: request.avatarPath });
    ctx.emit('warning', 'render', message, slot);
    return null;
  }

  ctx.logger.info?.('compose.avatar.selected', { sceneIndex: slot, avatarPath: asset.path });
  return { sceneIndex: slot, asset };
}

/**
 * Decodes and normalizes every scene, lays out timelines, draws the avatar
 * slot and the transitions. Renders nothing. Draws from the random source in
 * the same order as composeVideo, so a seeded plan predicts the seeded run.
 */
export async function planComposition(
  request: ComposeRequest,
  deps: ComposeDependencies
): Promise<CompositionPlan> {
  validateRequest(request);
  const ctx = createRunContext(request, deps);

  const avatar = await resolveAvatarSlot(ctx);
  const prepared = await runScenePool(request.scenes.length, request.config.concurrency, (index) =>
    prepareScene(index, ctx)
  );
  const timeline = stitchClips(
    prepared.map(({ scene, timeline: sceneTimeline }) => ({
      sceneIndex: scene.index,
      path: sceneClipPath(request.workDir, scene.index),
      durationMs: sceneTimeline.totalDurationMs,
      hasAvatar: avatar?.sceneIndex === scene.index,
    })),
    { transitions: request.config.transitions, random: ctx.random, logger: ctx.logger }
  );

  return {
    scenes: prepared.map(({ scene, audio, timeline: sceneTimeline }) => ({
      index: scene.index,
      narration: scene.narrationText,
      audioDurationMs: audio.durationMs,
      trimmedLeadingMs: audio.trimmedLeadingMs,
      trimmedTrailingMs: audio.trimmedTrailingMs,
      timeline: sceneTimeline,
      primaryPath: scene.primarySource.path,
      secondaryPath: scene.secondarySource?.path,
      hasAvatar: avatar?.sceneIndex === scene.index,
    })),
    avatarSceneIndex: avatar?.sceneIndex ?? null,
    timeline,
  };
}

/**
 * Runs the whole composition: scenes in parallel on the worker pool, then the
 * stitch and the export in sequence. Any scene failure fails the run before
 * anything is exported.
 */
export async function composeVideo(
  request: ComposeRequest,
  deps: ComposeDependencies
): Promise<ComposeResult> {
  validateRequest(request);
  const ctx = createRunContext(request, deps);
  const { config, workDir } = request;
  const { logger } = ctx;

  await mkdir(workDir, { recursive: true });
  logger.info?.('compose.start', {
    scenes: request.scenes.length,
    outputPath: request.outputPath,
    workDir,
    concurrency: config.concurrency,
  });

  const avatar = await resolveAvatarSlot(ctx);
  const renderer = createSceneRenderer({ tool: deps.tool, config, logger });

  ctx.emit('stage-start', 'render', `Rendering ${request.scenes.length} scenes`);
  const clips = await runScenePool(request.scenes.length, config.concurrency, async (index) => {
    const { scene, audio, timeline } = await prepareScene(index, ctx);
    const audioRef = await deps.tool.writeAudio(audio, path.join(workDir, `scene-${index}.pcm`));
    const clip = await renderer.render({
      scene,
      timeline,
      audio: audioRef,
      avatar: avatar?.sceneIndex === index ? avatar.asset : undefined,
      workDir,
    });
    logger.info?.('compose.scene.rendered', { sceneIndex: index, durationMs: clip.durationMs });
    ctx.emit('scene-complete', 'render', `Scene ${index} rendered`, index);
    return clip;
  });
  ctx.emit('stage-complete', 'render', `Rendered ${clips.length} scenes`);

  ctx.emit('stage-start', 'stitch', 'Planning transitions');
  const timeline = stitchClips(clips, {
    transitions: config.transitions,
    random: ctx.random,
    logger,
  });
  ctx.emit('stage-complete', 'stitch', `Timeline is ${timeline.totalDurationMs} ms`);

  ctx.emit('stage-start', 'export', `Exporting ${request.outputPath}`);
  const outputPath = await exportTimeline(timeline, {
    tool: deps.tool,
    outputPath: request.outputPath,
    frame: config.video,
    logger,
  });
  ctx.emit('stage-complete', 'export', `Exported ${outputPath}`);

  if (request.cleanWorkDir) {
    ctx.emit('stage-start', 'cleanup', `Removing ${workDir}`);
    await rm(workDir, { recursive: true, force: true });
    ctx.emit('stage-complete', 'cleanup', 'Work directory removed');
  }

  logger.info?.('compose.done', {
    outputPath,
    totalDurationMs: timeline.totalDurationMs,
    avatarSceneIndex: avatar?.sceneIndex ?? null,
  });

  return {
    outputPath,
    timeline,
    avatarSceneIndex: avatar?.sceneIndex ?? null,
    clips: [...timeline.clips],
  };
}
