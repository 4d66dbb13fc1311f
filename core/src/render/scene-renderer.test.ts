import { describe, it, expect, vi } from 'vitest';
import { COMPOSE_DEFAULTS } from '../config.js';
import { ErrorCode, type ReelsmithError } from '../errors/index.js';
import type { AudioTrackRef } from '../media/types.js';
import { createFakeMediaTool, createToneAsset, createVideoAsset } from '../testing/index.js';
import { buildSceneTimeline } from '../timeline/scene-timeline.js';
import type { Scene } from '../types.js';
import { createSceneRenderer, planSceneSegments, sceneClipPath } from './scene-renderer.js';

const primary = createVideoAsset('/footage/reef.mp4', 10_000);
const secondary = createVideoAsset('/footage/kelp.mp4', 1_000);
const avatar = createVideoAsset('/footage/avatar.mp4', 3_000);

function makeScene(overrides: Partial<Scene> = {}): Scene {
  return {
    index: 2,
    narrationText: 'Coral reefs cover less than one percent of the ocean floor',
    primarySource: primary,
    secondarySource: secondary,
    audio: createToneAsset(4001),
    ...overrides,
  };
}

function audioRef(durationMs: number): AudioTrackRef {
  return {
    path: '/work/scene-2.pcm',
    sampleRate: 1000,
    channels: 1,
    encoding: 's16le',
    durationMs,
  };
}

describe('planSceneSegments', () => {
  it('fills half A from the primary and half B from the secondary', () => {
    const timeline = buildSceneTimeline({
      sceneIndex: 2,
      totalDurationMs: 4001,
      hasSecondarySource: true,
    });

    expect(planSceneSegments(makeScene(), timeline)).toEqual([
      { role: 'primary', source: primary, startMs: 0, durationMs: 2001, fit: 'trim' },
      { role: 'secondary', source: secondary, startMs: 2001, durationMs: 2000, fit: 'loop' },
    ]);
  });

  it('uses the primary for both halves when the secondary is missing', () => {
    const scene = makeScene({ secondarySource: undefined });
    const timeline = buildSceneTimeline({
      sceneIndex: 2,
      totalDurationMs: 6000,
      hasSecondarySource: false,
    });

    const segments = planSceneSegments(scene, timeline);

    expect(segments.map((segment) => segment.source.path)).toEqual([
      '/footage/reef.mp4',
      '/footage/reef.mp4',
    ]);
    expect(segments.reduce((sum, segment) => sum + segment.durationMs, 0)).toBe(6000);
  });

  it('loops the avatar across the whole scene', () => {
    const timeline = buildSceneTimeline({
      sceneIndex: 2,
      totalDurationMs: 5000,
      hasSecondarySource: true,
    });

    expect(planSceneSegments(makeScene(), timeline, avatar)).toEqual([
      { role: 'avatar', source: avatar, startMs: 0, durationMs: 5000, fit: 'loop' },
    ]);
  });

  it('carries the avatar bottom crop onto the avatar segment only', () => {
    const timeline = buildSceneTimeline({
      sceneIndex: 2,
      totalDurationMs: 5000,
      hasSecondarySource: true,
    });

    expect(planSceneSegments(makeScene(), timeline, avatar, 150)).toEqual([
      { role: 'avatar', source: avatar, startMs: 0, durationMs: 5000, fit: 'loop', cropBottomPx: 150 },
    ]);
    expect(
      planSceneSegments(makeScene(), timeline, undefined, 150).every(
        (segment) => segment.cropBottomPx === undefined
      )
    ).toBe(true);
  });
});

describe('createSceneRenderer', () => {
  const timeline = buildSceneTimeline({
    sceneIndex: 2,
    totalDurationMs: 4001,
    hasSecondarySource: true,
  });

  it('renders a clip matching the timeline duration', async () => {
    const tool = createFakeMediaTool();
    const renderer = createSceneRenderer({ tool, config: COMPOSE_DEFAULTS });

    const clip = await renderer.render({
      scene: makeScene(),
      timeline,
      audio: audioRef(4001),
      workDir: '/work',
    });

    expect(clip).toEqual({
      sceneIndex: 2,
      path: sceneClipPath('/work', 2),
      durationMs: 4001,
      hasAvatar: false,
    });
    expect(tool.renderCalls).toHaveLength(1);
    expect(tool.renderCalls[0]?.frame).toEqual({ width: 1080, height: 1920, frameRate: 30 });
    expect(tool.renderCalls[0]?.caption).toBeUndefined();
  });

  it('attaches captions when enabled', async () => {
    const tool = createFakeMediaTool();
    const renderer = createSceneRenderer({
      tool,
      config: { ...COMPOSE_DEFAULTS, captions: { ...COMPOSE_DEFAULTS.captions, enabled: true } },
    });

    await renderer.render({ scene: makeScene(), timeline, audio: audioRef(4001), workDir: '/work' });

    expect(tool.renderCalls[0]?.caption?.lines.map((line) => line.text)).toEqual([
      'Coral reefs cover less',
      'than one percent of the',
      'ocean floor',
    ]);
  });

  it('rejects audio that does not match the timeline', async () => {
    const renderer = createSceneRenderer({ tool: createFakeMediaTool(), config: COMPOSE_DEFAULTS });

    await expect(
      renderer.render({ scene: makeScene(), timeline, audio: audioRef(4000), workDir: '/work' })
    ).rejects.toMatchObject({ code: ErrorCode.TIMING_VIOLATION, sceneIndex: 2 });
  });

  it('accepts drift within one frame interval', async () => {
    const tool = createFakeMediaTool({ durationDriftMs: 33 });
    const renderer = createSceneRenderer({ tool, config: COMPOSE_DEFAULTS });

    const clip = await renderer.render({
      scene: makeScene(),
      timeline,
      audio: audioRef(4001),
      workDir: '/work',
    });

    expect(clip.durationMs).toBe(4001);
  });

  it('fails when the rendered clip drifts more than one frame', async () => {
    const tool = createFakeMediaTool({ durationDriftMs: 34 });
    const renderer = createSceneRenderer({ tool, config: COMPOSE_DEFAULTS });

    await expect(
      renderer.render({ scene: makeScene(), timeline, audio: audioRef(4001), workDir: '/work' })
    ).rejects.toMatchObject({ code: ErrorCode.TIMING_VIOLATION });
  });

  it('retries once with the alternate source when one half fails to decode', async () => {
    const tool = createFakeMediaTool({ brokenSources: ['/footage/kelp.mp4'] });
    const warn = vi.fn();
    const renderer = createSceneRenderer({ tool, config: COMPOSE_DEFAULTS, logger: { warn } });

    const clip = await renderer.render({
      scene: makeScene(),
      timeline,
      audio: audioRef(4001),
      workDir: '/work',
    });

    expect(clip.durationMs).toBe(4001);
    expect(tool.renderCalls).toHaveLength(2);
    expect(tool.renderCalls[1]?.segments).toEqual([
      { role: 'primary', source: primary, startMs: 0, durationMs: 2001, fit: 'trim' },
      { role: 'secondary', source: primary, startMs: 2001, durationMs: 2000, fit: 'trim' },
    ]);
    expect(warn).toHaveBeenCalledWith(
      'render.scene.retry',
      expect.objectContaining({ sceneIndex: 2, failedSource: '/footage/kelp.mp4' })
    );
  });

  it('fails the scene when both sources fail to decode', async () => {
    const tool = createFakeMediaTool({
      brokenSources: ['/footage/kelp.mp4', '/footage/reef.mp4'],
    });
    const renderer = createSceneRenderer({ tool, config: COMPOSE_DEFAULTS });

    const error: ReelsmithError = await renderer
      .render({ scene: makeScene(), timeline, audio: audioRef(4001), workDir: '/work' })
      .then(
        () => {
          throw new Error('expected failure');
        },
        (reason: ReelsmithError) => reason
      );

    expect(error.code).toBe(ErrorCode.SOURCE_DECODE_FAILED);
    expect(tool.renderCalls).toHaveLength(2);
  });

  it('does not retry when the scene has a single source', async () => {
    const tool = createFakeMediaTool({ brokenSources: ['/footage/reef.mp4'] });
    const renderer = createSceneRenderer({ tool, config: COMPOSE_DEFAULTS });

    await expect(
      renderer.render({
        scene: makeScene({ secondarySource: undefined }),
        timeline,
        audio: audioRef(4001),
        workDir: '/work',
      })
    ).rejects.toMatchObject({ code: ErrorCode.SOURCE_DECODE_FAILED });
    expect(tool.renderCalls).toHaveLength(1);
  });
});
