import type { SplitRounding } from '../config.js';
import { createReelsmithError, ErrorCode } from '../errors/index.js';
import type { SceneTimeline, TimeSpan } from '../types.js';

export interface SceneTimelineInput {
  sceneIndex: number;
  totalDurationMs: number;
  hasSecondarySource: boolean;
  rounding?: SplitRounding;
}

/**
 * Splits a scene into the two halves rendered from the primary and secondary
 * sources. Half A takes the extra millisecond when the total is odd.
 *
 * Both halves are computed even without a secondary source, so the renderer
 * runs the same split path for every scene.
 */
export function buildSceneTimeline(input: SceneTimelineInput): SceneTimeline {
  const { sceneIndex, totalDurationMs, hasSecondarySource } = input;

  if (!Number.isInteger(totalDurationMs) || totalDurationMs <= 0) {
    throw createReelsmithError(
      ErrorCode.TIMING_VIOLATION,
      `Scene ${sceneIndex} has a non-positive or fractional duration (${totalDurationMs} ms).`,
      { sceneIndex }
    );
  }

  const splitPointMs = computeSplitPoint(totalDurationMs, input.rounding ?? 'half-up');
  const timeline: SceneTimeline = {
    sceneIndex,
    totalDurationMs,
    splitPointMs,
    halfA: { startMs: 0, endMs: splitPointMs },
    halfB: { startMs: splitPointMs, endMs: totalDurationMs },
    usesSecondarySource: hasSecondarySource,
  };

  assertTimelineExact(timeline);
  return timeline;
}

export function computeSplitPoint(totalDurationMs: number, rounding: SplitRounding): number {
  switch (rounding) {
    case 'half-up':
      return Math.floor(totalDurationMs / 2 + 0.5);
  }
}

export function spanLength(span: TimeSpan): number {
  return span.endMs - span.startMs;
}

/**
 * Verifies the halves tile the scene with no gap, no overlap, and at most one
 * millisecond of imbalance.
 *
 * @throws ReelsmithError (TIMING_VIOLATION)
 */
export function assertTimelineExact(timeline: SceneTimeline): void {
  const { halfA, halfB, totalDurationMs, sceneIndex } = timeline;
  const lengthA = spanLength(halfA);
  const lengthB = spanLength(halfB);

  const violations: string[] = [];
  if (halfA.startMs !== 0) {
    violations.push(`half A starts at ${halfA.startMs} ms`);
  }
  if (halfA.endMs !== halfB.startMs) {
    violations.push(`halves meet at ${halfA.endMs}/${halfB.startMs} ms`);
  }
  if (halfB.endMs !== totalDurationMs) {
    violations.push(`half B ends at ${halfB.endMs} ms`);
  }
  if (lengthA + lengthB !== totalDurationMs) {
    violations.push(`halves sum to ${lengthA + lengthB} ms`);
  }
  if (Math.abs(lengthA - lengthB) > 1) {
    violations.push(`halves differ by ${Math.abs(lengthA - lengthB)} ms`);
  }

  if (violations.length > 0) {
    throw createReelsmithError(
      ErrorCode.TIMING_VIOLATION,
      `Scene ${sceneIndex} timeline is not exact for ${totalDurationMs} ms: ${violations.join(', ')}.`,
      { sceneIndex }
    );
  }
}
