import type { TransitionConfig } from '../config.js';
import { createReelsmithError, ErrorCode } from '../errors/index.js';
import type { Logger } from '../logger.js';
import { pickOne, type RandomSource } from '../random.js';
import type { FinalTimeline, RenderedClip, Transition } from '../types.js';

export interface StitchOptions {
  transitions: TransitionConfig;
  random: RandomSource;
  logger?: Partial<Logger>;
}

/**
 * Orders clips by scene index and fails unless the indices run 0..N-1.
 * Completion order of the scene workers never leaks into the result.
 */
export function orderClips(clips: readonly RenderedClip[]): RenderedClip[] {
  const ordered = [...clips].sort((a, b) => a.sceneIndex - b.sceneIndex);
  ordered.forEach((clip, position) => {
    if (clip.sceneIndex !== position) {
      throw createReelsmithError(
        ErrorCode.INVALID_SCENE_ORDER,
        `Expected scene ${position} at position ${position}, found scene ${clip.sceneIndex}.`,
        { sceneIndex: clip.sceneIndex }
      );
    }
  });
  return ordered;
}

/**
 * Joins rendered clips into the logical final timeline. Every join consumes
 * `overlapMs` from both neighbours, so the total is the sum of the clips minus
 * one overlap per join.
 *
 * @throws ReelsmithError (TRANSITION_OVERLAP) when the overlap is not shorter
 *   than every clip
 */
export function stitchClips(
  clips: readonly RenderedClip[],
  options: StitchOptions
): FinalTimeline {
  const logger = options.logger ?? {};
  const ordered = orderClips(clips);

  if (ordered.length === 0) {
    throw createReelsmithError(ErrorCode.INVALID_SCENE_ORDER, 'No clips to stitch.');
  }
  if (ordered.length === 1) {
    return { clips: ordered, transitions: [], totalDurationMs: ordered[0]?.durationMs ?? 0 };
  }

  const { overlapMs, kinds } = options.transitions;
  const shortest = ordered.reduce((min, clip) => (clip.durationMs < min.durationMs ? clip : min));
  if (overlapMs >= shortest.durationMs) {
    throw createReelsmithError(
      ErrorCode.TRANSITION_OVERLAP,
      `Transition overlap of ${overlapMs} ms does not fit scene ${shortest.sceneIndex} (${shortest.durationMs} ms).`,
      {
        sceneIndex: shortest.sceneIndex,
        suggestion: 'Lower transitions.overlapMs or lengthen the scene narration.',
      }
    );
  }

  const transitions: Transition[] = [];
  let runningMs = 0;
  ordered.forEach((clip, position) => {
    if (position === 0) {
      runningMs = clip.durationMs;
      return;
    }
    const transition: Transition = {
      between: [position - 1, position],
      kind: pickOne(options.random, kinds),
      overlapMs,
      offsetMs: runningMs - overlapMs,
    };
    transitions.push(transition);
    logger.debug?.('stitch.transition', { ...transition });
    runningMs += clip.durationMs - overlapMs;
  });

  const totalDurationMs = runningMs;
  logger.info?.('stitch.done', {
    clips: ordered.length,
    transitions: transitions.length,
    totalDurationMs,
  });

  return { clips: ordered, transitions, totalDurationMs };
}
