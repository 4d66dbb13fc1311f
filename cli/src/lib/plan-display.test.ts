import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import chalk from 'chalk';
import type { CompositionPlan } from '@reelsmith/core';
import { formatCompositionPlan } from './plan-display.js';

const plan: CompositionPlan = {
  avatarSceneIndex: 1,
  scenes: [
    {
      index: 0,
      narration: 'Hook.',
      audioDurationMs: 4001,
      trimmedLeadingMs: 0,
      trimmedTrailingMs: 0,
      timeline: {
        sceneIndex: 0,
        totalDurationMs: 4001,
        splitPointMs: 2001,
        halfA: { startMs: 0, endMs: 2001 },
        halfB: { startMs: 2001, endMs: 4001 },
        usesSecondarySource: false,
      },
      primaryPath: '/clips/reef.mp4',
      hasAvatar: false,
    },
    {
      index: 1,
      narration: 'Fact.',
      audioDurationMs: 6000,
      trimmedLeadingMs: 0,
      trimmedTrailingMs: 0,
      timeline: {
        sceneIndex: 1,
        totalDurationMs: 6000,
        splitPointMs: 3000,
        halfA: { startMs: 0, endMs: 3000 },
        halfB: { startMs: 3000, endMs: 6000 },
        usesSecondarySource: true,
      },
      primaryPath: '/clips/reef.mp4',
      secondaryPath: '/clips/kelp.mp4',
      hasAvatar: true,
    },
  ],
  timeline: {
    clips: [],
    transitions: [{ between: [0, 1], kind: 'slide-up', overlapMs: 500, offsetMs: 3501 }],
    totalDurationMs: 9501,
  },
};

describe('formatCompositionPlan', () => {
  const previousLevel = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = previousLevel;
  });

  it('lists scenes, halves and transitions', () => {
    expect(formatCompositionPlan(plan)).toEqual([
      'Plan: 2 scenes, 9.501s total',
      'Avatar: scene 1',
      '  Scene 0: 4.001s (A 2.001s, B 2.000s) /clips/reef.mp4 | /clips/reef.mp4',
      '  Scene 1: 6.000s (A 3.000s, B 3.000s) avatar loop',
      'Transitions:',
      '  0 -> 1: slide-up at 3.501s (500 ms)',
    ]);
  });
});
