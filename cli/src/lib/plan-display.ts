import chalk from 'chalk';
import type { CompositionPlan, ComposeResult } from '@reelsmith/core';

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(3)}s`;
}

/**
 * Human-readable summary of a dry run: one line per scene, then the joins.
 */
export function formatCompositionPlan(plan: CompositionPlan): string[] {
  const lines: string[] = [];
  const sceneLabel = plan.scenes.length === 1 ? 'scene' : 'scenes';
  lines.push(
    chalk.bold(`Plan: ${plan.scenes.length} ${sceneLabel}, ${seconds(plan.timeline.totalDurationMs)} total`)
  );
  lines.push(
    plan.avatarSceneIndex === null
      ? chalk.dim('Avatar: none')
      : `Avatar: scene ${plan.avatarSceneIndex}`
  );

  for (const scene of plan.scenes) {
    const { timeline } = scene;
    const sources = scene.hasAvatar
      ? 'avatar loop'
      : `${scene.primaryPath} | ${scene.secondaryPath ?? scene.primaryPath}`;
    lines.push(
      `  Scene ${scene.index}: ${seconds(timeline.totalDurationMs)} ` +
        `(A ${seconds(timeline.splitPointMs)}, B ${seconds(timeline.totalDurationMs - timeline.splitPointMs)}) ${sources}`
    );
  }

  if (plan.timeline.transitions.length === 0) {
    lines.push(chalk.dim('Transitions: none'));
  } else {
    lines.push('Transitions:');
    for (const transition of plan.timeline.transitions) {
      const [from, to] = transition.between;
      lines.push(
        `  ${from} -> ${to}: ${transition.kind} at ${seconds(transition.offsetMs)} (${transition.overlapMs} ms)`
      );
    }
  }
  return lines;
}

export function formatComposeSummary(result: ComposeResult): string[] {
  return [
    chalk.green(`Exported ${result.outputPath}`),
    `  ${result.clips.length} scenes, ${result.timeline.transitions.length} transitions, ${seconds(result.timeline.totalDurationMs)}`,
    result.avatarSceneIndex === null
      ? chalk.dim('  Avatar: none')
      : `  Avatar: scene ${result.avatarSceneIndex}`,
  ];
}
