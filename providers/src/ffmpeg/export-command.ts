import { createReelsmithError, ErrorCode, type ExportSpec } from '@reelsmith/core';
import { formatSeconds, XFADE_TRANSITIONS } from './filters.js';
import type { FfmpegCommand, FfmpegToolConfig } from './types.js';

/**
 * Builds the filter graph that chains xfade (video) and acrossfade (audio)
 * across all clips. Returns null for a single clip, which needs no graph.
 */
export function buildTransitionGraph(
  spec: ExportSpec
): { filterComplex: string; videoLabel: string; audioLabel: string } | null {
  if (spec.clips.length < 2) {
    return null;
  }

  const filters: string[] = [];
  let videoLabel = '0:v';
  let audioLabel = '0:a';

  for (let index = 1; index < spec.clips.length; index++) {
    const transition = spec.transitions.find((candidate) => candidate.between[1] === index);
    if (!transition) {
      throw createReelsmithError(
        ErrorCode.INVALID_SCENE_ORDER,
        `No transition joins scene ${index - 1} to scene ${index}.`,
        { sceneIndex: index }
      );
    }
    const duration = formatSeconds(transition.overlapMs);
    filters.push(
      `[${videoLabel}][${index}:v]xfade=transition=${XFADE_TRANSITIONS[transition.kind]}` +
        `:duration=${duration}:offset=${formatSeconds(transition.offsetMs)}[vx${index}]`
    );
    filters.push(`[${audioLabel}][${index}:a]acrossfade=d=${duration}[ax${index}]`);
    videoLabel = `vx${index}`;
    audioLabel = `ax${index}`;
  }

  return { filterComplex: filters.join(';'), videoLabel, audioLabel };
}

/**
 * Single-pass encode of the joined timeline with the export profile.
 */
export function buildExportCommand(spec: ExportSpec, config: FfmpegToolConfig): FfmpegCommand {
  const { profile, frame } = spec;
  const inputFiles = spec.clips.map((clip) => clip.path);
  const inputArgs = inputFiles.flatMap((file) => ['-i', file]);
  const graph = buildTransitionGraph(spec);

  const mapArgs = graph
    ? ['-filter_complex', graph.filterComplex, '-map', `[${graph.videoLabel}]`, '-map', `[${graph.audioLabel}]`]
    : ['-map', '0:v', '-map', '0:a'];

  const args = [
    '-y',
    '-hide_banner',
    ...inputArgs,
    ...mapArgs,
    '-c:v',
    profile.videoCodec,
    '-preset',
    config.preset,
    '-crf',
    String(config.crf),
    '-pix_fmt',
    profile.pixelFormat,
    '-s',
    `${frame.width}x${frame.height}`,
    '-r',
    String(frame.frameRate),
    '-c:a',
    profile.audioCodec,
    '-b:a',
    config.audioBitrate,
    ...(profile.fastStart ? ['-movflags', '+faststart'] : []),
    '-t',
    formatSeconds(spec.totalDurationMs),
    spec.outputPath,
  ];

  return { ffmpegPath: config.ffmpegPath, args, inputFiles, outputPath: spec.outputPath };
}
