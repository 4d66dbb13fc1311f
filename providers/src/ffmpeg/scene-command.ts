import type { SceneRenderSpec } from '@reelsmith/core';
import { buildDrawtextFilter, formatSeconds } from './filters.js';
import type { FfmpegCommand, FfmpegToolConfig } from './types.js';

/**
 * Builds the FFmpeg command that renders one scene: every segment is trimmed
 * (or looped, then trimmed) to its span, scaled to cover the frame and
 * center-cropped, the segments are hard-cut together, captions are drawn on
 * top and the normalized PCM track becomes the only audio.
 */
export function buildSceneCommand(spec: SceneRenderSpec, config: FfmpegToolConfig): FfmpegCommand {
  const { width, height, frameRate } = spec.frame;
  const inputArgs: string[] = [];
  const inputFiles: string[] = [];
  const filters: string[] = [];

  spec.segments.forEach((segment, index) => {
    if (segment.fit === 'loop') {
      inputArgs.push('-stream_loop', '-1');
    }
    inputArgs.push('-i', segment.source.path);
    inputFiles.push(segment.source.path);

    const bottomCrop = segment.cropBottomPx ? `crop=iw:ih-${segment.cropBottomPx}:0:0,` : '';
    filters.push(
      `[${index}:v]trim=duration=${formatSeconds(segment.durationMs)},setpts=PTS-STARTPTS,${bottomCrop}` +
        `scale=${width}:${height}:force_original_aspect_ratio=increase,crop=${width}:${height},` +
        `fps=${frameRate},format=yuv420p,setsar=1[v${index}]`
    );
  });

  const audioIndex = spec.segments.length;
  inputArgs.push(
    '-f',
    's16le',
    '-ar',
    String(spec.audio.sampleRate),
    '-ac',
    String(spec.audio.channels),
    '-i',
    spec.audio.path
  );
  inputFiles.push(spec.audio.path);

  let videoLabel = 'v0';
  if (spec.segments.length > 1) {
    const labels = spec.segments.map((_, index) => `[v${index}]`).join('');
    filters.push(`${labels}concat=n=${spec.segments.length}:v=1:a=0[vjoined]`);
    videoLabel = 'vjoined';
  }

  const caption = spec.caption;
  if (caption && caption.lines.length > 0) {
    const drawtext = caption.lines.map((line) => buildDrawtextFilter(line, caption)).join(',');
    filters.push(`[${videoLabel}]${drawtext}[vout]`);
    videoLabel = 'vout';
  }

  const args = [
    '-y',
    '-hide_banner',
    ...inputArgs,
    '-filter_complex',
    filters.join(';'),
    '-map',
    `[${videoLabel}]`,
    '-map',
    `${audioIndex}:a`,
    '-c:v',
    'libx264',
    '-preset',
    config.preset,
    '-crf',
    String(config.crf),
    '-pix_fmt',
    'yuv420p',
    '-r',
    String(frameRate),
    '-c:a',
    'aac',
    '-b:a',
    config.audioBitrate,
    '-t',
    formatSeconds(spec.durationMs),
    spec.outputPath,
  ];

  return { ffmpegPath: config.ffmpegPath, args, inputFiles, outputPath: spec.outputPath };
}
