/**
 * Tooling options for the FFmpeg-backed media tool.
 */
export interface FfmpegToolConfig {
  /** FFmpeg binary (default: "ffmpeg" from PATH) */
  ffmpegPath: string;
  /** FFprobe binary (default: "ffprobe" from PATH) */
  ffprobePath: string;
  /** x264 encoding preset: ultrafast, fast, medium, slow */
  preset: string;
  /** Constant Rate Factor, 0-51 */
  crf: number;
  /** AAC bitrate, e.g. "192k" */
  audioBitrate: string;
  /** Rate narration audio is decoded at */
  decodeSampleRate: number;
}

export const FFMPEG_DEFAULTS: FfmpegToolConfig = {
  ffmpegPath: 'ffmpeg',
  ffprobePath: 'ffprobe',
  preset: 'medium',
  crf: 23,
  audioBitrate: '192k',
  decodeSampleRate: 48_000,
};

/**
 * A complete FFmpeg invocation ready for execution.
 */
export interface FfmpegCommand {
  ffmpegPath: string;
  args: string[];
  /** Input files in input-index order */
  inputFiles: string[];
  outputPath: string;
}

export interface FfmpegProgressSnapshot {
  timeSeconds: number;
  fps: number | null;
  speed: number | null;
}
