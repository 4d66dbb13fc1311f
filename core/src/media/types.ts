import type { VideoFrameConfig } from '../config.js';
import type {
  AudioAsset,
  NormalizedAudio,
  RenderedClip,
  Transition,
  VideoAsset,
} from '../types.js';

/**
 * How a source fills its span: loop when shorter, trim from the start otherwise.
 */
export type SegmentFit = 'loop' | 'trim';

export type SegmentRole = 'primary' | 'secondary' | 'avatar';

export interface RenderSegment {
  role: SegmentRole;
  source: VideoAsset;
  /** Position of the segment inside the scene */
  startMs: number;
  durationMs: number;
  fit: SegmentFit;
  /** Pixels removed from the bottom of the source frame before scaling */
  cropBottomPx?: number;
}

/**
 * Normalized scene audio written to disk as raw PCM.
 */
export interface AudioTrackRef {
  path: string;
  sampleRate: number;
  channels: 1;
  encoding: 's16le';
  durationMs: number;
}

export interface CaptionLine {
  text: string;
  color: string;
  /** Vertical offset of the line's top edge from the caption anchor, in pixels */
  offsetPx: number;
}

export interface SceneCaption {
  lines: CaptionLine[];
  fontSize: number;
  /** Caption block centre as a fraction of frame height */
  verticalAnchor: number;
  fontFile?: string;
}

export interface SceneRenderSpec {
  sceneIndex: number;
  outputPath: string;
  durationMs: number;
  /** Played back to back with hard cuts */
  segments: RenderSegment[];
  audio: AudioTrackRef;
  frame: VideoFrameConfig;
  caption?: SceneCaption;
}

export interface ExportProfile {
  videoCodec: 'libx264';
  pixelFormat: 'yuv420p';
  fastStart: true;
  audioCodec: 'aac';
  passes: 1;
}

export interface ExportSpec {
  outputPath: string;
  clips: readonly RenderedClip[];
  transitions: readonly Transition[];
  totalDurationMs: number;
  frame: VideoFrameConfig;
  profile: ExportProfile;
}

/**
 * Capability interface over the media tooling. The core never spawns
 * processes; it hands specs to a MediaTool and checks what comes back.
 *
 * Implementations signal failures with ReelsmithError codes:
 * AUDIO_DECODE_FAILED, SOURCE_DECODE_FAILED (context = failing source path),
 * MISSING_ASSET, EXPORT_FAILED (exitCode = tool status).
 */
export interface MediaTool {
  decodeAudio(path: string): Promise<AudioAsset>;
  probeVideo(path: string): Promise<VideoAsset>;
  writeAudio(audio: NormalizedAudio, outputPath: string): Promise<AudioTrackRef>;
  renderScene(spec: SceneRenderSpec): Promise<string>;
  /** Measured container duration in milliseconds */
  probeDuration(path: string): Promise<number>;
  encode(spec: ExportSpec): Promise<string>;
}
