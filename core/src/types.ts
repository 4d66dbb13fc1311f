/**
 * Domain types for the composition engine.
 *
 * All durations and timestamps are integer milliseconds. A millisecond is the
 * smallest unit the timeline builder splits on, so span arithmetic stays exact.
 */

/**
 * Decoded mono PCM audio for one scene, as produced by a voice source.
 */
export interface AudioAsset {
  /** Source file, when the audio was decoded from disk */
  readonly path?: string;
  /** Signed 16-bit mono samples */
  readonly samples: Int16Array;
  readonly sampleRate: number;
  readonly durationMs: number;
}

/**
 * Scene audio after silence trimming and gain.
 */
export interface NormalizedAudio {
  readonly sceneIndex: number;
  readonly samples: Int16Array;
  readonly sampleRate: number;
  readonly durationMs: number;
  readonly gainApplied: number;
  readonly trimmedLeadingMs: number;
  readonly trimmedTrailingMs: number;
}

/**
 * Raw footage or avatar clip. Never written to; only read into derived clips.
 */
export interface VideoAsset {
  readonly path: string;
  readonly durationMs: number;
  readonly width: number;
  readonly height: number;
}

export interface Scene {
  readonly index: number;
  readonly narrationText: string;
  readonly primarySource: VideoAsset;
  /** Falls back to the primary source when absent */
  readonly secondarySource?: VideoAsset;
  readonly audio: AudioAsset;
}

/**
 * Half-open interval [startMs, endMs).
 */
export interface TimeSpan {
  readonly startMs: number;
  readonly endMs: number;
}

export interface SceneTimeline {
  readonly sceneIndex: number;
  readonly totalDurationMs: number;
  readonly splitPointMs: number;
  readonly halfA: TimeSpan;
  readonly halfB: TimeSpan;
  readonly usesSecondarySource: boolean;
}

export interface RenderedClip {
  readonly sceneIndex: number;
  readonly path: string;
  readonly durationMs: number;
  readonly hasAvatar: boolean;
}

export const TRANSITION_KINDS = [
  'crossfade',
  'wipe-left',
  'wipe-right',
  'slide-left',
  'slide-up',
  'diagonal-br',
  'diagonal-tl',
] as const;

export type TransitionKind = (typeof TRANSITION_KINDS)[number];

export interface Transition {
  readonly between: readonly [number, number];
  readonly kind: TransitionKind;
  readonly overlapMs: number;
  /** Position in the joined timeline where the blend begins */
  readonly offsetMs: number;
}

export interface FinalTimeline {
  /** Clips in playback order (sorted by scene index) */
  readonly clips: readonly RenderedClip[];
  readonly transitions: readonly Transition[];
  readonly totalDurationMs: number;
}

export type ComposeStage =
  | 'normalize'
  | 'timeline'
  | 'render'
  | 'stitch'
  | 'export'
  | 'cleanup';

export interface ComposeProgressEvent {
  type: 'stage-start' | 'stage-complete' | 'scene-complete' | 'warning';
  stage: ComposeStage;
  timestamp: string;
  message: string;
  sceneIndex?: number;
}

export interface Clock {
  now(): string;
}
