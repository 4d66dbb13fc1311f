import { createReelsmithError, ErrorCode } from './errors/index.js';
import type { TransitionKind } from './types.js';
import {
  loadSchemaValidator,
  validateAgainstSchema,
} from './validation/schema-validator.js';

const COMPOSE_CONFIG_SCHEMA_URL = new URL(
  '../schemas/compose-config.schema.json',
  import.meta.url
);

export interface AudioNormalizeConfig {
  /** Multiplier applied after trimming; samples are clamped, never wrapped */
  gainFactor: number;
  /** RMS level (dBFS) below which an analysis window counts as silence */
  silenceThresholdDb: number;
  /** Length of one analysis window */
  silenceWindowMs: number;
}

export interface VideoFrameConfig {
  width: number;
  height: number;
  frameRate: number;
}

export interface TransitionConfig {
  /** Set a kind is drawn from at each scene boundary */
  kinds: TransitionKind[];
  /** Blend window consumed from both neighbours of every join */
  overlapMs: number;
}

export interface AvatarConfig {
  /** Scenes at the head that never receive the avatar (the hook) */
  excludeLeading: number;
  /** Scenes at the tail that never receive the avatar (the outro) */
  excludeTrailing: number;
  /**
   * When true a selected slot without an avatar asset fails the run.
   * When false the slot renders stock footage and a warning is logged.
   */
  required: boolean;
  /** Pixels cut from the bottom of the avatar loop before it is scaled */
  cropBottomPx: number;
}

export interface CaptionConfig {
  enabled: boolean;
  maxCharsPerLine: number;
  fontSize: number;
  lineSpacing: number;
  /** Vertical centre of the caption block as a fraction of frame height */
  verticalAnchor: number;
  fontFile?: string;
  colors: string[];
}

export type SplitRounding = 'half-up';

export interface ComposeConfig {
  audio: AudioNormalizeConfig;
  video: VideoFrameConfig;
  transitions: TransitionConfig;
  avatar: AvatarConfig;
  captions: CaptionConfig;
  /** Scene worker pool size */
  concurrency: number;
  splitRounding: SplitRounding;
}

export type ComposeConfigOverrides = {
  [K in keyof ComposeConfig]?: ComposeConfig[K] extends unknown[]
    ? ComposeConfig[K]
    : ComposeConfig[K] extends object
      ? Partial<ComposeConfig[K]>
      : ComposeConfig[K];
};

export const COMPOSE_DEFAULTS: ComposeConfig = {
  audio: {
    gainFactor: 2,
    silenceThresholdDb: -50,
    silenceWindowMs: 10,
  },
  video: {
    width: 1080,
    height: 1920,
    frameRate: 30,
  },
  transitions: {
    kinds: ['crossfade', 'wipe-left', 'slide-up'],
    overlapMs: 500,
  },
  avatar: {
    excludeLeading: 1,
    excludeTrailing: 1,
    required: false,
    cropBottomPx: 0,
  },
  captions: {
    enabled: false,
    maxCharsPerLine: 24,
    fontSize: 56,
    lineSpacing: 14,
    verticalAnchor: 0.72,
    colors: ['#FFE500', '#00E5FF', '#FF6B00', '#FF2D8B'],
  },
  concurrency: 3,
  splitRounding: 'half-up',
};

/**
 * Merges overrides onto the defaults and validates the result.
 *
 * @throws ReelsmithError with INVALID_CONFIG when the merged config fails the schema
 */
export function resolveComposeConfig(
  overrides: ComposeConfigOverrides = {}
): ComposeConfig {
  const merged: ComposeConfig = {
    audio: { ...COMPOSE_DEFAULTS.audio, ...overrides.audio },
    video: { ...COMPOSE_DEFAULTS.video, ...overrides.video },
    transitions: { ...COMPOSE_DEFAULTS.transitions, ...overrides.transitions },
    avatar: { ...COMPOSE_DEFAULTS.avatar, ...overrides.avatar },
    captions: { ...COMPOSE_DEFAULTS.captions, ...overrides.captions },
    concurrency: overrides.concurrency ?? COMPOSE_DEFAULTS.concurrency,
    splitRounding: overrides.splitRounding ?? COMPOSE_DEFAULTS.splitRounding,
  };

  const result = validateAgainstSchema(
    loadSchemaValidator(COMPOSE_CONFIG_SCHEMA_URL),
    merged
  );
  if (!result.valid) {
    throw createReelsmithError(
      ErrorCode.INVALID_CONFIG,
      `Invalid compose configuration: ${result.messages.join('; ')}`
    );
  }

  return merged;
}

/**
 * Duration of one output frame, the tolerance for every duration check.
 */
export function frameIntervalMs(config: Pick<ComposeConfig, 'video'>): number {
  return 1000 / config.video.frameRate;
}
