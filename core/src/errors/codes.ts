/**
 * Error code constants for the composition engine.
 *
 * Code format: {Category}{Number}
 * - D: Decode errors (D001-D099)
 * - A: Asset errors (A001-A099)
 * - T: Timing errors (T001-T099)
 * - E: Export errors (E001-E099)
 * - C: Configuration errors (C001-C099)
 */

export const DecodeErrorCode = {
  AUDIO_DECODE_FAILED: 'D001',
  SOURCE_DECODE_FAILED: 'D002',
} as const;

export const AssetErrorCode = {
  MISSING_ASSET: 'A001',
  MISSING_AVATAR_ASSET: 'A002',
} as const;

export const TimingErrorCode = {
  TIMING_VIOLATION: 'T001',
  TRANSITION_OVERLAP: 'T002',
} as const;

export const ExportErrorCode = {
  EXPORT_FAILED: 'E001',
  FFMPEG_NOT_FOUND: 'E002',
  OUTPUT_LOCKED: 'E003',
} as const;

export const ConfigErrorCode = {
  INVALID_CONFIG: 'C001',
  INVALID_PROJECT: 'C002',
  INVALID_SCENE_ORDER: 'C003',
} as const;

export const ErrorCode = {
  ...DecodeErrorCode,
  ...AssetErrorCode,
  ...TimingErrorCode,
  ...ExportErrorCode,
  ...ConfigErrorCode,
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorCategory = 'decode' | 'asset' | 'timing' | 'export' | 'config';

const CATEGORY_BY_PREFIX: Record<string, ErrorCategory> = {
  D: 'decode',
  A: 'asset',
  T: 'timing',
  E: 'export',
  C: 'config',
};

export function getErrorCategory(code: ErrorCodeValue): ErrorCategory {
  const category = CATEGORY_BY_PREFIX[code.charAt(0)];
  if (!category) {
    throw new Error(`Unknown error code prefix: ${code}`);
  }
  return category;
}
