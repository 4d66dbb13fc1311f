import type { AudioNormalizeConfig } from '../config.js';
import { createReelsmithError, ErrorCode } from '../errors/index.js';
import type { AudioAsset, NormalizedAudio } from '../types.js';

const INT16_MAX = 32767;
const INT16_MIN = -32768;

/**
 * Sample range [start, end) that survives silence trimming.
 */
export interface AudibleRange {
  start: number;
  end: number;
}

/**
 * Trims leading and trailing silence from a scene's audio and applies the
 * configured gain. The resulting duration drives every later stage.
 *
 * @throws ReelsmithError (AUDIO_DECODE_FAILED) when the audio is empty,
 *   carries an invalid sample rate, or holds no window above the threshold
 */
export function normalizeAudio(
  sceneIndex: number,
  asset: AudioAsset,
  config: AudioNormalizeConfig
): NormalizedAudio {
  if (!Number.isFinite(asset.sampleRate) || asset.sampleRate <= 0) {
    throw createReelsmithError(
      ErrorCode.AUDIO_DECODE_FAILED,
      `Scene ${sceneIndex} audio has an invalid sample rate (${asset.sampleRate}).`,
      { sceneIndex, context: asset.path }
    );
  }
  if (asset.samples.length === 0) {
    throw createReelsmithError(
      ErrorCode.AUDIO_DECODE_FAILED,
      `Scene ${sceneIndex} audio decoded to zero samples.`,
      { sceneIndex, context: asset.path }
    );
  }

  const windowSize = Math.max(
    1,
    Math.round((asset.sampleRate * config.silenceWindowMs) / 1000)
  );
  const range = findAudibleRange(
    asset.samples,
    windowSize,
    silenceThresholdAmplitude(config.silenceThresholdDb)
  );
  if (!range) {
    throw createReelsmithError(
      ErrorCode.AUDIO_DECODE_FAILED,
      `Scene ${sceneIndex} audio contains no signal above ${config.silenceThresholdDb} dBFS.`,
      {
        sceneIndex,
        context: asset.path,
        suggestion: 'Check the voice source output or lower audio.silenceThresholdDb.',
      }
    );
  }

  const samples = applyGain(
    asset.samples.subarray(range.start, range.end),
    config.gainFactor
  );
  const durationMs = Math.min(
    samplesToMs(samples.length, asset.sampleRate),
    asset.durationMs
  );
  const trimmedLeadingMs = samplesToMs(range.start, asset.sampleRate);

  return {
    sceneIndex,
    samples,
    sampleRate: asset.sampleRate,
    durationMs,
    gainApplied: config.gainFactor,
    trimmedLeadingMs,
    trimmedTrailingMs: Math.max(0, asset.durationMs - durationMs - trimmedLeadingMs),
  };
}

/**
 * Converts a dBFS level to a linear int16 amplitude.
 */
export function silenceThresholdAmplitude(thresholdDb: number): number {
  return INT16_MAX * Math.pow(10, thresholdDb / 20);
}

/**
 * Finds the first and last analysis window whose RMS reaches the threshold.
 * Returns null when every window is silent.
 */
export function findAudibleRange(
  samples: Int16Array,
  windowSize: number,
  threshold: number
): AudibleRange | null {
  const windowCount = Math.ceil(samples.length / windowSize);
  let firstWindow = -1;
  let lastWindow = -1;

  for (let w = 0; w < windowCount; w++) {
    const start = w * windowSize;
    const end = Math.min(samples.length, start + windowSize);
    if (windowRms(samples, start, end) >= threshold) {
      if (firstWindow < 0) {
        firstWindow = w;
      }
      lastWindow = w;
    }
  }

  if (firstWindow < 0) {
    return null;
  }
  return {
    start: firstWindow * windowSize,
    end: Math.min(samples.length, (lastWindow + 1) * windowSize),
  };
}

function windowRms(samples: Int16Array, start: number, end: number): number {
  let sumSquares = 0;
  for (let i = start; i < end; i++) {
    const sample = samples[i] ?? 0;
    sumSquares += sample * sample;
  }
  return Math.sqrt(sumSquares / (end - start));
}

/**
 * Multiplies every sample, clamping to the int16 range.
 */
export function applyGain(samples: Int16Array, gainFactor: number): Int16Array {
  const out = new Int16Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    const scaled = Math.round((samples[i] ?? 0) * gainFactor);
    out[i] = Math.max(INT16_MIN, Math.min(INT16_MAX, scaled));
  }
  return out;
}

export function samplesToMs(sampleCount: number, sampleRate: number): number {
  return Math.round((sampleCount * 1000) / sampleRate);
}
