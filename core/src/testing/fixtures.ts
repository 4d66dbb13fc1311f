import type { AudioAsset, VideoAsset } from '../types.js';

/**
 * Constant-level mono audio of the given length at 1 kHz, loud enough to
 * survive silence trimming untouched.
 */
export function createToneAsset(durationMs: number, audioPath?: string): AudioAsset {
  const sampleRate = 1000;
  const samples = new Int16Array(Math.round((durationMs * sampleRate) / 1000));
  samples.fill(4000);
  return { path: audioPath, samples, sampleRate, durationMs };
}

export function createVideoAsset(videoPath: string, durationMs: number): VideoAsset {
  return { path: videoPath, durationMs, width: 1080, height: 1920 };
}
