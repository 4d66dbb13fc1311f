import { rm } from 'node:fs/promises';
import type { VideoFrameConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { ExportProfile, ExportSpec, MediaTool } from '../media/types.js';
import type { FinalTimeline } from '../types.js';
import { acquireOutputLock } from './output-lock.js';

/**
 * The single delivery profile: H.264 in yuv420p with the index at the head of
 * the file, one AAC track, one pass.
 */
export const EXPORT_PROFILE: ExportProfile = {
  videoCodec: 'libx264',
  pixelFormat: 'yuv420p',
  fastStart: true,
  audioCodec: 'aac',
  passes: 1,
};

export interface ExportOptions {
  tool: MediaTool;
  outputPath: string;
  frame: VideoFrameConfig;
  logger?: Partial<Logger>;
}

export function buildExportSpec(
  timeline: FinalTimeline,
  outputPath: string,
  frame: VideoFrameConfig
): ExportSpec {
  return {
    outputPath,
    clips: timeline.clips,
    transitions: timeline.transitions,
    totalDurationMs: timeline.totalDurationMs,
    frame,
    profile: EXPORT_PROFILE,
  };
}

/**
 * Encodes the final timeline to one file while holding the output lock.
 * A failed encode leaves no file behind.
 */
export async function exportTimeline(
  timeline: FinalTimeline,
  options: ExportOptions
): Promise<string> {
  const { tool, outputPath, frame } = options;
  const logger = options.logger ?? {};
  const lock = await acquireOutputLock(outputPath);

  try {
    logger.info?.('export.start', {
      outputPath,
      clips: timeline.clips.length,
      transitions: timeline.transitions.length,
      totalDurationMs: timeline.totalDurationMs,
    });
    const written = await tool.encode(buildExportSpec(timeline, outputPath, frame));
    logger.info?.('export.done', { outputPath: written });
    return written;
  } catch (error) {
    await rm(outputPath, { force: true });
    logger.error?.('export.failed', {
      outputPath,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  } finally {
    await lock.release();
  }
}
