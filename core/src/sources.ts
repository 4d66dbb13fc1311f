import { createReelsmithError, ErrorCode, hasErrorCode } from './errors/index.js';
import type { Logger } from './logger.js';
import type { MediaTool } from './media/types.js';
import type { AudioAsset, Scene, VideoAsset } from './types.js';

/**
 * One scene as authored in a project: narration, its pre-synthesized audio,
 * and either explicit clips or keywords the footage source resolves.
 */
export interface SceneScript {
  narration: string;
  audio: string;
  primary?: string;
  secondary?: string;
  keywords?: string[];
}

export interface VoiceSource {
  loadNarration(script: SceneScript, sceneIndex: number): Promise<AudioAsset>;
}

export interface FootageSelection {
  primary?: VideoAsset;
  secondary?: VideoAsset;
}

export interface FootageSource {
  selectFootage(script: SceneScript, sceneIndex: number): Promise<FootageSelection>;
  /** Probes the avatar loop; MISSING_ASSET when it is absent */
  resolveAvatar(path: string): Promise<VideoAsset>;
}

export interface SceneSources {
  voice: VoiceSource;
  footage: FootageSource;
}

/**
 * Probes a scene's secondary clip. A clip that cannot be decoded is dropped
 * so the scene renders from its primary; any other failure propagates.
 */
export async function probeSecondaryFootage(
  tool: Pick<MediaTool, 'probeVideo'>,
  secondaryPath: string,
  sceneIndex: number,
  logger: Partial<Logger> = {}
): Promise<VideoAsset | undefined> {
  try {
    return await tool.probeVideo(secondaryPath);
  } catch (error) {
    if (!hasErrorCode(error, ErrorCode.SOURCE_DECODE_FAILED)) {
      throw error;
    }
    logger.warn?.('footage.secondary.unusable', {
      sceneIndex,
      path: secondaryPath,
      reason: error.message,
    });
    return undefined;
  }
}

/**
 * Gathers audio and footage for one scene.
 *
 * @throws ReelsmithError (MISSING_ASSET) when no primary clip resolves
 */
export async function assembleScene(
  sceneIndex: number,
  script: SceneScript,
  sources: SceneSources
): Promise<Scene> {
  const [audio, footage] = await Promise.all([
    sources.voice.loadNarration(script, sceneIndex),
    sources.footage.selectFootage(script, sceneIndex),
  ]);

  if (!footage.primary) {
    throw createReelsmithError(
      ErrorCode.MISSING_ASSET,
      `Scene ${sceneIndex} has no primary footage.`,
      {
        sceneIndex,
        context: script.keywords?.length ? `keywords: ${script.keywords.join(', ')}` : undefined,
        suggestion: 'Set "primary" on the scene or add footage matching one of its keywords.',
      }
    );
  }

  return {
    index: sceneIndex,
    narrationText: script.narration,
    primarySource: footage.primary,
    secondarySource: footage.secondary,
    audio,
  };
}
