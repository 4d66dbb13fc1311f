import type { MediaTool, VoiceSource } from '@reelsmith/core';

/**
 * Voice source over narration that was synthesized ahead of time: each scene
 * names its audio file and the media tool decodes it.
 */
export function createFileVoiceSource(tool: Pick<MediaTool, 'decodeAudio'>): VoiceSource {
  return {
    loadNarration: (script) => tool.decodeAudio(script.audio),
  };
}
