import type { CaptionConfig } from '../config.js';
import type { SceneCaption } from '../media/types.js';

/**
 * Word-boundary wrap. Words longer than the limit get a line of their own.
 */
export function wrapCaptionText(text: string, maxChars: number): string[] {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    if (current && current.length + 1 + word.length > maxChars) {
      lines.push(current);
      current = word;
    } else {
      current = current ? `${current} ${word}` : word;
    }
  }
  if (current) {
    lines.push(current);
  }
  return lines;
}

/**
 * Lays out the narration as a centred block of lines, colour cycling per line.
 * Returns undefined when captions are disabled or the narration is blank.
 */
export function buildSceneCaption(
  narrationText: string,
  config: CaptionConfig
): SceneCaption | undefined {
  if (!config.enabled) {
    return undefined;
  }
  const lines = wrapCaptionText(narrationText, config.maxCharsPerLine);
  if (lines.length === 0) {
    return undefined;
  }

  const lineHeight = config.fontSize + config.lineSpacing;
  const blockHeight = lines.length * lineHeight;

  return {
    fontSize: config.fontSize,
    verticalAnchor: config.verticalAnchor,
    fontFile: config.fontFile,
    lines: lines.map((text, index) => ({
      text,
      color: config.colors[index % config.colors.length] ?? 'white',
      offsetPx: index * lineHeight - Math.floor(blockHeight / 2),
    })),
  };
}
