import type { CaptionLine, SceneCaption, TransitionKind } from '@reelsmith/core';

/**
 * FFmpeg xfade names for each transition kind.
 */
export const XFADE_TRANSITIONS: Record<TransitionKind, string> = {
  crossfade: 'fade',
  'wipe-left': 'wipeleft',
  'wipe-right': 'wiperight',
  'slide-left': 'slideleft',
  'slide-up': 'slideup',
  'diagonal-br': 'diagbr',
  'diagonal-tl': 'diagtl',
};

export function formatSeconds(ms: number): string {
  return String(ms / 1000);
}

/**
 * Escape text for use in FFmpeg drawtext filter.
 *
 * Backslashes go first, then quotes, colons, percent signs (drawtext
 * expansion) and newlines.
 */
export function escapeDrawtext(text: string): string {
  return escapeDrawtextPath(text).replace(/%/g, '\\%').replace(/\n/g, '\\n');
}

/**
 * Escape a file path for a drawtext option. Paths are not expanded, so `%`
 * stays as is.
 */
export function escapeDrawtextPath(filePath: string): string {
  return filePath.replace(/\\/g, '\\\\').replace(/'/g, "'\\''").replace(/:/g, '\\:');
}

function signedOffset(offsetPx: number): string {
  return offsetPx >= 0 ? `+${offsetPx}` : String(offsetPx);
}

export function buildDrawtextFilter(line: CaptionLine, caption: SceneCaption): string {
  const parts: string[] = [
    `text='${escapeDrawtext(line.text)}'`,
    `fontsize=${caption.fontSize}`,
    `fontcolor=${line.color}`,
    'x=(w-text_w)/2',
    `y=h*${caption.verticalAnchor}${signedOffset(line.offsetPx)}`,
    'borderw=4',
    'bordercolor=black',
  ];
  if (caption.fontFile) {
    parts.push(`fontfile='${escapeDrawtextPath(caption.fontFile)}'`);
  }
  return `drawtext=${parts.join(':')}`;
}
