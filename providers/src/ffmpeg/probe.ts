export interface ProbeResult {
  durationMs: number;
  width?: number;
  height?: number;
  hasAudio: boolean;
}

export function buildProbeArgs(filePath: string): string[] {
  return [
    '-v',
    'error',
    '-show_entries',
    'format=duration:stream=codec_type,width,height',
    '-of',
    'json',
    filePath,
  ];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toFiniteNumber(value: unknown): number | undefined {
  const parsed = typeof value === 'string' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Reads duration and the first video stream's size from `ffprobe -of json`.
 * Returns null when the output carries no usable duration.
 */
export function parseProbeOutput(json: string): ProbeResult | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || !isRecord(parsed.format)) {
    return null;
  }

  const durationSeconds = toFiniteNumber(parsed.format.duration);
  if (durationSeconds === undefined || durationSeconds <= 0) {
    return null;
  }

  const streams = Array.isArray(parsed.streams) ? parsed.streams.filter(isRecord) : [];
  const video = streams.find((stream) => stream.codec_type === 'video');

  return {
    durationMs: Math.round(durationSeconds * 1000),
    width: video ? toFiniteNumber(video.width) : undefined,
    height: video ? toFiniteNumber(video.height) : undefined,
    hasAudio: streams.some((stream) => stream.codec_type === 'audio'),
  };
}
