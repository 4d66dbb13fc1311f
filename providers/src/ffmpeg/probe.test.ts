import { describe, it, expect } from 'vitest';
import { buildProbeArgs, parseProbeOutput } from './probe.js';

describe('probe', () => {
  it('asks ffprobe for duration and stream sizes as JSON', () => {
    expect(buildProbeArgs('/footage/reef.mp4')).toEqual([
      '-v',
      'error',
      '-show_entries',
      'format=duration:stream=codec_type,width,height',
      '-of',
      'json',
      '/footage/reef.mp4',
    ]);
  });

  it('reads duration and the video stream size', () => {
    const output = JSON.stringify({
      streams: [
        { codec_type: 'audio' },
        { codec_type: 'video', width: 1920, height: 1080 },
      ],
      format: { duration: '12.480000' },
    });

    expect(parseProbeOutput(output)).toEqual({
      durationMs: 12_480,
      width: 1920,
      height: 1080,
      hasAudio: true,
    });
  });

  it('handles audio-free clips', () => {
    const output = JSON.stringify({
      streams: [{ codec_type: 'video', width: 1080, height: 1920 }],
      format: { duration: '3.0006' },
    });

    expect(parseProbeOutput(output)).toEqual({
      durationMs: 3001,
      width: 1080,
      height: 1920,
      hasAudio: false,
    });
  });

  it('returns null without a duration', () => {
    expect(parseProbeOutput(JSON.stringify({ streams: [], format: {} }))).toBeNull();
    expect(parseProbeOutput(JSON.stringify({ format: { duration: 'N/A' } }))).toBeNull();
    expect(parseProbeOutput('not json')).toBeNull();
  });
});
