/**
 * Raw PCM handling for narration audio: signed 16-bit little-endian mono.
 */

export function buildDecodeArgs(audioPath: string, sampleRate: number): string[] {
  return [
    '-v',
    'error',
    '-i',
    audioPath,
    '-vn',
    '-ac',
    '1',
    '-ar',
    String(sampleRate),
    '-f',
    's16le',
    '-acodec',
    'pcm_s16le',
    'pipe:1',
  ];
}

export function pcmBufferToSamples(buffer: Buffer): Int16Array {
  const samples = new Int16Array(Math.floor(buffer.length / 2));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = buffer.readInt16LE(i * 2);
  }
  return samples;
}

export function samplesToPcmBuffer(samples: Int16Array): Buffer {
  const buffer = Buffer.alloc(samples.length * 2);
  samples.forEach((sample, i) => {
    buffer.writeInt16LE(sample, i * 2);
  });
  return buffer;
}
