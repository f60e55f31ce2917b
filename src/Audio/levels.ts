const BYTES_PER_SAMPLE = 2;

/**
 * Mean absolute amplitude of signed 16-bit little-endian PCM.
 * A trailing odd byte is ignored.
 */
export const meanAbsoluteLevel = (pcm: Buffer): number => {
  const samples = Math.floor(pcm.length / BYTES_PER_SAMPLE);
  if (samples === 0) return 0;

  let sum = 0;
  for (let i = 0; i < samples; i++) {
    sum += Math.abs(pcm.readInt16LE(i * BYTES_PER_SAMPLE));
  }
  return sum / samples;
};

/**
 * Cuts a raw PCM byte stream into fixed-size frames of `chunkSize` sample periods and
 * reports one level per complete frame. Partial frames are kept for the next push.
 */
export class FrameAccumulator {
  private readonly frameBytes: number;
  private pending: Buffer = Buffer.alloc(0);

  constructor(chunkSize: number, channels = 1) {
    this.frameBytes = chunkSize * channels * BYTES_PER_SAMPLE;
  }

  push(chunk: Buffer): number[] {
    const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    const levels: number[] = [];
    let offset = 0;
    while (data.length - offset >= this.frameBytes) {
      levels.push(meanAbsoluteLevel(data.subarray(offset, offset + this.frameBytes)));
      offset += this.frameBytes;
    }
    this.pending = Buffer.from(data.subarray(offset));
    return levels;
  }
}
