/** Signed 16-bit little-endian PCM for the given samples. */
export const pcm = (...samples: number[]): Buffer => {
  const buffer = Buffer.alloc(samples.length * 2);
  samples.forEach((sample, i) => buffer.writeInt16LE(sample, i * 2));
  return buffer;
};
