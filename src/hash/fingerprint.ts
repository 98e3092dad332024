/**
 * Difference-hash (dHash) fingerprints and Hamming distance
 *
 * The image is reduced to a (hashSize + 1) x hashSize greyscale grid; each bit
 * records whether a pixel is darker than its right-hand neighbour. Bits are
 * taken row-major and packed most-significant-first into hex, so a 16x16 hash
 * is a 256-bit value written as 64 hex characters.
 */

const NIBBLE_BITS = [0, 1, 1, 2, 1, 2, 2, 3, 1, 2, 2, 3, 2, 3, 3, 4];

/**
 * Build the fingerprint from raw greyscale pixels
 * @param pixels - Row-major samples; only the first channel of each pixel is read
 * @param width - Grid width (hashSize + 1)
 * @param height - Grid height (hashSize)
 * @param channels - Samples per pixel in `pixels`
 */
export function computeDifferenceHash(
  pixels: Uint8Array,
  width: number,
  height: number,
  channels: number = 1
): string {
  if (width < 2 || height < 1) {
    throw new Error(`Grid too small for a difference hash: ${width}x${height}`);
  }
  if (pixels.length < width * height * channels) {
    throw new Error(`Expected ${width * height * channels} samples, got ${pixels.length}`);
  }

  const bits: number[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width - 1; x++) {
      const left = pixels[(y * width + x) * channels];
      const right = pixels[(y * width + x + 1) * channels];
      bits.push(right > left ? 1 : 0);
    }
  }

  while (bits.length % 4 !== 0) {
    bits.push(0);
  }

  let hex = '';
  for (let i = 0; i < bits.length; i += 4) {
    const nibble = (bits[i] << 3) | (bits[i + 1] << 2) | (bits[i + 2] << 1) | bits[i + 3];
    hex += nibble.toString(16);
  }
  return hex;
}

export function fingerprintBits(fingerprint: string): number {
  return fingerprint.length * 4;
}

function nibbleValue(char: string): number {
  const value = parseInt(char, 16);
  if (Number.isNaN(value)) {
    throw new Error(`Invalid fingerprint character: ${char}`);
  }
  return value;
}

/**
 * Number of differing bits between two fingerprints of equal length
 */
export function hammingDistance(a: string, b: string): number {
  if (a.length !== b.length) {
    throw new Error(`Fingerprint lengths must match (${a.length} vs ${b.length})`);
  }

  let distance = 0;
  for (let i = 0; i < a.length; i++) {
    distance += NIBBLE_BITS[nibbleValue(a[i]) ^ nibbleValue(b[i])];
  }
  return distance;
}

/**
 * Pre-parse a fingerprint into 32-bit words for the all-pairs comparison
 */
export function toWords(fingerprint: string): Uint32Array {
  const words = new Uint32Array(Math.ceil(fingerprint.length / 8));
  for (let i = 0; i < words.length; i++) {
    const chunk = fingerprint.slice(i * 8, i * 8 + 8).padEnd(8, '0');
    const value = parseInt(chunk, 16);
    if (!/^[0-9a-f]{8}$/i.test(chunk) || Number.isNaN(value)) {
      throw new Error(`Invalid fingerprint: ${fingerprint}`);
    }
    words[i] = value;
  }
  return words;
}

function popcount32(value: number): number {
  let v = value - ((value >>> 1) & 0x55555555);
  v = (v & 0x33333333) + ((v >>> 2) & 0x33333333);
  return Math.imul((v + (v >>> 4)) & 0x0f0f0f0f, 0x01010101) >>> 24;
}

/**
 * Hamming distance over pre-parsed words of equal length
 */
export function wordDistance(a: Uint32Array, b: Uint32Array): number {
  let distance = 0;
  for (let i = 0; i < a.length; i++) {
    distance += popcount32((a[i] ^ b[i]) >>> 0);
  }
  return distance;
}
