/**
 * Exact digests and perceptual fingerprints
 */

export { hashImage, hashImages, perceptualFingerprint } from './hasher.js';
export type { HashOptions } from './hasher.js';

export {
  computeDifferenceHash,
  fingerprintBits,
  hammingDistance,
  toWords,
  wordDistance,
} from './fingerprint.js';

export { isAccessible } from './types.js';
export type { AccessibleImage, InaccessibleImage, ImageRecord, InaccessibleReason } from './types.js';
