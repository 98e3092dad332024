/**
 * Per-file hashing results
 * One record per candidate, created once per scan and never mutated
 */

export type InaccessibleReason = 'unreadable' | 'decode-failed' | 'listing-failed';

export interface AccessibleImage {
  readonly accessible: true;
  readonly path: string;
  readonly sizeBytes: number;
  /** SHA-256 of the full byte stream (hex) */
  readonly exactDigest: string;
  /** Difference-hash bit vector (hex, MSB first) */
  readonly perceptualFingerprint: string;
}

export interface InaccessibleImage {
  readonly accessible: false;
  readonly path: string;
  readonly failure: InaccessibleReason;
  /** Underlying error message */
  readonly reason: string;
}

export type ImageRecord = AccessibleImage | InaccessibleImage;

export function isAccessible(record: ImageRecord): record is AccessibleImage {
  return record.accessible;
}
