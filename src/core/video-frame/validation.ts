/**
 * VideoFrame validation utilities
 */

export type VideoRotation = 0 | 90 | 180 | 270;

/**
 * Validate rotation value (must be 0, 90, 180, or 270)
 */
export function validateRotation(rotation: number): asserts rotation is VideoRotation {
  if (rotation !== 0 && rotation !== 90 && rotation !== 180 && rotation !== 270) {
    throw new TypeError('rotation must be 0, 90, 180, or 270');
  }
}

/**
 * Validate a timestamp in microseconds (must be a finite integer)
 */
export function validateTimestamp(timestampUs: number): void {
  if (!Number.isSafeInteger(timestampUs)) {
    throw new TypeError('timestampUs must be a finite integer');
  }
}
