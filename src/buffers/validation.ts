/**
 * Buffer allocation validation utilities
 */

import { invalidDimensionsError } from '../utils/errors.js';

/**
 * Validate frame dimensions (must be positive integers)
 */
export function validateDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
    throw invalidDimensionsError(`Invalid buffer dimensions ${width}x${height}`);
  }
}

/**
 * Validate a stride against the row width it has to hold
 */
export function validateStride(stride: number, minimum: number, name: string): void {
  if (!Number.isInteger(stride) || stride < minimum) {
    throw new TypeError(`${name} must be an integer of at least ${minimum}, got ${stride}`);
  }
}

/**
 * Validate that a source plane holds `rows` rows of `width` samples at `stride`
 */
export function validatePlaneLength(
  plane: ArrayLike<number>,
  stride: number,
  width: number,
  rows: number,
  name: string
): void {
  const required = stride * (rows - 1) + width;
  if (plane.length < required) {
    throw new TypeError(`${name} holds ${plane.length} samples, expected at least ${required}`);
  }
}
