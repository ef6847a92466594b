/**
 * Plane memory layout
 *
 * Every buffer keeps its planes in one contiguous allocation, in plane order,
 * each plane `stride * rows` samples long.
 */

import { alignStride } from '../formats/index.js';
import { getConfig } from '../config/frame-buffer-config.js';
import { validateStride } from './validation.js';

export interface PlaneAllocation {
  stride: number;
  rows: number;
}

/**
 * Allocate 8-bit planes in a single ArrayBuffer
 */
export function allocatePlanes8(specs: PlaneAllocation[]): Uint8Array[] {
  const total = specs.reduce((sum, spec) => sum + spec.stride * spec.rows, 0);
  const memory = new ArrayBuffer(total);
  let offset = 0;
  return specs.map((spec) => {
    const plane = new Uint8Array(memory, offset, spec.stride * spec.rows);
    offset += plane.byteLength;
    return plane;
  });
}

/**
 * Allocate 16-bit planes in a single ArrayBuffer (strides in samples)
 */
export function allocatePlanes16(specs: PlaneAllocation[]): Uint16Array[] {
  const total = specs.reduce((sum, spec) => sum + spec.stride * spec.rows, 0);
  const memory = new ArrayBuffer(total * Uint16Array.BYTES_PER_ELEMENT);
  let offset = 0;
  return specs.map((spec) => {
    const plane = new Uint16Array(memory, offset, spec.stride * spec.rows);
    offset += plane.byteLength;
    return plane;
  });
}

/**
 * Pick the stride for a plane, in samples: the requested one if given,
 * otherwise the row width padded to the configured byte alignment
 */
export function resolveStride(
  requested: number | undefined,
  rowWidth: number,
  name: string,
  bytesPerSample = 1
): number {
  if (requested === undefined) {
    return alignStride(rowWidth * bytesPerSample, getConfig().strideAlignment) / bytesPerSample;
  }
  validateStride(requested, rowWidth, name);
  return requested;
}

export const EMPTY_PLANE_8 = new Uint8Array(0);
export const EMPTY_PLANE_16 = new Uint16Array(0);
