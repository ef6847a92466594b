/**
 * Buffer type size calculations
 */

import type { PlaneSize, VideoFrameBufferType } from './types.js';

/**
 * Get number of planes for a buffer type
 */
export function getPlaneCount(type: VideoFrameBufferType): number {
  switch (type) {
    case 'I420':
    case 'I422':
    case 'I444':
    case 'I010':
      return 3;
    case 'I420A':
      return 4;
    case 'NV12':
      return 2;
    case 'native':
      return 1;
  }
}

/**
 * Get the chroma plane size for a YUV buffer type.
 *
 * For NV12 the width is counted in UV pairs, not bytes.
 */
export function getChromaSize(type: VideoFrameBufferType, width: number, height: number): PlaneSize {
  const chromaW = Math.ceil(width / 2);
  const chromaH = Math.ceil(height / 2);

  switch (type) {
    case 'I420':
    case 'I420A':
    case 'I010':
    case 'NV12':
      return { width: chromaW, height: chromaH };
    case 'I422':
      return { width: chromaW, height };
    case 'I444':
      return { width, height };
    case 'native':
      return { width: 0, height: 0 };
  }
}

/**
 * Round a stride up to a multiple of `alignment` (a power of two)
 */
export function alignStride(stride: number, alignment: number): number {
  if (alignment <= 1) return stride;
  return Math.ceil(stride / alignment) * alignment;
}
