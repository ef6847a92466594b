/**
 * Buffer type helper functions
 */

import type { ExtractableBufferType, VideoFrameBufferType } from './types.js';

/** Every buffer type, generic kind first */
export const VIDEO_FRAME_BUFFER_TYPES: readonly VideoFrameBufferType[] = [
  'native', 'I420', 'I420A', 'I422', 'I444', 'I010', 'NV12',
];

export const EXTRACTABLE_BUFFER_TYPES: readonly ExtractableBufferType[] = [
  'I420', 'I420A', 'I422', 'I444', 'I010', 'NV12',
];

/**
 * Check if a string names a buffer type
 */
export function isVideoFrameBufferType(value: string): value is VideoFrameBufferType {
  return VIDEO_FRAME_BUFFER_TYPES.some((type) => type === value);
}

/**
 * Check if a type stores Y, U and V in separate planes
 */
export function isPlanarYuvType(type: VideoFrameBufferType): boolean {
  return type === 'I420' || type === 'I420A' || type === 'I422' ||
    type === 'I444' || type === 'I010';
}

/**
 * Check if a type interleaves U and V in a single plane
 */
export function isBiplanarYuvType(type: VideoFrameBufferType): boolean {
  return type === 'NV12';
}

/**
 * Check if a type stores 16-bit samples
 */
export function is16BitType(type: VideoFrameBufferType): boolean {
  return type === 'I010';
}

/**
 * Check if a type carries an alpha plane
 */
export function hasAlphaPlane(type: VideoFrameBufferType): boolean {
  return type === 'I420A';
}
