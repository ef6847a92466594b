/**
 * Buffer type module
 *
 * Provides the buffer kind tag and layout arithmetic shared by the buffer and
 * handle layers.
 */

// Types
export type {
  VideoFrameBufferType,
  ExtractableBufferType,
  PackedPixelFormat,
  PlaneSize,
} from './types.js';

// Size calculations
export { getPlaneCount, getChromaSize, alignStride } from './sizes.js';

// Helper functions
export {
  VIDEO_FRAME_BUFFER_TYPES,
  EXTRACTABLE_BUFFER_TYPES,
  isVideoFrameBufferType,
  isPlanarYuvType,
  isBiplanarYuvType,
  is16BitType,
  hasAlphaPlane,
} from './helpers.js';
