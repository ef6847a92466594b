/**
 * Video frame buffer type definitions
 */

/**
 * Concrete layout of a frame buffer.
 *
 * `native` is the opaque generic kind: packed RGB pixels that only expose a
 * conversion to I420.
 */
export type VideoFrameBufferType =
  | 'native'
  | 'I420'
  | 'I420A'
  | 'I422'
  | 'I444'
  | 'I010'
  | 'NV12';

/** Layouts that can be extracted from a buffer without conversion */
export type ExtractableBufferType = Exclude<VideoFrameBufferType, 'native'>;

/** Channel order of a native packed buffer */
export type PackedPixelFormat = 'RGBA' | 'BGRA';

/**
 * Dimensions of one plane, in samples
 */
export interface PlaneSize {
  width: number;
  height: number;
}
