/**
 * Buffer layer exports
 */

export { RefCounted } from './ref-counted.js';
export {
  PixelBuffer,
  PlanarYuvPixelBuffer,
  PlanarYuv8PixelBuffer,
  PlanarYuv16BPixelBuffer,
  BiplanarYuvPixelBuffer,
  BiplanarYuv8PixelBuffer,
  type PlanarStrides,
  type BiplanarStrides,
  type PlanarYuvPlanes,
  type BiplanarYuvPlanes,
} from './pixel-buffer.js';
export { I420PixelBuffer, type PlanarYuvInit } from './i420.js';
export { I420APixelBuffer, type I420AStrides, type I420AInit } from './i420a.js';
export { I422PixelBuffer } from './i422.js';
export { I444PixelBuffer } from './i444.js';
export { I010PixelBuffer } from './i010.js';
export { NV12PixelBuffer, type NV12Init } from './nv12.js';
export { NativePixelBuffer, type NativePixelBufferInit } from './native.js';
export {
  copyPlane,
  halvePlaneRows,
  halvePlane,
  convert10To8Plane,
  splitUvPlane,
  convertPackedToI420,
  type I420Planes,
} from './conversions.js';
