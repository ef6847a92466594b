/**
 * Core exports
 */

export {
  VideoFrameBuffer,
  NativeBuffer,
  PlanarYuvBuffer,
  PlanarYuv8Buffer,
  PlanarYuv16BBuffer,
  BiplanarYuvBuffer,
  BiplanarYuv8Buffer,
  I420Buffer,
  I420ABuffer,
  I422Buffer,
  I444Buffer,
  I010Buffer,
  NV12Buffer,
  wrapVideoFrameBuffer,
  newI420Buffer,
  copyI420Buffer,
  copyVideoFrameBuffer,
  type VideoFrameBufferHandles,
} from './VideoFrameBuffer.js';
export { OwnedReference } from './reference.js';
export {
  getBufferInfo,
  type VideoFrameBufferInfo,
  type PlanarYuvBufferInfo,
  type BiplanarYuvBufferInfo,
} from './buffer-info.js';
export { HandleRegistry, type HandleId, type ClosableHandle } from './HandleRegistry.js';
export * from './video-frame/index.js';
export {
  VideoStream,
  type VideoFrameReceivedEvent,
  type VideoStreamEosEvent,
  type OwnedVideoFrameBuffer,
} from './VideoStream.js';
