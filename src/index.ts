/**
 * video-frame-buffers
 *
 * Reference-counted video frame buffers in planar and biplanar YUV layouts,
 * with owned handles, an integer handle registry and frame streams.
 */

// Handles, frames and streams
export * from './core/index.js';

// Buffer layer
export * from './buffers/index.js';

// Buffer types and colour matrices
export * from './formats/index.js';

// Configuration
export {
  getConfig,
  setConfig,
  resetConfig,
  CONFIG_FILE_NAME,
  type FrameBufferConfig,
} from './config/frame-buffer-config.js';

// Logging and errors
export * from './utils/index.js';
