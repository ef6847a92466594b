/**
 * VideoFrame module
 *
 * Re-exports from the main VideoFrame.ts together with its helpers.
 */

export { VideoFrame, type VideoFrameInit, type VideoFrameInfo } from '../VideoFrame.js';

// Validation utilities
export { validateRotation, validateTimestamp, type VideoRotation } from './validation.js';
