/**
 * VideoFrame - a frame buffer with its presentation timestamp and rotation
 */

import type { VideoFrameBuffer } from './VideoFrameBuffer.js';
import {
  validateRotation,
  validateTimestamp,
  type VideoRotation,
} from './video-frame/validation.js';

export interface VideoFrameInit {
  /** Presentation timestamp in microseconds */
  timestampUs: number;
  /** Clockwise rotation to apply for display (default: 0) */
  rotation?: number;
}

/**
 * Frame metadata without the buffer
 */
export interface VideoFrameInfo {
  timestampUs: number;
  rotation: VideoRotation;
}

export class VideoFrame<B extends VideoFrameBuffer = VideoFrameBuffer> {
  readonly buffer: B;
  readonly timestampUs: number;
  readonly rotation: VideoRotation;

  /**
   * The frame takes ownership of `buffer`; close() closes it.
   */
  constructor(buffer: B, init: VideoFrameInit) {
    const rotation = init.rotation ?? 0;
    validateRotation(rotation);
    validateTimestamp(init.timestampUs);

    this.buffer = buffer;
    this.timestampUs = init.timestampUs;
    this.rotation = rotation;
  }

  get closed(): boolean {
    return this.buffer.closed;
  }

  get info(): VideoFrameInfo {
    return { timestampUs: this.timestampUs, rotation: this.rotation };
  }

  close(): void {
    this.buffer.close();
  }
}
