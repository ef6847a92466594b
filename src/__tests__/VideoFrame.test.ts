/**
 * Tests for VideoFrame class
 */

import { VideoFrame } from '../core/VideoFrame.js';
import { newI420Buffer } from '../core/VideoFrameBuffer.js';

describe('VideoFrame', () => {
  it('should default rotation to 0', () => {
    const frame = new VideoFrame(newI420Buffer(4, 4), { timestampUs: 1000 });

    expect(frame.timestampUs).toBe(1000);
    expect(frame.rotation).toBe(0);
    expect(frame.info).toEqual({ timestampUs: 1000, rotation: 0 });

    frame.close();
  });

  it.each([0, 90, 180, 270])('should accept rotation %s', (rotation) => {
    const frame = new VideoFrame(newI420Buffer(2, 2), { timestampUs: 0, rotation });

    expect(frame.rotation).toBe(rotation);

    frame.close();
  });

  it('should reject other rotations', () => {
    const buffer = newI420Buffer(2, 2);

    expect(() => new VideoFrame(buffer, { timestampUs: 0, rotation: 45 })).toThrow(
      'rotation must be 0, 90, 180, or 270'
    );

    buffer.close();
  });

  it('should reject fractional timestamps', () => {
    const buffer = newI420Buffer(2, 2);

    expect(() => new VideoFrame(buffer, { timestampUs: 1.5 })).toThrow(TypeError);
    expect(() => new VideoFrame(buffer, { timestampUs: Number.POSITIVE_INFINITY })).toThrow(TypeError);

    buffer.close();
  });

  it('should close its buffer', () => {
    const buffer = newI420Buffer(2, 2);
    const pixels = buffer.pixelBuffer;
    const frame = new VideoFrame(buffer, { timestampUs: 0 });

    frame.close();

    expect(frame.closed).toBe(true);
    expect(buffer.closed).toBe(true);
    expect(pixels.freed).toBe(true);
  });
});
