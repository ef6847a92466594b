/**
 * Tests for HandleRegistry and buffer info
 */

import { I420APixelBuffer, NativePixelBuffer, NV12PixelBuffer } from '../buffers/index.js';
import { getBufferInfo } from '../core/buffer-info.js';
import { HandleRegistry } from '../core/HandleRegistry.js';
import {
  I420Buffer,
  newI420Buffer,
  NV12Buffer,
  VideoFrameBuffer,
  wrapVideoFrameBuffer,
} from '../core/VideoFrameBuffer.js';

describe('HandleRegistry', () => {
  let registry: HandleRegistry;

  beforeEach(() => {
    registry = new HandleRegistry();
  });

  afterEach(() => {
    registry.dispose();
  });

  it('should hand out increasing ids starting at 1', () => {
    expect(registry.nextId()).toBe(1);
    expect(registry.nextId()).toBe(2);
    expect(registry.nextId()).toBe(3);
  });

  it('should retrieve a stored handle by class', () => {
    const handle = newI420Buffer(2, 2);
    const id = registry.nextId();
    registry.store(id, handle);

    expect(registry.has(id)).toBe(true);
    expect(registry.size).toBe(1);
    expect(registry.retrieve(id, I420Buffer)).toBe(handle);
    expect(registry.retrieve(id, VideoFrameBuffer)).toBe(handle);
  });

  it('should reject a handle of another class', () => {
    const id = registry.nextId();
    registry.store(id, newI420Buffer(2, 2));

    expect(() => registry.retrieve(id, NV12Buffer)).toThrow(
      expect.objectContaining({
        name: 'InvalidHandleError',
        message: 'Handle 1 is a I420Buffer, not a NV12Buffer',
      })
    );
  });

  it('should reject unknown ids', () => {
    expect(() => registry.retrieve(99, I420Buffer)).toThrow(
      expect.objectContaining({ name: 'InvalidHandleError', message: 'Unknown handle 99' })
    );
  });

  it('should not store two handles under one id', () => {
    const id = registry.nextId();
    registry.store(id, newI420Buffer(2, 2));
    const second = newI420Buffer(2, 2);

    expect(() => registry.store(id, second)).toThrow(
      expect.objectContaining({ name: 'InvalidHandleError', message: 'Handle 1 is already in use' })
    );

    second.close();
  });

  it('should close a dropped handle', () => {
    const handle = newI420Buffer(2, 2);
    const pixels = handle.pixelBuffer;
    const id = registry.nextId();
    registry.store(id, handle);

    expect(registry.drop(id)).toBe(true);
    expect(handle.closed).toBe(true);
    expect(pixels.freed).toBe(true);
    expect(registry.has(id)).toBe(false);
    expect(registry.drop(id)).toBe(false);
  });

  it('should close everything on dispose', () => {
    const first = newI420Buffer(2, 2);
    const second = first.toI420();
    registry.store(registry.nextId(), first);
    registry.store(registry.nextId(), second);

    registry.dispose();

    expect(registry.size).toBe(0);
    expect(first.closed).toBe(true);
    expect(second.closed).toBe(true);
  });
});

describe('getBufferInfo', () => {
  it('should describe a planar buffer', () => {
    const handle = newI420Buffer(5, 3);

    expect(getBufferInfo(handle)).toEqual({
      type: 'I420',
      width: 5,
      height: 3,
      yuv: { chromaWidth: 3, chromaHeight: 2, strideY: 5, strideU: 3, strideV: 3 },
    });

    handle.close();
  });

  it('should include the alpha stride of an I420A buffer', () => {
    const handle = wrapVideoFrameBuffer(I420APixelBuffer.create(4, 2));

    expect(getBufferInfo(handle)).toEqual({
      type: 'I420A',
      width: 4,
      height: 2,
      yuv: { chromaWidth: 2, chromaHeight: 1, strideY: 4, strideU: 2, strideV: 2, strideA: 4 },
    });

    handle.close();
  });

  it('should describe a biplanar buffer', () => {
    const handle = wrapVideoFrameBuffer(NV12PixelBuffer.create(4, 4));

    expect(getBufferInfo(handle)).toEqual({
      type: 'NV12',
      width: 4,
      height: 4,
      biYuv: { chromaWidth: 2, chromaHeight: 2, strideY: 4, strideUV: 4 },
    });

    handle.close();
  });

  it('should describe a native buffer by its size only', () => {
    const handle = wrapVideoFrameBuffer(NativePixelBuffer.fromPixels(new Uint8Array(16), 2, 2));

    expect(getBufferInfo(handle)).toEqual({ type: 'native', width: 2, height: 2 });

    handle.close();
  });
});
