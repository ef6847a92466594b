/**
 * Tests for VideoStream
 */

import v8 from 'v8';
import vm from 'vm';
import { HandleRegistry } from '../core/HandleRegistry.js';
import { VideoFrame } from '../core/VideoFrame.js';
import { I420Buffer, newI420Buffer } from '../core/VideoFrameBuffer.js';
import { VideoStream, type VideoFrameReceivedEvent } from '../core/VideoStream.js';

async function* framesOf(...frames: VideoFrame[]): AsyncGenerator<VideoFrame> {
  for (const frame of frames) {
    yield frame;
  }
}

function createFrame(timestampUs: number, rotation = 0): VideoFrame {
  return new VideoFrame(newI420Buffer(4, 2), { timestampUs, rotation });
}

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Full garbage collection, exposed through a fresh context
 */
function exposeGc(): () => void {
  v8.setFlagsFromString('--expose-gc');
  const gc: unknown = vm.runInNewContext('gc');
  if (typeof gc !== 'function') {
    throw new Error('gc is not available');
  }
  return () => {
    gc();
  };
}

describe('VideoStream', () => {
  let registry: HandleRegistry;

  beforeEach(() => {
    registry = new HandleRegistry();
  });

  afterEach(() => {
    registry.dispose();
    jest.restoreAllMocks();
  });

  it('should forward every frame as a registry-owned buffer', async () => {
    const first = createFrame(1000);
    const second = createFrame(2000, 90);
    const stream = VideoStream.create(registry, framesOf(first, second));
    const received: VideoFrameReceivedEvent[] = [];
    stream.on('frameReceived', (event) => received.push(event));

    await stream.done;

    expect(stream.handleId).toBe(1);
    expect(received).toEqual([
      {
        streamHandle: 1,
        frame: { timestampUs: 1000, rotation: 0 },
        buffer: {
          handle: 2,
          info: {
            type: 'I420',
            width: 4,
            height: 2,
            yuv: { chromaWidth: 2, chromaHeight: 1, strideY: 4, strideU: 2, strideV: 2 },
          },
        },
      },
      {
        streamHandle: 1,
        frame: { timestampUs: 2000, rotation: 90 },
        buffer: {
          handle: 3,
          info: {
            type: 'I420',
            width: 4,
            height: 2,
            yuv: { chromaWidth: 2, chromaHeight: 1, strideY: 4, strideU: 2, strideV: 2 },
          },
        },
      },
    ]);
    expect(registry.retrieve(2, I420Buffer)).toBe(first.buffer);
    expect(registry.retrieve(3, I420Buffer)).toBe(second.buffer);
    expect(registry.retrieve(1, VideoStream)).toBe(stream);
  });

  it('should emit eos once when the source ends', async () => {
    const stream = VideoStream.create(registry, framesOf(createFrame(0)));
    const eos = jest.fn();
    stream.on('eos', eos);

    await stream.done;
    stream.close();
    await nextTick();

    expect(eos).toHaveBeenCalledTimes(1);
    expect(eos).toHaveBeenCalledWith({ streamHandle: 1 });
  });

  it('should stop forwarding and discard late frames after close', async () => {
    let openGate: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const first = createFrame(0);
    const late = createFrame(33_333);
    async function* gatedSource(): AsyncGenerator<VideoFrame> {
      yield first;
      await gate;
      yield late;
    }

    const stream = VideoStream.create(registry, gatedSource());
    const received: VideoFrameReceivedEvent[] = [];
    const eos = jest.fn();
    stream.on('eos', eos);
    const firstReceived = new Promise<void>((resolve) => {
      stream.on('frameReceived', (event) => {
        received.push(event);
        resolve();
      });
    });

    await firstReceived;
    stream.close();
    await stream.done;

    expect(stream.closed).toBe(true);
    expect(eos).toHaveBeenCalledTimes(1);

    openGate();
    await nextTick();

    expect(received).toHaveLength(1);
    expect(late.closed).toBe(true);
    expect(first.closed).toBe(false);
    expect(registry.size).toBe(2);
  });

  it('should end with eos when the source fails', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    async function* failingSource(): AsyncGenerator<VideoFrame> {
      yield createFrame(0);
      throw new Error('capture device lost');
    }

    const stream = VideoStream.create(registry, failingSource());
    const eos = jest.fn();
    const frameReceived = jest.fn();
    stream.on('eos', eos);
    stream.on('frameReceived', frameReceived);

    await stream.done;

    expect(frameReceived).toHaveBeenCalledTimes(1);
    expect(eos).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      '[video-frame-buffers:VideoStream] Video stream 1 source failed: capture device lost'
    );
  });

  it('should end with eos when the source cannot start', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const unavailable: AsyncIterable<VideoFrame> = {
      [Symbol.asyncIterator](): AsyncIterator<VideoFrame> {
        throw new Error('device unavailable');
      },
    };

    const stream = VideoStream.create(registry, unavailable);
    const eos = jest.fn();
    stream.on('eos', eos);

    await expect(stream.done).resolves.toBeUndefined();
    expect(eos).toHaveBeenCalledTimes(1);
    expect(eos).toHaveBeenCalledWith({ streamHandle: 1 });
    expect(warn).toHaveBeenCalledWith(
      '[video-frame-buffers:VideoStream] Video stream 1 source failed: device unavailable'
    );
  });

  it('should not keep forwarded frames alive while open', async () => {
    const collectGarbage = exposeGc();
    const forwarded: WeakRef<VideoFrame>[] = [];
    let openGate: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    async function* liveSource(): AsyncGenerator<VideoFrame> {
      for (let i = 0; i < 20; i++) {
        const frame = createFrame(i * 1000);
        forwarded.push(new WeakRef(frame));
        yield frame;
      }
      await gate;
    }

    const stream = VideoStream.create(registry, liveSource());
    let received = 0;
    stream.on('frameReceived', (event) => {
      received++;
      registry.drop(event.buffer.handle);
    });

    while (received < 20) {
      await nextTick();
    }
    await nextTick();
    collectGarbage();
    await nextTick();
    collectGarbage();

    const reachable = forwarded.filter((ref) => ref.deref() !== undefined).length;
    expect(forwarded).toHaveLength(20);
    expect(reachable).toBeLessThanOrEqual(1);
    expect(stream.closed).toBe(false);

    stream.close();
    openGate();
    await stream.done;
  });

  it('should close when dropped from the registry', async () => {
    const stream = VideoStream.create(registry, framesOf());
    const eos = jest.fn();
    stream.on('eos', eos);

    expect(registry.drop(stream.handleId)).toBe(true);
    await stream.done;

    expect(stream.closed).toBe(true);
    expect(eos).toHaveBeenCalledTimes(1);
  });

  it('should skip frames that were closed before they arrived', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const closed = createFrame(0);
    closed.close();

    const stream = VideoStream.create(registry, framesOf(closed, createFrame(1)));
    const frameReceived = jest.fn();
    stream.on('frameReceived', frameReceived);

    await stream.done;

    expect(frameReceived).toHaveBeenCalledTimes(1);
    expect(frameReceived).toHaveBeenCalledWith(
      expect.objectContaining({ frame: { timestampUs: 1, rotation: 0 } })
    );
    expect(warn).toHaveBeenCalledWith(
      '[video-frame-buffers:VideoStream] Video stream 1 received a closed frame, skipping'
    );
  });

  it('should keep going when a listener throws', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const stream = VideoStream.create(registry, framesOf(createFrame(0), createFrame(1)));
    const frameReceived = jest.fn(() => {
      throw new Error('listener failed');
    });
    stream.on('frameReceived', frameReceived);

    await stream.done;

    expect(frameReceived).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith(
      '[video-frame-buffers:VideoStream] Failed to deliver frameReceived on stream 1: listener failed'
    );
  });
});
