/**
 * VideoStream - forwards frames from a source to registry-owned handles
 *
 * Each received frame's buffer is stored in the registry under a new id and
 * announced with a `frameReceived` event; the listener owns that id and must
 * drop it. When the source ends, fails, or the stream is closed, a single
 * `eos` event follows. A frame that arrives after close() is closed and never
 * announced.
 */

import { EventEmitter } from 'events';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { getBufferInfo, type VideoFrameBufferInfo } from './buffer-info.js';
import type { HandleId, HandleRegistry } from './HandleRegistry.js';
import type { VideoFrame, VideoFrameInfo } from './VideoFrame.js';

const logger = createLogger('VideoStream');

const CLOSED = Symbol('closed');

export interface OwnedVideoFrameBuffer {
  handle: HandleId;
  info: VideoFrameBufferInfo;
}

export interface VideoFrameReceivedEvent {
  streamHandle: HandleId;
  frame: VideoFrameInfo;
  buffer: OwnedVideoFrameBuffer;
}

export interface VideoStreamEosEvent {
  streamHandle: HandleId;
}

export declare interface VideoStream {
  on(event: 'frameReceived', listener: (event: VideoFrameReceivedEvent) => void): this;
  on(event: 'eos', listener: (event: VideoStreamEosEvent) => void): this;
  once(event: 'frameReceived', listener: (event: VideoFrameReceivedEvent) => void): this;
  once(event: 'eos', listener: (event: VideoStreamEosEvent) => void): this;
}

export class VideoStream extends EventEmitter {
  readonly handleId: HandleId;
  /** Resolves once `eos` has been emitted */
  readonly done: Promise<void>;

  private _closed = false;
  private readonly registry: HandleRegistry;
  /** Wakes the read in flight, if any, when the stream is closed */
  private wakeOnClose: (() => void) | null = null;

  /**
   * Start forwarding `source` once the caller has had a chance to attach
   * listeners. The stream stores itself in `registry` under `handleId`;
   * dropping that id closes it.
   */
  constructor(registry: HandleRegistry, source: AsyncIterable<VideoFrame>) {
    super();
    this.registry = registry;
    this.handleId = registry.nextId();
    registry.store(this.handleId, this);
    this.done = Promise.resolve().then(() => this.forwardFrames(source));
    logger.debug(`Video stream ${this.handleId} started`);
  }

  static create(registry: HandleRegistry, source: AsyncIterable<VideoFrame>): VideoStream {
    return new VideoStream(registry, source);
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Stop forwarding. Frames received afterwards are discarded.
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.wakeOnClose?.();
  }

  private async forwardFrames(source: AsyncIterable<VideoFrame>): Promise<void> {
    try {
      const iterator = source[Symbol.asyncIterator]();
      for (;;) {
        if (this._closed) {
          this.returnSource(iterator);
          break;
        }
        const pending = iterator.next();
        const result = await this.nextOrClose(pending);
        if (result === CLOSED) {
          this.discardLateFrame(pending);
          continue;
        }
        if (result.done) {
          break;
        }
        if (this._closed) {
          result.value.close();
          continue;
        }
        this.forwardFrame(result.value);
      }
    } catch (err) {
      logger.warn(`Video stream ${this.handleId} source failed: ${errorMessage(err)}`);
    }

    this.send('eos', { streamHandle: this.handleId });
    logger.debug(`Video stream ${this.handleId} ended`);
  }

  /**
   * Settle with the pending read, or with CLOSED if close() comes first.
   * The close hook lives only as long as this read.
   */
  private nextOrClose(
    pending: Promise<IteratorResult<VideoFrame>>
  ): Promise<IteratorResult<VideoFrame> | typeof CLOSED> {
    return new Promise<IteratorResult<VideoFrame> | typeof CLOSED>((resolve, reject) => {
      this.wakeOnClose = () => resolve(CLOSED);
      pending.then(resolve, reject);
    }).finally(() => {
      this.wakeOnClose = null;
    });
  }

  private forwardFrame(frame: VideoFrame): void {
    if (frame.closed) {
      logger.warn(`Video stream ${this.handleId} received a closed frame, skipping`);
      return;
    }

    const handle = this.registry.nextId();
    const info = getBufferInfo(frame.buffer);
    this.registry.store(handle, frame.buffer);

    const event: VideoFrameReceivedEvent = {
      streamHandle: this.handleId,
      frame: frame.info,
      buffer: { handle, info },
    };
    this.send('frameReceived', event);
  }

  /**
   * Close whatever a read abandoned by close() eventually yields
   */
  private discardLateFrame(pending: Promise<IteratorResult<VideoFrame>>): void {
    pending.then(
      (late) => {
        if (!late.done) late.value.close();
      },
      (err: unknown) => logger.debug(`Source failed after close: ${errorMessage(err)}`)
    );
  }

  /**
   * Ask the source to finish so it can run its cleanup
   */
  private returnSource(iterator: AsyncIterator<VideoFrame>): void {
    iterator.return?.().then(
      () => undefined,
      (err: unknown) => logger.debug(`Source cleanup failed: ${errorMessage(err)}`)
    );
  }

  private send(event: 'frameReceived' | 'eos', payload: VideoFrameReceivedEvent | VideoStreamEosEvent): void {
    try {
      this.emit(event, payload);
    } catch (err) {
      logger.warn(`Failed to deliver ${event} on stream ${this.handleId}: ${errorMessage(err)}`);
    }
  }
}
