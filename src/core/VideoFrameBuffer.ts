/**
 * VideoFrameBuffer - owned handles over shared pixel buffers
 *
 * Each handle holds exactly one counted reference to its pixel buffer. Every
 * handle returned from a conversion or extraction holds a reference of its
 * own, so closing one handle never invalidates another over the same memory.
 *
 * The class hierarchy mirrors the buffer layouts:
 *
 *   VideoFrameBuffer
 *   ├── NativeBuffer
 *   ├── PlanarYuvBuffer
 *   │   ├── PlanarYuv8Buffer ── I420Buffer ── I420ABuffer
 *   │   │                   ├── I422Buffer
 *   │   │                   └── I444Buffer
 *   │   └── PlanarYuv16BBuffer ── I010Buffer
 *   └── BiplanarYuvBuffer ── BiplanarYuv8Buffer ── NV12Buffer
 */

import {
  I010PixelBuffer,
  I420APixelBuffer,
  I420PixelBuffer,
  I422PixelBuffer,
  I444PixelBuffer,
  NativePixelBuffer,
  NV12PixelBuffer,
  type BiplanarYuv8PixelBuffer,
  type BiplanarYuvPixelBuffer,
  type PixelBuffer,
  type PlanarStrides,
  type PlanarYuv16BPixelBuffer,
  type PlanarYuv8PixelBuffer,
  type PlanarYuvPixelBuffer,
  type PlanarYuvPlanes,
} from '../buffers/index.js';
import type {
  ExtractableBufferType,
  PackedPixelFormat,
  VideoFrameBufferType,
} from '../formats/index.js';
import { invalidStateError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { OwnedReference } from './reference.js';

const logger = createLogger('VideoFrameBuffer');

/**
 * Handle class returned for each extractable buffer type
 */
export interface VideoFrameBufferHandles {
  I420: I420Buffer;
  I420A: I420ABuffer;
  I422: I422Buffer;
  I444: I444Buffer;
  I010: I010Buffer;
  NV12: NV12Buffer;
}

export class VideoFrameBuffer<B extends PixelBuffer = PixelBuffer> {
  private readonly _ref: OwnedReference<B>;

  constructor(ref: OwnedReference<B>) {
    this._ref = ref;
  }

  get closed(): boolean {
    return this._ref.released;
  }

  get bufferType(): VideoFrameBufferType {
    return this.buffer.type;
  }

  get width(): number {
    return this.buffer.width;
  }

  get height(): number {
    return this.buffer.height;
  }

  /**
   * The underlying pixel buffer, borrowed. Call addRef() on it to keep it
   * beyond the lifetime of this handle.
   */
  get pixelBuffer(): B {
    return this.buffer;
  }

  /**
   * Get an I420 handle. I420 and I420A buffers share their memory with the
   * new handle; every other layout is converted into a fresh buffer.
   */
  toI420(): I420Buffer {
    return new I420Buffer(OwnedReference.take(this.buffer.toI420(), 'I420 conversion'));
  }

  getI420(): I420Buffer {
    return new I420Buffer(OwnedReference.take(this.buffer.getI420(), this.describeView('I420')));
  }

  getI420A(): I420ABuffer {
    return new I420ABuffer(OwnedReference.take(this.buffer.getI420A(), this.describeView('I420A')));
  }

  getI422(): I422Buffer {
    return new I422Buffer(OwnedReference.take(this.buffer.getI422(), this.describeView('I422')));
  }

  getI444(): I444Buffer {
    return new I444Buffer(OwnedReference.take(this.buffer.getI444(), this.describeView('I444')));
  }

  getI010(): I010Buffer {
    return new I010Buffer(OwnedReference.take(this.buffer.getI010(), this.describeView('I010')));
  }

  getNV12(): NV12Buffer {
    return new NV12Buffer(OwnedReference.take(this.buffer.getNV12(), this.describeView('NV12')));
  }

  /**
   * Get a handle of the requested layout without conversion
   * @throws UnsupportedConversionError when the buffer is stored differently
   */
  extractAs<K extends ExtractableBufferType>(type: K): VideoFrameBufferHandles[K] {
    const extract = EXTRACTORS[type];
    return extract(this);
  }

  /**
   * Release this handle's reference. Closing twice is a no-op.
   */
  close(): void {
    if (this._ref.released) return;
    const buffer = this._ref.buffer;
    this._ref.release();
    logger.debug(`Closed ${buffer.type} handle (${buffer.refCount} references left)`);
  }

  protected get buffer(): B {
    if (this._ref.released) {
      throw invalidStateError(`${this.constructor.name} is closed`);
    }
    return this._ref.buffer;
  }

  /**
   * Release the reference and throw if the buffer is not one of `types`
   */
  protected assertBufferType(...types: VideoFrameBufferType[]): void {
    const type = this.buffer.type;
    if (!types.includes(type)) {
      this.close();
      throw new TypeError(`${this.constructor.name} cannot hold a ${type} buffer`);
    }
  }

  private describeView(requested: ExtractableBufferType): string {
    return `${requested} view of ${this.buffer.type} buffer`;
  }
}

/**
 * Opaque packed RGB buffer; readable only through toI420()
 */
export class NativeBuffer extends VideoFrameBuffer<NativePixelBuffer> {
  constructor(ref: OwnedReference<NativePixelBuffer>) {
    super(ref);
    this.assertBufferType('native');
  }

  get pixelFormat(): PackedPixelFormat {
    return this.buffer.pixelFormat;
  }
}

export abstract class PlanarYuvBuffer<B extends PlanarYuvPixelBuffer> extends VideoFrameBuffer<B> {
  get chromaWidth(): number {
    return this.buffer.chromaWidth;
  }

  get chromaHeight(): number {
    return this.buffer.chromaHeight;
  }

  get strideY(): number {
    return this.buffer.strideY;
  }

  get strideU(): number {
    return this.buffer.strideU;
  }

  get strideV(): number {
    return this.buffer.strideV;
  }
}

export abstract class PlanarYuv8Buffer<B extends PlanarYuv8PixelBuffer> extends PlanarYuvBuffer<B> {
  /** Read-only luma plane, `strideY * height` bytes; valid while this handle is open */
  dataY(): Readonly<Uint8Array> {
    return this.buffer.dataY;
  }

  /** U plane, `strideU * chromaHeight` bytes */
  dataU(): Readonly<Uint8Array> {
    return this.buffer.dataU;
  }

  /** V plane, `strideV * chromaHeight` bytes */
  dataV(): Readonly<Uint8Array> {
    return this.buffer.dataV;
  }
}

export abstract class PlanarYuv16BBuffer<B extends PlanarYuv16BPixelBuffer> extends PlanarYuvBuffer<B> {
  dataY(): Readonly<Uint16Array> {
    return this.buffer.dataY;
  }

  dataU(): Readonly<Uint16Array> {
    return this.buffer.dataU;
  }

  dataV(): Readonly<Uint16Array> {
    return this.buffer.dataV;
  }
}

export abstract class BiplanarYuvBuffer<B extends BiplanarYuvPixelBuffer> extends VideoFrameBuffer<B> {
  get chromaWidth(): number {
    return this.buffer.chromaWidth;
  }

  get chromaHeight(): number {
    return this.buffer.chromaHeight;
  }

  get strideY(): number {
    return this.buffer.strideY;
  }

  get strideUV(): number {
    return this.buffer.strideUV;
  }
}

export abstract class BiplanarYuv8Buffer<B extends BiplanarYuv8PixelBuffer> extends BiplanarYuvBuffer<B> {
  dataY(): Readonly<Uint8Array> {
    return this.buffer.dataY;
  }

  /** Interleaved UV plane, `strideUV * chromaHeight` bytes */
  dataUV(): Readonly<Uint8Array> {
    return this.buffer.dataUV;
  }
}

export class I420Buffer<B extends I420PixelBuffer = I420PixelBuffer> extends PlanarYuv8Buffer<B> {
  constructor(ref: OwnedReference<B>) {
    super(ref);
    this.assertBufferType('I420', 'I420A');
  }

  /**
   * Writable views of the Y, U and V planes.
   * @throws InvalidStateError while another handle shares the buffer
   */
  mutableData(): PlanarYuvPlanes<Uint8Array> {
    const buffer = this.buffer;
    if (!buffer.hasOneRef()) {
      throw invalidStateError(
        `Cannot write to a buffer with ${buffer.refCount} references; copy it first`
      );
    }
    return buffer.mutablePlanes();
  }
}

export class I420ABuffer extends I420Buffer<I420APixelBuffer> {
  constructor(ref: OwnedReference<I420APixelBuffer>) {
    super(ref);
    this.assertBufferType('I420A');
  }

  get strideA(): number {
    return this.buffer.strideA;
  }

  /** Alpha plane, `strideA * height` bytes */
  dataA(): Readonly<Uint8Array> {
    return this.buffer.dataA;
  }
}

export class I422Buffer extends PlanarYuv8Buffer<I422PixelBuffer> {
  constructor(ref: OwnedReference<I422PixelBuffer>) {
    super(ref);
    this.assertBufferType('I422');
  }
}

export class I444Buffer extends PlanarYuv8Buffer<I444PixelBuffer> {
  constructor(ref: OwnedReference<I444PixelBuffer>) {
    super(ref);
    this.assertBufferType('I444');
  }
}

/**
 * 10-bit planar buffer; strides and plane lengths are in 16-bit samples
 */
export class I010Buffer extends PlanarYuv16BBuffer<I010PixelBuffer> {
  constructor(ref: OwnedReference<I010PixelBuffer>) {
    super(ref);
    this.assertBufferType('I010');
  }
}

export class NV12Buffer extends BiplanarYuv8Buffer<NV12PixelBuffer> {
  constructor(ref: OwnedReference<NV12PixelBuffer>) {
    super(ref);
    this.assertBufferType('NV12');
  }
}

const EXTRACTORS: {
  [K in ExtractableBufferType]: (handle: VideoFrameBuffer) => VideoFrameBufferHandles[K];
} = {
  I420: (handle) => handle.getI420(),
  I420A: (handle) => handle.getI420A(),
  I422: (handle) => handle.getI422(),
  I444: (handle) => handle.getI444(),
  I010: (handle) => handle.getI010(),
  NV12: (handle) => handle.getNV12(),
};

/**
 * Wrap a pixel buffer in the handle class matching its layout. The handle
 * takes its own reference; the caller keeps any reference it already holds.
 */
export function wrapVideoFrameBuffer(buffer: PixelBuffer): VideoFrameBuffer {
  if (buffer instanceof I420APixelBuffer) {
    return new I420ABuffer(OwnedReference.take(buffer, 'I420A buffer'));
  }
  if (buffer instanceof I420PixelBuffer) {
    return new I420Buffer(OwnedReference.take(buffer, 'I420 buffer'));
  }
  if (buffer instanceof I422PixelBuffer) {
    return new I422Buffer(OwnedReference.take(buffer, 'I422 buffer'));
  }
  if (buffer instanceof I444PixelBuffer) {
    return new I444Buffer(OwnedReference.take(buffer, 'I444 buffer'));
  }
  if (buffer instanceof I010PixelBuffer) {
    return new I010Buffer(OwnedReference.take(buffer, 'I010 buffer'));
  }
  if (buffer instanceof NV12PixelBuffer) {
    return new NV12Buffer(OwnedReference.take(buffer, 'NV12 buffer'));
  }
  if (buffer instanceof NativePixelBuffer) {
    return new NativeBuffer(OwnedReference.take(buffer, 'native buffer'));
  }
  return new VideoFrameBuffer(OwnedReference.take(buffer, `${buffer.type} buffer`));
}

/**
 * Allocate a zero-filled I420 buffer, ready for writing through mutableData()
 * @throws InvalidDimensionsError unless width and height are positive integers
 */
export function newI420Buffer(
  width: number,
  height: number,
  strides?: Partial<PlanarStrides>
): I420Buffer {
  return new I420Buffer(OwnedReference.take(I420PixelBuffer.create(width, height, strides), 'I420 allocation'));
}

/**
 * Deep copy of the Y, U and V planes of an I420 (or I420A) handle
 */
export function copyI420Buffer(source: I420Buffer): I420Buffer {
  return new I420Buffer(OwnedReference.take(I420PixelBuffer.copy(source.pixelBuffer), 'I420 copy'));
}

/**
 * Deep copy of any handle, in the same layout
 */
export function copyVideoFrameBuffer(source: VideoFrameBuffer): VideoFrameBuffer {
  return wrapVideoFrameBuffer(source.pixelBuffer.clone());
}
