/**
 * Reference-counted pixel buffers
 *
 * The abstract levels mirror the layouts a decoder or capturer hands out:
 * generic -> planar YUV -> 8/16-bit planar, and generic -> biplanar YUV ->
 * 8-bit biplanar. Every method that returns a buffer returns a borrowed,
 * uncounted reference; whoever keeps it must call addRef().
 *
 * Plane getters hand out read-only views of memory other references may
 * share. mutablePlanes() is the only writable path.
 */

import { getChromaSize, type VideoFrameBufferType } from '../formats/index.js';
import { createLogger } from '../utils/logger.js';
import { RefCounted } from './ref-counted.js';
import { copyPlane, copyPlane16 } from './conversions.js';
import { EMPTY_PLANE_8, EMPTY_PLANE_16 } from './layout.js';
import { validatePlaneLength, validateStride } from './validation.js';
import type { I420PixelBuffer } from './i420.js';
import type { I420APixelBuffer } from './i420a.js';
import type { I422PixelBuffer } from './i422.js';
import type { I444PixelBuffer } from './i444.js';
import type { I010PixelBuffer } from './i010.js';
import type { NV12PixelBuffer } from './nv12.js';

const logger = createLogger('PixelBuffer');

export interface PlanarStrides {
  strideY: number;
  strideU: number;
  strideV: number;
}

export interface BiplanarStrides {
  strideY: number;
  strideUV: number;
}

/**
 * Y, U and V planes with their strides
 */
export interface PlanarYuvPlanes<T extends Readonly<Uint8Array> | Readonly<Uint16Array>> extends PlanarStrides {
  dataY: T;
  dataU: T;
  dataV: T;
}

/**
 * Y and interleaved UV planes with their strides
 */
export interface BiplanarYuvPlanes<T extends Readonly<Uint8Array> = Readonly<Uint8Array>> extends BiplanarStrides {
  dataY: T;
  dataUV: T;
}

export abstract class PixelBuffer extends RefCounted {
  protected constructor(readonly width: number, readonly height: number) {
    super();
  }

  abstract get type(): VideoFrameBufferType;

  /**
   * Get this buffer as I420, converting when it is stored in another layout.
   * I420 and I420A buffers return themselves.
   */
  abstract toI420(): I420PixelBuffer;

  /** Deep copy in the same layout */
  abstract clone(): PixelBuffer;

  getI420(): I420PixelBuffer | null {
    return null;
  }

  getI420A(): I420APixelBuffer | null {
    return null;
  }

  getI422(): I422PixelBuffer | null {
    return null;
  }

  getI444(): I444PixelBuffer | null {
    return null;
  }

  getI010(): I010PixelBuffer | null {
    return null;
  }

  getNV12(): NV12PixelBuffer | null {
    return null;
  }

  protected onLastRelease(): void {
    logger.debug(`Freed ${this.type} ${this.width}x${this.height} buffer`);
    this.freeMemory();
  }

  protected abstract freeMemory(): void;
}

export abstract class PlanarYuvPixelBuffer extends PixelBuffer {
  get chromaWidth(): number {
    return getChromaSize(this.type, this.width, this.height).width;
  }

  get chromaHeight(): number {
    return getChromaSize(this.type, this.width, this.height).height;
  }

  abstract get strideY(): number;
  abstract get strideU(): number;
  abstract get strideV(): number;
}

export abstract class PlanarYuv8PixelBuffer extends PlanarYuvPixelBuffer {
  private _dataY: Uint8Array;
  private _dataU: Uint8Array;
  private _dataV: Uint8Array;

  protected constructor(
    width: number,
    height: number,
    private readonly strides: PlanarStrides,
    dataY: Uint8Array,
    dataU: Uint8Array,
    dataV: Uint8Array
  ) {
    super(width, height);
    this._dataY = dataY;
    this._dataU = dataU;
    this._dataV = dataV;
  }

  get strideY(): number { return this.strides.strideY; }
  get strideU(): number { return this.strides.strideU; }
  get strideV(): number { return this.strides.strideV; }

  get dataY(): Readonly<Uint8Array> {
    this.assertAlive();
    return this._dataY;
  }

  get dataU(): Readonly<Uint8Array> {
    this.assertAlive();
    return this._dataU;
  }

  get dataV(): Readonly<Uint8Array> {
    this.assertAlive();
    return this._dataV;
  }

  planes(): PlanarYuvPlanes<Readonly<Uint8Array>> {
    return {
      dataY: this.dataY, strideY: this.strideY,
      dataU: this.dataU, strideU: this.strideU,
      dataV: this.dataV, strideV: this.strideV,
    };
  }

  /**
   * Writable planes. Callers must hold the only reference, or own a buffer
   * nobody else has seen yet.
   */
  mutablePlanes(): PlanarYuvPlanes<Uint8Array> {
    this.assertAlive();
    return {
      dataY: this._dataY, strideY: this.strideY,
      dataU: this._dataU, strideU: this.strideU,
      dataV: this._dataV, strideV: this.strideV,
    };
  }

  /**
   * Copy the visible samples of `src` into this buffer's planes
   */
  protected copyPlanesFrom(src: PlanarYuvPlanes<Readonly<Uint8Array>>): void {
    const { width, height, chromaWidth, chromaHeight } = this;
    validateSourcePlanes(src, width, height, chromaWidth, chromaHeight);
    const dest = this.mutablePlanes();
    copyPlane(src.dataY, src.strideY, dest.dataY, dest.strideY, width, height);
    copyPlane(src.dataU, src.strideU, dest.dataU, dest.strideU, chromaWidth, chromaHeight);
    copyPlane(src.dataV, src.strideV, dest.dataV, dest.strideV, chromaWidth, chromaHeight);
  }

  protected freeMemory(): void {
    this._dataY = EMPTY_PLANE_8;
    this._dataU = EMPTY_PLANE_8;
    this._dataV = EMPTY_PLANE_8;
  }
}

export abstract class PlanarYuv16BPixelBuffer extends PlanarYuvPixelBuffer {
  private _dataY: Uint16Array;
  private _dataU: Uint16Array;
  private _dataV: Uint16Array;

  protected constructor(
    width: number,
    height: number,
    private readonly strides: PlanarStrides,
    dataY: Uint16Array,
    dataU: Uint16Array,
    dataV: Uint16Array
  ) {
    super(width, height);
    this._dataY = dataY;
    this._dataU = dataU;
    this._dataV = dataV;
  }

  get strideY(): number { return this.strides.strideY; }
  get strideU(): number { return this.strides.strideU; }
  get strideV(): number { return this.strides.strideV; }

  get dataY(): Readonly<Uint16Array> {
    this.assertAlive();
    return this._dataY;
  }

  get dataU(): Readonly<Uint16Array> {
    this.assertAlive();
    return this._dataU;
  }

  get dataV(): Readonly<Uint16Array> {
    this.assertAlive();
    return this._dataV;
  }

  planes(): PlanarYuvPlanes<Readonly<Uint16Array>> {
    return {
      dataY: this.dataY, strideY: this.strideY,
      dataU: this.dataU, strideU: this.strideU,
      dataV: this.dataV, strideV: this.strideV,
    };
  }

  mutablePlanes(): PlanarYuvPlanes<Uint16Array> {
    this.assertAlive();
    return {
      dataY: this._dataY, strideY: this.strideY,
      dataU: this._dataU, strideU: this.strideU,
      dataV: this._dataV, strideV: this.strideV,
    };
  }

  protected copyPlanesFrom(src: PlanarYuvPlanes<Readonly<Uint16Array>>): void {
    const { width, height, chromaWidth, chromaHeight } = this;
    validateSourcePlanes(src, width, height, chromaWidth, chromaHeight);
    const dest = this.mutablePlanes();
    copyPlane16(src.dataY, src.strideY, dest.dataY, dest.strideY, width, height);
    copyPlane16(src.dataU, src.strideU, dest.dataU, dest.strideU, chromaWidth, chromaHeight);
    copyPlane16(src.dataV, src.strideV, dest.dataV, dest.strideV, chromaWidth, chromaHeight);
  }

  protected freeMemory(): void {
    this._dataY = EMPTY_PLANE_16;
    this._dataU = EMPTY_PLANE_16;
    this._dataV = EMPTY_PLANE_16;
  }
}

export abstract class BiplanarYuvPixelBuffer extends PixelBuffer {
  get chromaWidth(): number {
    return getChromaSize(this.type, this.width, this.height).width;
  }

  get chromaHeight(): number {
    return getChromaSize(this.type, this.width, this.height).height;
  }

  abstract get strideY(): number;
  abstract get strideUV(): number;
}

export abstract class BiplanarYuv8PixelBuffer extends BiplanarYuvPixelBuffer {
  private _dataY: Uint8Array;
  private _dataUV: Uint8Array;

  protected constructor(
    width: number,
    height: number,
    private readonly strides: BiplanarStrides,
    dataY: Uint8Array,
    dataUV: Uint8Array
  ) {
    super(width, height);
    this._dataY = dataY;
    this._dataUV = dataUV;
  }

  get strideY(): number { return this.strides.strideY; }
  get strideUV(): number { return this.strides.strideUV; }

  get dataY(): Readonly<Uint8Array> {
    this.assertAlive();
    return this._dataY;
  }

  get dataUV(): Readonly<Uint8Array> {
    this.assertAlive();
    return this._dataUV;
  }

  planes(): BiplanarYuvPlanes {
    return { dataY: this.dataY, strideY: this.strideY, dataUV: this.dataUV, strideUV: this.strideUV };
  }

  mutablePlanes(): BiplanarYuvPlanes<Uint8Array> {
    this.assertAlive();
    return { dataY: this._dataY, strideY: this.strideY, dataUV: this._dataUV, strideUV: this.strideUV };
  }

  protected copyPlanesFrom(src: BiplanarYuvPlanes): void {
    const { width, height, chromaHeight } = this;
    const uvWidth = 2 * this.chromaWidth;
    validateStride(src.strideY, width, 'strideY');
    validateStride(src.strideUV, uvWidth, 'strideUV');
    validatePlaneLength(src.dataY, src.strideY, width, height, 'dataY');
    validatePlaneLength(src.dataUV, src.strideUV, uvWidth, chromaHeight, 'dataUV');
    const dest = this.mutablePlanes();
    copyPlane(src.dataY, src.strideY, dest.dataY, dest.strideY, width, height);
    copyPlane(src.dataUV, src.strideUV, dest.dataUV, dest.strideUV, uvWidth, chromaHeight);
  }

  protected freeMemory(): void {
    this._dataY = EMPTY_PLANE_8;
    this._dataUV = EMPTY_PLANE_8;
  }
}

function validateSourcePlanes(
  src: PlanarYuvPlanes<Readonly<Uint8Array> | Readonly<Uint16Array>>,
  width: number,
  height: number,
  chromaWidth: number,
  chromaHeight: number
): void {
  validateStride(src.strideY, width, 'strideY');
  validateStride(src.strideU, chromaWidth, 'strideU');
  validateStride(src.strideV, chromaWidth, 'strideV');
  validatePlaneLength(src.dataY, src.strideY, width, height, 'dataY');
  validatePlaneLength(src.dataU, src.strideU, chromaWidth, chromaHeight, 'dataU');
  validatePlaneLength(src.dataV, src.strideV, chromaWidth, chromaHeight, 'dataV');
}
