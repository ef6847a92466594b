/**
 * I420A (I420 plus a full-resolution alpha plane) buffer
 */

import { getChromaSize, type VideoFrameBufferType } from '../formats/index.js';
import { I420PixelBuffer, type PlanarYuvInit } from './i420.js';
import type { PlanarStrides } from './pixel-buffer.js';
import { copyPlane } from './conversions.js';
import { allocatePlanes8, EMPTY_PLANE_8, resolveStride } from './layout.js';
import { validateDimensions, validatePlaneLength, validateStride } from './validation.js';

export interface I420AStrides extends PlanarStrides {
  strideA: number;
}

export interface I420AInit extends PlanarYuvInit<Readonly<Uint8Array>> {
  dataA: Readonly<Uint8Array>;
  strideA: number;
}

export class I420APixelBuffer extends I420PixelBuffer {
  readonly strideA: number;
  private _dataA: Uint8Array;

  protected constructor(
    width: number,
    height: number,
    strides: I420AStrides,
    dataY: Uint8Array,
    dataU: Uint8Array,
    dataV: Uint8Array,
    dataA: Uint8Array
  ) {
    super(width, height, strides, dataY, dataU, dataV);
    this._dataA = dataA;
    this.strideA = strides.strideA;
  }

  get type(): VideoFrameBufferType {
    return 'I420A';
  }

  get dataA(): Readonly<Uint8Array> {
    this.assertAlive();
    return this._dataA;
  }

  static create(width: number, height: number, strides: Partial<I420AStrides> = {}): I420APixelBuffer {
    validateDimensions(width, height);
    const chroma = getChromaSize('I420A', width, height);
    const resolved: I420AStrides = {
      strideY: resolveStride(strides.strideY, width, 'strideY'),
      strideU: resolveStride(strides.strideU, chroma.width, 'strideU'),
      strideV: resolveStride(strides.strideV, chroma.width, 'strideV'),
      strideA: resolveStride(strides.strideA, width, 'strideA'),
    };
    const [dataY, dataU, dataV, dataA] = allocatePlanes8([
      { stride: resolved.strideY, rows: height },
      { stride: resolved.strideU, rows: chroma.height },
      { stride: resolved.strideV, rows: chroma.height },
      { stride: resolved.strideA, rows: height },
    ]);
    return new I420APixelBuffer(width, height, resolved, dataY, dataU, dataV, dataA);
  }

  static fromPlanes(init: I420AInit): I420APixelBuffer {
    const buffer = I420APixelBuffer.create(init.width, init.height);
    buffer.copyPlanesFrom(init);
    buffer.copyAlphaFrom(init.dataA, init.strideA);
    return buffer;
  }

  getI420A(): I420APixelBuffer | null {
    return this;
  }

  clone(): I420APixelBuffer {
    const copy = I420APixelBuffer.create(this.width, this.height);
    copy.copyPlanesFrom(this.planes());
    copy.copyAlphaFrom(this.dataA, this.strideA);
    return copy;
  }

  private copyAlphaFrom(dataA: Readonly<Uint8Array>, strideA: number): void {
    validateStride(strideA, this.width, 'strideA');
    validatePlaneLength(dataA, strideA, this.width, this.height, 'dataA');
    this.assertAlive();
    copyPlane(dataA, strideA, this._dataA, this.strideA, this.width, this.height);
  }

  protected freeMemory(): void {
    super.freeMemory();
    this._dataA = EMPTY_PLANE_8;
  }
}
