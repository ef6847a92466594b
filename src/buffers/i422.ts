/**
 * I422 (YUV 4:2:2, 8-bit, three planes) buffer
 */

import { getChromaSize, type VideoFrameBufferType } from '../formats/index.js';
import { PlanarYuv8PixelBuffer, type PlanarStrides } from './pixel-buffer.js';
import { I420PixelBuffer, type PlanarYuvInit } from './i420.js';
import { copyPlane, halvePlaneRows } from './conversions.js';
import { allocatePlanes8, resolveStride } from './layout.js';
import { validateDimensions } from './validation.js';

export class I422PixelBuffer extends PlanarYuv8PixelBuffer {
  get type(): VideoFrameBufferType {
    return 'I422';
  }

  static create(width: number, height: number, strides: Partial<PlanarStrides> = {}): I422PixelBuffer {
    validateDimensions(width, height);
    const chroma = getChromaSize('I422', width, height);
    const resolved: PlanarStrides = {
      strideY: resolveStride(strides.strideY, width, 'strideY'),
      strideU: resolveStride(strides.strideU, chroma.width, 'strideU'),
      strideV: resolveStride(strides.strideV, chroma.width, 'strideV'),
    };
    const [dataY, dataU, dataV] = allocatePlanes8([
      { stride: resolved.strideY, rows: height },
      { stride: resolved.strideU, rows: chroma.height },
      { stride: resolved.strideV, rows: chroma.height },
    ]);
    return new I422PixelBuffer(width, height, resolved, dataY, dataU, dataV);
  }

  static fromPlanes(init: PlanarYuvInit<Readonly<Uint8Array>>): I422PixelBuffer {
    const buffer = I422PixelBuffer.create(init.width, init.height);
    buffer.copyPlanesFrom(init);
    return buffer;
  }

  /**
   * Luma is copied; chroma rows are averaged in pairs
   */
  toI420(): I420PixelBuffer {
    const i420 = I420PixelBuffer.create(this.width, this.height);
    const dest = i420.mutablePlanes();
    copyPlane(this.dataY, this.strideY, dest.dataY, dest.strideY, this.width, this.height);
    halvePlaneRows(this.dataU, this.strideU, dest.dataU, dest.strideU, this.chromaWidth, this.chromaHeight);
    halvePlaneRows(this.dataV, this.strideV, dest.dataV, dest.strideV, this.chromaWidth, this.chromaHeight);
    return i420;
  }

  getI422(): I422PixelBuffer | null {
    return this;
  }

  clone(): I422PixelBuffer {
    const copy = I422PixelBuffer.create(this.width, this.height);
    copy.copyPlanesFrom(this.planes());
    return copy;
  }
}
