/**
 * I444 (YUV 4:4:4, 8-bit, three planes) buffer
 */

import type { VideoFrameBufferType } from '../formats/index.js';
import { PlanarYuv8PixelBuffer, type PlanarStrides } from './pixel-buffer.js';
import { I420PixelBuffer, type PlanarYuvInit } from './i420.js';
import { copyPlane, halvePlane } from './conversions.js';
import { allocatePlanes8, resolveStride } from './layout.js';
import { validateDimensions } from './validation.js';

export class I444PixelBuffer extends PlanarYuv8PixelBuffer {
  get type(): VideoFrameBufferType {
    return 'I444';
  }

  static create(width: number, height: number, strides: Partial<PlanarStrides> = {}): I444PixelBuffer {
    validateDimensions(width, height);
    const resolved: PlanarStrides = {
      strideY: resolveStride(strides.strideY, width, 'strideY'),
      strideU: resolveStride(strides.strideU, width, 'strideU'),
      strideV: resolveStride(strides.strideV, width, 'strideV'),
    };
    const [dataY, dataU, dataV] = allocatePlanes8([
      { stride: resolved.strideY, rows: height },
      { stride: resolved.strideU, rows: height },
      { stride: resolved.strideV, rows: height },
    ]);
    return new I444PixelBuffer(width, height, resolved, dataY, dataU, dataV);
  }

  static fromPlanes(init: PlanarYuvInit<Readonly<Uint8Array>>): I444PixelBuffer {
    const buffer = I444PixelBuffer.create(init.width, init.height);
    buffer.copyPlanesFrom(init);
    return buffer;
  }

  /**
   * Luma is copied; chroma is box-filtered 2x2
   */
  toI420(): I420PixelBuffer {
    const i420 = I420PixelBuffer.create(this.width, this.height);
    const dest = i420.mutablePlanes();
    copyPlane(this.dataY, this.strideY, dest.dataY, dest.strideY, this.width, this.height);
    halvePlane(this.dataU, this.strideU, dest.dataU, dest.strideU, this.width, this.height);
    halvePlane(this.dataV, this.strideV, dest.dataV, dest.strideV, this.width, this.height);
    return i420;
  }

  getI444(): I444PixelBuffer | null {
    return this;
  }

  clone(): I444PixelBuffer {
    const copy = I444PixelBuffer.create(this.width, this.height);
    copy.copyPlanesFrom(this.planes());
    return copy;
  }
}
