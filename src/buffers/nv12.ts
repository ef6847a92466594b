/**
 * NV12 (Y plane plus interleaved UV plane, 4:2:0, 8-bit) buffer
 */

import { getChromaSize, type VideoFrameBufferType } from '../formats/index.js';
import {
  BiplanarYuv8PixelBuffer,
  type BiplanarStrides,
  type BiplanarYuvPlanes,
} from './pixel-buffer.js';
import { I420PixelBuffer } from './i420.js';
import { copyPlane, splitUvPlane } from './conversions.js';
import { allocatePlanes8, resolveStride } from './layout.js';
import { validateDimensions } from './validation.js';

export interface NV12Init extends BiplanarYuvPlanes<Readonly<Uint8Array>> {
  width: number;
  height: number;
}

export class NV12PixelBuffer extends BiplanarYuv8PixelBuffer {
  get type(): VideoFrameBufferType {
    return 'NV12';
  }

  static create(width: number, height: number, strides: Partial<BiplanarStrides> = {}): NV12PixelBuffer {
    validateDimensions(width, height);
    const chroma = getChromaSize('NV12', width, height);
    const resolved: BiplanarStrides = {
      strideY: resolveStride(strides.strideY, width, 'strideY'),
      strideUV: resolveStride(strides.strideUV, 2 * chroma.width, 'strideUV'),
    };
    const [dataY, dataUV] = allocatePlanes8([
      { stride: resolved.strideY, rows: height },
      { stride: resolved.strideUV, rows: chroma.height },
    ]);
    return new NV12PixelBuffer(width, height, resolved, dataY, dataUV);
  }

  static fromPlanes(init: NV12Init): NV12PixelBuffer {
    const buffer = NV12PixelBuffer.create(init.width, init.height);
    buffer.copyPlanesFrom(init);
    return buffer;
  }

  /**
   * Luma is copied; UV pairs are split into U and V planes
   */
  toI420(): I420PixelBuffer {
    const i420 = I420PixelBuffer.create(this.width, this.height);
    const dest = i420.mutablePlanes();
    copyPlane(this.dataY, this.strideY, dest.dataY, dest.strideY, this.width, this.height);
    splitUvPlane(
      this.dataUV, this.strideUV,
      dest.dataU, dest.strideU,
      dest.dataV, dest.strideV,
      this.chromaWidth, this.chromaHeight
    );
    return i420;
  }

  getNV12(): NV12PixelBuffer | null {
    return this;
  }

  clone(): NV12PixelBuffer {
    const copy = NV12PixelBuffer.create(this.width, this.height);
    copy.copyPlanesFrom(this.planes());
    return copy;
  }
}
