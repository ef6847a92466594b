/**
 * I010 (YUV 4:2:0, 10 bits in 16-bit samples, three planes) buffer
 *
 * Strides are counted in samples, not bytes.
 */

import { getChromaSize, type VideoFrameBufferType } from '../formats/index.js';
import { PlanarYuv16BPixelBuffer, type PlanarStrides } from './pixel-buffer.js';
import { I420PixelBuffer, type PlanarYuvInit } from './i420.js';
import { convert10To8Plane } from './conversions.js';
import { allocatePlanes16, resolveStride } from './layout.js';
import { validateDimensions } from './validation.js';

export class I010PixelBuffer extends PlanarYuv16BPixelBuffer {
  get type(): VideoFrameBufferType {
    return 'I010';
  }

  static create(width: number, height: number, strides: Partial<PlanarStrides> = {}): I010PixelBuffer {
    validateDimensions(width, height);
    const chroma = getChromaSize('I010', width, height);
    const sampleBytes = Uint16Array.BYTES_PER_ELEMENT;
    const resolved: PlanarStrides = {
      strideY: resolveStride(strides.strideY, width, 'strideY', sampleBytes),
      strideU: resolveStride(strides.strideU, chroma.width, 'strideU', sampleBytes),
      strideV: resolveStride(strides.strideV, chroma.width, 'strideV', sampleBytes),
    };
    const [dataY, dataU, dataV] = allocatePlanes16([
      { stride: resolved.strideY, rows: height },
      { stride: resolved.strideU, rows: chroma.height },
      { stride: resolved.strideV, rows: chroma.height },
    ]);
    return new I010PixelBuffer(width, height, resolved, dataY, dataU, dataV);
  }

  static fromPlanes(init: PlanarYuvInit<Readonly<Uint16Array>>): I010PixelBuffer {
    const buffer = I010PixelBuffer.create(init.width, init.height);
    buffer.copyPlanesFrom(init);
    return buffer;
  }

  /**
   * Every sample drops its two low bits
   */
  toI420(): I420PixelBuffer {
    const i420 = I420PixelBuffer.create(this.width, this.height);
    const dest = i420.mutablePlanes();
    convert10To8Plane(this.dataY, this.strideY, dest.dataY, dest.strideY, this.width, this.height);
    convert10To8Plane(this.dataU, this.strideU, dest.dataU, dest.strideU, this.chromaWidth, this.chromaHeight);
    convert10To8Plane(this.dataV, this.strideV, dest.dataV, dest.strideV, this.chromaWidth, this.chromaHeight);
    return i420;
  }

  getI010(): I010PixelBuffer | null {
    return this;
  }

  clone(): I010PixelBuffer {
    const copy = I010PixelBuffer.create(this.width, this.height);
    copy.copyPlanesFrom(this.planes());
    return copy;
  }
}
