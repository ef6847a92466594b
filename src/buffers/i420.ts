/**
 * I420 (YUV 4:2:0, 8-bit, three planes) buffer
 */

import { getChromaSize, type VideoFrameBufferType } from '../formats/index.js';
import {
  PlanarYuv8PixelBuffer,
  type PlanarStrides,
  type PlanarYuvPlanes,
} from './pixel-buffer.js';
import { allocatePlanes8, resolveStride } from './layout.js';
import { validateDimensions } from './validation.js';

/**
 * Planes of an existing picture, copied into a new buffer
 */
export interface PlanarYuvInit<T extends Readonly<Uint8Array> | Readonly<Uint16Array>> extends PlanarYuvPlanes<T> {
  width: number;
  height: number;
}

export class I420PixelBuffer extends PlanarYuv8PixelBuffer {
  get type(): VideoFrameBufferType {
    return 'I420';
  }

  /**
   * Allocate a zero-filled buffer. Strides default to the plane widths
   * padded to the configured alignment.
   */
  static create(width: number, height: number, strides: Partial<PlanarStrides> = {}): I420PixelBuffer {
    validateDimensions(width, height);
    const chroma = getChromaSize('I420', width, height);
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
    return new I420PixelBuffer(width, height, resolved, dataY, dataU, dataV);
  }

  /**
   * Deep copy of the Y, U and V planes of any I420 buffer (alpha is dropped)
   */
  static copy(src: I420PixelBuffer): I420PixelBuffer {
    const copy = I420PixelBuffer.create(src.width, src.height);
    copy.copyPlanesFrom(src.planes());
    return copy;
  }

  static fromPlanes(init: PlanarYuvInit<Readonly<Uint8Array>>): I420PixelBuffer {
    const buffer = I420PixelBuffer.create(init.width, init.height);
    buffer.copyPlanesFrom(init);
    return buffer;
  }

  toI420(): I420PixelBuffer {
    this.assertAlive();
    return this;
  }

  getI420(): I420PixelBuffer | null {
    return this;
  }

  clone(): I420PixelBuffer {
    return I420PixelBuffer.copy(this);
  }
}
