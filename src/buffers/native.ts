/**
 * Native (opaque, packed RGB) buffer
 *
 * Stands for frames owned by a platform capturer or decoder. The pixels are
 * not exposed as planes; the only way to read them is toI420().
 */

import type { ColorMatrix, PackedPixelFormat, VideoFrameBufferType } from '../formats/index.js';
import { getConfig } from '../config/frame-buffer-config.js';
import { PixelBuffer } from './pixel-buffer.js';
import { I420PixelBuffer } from './i420.js';
import { convertPackedToI420, copyPlane } from './conversions.js';
import { EMPTY_PLANE_8 } from './layout.js';
import { validateDimensions, validatePlaneLength, validateStride } from './validation.js';

const BYTES_PER_PIXEL = 4;

export interface NativePixelBufferInit {
  /** Channel order (default: RGBA) */
  format?: PackedPixelFormat;
  /** Bytes per row of `data` (default: width * 4) */
  stride?: number;
  /** Matrix for the I420 conversion (default: configured colorMatrix) */
  colorMatrix?: ColorMatrix;
}

export class NativePixelBuffer extends PixelBuffer {
  private _data: Uint8Array;

  private constructor(
    width: number,
    height: number,
    readonly pixelFormat: PackedPixelFormat,
    readonly colorMatrix: ColorMatrix,
    data: Uint8Array
  ) {
    super(width, height);
    this._data = data;
  }

  get type(): VideoFrameBufferType {
    return 'native';
  }

  /**
   * Copy packed pixels into a new native buffer
   */
  static fromPixels(
    data: Uint8Array,
    width: number,
    height: number,
    init: NativePixelBufferInit = {}
  ): NativePixelBuffer {
    validateDimensions(width, height);
    const rowBytes = width * BYTES_PER_PIXEL;
    const stride = init.stride ?? rowBytes;
    validateStride(stride, rowBytes, 'stride');
    validatePlaneLength(data, stride, rowBytes, height, 'data');

    const pixels = new Uint8Array(rowBytes * height);
    copyPlane(data, stride, pixels, rowBytes, rowBytes, height);
    return new NativePixelBuffer(
      width,
      height,
      init.format ?? 'RGBA',
      init.colorMatrix ?? getConfig().colorMatrix,
      pixels
    );
  }

  toI420(): I420PixelBuffer {
    this.assertAlive();
    const i420 = I420PixelBuffer.create(this.width, this.height);
    convertPackedToI420(
      this._data,
      this.width * BYTES_PER_PIXEL,
      this.pixelFormat,
      this.width,
      this.height,
      i420.mutablePlanes(),
      this.colorMatrix
    );
    return i420;
  }

  clone(): NativePixelBuffer {
    this.assertAlive();
    return new NativePixelBuffer(
      this.width,
      this.height,
      this.pixelFormat,
      this.colorMatrix,
      new Uint8Array(this._data)
    );
  }

  protected freeMemory(): void {
    this._data = EMPTY_PLANE_8;
  }
}
