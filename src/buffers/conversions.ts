/**
 * Plane conversion utilities
 *
 * Standalone functions operating on raw strided planes. Buffers use them to
 * implement copies and conversions to I420.
 */

import { rgbToYuv, type ColorMatrix, type PackedPixelFormat } from '../formats/index.js';

/**
 * Destination planes of an I420 conversion
 */
export interface I420Planes {
  dataY: Uint8Array;
  strideY: number;
  dataU: Uint8Array;
  strideU: number;
  dataV: Uint8Array;
  strideV: number;
}

/**
 * Copy `height` rows of `width` samples between strided planes
 */
export function copyPlane(
  src: Readonly<Uint8Array>,
  srcStride: number,
  dest: Uint8Array,
  destStride: number,
  width: number,
  height: number
): void {
  if (srcStride === width && destStride === width) {
    dest.set(src.subarray(0, width * height));
    return;
  }
  for (let y = 0; y < height; y++) {
    dest.set(src.subarray(y * srcStride, y * srcStride + width), y * destStride);
  }
}

/**
 * Copy a 16-bit plane (strides in samples)
 */
export function copyPlane16(
  src: Readonly<Uint16Array>,
  srcStride: number,
  dest: Uint16Array,
  destStride: number,
  width: number,
  height: number
): void {
  for (let y = 0; y < height; y++) {
    dest.set(src.subarray(y * srcStride, y * srcStride + width), y * destStride);
  }
}

/**
 * Halve a plane vertically: each output row is the rounded mean of two input
 * rows (4:2:2 chroma to 4:2:0). An odd last row is copied.
 */
export function halvePlaneRows(
  src: Readonly<Uint8Array>,
  srcStride: number,
  dest: Uint8Array,
  destStride: number,
  width: number,
  srcHeight: number
): void {
  const destHeight = Math.ceil(srcHeight / 2);
  for (let y = 0; y < destHeight; y++) {
    const row0 = 2 * y * srcStride;
    const row1 = Math.min(2 * y + 1, srcHeight - 1) * srcStride;
    const destRow = y * destStride;
    for (let x = 0; x < width; x++) {
      dest[destRow + x] = (src[row0 + x] + src[row1 + x] + 1) >> 1;
    }
  }
}

/**
 * Halve a plane in both directions with a 2x2 box filter (4:4:4 chroma to
 * 4:2:0). Edge blocks average only the samples that exist.
 */
export function halvePlane(
  src: Readonly<Uint8Array>,
  srcStride: number,
  dest: Uint8Array,
  destStride: number,
  srcWidth: number,
  srcHeight: number
): void {
  const destWidth = Math.ceil(srcWidth / 2);
  const destHeight = Math.ceil(srcHeight / 2);
  for (let y = 0; y < destHeight; y++) {
    const rows = 2 * y + 1 < srcHeight ? 2 : 1;
    for (let x = 0; x < destWidth; x++) {
      const cols = 2 * x + 1 < srcWidth ? 2 : 1;
      let sum = 0;
      for (let dy = 0; dy < rows; dy++) {
        for (let dx = 0; dx < cols; dx++) {
          sum += src[(2 * y + dy) * srcStride + 2 * x + dx];
        }
      }
      dest[y * destStride + x] = roundedMean(sum, rows * cols);
    }
  }
}

/**
 * Reduce 10-bit samples to 8 bits
 */
export function convert10To8Plane(
  src: Readonly<Uint16Array>,
  srcStride: number,
  dest: Uint8Array,
  destStride: number,
  width: number,
  height: number
): void {
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      dest[y * destStride + x] = Math.min(255, src[y * srcStride + x] >> 2);
    }
  }
}

/**
 * De-interleave a UV plane (NV12) into separate U and V planes
 */
export function splitUvPlane(
  srcUv: Readonly<Uint8Array>,
  srcStride: number,
  destU: Uint8Array,
  strideU: number,
  destV: Uint8Array,
  strideV: number,
  chromaWidth: number,
  chromaHeight: number
): void {
  for (let y = 0; y < chromaHeight; y++) {
    for (let x = 0; x < chromaWidth; x++) {
      destU[y * strideU + x] = srcUv[y * srcStride + 2 * x];
      destV[y * strideV + x] = srcUv[y * srcStride + 2 * x + 1];
    }
  }
}

/**
 * Convert packed RGBA/BGRA pixels to I420. Chroma is the rounded mean of the
 * U and V values of each 2x2 block.
 */
export function convertPackedToI420(
  src: Readonly<Uint8Array>,
  srcStride: number,
  format: PackedPixelFormat,
  width: number,
  height: number,
  dest: I420Planes,
  colorMatrix: ColorMatrix
): void {
  const isBgr = format === 'BGRA';
  const chromaW = Math.ceil(width / 2);
  const chromaH = Math.ceil(height / 2);

  for (let cy = 0; cy < chromaH; cy++) {
    for (let cx = 0; cx < chromaW; cx++) {
      let uSum = 0;
      let vSum = 0;
      let count = 0;

      for (let dy = 0; dy < 2; dy++) {
        for (let dx = 0; dx < 2; dx++) {
          const x = 2 * cx + dx;
          const y = 2 * cy + dy;
          if (x >= width || y >= height) continue;

          const offset = y * srcStride + x * 4;
          const r = isBgr ? src[offset + 2] : src[offset];
          const g = src[offset + 1];
          const b = isBgr ? src[offset] : src[offset + 2];

          const [yVal, uVal, vVal] = rgbToYuv(r, g, b, colorMatrix);
          dest.dataY[y * dest.strideY + x] = yVal;
          uSum += uVal;
          vSum += vVal;
          count++;
        }
      }

      dest.dataU[cy * dest.strideU + cx] = roundedMean(uSum, count);
      dest.dataV[cy * dest.strideV + cx] = roundedMean(vSum, count);
    }
  }
}

function roundedMean(sum: number, count: number): number {
  return Math.floor((sum + (count >> 1)) / count);
}
