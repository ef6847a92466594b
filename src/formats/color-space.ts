/**
 * Color space conversion utilities
 * Provides RGB -> YUV conversion with support for BT.601, BT.709, and BT.2020 matrices
 */

export type ColorMatrix = 'bt601' | 'bt709' | 'bt2020';

/**
 * Luma coefficients for each matrix (full range)
 */
const LUMA_COEFFICIENTS: Record<ColorMatrix, { kr: number; kb: number }> = {
  // BT.601 / SMPTE 170M (SD video)
  bt601: { kr: 0.299, kb: 0.114 },
  // BT.709 (HD video)
  bt709: { kr: 0.2126, kb: 0.0722 },
  // BT.2020 (UHD video)
  bt2020: { kr: 0.2627, kb: 0.0593 },
};

/**
 * Resolve a matrix name, accepting the common aliases
 */
export function getColorMatrix(matrix?: string | null): ColorMatrix | null {
  switch (matrix) {
    case 'bt601':
    case 'smpte170m':
    case 'bt470bg':
      return 'bt601';
    case 'bt2020-ncl':
    case 'bt2020':
      return 'bt2020';
    case 'bt709':
      return 'bt709';
    default:
      return null;
  }
}

/**
 * Convert RGB to YUV
 * @param matrix Color matrix to use (default: bt601)
 */
export function rgbToYuv(
  r: number,
  g: number,
  b: number,
  matrix: ColorMatrix = 'bt601'
): [number, number, number] {
  const { kr, kb } = LUMA_COEFFICIENTS[matrix];
  const kg = 1 - kr - kb;

  const y = kr * r + kg * g + kb * b;
  const u = (b - y) / (2 * (1 - kb)) + 128;
  const v = (r - y) / (2 * (1 - kr)) + 128;

  return [clampByte(Math.round(y)), clampByte(Math.round(u)), clampByte(Math.round(v))];
}

/**
 * Clamp a value to the 0-255 byte range
 */
export function clampByte(val: number): number {
  return Math.max(0, Math.min(255, val));
}
