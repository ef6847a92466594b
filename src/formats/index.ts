/**
 * Format exports
 */

export * from './buffer-type/index.js';

export { rgbToYuv, getColorMatrix, clampByte, type ColorMatrix } from './color-space.js';
