/**
 * Standardized error utilities for frame buffer handles
 *
 * Failures carry one of these names:
 * - UnsupportedConversionError: requested layout is not available from the buffer
 * - InvalidDimensionsError: allocation with a non-positive or fractional size
 * - InvalidStateError: operation on a closed handle or freed buffer
 * - InvalidHandleError: registry lookup of an unknown or mistyped handle id
 * - TypeError: invalid parameters (plain TypeError, not a FrameBufferError)
 */

/**
 * Standard frame buffer error types
 */
export type FrameBufferErrorName =
  | 'UnsupportedConversionError'
  | 'InvalidDimensionsError'
  | 'InvalidStateError'
  | 'InvalidHandleError';

export class FrameBufferError extends Error {
  name: FrameBufferErrorName;

  constructor(message: string, name: FrameBufferErrorName) {
    super(message);
    this.name = name;
  }
}

/**
 * Create a frame buffer error
 */
export function createFrameBufferError(
  message: string,
  name: FrameBufferErrorName
): FrameBufferError {
  return new FrameBufferError(message, name);
}

/**
 * Create an UnsupportedConversionError (e.g., NV12 requested from an I420 buffer)
 */
export function unsupportedConversionError(message: string): FrameBufferError {
  return createFrameBufferError(message, 'UnsupportedConversionError');
}

/**
 * Create an InvalidDimensionsError (e.g., zero width)
 */
export function invalidDimensionsError(message: string): FrameBufferError {
  return createFrameBufferError(message, 'InvalidDimensionsError');
}

/**
 * Create an InvalidStateError (e.g., handle already closed)
 */
export function invalidStateError(message: string): FrameBufferError {
  return createFrameBufferError(message, 'InvalidStateError');
}

/**
 * Create an InvalidHandleError (e.g., handle id never stored)
 */
export function invalidHandleError(message: string): FrameBufferError {
  return createFrameBufferError(message, 'InvalidHandleError');
}

/**
 * Check if an error is a specific frame buffer error type
 */
export function isFrameBufferError(error: unknown, name: FrameBufferErrorName): boolean {
  return error instanceof FrameBufferError && error.name === name;
}

/**
 * Message of an unknown thrown value, for logging
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
