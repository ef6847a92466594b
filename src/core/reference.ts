/**
 * Owned references to pixel buffers
 *
 * Pixel buffers hand out borrowed references. OwnedReference.take() is the
 * one place a borrowed reference becomes an owned one: it counts the
 * reference before any handle can see it, so a handle never holds memory it
 * has not counted.
 */

import type { PixelBuffer } from '../buffers/index.js';
import { invalidStateError, unsupportedConversionError } from '../utils/errors.js';

export class OwnedReference<T extends PixelBuffer> {
  private _buffer: T | null;

  private constructor(buffer: T) {
    this._buffer = buffer;
  }

  /**
   * Take a counted reference to a borrowed buffer.
   *
   * @param borrowed - buffer returned by the buffer layer; `null` means the
   *   requested view does not exist
   * @param description - what was requested, for the error message
   * @throws UnsupportedConversionError when `borrowed` is null
   */
  static take<T extends PixelBuffer>(borrowed: T | null, description: string): OwnedReference<T> {
    if (borrowed === null) {
      throw unsupportedConversionError(`${description} is not available`);
    }
    borrowed.addRef();
    return new OwnedReference(borrowed);
  }

  get buffer(): T {
    if (this._buffer === null) {
      throw invalidStateError('Reference has been released');
    }
    return this._buffer;
  }

  get released(): boolean {
    return this._buffer === null;
  }

  /**
   * Drop the counted reference; later calls do nothing
   */
  release(): void {
    const buffer = this._buffer;
    if (buffer === null) return;
    this._buffer = null;
    buffer.release();
  }
}
