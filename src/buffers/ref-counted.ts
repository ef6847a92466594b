/**
 * Reference counting for shared buffers
 *
 * A new object starts with no references. Owners call addRef() when they take
 * a reference and release() when they drop it; the object frees its memory
 * when the count returns to zero and cannot be referenced again.
 */

import { invalidStateError } from '../utils/errors.js';

export abstract class RefCounted {
  private _refCount = 0;
  private _freed = false;

  get refCount(): number {
    return this._refCount;
  }

  get freed(): boolean {
    return this._freed;
  }

  hasOneRef(): boolean {
    return this._refCount === 1;
  }

  /**
   * Take a counted reference
   * @returns the new count
   */
  addRef(): number {
    if (this._freed) {
      throw invalidStateError('Cannot reference a freed buffer');
    }
    return ++this._refCount;
  }

  /**
   * Drop a counted reference, freeing the object on the last one
   * @returns the remaining count
   */
  release(): number {
    if (this._refCount === 0) {
      throw invalidStateError('release() called without a matching addRef()');
    }
    const remaining = --this._refCount;
    if (remaining === 0) {
      this._freed = true;
      this.onLastRelease();
    }
    return remaining;
  }

  protected assertAlive(): void {
    if (this._freed) {
      throw invalidStateError('Buffer has been freed');
    }
  }

  protected abstract onLastRelease(): void;
}
