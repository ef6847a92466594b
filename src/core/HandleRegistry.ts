/**
 * HandleRegistry - integer ids for objects handed across an API boundary
 *
 * Callers that cannot hold object references (another process, a native
 * binding) refer to buffers and streams by id. The registry owns what it
 * stores: drop() and dispose() close the stored objects.
 */

import { invalidHandleError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('HandleRegistry');

export type HandleId = number;

/**
 * Anything the registry can own
 */
export interface ClosableHandle {
  close(): void;
}

export class HandleRegistry {
  private readonly handles = new Map<HandleId, ClosableHandle>();
  private lastId: HandleId = 0;

  get size(): number {
    return this.handles.size;
  }

  /**
   * Allocate a fresh id (ids start at 1 and are never reused)
   */
  nextId(): HandleId {
    return ++this.lastId;
  }

  store(id: HandleId, handle: ClosableHandle): void {
    if (this.handles.has(id)) {
      throw invalidHandleError(`Handle ${id} is already in use`);
    }
    this.handles.set(id, handle);
  }

  has(id: HandleId): boolean {
    return this.handles.has(id);
  }

  /**
   * Look up a handle and check its class
   * @throws InvalidHandleError when the id is unknown or holds another class
   */
  retrieve<T extends ClosableHandle>(
    id: HandleId,
    type: abstract new (...args: never[]) => T
  ): T {
    const handle = this.handles.get(id);
    if (handle === undefined) {
      throw invalidHandleError(`Unknown handle ${id}`);
    }
    if (!(handle instanceof type)) {
      throw invalidHandleError(`Handle ${id} is a ${handle.constructor.name}, not a ${type.name}`);
    }
    return handle;
  }

  /**
   * Remove a handle and close it
   * @returns whether the id was present
   */
  drop(id: HandleId): boolean {
    const handle = this.handles.get(id);
    if (handle === undefined) {
      return false;
    }
    this.handles.delete(id);
    handle.close();
    return true;
  }

  /**
   * Close every stored handle
   */
  dispose(): void {
    const count = this.handles.size;
    for (const handle of this.handles.values()) {
      handle.close();
    }
    this.handles.clear();
    logger.debug(`Disposed registry (${count} handles closed)`);
  }
}
