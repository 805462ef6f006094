/**
 * @module handles/registry
 * Integer handles for core-owned objects.
 *
 * Handles increase monotonically and are never reused after release.
 * Mutation goes through {@link HandleRegistry.withMutable}, which refuses
 * frozen entries; callbacks run synchronously, so edits to one handle are
 * serialised.
 */

import { setLastError } from '../errors.js';

interface Entry<T> {
  value: T;
  frozen: boolean;
}

// Shared by every registry, so a handle names one entry across all kinds.
let nextHandle = 1;

export class HandleRegistry<T> {
  private readonly entries = new Map<number, Entry<T>>();

  constructor(private readonly kind: string) {}

  allocate(value: T): number {
    const handle = nextHandle++;
    this.entries.set(handle, { value, frozen: false });
    return handle;
  }

  get(handle: number): T | undefined {
    return this.entries.get(handle)?.value;
  }

  has(handle: number): boolean {
    return this.entries.has(handle);
  }

  /**
   * Run `fn` against the object for `handle`.
   *
   * @returns false when the handle is unknown, the object is frozen, or
   *   `fn` itself returns false or throws
   */
  withMutable(handle: number, fn: (value: T) => boolean | void): boolean {
    const entry = this.entries.get(handle);
    if (!entry) {
      setLastError('NOT_FOUND', `${this.kind} handle ${handle} is not valid`);
      return false;
    }
    if (entry.frozen) {
      setLastError('CONFIGURATION_ERROR', `${this.kind} ${handle} can not be modified once a mock server has started`);
      return false;
    }
    try {
      return fn(entry.value) !== false;
    } catch (err) {
      setLastError('INTERNAL_FAULT', `${this.kind} ${handle}: ${(err as Error).message}`);
      return false;
    }
  }

  freeze(handle: number): boolean {
    const entry = this.entries.get(handle);
    if (!entry) return false;
    entry.frozen = true;
    return true;
  }

  isFrozen(handle: number): boolean {
    return this.entries.get(handle)?.frozen ?? false;
  }

  release(handle: number): boolean {
    return this.entries.delete(handle);
  }

  /** Live handles in allocation order. */
  handles(): number[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}
