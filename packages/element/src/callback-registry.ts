/**
 * Per-handle callback bookkeeping and the destroy hook that releases it.
 *
 * Closures registered on a native object must live exactly as long as the
 * object. The registry keeps them, keyed by raw handle identity, and the
 * destroy notification installed by `fromRaw` drops the entry when the
 * native system tears the object down, whether it was destroyed directly
 * or as the child of a destroyed parent.
 *
 * The registry is process-wide mutable state with no locking. It must only
 * be used from the thread the native system is bound to. `bindNativeSystem`
 * binds per module graph, and a worker thread loads its own graph, so
 * trampolines and destroy notifications only ever arrive on the thread that
 * owns this registry.
 *
 * @module
 */

import { createLogger } from "@handlekit/core";
import {
  formatHandle,
  nativeSystem,
  type CallbackReturn,
  type NativeCallback,
  type RawHandle,
} from "@handlekit/native";

const log = createLogger("registry");

/** The callbacks registered on one native object, by callback name. */
export type CallbackEntry = Map<string, NativeCallback>;

export class CallbackRegistry {
  private readonly entries = new Map<RawHandle, CallbackEntry>();
  private readonly hooked = new Set<RawHandle>();

  /** Register `callback` under `name`, creating the entry on first use. */
  insert(handle: RawHandle, name: string, callback: NativeCallback): void {
    let entry = this.entries.get(handle);
    if (entry === undefined) {
      entry = new Map();
      this.entries.set(handle, entry);
    }
    entry.set(name, callback);
  }

  get(handle: RawHandle, name: string): NativeCallback | undefined {
    return this.entries.get(handle)?.get(name);
  }

  /** Whether any callback is registered for the handle. */
  has(handle: RawHandle): boolean {
    return this.entries.has(handle);
  }

  names(handle: RawHandle): string[] {
    return [...(this.entries.get(handle)?.keys() ?? [])];
  }

  /** Remove one callback; the entry goes with its last callback. */
  remove(handle: RawHandle, name: string): boolean {
    const entry = this.entries.get(handle);
    if (!entry?.delete(name)) return false;
    if (entry.size === 0) this.entries.delete(handle);
    return true;
  }

  /**
   * Release every closure registered for the handle and forget it.
   *
   * Returns how many closures were released; a handle without an entry
   * releases nothing.
   */
  drop(handle: RawHandle): number {
    this.hooked.delete(handle);
    const entry = this.entries.get(handle);
    if (entry === undefined) return 0;
    const released = entry.size;
    entry.clear();
    this.entries.delete(handle);
    return released;
  }

  /** Record that the destroy hook is installed. True only the first time. */
  markHooked(handle: RawHandle): boolean {
    if (this.hooked.has(handle)) return false;
    this.hooked.add(handle);
    return true;
  }

  isHooked(handle: RawHandle): boolean {
    return this.hooked.has(handle);
  }

  /** Number of handles with at least one callback. */
  get size(): number {
    return this.entries.size;
  }

  /** Forget everything, including hook marks. */
  clear(): void {
    this.entries.clear();
    this.hooked.clear();
  }
}

export const globalCallbackRegistry = new CallbackRegistry();

/**
 * The destroy notification installed on every handle that crosses `fromRaw`.
 *
 * Safe to fire for a handle that has no entry.
 */
export function onElementDestroy(handle: RawHandle): CallbackReturn {
  const released = globalCallbackRegistry.drop(handle);
  log.debug(`${formatHandle(handle)} destroyed, released ${released} callback(s)`);
  return "default";
}

/**
 * Install the destroy notification for a handle unless it already has one.
 *
 * Returns whether the native registration call was made.
 */
export function installDestroyHook(handle: RawHandle): boolean {
  if (globalCallbackRegistry.isHooked(handle)) return false;
  nativeSystem().setDestroyNotification(handle, onElementDestroy);
  globalCallbackRegistry.markHooked(handle);
  log.debug(`installed destroy hook for ${formatHandle(handle)}`);
  return true;
}
