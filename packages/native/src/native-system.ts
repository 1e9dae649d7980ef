/**
 * The boundary with the native object system.
 *
 * Everything handlekit knows about the toolkit goes through this interface:
 * an FFI binding, a WASM module or the in-process stub used by tests all
 * implement it. Calls are synchronous and must happen on the thread the
 * native system is bound to.
 *
 * @module
 */

import type { RawHandle } from "./raw-handle.js";

/** What a native callback tells the event loop to do next. */
export type CallbackReturn = "default" | "close" | "ignore" | "continue";

/** A callback as the native system sees it: it only knows the raw handle. */
export type NativeCallback = (handle: RawHandle) => CallbackReturn;

export interface NativeObjectSystem {
  /** Allocate an object of the given class. `null` on failure, with no detail. */
  create(className: string): RawHandle | null;

  /** Attach `child` to `parent`. Returns `parent`, or `null` on failure. */
  append(parent: RawHandle, child: RawHandle): RawHandle | null;

  /**
   * Destroy an object and, recursively, its children. For each destroyed
   * object the `LDESTROY_CB` callback fires first, then the destroy
   * notification.
   */
  destroy(handle: RawHandle): void;

  /** Create the native counterpart. Non-zero on success, `0` on failure. */
  map(handle: RawHandle): number;
  unmap(handle: RawHandle): void;

  /** Non-zero on success, `0` on failure. */
  show(handle: RawHandle): number;
  hide(handle: RawHandle): void;

  setAttribute(handle: RawHandle, name: string, value: string): void;
  /** `null` means the attribute is unset. */
  getAttribute(handle: RawHandle, name: string): string | null;
  /** Clear the stored value so the default applies. */
  clearAttribute(handle: RawHandle, name: string): void;
  /** Remove the attribute from the object and, if inheritable, its children. */
  resetAttribute(handle: RawHandle, name: string): void;

  /** The live class name. Never null for a live handle. */
  className(handle: RawHandle): string;

  /** Install (or with `null`, remove) a named callback. */
  setCallback(handle: RawHandle, name: string, callback: NativeCallback | null): void;

  /** Install the notification fired once when the object is torn down. */
  setDestroyNotification(handle: RawHandle, notification: NativeCallback): void;
}
