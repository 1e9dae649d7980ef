/**
 * The process-wide native system binding.
 *
 * Like a linked C library there is exactly one native object system per
 * process; wrappers reach it through `nativeSystem()` instead of carrying it.
 */

import { UnboundNativeSystemError, createLogger } from "@handlekit/core";
import type { NativeObjectSystem } from "./native-system.js";

const log = createLogger("native");

let bound: NativeObjectSystem | undefined;

/**
 * Bind the native object system. Returns the previous binding, if any.
 */
export function bindNativeSystem(system: NativeObjectSystem): NativeObjectSystem | undefined {
  const previous = bound;
  bound = system;
  if (previous && previous !== system) {
    log.info("replaced the bound native object system");
  }
  return previous;
}

export function unbindNativeSystem(): void {
  bound = undefined;
}

/**
 * The bound native object system.
 *
 * @throws {UnboundNativeSystemError} If none is bound.
 */
export function nativeSystem(): NativeObjectSystem {
  if (!bound) {
    throw new UnboundNativeSystemError();
  }
  return bound;
}

export function isNativeSystemBound(): boolean {
  return bound !== undefined;
}
