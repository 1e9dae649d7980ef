/**
 * @handlekit/native: The native object system boundary.
 *
 * @packageDocumentation
 */

export type { RawHandle } from "./raw-handle.js";
export { rawHandle, isNullHandle, formatHandle } from "./raw-handle.js";

export type { NativeObjectSystem, NativeCallback, CallbackReturn } from "./native-system.js";

export {
  bindNativeSystem,
  unbindNativeSystem,
  nativeSystem,
  isNativeSystemBound,
} from "./binding.js";
