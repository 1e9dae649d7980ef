/**
 * Raw native handles.
 *
 * A raw handle is the native system's opaque pointer, carried as a number.
 * The brand keeps arbitrary numbers from being passed where a handle is
 * expected; `0` plays the role of the null pointer and is never live.
 *
 * @module
 */

declare const __rawHandle__: unique symbol;

/** An identity-only reference to a native object. */
export type RawHandle = number & { readonly [__rawHandle__]: "RawHandle" };

function isRawHandle(n: number): n is RawHandle {
  return Number.isSafeInteger(n) && n > 0;
}

/**
 * Brand a positive integer as a raw handle.
 *
 * @throws {TypeError} If `n` is not a positive safe integer.
 */
export function rawHandle(n: number): RawHandle {
  if (!isRawHandle(n)) {
    throw new TypeError(`Invalid raw handle ${n}: expected a positive integer`);
  }
  return n;
}

/** True for the values a native constructor returns on failure. */
export function isNullHandle(handle: RawHandle | null | undefined): boolean {
  return handle === null || handle === undefined || handle === 0;
}

/** Render a handle the way a pointer is printed: `0x2a`. */
export function formatHandle(handle: RawHandle | null | undefined): string {
  if (handle === null || handle === undefined || isNullHandle(handle)) return "0x0";
  return `0x${handle.toString(16)}`;
}
