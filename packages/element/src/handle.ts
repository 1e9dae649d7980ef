/**
 * The erased `Handle`: an element of any native class.
 *
 * `Handle` is the common currency for heterogeneous collections. Erasing
 * always succeeds; getting a typed element back goes through the live
 * class-name check in `tryDowncast`.
 *
 * @module
 */

import { DowncastError } from "@handlekit/core";
import { formatHandle } from "@handlekit/native";
import { createElementType, tryDowncast } from "./define.js";
import {
  HANDLE_CLASS_NAME,
  type Element,
  type ElementType,
  type HandleClassName,
} from "./element.js";

/** An element of unknown native class. */
export type Handle = Element<HandleClassName>;

export const Handle: ElementType<HandleClassName> = createElementType("Handle", HANDLE_CLASS_NAME);

/**
 * Forget the static class of an element. Makes no native call.
 */
export function erase(element: Element<string>): Handle {
  return Handle.fromRawUnchecked(element.raw());
}

/**
 * Erase a list of elements for heterogeneous storage.
 *
 * @example
 * ```typescript
 * const children = elements(okButton, cancelButton, label);
 * ```
 */
export function elements(...elems: ReadonlyArray<Element<string>>): Handle[] {
  return elems.map(erase);
}

/**
 * Downcast or throw.
 *
 * @throws {DowncastError} If the live class name does not match.
 */
export function downcast<C extends string>(handle: Handle, type: ElementType<C>): Element<C> {
  const result = tryDowncast(handle, type);
  if (result.ok) return result.value;
  throw new DowncastError(type.targetClassName, handle.className(), formatHandle(handle.raw()));
}

/** Whether two elements alias the same native object. */
export function isSameHandle(a: Element<string>, b: Element<string>): boolean {
  return a.raw() === b.raw();
}
