/**
 * The capability contract every typed wrapper satisfies.
 *
 * The native system has one physical handle type and a runtime class name
 * per object. handlekit models that as a tagged set: `Element<C>` is the
 * variant whose compile-time tag is the class-name literal `C`. No wrapper
 * inherits from another; the only way from one variant to another is the
 * runtime-checked downcast.
 *
 * @module
 */

import type { NativeStatusError, Result } from "@handlekit/core";
import type { RawHandle } from "@handlekit/native";

/**
 * Target class of the erased `Handle`. No native class carries this name,
 * and downcasting to it always succeeds.
 */
export const HANDLE_CLASS_NAME = "__handlekit_handle";
export type HandleClassName = typeof HANDLE_CLASS_NAME;

/**
 * A typed alias of a native handle, believed to be of native class `C`.
 *
 * Aliases are cheap, freely copied values. None of them owns the native
 * object: `destroy()` on any alias ends the object for all of them.
 *
 * @typeParam C - The native class name this wrapper represents.
 */
export interface Element<C extends string> {
  /** Compile-time class tag, and the discriminant of the tagged set. */
  readonly targetClassName: C;

  /** The static side this element was constructed through. */
  readonly elementType: ElementType<C>;

  /** The raw handle. Ownership is not transferred. */
  raw(): RawHandle;

  /** Another alias of the same handle. No native allocation. */
  dup(): Element<C>;

  /** Set a string attribute. Returns a fresh alias so calls can be chained. */
  setAttribute(name: string, value: string): Element<C>;

  /** `null` when the attribute is unset; an empty string is a real value. */
  getAttribute(name: string): string | null;

  /** Clear the stored value so the default applies. */
  clearAttribute(name: string): void;

  /** Remove the attribute here and, if it is inheritable, from all children. */
  resetAttribute(name: string): void;

  /** Create the native counterpart of this element and its children. */
  map(): Result<void, NativeStatusError>;
  unmap(): void;

  /** Show a dialog, or make a control visible. Maps first if needed. */
  show(): Result<void, NativeStatusError>;
  hide(): void;

  /**
   * Destroy the native object and all its children. Every alias of this
   * handle, and of the children's handles, is dead afterwards.
   */
  destroy(): void;

  /** The live class name, as the native system reports it now. */
  className(): string;

  toString(): string;
}

/**
 * The static side of a wrapper: one per native class, made by `defineElement`.
 */
export interface ElementType<C extends string> {
  /** Name used when printing elements, e.g. `Dialog(0x1)`. */
  readonly displayName: string;
  readonly targetClassName: C;

  /**
   * The safe entry point for handles fresh from a native constructor.
   *
   * Installs the destroy hook the first time a handle crosses it.
   *
   * @throws {NullHandleError} If `handle` is null.
   */
  fromRaw(handle: RawHandle | null): Element<C>;

  /**
   * Wrap without checks or hook installation.
   *
   * The caller guarantees that the live class of `handle` is `C` and that
   * the handle has gone through `fromRaw` at least once.
   */
  fromRawUnchecked(handle: RawHandle): Element<C>;

  /** Same as `tryDowncast(handle, this)`. */
  fromHandle(handle: Element<HandleClassName>): Result<Element<C>, Element<HandleClassName>>;

  /** Narrow on the compile-time tag. Makes no native call. */
  is(element: Element<string>): element is Element<C>;
}

/** Any element type, whatever its class. */
export type AnyElementType = ElementType<string>;

/**
 * The element type produced by an `ElementType`.
 *
 * @example
 * ```typescript
 * export const Dialog = defineElement("Dialog", "dialog");
 * export type Dialog = ElementOf<typeof Dialog>;
 * ```
 */
export type ElementOf<T> = T extends ElementType<infer C> ? Element<C> : never;
