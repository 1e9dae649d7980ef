/**
 * Wrapper generation and the downcast check.
 *
 * `defineElement("Dialog", "dialog")` produces the static side of one
 * variant of the tagged set. Every variant shares a single implementation
 * class; only the `ElementType` it was made through differs.
 *
 * @module
 */

import {
  NativeStatusError,
  NullHandleError,
  createLogger,
  err,
  ok,
  type Result,
  type StatusOperation,
} from "@handlekit/core";
import { formatHandle, isNullHandle, nativeSystem, type RawHandle } from "@handlekit/native";
import { installDestroyHook } from "./callback-registry.js";
import {
  HANDLE_CLASS_NAME,
  type Element,
  type ElementType,
  type HandleClassName,
} from "./element.js";

const log = createLogger("element");

class ElementImpl<C extends string> implements Element<C> {
  constructor(
    readonly elementType: ElementType<C>,
    private readonly handle: RawHandle
  ) {}

  get targetClassName(): C {
    return this.elementType.targetClassName;
  }

  raw(): RawHandle {
    return this.handle;
  }

  dup(): Element<C> {
    return this.elementType.fromRawUnchecked(this.handle);
  }

  setAttribute(name: string, value: string): Element<C> {
    nativeSystem().setAttribute(this.handle, name, value);
    return this.dup();
  }

  getAttribute(name: string): string | null {
    return nativeSystem().getAttribute(this.handle, name);
  }

  clearAttribute(name: string): void {
    nativeSystem().clearAttribute(this.handle, name);
  }

  resetAttribute(name: string): void {
    nativeSystem().resetAttribute(this.handle, name);
  }

  map(): Result<void, NativeStatusError> {
    return this.checkStatus("map", nativeSystem().map(this.handle));
  }

  unmap(): void {
    nativeSystem().unmap(this.handle);
  }

  show(): Result<void, NativeStatusError> {
    return this.checkStatus("show", nativeSystem().show(this.handle));
  }

  hide(): void {
    nativeSystem().hide(this.handle);
  }

  destroy(): void {
    nativeSystem().destroy(this.handle);
  }

  className(): string {
    return nativeSystem().className(this.handle);
  }

  toString(): string {
    return `${this.elementType.displayName}(${formatHandle(this.handle)})`;
  }

  private checkStatus(operation: StatusOperation, status: number): Result<void, NativeStatusError> {
    if (status !== 0) return ok(undefined);
    const error = new NativeStatusError(operation, status, this.toString());
    log.warn(error.message);
    return err(error);
  }
}

/**
 * Build an element type without reserving the sentinel. Only the erased
 * `Handle` is defined through this directly.
 *
 * @internal
 */
export function createElementType<C extends string>(displayName: string, className: C): ElementType<C> {
  const type: ElementType<C> = {
    displayName,
    targetClassName: className,

    fromRaw(handle: RawHandle | null): Element<C> {
      if (handle === null || isNullHandle(handle)) {
        throw new NullHandleError(displayName);
      }
      installDestroyHook(handle);
      return type.fromRawUnchecked(handle);
    },

    fromRawUnchecked(handle: RawHandle): Element<C> {
      return new ElementImpl(type, handle);
    },

    fromHandle(handle) {
      return tryDowncast(handle, type);
    },

    is(element: Element<string>): element is Element<C> {
      return element.targetClassName === className;
    },
  };
  return Object.freeze(type);
}

/**
 * Define the wrapper for one native class.
 *
 * @param displayName - Name used when printing, e.g. `"Dialog"`.
 * @param className - The native class name, compared byte for byte on downcast.
 * @throws {TypeError} If `className` is the reserved `Handle` sentinel.
 */
export function defineElement<C extends string>(displayName: string, className: C): ElementType<C> {
  if (className === HANDLE_CLASS_NAME) {
    throw new TypeError(`"${HANDLE_CLASS_NAME}" is reserved for the erased Handle`);
  }
  return createElementType(displayName, className);
}

// ============================================================================
// Downcast
// ============================================================================

/**
 * Whether `handle` may be viewed as an element of `type`.
 *
 * Exact class-name equality, or a `Handle` target, which accepts anything
 * without asking the native system.
 */
export function canDowncast<C extends string>(
  handle: Element<HandleClassName>,
  type: ElementType<C>
): boolean {
  const target: string = type.targetClassName;
  return target === HANDLE_CLASS_NAME || handle.className() === target;
}

/**
 * Convert an erased handle back to a typed element if the live class matches.
 *
 * On mismatch the same `handle` is returned untouched as the error value.
 */
export function tryDowncast<C extends string>(
  handle: Element<HandleClassName>,
  type: ElementType<C>
): Result<Element<C>, Element<HandleClassName>> {
  if (canDowncast(handle, type)) {
    // Every Handle was built from an element that went through fromRaw.
    return ok(type.fromRawUnchecked(handle.raw()));
  }
  log.debug(`${handle.toString()} is not a ${type.displayName}`);
  return err(handle);
}
