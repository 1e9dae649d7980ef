/**
 * @handlekit/element: Typed wrappers over native object handles.
 *
 * Each native class gets its own compile-time type through
 * {@link defineElement}. Any element can be erased to a {@link Handle} for
 * heterogeneous storage, and brought back with a downcast checked against
 * the live class name. Callback closures registered on an element are
 * released by a destroy hook when the native object goes away.
 *
 * **Usage:**
 * ```typescript
 * bindNativeSystem(toolkit);
 *
 * const dialog = createElement(Dialog);
 * onMap(dialog, (d) => console.log(`${d} mapped`));
 *
 * const stored: Handle[] = elements(dialog, createElement(Button));
 * const back = tryDowncast(stored[0], Dialog); // { ok: true, value: Dialog(0x1) }
 * ```
 *
 * @packageDocumentation
 */

// Core types
export { HANDLE_CLASS_NAME } from "./element.js";
export type {
  Element,
  ElementType,
  ElementOf,
  AnyElementType,
  HandleClassName,
} from "./element.js";

// Wrapper generation and downcast
export { defineElement, canDowncast, tryDowncast } from "./define.js";

// The erased handle
export { Handle, erase, elements, downcast, isSameHandle } from "./handle.js";

// Callback registry and destroy hook
export {
  CallbackRegistry,
  globalCallbackRegistry,
  onElementDestroy,
  installDestroyHook,
} from "./callback-registry.js";
export type { CallbackEntry } from "./callback-registry.js";

export {
  setCallback,
  removeCallback,
  onMap,
  onUnmap,
  onDestroy,
  onGetFocus,
  onKillFocus,
  onEnterWindow,
  onLeaveWindow,
  onHelp,
} from "./callbacks.js";
export type { ElementCallback } from "./callbacks.js";

// Built-in kinds
export {
  Dialog,
  Button,
  Label,
  Text,
  Image,
  Timer,
  VBox,
  HBox,
  createElement,
  append,
} from "./widgets.js";
