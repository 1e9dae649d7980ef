/**
 * Registering callbacks on elements.
 *
 * The closure is kept in the callback registry, and the native system gets
 * a trampoline that re-wraps the raw handle as the element's own type. The
 * registry entry is released by the destroy hook, so a callback lives
 * exactly as long as its native object.
 *
 * @module
 */

import { createLogger } from "@handlekit/core";
import { formatHandle, nativeSystem, type CallbackReturn, type NativeCallback } from "@handlekit/native";
import { globalCallbackRegistry } from "./callback-registry.js";
import type { Element } from "./element.js";

const log = createLogger("callbacks");

/**
 * A callback as application code writes it. Returning nothing means
 * `"default"`.
 */
export type ElementCallback<C extends string> = (element: Element<C>) => CallbackReturn | void;

/**
 * Register `fn` as the native callback `name` of `element`, replacing any
 * previous one. The registry is only touched once the native system has
 * accepted the trampoline.
 */
export function setCallback<C extends string>(
  element: Element<C>,
  name: string,
  fn: ElementCallback<C>
): void {
  const handle = element.raw();
  const type = element.elementType;

  if (!globalCallbackRegistry.isHooked(handle)) {
    log.warn(
      `${name} registered on ${formatHandle(handle)}, which never went through fromRaw; ` +
        "its callbacks are not released when it is destroyed"
    );
  }

  const trampoline: NativeCallback = (ih) => {
    const result = fn(type.fromRawUnchecked(ih));
    return typeof result === "string" ? result : "default";
  };

  nativeSystem().setCallback(handle, name, trampoline);
  globalCallbackRegistry.insert(handle, name, trampoline);
}

/**
 * Remove the callback `name` from `element`. Returns whether one was set.
 */
export function removeCallback(element: Element<string>, name: string): boolean {
  const handle = element.raw();
  nativeSystem().setCallback(handle, name, null);
  return globalCallbackRegistry.remove(handle, name);
}

function namedCallback(name: string) {
  return <C extends string>(element: Element<C>, fn: ElementCallback<C>): void =>
    setCallback(element, name, fn);
}

/** Called right after the element is mapped. */
export const onMap = namedCallback("MAP_CB");

/** Called right before the element is unmapped. */
export const onUnmap = namedCallback("UNMAP_CB");

/**
 * Called when the element is destroyed, before its registry entry is
 * released.
 */
export const onDestroy = namedCallback("LDESTROY_CB");

export const onGetFocus = namedCallback("GETFOCUS_CB");
export const onKillFocus = namedCallback("KILLFOCUS_CB");
export const onEnterWindow = namedCallback("ENTERWINDOW_CB");
export const onLeaveWindow = namedCallback("LEAVEWINDOW_CB");

/** Called when the user presses F1 over the element. */
export const onHelp = namedCallback("HELP_CB");
