/**
 * Built-in element kinds.
 *
 * Class names are the ones the native toolkit reports from `className()`.
 * Kinds not listed here can be added by application code with
 * `defineElement`.
 *
 * @module
 */

import { NullHandleError } from "@handlekit/core";
import { nativeSystem } from "@handlekit/native";
import { defineElement } from "./define.js";
import type { Element, ElementOf, ElementType } from "./element.js";

export const Dialog = defineElement("Dialog", "dialog");
export type Dialog = ElementOf<typeof Dialog>;

export const Button = defineElement("Button", "button");
export type Button = ElementOf<typeof Button>;

export const Label = defineElement("Label", "label");
export type Label = ElementOf<typeof Label>;

export const Text = defineElement("Text", "text");
export type Text = ElementOf<typeof Text>;

export const Image = defineElement("Image", "image");
export type Image = ElementOf<typeof Image>;

export const Timer = defineElement("Timer", "timer");
export type Timer = ElementOf<typeof Timer>;

export const VBox = defineElement("VBox", "vbox");
export type VBox = ElementOf<typeof VBox>;

export const HBox = defineElement("HBox", "hbox");
export type HBox = ElementOf<typeof HBox>;

/**
 * Allocate a native object of `type`'s class and wrap it.
 *
 * @throws {NullHandleError} If the native constructor fails.
 */
export function createElement<C extends string>(type: ElementType<C>): Element<C> {
  return type.fromRaw(nativeSystem().create(type.targetClassName));
}

/**
 * Attach `child` to `parent` in the native tree. Returns a fresh alias of
 * the parent.
 *
 * @throws {NullHandleError} If the native system refuses the child.
 */
export function append<C extends string>(parent: Element<C>, child: Element<string>): Element<C> {
  const result = nativeSystem().append(parent.raw(), child.raw());
  if (result === null) {
    throw new NullHandleError(parent.elementType.displayName);
  }
  return parent.elementType.fromRaw(result);
}
