/**
 * An in-memory native object system.
 *
 * Behaves like a handle-based GUI toolkit as far as handlekit can observe:
 * sequential handles, a live class name per object, string attributes, a
 * parent/child tree, named callbacks and a destroy notification. Nothing
 * is rendered. Test hooks let a test fail the next native call, rename a
 * live object's class, or fire callbacks and notifications by hand.
 */

import {
  rawHandle,
  formatHandle,
  type CallbackReturn,
  type NativeCallback,
  type NativeObjectSystem,
  type RawHandle,
} from "@handlekit/native";

/** Native calls that can be made to fail once with `failNext`. */
export type FailableCall = "create" | "append" | "map" | "show";

interface StubObject {
  readonly handle: RawHandle;
  className: string;
  readonly attributes: Map<string, string>;
  readonly children: RawHandle[];
  parent: RawHandle | undefined;
  readonly callbacks: Map<string, NativeCallback>;
  mapped: boolean;
  visible: boolean;
}

export class StubNativeSystem implements NativeObjectSystem {
  private readonly objects = new Map<RawHandle, StubObject>();
  private readonly notifications = new Map<RawHandle, NativeCallback>();
  private readonly notificationInstalls = new Map<RawHandle, number>();
  private readonly pendingFailures = new Set<FailableCall>();
  private nextHandle = 1;

  /** Every native call, in order, as `"<call> <handle>"`. */
  readonly calls: string[] = [];

  // --------------------------------------------------------------------------
  // NativeObjectSystem
  // --------------------------------------------------------------------------

  create(className: string): RawHandle | null {
    this.calls.push(`create ${className}`);
    if (this.consumeFailure("create")) return null;
    return this.adopt(this.nextHandle, className);
  }

  append(parent: RawHandle, child: RawHandle): RawHandle | null {
    this.calls.push(`append ${formatHandle(parent)} ${formatHandle(child)}`);
    if (this.consumeFailure("append")) return null;
    const parentObj = this.objects.get(parent);
    const childObj = this.objects.get(child);
    if (!parentObj || !childObj || childObj.parent !== undefined) return null;
    parentObj.children.push(child);
    childObj.parent = parent;
    return parent;
  }

  destroy(handle: RawHandle): void {
    this.calls.push(`destroy ${formatHandle(handle)}`);
    const obj = this.lookup(handle);
    if (obj.parent !== undefined) {
      const siblings = this.objects.get(obj.parent)?.children;
      if (siblings) siblings.splice(siblings.indexOf(handle), 1);
    }
    this.teardown(obj);
  }

  map(handle: RawHandle): number {
    this.calls.push(`map ${formatHandle(handle)}`);
    const obj = this.lookup(handle);
    if (this.consumeFailure("map")) return 0;
    obj.mapped = true;
    return 1;
  }

  unmap(handle: RawHandle): void {
    this.calls.push(`unmap ${formatHandle(handle)}`);
    const obj = this.lookup(handle);
    obj.mapped = false;
    obj.visible = false;
  }

  show(handle: RawHandle): number {
    this.calls.push(`show ${formatHandle(handle)}`);
    const obj = this.lookup(handle);
    if (this.consumeFailure("show")) return 0;
    obj.mapped = true;
    obj.visible = true;
    return 1;
  }

  hide(handle: RawHandle): void {
    this.calls.push(`hide ${formatHandle(handle)}`);
    this.lookup(handle).visible = false;
  }

  setAttribute(handle: RawHandle, name: string, value: string): void {
    this.lookup(handle).attributes.set(name, value);
  }

  getAttribute(handle: RawHandle, name: string): string | null {
    return this.lookup(handle).attributes.get(name) ?? null;
  }

  clearAttribute(handle: RawHandle, name: string): void {
    this.lookup(handle).attributes.delete(name);
  }

  resetAttribute(handle: RawHandle, name: string): void {
    const obj = this.lookup(handle);
    obj.attributes.delete(name);
    for (const child of obj.children) {
      this.resetAttribute(child, name);
    }
  }

  className(handle: RawHandle): string {
    return this.lookup(handle).className;
  }

  setCallback(handle: RawHandle, name: string, callback: NativeCallback | null): void {
    const obj = this.lookup(handle);
    if (callback) {
      obj.callbacks.set(name, callback);
    } else {
      obj.callbacks.delete(name);
    }
  }

  setDestroyNotification(handle: RawHandle, notification: NativeCallback): void {
    this.calls.push(`setDestroyNotification ${formatHandle(handle)}`);
    this.lookup(handle);
    this.notifications.set(handle, notification);
    this.notificationInstalls.set(handle, (this.notificationInstalls.get(handle) ?? 0) + 1);
  }

  // --------------------------------------------------------------------------
  // Test hooks
  // --------------------------------------------------------------------------

  /**
   * Register an object under a chosen handle, as if a native constructor had
   * returned it. Later `create` calls allocate above it.
   */
  adopt(handle: number, className: string): RawHandle {
    const raw = rawHandle(handle);
    if (this.objects.has(raw)) {
      throw new Error(`stub: handle ${formatHandle(raw)} is already live`);
    }
    this.objects.set(raw, {
      handle: raw,
      className,
      attributes: new Map(),
      children: [],
      parent: undefined,
      callbacks: new Map(),
      mapped: false,
      visible: false,
    });
    this.nextHandle = Math.max(this.nextHandle, raw + 1);
    return raw;
  }

  /** Make the next call of the given kind report failure. */
  failNext(call: FailableCall): void {
    this.pendingFailures.add(call);
  }

  /** Change the live class name of an object. */
  setClassName(handle: RawHandle, className: string): void {
    this.lookup(handle).className = className;
  }

  /**
   * Invoke the installed destroy notification without destroying anything.
   * Returns `undefined` when none was ever installed.
   */
  fireDestroyNotification(handle: RawHandle): CallbackReturn | undefined {
    return this.notifications.get(handle)?.(handle);
  }

  /** Invoke a named callback as the event loop would. */
  fireCallback(handle: RawHandle, name: string): CallbackReturn | undefined {
    return this.lookup(handle).callbacks.get(name)?.(handle);
  }

  /** How many times `setDestroyNotification` was called for a handle. */
  destroyNotificationInstalls(handle: RawHandle): number {
    return this.notificationInstalls.get(handle) ?? 0;
  }

  hasCallback(handle: RawHandle, name: string): boolean {
    return this.lookup(handle).callbacks.has(name);
  }

  isAlive(handle: RawHandle): boolean {
    return this.objects.has(handle);
  }

  isMapped(handle: RawHandle): boolean {
    return this.lookup(handle).mapped;
  }

  isVisible(handle: RawHandle): boolean {
    return this.lookup(handle).visible;
  }

  childrenOf(handle: RawHandle): readonly RawHandle[] {
    return [...this.lookup(handle).children];
  }

  get liveCount(): number {
    return this.objects.size;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private lookup(handle: RawHandle): StubObject {
    const obj = this.objects.get(handle);
    if (!obj) {
      throw new Error(`stub: ${formatHandle(handle)} is not a live handle`);
    }
    return obj;
  }

  private consumeFailure(call: FailableCall): boolean {
    return this.pendingFailures.delete(call);
  }

  // Children first; each object gets LDESTROY_CB, then its destroy notification.
  private teardown(obj: StubObject): void {
    for (const child of [...obj.children]) {
      const childObj = this.objects.get(child);
      if (childObj) this.teardown(childObj);
    }
    obj.callbacks.get("LDESTROY_CB")?.(obj.handle);
    const notification = this.notifications.get(obj.handle);
    this.notifications.delete(obj.handle);
    this.objects.delete(obj.handle);
    notification?.(obj.handle);
  }
}
