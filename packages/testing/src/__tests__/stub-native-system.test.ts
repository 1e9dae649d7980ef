import { describe, it, expect, beforeEach } from "vitest";
import { rawHandle, type CallbackReturn, type RawHandle } from "@handlekit/native";
import { StubNativeSystem } from "../stub-native-system.js";

describe("StubNativeSystem", () => {
  let stub: StubNativeSystem;

  beforeEach(() => {
    stub = new StubNativeSystem();
  });

  it("allocates sequential handles and tracks class names", () => {
    const a = stub.create("dialog");
    const b = stub.create("button");
    expect(a).toBe(1);
    expect(b).toBe(2);
    expect(b === null ? null : stub.className(b)).toBe("button");
  });

  it("allocates above adopted handles", () => {
    stub.adopt(0x10, "dialog");
    expect(stub.create("label")).toBe(0x11);
  });

  it("refuses to adopt a live handle twice", () => {
    stub.adopt(1, "dialog");
    expect(() => stub.adopt(1, "button")).toThrow("stub: handle 0x1 is already live");
  });

  it("fails the next call once", () => {
    stub.failNext("create");
    expect(stub.create("dialog")).toBeNull();
    expect(stub.create("dialog")).toBe(1);

    const h = rawHandle(1);
    stub.failNext("map");
    expect(stub.map(h)).toBe(0);
    expect(stub.map(h)).toBe(1);
    expect(stub.isMapped(h)).toBe(true);
  });

  it("distinguishes unset from empty attributes", () => {
    const h = stub.adopt(1, "text");
    expect(stub.getAttribute(h, "VALUE")).toBeNull();
    stub.setAttribute(h, "VALUE", "");
    expect(stub.getAttribute(h, "VALUE")).toBe("");
    stub.clearAttribute(h, "VALUE");
    expect(stub.getAttribute(h, "VALUE")).toBeNull();
  });

  it("resetAttribute clears the whole subtree", () => {
    const box = stub.adopt(1, "vbox");
    const child = stub.adopt(2, "label");
    stub.append(box, child);
    stub.setAttribute(box, "FONT", "Mono");
    stub.setAttribute(child, "FONT", "Mono");
    stub.resetAttribute(box, "FONT");
    expect(stub.getAttribute(child, "FONT")).toBeNull();
  });

  it("destroys children first and fires LDESTROY_CB before the notification", () => {
    const order: string[] = [];
    const record =
      (what: string) =>
      (h: RawHandle): CallbackReturn => {
        order.push(`${what} ${h}`);
        return "default";
      };

    const dlg = stub.adopt(1, "dialog");
    const btn = stub.adopt(2, "button");
    stub.append(dlg, btn);
    for (const h of [dlg, btn]) {
      stub.setCallback(h, "LDESTROY_CB", record("ldestroy"));
      stub.setDestroyNotification(h, record("notify"));
    }

    stub.destroy(dlg);

    expect(order).toEqual(["ldestroy 2", "notify 2", "ldestroy 1", "notify 1"]);
    expect(stub.isAlive(dlg)).toBe(false);
    expect(stub.isAlive(btn)).toBe(false);
    expect(stub.liveCount).toBe(0);
  });

  it("detaches a destroyed child from its parent", () => {
    const dlg = stub.adopt(1, "dialog");
    const btn = stub.adopt(2, "button");
    stub.append(dlg, btn);
    stub.destroy(btn);
    expect(stub.childrenOf(dlg)).toEqual([]);
  });

  it("counts destroy notification installs", () => {
    const h = stub.adopt(1, "dialog");
    expect(stub.destroyNotificationInstalls(h)).toBe(0);
    stub.setDestroyNotification(h, () => "default");
    stub.setDestroyNotification(h, () => "default");
    expect(stub.destroyNotificationInstalls(h)).toBe(2);
  });

  it("fires notifications and callbacks on demand", () => {
    const h = stub.adopt(1, "dialog");
    expect(stub.fireDestroyNotification(h)).toBeUndefined();
    stub.setDestroyNotification(h, () => "close");
    expect(stub.fireDestroyNotification(h)).toBe("close");
    stub.setCallback(h, "MAP_CB", () => "ignore");
    expect(stub.fireCallback(h, "MAP_CB")).toBe("ignore");
    stub.setCallback(h, "MAP_CB", null);
    expect(stub.hasCallback(h, "MAP_CB")).toBe(false);
  });

  it("throws on dead handles", () => {
    const h = stub.adopt(1, "dialog");
    stub.destroy(h);
    expect(() => stub.className(h)).toThrow("stub: 0x1 is not a live handle");
  });

  it("logs native calls", () => {
    const h = stub.adopt(3, "dialog");
    stub.show(h);
    stub.hide(h);
    expect(stub.calls).toEqual(["show 0x3", "hide 0x3"]);
    expect(stub.isVisible(h)).toBe(false);
  });
});
