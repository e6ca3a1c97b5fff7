import { describe, it, expect } from "vitest";
import { ByteWindow, toWindow } from "../window";
import { VerificationError } from "../../errors";

const buffer = new Uint8Array([0x10, 0x20, 0x30, 0x40, 0x50]);

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof VerificationError) return err.code;
    throw err;
  }
  return undefined;
}

describe("ByteWindow.of", () => {
  it("covers the whole buffer by default", () => {
    const window = ByteWindow.of(buffer);
    expect(window.offset).toBe(0);
    expect(window.length).toBe(5);
    expect(window.capacity).toBe(5);
  });

  it("rejects windows past the end of the buffer", () => {
    expect(codeOf(() => ByteWindow.of(buffer, 3, 3))).toBe("out-of-bounds");
    expect(codeOf(() => ByteWindow.of(buffer, -1, 1))).toBe("out-of-bounds");
    expect(codeOf(() => ByteWindow.of(buffer, 1.5, 1))).toBe("out-of-bounds");
  });

  it("allows an empty window at the end", () => {
    expect(ByteWindow.of(buffer, 5, 0).length).toBe(0);
  });
});

describe("ByteWindow access", () => {
  const window = ByteWindow.of(buffer, 1, 3);

  it("reads relative to the window offset", () => {
    expect(window.at(0)).toBe(0x20);
    expect(window.at(2)).toBe(0x40);
  });

  it("refuses reads outside the window even when the buffer has bytes", () => {
    expect(codeOf(() => window.at(3))).toBe("out-of-bounds");
  });

  it("creates sub-windows that share the buffer", () => {
    const sub = window.sub(1, 2);
    expect(sub.buffer).toBe(buffer);
    expect(sub.offset).toBe(2);
    expect(Array.from(sub.view())).toEqual([0x30, 0x40]);
    expect(codeOf(() => window.sub(2, 2))).toBe("out-of-bounds");
  });

  it("slices to the end", () => {
    expect(Array.from(window.slice(1).view())).toEqual([0x30, 0x40]);
    expect(window.slice(3).length).toBe(0);
  });

  it("compares contents against windows and raw bytes", () => {
    expect(window.equals(new Uint8Array([0x20, 0x30, 0x40]))).toBe(true);
    expect(window.equals(ByteWindow.of(new Uint8Array([0, 0x20, 0x30, 0x40]), 1))).toBe(true);
    expect(window.equals(new Uint8Array([0x20, 0x30]))).toBe(false);
    expect(window.equals(new Uint8Array([0x20, 0x30, 0x41]))).toBe(false);
  });

  it("views without copying and copies on toBytes", () => {
    const view = window.view();
    const copy = window.toBytes();
    buffer[2] = 0x33;
    expect(view[1]).toBe(0x33);
    expect(copy[1]).toBe(0x30);
    buffer[2] = 0x30;
  });

  it("left-pads into fixed-size copies", () => {
    expect(Array.from(window.toFixedBytes(5))).toEqual([0, 0, 0x20, 0x30, 0x40]);
    expect(codeOf(() => window.toFixedBytes(2))).toBe("out-of-bounds");
  });

  it("renders hex", () => {
    expect(window.toHex()).toBe("0x203040");
  });
});

describe("toWindow", () => {
  it("passes windows through and wraps raw bytes", () => {
    const window = ByteWindow.of(buffer, 2);
    expect(toWindow(window)).toBe(window);
    expect(toWindow(buffer).length).toBe(5);
  });
});
