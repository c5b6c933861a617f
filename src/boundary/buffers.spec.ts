import { describe, expect, test } from "vitest";
import { BufferArena } from "./buffers.js";

describe("BufferArena", () => {
  test("copies on allocation", () => {
    const arena = new BufferArena();
    const source = new Uint8Array([1, 2, 3]);
    const buffer = arena.allocate(source);
    source[0] = 9;
    expect([...buffer.bytes]).toEqual([1, 2, 3]);
  });

  test("hands out distinct handles", () => {
    const arena = new BufferArena();
    const a = arena.allocate(new Uint8Array([1]));
    const b = arena.allocate(new Uint8Array([2]));
    expect(a.handle).not.toBe(b.handle);
    expect(arena.size).toBe(2);
  });

  test("zero-fills released buffers", () => {
    const arena = new BufferArena();
    const buffer = arena.allocate(new Uint8Array([4, 5, 6]));
    expect(arena.release(buffer.handle)).toBe(true);
    expect([...buffer.bytes]).toEqual([0, 0, 0]);
    expect(arena.size).toBe(0);
  });

  test("releasing twice is a no-op", () => {
    const arena = new BufferArena();
    const buffer = arena.allocate(new Uint8Array([1]));
    arena.release(buffer.handle);
    expect(arena.release(buffer.handle)).toBe(false);
    expect(arena.release(12345)).toBe(false);
  });
});
