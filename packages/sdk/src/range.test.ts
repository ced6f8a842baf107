import { describe, it, expect } from "vitest";
import { UnicodeRange } from "./range.js";
import { EnumRegistry } from "./registry.js";

describe("UnicodeRange", () => {
  const registry = new EnumRegistry();
  const al = registry.add("AL");
  const sp = registry.add("SP");

  it("should detect shared codepoints", () => {
    const a = new UnicodeRange(0x41, 0x5a, al);

    expect(a.isOverlapping(new UnicodeRange(0x5a, 0x60, sp))).toBe(true);
    expect(a.isOverlapping(new UnicodeRange(0x30, 0x41, sp))).toBe(true);
    expect(a.isOverlapping(new UnicodeRange(0x50, 0x50, sp))).toBe(true);
    expect(a.isOverlapping(new UnicodeRange(0x5b, 0x60, sp))).toBe(false);
  });

  it("should only call same-property neighbours adjacent", () => {
    const a = new UnicodeRange(0x41, 0x5a, al);

    expect(a.isAdjacent(new UnicodeRange(0x5b, 0x60, al))).toBe(true);
    expect(a.isAdjacent(new UnicodeRange(0x5b, 0x60, sp))).toBe(false);
    expect(a.isAdjacent(new UnicodeRange(0x5c, 0x60, al))).toBe(false);
  });

  it("should extend to the end of another range", () => {
    const merged = new UnicodeRange(0x41, 0x5a, al).extend(new UnicodeRange(0x5b, 0x7a, al));

    expect(merged.toJSON()).toEqual({ start: 0x41, end: 0x7a, property: "AL" });
    expect(merged.isSingle).toBe(false);
    expect(new UnicodeRange(0x20, 0x20, sp).isSingle).toBe(true);
  });
});
