import { describe, it, expect } from "vitest";
import { EnumRegistry, EnumValue } from "./registry.js";
import { CapacityError } from "./errors.js";

describe("EnumRegistry", () => {
  it("should assign indices in first-seen order", () => {
    const registry = new EnumRegistry();
    const cm = registry.add("CM");
    const al = registry.add("AL");
    const bk = registry.add("BK");

    expect(cm.index).toBe(0);
    expect(al.index).toBe(1);
    expect(bk.index).toBe(2);
    expect(registry.values.map((v) => v.name)).toEqual(["CM", "AL", "BK"]);
  });

  it("should return the existing value when a name is added twice", () => {
    const registry = new EnumRegistry();
    const first = registry.add("ALetter");
    const second = registry.add("ALetter");

    expect(second).toBe(first);
    expect(registry.size).toBe(1);
  });

  it("should keep indices contiguous for any sequence of adds", () => {
    const registry = new EnumRegistry();
    for (const name of ["B", "A", "B", "C", "A", "D", "C", "E"]) {
      registry.add(name);
    }

    expect(registry.values.map((v) => v.index)).toEqual([0, 1, 2, 3, 4]);
    expect(registry.values.map((v) => v.name)).toEqual(["B", "A", "C", "D", "E"]);
  });

  it("should accumulate normalized source names", () => {
    const registry = new EnumRegistry();
    registry.add("AL", "AI");
    registry.add("AL", "SA");
    registry.add("AL", "AI");
    const al = registry.add("AL");

    expect([...al.normalizedFrom]).toEqual(["AI", "SA"]);
    expect(registry.size).toBe(1);
  });

  it("should leave normalizedFrom empty for directly registered names", () => {
    const registry = new EnumRegistry();
    expect(registry.add("ID").normalizedFrom.size).toBe(0);
  });

  describe("ensure", () => {
    it("should append a missing default", () => {
      const registry = new EnumRegistry();
      registry.add("ALetter");
      const unknown = registry.ensure("Unknown");

      expect(unknown.index).toBe(1);
      expect(registry.size).toBe(2);
    });

    it("should be a no-op when the name exists", () => {
      const registry = new EnumRegistry();
      const al = registry.add("AL", "XX");
      registry.add("BK");

      expect(registry.ensure("AL")).toBe(al);
      expect(registry.size).toBe(2);
      expect([...al.normalizedFrom]).toEqual(["XX"]);
    });
  });

  it("should look values up by name and index", () => {
    const registry = new EnumRegistry();
    const cr = registry.add("CR");

    expect(registry.get("CR")).toBe(cr);
    expect(registry.has("CR")).toBe(true);
    expect(registry.has("LF")).toBe(false);
    expect(registry.get("LF")).toBeUndefined();
    expect(registry.at(0)).toBe(cr);
    expect(registry.at(1)).toBeUndefined();
  });
});

describe("EnumValue", () => {
  it("should serialize the first 26 indices as uppercase letters", () => {
    expect(new EnumValue(0, "x").serialized).toBe("A");
    expect(new EnumValue(25, "x").serialized).toBe("Z");
  });

  it("should serialize indices 26 and above as lowercase letters", () => {
    expect(new EnumValue(26, "x").serialized).toBe("a");
    expect(new EnumValue(51, "x").serialized).toBe("z");
  });

  it("should refuse indices beyond the available codes", () => {
    expect(() => new EnumValue(52, "x").serialized).toThrow(CapacityError);
  });

  it("should strip underscores from the enum member name", () => {
    expect(new EnumValue(0, "Extend_Num_Let").enumName).toBe("ExtendNumLet");
    expect(new EnumValue(0, "ZWJ").enumName).toBe("ZWJ");
  });
});
