import { describe, it, expect } from "vitest";
import {
  NORMALIZATION_TABLE,
  extractHeader,
  parseLine,
  parseLines,
  removeComment,
  splitSource,
} from "./parse.js";
import { EnumRegistry } from "./registry.js";
import { RangeParseError } from "./errors.js";

describe("removeComment", () => {
  it("should strip everything from the first #", () => {
    expect(removeComment("0041..005A;AL # L& [26] LATIN")).toBe("0041..005A;AL ");
  });

  it("should return lines without # unchanged", () => {
    expect(removeComment("0041;AL")).toBe("0041;AL");
  });

  it("should reduce comment-only lines to an empty string", () => {
    expect(removeComment("# Total code points: 12")).toBe("");
  });
});

describe("extractHeader", () => {
  it("should stop at the first bare # line", () => {
    const lines = ["# LineBreak-15.txt", "# Date: sample", "#", "# more", "0041;AL"];
    expect(extractHeader(lines)).toEqual(["# LineBreak-15.txt", "# Date: sample"]);
  });

  it("should stop at the first blank line", () => {
    const lines = ["# Title", "   ", "# after blank"];
    expect(extractHeader(lines)).toEqual(["# Title"]);
  });

  it("should keep header lines verbatim", () => {
    expect(extractHeader(["  # indented  ", ""])).toEqual(["  # indented  "]);
  });

  it("should return no header for a table starting with data", () => {
    expect(extractHeader(["0041..005A;AL", "005B..007A;AL"])).toEqual([]);
  });
});

describe("splitSource", () => {
  it("should separate header and body", () => {
    const source = splitSource("\uFEFF# Title\r\n\r\n0041;AL\r\n");
    expect(source.header).toEqual(["# Title"]);
    expect(source.body).toEqual(["", "0041;AL", ""]);
  });

  it("should treat a headerless table as all body", () => {
    const source = splitSource("0041..005A;AL\n005B..007A;AL");
    expect(source.header).toEqual([]);
    expect(source.body).toEqual(["0041..005A;AL", "005B..007A;AL"]);
    expect(source.bodyStart).toBe(1);
  });
});

describe("parseLine", () => {
  it("should parse a single codepoint", () => {
    const registry = new EnumRegistry();
    const range = parseLine("037F;ALetter", registry);

    expect(range.start).toBe(0x37f);
    expect(range.end).toBe(0x37f);
    expect(range.property.name).toBe("ALetter");
  });

  it("should parse a codepoint range and trim whitespace", () => {
    const registry = new EnumRegistry();
    const range = parseLine("  00C0..00D6    ; ALetter  ", registry);

    expect(range.start).toBe(0xc0);
    expect(range.end).toBe(0xd6);
    expect(range.property).toBe(registry.get("ALetter"));
  });

  it("should accept lowercase and 5-6 digit codepoints", () => {
    const registry = new EnumRegistry();
    const range = parseLine("1f1e6..1F1FF;RI", registry);

    expect(range.start).toBe(0x1f1e6);
    expect(range.end).toBe(0x1f1ff);
  });

  it("should tag normalized names with their target and record the source name", () => {
    const registry = new EnumRegistry();
    const range = parseLine("0085;NL", registry);

    expect(range.property.name).toBe("BK");
    expect([...range.property.normalizedFrom]).toEqual(["NL"]);
    expect(registry.has("NL")).toBe(false);
  });

  it("should apply every entry of the normalization table", () => {
    expect(NORMALIZATION_TABLE).toEqual({
      NL: "BK",
      AI: "AL",
      SA: "AL",
      SG: "AL",
      XX: "AL",
      CJ: "NS",
    });

    const registry = new EnumRegistry();
    for (const raw of Object.keys(NORMALIZATION_TABLE)) {
      parseLine(`0041;${raw}`, registry);
    }

    expect(registry.values.map((v) => v.name)).toEqual(["BK", "AL", "NS"]);
    expect([...(registry.get("AL")?.normalizedFrom ?? [])]).toEqual(["AI", "SA", "SG", "XX"]);
    expect([...(registry.get("NS")?.normalizedFrom ?? [])]).toEqual(["CJ"]);
  });

  it("should register raw names when normalization is off", () => {
    const registry = new EnumRegistry();
    const range = parseLine("0085;NL", registry, { normalize: false });

    expect(range.property.name).toBe("NL");
    expect(registry.has("BK")).toBe(false);
  });

  it("should not treat inherited object keys as normalization entries", () => {
    const registry = new EnumRegistry();
    expect(parseLine("0041;constructor", registry).property.name).toBe("constructor");
  });

  describe("errors", () => {
    const registry = new EnumRegistry();

    it("should reject a missing separator", () => {
      expect(() => parseLine("0041 AL", registry)).toThrow(RangeParseError);
      expect(() => parseLine("0041 AL", registry)).toThrow(
        'Invalid property line "0041 AL": missing ";" separator'
      );
    });

    it("should reject more than one separator", () => {
      expect(() => parseLine("0041;AL;extra", registry)).toThrow('expected a single ";" separator');
    });

    it("should reject non-hex codepoints", () => {
      expect(() => parseLine("00G1;AL", registry)).toThrow('invalid codepoint range "00G1"');
      expect(() => parseLine("0041...0042;AL", registry)).toThrow(RangeParseError);
      expect(() => parseLine(";AL", registry)).toThrow('invalid codepoint range ""');
    });

    it("should reject codepoints beyond U+10FFFF", () => {
      expect(() => parseLine("110000;AL", registry)).toThrow("codepoint 110000 is beyond U+10FFFF");
    });

    it("should reject reversed ranges", () => {
      expect(() => parseLine("005A..0041;AL", registry)).toThrow("range start exceeds range end");
    });

    it("should reject a missing property name", () => {
      expect(() => parseLine("0041;", registry)).toThrow("missing property name");
    });

    it("should reject property names that cannot become identifiers", () => {
      expect(() => parseLine("0041;Hebrew Letter", registry)).toThrow(
        'invalid property name "Hebrew Letter"'
      );
    });

    it("should expose the error code", () => {
      let caught: unknown;
      try {
        parseLine("zz;AL", registry);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(RangeParseError);
      expect(caught instanceof RangeParseError ? caught.code : undefined).toBe("E_PARSE");
    });
  });
});

describe("parseLines", () => {
  it("should skip comments and blank lines", () => {
    const registry = new EnumRegistry();
    const ranges = parseLines(
      ["# comment", "", "0041..005A;AL # letters", "   ", "0020;SP", "# EOF"],
      registry
    );

    expect(ranges.map((r) => [r.start, r.end, r.property.name])).toEqual([
      [0x41, 0x5a, "AL"],
      [0x20, 0x20, "SP"],
    ]);
  });

  it("should report the source line number of a malformed line", () => {
    const registry = new EnumRegistry();
    expect(() => parseLines(["", "0041;AL", "zz;AL"], registry, {}, 5)).toThrow(
      'Invalid property line 7 "zz;AL": invalid codepoint range "zz"'
    );
  });

  it("should fail fast on the first malformed line", () => {
    const registry = new EnumRegistry();
    expect(() => parseLines(["0041;AL", "bad", "0042;NEVER"], registry)).toThrow(RangeParseError);
    expect(registry.has("NEVER")).toBe(false);
  });
});
