/**
 * Unit tests for environment resolution
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { expandTilde, isVerbose, resolveDestination, resolvePath } from "../src/lib/env.js";

describe("environment resolution", () => {
  describe("expandTilde", () => {
    it("should expand a bare tilde", () => {
      expect(expandTilde("~")).toBe(homedir());
    });

    it("should expand a tilde prefix", () => {
      expect(expandTilde("~/gen/out.ts")).toBe(path.join(homedir(), "gen/out.ts"));
    });

    it("should leave other paths alone", () => {
      expect(expandTilde("./gen")).toBe("./gen");
      expect(expandTilde("~other/gen")).toBe("~other/gen");
    });
  });

  describe("resolvePath", () => {
    it("should resolve relative paths to absolute", () => {
      expect(resolvePath("LineBreak.txt")).toBe(path.resolve("LineBreak.txt"));
    });

    it("should keep absolute paths", () => {
      expect(resolvePath("/absolute/LineBreak.txt")).toBe("/absolute/LineBreak.txt");
    });
  });

  describe("resolveDestination", () => {
    it("should prefer the CLI option", () => {
      const env = { BREAKPROPS_OUT_DIR: "/env/gen" };
      expect(resolveDestination("/cli/out.ts", "line-break-properties.ts", env)).toBe("/cli/out.ts");
    });

    it("should fall back to BREAKPROPS_OUT_DIR with the family file name", () => {
      const env = { BREAKPROPS_OUT_DIR: "/env/gen" };
      expect(resolveDestination(undefined, "line-break-properties.ts", env)).toBe(
        "/env/gen/line-break-properties.ts"
      );
    });

    it("should return undefined when neither is given", () => {
      expect(resolveDestination(undefined, "word-break-properties.ts", {})).toBeUndefined();
    });
  });

  describe("isVerbose", () => {
    it("should only accept BREAKPROPS_CLI_DEBUG=1", () => {
      expect(isVerbose({ BREAKPROPS_CLI_DEBUG: "1" })).toBe(true);
      expect(isVerbose({ BREAKPROPS_CLI_DEBUG: "true" })).toBe(false);
      expect(isVerbose({})).toBe(false);
    });
  });
});
