/**
 * Sample property tables shipped with the testkit
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

export type FixtureName = "line-break-sample.txt" | "word-break-sample.txt";

/**
 * Absolute path of a fixture table
 */
export function fixturePath(name: FixtureName): string {
  return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
}

/**
 * Contents of a fixture table
 */
export function readFixture(name: FixtureName): string {
  return readFileSync(fixturePath(name), "utf-8");
}

/**
 * Build a table from a header and data lines
 */
export function table(header: readonly string[], lines: readonly string[]): string {
  return [...header, "", ...lines, ""].join("\n");
}
