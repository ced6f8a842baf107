/**
 * Range parser for Unicode property tables
 *
 * Line format: `<range>;<property> [# comment]` where `<range>` is a single
 * hex codepoint or `<start>..<end>`.
 *
 * Examples:
 *   00C0..00D6    ; ALetter
 *   037F          ; ALetter # Lu GREEK CAPITAL LETTER YOT
 */

import { RangeParseError } from "./errors.js";
import { UnicodeRange } from "./range.js";
import type { EnumRegistry } from "./registry.js";
import { MAX_CODEPOINT, type ParseOptions } from "./types.js";

/**
 * Property names that behave identically to another property and are folded into it
 */
export const NORMALIZATION_TABLE: Readonly<Record<string, string>> = Object.freeze({
  // NL behaves exactly like BK (UAX #14)
  NL: "BK",
  // Without dictionaries or ICU data these resolve to AL (UAX #14, LB1)
  AI: "AL",
  SA: "AL",
  SG: "AL",
  XX: "AL",
  CJ: "NS",
});

const RANGE_PATTERN = /^([0-9A-Fa-f]{1,6})(?:\.\.([0-9A-Fa-f]{1,6}))?$/;
const PROPERTY_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

/**
 * Source table split into provenance header and data lines
 */
export interface SourceTable {
  /** Leading comment lines, verbatim */
  header: string[];
  /** Lines following the header */
  body: string[];
  /** 1-based line number of `body[0]` */
  bodyStart: number;
}

/**
 * Strip everything from the first `#`
 */
export function removeComment(line: string): string {
  const hashIndex = line.indexOf("#");
  return hashIndex === -1 ? line : line.substring(0, hashIndex);
}

function isHeaderLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.startsWith("#") && trimmed !== "#";
}

/**
 * Collect the leading header block
 *
 * The block ends at the first blank line, bare `#` line or data line.
 */
export function extractHeader(lines: readonly string[]): string[] {
  const header: string[] = [];
  for (const line of lines) {
    if (!isHeaderLine(line)) break;
    header.push(line);
  }
  return header;
}

/**
 * Split raw table text into header and body
 */
export function splitSource(text: string): SourceTable {
  // Strip BOM if present
  const cleaned = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const lines = cleaned.split(/\r?\n/);
  const header = extractHeader(lines);

  return {
    header,
    body: lines.slice(header.length),
    bodyStart: header.length + 1,
  };
}

function parseCodepoint(hex: string, line: string, lineNumber?: number): number {
  const value = Number.parseInt(hex, 16);
  if (value > MAX_CODEPOINT) {
    throw new RangeParseError(line, `codepoint ${hex} is beyond U+10FFFF`, lineNumber);
  }
  return value;
}

/**
 * Parse one comment-free, non-empty line into a range
 * @param line - Data line without comment
 * @param registry - Registry receiving the property name
 * @param options - Parser options
 * @param lineNumber - Position in the source, used in error messages
 * @throws RangeParseError if the line is malformed
 */
export function parseLine(
  line: string,
  registry: EnumRegistry,
  options: ParseOptions = {},
  lineNumber?: number
): UnicodeRange {
  const text = line.trim();
  const fields = text.split(";");

  if (fields.length < 2) {
    throw new RangeParseError(text, 'missing ";" separator', lineNumber);
  }
  if (fields.length > 2) {
    throw new RangeParseError(text, 'expected a single ";" separator', lineNumber);
  }

  const rangeText = (fields[0] ?? "").trim();
  const propertyText = (fields[1] ?? "").trim();

  const match = RANGE_PATTERN.exec(rangeText);
  if (!match) {
    throw new RangeParseError(text, `invalid codepoint range "${rangeText}"`, lineNumber);
  }

  const startHex = match[1] ?? "";
  const start = parseCodepoint(startHex, text, lineNumber);
  const end = match[2] === undefined ? start : parseCodepoint(match[2], text, lineNumber);

  if (start > end) {
    throw new RangeParseError(text, `range start exceeds range end`, lineNumber);
  }

  if (!PROPERTY_PATTERN.test(propertyText)) {
    throw new RangeParseError(
      text,
      propertyText ? `invalid property name "${propertyText}"` : "missing property name",
      lineNumber
    );
  }

  const normalize = options.normalize ?? true;
  const target =
    normalize && Object.hasOwn(NORMALIZATION_TABLE, propertyText)
      ? NORMALIZATION_TABLE[propertyText]
      : undefined;
  const property =
    target === undefined ? registry.add(propertyText) : registry.add(target, propertyText);

  return new UnicodeRange(start, end, property);
}

/**
 * Parse every data line, skipping comments and blank lines
 * @param lines - Raw lines (comments allowed)
 * @param registry - Registry receiving property names
 * @param options - Parser options
 * @param firstLineNumber - Line number of `lines[0]` in the source
 * @returns Ranges in source order
 */
export function parseLines(
  lines: readonly string[],
  registry: EnumRegistry,
  options: ParseOptions = {},
  firstLineNumber = 1
): UnicodeRange[] {
  const ranges: UnicodeRange[] = [];

  lines.forEach((raw, i) => {
    const line = removeComment(raw).trim();
    if (!line) return;
    ranges.push(parseLine(line, registry, options, firstLineNumber + i));
  });

  return ranges;
}
