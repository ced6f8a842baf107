/**
 * Packed encoding of range collections
 *
 * Record layout (no delimiters):
 *   start: 4 base-36 chars, zero padded
 *   end:   "!" when start == end, otherwise 4 base-36 chars
 *   code:  1 char, "A".."Z" for indices 0-25, "a".."z" for 26-51
 *
 * See contracts/packed.ts for the decode contract.
 */

import { CODEPOINT_WIDTH, MAX_PROPERTY_VALUES, SINGLE_MARKER } from "./contracts/packed.js";
import { CapacityError, PackedDataError } from "./errors.js";
import type { UnicodeRange } from "./range.js";
import type { EnumValue } from "./registry.js";
import type { DecodedRange, PackedProperties, PropertyCollection } from "./types.js";

const CHAR_A = 65;
const CHAR_LOWER_A = 97;
const BASE36_FIELD = /^[0-9a-z]{4}$/;

/**
 * One-character code for an enum index
 * @throws CapacityError for indices beyond the 52 available codes
 */
export function serializeIndex(index: number): string {
  if (!Number.isInteger(index) || index < 0 || index >= MAX_PROPERTY_VALUES) {
    throw new CapacityError(index + 1, MAX_PROPERTY_VALUES);
  }
  // Uppercase letters for the first 26 values, lowercase after that
  return index < 26
    ? String.fromCharCode(CHAR_A + index)
    : String.fromCharCode(CHAR_LOWER_A + index - 26);
}

/**
 * Enum index for a one-character code, or undefined for anything else
 */
export function deserializeCode(code: string): number | undefined {
  if (code.length !== 1) return undefined;
  const c = code.charCodeAt(0);
  if (c >= CHAR_A && c < CHAR_A + 26) return c - CHAR_A;
  if (c >= CHAR_LOWER_A && c < CHAR_LOWER_A + 26) return c - CHAR_LOWER_A + 26;
  return undefined;
}

/**
 * Fixed-width base-36 rendering of a codepoint
 */
export function encodeCodepoint(codepoint: number): string {
  return codepoint.toString(36).padStart(CODEPOINT_WIDTH, "0");
}

/**
 * Concatenate the records of all ranges
 */
export function packRanges(ranges: readonly UnicodeRange[]): string {
  let out = "";
  for (const range of ranges) {
    out += encodeCodepoint(range.start);
    out += range.isSingle ? SINGLE_MARKER : encodeCodepoint(range.end);
    out += range.property.serialized;
  }
  return out;
}

/**
 * Number of ranges covering a single codepoint
 */
export function countSingleRanges(ranges: readonly UnicodeRange[]): number {
  let count = 0;
  for (const range of ranges) {
    if (range.isSingle) count++;
  }
  return count;
}

/**
 * Pack a processed collection along with the counts a decoder needs
 * @throws CapacityError if the registry holds more values than codes exist
 */
export function packProperties(
  collection: PropertyCollection,
  defaultProperty: EnumValue
): PackedProperties {
  const propertyCount = collection.registry.size;
  if (propertyCount > MAX_PROPERTY_VALUES) {
    throw new CapacityError(propertyCount, MAX_PROPERTY_VALUES);
  }

  return {
    packed: packRanges(collection.ranges),
    singleRangesCount: countSingleRanges(collection.ranges),
    propertyCount,
    defaultProperty,
  };
}

function readField(packed: string, offset: number): number {
  const field = packed.slice(offset, offset + CODEPOINT_WIDTH);
  if (!BASE36_FIELD.test(field)) {
    throw new PackedDataError(offset, `expected ${CODEPOINT_WIDTH} base-36 digits, got "${field}"`);
  }
  return Number.parseInt(field, 36);
}

/**
 * Decode a packed string back into ranges
 * @param packed - Packed records
 * @param names - Property names in enum index order
 * @throws PackedDataError if a record is truncated or malformed
 */
export function unpackRanges(packed: string, names: readonly string[]): DecodedRange[] {
  const ranges: DecodedRange[] = [];
  let offset = 0;

  while (offset < packed.length) {
    const start = readField(packed, offset);
    offset += CODEPOINT_WIDTH;

    let end: number;
    if (packed[offset] === SINGLE_MARKER) {
      end = start;
      offset += 1;
    } else {
      end = readField(packed, offset);
      offset += CODEPOINT_WIDTH;
    }

    const code = packed[offset] ?? "";
    const index = deserializeCode(code);
    const property = index === undefined ? undefined : names[index];
    if (property === undefined) {
      throw new PackedDataError(offset, code ? `unknown property code "${code}"` : "missing property code");
    }
    offset += 1;

    ranges.push({ start, end, property });
  }

  return ranges;
}

/**
 * Decode `packed` and compare it with the collection it was built from
 * @throws PackedDataError on the first mismatch
 */
export function verifyRoundTrip(collection: PropertyCollection, packed: PackedProperties): void {
  const names = collection.registry.values.map((value) => value.name);
  const decoded = unpackRanges(packed.packed, names);

  if (decoded.length !== collection.ranges.length) {
    throw new PackedDataError(
      packed.packed.length,
      `decoded ${decoded.length} ranges, expected ${collection.ranges.length}`
    );
  }

  let singles = 0;
  let offset = 0;
  decoded.forEach((range, i) => {
    const expected = collection.ranges[i]!;
    if (
      range.start !== expected.start ||
      range.end !== expected.end ||
      range.property !== expected.property.name
    ) {
      throw new PackedDataError(offset, `record ${i} does not match its source range`);
    }
    const single = range.start === range.end;
    if (single) singles++;
    offset += CODEPOINT_WIDTH + (single ? SINGLE_MARKER.length : CODEPOINT_WIDTH) + 1;
  });

  if (singles !== packed.singleRangesCount) {
    throw new PackedDataError(
      packed.packed.length,
      `single range count ${packed.singleRangesCount} does not match ${singles} decoded`
    );
  }
}
