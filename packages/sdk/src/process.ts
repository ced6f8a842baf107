/**
 * Range processing: sort, validate, merge
 *
 * Invariants of the output:
 * - Sorted ascending by start
 * - end[i] < start[i + 1]
 * - No two neighbours share a property
 */

import { OverlapError } from "./errors.js";
import type { UnicodeRange } from "./range.js";
import type { RangeCollection, Result } from "./types.js";

/**
 * Ranges ordered by start; the input is left untouched
 */
export function sortRanges(ranges: readonly UnicodeRange[]): UnicodeRange[] {
  return [...ranges].sort((a, b) => a.start - b.start);
}

/**
 * Check sorted ranges pairwise for intersections
 * @returns The first overlap found, or null
 */
export function verifyNoOverlappingRanges(sorted: readonly UnicodeRange[]): OverlapError | null {
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1]!;
    const next = sorted[i]!;
    if (next.isOverlapping(prev)) {
      return new OverlapError(prev.toJSON(), next.toJSON());
    }
  }
  return null;
}

/**
 * Merge sorted, non-overlapping ranges
 *
 * Adjacent ranges with the same property merge. Two default-property ranges
 * merge across a gap too, since unlisted codepoints carry the default anyway.
 *
 * Example:
 *   01C4..0293; ALetter
 *   0294..0294; ALetter
 *   0295..02AF; ALetter
 * becomes
 *   01C4..02AF; ALetter
 */
export function combineAdjacentRanges(
  sorted: readonly UnicodeRange[],
  defaultProperty: string
): UnicodeRange[] {
  const [first, ...rest] = sorted;
  if (!first) return [];

  const result: UnicodeRange[] = [first];
  for (const next of rest) {
    const prev = result[result.length - 1]!;
    if (prev.isAdjacent(next)) {
      result[result.length - 1] = prev.extend(next);
    } else if (prev.property === next.property && prev.property.name === defaultProperty) {
      result[result.length - 1] = prev.extend(next);
    } else {
      result.push(next);
    }
  }
  return result;
}

/**
 * Convert parsed ranges into the canonical minimal sorted form
 * @param ranges - Ranges in any order
 * @param defaultProperty - Name of the family's default property
 */
export function processRanges(
  ranges: readonly UnicodeRange[],
  defaultProperty: string
): Result<RangeCollection, OverlapError> {
  const sorted = sortRanges(ranges);

  const overlap = verifyNoOverlappingRanges(sorted);
  if (overlap) {
    return { ok: false, error: overlap };
  }

  return { ok: true, value: combineAdjacentRanges(sorted, defaultProperty) };
}
