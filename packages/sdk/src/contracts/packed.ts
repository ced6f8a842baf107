/**
 * Packed data contracts and invariants
 */

/**
 * Width of a base-36 codepoint field (36^4 - 1 = 1,679,615 > U+10FFFF)
 */
export const CODEPOINT_WIDTH = 4;

/**
 * Marker replacing the end field of a single-codepoint range
 */
export const SINGLE_MARKER = "!";

/**
 * Number of one-character property codes ("A"-"Z", then "a"-"z")
 */
export const MAX_PROPERTY_VALUES = 52;

/**
 * Decode contract:
 *
 * 1. Records:
 *    - Scan left to right until the string is exhausted
 *    - start: exactly 4 base-36 chars
 *    - end: "!" (same as start) or exactly 4 base-36 chars
 *    - property: 1 char; "A" = index 0 ... "Z" = 25, "a" = 26 ... "z" = 51
 *
 * 2. Ordering:
 *    - Records are sorted by start and never overlap (binary search is valid)
 *    - Neighbouring records never share a property
 *
 * 3. Companion values:
 *    - singleRangesCount: number of "!" records (lets a decoder size its table
 *      as (packed.length - singleRangesCount * 6) / 9 + singleRangesCount)
 *    - propertyCount: number of enum values, in registry order
 *    - defaultProperty: value for any codepoint not covered by a record
 */
