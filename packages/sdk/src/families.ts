/**
 * Property family definitions
 */

import type { PropertyFamily, PropertyFamilyId } from "./types.js";

/**
 * Word break properties (UAX #29), from WordBreakProperty.txt
 */
export const WORD_BREAK: Readonly<PropertyFamily> = {
  id: "word",
  prefix: "Word",
  defaultProperty: "Unknown",
  docLink: "http://unicode.org/reports/tr29/#Table_Word_Break_Property_Values",
  normalize: true,
  defaultFileName: "word-break-properties.ts",
};

/**
 * Line break properties (UAX #14), from LineBreak.txt
 */
export const LINE_BREAK: Readonly<PropertyFamily> = {
  id: "line",
  prefix: "Line",
  defaultProperty: "AL",
  docLink: "https://www.unicode.org/reports/tr14/tr14-45.html#DescriptionOfProperties",
  normalize: true,
  defaultFileName: "line-break-properties.ts",
};

export const PROPERTY_FAMILIES: Readonly<Record<PropertyFamilyId, Readonly<PropertyFamily>>> = {
  word: WORD_BREAK,
  line: LINE_BREAK,
};

export function getFamily(id: PropertyFamilyId): Readonly<PropertyFamily> {
  return PROPERTY_FAMILIES[id];
}
