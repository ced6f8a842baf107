/**
 * Core types for breakprops
 */

import type { EnumRegistry, EnumValue } from "./registry.js";
import type { UnicodeRange } from "./range.js";

/**
 * Largest Unicode scalar value
 */
export const MAX_CODEPOINT = 0x10ffff;

/**
 * Identifier of a supported property family
 */
export type PropertyFamilyId = "word" | "line";

/**
 * Family-specific parameters fed into the generic pipeline
 */
export interface PropertyFamily {
  /** Family identifier */
  id: PropertyFamilyId;
  /** Identifier prefix for generated names (e.g., "Line" → LineCharProperty) */
  prefix: string;
  /** Property assigned to any codepoint not covered by an explicit range */
  defaultProperty: string;
  /** Where the property values are documented */
  docLink: string;
  /** Whether the normalization table applies to this family */
  normalize: boolean;
  /** File name used when only an output directory is configured */
  defaultFileName: string;
}

/**
 * Sorted, non-overlapping, fully merged ranges
 */
export type RangeCollection = readonly UnicodeRange[];

/**
 * Outcome of an operation that reports failure as a value
 */
export type Result<T, E extends Error> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Parsed and processed properties of one source table
 */
export interface PropertyCollection {
  /** Registry holding every property value referenced by `ranges` */
  registry: EnumRegistry;
  /** Canonical range list */
  ranges: RangeCollection;
}

/**
 * Packed representation plus the counts a decoder needs
 */
export interface PackedProperties {
  /** Delimiter-free record string */
  packed: string;
  /** Number of records using the single-codepoint marker */
  singleRangesCount: number;
  /** Total number of enum values */
  propertyCount: number;
  /** Default property value */
  defaultProperty: EnumValue;
}

/**
 * A decoded record from a packed string
 */
export interface DecodedRange {
  start: number;
  end: number;
  property: string;
}

/**
 * Everything produced for one source table
 */
export interface GeneratedArtifact {
  /** Family the artifact was generated for */
  family: PropertyFamily;
  /** Provenance header lines, verbatim */
  header: string[];
  /** Parsed and processed properties */
  collection: PropertyCollection;
  /** Packed encoding */
  packed: PackedProperties;
  /** Generated TypeScript module text */
  content: string;
}

/**
 * Options for the parser
 */
export interface ParseOptions {
  /** Apply the normalization table to property names (default: true) */
  normalize?: boolean;
}

/**
 * Options for a full sync run
 */
export interface SyncOptions {
  /** Path to the source property table */
  source: string;
  /** Path of the generated module (required unless dry) */
  destination?: string;
  /** Produce content without touching the filesystem */
  dry?: boolean;
  /** Compare with the existing destination instead of writing */
  check?: boolean;
}

/**
 * Outcome of a sync run
 */
export type SyncOutcome =
  | { mode: "dry"; artifact: GeneratedArtifact }
  | { mode: "check"; artifact: GeneratedArtifact; destination: string; upToDate: boolean }
  | { mode: "write"; artifact: GeneratedArtifact; destination: string; changed: boolean };
