/**
 * breakprops SDK
 *
 * Compiles Unicode word/line break property tables into packed range data
 */

// Re-export types
export type {
  PropertyFamilyId,
  PropertyFamily,
  RangeCollection,
  Result,
  PropertyCollection,
  PackedProperties,
  DecodedRange,
  GeneratedArtifact,
  ParseOptions,
  SyncOptions,
  SyncOutcome,
} from "./types.js";
export { MAX_CODEPOINT } from "./types.js";

// Engine
export { EnumRegistry, EnumValue } from "./registry.js";
export { UnicodeRange } from "./range.js";
export {
  NORMALIZATION_TABLE,
  removeComment,
  extractHeader,
  splitSource,
  parseLine,
  parseLines,
} from "./parse.js";
export type { SourceTable } from "./parse.js";
export {
  sortRanges,
  verifyNoOverlappingRanges,
  combineAdjacentRanges,
  processRanges,
} from "./process.js";
export {
  serializeIndex,
  deserializeCode,
  encodeCodepoint,
  packRanges,
  countSingleRanges,
  packProperties,
  unpackRanges,
  verifyRoundTrip,
} from "./codec.js";
export { CODEPOINT_WIDTH, SINGLE_MARKER, MAX_PROPERTY_VALUES } from "./contracts/packed.js";
export { EXIT_CODE } from "./contracts/cli.js";
export type { ExitCode } from "./contracts/cli.js";

// Families and driver
export { WORD_BREAK, LINE_BREAK, PROPERTY_FAMILIES, getFamily } from "./families.js";
export { GENERATOR_NAME, renderArtifact, renderEnumMembers } from "./template.js";
export type { TemplateInput } from "./template.js";
export { buildPropertyCollection, generate, syncProperties } from "./sync.js";

// I/O
export { readSource, readIfExists, atomicWrite } from "./io.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { RunMetrics } from "./observability/metrics.js";

// Errors
export {
  BreakPropsError,
  SourceReadError,
  ArtifactWriteError,
  RangeParseError,
  OverlapError,
  CapacityError,
  PackedDataError,
} from "./errors.js";
