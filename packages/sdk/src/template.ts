/**
 * Generated module template
 *
 * Output is byte-for-byte deterministic: no timestamps, no absolute paths.
 */

import type { EnumRegistry } from "./registry.js";
import type { PackedProperties, PropertyFamily } from "./types.js";

export const GENERATOR_NAME = "breakprops";

export interface TemplateInput {
  family: Readonly<PropertyFamily>;
  header: readonly string[];
  registry: EnumRegistry;
  packed: PackedProperties;
}

/**
 * Enum member lines in registry order
 *
 * ```ts
 * export enum LineCharProperty {
 *   // Normalized from: AI, SA, SG, XX
 *   AL = 0, // serialized as "A"
 * }
 * ```
 */
export function renderEnumMembers(registry: EnumRegistry): string[] {
  return registry.values.flatMap((value) => [
    ...(value.normalizedFrom.size > 0
      ? [`// Normalized from: ${[...value.normalizedFrom].join(", ")}`]
      : []),
    `${value.enumName} = ${value.index}, // serialized as "${value.serialized}"`,
  ]);
}

export function renderArtifact(input: TemplateInput): string {
  const { family, header, registry, packed } = input;
  const enumName = `${family.prefix}CharProperty`;
  const lower = family.prefix.toLowerCase();
  const source = header.length > 0 ? header.map((line) => `// ${line}`) : ["// (no header)"];

  return [
    "// AUTO-GENERATED FILE.",
    `// Generated by: ${GENERATOR_NAME}`,
    "//",
    "// Source:",
    ...source,
    "",
    "/**",
    " * For an explanation of these enum values, see:",
    " *",
    ` * * ${family.docLink}`,
    " */",
    `export enum ${enumName} {`,
    ...renderEnumMembers(registry).map((line) => `  ${line}`),
    "}",
    "",
    `export const packed${family.prefix}BreakProperties =`,
    `  ${JSON.stringify(packed.packed)};`,
    "",
    `export const ${lower}BreakSingleRangesCount = ${packed.singleRangesCount};`,
    `export const ${lower}BreakPropertyCount = ${packed.propertyCount};`,
    `export const ${lower}BreakDefaultProperty = ${enumName}.${packed.defaultProperty.enumName};`,
    "",
  ].join("\n");
}
