/**
 * Basic Usage Example
 *
 * Compiles a small line break table and looks codepoints up in the result.
 * Run with: npx tsx --conditions=source examples/basic-usage.ts
 */

import { LINE_BREAK, generate, unpackRanges } from "@breakprops/sdk";

const TABLE = `# LineBreak-example.txt
# Hand-written table for the example

0009;BA           # <control-0009>
000A;LF           # <control-000A>
0020;SP           # SPACE
0030..0039;NU     # DIGIT ZERO..DIGIT NINE
0041..005A;AL     # LATIN CAPITAL LETTER A..Z
0061..007A;AL     # LATIN SMALL LETTER A..Z
00AA;AI           # FEMININE ORDINAL INDICATOR
3041;CJ           # HIRAGANA LETTER SMALL A
`;

function main(): void {
  console.log("📂 Compiling table...");
  const { collection, packed, content } = generate(TABLE, LINE_BREAK);

  console.log(`✅ ${collection.ranges.length} ranges, ${packed.propertyCount} properties`);
  for (const value of collection.registry.values) {
    const from = value.normalizedFrom.size > 0 ? ` (from ${[...value.normalizedFrom].join(", ")})` : "";
    console.log(`   ${value.serialized} ${value.name}${from}`);
  }

  console.log("\n📦 Packed data:");
  console.log(`   ${packed.packed}`);

  // A consumer only needs the packed string, the names and the default
  const names = collection.registry.values.map((value) => value.name);
  const ranges = unpackRanges(packed.packed, names);
  const lookup = (codepoint: number): string =>
    ranges.find((range) => range.start <= codepoint && codepoint <= range.end)?.property ??
    packed.defaultProperty.name;

  console.log("\n🔍 Lookups:");
  for (const char of ["a", " ", "7", "ª", "ぁ", "€"]) {
    const codepoint = char.codePointAt(0) ?? 0;
    const label = codepoint.toString(16).toUpperCase().padStart(4, "0");
    console.log(`   U+${label} → ${lookup(codepoint)}`);
  }

  console.log("\n📝 Generated module:\n");
  console.log(content);
}

main();
