/**
 * Property set driver
 *
 * One parameterized pipeline for every family:
 * read → split header/body → parse → seed default → process → pack → verify → render
 */

import { packProperties, verifyRoundTrip } from "./codec.js";
import { ArtifactWriteError } from "./errors.js";
import { atomicWrite, readIfExists, readSource } from "./io.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { parseLines, splitSource } from "./parse.js";
import { processRanges } from "./process.js";
import { EnumRegistry } from "./registry.js";
import { renderArtifact } from "./template.js";
import type {
  GeneratedArtifact,
  PropertyCollection,
  PropertyFamily,
  SyncOptions,
  SyncOutcome,
} from "./types.js";

/**
 * Parse data lines and reduce them to the canonical range list
 * @param lines - Data lines (comments and blanks allowed)
 * @param family - Family parameters
 * @param firstLineNumber - Line number of `lines[0]` in the source
 * @throws RangeParseError on a malformed line
 * @throws OverlapError if two ranges intersect
 */
export function buildPropertyCollection(
  lines: readonly string[],
  family: Readonly<PropertyFamily>,
  firstLineNumber = 1
): PropertyCollection {
  const registry = new EnumRegistry();
  const parsed = parseLines(lines, registry, { normalize: family.normalize }, firstLineNumber);
  metrics.recordParse(family.id, lines.length, parsed.length);
  logger.debug("parse.complete", {
    family: family.id,
    details: { ranges: parsed.length, properties: registry.size },
  });

  // The default must always be a valid lookup target
  registry.ensure(family.defaultProperty);

  const result = processRanges(parsed, family.defaultProperty);
  if (!result.ok) {
    throw result.error;
  }

  metrics.recordProcess(family.id, result.value.length);
  logger.debug("process.complete", {
    family: family.id,
    details: { before: parsed.length, after: result.value.length },
  });

  return { registry, ranges: result.value };
}

/**
 * Run the whole pipeline over the text of a property table
 */
export function generate(text: string, family: Readonly<PropertyFamily>): GeneratedArtifact {
  const startedAt = Date.now();
  const { header, body, bodyStart } = splitSource(text);
  const collection = buildPropertyCollection(body, family, bodyStart);

  const defaultProperty = collection.registry.ensure(family.defaultProperty);
  const packed = packProperties(collection, defaultProperty);
  verifyRoundTrip(collection, packed);

  metrics.recordPack(family.id, packed.packed.length, packed.singleRangesCount, packed.propertyCount);
  logger.debug("pack.complete", {
    family: family.id,
    details: {
      length: packed.packed.length,
      singles: packed.singleRangesCount,
      properties: packed.propertyCount,
    },
  });

  const content = renderArtifact({ family, header, registry: collection.registry, packed });
  metrics.recordDuration(family.id, Date.now() - startedAt);

  return { family, header, collection, packed, content };
}

/**
 * Generate a module from a source table and write, compare or return it
 *
 * Nothing is written unless the whole pipeline succeeded.
 */
export async function syncProperties(
  options: SyncOptions,
  family: Readonly<PropertyFamily>
): Promise<SyncOutcome> {
  const text = await readSource(options.source);
  const artifact = generate(text, family);

  if (options.dry) {
    return { mode: "dry", artifact };
  }

  const destination = options.destination;
  if (!destination) {
    throw new ArtifactWriteError("(no destination)", {
      cause: new TypeError("A destination is required unless running dry"),
    });
  }

  const existing = await readIfExists(destination);

  if (options.check) {
    const upToDate = existing === artifact.content;
    if (!upToDate) {
      logger.warn("artifact.stale", {
        family: family.id,
        source: destination,
        message: existing === null ? "module is missing" : "module differs from the source table",
      });
    }
    return { mode: "check", artifact, destination, upToDate };
  }

  if (existing === artifact.content) {
    logger.debug("artifact.unchanged", { family: family.id, source: destination });
    return { mode: "write", artifact, destination, changed: false };
  }

  await atomicWrite(destination, artifact.content);
  logger.info("artifact.write", {
    family: family.id,
    source: destination,
    details: { ranges: artifact.collection.ranges.length, bytes: Buffer.byteLength(artifact.content) },
  });

  return { mode: "write", artifact, destination, changed: true };
}
