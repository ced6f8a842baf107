/**
 * Generate command: source table → packed TypeScript module
 */

import { EXIT_CODE, getFamily, metrics, syncProperties } from "@breakprops/sdk";
import type { GenerateConfig } from "../lib/config.js";
import { CliError } from "../lib/errors.js";
import { writeStdout } from "../lib/io.js";
import { printLines } from "../lib/render.js";
import { emitRunMetrics } from "../lib/telemetry.js";

/**
 * Run one generation
 * @returns Exit code
 * @throws CliError if a --check run finds a missing or stale module
 */
export async function runGenerate(config: GenerateConfig): Promise<number> {
  const family = getFamily(config.family);
  const outcome = await syncProperties(
    {
      source: config.source,
      destination: config.destination,
      dry: config.dry,
      check: config.check,
    },
    family
  );

  emitRunMetrics(family.id, metrics.getMetrics(family.id), config.verbose);

  const { collection, packed } = outcome.artifact;
  const summary = `${collection.ranges.length} ranges, ${packed.propertyCount} properties`;

  switch (outcome.mode) {
    case "dry":
      writeStdout(outcome.artifact.content);
      return EXIT_CODE.SUCCESS;

    case "check":
      if (!outcome.upToDate) {
        throw new CliError(
          `${outcome.destination} is out of date; run without --check to regenerate`,
          { exitCode: EXIT_CODE.FAILURE }
        );
      }
      if (!config.quiet) {
        printLines([`✓ ${outcome.destination} is up to date (${summary})`]);
      }
      return EXIT_CODE.SUCCESS;

    case "write":
      if (!config.quiet) {
        printLines([
          outcome.changed
            ? `✓ Wrote ${outcome.destination} (${summary})`
            : `✓ ${outcome.destination} already up to date (${summary})`,
        ]);
      }
      return EXIT_CODE.SUCCESS;
  }
}
