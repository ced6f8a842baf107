/**
 * breakprops command definition
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { EXIT_CODE, logger } from "@breakprops/sdk";
import { runGenerate } from "./commands/generate.js";
import { resolveConfig } from "./lib/config.js";
import { isVerbose } from "./lib/env.js";
import { formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { writeStderr } from "./lib/io.js";
import { colorize } from "./lib/render.js";
import { withTiming } from "./lib/telemetry.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Version from package.json
 */
function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (packageJson && typeof packageJson === "object" && "version" in packageJson) {
    return String(packageJson.version);
  }
  return "0.0.0";
}

/**
 * Build the command; errors are thrown instead of exiting the process
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  program
    .name("breakprops")
    .description("Compile Unicode word/line break property tables into packed TypeScript modules")
    .version(readVersion())
    .option("-w, --words <file>", "Sync the word break properties (WordBreakProperty.txt)")
    .option("-l, --lines <file>", "Sync the line break properties (LineBreak.txt)")
    .option("-o, --out <file>", "Generated module path (default: $BREAKPROPS_OUT_DIR/<family>-break-properties.ts)")
    .option("-d, --dry", "Dry mode does not write anything to disk. The output is printed to stdout.")
    .option("--check", "Exit 1 if the generated module is missing or out of date")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  return program;
}

/**
 * Run the CLI
 * @param argv - Arguments without the node executable and script path
 * @param env - Environment variables
 * @returns Exit code
 */
export async function run(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const program = createProgram();
  let verbose = isVerbose(env);
  let exitCode: number = EXIT_CODE.SUCCESS;

  program.action(async () => {
    const config = resolveConfig(program.opts(), env, program.helpInformation());
    verbose = config.verbose;
    logger.setEnabled(config.verbose);

    exitCode = await withTiming(`cli.${config.family}`, () => runGenerate(config), {
      verbose: config.verbose,
    });
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
    return exitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      // Commander already printed help, version or its own error message
      if (err.code === "commander.helpDisplayed" || err.code === "commander.version") {
        return EXIT_CODE.SUCCESS;
      }
      return mapErrorToExitCode(err);
    }

    writeStderr(colorize(`Error: ${formatCliError(err, verbose)}\n`, "red", process.stderr));
    return mapErrorToExitCode(err);
  }
}
