/**
 * Environment and path resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Absolute path for a CLI argument
 */
export function resolvePath(input: string): string {
  return path.resolve(expandTilde(input));
}

/**
 * Resolve the destination of the generated module
 * Priority: --out > BREAKPROPS_OUT_DIR/<fileName> > none
 */
export function resolveDestination(
  cliOut: string | undefined,
  fileName: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (cliOut) {
    return resolvePath(cliOut);
  }

  const outDir = env.BREAKPROPS_OUT_DIR;
  if (outDir) {
    return path.join(resolvePath(outDir), fileName);
  }

  return undefined;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.BREAKPROPS_CLI_DEBUG === "1";
}
