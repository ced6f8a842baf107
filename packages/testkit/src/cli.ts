/**
 * CLI testing utilities
 */

import { execa } from "execa";
import { fileURLToPath } from "node:url";

/**
 * Repository root; tsx is resolved from here
 */
export const REPO_ROOT = fileURLToPath(new URL("../../../", import.meta.url));

/**
 * CLI entry point, run from its TypeScript source
 */
export const CLI_ENTRY = fileURLToPath(new URL("../../cli/src/cli.ts", import.meta.url));

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Environment variables */
  env?: Record<string, string>;
  /** Timeout in milliseconds (default: 20000) */
  timeout?: number;
}

/**
 * Execute the CLI in a child process using execa
 *
 * Workspace packages resolve to their sources through the "source" export condition.
 * @param args - Command arguments
 * @param options - Execution options
 * @returns CLI result with stdout, stderr, exitCode
 */
export async function runCli(args: string[], options: CliExecOptions = {}): Promise<CliResult> {
  const { env, timeout = 20000 } = options;

  const result = await execa(
    process.execPath,
    ["--conditions=source", "--import", "tsx", CLI_ENTRY, ...args],
    {
      cwd: REPO_ROOT,
      env,
      reject: false,
      timeout,
    }
  );

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
  };
}
