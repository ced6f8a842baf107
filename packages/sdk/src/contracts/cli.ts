/**
 * CLI contracts and exit codes
 */

/**
 * Standard exit codes (usage, data and I/O values follow sysexits.h)
 */
export const EXIT_CODE = {
  /** Success */
  SUCCESS: 0,
  /** Internal error, or a --check run found a stale module */
  FAILURE: 1,
  /** Neither or both families selected, or invalid options */
  USAGE: 64,
  /** Malformed, overlapping or oversized property data */
  DATA_ERROR: 65,
  /** Source unreadable or destination unwritable */
  IO_ERROR: 74,
} as const;

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE];

/**
 * CLI invariants:
 *
 * 1. Exit codes:
 *    - 0: Success (module written, unchanged, printed, or up to date)
 *    - 1: --check found a missing or stale module; unexpected errors
 *    - 64: Usage error (exactly one of --words/--lines is required)
 *    - 65: Data error (parse, overlap, capacity, packed round trip)
 *    - 74: I/O error
 *
 * 2. Output:
 *    - --dry: the generated module goes to stdout, nothing else does
 *    - Logs, metrics and errors always go to stderr
 *
 * 3. Environment:
 *    - BREAKPROPS_OUT_DIR: directory for the default module file name
 *    - BREAKPROPS_CLI_DEBUG=1: same as --verbose
 *    - BREAKPROPS_DEBUG: enable debug logs from the SDK
 *
 * 4. Idempotency:
 *    - Identical input produces an identical module
 *    - An unchanged module is not rewritten
 */
