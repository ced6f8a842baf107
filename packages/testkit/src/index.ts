/**
 * Test helpers for breakprops packages
 */

export { runCli, REPO_ROOT, CLI_ENTRY } from "./cli.js";
export type { CliResult, CliExecOptions } from "./cli.js";
export { createTempDir, removeDir } from "./fs.js";
export { fixturePath, readFixture, table } from "./fixtures.js";
export type { FixtureName } from "./fixtures.js";
