/**
 * Output rendering helpers
 */

import { writeStdout } from "./io.js";

type Color = "red" | "green" | "yellow";

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: readonly string[]): void {
  for (const line of lines) {
    writeStdout(`${line}\n`);
  }
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
