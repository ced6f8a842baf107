/**
 * Zod schemas for CLI options and the resolved run configuration
 */

import { z } from "zod";
import { EXIT_CODE, getFamily } from "@breakprops/sdk";
import { CliError } from "./errors.js";
import { isVerbose, resolveDestination, resolvePath } from "./env.js";

const PathStringSchema = z.string().trim().min(1, "path must be non-empty");

/**
 * Options as commander hands them over
 */
export const RawOptionsSchema = z.object({
  words: PathStringSchema.optional(),
  lines: PathStringSchema.optional(),
  out: PathStringSchema.optional(),
  dry: z.boolean().optional(),
  check: z.boolean().optional(),
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
});

/**
 * Fully resolved configuration for one run
 */
export const GenerateConfigSchema = z
  .object({
    family: z.enum(["word", "line"]),
    source: z.string().min(1),
    destination: z.string().min(1).optional(),
    dry: z.boolean(),
    check: z.boolean(),
    verbose: z.boolean(),
    quiet: z.boolean(),
  })
  .superRefine((config, ctx) => {
    if (!config.dry && !config.destination) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["destination"],
        message: "--out (or BREAKPROPS_OUT_DIR) is required unless --dry is given",
      });
    }
    if (config.dry && config.check) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["check"],
        message: "--dry and --check cannot be combined",
      });
    }
  });

export type GenerateConfig = z.infer<typeof GenerateConfigSchema>;

function usageError(message: string, usage?: string): CliError {
  return new CliError(usage ? `${message}\n\n${usage}` : message, { exitCode: EXIT_CODE.USAGE });
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join("; ");
}

/**
 * Turn commander options and the environment into a validated configuration
 * @param opts - Raw option values
 * @param env - Environment variables
 * @param usage - Usage text appended to family selection errors
 * @throws CliError with the usage exit code
 */
export function resolveConfig(
  opts: unknown,
  env: NodeJS.ProcessEnv = process.env,
  usage?: string
): GenerateConfig {
  const raw = RawOptionsSchema.safeParse(opts);
  if (!raw.success) {
    throw usageError(formatIssues(raw.error));
  }

  const { words, lines, out } = raw.data;
  if (words === undefined && lines === undefined) {
    throw usageError(
      "Expecting either a word break properties file or a line break properties file. None was given.",
      usage
    );
  }
  if (words !== undefined && lines !== undefined) {
    throw usageError(
      "Expecting either a word break properties file or a line break properties file. Both were given.",
      usage
    );
  }

  const familyId = words !== undefined ? "word" : "line";
  const source = words ?? lines ?? "";

  const config = GenerateConfigSchema.safeParse({
    family: familyId,
    source: resolvePath(source),
    destination: resolveDestination(out, getFamily(familyId).defaultFileName, env),
    dry: raw.data.dry ?? false,
    check: raw.data.check ?? false,
    verbose: (raw.data.verbose ?? false) || isVerbose(env),
    quiet: raw.data.quiet ?? false,
  });
  if (!config.success) {
    throw usageError(formatIssues(config.error));
  }

  return config.data;
}
