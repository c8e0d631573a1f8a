import { parseArgs } from "util";
import { z } from "zod";
import { DEFAULT_FILENAME } from "../extract/extract-files.js";
import { resolveSafePath } from "../materialize/safe-path.js";
import { ConfigError } from "../pipeline/errors.js";
import type { GenerateSiteOptions } from "../pipeline/types.js";

export const USAGE =
  "Usage: generate-site --input <response.txt|-> [--out-dir <dir>] [--default-file <name>] [--report <path>] [--run-id <id>] [--log-format pretty|json] [--verbose] [--quiet] [--event-file <path>] [--strict]";

const optionsSchema = z.object({
  runId: z
    .string()
    .min(1)
    .regex(/^[\w.-]+$/, "run id may only contain letters, digits, '_', '-' and '.'"),
  inputPath: z.string().min(1, "--input is required"),
  outDir: z.string().min(1),
  defaultFilename: z
    .string()
    .min(1)
    .refine((name) => resolveSafePath(name, ".").safe, {
      message: "default file must be a relative path inside the output directory",
    }),
  reportPath: z.string().min(1).optional(),
  verbose: z.boolean(),
  agentLogs: z.boolean(),
  eventFile: z.string().min(1).optional(),
  logFormat: z.enum(["pretty", "json"]),
  strict: z.boolean(),
});

export function parseCliArgs(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date()
): GenerateSiteOptions {
  const { values } = readArgs(argv);

  const parsed = optionsSchema.safeParse({
    runId: values["run-id"] ?? createRunId(now),
    inputPath: values.input ?? "",
    outDir: values["out-dir"] ?? env.SITEGEN_OUT_DIR ?? process.cwd(),
    defaultFilename: values["default-file"] ?? env.SITEGEN_DEFAULT_FILE ?? DEFAULT_FILENAME,
    reportPath: values.report,
    verbose: values.verbose ?? false,
    agentLogs: !(values.quiet ?? false),
    eventFile: values["event-file"],
    logFormat: values["log-format"] ?? "pretty",
    strict: values.strict ?? false,
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid options: ${details}`, parsed.error);
  }

  return parsed.data;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        input: { type: "string" },
        "out-dir": { type: "string" },
        "default-file": { type: "string" },
        report: { type: "string" },
        "run-id": { type: "string" },
        "log-format": { type: "string" },
        verbose: { type: "boolean" },
        quiet: { type: "boolean" },
        "event-file": { type: "string" },
        strict: { type: "boolean" },
      },
    });
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error), error);
  }
}

export function createRunId(now: Date): string {
  return `site-${now.toISOString().replace(/[.:]/g, "-")}`;
}
