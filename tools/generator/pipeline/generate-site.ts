import { resolve } from "path";
import { extractFiles } from "../extract/extract-files.js";
import { readResponseText, writeJsonAtomic } from "../lib/files.js";
import { materializeFiles } from "../materialize/write-files.js";
import { initializeEventEmitter } from "./events.js";
import { Logger } from "./logger.js";
import { runStep } from "./step-runner.js";
import type {
  GenerateSiteOptions,
  MaterializeReport,
  RunSummary,
  RunSummaryOutcome,
  WriteOutcome,
} from "./types.js";

export function runGenerateSitePipeline(options: GenerateSiteOptions): RunSummary {
  initializeEventEmitter({
    runId: options.runId,
    format: options.logFormat,
    verbose: options.verbose,
    agentLogs: options.agentLogs,
    eventFilePath: options.eventFile,
  });

  const logger = new Logger();
  const startedAt = new Date().toISOString();
  const outDir = resolve(options.outDir);

  logger.info("Site generation start", {
    eventType: "run.lifecycle",
    phase: "start",
    input: options.inputPath,
    outDir,
    defaultFilename: options.defaultFilename,
  });

  const text = readResponseText(options.inputPath);
  logger.info(`Response loaded: ${text.length.toLocaleString("en-US")} chars`, {
    eventType: "run.lifecycle",
    bytes: Buffer.byteLength(text, "utf-8"),
  });

  const extraction = runStep("extract", logger, () => {
    const result = extractFiles(text, {
      defaultFilename: options.defaultFilename,
      onWarning: (message) => logger.warn(message, { eventType: "extract.fallback" }),
    });
    logger.info(`Files found: ${[...result.files.keys()].join(", ")}`, {
      eventType: "extract.strategy",
      strategy: result.strategy,
      fileCount: result.files.size,
    });
    return result;
  });

  const report = runStep("materialize", logger, () =>
    materializeFiles(extraction.files, { rootDir: outDir, logger })
  );

  const summary: RunSummary = {
    runId: options.runId,
    outDir,
    strategy: extraction.strategy,
    usedFallback: extraction.usedFallback,
    written: report.written,
    skipped: report.skipped,
    failed: failedPaths(report),
    outcomes: report.outcomes.map(toSummaryOutcome),
    startedAt,
    endedAt: new Date().toISOString(),
  };

  if (options.reportPath) {
    writeJsonAtomic(options.reportPath, summary);
  }

  logger.info(
    `Generated ${summary.written.length} file(s): ${summary.written.join(", ")}`,
    {
      eventType: "summary",
      phase: "end",
      written: summary.written.length,
      skipped: summary.skipped.length,
      failed: summary.failed.length,
    }
  );

  return summary;
}

/** Exit-code policy for a finished run; the core itself never decides this. */
export function isRunSuccessful(summary: RunSummary, strict: boolean): boolean {
  if (summary.written.length === 0 || summary.failed.length > 0) {
    return false;
  }
  return !strict || summary.skipped.length === 0;
}

function failedPaths(report: MaterializeReport): string[] {
  return report.outcomes.flatMap((outcome) =>
    outcome.status === "skipped" && outcome.reason === "io-error" ? [outcome.requestedPath] : []
  );
}

function toSummaryOutcome(outcome: WriteOutcome): RunSummaryOutcome {
  if (outcome.status === "written") {
    const { status, requestedPath, path, chars, bytes } = outcome;
    return { status, requestedPath, path, chars, bytes };
  }
  return {
    status: outcome.status,
    requestedPath: outcome.requestedPath,
    path: outcome.path,
    reason: outcome.reason,
    errorCode: outcome.error?.code,
    errorMessage: outcome.error?.message,
  };
}
