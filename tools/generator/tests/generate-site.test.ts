import { afterEach, describe, expect, test } from "vitest";
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { InputError } from "../pipeline/errors.js";
import { resetEventEmitter } from "../pipeline/events.js";
import { isRunSuccessful, runGenerateSitePipeline } from "../pipeline/generate-site.js";
import type { AgentEvent, GenerateSiteOptions, RunSummary } from "../pipeline/types.js";

function createOptions(workDir: string, overrides: Partial<GenerateSiteOptions> = {}): GenerateSiteOptions {
  return {
    runId: "test-run",
    inputPath: join(workDir, "response.txt"),
    outDir: join(workDir, "site"),
    defaultFilename: "index.html",
    reportPath: join(workDir, "report.json"),
    verbose: false,
    agentLogs: false,
    eventFile: join(workDir, "events.jsonl"),
    logFormat: "json",
    strict: false,
    ...overrides,
  };
}

function readEvents(path: string): AgentEvent[] {
  return readFileSync(path, "utf-8")
    .split("\n")
    .filter((line) => line.trim())
    .map((line) => JSON.parse(line) as AgentEvent);
}

afterEach(() => {
  resetEventEmitter();
});

describe("runGenerateSitePipeline", () => {
  test("extracts, writes and reports a multi-file response", () => {
    const workDir = mkdtempSync(join(tmpdir(), "sitegen-run-"));
    const options = createOptions(workDir);
    writeFileSync(
      options.inputPath,
      [
        "Tässä sivusto:",
        "=== index.html ===",
        "```html",
        "<h1>Hei</h1>",
        "```",
        "=== images/logo.svg ===",
        "<svg/>",
        "=== ../outside.txt ===",
        "nope",
      ].join("\n")
    );

    const summary = runGenerateSitePipeline(options);

    expect(summary.strategy).toBe("delimited-sections");
    expect(summary.usedFallback).toBe(false);
    expect(summary.written).toEqual(["index.html", "images/logo.svg"]);
    expect(summary.skipped).toEqual(["../outside.txt"]);
    expect(summary.failed).toEqual([]);
    expect(readFileSync(join(options.outDir, "index.html"), "utf-8")).toBe("<h1>Hei</h1>");
    expect(readFileSync(join(options.outDir, "images", "logo.svg"), "utf-8")).toBe("<svg/>");
    expect(existsSync(join(workDir, "outside.txt"))).toBe(false);

    const report = JSON.parse(readFileSync(join(workDir, "report.json"), "utf-8")) as RunSummary;
    expect(report.written).toEqual(summary.written);
    expect(report.outcomes[2]).toEqual({
      status: "skipped",
      requestedPath: "../outside.txt",
      reason: "unsafe-path",
    });

    const events = readEvents(join(workDir, "events.jsonl"));
    const strategyEvent = events.find((event) => event.eventType === "extract.strategy");
    expect(strategyEvent?.step).toBe("extract");
    expect(strategyEvent?.strategy).toBe("delimited-sections");
    const skipEvents = events.filter((event) => event.eventType === "file.skip");
    expect(skipEvents.map((event) => event.message)).toEqual(["SKIP: unsafe path '../outside.txt'"]);
    expect(skipEvents[0].step).toBe("materialize");
    expect(events.every((event) => event.runId === "test-run")).toBe(true);
  });

  test("falls back to the default file and warns once", () => {
    const workDir = mkdtempSync(join(tmpdir(), "sitegen-run-"));
    const options = createOptions(workDir, { defaultFilename: "page.html" });
    const response = "<p>No markers at all</p>\n";
    writeFileSync(options.inputPath, response);

    const summary = runGenerateSitePipeline(options);

    expect(summary.usedFallback).toBe(true);
    expect(summary.strategy).toBe("fallback");
    expect(summary.written).toEqual(["page.html"]);
    expect(readFileSync(join(options.outDir, "page.html"), "utf-8")).toBe(response);

    const warnings = readEvents(join(workDir, "events.jsonl")).filter(
      (event) => event.eventType === "extract.fallback"
    );
    expect(warnings).toHaveLength(1);
    expect(warnings[0].level).toBe("warn");
  });

  test("does not write a report when no report path is set", () => {
    const workDir = mkdtempSync(join(tmpdir(), "sitegen-run-"));
    const options = createOptions(workDir, { reportPath: undefined });
    writeFileSync(options.inputPath, "=== a.txt ===\nA");

    runGenerateSitePipeline(options);

    expect(existsSync(join(workDir, "report.json"))).toBe(false);
    expect(readFileSync(join(options.outDir, "a.txt"), "utf-8")).toBe("A");
  });

  test("fails with an input error when the response file is missing", () => {
    const workDir = mkdtempSync(join(tmpdir(), "sitegen-run-"));
    const options = createOptions(workDir);

    expect(() => runGenerateSitePipeline(options)).toThrow(InputError);
  });
});

describe("isRunSuccessful", () => {
  function summary(overrides: Partial<RunSummary>): RunSummary {
    return {
      runId: "test-run",
      outDir: "/tmp/site",
      strategy: "delimited-sections",
      usedFallback: false,
      written: ["index.html"],
      skipped: [],
      failed: [],
      outcomes: [],
      startedAt: "2026-02-26T00:00:00.000Z",
      endedAt: "2026-02-26T00:00:01.000Z",
      ...overrides,
    };
  }

  test("fails when nothing was written or a write failed", () => {
    expect(isRunSuccessful(summary({ written: [] }), false)).toBe(false);
    expect(isRunSuccessful(summary({ skipped: ["x"], failed: ["x"] }), false)).toBe(false);
  });

  test("tolerates unsafe skips unless strict", () => {
    const withSkip = summary({ skipped: ["../x"] });
    expect(isRunSuccessful(withSkip, false)).toBe(true);
    expect(isRunSuccessful(withSkip, true)).toBe(false);
    expect(isRunSuccessful(summary({}), true)).toBe(true);
  });
});
