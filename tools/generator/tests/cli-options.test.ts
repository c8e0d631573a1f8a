import { describe, expect, test } from "vitest";
import { createRunId, parseCliArgs } from "../cli/options.js";
import { ConfigError } from "../pipeline/errors.js";

const NOW = new Date("2026-01-02T03:04:05.678Z");

describe("parseCliArgs", () => {
  test("applies defaults", () => {
    expect(parseCliArgs(["--input", "response.txt"], {}, NOW)).toEqual({
      runId: "site-2026-01-02T03-04-05-678Z",
      inputPath: "response.txt",
      outDir: process.cwd(),
      defaultFilename: "index.html",
      reportPath: undefined,
      verbose: false,
      agentLogs: true,
      eventFile: undefined,
      logFormat: "pretty",
      strict: false,
    });
  });

  test("reads flags", () => {
    const options = parseCliArgs(
      [
        "--input",
        "-",
        "--out-dir",
        "dist",
        "--default-file",
        "home.html",
        "--report",
        "report.json",
        "--run-id",
        "nightly-1",
        "--log-format",
        "json",
        "--verbose",
        "--quiet",
        "--event-file",
        "events.jsonl",
        "--strict",
      ],
      {},
      NOW
    );

    expect(options).toEqual({
      runId: "nightly-1",
      inputPath: "-",
      outDir: "dist",
      defaultFilename: "home.html",
      reportPath: "report.json",
      verbose: true,
      agentLogs: false,
      eventFile: "events.jsonl",
      logFormat: "json",
      strict: true,
    });
  });

  test("falls back to environment defaults, flags win", () => {
    const env = { SITEGEN_OUT_DIR: "/srv/site", SITEGEN_DEFAULT_FILE: "main.html" };

    const fromEnv = parseCliArgs(["--input", "r.txt"], env, NOW);
    expect(fromEnv.outDir).toBe("/srv/site");
    expect(fromEnv.defaultFilename).toBe("main.html");

    const fromFlag = parseCliArgs(["--input", "r.txt", "--out-dir", "out"], env, NOW);
    expect(fromFlag.outDir).toBe("out");
  });

  test("rejects missing input", () => {
    expect(() => parseCliArgs([], {}, NOW)).toThrow(ConfigError);
  });

  test("rejects unknown log formats", () => {
    expect(() => parseCliArgs(["--input", "r.txt", "--log-format", "xml"], {}, NOW)).toThrow(
      ConfigError
    );
  });

  test("rejects unknown flags", () => {
    expect(() => parseCliArgs(["--input", "r.txt", "--bogus"], {}, NOW)).toThrow(ConfigError);
  });

  test("rejects a default file outside the output directory", () => {
    expect(() =>
      parseCliArgs(["--input", "r.txt", "--default-file", "../index.html"], {}, NOW)
    ).toThrow(/default file must be a relative path/);
    expect(() =>
      parseCliArgs(["--input", "r.txt", "--default-file", "/srv/index.html"], {}, NOW)
    ).toThrow(ConfigError);
  });

  test("accepts a default file whose name merely contains two dots", () => {
    const options = parseCliArgs(["--input", "r.txt", "--default-file", "a..b.html"], {}, NOW);
    expect(options.defaultFilename).toBe("a..b.html");
  });
});

describe("createRunId", () => {
  test("is derived from the timestamp", () => {
    expect(createRunId(NOW)).toBe("site-2026-01-02T03-04-05-678Z");
  });
});
