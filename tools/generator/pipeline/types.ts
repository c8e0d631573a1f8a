import type { PipelineError } from "./errors.js";

export const STEP_ORDER = ["extract", "materialize"] as const;

export type StepName = (typeof STEP_ORDER)[number];

export const EXTRACTION_STRATEGY_NAMES = [
  "delimited-sections",
  "heading-fenced-blocks",
  "bold-fenced-blocks",
] as const;

export type ExtractionStrategyName = (typeof EXTRACTION_STRATEGY_NAMES)[number];

/**
 * Files pulled out of a response, keyed by the path exactly as it appeared in
 * the text. Map order is first-occurrence order; a repeated key keeps its slot
 * and takes the later content.
 */
export type ExtractedFiles = Map<string, string>;

export interface ExtractionResult {
  files: ExtractedFiles;
  strategy: ExtractionStrategyName | "fallback";
  usedFallback: boolean;
}

export type SkipReason = "unsafe-path" | "empty-path" | "io-error";

export interface WrittenOutcome {
  status: "written";
  requestedPath: string;
  path: string;
  chars: number;
  bytes: number;
}

export interface SkippedOutcome {
  status: "skipped";
  requestedPath: string;
  /** Set when the path was accepted but the write itself failed. */
  path?: string;
  reason: SkipReason;
  error?: PipelineError;
}

export type WriteOutcome = WrittenOutcome | SkippedOutcome;

export interface MaterializeReport {
  outcomes: WriteOutcome[];
  written: string[];
  skipped: string[];
}

export interface GenerateSiteOptions {
  runId: string;
  inputPath: string;
  outDir: string;
  defaultFilename: string;
  reportPath?: string;
  verbose: boolean;
  agentLogs: boolean;
  eventFile?: string;
  logFormat: LogFormat;
  strict: boolean;
}

export interface RunSummaryOutcome {
  status: WriteOutcome["status"];
  requestedPath: string;
  path?: string;
  chars?: number;
  bytes?: number;
  reason?: SkipReason;
  errorCode?: string;
  errorMessage?: string;
}

export interface RunSummary {
  runId: string;
  outDir: string;
  strategy: ExtractionResult["strategy"];
  usedFallback: boolean;
  written: string[];
  skipped: string[];
  failed: string[];
  outcomes: RunSummaryOutcome[];
  startedAt: string;
  endedAt: string;
}

export type LogFormat = "pretty" | "json";
export type EventType =
  | "run.lifecycle"
  | "step.lifecycle"
  | "extract.strategy"
  | "extract.fallback"
  | "file.read"
  | "file.write"
  | "file.skip"
  | "summary";

export interface AgentEvent {
  ts: string;
  runId: string;
  level: "debug" | "info" | "warn" | "error";
  step: StepName | "system";
  attempt: number;
  eventType: EventType;
  message: string;
  phase?: "start" | "end" | "fail";
  durationMs?: number;
  bytes?: number;
  path?: string;
  errorCode?: string;
  [key: string]: unknown;
}

export interface LogRuntimeConfig {
  runId: string;
  format: LogFormat;
  verbose: boolean;
  agentLogs: boolean;
  eventFilePath?: string;
}
