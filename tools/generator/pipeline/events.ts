import { appendFileSync } from "fs";
import { dirname } from "path";
import { ensureDir } from "../lib/files.js";
import { getTelemetryContext } from "./step-runner.js";
import type { AgentEvent, EventType, LogRuntimeConfig } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EmitInput {
  level: LogLevel;
  message: string;
  eventType?: EventType;
  step?: AgentEvent["step"];
  attempt?: number;
  phase?: AgentEvent["phase"];
  durationMs?: number;
  bytes?: number;
  path?: string;
  errorCode?: string;
  [key: string]: unknown;
}

const MAX_STRING_LENGTH = 240;

class EventEmitter {
  constructor(private readonly config: LogRuntimeConfig) {}

  emit(input: EmitInput): void {
    const ctx = getTelemetryContext();
    const { level, message, ...rest } = input;
    const baseEvent: AgentEvent = {
      ts: new Date().toISOString(),
      runId: this.config.runId,
      level,
      step: input.step ?? ctx.step,
      attempt: input.attempt ?? ctx.attempt,
      eventType: input.eventType ?? "run.lifecycle",
      message,
      ...rest,
    };

    const event = clampEvent(baseEvent);

    if (this.config.agentLogs) {
      this.writeTerminal(event);
    }

    if (this.config.eventFilePath) {
      ensureDir(dirname(this.config.eventFilePath));
      appendFileSync(this.config.eventFilePath, `${JSON.stringify(event)}\n`);
    }
  }

  private writeTerminal(event: AgentEvent): void {
    if (!shouldPrintToTerminal(event, this.config.verbose)) {
      return;
    }

    const line = this.renderTerminalLine(event);

    if (event.level === "error") {
      console.error(line);
      return;
    }
    if (event.level === "warn") {
      console.warn(line);
      return;
    }
    console.log(line);
  }

  private renderTerminalLine(event: AgentEvent): string {
    if (this.config.format === "json") {
      return JSON.stringify(event);
    }
    if (this.config.verbose) {
      return this.renderPretty(event);
    }
    return this.renderCondensed(event);
  }

  renderPretty(event: AgentEvent): string {
    const prefix = `${event.ts} [${event.step}/${event.attempt}] [${event.eventType}]`;
    const extras = Object.entries(event)
      .filter(([key]) =>
        !["ts", "runId", "level", "step", "attempt", "eventType", "message"].includes(key)
      )
      .filter(([, value]) => value !== undefined && value !== null && value !== "")
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(" ");

    return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
  }

  renderCondensed(event: AgentEvent): string {
    const time = formatShortTime(event.ts);
    const phase = event.phase ? ` ${event.phase}` : "";
    const prefix = `[${time}] ${event.step}#${event.attempt}${phase}`;
    const extras = renderCondensedExtras(event);
    return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
  }
}

let globalEmitter: EventEmitter | null = null;

export function initializeEventEmitter(config: LogRuntimeConfig): void {
  globalEmitter = new EventEmitter(config);
}

export function resetEventEmitter(): void {
  globalEmitter = null;
}

/** No-op until {@link initializeEventEmitter} has run, so library callers stay silent. */
export function emitAgentEvent(input: EmitInput): void {
  if (!globalEmitter) {
    return;
  }
  globalEmitter.emit(input);
}

function clampEvent(event: AgentEvent): AgentEvent {
  const clamped: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(event)) {
    clamped[key] = clampValue(value);
  }
  return clamped as AgentEvent;
}

export function clampEventForTest(event: AgentEvent): AgentEvent {
  return clampEvent(event);
}

export function formatPrettyForTest(event: AgentEvent): string {
  const emitter = new EventEmitter({
    runId: event.runId,
    format: "pretty",
    verbose: true,
    agentLogs: false,
  });
  return emitter.renderPretty(event);
}

export function formatCondensedForTest(event: AgentEvent): string {
  const emitter = new EventEmitter({
    runId: event.runId,
    format: "pretty",
    verbose: false,
    agentLogs: false,
  });
  return emitter.renderCondensed(event);
}

export function shouldPrintToTerminalForTest(event: AgentEvent, verbose: boolean): boolean {
  return shouldPrintToTerminal(event, verbose);
}

function clampValue(value: unknown): unknown {
  if (value == null) {
    return value;
  }

  if (typeof value === "string") {
    return truncate(value, MAX_STRING_LENGTH);
  }

  if (Array.isArray(value)) {
    return value.map((item) => clampValue(item));
  }

  if (typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = clampValue(v);
    }
    return out;
  }

  return value;
}

function truncate(value: string, max: number): string {
  if (value.length <= max) {
    return value;
  }
  return `${value.slice(0, max)}...[truncated]`;
}

function shouldPrintToTerminal(event: AgentEvent, verbose: boolean): boolean {
  if (verbose) {
    return true;
  }

  if (event.level === "error" || event.level === "warn") {
    return true;
  }

  if (event.level === "debug") {
    return false;
  }

  return event.eventType !== "file.read";
}

function renderCondensedExtras(event: AgentEvent): string {
  const keys: string[] = ["path", "durationMs", "reason", "errorCode"];
  const out: string[] = [];
  for (const key of keys) {
    const value = event[key];
    if (value === undefined || value === null || value === "") {
      continue;
    }
    out.push(`${key}=${JSON.stringify(value)}`);
  }
  return out.join(" ");
}

function formatShortTime(ts: string): string {
  const match = ts.match(/T(\d{2}:\d{2}:\d{2})/);
  if (match) {
    return match[1];
  }
  return ts;
}
