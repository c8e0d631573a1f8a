import type { EventType, StepName } from "./types.js";
import { emitAgentEvent, type LogLevel } from "./events.js";

export interface LogMeta {
  step?: StepName | "system";
  attempt?: number;
  eventType?: EventType;
  phase?: "start" | "end" | "fail";
  durationMs?: number;
  bytes?: number;
  path?: string;
  errorCode?: string;
  [key: string]: unknown;
}

export class Logger {
  debug(message: string, meta: LogMeta = {}): void {
    this.emit("debug", message, meta);
  }

  info(message: string, meta: LogMeta = {}): void {
    this.emit("info", message, meta);
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.emit("warn", message, meta);
  }

  error(message: string, meta: LogMeta = {}): void {
    this.emit("error", message, meta);
  }

  private emit(level: LogLevel, message: string, meta: LogMeta): void {
    emitAgentEvent({
      ...meta,
      level,
      message,
      eventType: meta.eventType ?? "run.lifecycle",
    });
  }
}
