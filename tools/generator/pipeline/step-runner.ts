import { AsyncLocalStorage } from "async_hooks";
import { PipelineError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { StepName } from "./types.js";

export interface TelemetryContextValue {
  step: StepName | "system";
  attempt: number;
}

const storage = new AsyncLocalStorage<TelemetryContextValue>();

export function getTelemetryContext(): TelemetryContextValue {
  return storage.getStore() ?? { step: "system", attempt: 0 };
}

/**
 * Runs one step synchronously inside its telemetry context so every event the
 * step emits is tagged with the step name. Steps run exactly once; failures
 * are normalized to {@link PipelineError} and rethrown.
 */
export function runStep<T>(step: StepName, logger: Logger, run: () => T): T {
  const attempt = 1;
  const startedAt = Date.now();
  logger.info("Step started", {
    step,
    attempt,
    eventType: "step.lifecycle",
    phase: "start",
  });

  try {
    const result = storage.run({ step, attempt }, run);
    logger.info("Step completed", {
      step,
      attempt,
      eventType: "step.lifecycle",
      phase: "end",
      durationMs: Date.now() - startedAt,
    });
    return result;
  } catch (error) {
    const wrapped = normalizeStepError(error);
    logger.error("Step failed", {
      step,
      attempt,
      eventType: "step.lifecycle",
      phase: "fail",
      durationMs: Date.now() - startedAt,
      errorCode: wrapped.code,
      errorMessage: wrapped.message,
    });
    throw wrapped;
  }
}

function normalizeStepError(error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  if (error instanceof Error) {
    return new PipelineError(error.message, { code: "STEP_ERROR", cause: error });
  }

  return new PipelineError(String(error), { code: "STEP_ERROR", cause: error });
}
