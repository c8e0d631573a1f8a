export class PipelineError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, options: { code: string; retryable?: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
  }
}

export class InputError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "INPUT_ERROR", cause });
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "CONFIG_ERROR", cause });
  }
}

export class FileWriteError extends PipelineError {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Failed to write ${path}: ${describeCause(cause)}`, { code: "FILE_WRITE_ERROR", cause });
    this.path = path;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
