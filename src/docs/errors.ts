export enum DocsErrorCode {
  FILE_ACCESS = "FILE_ACCESS",
  COMMAND_FAILED = "COMMAND_FAILED",
}

export class DocsError extends Error {
  readonly code: DocsErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: DocsErrorCode, message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = "DocsError";
    this.code = code;
    this.context = context;
  }
}

export class FileAccessError extends DocsError {
  readonly path: string;

  constructor(path: string, action: "read" | "write", cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    super(DocsErrorCode.FILE_ACCESS, `Cannot ${action} ${path}${reason}`, { path, action }, { cause });
    this.name = "FileAccessError";
    this.path = path;
  }
}

export class CommandExecutionError extends DocsError {
  readonly argv: readonly string[];
  readonly exitCode: number | null;
  readonly signal: string | null;

  constructor(
    argv: readonly string[],
    message: string,
    details: { exitCode?: number | null; signal?: string | null; cause?: unknown } = {},
  ) {
    const exitCode = details.exitCode ?? null;
    const signal = details.signal ?? null;
    super(DocsErrorCode.COMMAND_FAILED, message, { argv: [...argv], exitCode, signal }, { cause: details.cause });
    this.name = "CommandExecutionError";
    this.argv = argv;
    this.exitCode = exitCode;
    this.signal = signal;
  }
}
