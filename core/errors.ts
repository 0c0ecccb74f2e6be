type PipelineErrorKind =
  | "planning"
  | "no_changes"
  | "compilation"
  | "push"
  | "pull_request"
  | "ci_failure"
  | "merge_conflict"
  | "command"
  | "configuration";

class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.kind = kind;
  }
}

class PlanningError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("planning", message, options);
    this.name = "PlanningError";
  }
}

class NoChangesAppliedError extends PipelineError {
  readonly rejectedFiles: string[];

  constructor(rejectedFiles: string[] = []) {
    super(
      "no_changes",
      rejectedFiles.length > 0
        ? `No changes applied; rejected: ${rejectedFiles.join(", ")}`
        : "No changes applied."
    );
    this.name = "NoChangesAppliedError";
    this.rejectedFiles = rejectedFiles;
  }
}

class CompilationError extends PipelineError {
  readonly output: string;

  constructor(message: string, output: string) {
    super("compilation", message);
    this.name = "CompilationError";
    this.output = output;
  }
}

class PushError extends PipelineError {
  constructor(message: string) {
    super("push", message);
    this.name = "PushError";
  }
}

class PullRequestError extends PipelineError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super("pull_request", message);
    this.name = "PullRequestError";
    this.status = status;
  }
}

class CiFailureError extends PipelineError {
  readonly attempts: number;

  constructor(message: string, attempts: number) {
    super("ci_failure", message);
    this.name = "CiFailureError";
    this.attempts = attempts;
  }
}

class MergeConflictError extends PipelineError {
  readonly conflictFiles: string[];

  constructor(message: string, conflictFiles: string[] = []) {
    super("merge_conflict", message);
    this.name = "MergeConflictError";
    this.conflictFiles = conflictFiles;
  }
}

class CommandError extends PipelineError {
  readonly argv: string[];
  readonly exitCode: number;

  constructor(argv: string[], exitCode: number, output: string) {
    const detail = output.trim() || "No output.";
    super("command", `${argv.join(" ")} failed (exit ${exitCode}): ${detail}`);
    this.name = "CommandError";
    this.argv = argv;
    this.exitCode = exitCode;
  }
}

class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super("configuration", message);
    this.name = "ConfigurationError";
  }
}

/** Raised by LLM clients when the provider reports a rate limit (HTTP 429). */
class RateLimitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RateLimitError";
  }
}

const isRateLimitError = (error: unknown): error is RateLimitError =>
  error instanceof RateLimitError;

const toErrorMessage = (error: unknown, fallback = "Unknown error.") => {
  if (error instanceof Error) {
    return error.message || fallback;
  }
  if (typeof error === "string" && error.trim().length > 0) {
    return error;
  }
  return fallback;
};

export {
  CiFailureError,
  CommandError,
  CompilationError,
  ConfigurationError,
  MergeConflictError,
  NoChangesAppliedError,
  PipelineError,
  PlanningError,
  PullRequestError,
  PushError,
  RateLimitError,
  isRateLimitError,
  toErrorMessage,
};
export type { PipelineErrorKind };
