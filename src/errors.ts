export type ErrorCode =
  | "validation"
  | "backend_unavailable"
  | "backend_rejected"
  | "timeout"
  | "enhancement_failed"
  | "config"
  | "internal";

/**
 * Base class for every error the bot raises on purpose. `userMessage` is safe
 * to show in Discord; `message` may carry backend detail for the logs.
 */
export class FluxcordError extends Error {
  public readonly code: ErrorCode;
  public readonly userMessage: string;

  constructor(code: ErrorCode, message: string, userMessage: string = message, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FluxcordError";
    this.code = code;
    this.userMessage = userMessage;
  }
}

/** Bad user input, rejected before anything is queued. */
export class ValidationError extends FluxcordError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    const text = issues.join("\n");
    super("validation", `Invalid request: ${issues.join("; ")}`, text);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/** ComfyUI could not be reached. Retried before it is surfaced. */
export class BackendUnavailableError extends FluxcordError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("backend_unavailable", message, "The image backend is not reachable right now. Please try again later.", options);
    this.name = "BackendUnavailableError";
  }
}

/** ComfyUI refused the workflow or reported a generation error. Never retried. */
export class BackendRejectedError extends FluxcordError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("backend_rejected", message, `The image backend rejected the job: ${message}`, options);
    this.name = "BackendRejectedError";
  }
}

export class GenerationTimeoutError extends FluxcordError {
  constructor(timeoutMs: number) {
    const seconds = Math.round(timeoutMs / 1000);
    super("timeout", `Job timed out after ${seconds}s`, `Generation timed out after ${seconds} seconds.`);
    this.name = "GenerationTimeoutError";
  }
}

export class EnhancementError extends FluxcordError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("enhancement_failed", message, "Prompt enhancement failed.", options);
    this.name = "EnhancementError";
  }
}

export class ConfigError extends FluxcordError {
  constructor(issues: string[]) {
    super("config", `Invalid configuration:\n${issues.map((i) => `  • ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/** Stable error detail recorded on a failed job. */
export interface JobError {
  code: ErrorCode;
  message: string;
  userMessage: string;
}

export function toJobError(err: unknown): JobError {
  if (err instanceof FluxcordError) {
    return { code: err.code, message: err.message, userMessage: err.userMessage };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { code: "internal", message, userMessage: "An unexpected error occurred." };
}
