export type RagErrorCode =
  | "VALIDATION"
  | "EXTRACTION"
  | "UNSUPPORTED_FORMAT"
  | "SERVICE_UNAVAILABLE"
  | "GATEWAY_TIMEOUT"
  | "INVALID_INPUT"
  | "GENERATION_UNAVAILABLE"
  | "NOT_FOUND"
  | "INVALID_ARGUMENT"
  | "CANCELLED";

export class RagError extends Error {
  readonly code: RagErrorCode;

  constructor(code: RagErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A chunk or vector broke a structural invariant of the store. */
export class ValidationError extends RagError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("VALIDATION", `Validation failed: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class ExtractionError extends RagError {
  constructor(message: string, options?: ErrorOptions & { code?: RagErrorCode }) {
    super(options?.code ?? "EXTRACTION", message, options);
  }
}

export class UnsupportedFormatError extends ExtractionError {
  readonly format: string;

  constructor(format: string) {
    super(`Unsupported format: ${format}`, { code: "UNSUPPORTED_FORMAT" });
    this.format = format;
  }
}

/** Backend unreachable, rate limited or too slow. Retryable. */
export class ServiceUnavailableError extends RagError {
  constructor(message: string, options?: ErrorOptions & { code?: RagErrorCode }) {
    super(options?.code ?? "SERVICE_UNAVAILABLE", message, options);
  }
}

export class GatewayTimeoutError extends ServiceUnavailableError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, { code: "GATEWAY_TIMEOUT" });
  }
}

/** The embedding backend refused the text itself (too long, malformed). */
export class InvalidInputError extends RagError {
  constructor(message: string, options?: ErrorOptions) {
    super("INVALID_INPUT", message, options);
  }
}

export class GenerationUnavailableError extends RagError {
  constructor(message: string, options?: ErrorOptions) {
    super("GENERATION_UNAVAILABLE", message, options);
  }
}

export class NotFoundError extends RagError {
  constructor(what: string) {
    super("NOT_FOUND", `Not found: ${what}`);
  }
}

export class InvalidArgumentError extends RagError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

export class RunCancelledError extends RagError {
  constructor(message = "Run cancelled") {
    super("CANCELLED", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isRetryable(err: unknown): boolean {
  return err instanceof ServiceUnavailableError;
}
