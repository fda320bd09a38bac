export type ValidationKind = "question_too_short" | "question_too_long";

export class ValidationError extends Error {
  readonly kind: ValidationKind;

  constructor(kind: ValidationKind, length: number) {
    super(`${kind} (length=${length})`);
    this.name = "ValidationError";
    this.kind = kind;
  }
}

export class ResolutionError extends Error {
  readonly input: string;

  constructor(input: string) {
    super(`No cards recognized in "${input}"`);
    this.name = "ResolutionError";
    this.input = input;
  }
}

export type UpstreamSource = "generation" | "payment";

export class UpstreamError extends Error {
  readonly source: UpstreamSource;
  readonly timedOut: boolean;

  constructor(source: UpstreamSource, message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = "UpstreamError";
    this.source = source;
    this.timedOut = options.timedOut ?? false;
  }
}

export class StorageUnavailable extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "StorageUnavailable";
  }
}

export class AdmissionRejected extends Error {
  readonly retryAfterMs: number;

  constructor(userId: string, retryAfterMs: number) {
    super(`Rate limit exceeded for user ${userId}`);
    this.name = "AdmissionRejected";
    this.retryAfterMs = retryAfterMs;
  }
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export const describeError = (err: unknown) =>
  err instanceof Error ? `${err.name}: ${err.message}` : String(err);
