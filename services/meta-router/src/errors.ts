// ============================================================================
// Error taxonomy
// Source errors are absorbed by the aggregator; trade errors reach the caller
// ============================================================================

export type SourceErrorCode =
  | "SourceUnavailable"
  | "SourceTimeout"
  | "InvalidSourceResponse"
  | "RateLimited"
  | "Unsupported";

export type TradeErrorCode =
  | "NoViableRoute"
  | "QuoteExpired"
  | "SlippageExceeded"
  | "AlreadyExecuted"
  | "UnknownQuote"
  | "ExecutionDisabled";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export class SourceError extends Error {
  readonly code: SourceErrorCode;
  readonly sourceId: string;
  /** Only set for RateLimited */
  readonly retryAfterMs?: number;

  constructor(
    code: SourceErrorCode,
    sourceId: string,
    message: string,
    retryAfterMs?: number
  ) {
    super(message);
    this.name = "SourceError";
    this.code = code;
    this.sourceId = sourceId;
    this.retryAfterMs = retryAfterMs;
  }
}

export class TradeError extends Error {
  readonly code: TradeErrorCode;
  readonly requestId?: string;

  constructor(code: TradeErrorCode, message: string, requestId?: string) {
    super(message);
    this.name = "TradeError";
    this.code = code;
    this.requestId = requestId;
  }
}

/**
 * Thrown by signing collaborators when the wallet refuses or fails to sign.
 * Never retried; its message is reported verbatim.
 */
export class SigningError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SigningError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
