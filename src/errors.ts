export type ScreenpactErrorCode =
  | "PERMISSION_DENIED"
  | "NO_MATCH"
  | "RATE_LIMITED"
  | "ORACLE_UNAVAILABLE"
  | "SESSION_CONFLICT"
  | "SESSION_NOT_FOUND"
  | "INVALID_TRANSITION"
  | "ENFORCEMENT_ACTION_FAILED";

export class ScreenpactError extends Error {
  readonly code: ScreenpactErrorCode;
  readonly retryable: boolean;

  constructor(code: ScreenpactErrorCode, message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

/** The host refused access to its usage-accounting facility. */
export class PermissionDeniedError extends ScreenpactError {
  constructor(message = "Usage access permission is not granted") {
    super("PERMISSION_DENIED", message);
  }
}

export class NoMatchError extends ScreenpactError {
  constructor(text: string) {
    super("NO_MATCH", `No duration found in "${text}"`);
  }
}

export class RateLimitedError extends ScreenpactError {
  readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number, cause?: unknown) {
    super("RATE_LIMITED", message, { retryable: true, cause });
    this.retryAfterMs = Math.max(0, Math.ceil(retryAfterMs));
  }
}

export class OracleUnavailableError extends ScreenpactError {
  constructor(message: string, cause?: unknown) {
    super("ORACLE_UNAVAILABLE", message, { retryable: true, cause });
  }
}

export class SessionConflictError extends ScreenpactError {
  readonly subject: string;

  constructor(subject: string, activeSessionId: string) {
    super("SESSION_CONFLICT", `Negotiation ${activeSessionId} is already active for ${subject}`);
    this.subject = subject;
  }
}

export class SessionNotFoundError extends ScreenpactError {
  constructor(sessionId: string) {
    super("SESSION_NOT_FOUND", `No active negotiation session ${sessionId}`);
  }
}

export class InvalidTransitionError extends ScreenpactError {
  constructor(agreementId: string, from: string, to: string) {
    super("INVALID_TRANSITION", `Agreement ${agreementId} cannot move from ${from} to ${to}`);
  }
}

export class EnforcementActionFailedError extends ScreenpactError {
  readonly identifier: string;

  constructor(identifier: string, detail: string, cause?: unknown) {
    super("ENFORCEMENT_ACTION_FAILED", `Could not close ${identifier}: ${detail}`, { retryable: true, cause });
    this.identifier = identifier;
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: ScreenpactError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: ScreenpactError): Result<T> {
  return { ok: false, error };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
