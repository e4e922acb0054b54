/**
 * Error taxonomy, exit codes and secret redaction
 */

export const ERROR_KINDS = [
  "InvalidConfiguration",
  "KeyUnavailable",
  "SigningFailure",
  "AuthenticationRejected",
  "ScopeInsufficient",
  "RunnerNameConflict",
  "RateLimited",
  "TransportFailure",
  "DeliveryFailure",
  "Cancelled",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Pipeline stage an error was raised in */
export type ErrorStage = "config" | "signing" | "exchange" | "jit" | "delivery";

/** Process exit code per error kind */
export const EXIT_CODES: Record<ErrorKind, number> = {
  InvalidConfiguration: 2,
  KeyUnavailable: 10,
  SigningFailure: 11,
  AuthenticationRejected: 20,
  ScopeInsufficient: 21,
  RunnerNameConflict: 22,
  RateLimited: 30,
  TransportFailure: 31,
  DeliveryFailure: 40,
  Cancelled: 50,
};

export const EXIT_SUCCESS = 0;
export const EXIT_UNEXPECTED = 1;

export const REDACTED = "***REDACTED***";

export interface CredentialErrorOptions {
  stage?: ErrorStage;
  /** HTTP status from the platform, if any */
  status?: number;
  /** Platform-requested wait before retrying */
  retryAfterMs?: number;
  cause?: unknown;
}

export class CredentialError extends Error {
  readonly kind: ErrorKind;
  readonly stage?: ErrorStage;
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(kind: ErrorKind, message: string, options: CredentialErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CredentialError";
    this.kind = kind;
    this.stage = options.stage;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }

  /** Copy with a different message (and optionally stage) */
  withMessage(message: string, stage: ErrorStage | undefined = this.stage): CredentialError {
    return new CredentialError(this.kind, message, {
      stage,
      status: this.status,
      retryAfterMs: this.retryAfterMs,
      cause: this.cause,
    });
  }

  get exitCode(): number {
    return EXIT_CODES[this.kind];
  }
}

/** Kinds that may succeed if the stage is tried again */
export function isRetryable(kind: ErrorKind): boolean {
  return kind === "RateLimited" || kind === "TransportFailure";
}

/** Kinds a process supervisor may retry by re-running the tool */
export function isRetryableBySupervisor(kind: ErrorKind): boolean {
  return isRetryable(kind) || kind === "Cancelled";
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/** Normalize anything thrown into a CredentialError */
export function toCredentialError(error: unknown, stage: ErrorStage): CredentialError {
  if (error instanceof CredentialError) {
    return error.stage ? error : error.withMessage(error.message, stage);
  }
  if (isAbortError(error)) {
    return new CredentialError("Cancelled", "operation was cancelled", { stage, cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CredentialError("TransportFailure", message, { stage, cause: error });
}

/** Replace every occurrence of the given secret values in text */
export function redactSecrets(text: string, secrets: Iterable<string>): string {
  let result = text;
  for (const secret of secrets) {
    if (secret.length === 0) continue;
    result = result.split(secret).join(REDACTED);
  }
  return result;
}

export function formatError(error: CredentialError): string {
  const where = error.stage ? ` during ${error.stage}` : "";
  const status = error.status !== undefined ? ` (HTTP ${error.status})` : "";
  return `${error.kind}${where}${status}: ${error.message}`;
}
