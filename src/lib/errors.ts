export type ScanErrorKind = "timeout" | "transient" | "fatal";

export class ScanError extends Error {
  readonly kind: ScanErrorKind;
  readonly attempts: number;

  constructor(kind: ScanErrorKind, message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScanError";
    this.kind = kind;
    this.attempts = attempts;
  }
}

/** The scanner ran past its wall-clock budget and was killed. */
export class ScanTimeoutError extends ScanError {
  readonly timeout_ms: number;

  constructor(message: string, args: { attempts: number; timeout_ms: number; cause?: unknown }) {
    super("timeout", message, args.attempts, { cause: args.cause });
    this.name = "ScanTimeoutError";
    this.timeout_ms = args.timeout_ms;
  }
}

/** A retryable failure that outlived the retry budget. */
export class ScanTransientError extends ScanError {
  constructor(message: string, args: { attempts: number; cause?: unknown }) {
    super("transient", message, args.attempts, { cause: args.cause });
    this.name = "ScanTransientError";
  }
}

export class ScanFatalError extends ScanError {
  constructor(message: string, args: { attempts: number; cause?: unknown }) {
    super("fatal", message, args.attempts, { cause: args.cause });
    this.name = "ScanFatalError";
  }
}

export class StorageWriteError extends Error {
  readonly object_path: string;

  constructor(message: string, args: { object_path: string; cause?: unknown }) {
    super(message, { cause: args.cause });
    this.name = "StorageWriteError";
    this.object_path = args.object_path;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
