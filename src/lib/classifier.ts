import { errorMessage, ScanTimeoutError } from "./errors.js";

export type ErrorClassification =
  | { kind: "retryable"; reason: string }
  | { kind: "fatal"; reason: string }
  | { kind: "timeout"; reason: string };

export type ErrorClassifier = (error: unknown) => ErrorClassification;

export const TRANSIENT_MARKERS = [
  "connection",
  "timeout",
  "network",
  "temporary",
  "rate limit",
  "429",
  "502",
  "503",
  "504"
];

/**
 * Default classifier. Our own wall-clock kill is a timeout; anything whose
 * message mentions a transient marker is retryable (including a scanner that
 * reports its own network timeout); everything else is fatal.
 */
export const classifyScanError: ErrorClassifier = (error) => {
  const reason = errorMessage(error);
  if (error instanceof ScanTimeoutError) {
    return { kind: "timeout", reason };
  }
  const lower = reason.toLowerCase();
  const marker = TRANSIENT_MARKERS.find((m) => lower.includes(m));
  if (marker) {
    return { kind: "retryable", reason };
  }
  return { kind: "fatal", reason };
};
