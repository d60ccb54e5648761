import { classifyScanError, type ErrorClassification, type ErrorClassifier } from "./classifier.js";
import { errorMessage, ScanFatalError, ScanTimeoutError, ScanTransientError, type ScanError } from "./errors.js";
import type { ImageReference } from "./imageRef.js";
import { runProcess, type InvocationStrategy, type ProcessCommand, type ProcessRunner } from "./invocation.js";
import { redactText } from "./redact.js";

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 2_000;
export const DEFAULT_TIMEOUT_MS = 1_800_000;
const VERSION_TIMEOUT_MS = 10_000;
const CLEANUP_TIMEOUT_MS = 30_000;

// The scanner exits 1 when it completed and found something.
const SUCCESS_EXIT_CODES = new Set([0, 1]);

export type ScanExecution = {
  stdout: string;
  exit_code: number;
  attempts: number;
  scanner: string;
  started_at: Date;
  completed_at: Date;
};

export type ScanExecutorOptions = {
  invocation: InvocationStrategy;
  timeout_ms?: number;
  max_retries?: number;
  base_delay_ms?: number;
  retry_on_timeout?: boolean;
  classify?: ErrorClassifier;
  run?: ProcessRunner;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Runs the external scanner with bounded retries. Attempt n (0-based) that
 * fails with a retryable error is followed by a pause of
 * base_delay_ms * 2^n before attempt n+1. Timeouts end the scan unless
 * retry_on_timeout is set.
 */
export class ScanExecutor {
  readonly invocation: InvocationStrategy;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly retryOnTimeout: boolean;
  private readonly classify: ErrorClassifier;
  private readonly run: ProcessRunner;
  private readonly sleep: (ms: number) => Promise<void>;
  private scannerVersion: string | null = null;

  constructor(options: ScanExecutorOptions) {
    this.invocation = options.invocation;
    this.timeoutMs = options.timeout_ms ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = Math.max(0, options.max_retries ?? DEFAULT_MAX_RETRIES);
    this.baseDelayMs = options.base_delay_ms ?? DEFAULT_BASE_DELAY_MS;
    this.retryOnTimeout = options.retry_on_timeout ?? false;
    this.classify = options.classify ?? classifyScanError;
    this.run = options.run ?? runProcess;
    this.sleep = options.sleep ?? sleep;
  }

  async scan(image: ImageReference, tags: Record<string, string> = {}): Promise<ScanExecution> {
    const startedAt = new Date();

    for (let attempt = 0; ; attempt += 1) {
      const attempts = attempt + 1;
      const cmd = this.invocation.buildCommand({ image, tags });
      console.log(
        `Scanner starting image=${image.canonical_name} strategy=${this.invocation.name} attempt=${attempts} command=${cmd.command} ${cmd.args.join(" ")}`
      );
      let failure: unknown;
      try {
        const result = await this.run(cmd, { timeout_ms: this.timeoutMs });
        if (result.timed_out) {
          await this.runCleanup(cmd, image);
          failure = new ScanTimeoutError(`scanner timed out after ${Math.round(this.timeoutMs / 1000)}s`, {
            attempts,
            timeout_ms: this.timeoutMs
          });
        } else if (SUCCESS_EXIT_CODES.has(result.exit_code)) {
          console.log(`Scanner finished image=${image.canonical_name} exit_code=${result.exit_code} attempts=${attempts}`);
          return {
            stdout: result.stdout,
            exit_code: result.exit_code,
            attempts,
            scanner: this.invocation.name,
            started_at: startedAt,
            completed_at: new Date()
          };
        } else {
          const detail = redactText((result.stderr.trim() || result.stdout.trim()).slice(0, 2000));
          failure = new Error(`scanner exited with code ${result.exit_code}${detail ? `: ${detail}` : ""}`);
        }
      } catch (e) {
        failure = e;
      }

      const classification = this.classify(failure);
      if (attempt < this.maxRetries && this.shouldRetry(classification)) {
        const delayMs = this.baseDelayMs * 2 ** attempt;
        console.warn(
          `Scanner attempt failed image=${image.canonical_name} attempt=${attempts} kind=${classification.kind} retry_in_ms=${delayMs}: ${classification.reason}`
        );
        await this.sleep(delayMs);
        continue;
      }

      console.error(
        `Scanner gave up image=${image.canonical_name} attempts=${attempts} kind=${classification.kind}: ${classification.reason}`
      );
      throw toScanError(classification, failure, attempts, this.timeoutMs);
    }
  }

  /** Looks the version up once per executor; "unknown" is not cached. */
  async getScannerVersion(): Promise<string> {
    if (this.scannerVersion) return this.scannerVersion;
    const version = await this.lookupScannerVersion();
    if (version !== "unknown") this.scannerVersion = version;
    return version;
  }

  private async lookupScannerVersion(): Promise<string> {
    try {
      const result = await this.run(this.invocation.buildVersionCommand(), { timeout_ms: VERSION_TIMEOUT_MS });
      const version = result.stdout.trim();
      if (result.timed_out || result.exit_code !== 0 || !version) return "unknown";
      return version.split("\n")[0];
    } catch (e) {
      console.warn(`Scanner version lookup failed: ${errorMessage(e)}`);
      return "unknown";
    }
  }

  private async runCleanup(cmd: ProcessCommand, image: ImageReference): Promise<void> {
    if (!cmd.cleanup) return;
    const cleanup = cmd.cleanup;
    try {
      const result = await this.run(cleanup, { timeout_ms: CLEANUP_TIMEOUT_MS });
      if (result.timed_out || result.exit_code !== 0) {
        console.warn(
          `Scanner cleanup failed image=${image.canonical_name} command=${cleanup.command} ${cleanup.args.join(" ")} exit_code=${result.exit_code}: ${redactText(result.stderr.trim())}`
        );
      }
    } catch (e) {
      console.warn(`Scanner cleanup failed image=${image.canonical_name} command=${cleanup.command}: ${errorMessage(e)}`);
    }
  }

  private shouldRetry(classification: ErrorClassification): boolean {
    if (classification.kind === "retryable") return true;
    return classification.kind === "timeout" && this.retryOnTimeout;
  }
}

function toScanError(classification: ErrorClassification, failure: unknown, attempts: number, timeoutMs: number): ScanError {
  if (failure instanceof ScanTimeoutError) {
    if (failure.attempts === attempts) return failure;
    return new ScanTimeoutError(failure.message, { attempts, timeout_ms: failure.timeout_ms, cause: failure.cause });
  }
  if (classification.kind === "timeout") {
    return new ScanTimeoutError(classification.reason, { attempts, timeout_ms: timeoutMs, cause: failure });
  }
  if (classification.kind === "retryable") {
    return new ScanTransientError(`scan failed after ${attempts} attempts: ${classification.reason}`, {
      attempts,
      cause: failure
    });
  }
  return new ScanFatalError(classification.reason, { attempts, cause: failure });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
