import PQueue from "p-queue";
import type { ScanRecord } from "../db/types.js";
import { shouldAlert, type AlertNotifier, type AlertThreshold } from "../lib/alerting.js";
import { errorMessage, ScanError } from "../lib/errors.js";
import type { ScanExecution, ScanExecutor } from "../lib/executor.js";
import { parseImageReference } from "../lib/imageRef.js";
import { buildScanOutcome, type ScanOutcomeStatus } from "../lib/outcome.js";
import type { ResultStore, ScanContext } from "../lib/resultStore.js";
import { isRecentlyScanned } from "../lib/scanCache.js";

export type ScanPipelineDeps = {
  store: ResultStore;
  executor: Pick<ScanExecutor, "scan" | "getScannerVersion">;
  notifier: AlertNotifier;
  /** Shared across batches; caps scanner children running at once. */
  limiter: PQueue;
  cache_window_hours: number;
  alert_threshold: AlertThreshold;
};

export type ScanImageOptions = {
  tags?: Record<string, string>;
  context?: ScanContext;
  force?: boolean;
  scanner_version?: string;
};

export type ImageScanResult =
  | {
      status: "scanned";
      image: string;
      canonical_name: string;
      scan_id: string;
      outcome_status: ScanOutcomeStatus;
      alert: boolean;
      record: ScanRecord;
    }
  | {
      status: "skipped";
      image: string;
      canonical_name: string;
      reason: "recently_scanned";
    }
  | {
      status: "failed";
      image: string;
      canonical_name: string;
      error: string;
      error_kind: string;
      error_object_path: string | null;
    };

export type BatchResult = {
  results: ImageScanResult[];
  scanned: number;
  skipped: number;
  failed: number;
};

/**
 * Parse, dedup, scan, normalize, persist and alert for one image. Every
 * failure is caught here, written to the error sink and reported as
 * status "failed"; it never reaches the caller as an exception.
 */
export async function scanImage(deps: ScanPipelineDeps, image: string, options: ScanImageOptions = {}): Promise<ImageScanResult> {
  const ref = parseImageReference(image);
  const tags = options.tags ?? {};

  try {
    if (!options.force) {
      const recent = await isRecentlyScanned({
        store: deps.store,
        canonical_name: ref.canonical_name,
        window_hours: deps.cache_window_hours
      });
      if (recent) {
        console.log(`Scan skipped, recently scanned image=${ref.canonical_name}`);
        return { status: "skipped", image, canonical_name: ref.canonical_name, reason: "recently_scanned" };
      }
    }

    const execution = await deps.limiter.add<ScanExecution>(() => deps.executor.scan(ref, tags), { throwOnTimeout: true });
    const outcome = buildScanOutcome({
      image: ref,
      stdout: execution.stdout,
      scanner: execution.scanner,
      scanner_version: options.scanner_version,
      started_at: execution.started_at,
      completed_at: execution.completed_at,
      attempts: execution.attempts,
      exit_code: execution.exit_code,
      tags
    });
    for (const warning of outcome.metadata.warnings) {
      console.warn(`Normalization warning image=${ref.canonical_name} scan_id=${outcome.scan_id}: ${warning}`);
    }
    if (outcome.status === "PARSE_ERROR") {
      console.warn(`Scanner output was not JSON image=${ref.canonical_name}: ${outcome.metadata.parse_error}`);
    }

    const v = outcome.vulnerabilities;
    console.log(
      `Scan completed image=${ref.canonical_name} scan_id=${outcome.scan_id} status=${outcome.status} ` +
        `critical=${v.CRITICAL} high=${v.HIGH} medium=${v.MEDIUM} low=${v.LOW} total=${v.total}`
    );

    const record = await deps.store.saveScanResult(outcome, options.context);

    const alert = shouldAlert(v, deps.alert_threshold);
    if (alert) {
      try {
        await deps.notifier.notify({
          image: ref.canonical_name,
          scan_id: outcome.scan_id,
          threshold: deps.alert_threshold,
          counts: { CRITICAL: v.CRITICAL, HIGH: v.HIGH, MEDIUM: v.MEDIUM, LOW: v.LOW, INFORMATIONAL: v.INFORMATIONAL, total: v.total }
        });
      } catch (e) {
        console.error(`Alert delivery failed image=${ref.canonical_name} scan_id=${outcome.scan_id}: ${errorMessage(e)}`);
      }
    }

    return {
      status: "scanned",
      image,
      canonical_name: ref.canonical_name,
      scan_id: outcome.scan_id,
      outcome_status: outcome.status,
      alert,
      record
    };
  } catch (e) {
    const message = errorMessage(e);
    const kind = e instanceof ScanError ? e.kind : e instanceof Error ? e.name : "unknown";
    console.error(`Scan failed image=${image} kind=${kind}: ${message}`);
    const errorObjectPath = await deps.store.saveError({
      timestamp: new Date().toISOString(),
      image: ref.canonical_name,
      error: message,
      error_kind: kind,
      attempts: e instanceof ScanError ? e.attempts : undefined,
      event_subject: options.context?.event_subject,
      tags
    });
    return {
      status: "failed",
      image,
      canonical_name: ref.canonical_name,
      error: message,
      error_kind: kind,
      error_object_path: errorObjectPath
    };
  }
}

/**
 * Scans a batch. Storage provisioning runs first and its failure aborts the
 * whole batch; after that, per-image failures are contained. Images run
 * one at a time unless `concurrency` says otherwise.
 */
export async function processImages(
  deps: ScanPipelineDeps,
  images: string[],
  options: Omit<ScanImageOptions, "scanner_version"> & { concurrency?: number } = {}
): Promise<BatchResult> {
  await deps.store.ensureStorage();
  const scanner_version = await deps.executor.getScannerVersion();

  // Separate from deps.limiter: tasks here wait on that queue, so sharing it would deadlock.
  const batchQueue = new PQueue({ concurrency: Math.max(1, options.concurrency ?? 1) });
  const results = await Promise.all(
    images.map((image, index) =>
      batchQueue.add<ImageScanResult>(
        () => {
          console.log(`Scanning image ${index + 1}/${images.length} image=${image}`);
          return scanImage(deps, image, { ...options, scanner_version });
        },
        { throwOnTimeout: true }
      )
    )
  );

  const batch: BatchResult = {
    results,
    scanned: results.filter((r) => r.status === "scanned").length,
    skipped: results.filter((r) => r.status === "skipped").length,
    failed: results.filter((r) => r.status === "failed").length
  };
  console.log(`Batch complete images=${images.length} scanned=${batch.scanned} skipped=${batch.skipped} failed=${batch.failed}`);
  return batch;
}
