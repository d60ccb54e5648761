import { afterEach, describe, expect, test, vi } from "vitest";
import PQueue from "p-queue";
import type { AlertNotifier, ScanAlert } from "../src/lib/alerting.js";
import type { ProcessResult } from "../src/lib/invocation.js";
import { processImages, scanImage, type ScanPipelineDeps } from "../src/worker/scan-pipeline.js";
import { createStorageFixture, fakeExecutor, processResult, TEST_SCANNER_VERSION, type StorageFixture } from "./fixtures.js";

class RecordingNotifier implements AlertNotifier {
  readonly alerts: ScanAlert[] = [];

  async notify(alert: ScanAlert): Promise<void> {
    this.alerts.push(alert);
  }
}

describe("scan pipeline", () => {
  let fixture: StorageFixture | undefined;

  afterEach(() => {
    fixture?.cleanup();
    fixture = undefined;
    vi.restoreAllMocks();
  });

  function setup(results: Array<ProcessResult | Error>, overrides: Partial<ScanPipelineDeps> = {}) {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    fixture = createStorageFixture();
    const { executor, calls } = fakeExecutor(results, { max_retries: 1 });
    const notifier = new RecordingNotifier();
    const deps: ScanPipelineDeps = {
      store: fixture.store,
      executor,
      notifier,
      limiter: new PQueue({ concurrency: 2 }),
      cache_window_hours: 24,
      alert_threshold: "HIGH",
      ...overrides
    };
    return { deps, calls, notifier, fixture };
  }

  test("scans, stores and alerts on a critical finding", async () => {
    const { deps, notifier } = setup([processResult({ exit_code: 1, stdout: '{"vulnerabilities":[{"severity":"5"}]}' })]);

    const result = await scanImage(deps, "myregistry.azurecr.io/app:v1", { tags: { container_type: "ACI" } });

    expect(result.status).toBe("scanned");
    if (result.status !== "scanned") return;
    expect(result.canonical_name).toBe("myregistry.azurecr.io/app:v1");
    expect(result.outcome_status).toBe("COMPLETED");
    expect(result.alert).toBe(true);
    expect(result.record.vuln_critical).toBe(1);
    expect(result.record.vuln_total).toBe(1);
    expect(notifier.alerts).toEqual([
      {
        image: "myregistry.azurecr.io/app:v1",
        scan_id: result.scan_id,
        threshold: "HIGH",
        counts: { CRITICAL: 1, HIGH: 0, MEDIUM: 0, LOW: 0, INFORMATIONAL: 0, total: 1 }
      }
    ]);
  });

  test("a recent scan is skipped unless forced", async () => {
    const { deps, calls } = setup([processResult({ stdout: "{}" })]);

    expect((await scanImage(deps, "nginx")).status).toBe("scanned");
    const second = await scanImage(deps, "docker.io/library/nginx:latest");
    expect(second).toEqual({
      status: "skipped",
      image: "docker.io/library/nginx:latest",
      canonical_name: "docker.io/library/nginx:latest",
      reason: "recently_scanned"
    });
    expect(calls).toHaveLength(1);

    expect((await scanImage(deps, "nginx", { force: true })).status).toBe("scanned");
    expect(calls).toHaveLength(2);
  });

  test("a zero cache window scans every time", async () => {
    const { deps, calls } = setup([processResult({ stdout: "{}" })], { cache_window_hours: 0 });
    await scanImage(deps, "nginx");
    await scanImage(deps, "nginx");
    expect(calls).toHaveLength(2);
  });

  test("non-JSON output is stored as PARSE_ERROR", async () => {
    const { deps, notifier, fixture } = setup([processResult({ stdout: "Scan completed successfully" })]);
    const result = await scanImage(deps, "nginx", { scanner_version: TEST_SCANNER_VERSION });

    expect(result).toMatchObject({ status: "scanned", outcome_status: "PARSE_ERROR", alert: false });
    expect(notifier.alerts).toEqual([]);
    if (result.status !== "scanned") return;
    const payload = await fixture.store.getScanPayload(result.canonical_name, result.scan_id);
    expect(payload).toMatchObject({
      status: "PARSE_ERROR",
      metadata: { raw_output: "Scan completed successfully", scanner_version: TEST_SCANNER_VERSION }
    });
  });

  test("scanner failures go to the error sink", async () => {
    const { deps, fixture } = setup([processResult({ exit_code: 2, stderr: "manifest unknown" })]);
    const result = await scanImage(deps, "myregistry.azurecr.io/app:v1");

    expect(result).toMatchObject({
      status: "failed",
      canonical_name: "myregistry.azurecr.io/app:v1",
      error: "scanner exited with code 2: manifest unknown",
      error_kind: "fatal"
    });
    const errors = await fixture.objects.listObjects("errors/");
    expect(errors).toHaveLength(1);
    expect(errors[0].startsWith("errors/myregistry.azurecr.io_app_v1/")).toBe(true);
    expect(await fixture.store.listScanRecords("myregistry.azurecr.io/app:v1")).toEqual([]);
  });

  test("alert delivery failures do not fail the scan", async () => {
    const notifier: AlertNotifier = {
      notify: async () => {
        throw new Error("smtp unavailable");
      }
    };
    const { deps } = setup([processResult({ stdout: '{"vulnerabilities":[{"severity":"HIGH"}]}' })], { notifier });
    expect(await scanImage(deps, "nginx")).toMatchObject({ status: "scanned", alert: true });
  });

  test("a batch keeps going past individual failures", async () => {
    const { deps } = setup([
      processResult({ stdout: "{}" }),
      processResult({ exit_code: 2, stderr: "manifest unknown" }),
      processResult({ stdout: "{}" })
    ]);
    const batch = await processImages(deps, ["nginx", "redis", "nginx"]);

    expect(batch.results.map((r) => r.status)).toEqual(["scanned", "failed", "skipped"]);
    expect(batch).toMatchObject({ scanned: 1, skipped: 1, failed: 1 });
  });

  test("the shared limiter caps scans across a wider batch", async () => {
    const { deps } = setup([processResult({ stdout: "{}" })], { limiter: new PQueue({ concurrency: 1 }) });
    const scan = deps.executor.scan.bind(deps.executor);
    let inFlight = 0;
    let maxInFlight = 0;
    vi.spyOn(deps.executor, "scan").mockImplementation(async (ref, tags) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      try {
        return await scan(ref, tags);
      } finally {
        inFlight -= 1;
      }
    });

    const batch = await processImages(deps, ["nginx", "redis", "alpine"], { concurrency: 3 });

    expect(batch.scanned).toBe(3);
    expect(maxInFlight).toBe(1);
  });

  test("a batch aborts when storage cannot be provisioned", async () => {
    const { deps, calls } = setup([processResult({ stdout: "{}" })]);
    vi.spyOn(deps.store, "ensureStorage").mockRejectedValue(new Error("permission denied"));
    await expect(processImages(deps, ["nginx"])).rejects.toThrow("permission denied");
    expect(calls).toHaveLength(0);
  });
});
