import { describe, expect, test } from "vitest";
import { classifyScanError } from "../src/lib/classifier.js";
import { ScanFatalError, ScanTimeoutError, ScanTransientError } from "../src/lib/errors.js";
import { ScanExecutor } from "../src/lib/executor.js";
import { parseImageReference } from "../src/lib/imageRef.js";
import { ContainerInvocation } from "../src/lib/invocation.js";
import { fakeExecutor, processResult, scriptedRunner, testInvocation, TEST_SCANNER_VERSION } from "./fixtures.js";

const image = parseImageReference("myregistry.azurecr.io/app:v1");

function containerInvocation(): ContainerInvocation {
  return new ContainerInvocation({
    runtime: "docker",
    scanner_image: "qualys/qscanner:latest",
    name_prefix: "qscanner-",
    scan_types: "os",
    extra_args: [],
    credentials: {},
    base_env: {}
  });
}

describe("classifyScanError", () => {
  test("timeouts, transient markers and the rest", () => {
    expect(classifyScanError(new ScanTimeoutError("killed", { attempts: 1, timeout_ms: 10 })).kind).toBe("timeout");
    expect(classifyScanError(new Error("Connection reset by peer")).kind).toBe("retryable");
    expect(classifyScanError(new Error("registry returned 503")).kind).toBe("retryable");
    expect(classifyScanError(new Error("Rate limit exceeded")).kind).toBe("retryable");
    expect(classifyScanError(new Error("manifest unknown")).kind).toBe("fatal");
    expect(classifyScanError("plain string")).toEqual({ kind: "fatal", reason: "plain string" });
  });
});

describe("ScanExecutor", () => {
  test("returns stdout verbatim on exit 0", async () => {
    const { executor, calls } = fakeExecutor([processResult({ stdout: '{"vulnerabilities":[]}' })]);
    const out = await executor.scan(image, { container_type: "ACA" });
    expect(out.stdout).toBe('{"vulnerabilities":[]}');
    expect(out.exit_code).toBe(0);
    expect(out.attempts).toBe(1);
    expect(out.scanner).toBe("local");
    expect(calls[0].args).toEqual([
      "image",
      "myregistry.azurecr.io/app:v1",
      "--scan-types",
      "os,sca,secret",
      "--format",
      "json",
      "--tag",
      "container_type=ACA"
    ]);
  });

  test("exit code 1 is a completed scan with findings", async () => {
    const { executor, sleeps } = fakeExecutor([processResult({ exit_code: 1, stdout: "{}" })]);
    const out = await executor.scan(image);
    expect(out.exit_code).toBe(1);
    expect(out.attempts).toBe(1);
    expect(sleeps).toEqual([]);
  });

  test("retries transient failures with exponential backoff", async () => {
    const { executor, sleeps } = fakeExecutor([
      processResult({ exit_code: 2, stderr: "connection refused" }),
      processResult({ exit_code: 2, stderr: "connection refused" }),
      processResult({ stdout: "{}" })
    ]);
    const out = await executor.scan(image);
    expect(out.attempts).toBe(3);
    expect(sleeps).toEqual([100, 200]);
  });

  test("gives up after the retry budget with a transient error", async () => {
    const { executor, calls, sleeps } = fakeExecutor([processResult({ exit_code: 2, stderr: "503 service unavailable" })], {
      max_retries: 3
    });
    const err = await executor.scan(image).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ScanTransientError);
    expect(err).toMatchObject({
      kind: "transient",
      attempts: 4,
      message: "scan failed after 4 attempts: scanner exited with code 2: 503 service unavailable"
    });
    expect(calls).toHaveLength(4);
    // Total waiting before giving up is the full geometric series.
    expect(sleeps.reduce((a, b) => a + b, 0)).toBe(100 + 200 + 400);
  });

  test("fatal failures are not retried", async () => {
    const { executor, calls, sleeps } = fakeExecutor([processResult({ exit_code: 2, stderr: "manifest unknown" })]);
    const err = await executor.scan(image).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ScanFatalError);
    expect(err).toMatchObject({ attempts: 1, message: "scanner exited with code 2: manifest unknown" });
    expect(calls).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  test("a launch failure is fatal", async () => {
    const { executor, calls } = fakeExecutor([new Error("failed to launch qscanner: spawn qscanner ENOENT")]);
    await expect(executor.scan(image)).rejects.toBeInstanceOf(ScanFatalError);
    expect(calls).toHaveLength(1);
  });

  test("a timeout ends the scan after exactly one attempt", async () => {
    const { executor, calls, sleeps } = fakeExecutor([processResult({ timed_out: true, exit_code: 128 })]);
    const err = await executor.scan(image).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ScanTimeoutError);
    expect(err).toMatchObject({ kind: "timeout", attempts: 1 });
    expect(calls).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  test("a timed-out container scan is removed by name", async () => {
    const { executor, calls, cleanups } = fakeExecutor([processResult({ timed_out: true, exit_code: 128 })], {
      invocation: containerInvocation()
    });
    await expect(executor.scan(image)).rejects.toBeInstanceOf(ScanTimeoutError);

    expect(calls).toHaveLength(1);
    expect(calls[0].args.slice(0, 3)).toEqual(["run", "--rm", "--name"]);
    const name = calls[0].args[3];
    expect(name).toMatch(/^qscanner-[0-9a-f-]{36}$/);
    expect(cleanups).toEqual([{ command: "docker", args: ["rm", "-f", name], env: {} }]);
  });

  test("each retried container attempt gets its own name and cleanup", async () => {
    const { executor, calls, cleanups } = fakeExecutor(
      [processResult({ timed_out: true }), processResult({ stdout: "{}" })],
      { invocation: containerInvocation(), retry_on_timeout: true }
    );
    const out = await executor.scan(image);
    expect(out.attempts).toBe(2);
    expect(calls[0].args[3]).not.toBe(calls[1].args[3]);
    expect(cleanups.map((c) => c.args[2])).toEqual([calls[0].args[3]]);
  });

  test("a finished container scan needs no cleanup", async () => {
    const { executor, cleanups } = fakeExecutor([processResult({ stdout: "{}" })], { invocation: containerInvocation() });
    await executor.scan(image);
    expect(cleanups).toEqual([]);
  });

  test("timeouts are retried when enabled", async () => {
    const { executor, sleeps } = fakeExecutor(
      [processResult({ timed_out: true }), processResult({ timed_out: true }), processResult({ stdout: "{}" })],
      { retry_on_timeout: true }
    );
    const out = await executor.scan(image);
    expect(out.attempts).toBe(3);
    expect(sleeps).toEqual([100, 200]);
  });

  test("credentials in scanner stderr are redacted from the error", async () => {
    const { executor } = fakeExecutor([processResult({ exit_code: 2, stderr: "auth failed for --access-token abc123def" })]);
    const err = await executor.scan(image).catch((e: unknown) => e);
    expect(err).toMatchObject({ message: "scanner exited with code 2: auth failed for --access-token [REDACTED]" });
  });

  test("reads the scanner version once, falling back to unknown", async () => {
    const { executor, versionCalls } = fakeExecutor([processResult()]);
    expect(await executor.getScannerVersion()).toBe(TEST_SCANNER_VERSION);
    expect(await executor.getScannerVersion()).toBe(TEST_SCANNER_VERSION);
    expect(versionCalls()).toBe(1);

    const broken = new ScanExecutor({
      invocation: testInvocation(),
      run: async () => {
        throw new Error("spawn qscanner ENOENT");
      }
    });
    expect(await broken.getScannerVersion()).toBe("unknown");
  });

  test("passes the configured timeout to the runner", async () => {
    const { run } = scriptedRunner([processResult()]);
    const seen: number[] = [];
    const executor = new ScanExecutor({
      invocation: testInvocation(),
      timeout_ms: 1234,
      run: (cmd, opts) => {
        seen.push(opts.timeout_ms);
        return run(cmd, opts);
      }
    });
    await executor.scan(image);
    expect(seen).toEqual([1234]);
  });
});
