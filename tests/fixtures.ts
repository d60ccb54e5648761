import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { openDb, type SqliteDb } from "../src/db/db.js";
import { SqliteMetadataIndex } from "../src/db/metadataIndex.js";
import { ScanExecutor } from "../src/lib/executor.js";
import { LocalProcessInvocation, type InvocationStrategy, type ProcessCommand, type ProcessResult, type ProcessRunner } from "../src/lib/invocation.js";
import { FileObjectStore } from "../src/lib/objectStore.js";
import { ResultStore } from "../src/lib/resultStore.js";

export const TEST_SCANNER_VERSION = "qscanner 9.9.9";

export type StorageFixture = {
  tmpDir: string;
  db: SqliteDb;
  objects: FileObjectStore;
  index: SqliteMetadataIndex;
  store: ResultStore;
  cleanup(): void;
};

export function createStorageFixture(): StorageFixture {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "scanwarden-test-"));
  const db = openDb(path.join(tmpDir, "test.sqlite"));
  const objects = new FileObjectStore(path.join(tmpDir, "results"), "scan-results");
  const index = new SqliteMetadataIndex(db, path.join(process.cwd(), "migrations"));
  return {
    tmpDir,
    db,
    objects,
    index,
    store: new ResultStore(objects, index),
    cleanup() {
      db.close();
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  };
}

export function processResult(partial: Partial<ProcessResult> = {}): ProcessResult {
  return { exit_code: 0, stdout: "", stderr: "", timed_out: false, duration_ms: 1, ...partial };
}

/**
 * Fake scanner process. Scan commands consume `results` in order and the last
 * one repeats; version commands always answer TEST_SCANNER_VERSION and
 * container removals always succeed.
 */
export function scriptedRunner(results: Array<ProcessResult | Error>): ScriptedRunner {
  const calls: ProcessCommand[] = [];
  const cleanups: ProcessCommand[] = [];
  let versionCalls = 0;
  let next = 0;
  const run: ProcessRunner = async (cmd) => {
    if (cmd.args.includes("--version")) {
      versionCalls += 1;
      return processResult({ stdout: `${TEST_SCANNER_VERSION}\n` });
    }
    if (cmd.args[0] === "rm") {
      cleanups.push(cmd);
      return processResult();
    }
    calls.push(cmd);
    const result = results[Math.min(next, results.length - 1)];
    next += 1;
    if (result instanceof Error) throw result;
    return result;
  };
  return { run, calls, cleanups, versionCalls: () => versionCalls };
}

export type ScriptedRunner = {
  run: ProcessRunner;
  calls: ProcessCommand[];
  cleanups: ProcessCommand[];
  versionCalls(): number;
};

export function testInvocation(): LocalProcessInvocation {
  return new LocalProcessInvocation({
    binary: "qscanner",
    scan_types: "os,sca,secret",
    extra_args: [],
    credentials: {},
    base_env: {}
  });
}

export function fakeExecutor(
  results: Array<ProcessResult | Error>,
  options: { max_retries?: number; retry_on_timeout?: boolean; invocation?: InvocationStrategy } = {}
): ScriptedRunner & { executor: ScanExecutor; sleeps: number[] } {
  const runner = scriptedRunner(results);
  const sleeps: number[] = [];
  const executor = new ScanExecutor({
    invocation: options.invocation ?? testInvocation(),
    run: runner.run,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    base_delay_ms: 100,
    max_retries: options.max_retries ?? 3,
    retry_on_timeout: options.retry_on_timeout
  });
  return { ...runner, executor, sleeps };
}
