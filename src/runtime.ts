import PQueue from "p-queue";
import type { AppConfig } from "./config.js";
import { openDb } from "./db/db.js";
import { SqliteMetadataIndex } from "./db/metadataIndex.js";
import { LogAlertNotifier } from "./lib/alerting.js";
import { EventPayloadImageResolver } from "./lib/deploymentEvents.js";
import { FileObjectStore } from "./lib/objectStore.js";
import { ResultStore } from "./lib/resultStore.js";
import { buildExecutor } from "./lib/scanner.js";
import type { EventHandlerDeps } from "./worker/event-handler.js";

/** Wires the scan pipeline from configuration. `baseEnv` seeds the scanner child's environment. */
export function buildRuntime(config: AppConfig, baseEnv: NodeJS.ProcessEnv): EventHandlerDeps {
  const db = openDb(config.SQLITE_PATH);
  const store = new ResultStore(
    new FileObjectStore(config.RESULTS_STORAGE_DIR, config.RESULTS_CONTAINER),
    new SqliteMetadataIndex(db)
  );
  return {
    store,
    executor: buildExecutor(config, { base_env: baseEnv }),
    notifier: new LogAlertNotifier(config.NOTIFICATION_EMAIL),
    limiter: new PQueue({ concurrency: config.MAX_CONCURRENT_SCANS }),
    cache_window_hours: config.SCAN_CACHE_HOURS,
    alert_threshold: config.NOTIFY_SEVERITY_THRESHOLD,
    resolver: new EventPayloadImageResolver(),
    scanner_container_prefix: config.SCANNER_CONTAINER_PREFIX
  };
}
