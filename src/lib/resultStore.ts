import { createHash } from "node:crypto";
import { v4 as uuidv4 } from "uuid";
import type { MetadataIndex } from "../db/metadataIndex.js";
import type { ScanRecord } from "../db/types.js";
import { errorMessage, StorageWriteError } from "./errors.js";
import { sanitizeName } from "./imageRef.js";
import type { ObjectStore } from "./objectStore.js";
import type { ScanOutcome } from "./outcome.js";
import { redactText } from "./redact.js";

export type ScanContext = {
  container_type?: string;
  event_subject?: string;
  event_id?: string;
};

export type ErrorRecord = {
  timestamp: string;
  image: string;
  error: string;
  error_kind?: string;
  attempts?: number;
  event_subject?: string;
  tags?: Record<string, string>;
};

export type StoredScanPayload = ScanOutcome & { context: ScanContext };

const ERRORS_PREFIX = "errors";

/**
 * Full payloads go to the object store, a denormalized row per scan goes to
 * the metadata index. The two writes are sequential, not transactional: a
 * failed row write after a successful object write leaves the object
 * orphaned but listable, and the scan stays invisible to the cache.
 */
export class ResultStore {
  private provisioning: Promise<void> | null = null;

  constructor(
    private readonly objects: ObjectStore,
    private readonly index: MetadataIndex
  ) {}

  ensureStorage(): Promise<void> {
    if (!this.provisioning) {
      this.provisioning = this.provision().catch((e: unknown) => {
        this.provisioning = null;
        throw e;
      });
    }
    return this.provisioning;
  }

  async saveScanResult(outcome: ScanOutcome, context: ScanContext = {}): Promise<ScanRecord> {
    await this.ensureStorage();

    const partition = sanitizeName(outcome.image.canonical_name);
    const objectPath = `${partition}/${objectName(outcome.scan_id)}.json`;
    const scannedAt = outcome.metadata.scan_completed_at;
    const payload: StoredScanPayload = { ...outcome, context };

    try {
      await this.objects.putObject(objectPath, JSON.stringify(payload, null, 2), {
        image: outcome.image.canonical_name,
        scan_id: outcome.scan_id,
        timestamp: scannedAt
      });
    } catch (e) {
      throw new StorageWriteError(`failed to write scan payload ${objectPath}: ${errorMessage(e)}`, {
        object_path: objectPath,
        cause: e
      });
    }

    const { vulnerabilities: v, compliance: c } = outcome;
    const record: ScanRecord = {
      partition_key: partition,
      row_key: outcome.scan_id,
      image: outcome.image.original,
      canonical_name: outcome.image.canonical_name,
      scan_id: outcome.scan_id,
      scanned_at: scannedAt,
      status: outcome.status,
      container_type: context.container_type ?? null,
      scanner: outcome.metadata.scanner,
      vuln_critical: v.CRITICAL,
      vuln_high: v.HIGH,
      vuln_medium: v.MEDIUM,
      vuln_low: v.LOW,
      vuln_informational: v.INFORMATIONAL,
      vuln_total: v.total,
      compliance_passed: c.passed,
      compliance_failed: c.failed,
      compliance_total: c.total,
      object_path: objectPath
    };

    try {
      await this.index.upsert(record);
    } catch (e) {
      console.error(`Scan metadata write failed, payload orphaned object_path=${objectPath}: ${errorMessage(e)}`);
      throw new StorageWriteError(`failed to write scan metadata for ${objectPath}: ${errorMessage(e)}`, {
        object_path: objectPath,
        cause: e
      });
    }

    console.log(`Saved scan result image=${outcome.image.canonical_name} scan_id=${outcome.scan_id} object_path=${objectPath}`);
    return record;
  }

  /** Diagnostic side channel; never throws. Returns the object path on success. */
  async saveError(record: ErrorRecord): Promise<string | null> {
    try {
      await this.ensureStorage();
      const image = sanitizeName(record.image || "unknown");
      // Timestamps repeat under concurrent failures.
      const objectPath = `${ERRORS_PREFIX}/${image}/${sanitizeName(record.timestamp)}-${uuidv4().slice(0, 8)}.json`;
      const body: ErrorRecord = { ...record, error: redactText(record.error) };
      await this.objects.putObject(objectPath, JSON.stringify(body, null, 2));
      console.log(`Saved error record object_path=${objectPath}`);
      return objectPath;
    } catch (e) {
      console.error(`Error record write failed image=${record.image}: ${errorMessage(e)}`);
      return null;
    }
  }

  async queryPartition(canonical_name: string): Promise<ScanRecord[]> {
    return this.index.queryPartition(sanitizeName(canonical_name));
  }

  /** Stored records for one image, newest first. */
  async listScanRecords(canonical_name: string): Promise<ScanRecord[]> {
    await this.ensureStorage();
    const records = await this.queryPartition(canonical_name);
    return records.sort((a, b) => timestampOrZero(b.scanned_at) - timestampOrZero(a.scanned_at));
  }

  async getScanPayload(canonical_name: string, scan_id: string): Promise<unknown | null> {
    await this.ensureStorage();
    const record = await this.index.get(sanitizeName(canonical_name), scan_id);
    if (!record) return null;
    const body = await this.objects.getObject(record.object_path);
    if (body === null) return null;
    return JSON.parse(body);
  }

  private async provision(): Promise<void> {
    await swallowAlreadyExists(() => this.objects.ensureContainer());
    await swallowAlreadyExists(() => this.index.ensureTable());
  }
}

/** Sanitized ids can collide (`a:b`, `a_b`), so the raw id's hash is appended. */
export function objectName(scan_id: string): string {
  const digest = createHash("sha256").update(scan_id).digest("hex").slice(0, 8);
  return `${sanitizeName(scan_id)}-${digest}`;
}

async function swallowAlreadyExists(step: () => Promise<void>): Promise<void> {
  try {
    await step();
  } catch (e) {
    if (/already exists/i.test(errorMessage(e))) return;
    throw e;
  }
}

function timestampOrZero(value: string): number {
  const t = Date.parse(value);
  return Number.isNaN(t) ? 0 : t;
}
