import { z } from "zod";
import type { SqliteDb } from "./db.js";
import type { ScanRecord } from "./types.js";

const ScanRecordRow = z.object({
  partition_key: z.string(),
  row_key: z.string(),
  image: z.string(),
  canonical_name: z.string(),
  scan_id: z.string(),
  scanned_at: z.string(),
  status: z.enum(["COMPLETED", "PARSE_ERROR", "FAILED"]),
  container_type: z.string().nullable(),
  scanner: z.string(),
  vuln_critical: z.number().int(),
  vuln_high: z.number().int(),
  vuln_medium: z.number().int(),
  vuln_low: z.number().int(),
  vuln_informational: z.number().int(),
  vuln_total: z.number().int(),
  compliance_passed: z.number().int(),
  compliance_failed: z.number().int(),
  compliance_total: z.number().int(),
  object_path: z.string()
});

export function upsertScanRecord(db: SqliteDb, record: ScanRecord): void {
  db.prepare(
    `INSERT OR REPLACE INTO scan_metadata (
      partition_key,row_key,image,canonical_name,scan_id,scanned_at,status,container_type,scanner,
      vuln_critical,vuln_high,vuln_medium,vuln_low,vuln_informational,vuln_total,
      compliance_passed,compliance_failed,compliance_total,object_path
    )
    VALUES (
      @partition_key,@row_key,@image,@canonical_name,@scan_id,@scanned_at,@status,@container_type,@scanner,
      @vuln_critical,@vuln_high,@vuln_medium,@vuln_low,@vuln_informational,@vuln_total,
      @compliance_passed,@compliance_failed,@compliance_total,@object_path
    )`
  ).run(record);
}

/**
 * Every row of one partition, unfiltered. Recency filtering happens in the
 * caller on the parsed timestamps.
 */
export function listScanRecordsByPartition(db: SqliteDb, partition_key: string): ScanRecord[] {
  const rows = db.prepare(`SELECT * FROM scan_metadata WHERE partition_key=?`).all(partition_key);
  return hydrateRows(rows);
}

export function getScanRecord(db: SqliteDb, partition_key: string, row_key: string): ScanRecord | null {
  const row = db.prepare(`SELECT * FROM scan_metadata WHERE partition_key=? AND row_key=?`).get(partition_key, row_key);
  if (!row) return null;
  const parsed = ScanRecordRow.safeParse(row);
  return parsed.success ? parsed.data : null;
}

function hydrateRows(rows: unknown[]): ScanRecord[] {
  const out: ScanRecord[] = [];
  for (const row of rows) {
    const parsed = ScanRecordRow.safeParse(row);
    if (parsed.success) {
      out.push(parsed.data);
    } else {
      console.warn(`Skipping malformed scan_metadata row: ${parsed.error.message}`);
    }
  }
  return out;
}
