import type { ScanOutcomeStatus } from "../lib/outcome.js";

/** One row per (image partition, scan_id); never updated after insert. */
export interface ScanRecord {
  partition_key: string;
  row_key: string;
  image: string;
  canonical_name: string;
  scan_id: string;
  scanned_at: string;
  status: ScanOutcomeStatus;
  container_type: string | null;
  scanner: string;
  vuln_critical: number;
  vuln_high: number;
  vuln_medium: number;
  vuln_low: number;
  vuln_informational: number;
  vuln_total: number;
  compliance_passed: number;
  compliance_failed: number;
  compliance_total: number;
  object_path: string;
}
