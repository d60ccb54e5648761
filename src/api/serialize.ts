import type { ScanRecord } from "../db/types.js";
import type { EventResult } from "../worker/event-handler.js";
import type { ImageScanResult } from "../worker/scan-pipeline.js";

export function imageResultBody(result: ImageScanResult) {
  if (result.status === "scanned") {
    return {
      image: result.image,
      canonical_name: result.canonical_name,
      status: result.status,
      scan_id: result.scan_id,
      outcome_status: result.outcome_status,
      alert: result.alert,
      vulnerabilities: {
        CRITICAL: result.record.vuln_critical,
        HIGH: result.record.vuln_high,
        MEDIUM: result.record.vuln_medium,
        LOW: result.record.vuln_low,
        INFORMATIONAL: result.record.vuln_informational,
        total: result.record.vuln_total
      },
      compliance: {
        passed: result.record.compliance_passed,
        failed: result.record.compliance_failed,
        total: result.record.compliance_total
      }
    };
  }
  if (result.status === "skipped") {
    return { image: result.image, canonical_name: result.canonical_name, status: result.status, reason: result.reason };
  }
  return {
    image: result.image,
    canonical_name: result.canonical_name,
    status: result.status,
    error: { error_code: "SCAN_FAILED", kind: result.error_kind, message: result.error }
  };
}

export function eventResultBody(result: EventResult) {
  if (result.status === "skipped") return result;
  return {
    event_id: result.event_id,
    status: result.status,
    container_type: result.container_type,
    scanned: result.batch.scanned,
    skipped: result.batch.skipped,
    failed: result.batch.failed,
    images: result.batch.results.map(imageResultBody)
  };
}

export function scanRecordBody(record: ScanRecord) {
  return {
    scan_id: record.scan_id,
    image: record.image,
    canonical_name: record.canonical_name,
    scanned_at: record.scanned_at,
    status: record.status,
    container_type: record.container_type,
    scanner: record.scanner,
    vulnerabilities: {
      CRITICAL: record.vuln_critical,
      HIGH: record.vuln_high,
      MEDIUM: record.vuln_medium,
      LOW: record.vuln_low,
      INFORMATIONAL: record.vuln_informational,
      total: record.vuln_total
    },
    compliance: {
      passed: record.compliance_passed,
      failed: record.compliance_failed,
      total: record.compliance_total
    },
    object_path: record.object_path
  };
}
