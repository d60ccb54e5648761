import { v4 as uuidv4 } from "uuid";
import type { ImageReference } from "./imageRef.js";
import {
  emptyComplianceSummary,
  emptyVulnerabilitySummary,
  normalizeScanData,
  parseScanOutput,
  type ComplianceSummary,
  type VulnerabilitySummary
} from "./normalizer.js";

export type ScanOutcomeStatus = "COMPLETED" | "PARSE_ERROR" | "FAILED";

export type ScanOutcomeMetadata = {
  registry: string;
  repository: string;
  tag: string;
  digest: string | null;
  scan_started_at: string;
  scan_completed_at: string;
  scanner: string;
  scanner_version: string;
  attempts: number;
  exit_code: number;
  tags: Record<string, string>;
  warnings: string[];
  parse_error: string | null;
  raw_output: unknown;
};

export type ScanOutcome = {
  scan_id: string;
  status: ScanOutcomeStatus;
  image: ImageReference;
  vulnerabilities: VulnerabilitySummary;
  compliance: ComplianceSummary;
  metadata: ScanOutcomeMetadata;
};

const FAILED_PAYLOAD_STATUSES = new Set(["FAILED", "FAILURE", "ERROR"]);

/**
 * Turns raw scanner stdout into a storable outcome. Output that is not a JSON
 * object still yields an outcome (status PARSE_ERROR, zero counts, raw text
 * kept) so the caller always has something to persist.
 */
export function buildScanOutcome(args: {
  image: ImageReference;
  stdout: string;
  scanner: string;
  scanner_version?: string;
  started_at: Date;
  completed_at: Date;
  attempts: number;
  exit_code: number;
  tags?: Record<string, string>;
}): ScanOutcome {
  const { image } = args;
  const parsed = parseScanOutput(args.stdout);

  const base = {
    registry: image.registry,
    repository: image.repository,
    tag: image.tag,
    digest: image.digest,
    scan_started_at: args.started_at.toISOString(),
    scan_completed_at: args.completed_at.toISOString(),
    scanner: args.scanner,
    scanner_version: args.scanner_version ?? "unknown",
    attempts: args.attempts,
    exit_code: args.exit_code,
    tags: { ...(args.tags ?? {}) }
  };

  if (!parsed.ok) {
    return {
      scan_id: uuidv4(),
      status: "PARSE_ERROR",
      image,
      vulnerabilities: emptyVulnerabilitySummary(),
      compliance: emptyComplianceSummary(),
      metadata: { ...base, warnings: [], parse_error: parsed.error, raw_output: args.stdout }
    };
  }

  const normalized = normalizeScanData(parsed.data);
  const payloadStatus = typeof parsed.data.status === "string" ? parsed.data.status.toUpperCase() : "";
  const scanId = typeof parsed.data.scanId === "string" && parsed.data.scanId.trim() ? parsed.data.scanId.trim() : uuidv4();

  return {
    scan_id: scanId,
    status: FAILED_PAYLOAD_STATUSES.has(payloadStatus) ? "FAILED" : "COMPLETED",
    image,
    vulnerabilities: normalized.vulnerabilities,
    compliance: normalized.compliance,
    metadata: { ...base, warnings: normalized.warnings, parse_error: null, raw_output: parsed.data }
  };
}
