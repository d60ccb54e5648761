export const SEVERITIES = ["CRITICAL", "HIGH", "MEDIUM", "LOW", "INFORMATIONAL"] as const;
export type Severity = (typeof SEVERITIES)[number];

export type VulnerabilityDetail = {
  id: string | null;
  cve: string | null;
  severity: Severity;
  raw_severity: string | null;
  title: string | null;
  package: string | null;
  version: string | null;
  fixed_version: string | null;
};

export type VulnerabilitySummary = Record<Severity, number> & {
  total: number;
  details: VulnerabilityDetail[];
};

export type ComplianceCheck = {
  id: string | null;
  title: string | null;
  status: string;
  description: string | null;
};

export type ComplianceSummary = {
  passed: number;
  failed: number;
  total: number;
  checks: ComplianceCheck[];
};

export type NormalizedScan = {
  vulnerabilities: VulnerabilitySummary;
  compliance: ComplianceSummary;
  warnings: string[];
};

export type ParsedScanOutput = { ok: true; data: Record<string, unknown> } | { ok: false; error: string };

const NUMERIC_SEVERITIES: Record<string, Severity> = {
  "5": "CRITICAL",
  "4": "HIGH",
  "3": "MEDIUM",
  "2": "LOW",
  "1": "INFORMATIONAL"
};

// Checked in order; the first token found anywhere in the value wins.
const SEVERITY_TOKENS: Array<[string[], Severity]> = [
  [["CRIT"], "CRITICAL"],
  [["HIGH", "URGENT"], "HIGH"],
  [["MED", "MODERATE"], "MEDIUM"],
  [["LOW", "MINOR"], "LOW"],
  [["INFO"], "INFORMATIONAL"]
];

// Scanner output is not schema-stable: lists sit at the top level, under a
// results wrapper, or under the image details block.
const LIST_WRAPPERS = ["results", "imageDetails"];

export const FALLBACK_SEVERITY: Severity = "MEDIUM";

export function normalizeSeverity(value: unknown): { severity: Severity; recognized: boolean } {
  const s = scalarToString(value)?.trim().toUpperCase() ?? "";
  const numeric = NUMERIC_SEVERITIES[s];
  if (numeric) return { severity: numeric, recognized: true };
  for (const [tokens, severity] of SEVERITY_TOKENS) {
    if (tokens.some((t) => s.includes(t))) return { severity, recognized: true };
  }
  return { severity: FALLBACK_SEVERITY, recognized: false };
}

export function parseScanOutput(stdout: string): ParsedScanOutput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : "invalid JSON" };
  }
  if (!isRecord(parsed)) {
    return { ok: false, error: "scanner output is not a JSON object" };
  }
  return { ok: true, data: parsed };
}

export function normalizeScanData(data: Record<string, unknown>): NormalizedScan {
  const warnings: string[] = [];
  const vulnerabilities = emptyVulnerabilitySummary();

  for (const item of findList(data, "vulnerabilities")) {
    const vuln = isRecord(item) ? item : {};
    const { severity, recognized } = normalizeSeverity(vuln.severity);
    const raw_severity = scalarToString(vuln.severity);
    if (!recognized) {
      warnings.push(`unrecognized severity ${JSON.stringify(raw_severity)} counted as ${FALLBACK_SEVERITY}`);
    }
    vulnerabilities[severity] += 1;
    vulnerabilities.total += 1;

    const pkg = isRecord(vuln.package) ? vuln.package : null;
    vulnerabilities.details.push({
      id: firstString(vuln.qid, vuln.id),
      cve: firstString(vuln.cve, vuln.cveId),
      severity,
      raw_severity,
      title: firstString(vuln.title, vuln.name),
      package: pkg ? firstString(pkg.name) : firstString(vuln.packageName),
      version: pkg ? firstString(pkg.version) : firstString(vuln.packageVersion),
      fixed_version: firstString(vuln.fixedVersion, vuln.fix)
    });
  }

  const compliance = emptyComplianceSummary();
  for (const item of findList(data, "compliance")) {
    const check = isRecord(item) ? item : {};
    const status = (scalarToString(check.status) ?? "").toUpperCase();
    compliance.total += 1;
    if (status === "PASS" || status === "PASSED") compliance.passed += 1;
    else if (status === "FAIL" || status === "FAILED") compliance.failed += 1;
    compliance.checks.push({
      id: firstString(check.id, check.checkId),
      title: firstString(check.title, check.name),
      status,
      description: firstString(check.description)
    });
  }

  return { vulnerabilities, compliance, warnings };
}

export function emptyVulnerabilitySummary(): VulnerabilitySummary {
  return { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0, INFORMATIONAL: 0, total: 0, details: [] };
}

export function emptyComplianceSummary(): ComplianceSummary {
  return { passed: 0, failed: 0, total: 0, checks: [] };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function findList(data: Record<string, unknown>, key: string): unknown[] {
  if (key in data) return asList(data[key]);
  for (const wrapper of LIST_WRAPPERS) {
    const nested = data[wrapper];
    if (isRecord(nested) && key in nested) return asList(nested[key]);
  }
  return [];
}

function asList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function firstString(...values: unknown[]): string | null {
  for (const v of values) {
    const s = scalarToString(v);
    if (s !== null && s.length > 0) return s;
  }
  return null;
}

function scalarToString(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}
