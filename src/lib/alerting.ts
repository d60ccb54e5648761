import type { VulnerabilitySummary } from "./normalizer.js";

export type AlertThreshold = "CRITICAL" | "HIGH";

export type ScanAlert = {
  image: string;
  scan_id: string;
  threshold: AlertThreshold;
  counts: Pick<VulnerabilitySummary, "CRITICAL" | "HIGH" | "MEDIUM" | "LOW" | "INFORMATIONAL" | "total">;
};

export interface AlertNotifier {
  notify(alert: ScanAlert): Promise<void>;
}

export function shouldAlert(vulnerabilities: Pick<VulnerabilitySummary, "CRITICAL" | "HIGH">, threshold: AlertThreshold): boolean {
  if (threshold === "CRITICAL") return vulnerabilities.CRITICAL > 0;
  return vulnerabilities.CRITICAL > 0 || vulnerabilities.HIGH > 0;
}

/**
 * Writes the alert to the log for an external notifier to pick up. Without a
 * configured recipient the alert is dropped with a warning.
 */
export class LogAlertNotifier implements AlertNotifier {
  constructor(private readonly recipient: string | undefined) {}

  async notify(alert: ScanAlert): Promise<void> {
    if (!this.recipient) {
      console.warn(`NOTIFICATION_EMAIL not configured, skipping alert image=${alert.image} scan_id=${alert.scan_id}`);
      return;
    }
    const c = alert.counts;
    console.warn(
      `SECURITY ALERT recipient=${this.recipient} image=${alert.image} scan_id=${alert.scan_id} threshold=${alert.threshold} ` +
        `critical=${c.CRITICAL} high=${c.HIGH} medium=${c.MEDIUM} low=${c.LOW} informational=${c.INFORMATIONAL} total=${c.total}`
    );
  }
}
