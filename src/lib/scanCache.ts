import type { ScanRecord } from "../db/types.js";
import { errorMessage } from "./errors.js";
import type { ResultStore } from "./resultStore.js";

const HOUR_MS = 60 * 60 * 1000;

/**
 * Advisory dedup check: was this image persisted within the window?
 *
 * Fetches the whole partition and filters on parsed timestamps here, since
 * range filters on the index are not trusted. Unparseable timestamps are
 * skipped. Lookup failures answer false, which costs an extra scan but never
 * skips a needed one.
 */
export async function isRecentlyScanned(args: {
  store: Pick<ResultStore, "queryPartition">;
  canonical_name: string;
  window_hours: number;
  now_ms?: number;
}): Promise<boolean> {
  const windowMs = args.window_hours * HOUR_MS;
  if (!(windowMs > 0)) return false;
  const now = args.now_ms ?? Date.now();

  let records: ScanRecord[];
  try {
    records = await args.store.queryPartition(args.canonical_name);
  } catch (e) {
    console.warn(`Recent scan lookup failed image=${args.canonical_name}: ${errorMessage(e)}`);
    return false;
  }

  let recent = 0;
  for (const record of records) {
    const scannedAt = Date.parse(record.scanned_at);
    if (Number.isNaN(scannedAt)) continue;
    if (now - scannedAt < windowMs) recent += 1;
  }

  if (recent > 0) {
    console.log(`Found recent scans image=${args.canonical_name} count=${recent} window_hours=${args.window_hours}`);
    return true;
  }
  return false;
}
