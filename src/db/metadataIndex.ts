import { applyMigrations, type SqliteDb } from "./db.js";
import { getScanRecord, listScanRecordsByPartition, upsertScanRecord } from "./repo.js";
import type { ScanRecord } from "./types.js";

export interface MetadataIndex {
  /** Creates the table if missing; safe to call repeatedly. */
  ensureTable(): Promise<void>;
  upsert(record: ScanRecord): Promise<void>;
  queryPartition(partition_key: string): Promise<ScanRecord[]>;
  get(partition_key: string, row_key: string): Promise<ScanRecord | null>;
}

export class SqliteMetadataIndex implements MetadataIndex {
  constructor(
    private readonly db: SqliteDb,
    private readonly migrationsDir?: string
  ) {}

  async ensureTable(): Promise<void> {
    applyMigrations(this.db, this.migrationsDir);
  }

  async upsert(record: ScanRecord): Promise<void> {
    upsertScanRecord(this.db, record);
  }

  async queryPartition(partition_key: string): Promise<ScanRecord[]> {
    return listScanRecordsByPartition(this.db, partition_key);
  }

  async get(partition_key: string, row_key: string): Promise<ScanRecord | null> {
    return getScanRecord(this.db, partition_key, row_key);
  }
}
