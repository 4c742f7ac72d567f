import { ok, type Result } from "../result";
import type { PersistenceError } from "../errors";
import type { ShareRecord } from "../types";
import type { RecordStore } from "./types";

/** Process-local store for running without a spreadsheet. Lost on restart. */
export class MemoryRecordStore implements RecordStore {
  private readonly records: ShareRecord[] = [];

  async append(record: ShareRecord): Promise<Result<void, PersistenceError>> {
    this.records.push(structuredClone(record));
    return ok(undefined);
  }

  async findByShareId(shareId: string): Promise<Result<ShareRecord | null, PersistenceError>> {
    const found = this.records.find((r) => r.share_id === shareId);
    return ok(found ? structuredClone(found) : null);
  }
}
