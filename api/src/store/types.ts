import type { PersistenceError } from "../errors";
import type { Result } from "../result";
import type { ShareRecord } from "../types";

/** Append-only record store keyed by share id. */
export interface RecordStore {
  append(record: ShareRecord): Promise<Result<void, PersistenceError>>;
  findByShareId(shareId: string): Promise<Result<ShareRecord | null, PersistenceError>>;
}
