/**
 * Repository contract shared by the in-memory and durable implementations
 *
 * Invariants:
 * - Records returned to callers are copies; mutating them never changes stored state
 * - Ids compare case-insensitively
 * - Upsert replaces a record with the same id in place, otherwise appends
 * - Delete of a missing id is a no-op
 * - Mutations are visible to later reads at once; durability comes from saveChanges()
 */

import type { IsoDate } from "./dates.js";
import type { DealFilter } from "./model/filter.js";
import type { DealRecord } from "./model/record.js";

export interface RecordRepository {
  getAll(): Promise<DealRecord[]>;
  getById(id: string): Promise<DealRecord | undefined>;
  query(filter: DealFilter, referenceDate: IsoDate): Promise<DealRecord[]>;
  upsert(record: DealRecord): Promise<void>;
  upsertMany(records: Iterable<DealRecord>): Promise<void>;
  delete(id: string): Promise<void>;
  saveChanges(): Promise<void>;
}
