/**
 * In-memory repository: the reference implementation of the contract and
 * the test double for code above the store. saveChanges() is a no-op.
 */

import type { IsoDate } from "./dates.js";
import { matchesFilter, type DealFilter } from "./model/filter.js";
import { cloneRecord, sameId, type DealRecord } from "./model/record.js";
import type { RecordRepository } from "./repository.js";

export class InMemoryRepository implements RecordRepository {
  #records: DealRecord[];

  constructor(records: Iterable<DealRecord> = []) {
    this.#records = [...records].map(cloneRecord);
  }

  async getAll(): Promise<DealRecord[]> {
    return this.#records.map(cloneRecord);
  }

  async getById(id: string): Promise<DealRecord | undefined> {
    const record = this.#records.find((candidate) => sameId(candidate.id, id));
    return record ? cloneRecord(record) : undefined;
  }

  async query(filter: DealFilter, referenceDate: IsoDate): Promise<DealRecord[]> {
    return this.#records
      .filter((record) => matchesFilter(record, filter, referenceDate))
      .map(cloneRecord);
  }

  async upsert(record: DealRecord): Promise<void> {
    upsertInto(this.#records, record);
  }

  async upsertMany(records: Iterable<DealRecord>): Promise<void> {
    for (const record of records) {
      upsertInto(this.#records, record);
    }
  }

  async delete(id: string): Promise<void> {
    this.#records = this.#records.filter((record) => !sameId(record.id, id));
  }

  async saveChanges(): Promise<void> {
    // Nothing to persist
  }

  /**
   * Number of records held
   */
  get size(): number {
    return this.#records.length;
  }
}

/**
 * Replace the record with the same id, or append a copy
 */
export function upsertInto(records: DealRecord[], record: DealRecord): void {
  const copy = cloneRecord(record);
  const index = records.findIndex((candidate) => sameId(candidate.id, record.id));
  if (index >= 0) {
    records[index] = copy;
  } else {
    records.push(copy);
  }
}
