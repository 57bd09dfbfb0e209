/**
 * Record service: the write path used by callers above the repository.
 * Every write normalizes first and ends in saveChanges().
 */

import type { DealContext } from "./context.js";
import { LookupTables } from "./model/lookups.js";
import { createRecord, type DealRecord } from "./model/record.js";
import { Normalizer, type NormalizationResult } from "./normalize.js";
import { applyPatch, type PatchResult } from "./patch.js";
import type { RecordRepository } from "./repository.js";

export class RecordService {
  readonly #repository: RecordRepository;
  readonly #normalizer: Normalizer;

  constructor(repository: RecordRepository, context: DealContext, lookups?: LookupTables) {
    this.#repository = repository;
    this.#normalizer = new Normalizer(context, lookups ?? LookupTables.createDefault());
  }

  /**
   * Normalize and store a new record built from `fields`
   */
  async create(fields: Partial<DealRecord>): Promise<NormalizationResult> {
    return this.update(createRecord(fields));
  }

  /**
   * Normalize and store `record`, replacing any record with the same id
   */
  async update(record: DealRecord): Promise<NormalizationResult> {
    const result = this.#normalizer.normalize(record);
    await this.#repository.upsert(result.record);
    await this.#repository.saveChanges();
    return result;
  }

  /**
   * Apply a partial update. Valid fields are saved even when others are rejected;
   * nothing is saved when no field applies.
   */
  async patch(id: string, fields: Readonly<Record<string, unknown>>): Promise<PatchResult> {
    const existing = await this.#repository.getById(id);
    if (!existing) {
      return {
        success: false,
        status: "not_found",
        applied: [],
        rejected: [],
        changes: [],
        error: `Record not found: ${id}`,
      };
    }

    const { record, applied, rejected } = applyPatch(existing, fields);

    if (applied.length === 0) {
      return {
        success: rejected.length === 0,
        status: rejected.length === 0 ? "ok" : "rejected",
        record: existing,
        applied,
        rejected,
        changes: [],
        error: rejected.length === 0 ? undefined : `Validation failed for ${rejected.length} field(s)`,
      };
    }

    const { record: normalized, changes } = this.#normalizer.normalize(record);
    await this.#repository.upsert(normalized);
    await this.#repository.saveChanges();

    if (rejected.length > 0) {
      return {
        success: false,
        status: "partial",
        record: normalized,
        applied,
        rejected,
        changes,
        error: `Partial success: ${rejected.length} field(s) rejected`,
      };
    }
    return { success: true, status: "ok", record: normalized, applied, rejected, changes };
  }

  /**
   * Delete a record and save
   * @returns whether the record existed
   */
  async remove(id: string): Promise<boolean> {
    const existing = await this.#repository.getById(id);
    await this.#repository.delete(id);
    if (existing) {
      await this.#repository.saveChanges();
    }
    return existing !== undefined;
  }
}
