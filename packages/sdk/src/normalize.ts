/**
 * Normalization: fills derived and default fields and reports each change.
 *
 * Every rule is a function of the record, the injected context and the
 * lookup tables only. A rule records a change only when it alters a value,
 * so normalizing an already-normalized record yields no changes.
 */

import type { DealContext } from "./context.js";
import { LookupTables, extractArea } from "./model/lookups.js";
import { cloneRecord, type DealRecord } from "./model/record.js";
import { joinTags, splitTags } from "./model/values.js";

export interface NormalizationChange {
  field: string;
  oldValue: string | null;
  newValue: string | null;
  reason: string;
}

export interface NormalizationResult {
  record: DealRecord;
  changes: NormalizationChange[];
}

const MAP_SEARCH_URL = "https://www.google.com/maps/search/?api=1&query=";

/**
 * Map search link for a postcode, prefixed with the installation address when known
 */
export function buildMapLink(postcode: string, installationLocation?: string): string {
  const address = installationLocation?.trim()
    ? `${installationLocation.trim()}, ${postcode.trim()}`
    : postcode.trim();
  return `${MAP_SEARCH_URL}${encodeURIComponent(address)}`;
}

/**
 * Case-insensitive dedupe of trimmed, non-blank tags; first spelling wins.
 * A tag holding a list separator is split, since the file could not keep it whole.
 */
export function cleanTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const tag of tags.flatMap(splitTags)) {
    const key = tag.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(tag);
  }
  return result;
}

export class Normalizer {
  readonly #context: DealContext;
  readonly #lookups: LookupTables;

  constructor(context: DealContext, lookups: LookupTables = LookupTables.createDefault()) {
    this.#context = context;
    this.#lookups = lookups;
  }

  get lookups(): LookupTables {
    return this.#lookups;
  }

  /**
   * Normalize a copy of `input`; the argument is never mutated
   */
  normalize(input: DealRecord): NormalizationResult {
    const record = cloneRecord(input);
    const changes: NormalizationChange[] = [];
    const change = (field: string, oldValue: string | undefined, newValue: string, reason: string) => {
      changes.push({ field, oldValue: oldValue ?? null, newValue, reason });
    };

    if (!record.id.trim()) {
      const id = this.#context.ids.next();
      change("DealId", undefined, id, "Auto-generated missing DealId");
      record.id = id;
    } else if (record.id !== record.id.trim()) {
      const id = record.id.trim();
      change("DealId", record.id, id, "Trimmed surrounding whitespace");
      record.id = id;
    }

    if (record.probability <= 0) {
      const probability = this.#lookups.probabilityFor(record.stage);
      if (probability !== record.probability) {
        change(
          "Probability",
          String(record.probability),
          String(probability),
          `Set default probability for stage ${record.stage}`
        );
        record.probability = probability;
      }
    }

    const postcode = record.postcode?.trim();
    if (postcode) {
      const area = extractArea(postcode);
      if (area && area !== record.postcodeArea) {
        change("PostcodeArea", record.postcodeArea, area, `Extracted from postcode ${postcode}`);
        record.postcodeArea = area;
      }

      if (!record.region?.trim() && record.postcodeArea) {
        const region = this.#lookups.regionForArea(record.postcodeArea);
        if (region) {
          change("Region", record.region, region, `Derived from postcode area ${record.postcodeArea}`);
          record.region = region;
        }
      }

      if (!record.mapLink?.trim()) {
        const mapLink = buildMapLink(postcode, record.installationLocation);
        change("MapLink", record.mapLink, mapLink, "Generated map link from address");
        record.mapLink = mapLink;
      }
    }

    if (!record.createdDate) {
      const today = this.#context.clock.today();
      change("CreatedDate", undefined, today, "Set default creation date");
      record.createdDate = today;
    }

    const before = joinTags(record.tags);
    record.tags = cleanTags(record.tags);
    const after = joinTags(record.tags);
    if (before !== after) {
      change("Tags", before, after, "Cleaned and deduplicated tags");
    }

    return { record, changes };
  }
}
