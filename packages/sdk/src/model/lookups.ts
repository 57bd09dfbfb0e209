/**
 * Static lookup tables used by normalization: postcode area → region and
 * stage → default probability. Defaults ship in data/area-regions.json and
 * may be overridden entry by entry from a file's Lookups table.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { DEFAULT_STAGE_PROBABILITIES, STAGES, type Stage } from "./stage.js";

const AreaRegionsFile = z.record(z.string().min(1), z.array(z.string().regex(/^[A-Z]{1,2}$/)));

let defaultAreaRegions: ReadonlyMap<string, string> | undefined;

function loadDefaultAreaRegions(): ReadonlyMap<string, string> {
  if (!defaultAreaRegions) {
    // src/model and dist/model sit at the same depth below the package root
    const raw: unknown = JSON.parse(
      readFileSync(new URL("../../data/area-regions.json", import.meta.url), "utf-8")
    );
    const byRegion = AreaRegionsFile.parse(raw);
    const map = new Map<string, string>();
    for (const [region, areas] of Object.entries(byRegion)) {
      for (const area of areas) {
        map.set(area, region);
      }
    }
    defaultAreaRegions = map;
  }
  return defaultAreaRegions;
}

/**
 * Leading letters of a postcode: "sw1a 1aa" → "SW"
 */
export function extractArea(postcode: string): string {
  const clean = postcode.trim().toUpperCase().replace(/\s+/g, "");
  return /^[A-Z]*/.exec(clean)?.[0] ?? "";
}

export interface LookupOverrides {
  areaRegions?: Iterable<readonly [string, string]>;
  stageProbabilities?: Partial<Record<Stage, number>>;
}

export class LookupTables {
  readonly #areaRegions: ReadonlyMap<string, string>;
  readonly #stageProbabilities: Readonly<Record<Stage, number>>;

  private constructor(areaRegions: ReadonlyMap<string, string>, stageProbabilities: Record<Stage, number>) {
    this.#areaRegions = areaRegions;
    this.#stageProbabilities = stageProbabilities;
  }

  static createDefault(): LookupTables {
    return new LookupTables(loadDefaultAreaRegions(), { ...DEFAULT_STAGE_PROBABILITIES });
  }

  /**
   * New tables with the given entries replacing or extending these
   */
  withOverrides(overrides: LookupOverrides): LookupTables {
    const areaRegions = new Map(this.#areaRegions);
    for (const [area, region] of overrides.areaRegions ?? []) {
      const key = area.trim().toUpperCase();
      if (key && region.trim()) {
        areaRegions.set(key, region.trim());
      }
    }
    const stageProbabilities = { ...this.#stageProbabilities };
    for (const stage of STAGES) {
      const value = overrides.stageProbabilities?.[stage];
      if (value !== undefined) {
        stageProbabilities[stage] = value;
      }
    }
    return new LookupTables(areaRegions, stageProbabilities);
  }

  regionForArea(area: string): string | undefined {
    return this.#areaRegions.get(area.toUpperCase());
  }

  regionForPostcode(postcode: string | undefined): string | undefined {
    if (!postcode?.trim()) return undefined;
    return this.regionForArea(extractArea(postcode));
  }

  probabilityFor(stage: Stage): number {
    return this.#stageProbabilities[stage];
  }

  /**
   * Area → region pairs sorted by area
   */
  areaRegionEntries(): Array<[string, string]> {
    return [...this.#areaRegions.entries()].sort(([a], [b]) => a.localeCompare(b));
  }

  /**
   * Stage → probability pairs in stage order
   */
  stageProbabilityEntries(): Array<[Stage, number]> {
    return STAGES.map((stage): [Stage, number] => [stage, this.#stageProbabilities[stage]]);
  }
}
