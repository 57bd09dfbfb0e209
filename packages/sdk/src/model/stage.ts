/**
 * Pipeline stages and their default win probabilities
 */

export const STAGES = [
  "Lead",
  "Qualified",
  "Discovery",
  "Proposal",
  "Negotiation",
  "Closed Won",
  "Closed Lost",
  "On Hold",
  "Other",
] as const;

export type Stage = (typeof STAGES)[number];

export const DEFAULT_STAGE_PROBABILITIES: Readonly<Record<Stage, number>> = {
  Lead: 10,
  Qualified: 20,
  Discovery: 40,
  Proposal: 60,
  Negotiation: 80,
  "Closed Won": 100,
  "Closed Lost": 0,
  "On Hold": 10,
  Other: 10,
};

function squash(value: string): string {
  return value.replace(/[\s_-]/g, "").toLowerCase();
}

const STAGE_KEYS = new Map<string, Stage>([
  ...STAGES.map((stage): [string, Stage] => [squash(stage), stage]),
  ["won", "Closed Won"],
  ["lost", "Closed Lost"],
  ["hold", "On Hold"],
]);

/**
 * Match text against the stage names, ignoring case, spaces, hyphens and underscores
 * @returns undefined for unrecognised text; "Lead" for blank text
 */
export function matchStage(input: string): Stage | undefined {
  const key = squash(input);
  if (!key) return "Lead";
  return STAGE_KEYS.get(key);
}

/**
 * Lenient parse used when reading files: unrecognised text becomes "Other"
 */
export function parseStage(input: string): Stage {
  return matchStage(input) ?? "Other";
}

export function isStage(value: unknown): value is Stage {
  return typeof value === "string" && STAGES.some((stage) => stage === value);
}
