/**
 * Text ↔ value conversions shared by the workbook codec and the patch engine
 */

const MONEY_NOISE = /[£$€,\s]/g;

/**
 * "£12,500.50" → 12500.5
 * @returns undefined when the text is not a decimal after stripping currency noise
 */
export function parseMoney(text: string): number | undefined {
  const clean = text.replace(MONEY_NOISE, "");
  if (!/^-?\d+(\.\d+)?(e[+-]?\d+)?$/i.test(clean)) return undefined;
  return Number(clean);
}

/**
 * Plain decimal text for an amount: 5e-7 → "0.0000005", 1e21 → "1000000000000000000000"
 */
export function formatMoney(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const [, sign = "", lead = "", fraction = "", exponent = "0"] = match;
  const digits = lead + fraction;
  // Position of the decimal point within `digits`
  const point = 1 + Number(exponent);
  if (point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`;
  if (point >= digits.length) return sign + digits + "0".repeat(point - digits.length);
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Whole number, optionally with a trailing "%"
 */
export function parseWholeNumber(text: string): number | undefined {
  const clean = text.trim().replace(/%$/, "").trim();
  if (!/^-?\d+$/.test(clean)) return undefined;
  return Number(clean);
}

const TRUE_WORDS = new Set(["true", "yes", "y", "1"]);
const FALSE_WORDS = new Set(["false", "no", "n", "0"]);

export function parseBoolean(text: string): boolean | undefined {
  const word = text.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return undefined;
}

/**
 * Split a tag list on commas, semicolons or pipes; blanks dropped
 */
export function splitTags(text: string): string[] {
  return text
    .split(/[,;|]/)
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

export function joinTags(tags: readonly string[]): string {
  return tags.join(", ");
}

/**
 * Trimmed text, or undefined when blank
 */
export function optionalText(text: string | undefined): string | undefined {
  const value = text?.trim();
  return value ? value : undefined;
}
