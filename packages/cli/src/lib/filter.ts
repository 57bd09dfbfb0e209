/**
 * Query filter input: JSON validated into a DealFilter
 */

import { z } from "zod";
import { InvalidArgumentError } from "commander";
import { isIsoDate, matchStage, type DealFilter } from "@dealbook/sdk";

const isoDate = z.string().refine(isIsoDate, { message: "Expected a yyyy-MM-dd date" });

const stage = z.string().transform((value, ctx) => {
  const matched = value.trim() ? matchStage(value) : undefined;
  if (!matched) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown stage: ${value}` });
    return z.NEVER;
  }
  return matched;
});

const amount = z.number().nonnegative();

export const FilterSchema = z
  .object({
    searchText: z.string().optional(),
    stages: z.array(stage).optional(),
    owner: z.string().optional(),
    region: z.string().optional(),
    productLine: z.string().optional(),
    minAmount: amount.optional(),
    maxAmount: amount.optional(),
    closeDateFrom: isoDate.optional(),
    closeDateTo: isoDate.optional(),
    nextStepDueBefore: isoDate.optional(),
    hasOverdueNextStep: z.boolean().optional(),
    noContactDays: z.number().int().nonnegative().optional(),
    tags: z.array(z.string()).optional(),
    promoterId: z.string().optional(),
    promoCode: z.string().optional(),
    hasPromoter: z.boolean().optional(),
  })
  .strict();

/**
 * Validate a parsed JSON value as a filter
 * @throws InvalidArgumentError listing every problem
 */
export function parseFilter(raw: unknown): DealFilter {
  const parsed = FilterSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new InvalidArgumentError(`Invalid filter: ${problems.join("; ")}`);
  }
  return parsed.data;
}
