/**
 * Record filter: a conjunction of optional predicates. An empty filter matches everything.
 */

import { daysBetween, type IsoDate } from "../dates.js";
import { hasPromoter, type DealRecord } from "./record.js";
import type { Stage } from "./stage.js";

export interface DealFilter {
  /** Case-insensitive substring of dealName, accountName, contactName, id or owner */
  searchText?: string;
  stages?: Stage[];
  owner?: string;
  region?: string;
  productLine?: string;
  minAmount?: number;
  maxAmount?: number;
  closeDateFrom?: IsoDate;
  closeDateTo?: IsoDate;
  /** Records without a due date pass */
  nextStepDueBefore?: IsoDate;
  /** When true, only records whose next step fell due before the reference date */
  hasOverdueNextStep?: boolean;
  /** Never-contacted records always count */
  noContactDays?: number;
  /** Record must carry every listed tag */
  tags?: string[];
  promoterId?: string;
  promoCode?: string;
  hasPromoter?: boolean;
}

function equalsIgnoreCase(actual: string | undefined, expected: string): boolean {
  return actual !== undefined && actual.toLowerCase() === expected.toLowerCase();
}

function isSet(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

/**
 * Evaluate a filter against one record. Time-relative predicates use
 * `referenceDate`, never the wall clock.
 */
export function matchesFilter(record: DealRecord, filter: DealFilter, referenceDate: IsoDate): boolean {
  if (isSet(filter.searchText)) {
    const needle = filter.searchText.toLowerCase();
    const haystack = [record.dealName, record.accountName, record.contactName, record.id, record.owner];
    if (!haystack.some((value) => value?.toLowerCase().includes(needle))) return false;
  }

  if (filter.stages && filter.stages.length > 0 && !filter.stages.includes(record.stage)) {
    return false;
  }

  if (isSet(filter.owner) && !equalsIgnoreCase(record.owner, filter.owner)) return false;
  if (isSet(filter.region) && !equalsIgnoreCase(record.region, filter.region)) return false;
  if (isSet(filter.productLine) && !equalsIgnoreCase(record.productLine, filter.productLine)) {
    return false;
  }

  if (filter.minAmount !== undefined) {
    if (record.amount === undefined || record.amount < filter.minAmount) return false;
  }
  if (filter.maxAmount !== undefined) {
    if (record.amount === undefined || record.amount > filter.maxAmount) return false;
  }

  // IsoDate strings order the same as the dates they name
  if (filter.closeDateFrom !== undefined) {
    if (record.closeDate === undefined || record.closeDate < filter.closeDateFrom) return false;
  }
  if (filter.closeDateTo !== undefined) {
    if (record.closeDate === undefined || record.closeDate > filter.closeDateTo) return false;
  }

  if (
    filter.nextStepDueBefore !== undefined &&
    record.nextStepDueDate !== undefined &&
    record.nextStepDueDate > filter.nextStepDueBefore
  ) {
    return false;
  }

  if (filter.hasOverdueNextStep === true) {
    if (record.nextStepDueDate === undefined || record.nextStepDueDate >= referenceDate) return false;
  }

  if (filter.noContactDays !== undefined && record.lastContactedDate !== undefined) {
    if (daysBetween(record.lastContactedDate, referenceDate) < filter.noContactDays) return false;
  }

  if (filter.tags && filter.tags.length > 0) {
    const carried = new Set(record.tags.map((tag) => tag.toLowerCase()));
    if (!filter.tags.every((tag) => carried.has(tag.toLowerCase()))) return false;
  }

  if (isSet(filter.promoterId) && !equalsIgnoreCase(record.promoterId, filter.promoterId)) {
    return false;
  }
  if (isSet(filter.promoCode) && !equalsIgnoreCase(record.promoCode, filter.promoCode)) {
    return false;
  }
  if (filter.hasPromoter !== undefined && hasPromoter(record) !== filter.hasPromoter) {
    return false;
  }

  return true;
}
