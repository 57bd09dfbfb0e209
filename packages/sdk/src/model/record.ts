/**
 * The pipeline record and helpers that operate on whole records
 */

import type { IsoDate } from "../dates.js";
import type { Stage } from "./stage.js";

export interface DealRecord {
  /** Unique key, compared case-insensitively */
  id: string;
  orderNo?: string;
  userId?: string;
  accountName: string;
  contactName?: string;
  email?: string;
  phone?: string;
  /** Raw location as entered */
  postcode?: string;
  /** Derived from postcode */
  postcodeArea?: string;
  installationLocation?: string;
  /** Derived from postcodeArea when unset */
  region?: string;
  /** Derived from postcode when unset */
  mapLink?: string;
  leadSource?: string;
  productLine?: string;
  dealName: string;
  stage: Stage;
  /** Whole percent, 0-100 */
  probability: number;
  amount?: number;
  owner?: string;
  createdDate?: IsoDate;
  lastContactedDate?: IsoDate;
  nextStep?: string;
  nextStepDueDate?: IsoDate;
  closeDate?: IsoDate;
  servicePlan?: string;
  lastServiceDate?: IsoDate;
  nextServiceDueDate?: IsoDate;
  comments?: string;
  tags: string[];
  promoterId?: string;
  promoCode?: string;
  promoterCommission?: number;
  commissionPaid: boolean;
  commissionPaidDate?: IsoDate;
  /** Columns found in the file that this version does not know, by header */
  extra?: Record<string, string>;
}

/**
 * New record with required fields defaulted
 */
export function createRecord(fields: Partial<DealRecord> = {}): DealRecord {
  return {
    id: "",
    accountName: "",
    dealName: "",
    stage: "Lead",
    probability: 0,
    tags: [],
    commissionPaid: false,
    ...fields,
  };
}

/**
 * Deep copy; callers never receive a reference to stored state
 */
export function cloneRecord(record: DealRecord): DealRecord {
  return structuredClone(record);
}

export function sameId(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * amount × probability / 100, rounded to pence; undefined without an amount
 */
export function weightedAmount(record: DealRecord): number | undefined {
  if (record.amount === undefined) return undefined;
  return Math.round(record.amount * record.probability) / 100;
}

export function hasPromoter(record: DealRecord): boolean {
  return Boolean(record.promoterId?.trim() || record.promoCode?.trim());
}
