/**
 * Field table: one entry per record field (plus the computed weighted
 * amount column), in file column order. The workbook codec and the patch
 * engine both dispatch on `kind`, so adding a field means adding a row here.
 */

import { weightedAmount, type DealRecord } from "./record.js";
import { formatMoney, joinTags } from "./values.js";

export type OptionalTextField =
  | "orderNo"
  | "userId"
  | "contactName"
  | "email"
  | "phone"
  | "postcode"
  | "postcodeArea"
  | "installationLocation"
  | "region"
  | "mapLink"
  | "leadSource"
  | "productLine"
  | "owner"
  | "nextStep"
  | "servicePlan"
  | "comments"
  | "promoterId"
  | "promoCode";

export type RequiredTextField = "accountName" | "dealName";

export type DateField =
  | "createdDate"
  | "lastContactedDate"
  | "nextStepDueDate"
  | "closeDate"
  | "lastServiceDate"
  | "nextServiceDueDate"
  | "commissionPaidDate";

export type MoneyField = "amount" | "promoterCommission";

export type FieldSpec = {
  /** Column header in the file and canonical patch name */
  header: string;
  /** Other accepted spellings, matched like the header */
  aliases: readonly string[];
  /** Maintained by normalization; never patched directly */
  derived?: boolean;
} & (
  | { kind: "id"; key: "id" }
  | { kind: "requiredText"; key: RequiredTextField; fallback: string }
  | { kind: "text"; key: OptionalTextField }
  | { kind: "stage"; key: "stage" }
  | { kind: "probability"; key: "probability" }
  | { kind: "money"; key: MoneyField }
  | { kind: "date"; key: DateField }
  | { kind: "bool"; key: "commissionPaid" }
  | { kind: "tags"; key: "tags" }
  | { kind: "weighted"; key: "weightedAmount" }
);

export type FieldKey = FieldSpec["key"];

export const FIELDS: readonly FieldSpec[] = [
  { kind: "id", key: "id", header: "DealId", aliases: ["ID"] },
  { kind: "text", key: "orderNo", header: "OrderNo", aliases: ["OrderNumber"] },
  { kind: "text", key: "userId", header: "UserId", aliases: [] },
  {
    kind: "requiredText",
    key: "accountName",
    header: "AccountName",
    aliases: ["Account", "Company"],
    fallback: "Unknown",
  },
  { kind: "text", key: "contactName", header: "ContactName", aliases: ["Contact"] },
  { kind: "text", key: "email", header: "Email", aliases: ["E-mail"] },
  { kind: "text", key: "phone", header: "Phone", aliases: ["Telephone", "Tel"] },
  { kind: "text", key: "postcode", header: "Postcode", aliases: ["Zip"] },
  { kind: "text", key: "postcodeArea", header: "PostcodeArea", aliases: [], derived: true },
  {
    kind: "text",
    key: "installationLocation",
    header: "InstallationLocation",
    aliases: ["Address"],
  },
  { kind: "text", key: "region", header: "Region", aliases: [], derived: true },
  { kind: "text", key: "mapLink", header: "MapLink", aliases: ["Map"], derived: true },
  { kind: "text", key: "leadSource", header: "LeadSource", aliases: ["Source"] },
  { kind: "text", key: "productLine", header: "ProductLine", aliases: ["Product"] },
  {
    kind: "requiredText",
    key: "dealName",
    header: "DealName",
    aliases: ["Deal", "Opportunity"],
    fallback: "Unnamed Deal",
  },
  { kind: "stage", key: "stage", header: "Stage", aliases: [] },
  { kind: "probability", key: "probability", header: "Probability", aliases: ["Prob"] },
  { kind: "money", key: "amount", header: "Amount", aliases: ["AmountGBP", "Value"] },
  {
    kind: "weighted",
    key: "weightedAmount",
    header: "WeightedAmount",
    aliases: ["WeightedAmountGBP"],
    derived: true,
  },
  { kind: "text", key: "owner", header: "Owner", aliases: ["SalesRep", "Rep"] },
  { kind: "date", key: "createdDate", header: "CreatedDate", aliases: ["Created"] },
  {
    kind: "date",
    key: "lastContactedDate",
    header: "LastContactedDate",
    aliases: ["LastContact"],
  },
  { kind: "text", key: "nextStep", header: "NextStep", aliases: [] },
  { kind: "date", key: "nextStepDueDate", header: "NextStepDueDate", aliases: ["NextStepDue"] },
  { kind: "date", key: "closeDate", header: "CloseDate", aliases: ["ExpectedClose"] },
  { kind: "text", key: "servicePlan", header: "ServicePlan", aliases: [] },
  { kind: "date", key: "lastServiceDate", header: "LastServiceDate", aliases: [] },
  { kind: "date", key: "nextServiceDueDate", header: "NextServiceDueDate", aliases: [] },
  { kind: "text", key: "comments", header: "Comments", aliases: ["Notes"] },
  { kind: "tags", key: "tags", header: "Tags", aliases: [] },
  { kind: "text", key: "promoterId", header: "PromoterId", aliases: [] },
  { kind: "text", key: "promoCode", header: "PromoCode", aliases: [] },
  {
    kind: "money",
    key: "promoterCommission",
    header: "PromoterCommission",
    aliases: ["Commission"],
  },
  { kind: "bool", key: "commissionPaid", header: "CommissionPaid", aliases: [] },
  { kind: "date", key: "commissionPaidDate", header: "CommissionPaidDate", aliases: [] },
];

/**
 * Comparison form of a field or column name: lowercase, no spaces or underscores
 */
export function fieldLookupKey(name: string): string {
  return name.replace(/[\s_]/g, "").toLowerCase();
}

const BY_NAME = new Map<string, FieldSpec>();
for (const spec of FIELDS) {
  for (const name of [spec.header, spec.key, ...spec.aliases]) {
    BY_NAME.set(fieldLookupKey(name), spec);
  }
}

/**
 * Resolve a header, record key or alias to its field
 */
export function findField(name: string): FieldSpec | undefined {
  return BY_NAME.get(fieldLookupKey(name));
}

/**
 * Text form of a field as written to the file; null when the field is empty
 */
export function formatField(record: DealRecord, spec: FieldSpec): string | null {
  switch (spec.kind) {
    case "id":
    case "requiredText":
    case "stage":
      return record[spec.key];
    case "text":
    case "date":
      return record[spec.key] ?? null;
    case "probability":
      return String(record.probability);
    case "money": {
      const value = record[spec.key];
      return value === undefined ? null : formatMoney(value);
    }
    case "weighted": {
      const value = weightedAmount(record);
      return value === undefined ? null : formatMoney(value);
    }
    case "bool":
      return record.commissionPaid ? "Yes" : "No";
    case "tags":
      return record.tags.length > 0 ? joinTags(record.tags) : null;
  }
}
