/**
 * Record fixtures. Values are placeholders, not real customers.
 */

import { createRecord, type DealRecord } from "@dealbook/sdk";

let counter = 0;

/**
 * A complete, already-normalized record; override any field
 */
export function makeRecord(overrides: Partial<DealRecord> = {}): DealRecord {
  counter++;
  const n = String(counter).padStart(3, "0");
  return createRecord({
    id: `D-20250101-TEST${n}`,
    accountName: `Account ${n}`,
    dealName: `Deal ${n}`,
    stage: "Qualified",
    probability: 20,
    amount: 10000,
    owner: "Alice",
    createdDate: "2025-01-01",
    tags: [],
    commissionPaid: false,
    ...overrides,
  });
}

/**
 * Small mixed pipeline used by query and round-trip tests
 */
export function samplePipeline(): DealRecord[] {
  return [
    createRecord({
      id: "D-20250101-00000001",
      orderNo: "ORD-1",
      accountName: "Northwind Heating",
      contactName: "Pat Example",
      email: "pat@example.com",
      phone: "01000 000001",
      postcode: "SW1A 1AA",
      postcodeArea: "SW",
      region: "London",
      mapLink: "https://www.google.com/maps/search/?api=1&query=SW1A%201AA",
      leadSource: "Referral",
      productLine: "Heat Pump",
      dealName: "Heat pump install",
      stage: "Proposal",
      probability: 60,
      amount: 75000,
      owner: "Alice",
      createdDate: "2025-01-10",
      lastContactedDate: "2025-03-01",
      nextStep: "Send quote",
      nextStepDueDate: "2025-03-10",
      closeDate: "2025-04-30",
      comments: "Wants a site survey first",
      tags: ["urgent", "residential"],
      promoterId: "P-001",
      promoCode: "SPRING",
      promoterCommission: 750.5,
      commissionPaid: true,
      commissionPaidDate: "2025-02-01",
    }),
    createRecord({
      id: "D-20250101-00000002",
      accountName: "Blue Tit Bakery",
      postcode: "M1 1AA",
      postcodeArea: "M",
      region: "North West",
      mapLink: "https://www.google.com/maps/search/?api=1&query=M1%201AA",
      productLine: "Solar",
      dealName: "Solar panels",
      stage: "Negotiation",
      probability: 80,
      amount: 30000,
      owner: "Bob",
      createdDate: "2025-02-02",
      nextStepDueDate: "2025-03-20",
      closeDate: "2025-03-31",
      tags: ["commercial"],
      commissionPaid: false,
    }),
    createRecord({
      id: "D-20250101-00000003",
      accountName: "Quiet Lane Farm",
      dealName: "Boiler service plan",
      stage: "Closed Lost",
      probability: 0,
      owner: "alice",
      createdDate: "2024-11-20",
      lastContactedDate: "2024-12-01",
      servicePlan: "Annual",
      lastServiceDate: "2024-12-01",
      nextServiceDueDate: "2025-12-01",
      tags: [],
      commissionPaid: false,
    }),
  ];
}
