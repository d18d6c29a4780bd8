import { VendorHistoryStore, type VendorHistorySeed } from "../src/adapters/loadVendorHistory.js";
import type { InvoiceInput } from "../src/adapters/loadInvoices.js";
import type { Invoice, LineItem } from "../src/types/invoice.js";
import type { LearnedHistorySource, LookupResult, PriceObservation } from "../src/types/observation.js";

export const seed: VendorHistorySeed = {
  version: "test-1",
  vendors: [
    {
      vendorId: "Acme",
      shippingMaxSeen: 60,
      items: [
        {
          item: "Staples Pack",
          observations: [
            { quantity: 4, unitPrice: 86, observedAt: "2025-01-01" },
            { quantity: 6, unitPrice: 90, observedAt: "2025-02-01" },
            { quantity: 5, unitPrice: 88, observedAt: "2025-03-01" },
          ],
        },
        {
          item: "Ergonomic Chair",
          observations: [
            { quantity: 140, unitPrice: 38, observedAt: "2025-01-01" },
            { quantity: 160, unitPrice: 40, observedAt: "2025-02-01" },
            { quantity: 150, unitPrice: 39, observedAt: "2025-03-01" },
          ],
        },
      ],
    },
    { vendorId: "Zenith", items: [] },
  ],
};

export function seedStore() {
  return VendorHistoryStore.fromSeed(seed, "test seed");
}

export function line(name: string, quantity: number, unitPrice: number, lineTotal?: number): LineItem {
  return { name, quantity, unitPrice, lineTotal: lineTotal ?? quantity * unitPrice };
}

export function invoice(overrides: Partial<Invoice> & Pick<Invoice, "invoiceId" | "lineItems">): Invoice {
  return {
    vendorName: "Test Vendor",
    invoiceDate: "2025-06-01",
    subtotal: null,
    tax: null,
    shipping: null,
    total: null,
    ...overrides,
  };
}

export function input(inv: Invoice, vendorId: string, confidence = 1): InvoiceInput {
  return {
    extracted: { invoice: inv, warnings: [] },
    match: { vendorId, confidence, method: "exact" },
  };
}

export class FakeLearned implements LearnedHistorySource {
  calls = 0;
  constructor(private readonly result: LookupResult = { kind: "found", observations: [] }) {}

  lookup(): LookupResult {
    this.calls++;
    return this.result;
  }
}

export function learnedObs(item: string, quantity: number, unitPrice: number): PriceObservation {
  return {
    vendorId: "Acme",
    item,
    quantity,
    unitPrice,
    observedAt: "2025-04-01",
    origin: "learned",
    invoiceId: "L-1",
  };
}
