import type { InvoiceRecordResult, LearningDatabase } from "../db/learningDatabase.js";
import type { Invoice } from "../types/invoice.js";
import type { InvoiceResult } from "./runPipeline.js";

export type HumanDecision = {
  invoiceId: string;
  finalDecision: "approved" | "rejected";
  decidedAt: string;
};

/**
 * Feeds an invoice's prices into the learning database once a human has
 * signed it off. Rejected invoices teach nothing; their prices would
 * otherwise become tomorrow's baseline.
 */
export function learnFromApproval(
  learning: LearningDatabase,
  result: InvoiceResult,
  invoice: Invoice,
  human: HumanDecision,
  now?: Date
): InvoiceRecordResult {
  if (human.invoiceId !== result.invoiceId || invoice.invoiceId !== result.invoiceId) {
    return {
      ok: false,
      error: `Approval for ${human.invoiceId} does not match invoice ${result.invoiceId}.`,
    };
  }

  if (human.finalDecision !== "approved") {
    return { ok: false, error: `Invoice ${result.invoiceId} was not approved; nothing recorded.` };
  }

  return learning.recordApprovedInvoice(
    {
      invoiceId: result.invoiceId,
      vendorId: result.vendorId,
      lines: invoice.lineItems.map((li) => ({
        item: li.name,
        quantity: li.quantity,
        unitPrice: li.unitPrice,
      })),
      approvedAt: human.decidedAt,
    },
    now
  );
}

/**
 * Sign-off for unattended runs: only invoices the engine already approved
 * are recorded. A FLAGGED invoice returns null and waits for a reviewer.
 */
export function learnIfApproved(
  learning: LearningDatabase,
  result: InvoiceResult,
  invoice: Invoice,
  decidedAt: string,
  now?: Date
): InvoiceRecordResult | null {
  if (result.decision.status !== "APPROVED") return null;

  return learnFromApproval(
    learning,
    result,
    invoice,
    { invoiceId: result.invoiceId, finalDecision: "approved", decidedAt },
    now
  );
}
