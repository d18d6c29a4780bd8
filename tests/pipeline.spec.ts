import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseInvoiceBatch } from "../src/adapters/loadInvoices.js";
import { LearningDatabase } from "../src/db/learningDatabase.js";
import { IN_MEMORY } from "../src/db/sqlite.js";
import { FIRST_ORDER_QUESTION, GENERIC_QUESTION } from "../src/engine/decisionEngine.js";
import { learnFromApproval, learnIfApproved } from "../src/engine/learnFromApproval.js";
import { createEngine, runBatch, runPipeline } from "../src/engine/runPipeline.js";
import { input, invoice, line, seedStore } from "./fixtures.js";

describe("runPipeline", () => {
  let learning: LearningDatabase;

  beforeEach(() => {
    learning = LearningDatabase.open(IN_MEMORY);
  });

  afterEach(() => {
    learning.close();
    vi.restoreAllMocks();
  });

  it("flags a first order, then approves a repeat order after the first is approved", () => {
    const engine = createEngine({ history: seedStore(), learned: learning });

    const firstInvoice = invoice({ invoiceId: "ZCG-0001", lineItems: [line("Catering Tray", 4, 45)] });
    const first = runPipeline(engine, input(firstInvoice, "Zenith", 0.95));

    expect(first.decision.status).toBe("FLAGGED");
    expect(first.decision.reasonCodes).toEqual(["NO_HISTORY:Catering Tray"]);
    expect(first.decision.clarifyingQuestions).toEqual([FIRST_ORDER_QUESTION]);

    const learned = learnFromApproval(learning, first, firstInvoice, {
      invoiceId: "ZCG-0001",
      finalDecision: "approved",
      decidedAt: "2025-05-06",
    });
    expect(learned.ok && !learned.skipped && learned.observations).toHaveLength(1);

    const repeatInvoice = invoice({ invoiceId: "ZCG-0002", lineItems: [line("Catering Tray", 5, 48)] });
    const repeat = runPipeline(engine, input(repeatInvoice, "Zenith", 0.95));

    expect(repeat.verdicts[0].historySource).toBe("learned");
    expect(repeat.decision.status).toBe("APPROVED");
    expect(repeat.decision.clarifyingQuestions).toEqual([GENERIC_QUESTION]);
  });

  it("does not learn from a rejected invoice", () => {
    const engine = createEngine({ history: seedStore(), learned: learning });
    const inv = invoice({ invoiceId: "ZCG-0003", lineItems: [line("Catering Tray", 4, 400)] });
    const result = runPipeline(engine, input(inv, "Zenith"));

    const res = learnFromApproval(learning, result, inv, {
      invoiceId: "ZCG-0003",
      finalDecision: "rejected",
      decidedAt: "2025-05-06",
    });

    expect(res).toEqual({ ok: false, error: "Invoice ZCG-0003 was not approved; nothing recorded." });
    expect(learning.stats().observations).toBe(0);
  });

  it("refuses an approval that belongs to another invoice", () => {
    const engine = createEngine({ history: seedStore(), learned: learning });
    const inv = invoice({ invoiceId: "ZCG-0004", lineItems: [line("Catering Tray", 4, 45)] });
    const result = runPipeline(engine, input(inv, "Zenith"));

    const res = learnFromApproval(learning, result, inv, {
      invoiceId: "ZCG-9999",
      finalDecision: "approved",
      decidedAt: "2025-05-06",
    });

    expect(res).toEqual({ ok: false, error: "Approval for ZCG-9999 does not match invoice ZCG-0004." });
  });

  it("never writes to the learning database while deciding", () => {
    const engine = createEngine({ history: seedStore(), learned: learning });
    runPipeline(engine, input(invoice({ invoiceId: "ZCG-0005", lineItems: [line("Catering Tray", 4, 45)] }), "Zenith"));

    expect(learning.stats()).toEqual({ observations: 0, vendors: 0, items: 0, invoicesLearned: 0 });
  });

  it("degrades to HISTORY_UNREADABLE when the learning database is unavailable", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const engine = createEngine({ history: seedStore(), learned: learning });
    learning.close();

    const result = runPipeline(
      engine,
      input(
        invoice({ invoiceId: "MIX-1", lineItems: [line("Staples Pack", 5, 88), line("Catering Tray", 4, 45)] }),
        "Acme"
      )
    );

    expect(result.verdicts.map((v) => [v.status, v.historySource])).toEqual([
      ["IN_RANGE", "static"],
      ["NO_HISTORY", "unreadable"],
    ]);
    expect(result.decision.reasonCodes).toEqual(["HISTORY_UNREADABLE:Catering Tray"]);
  });

  it("runs a parsed batch with each invoice decided on its own", () => {
    const batch = parseInvoiceBatch([
      {
        invoice: {
          invoiceId: "ACM-2041",
          vendorName: "Acme Supplies Inc.",
          lineItems: [{ name: "Staples Pack", quantity: 10, unitPrice: 8, lineTotal: 80 }],
          subtotal: 80,
          tax: 6,
          shipping: 0,
          total: 86,
        },
        match: { vendorId: "Acme", confidence: 1, method: "exact" },
      },
      {
        invoice: {
          invoiceId: "ACM-2042",
          vendorName: "Acme Supplies Inc.",
          lineItems: [{ name: "Ergonomic Chair", quantity: 2, unitPrice: 90, lineTotal: 180 }],
        },
        warnings: ["LOW_OCR_CONFIDENCE"],
        match: { vendorId: "Acme", confidence: 0.9, method: "alias" },
      },
    ]);

    const results = runBatch(createEngine({ history: seedStore(), learned: learning }), batch);

    expect(results.map((r) => [r.invoiceId, r.decision.status])).toEqual([
      ["ACM-2041", "FLAGGED"],
      ["ACM-2042", "APPROVED"],
    ]);
    expect(results[0].taxShipping.tax.status).toBe("OK");
    expect(results[1].matchMethod).toBe("alias");
    expect(results[1].decision.summary.extractionWarnings).toEqual(["LOW_OCR_CONFIDENCE"]);
  });
});

describe("parseInvoiceBatch", () => {
  it("rejects a line with a non-positive quantity", () => {
    expect(() =>
      parseInvoiceBatch([
        {
          invoice: {
            invoiceId: "BAD-1",
            vendorName: "Acme",
            lineItems: [{ name: "Staples Pack", quantity: 0, unitPrice: 8, lineTotal: 0 }],
          },
          match: { vendorId: "Acme", confidence: 1, method: "exact" },
        },
      ])
    ).toThrow(/^Invalid invoice batch: 0\.invoice\.lineItems\.0\.quantity: /);
  });

  it("rejects a vendor confidence outside 0..1", () => {
    expect(() =>
      parseInvoiceBatch([
        {
          invoice: { invoiceId: "BAD-2", vendorName: "Acme", lineItems: [] },
          match: { vendorId: "Acme", confidence: 1.2, method: "exact" },
        },
      ])
    ).toThrow(/match\.confidence/);
  });
});

describe("learnIfApproved", () => {
  let learning: LearningDatabase;

  beforeEach(() => {
    learning = LearningDatabase.open(IN_MEMORY);
  });

  afterEach(() => {
    learning.close();
  });

  it("records an invoice the engine approved", () => {
    const engine = createEngine({ history: seedStore(), learned: learning });
    const inv = invoice({ invoiceId: "ACM-3001", lineItems: [line("Staples Pack", 5, 88)] });
    const result = runPipeline(engine, input(inv, "Acme"));

    const res = learnIfApproved(learning, result, inv, "2025-06-01");

    expect(res !== null && res.ok && !res.skipped && res.observations).toHaveLength(1);
    expect(learning.stats().invoicesLearned).toBe(1);
  });

  it("leaves a flagged invoice for a reviewer", () => {
    const engine = createEngine({ history: seedStore(), learned: learning });
    const inv = invoice({ invoiceId: "ACM-3002", lineItems: [line("Staples Pack", 10, 8)] });
    const result = runPipeline(engine, input(inv, "Acme"));

    expect(result.decision.status).toBe("FLAGGED");
    expect(learnIfApproved(learning, result, inv, "2025-06-01")).toBeNull();
    expect(learning.stats()).toEqual({ observations: 0, vendors: 0, items: 0, invoicesLearned: 0 });
  });
});
