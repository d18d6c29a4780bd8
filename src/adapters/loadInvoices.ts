import fs from "node:fs";
import { z } from "zod";
import type { ExtractedInvoice, VendorMatch } from "../types/invoice.js";

const LineItemSchema = z.object({
  name: z.string().trim().min(1),
  quantity: z.number().finite().positive(),
  unitPrice: z.number().finite().nonnegative(),
  lineTotal: z.number().finite(),
});

const InvoiceSchema = z.object({
  invoiceId: z.string().min(1),
  vendorName: z.string(),
  invoiceDate: z.string().nullable().default(null),
  lineItems: z.array(LineItemSchema),
  subtotal: z.number().finite().nullable().default(null),
  tax: z.number().finite().nullable().default(null),
  shipping: z.number().finite().nullable().default(null),
  total: z.number().finite().nullable().default(null),
});

const VendorMatchSchema = z.object({
  vendorId: z.string().trim().min(1),
  confidence: z.number().min(0).max(1),
  method: z.enum(["exact", "alias", "fuzzy"]),
});

const BatchEntrySchema = z.object({
  invoice: InvoiceSchema,
  warnings: z.array(z.string()).default([]),
  match: VendorMatchSchema,
});

const BatchSchema = z.array(BatchEntrySchema);

export type InvoiceInput = {
  extracted: ExtractedInvoice;
  match: VendorMatch;
};

export function parseInvoiceBatch(raw: unknown): InvoiceInput[] {
  const parsed = BatchSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid invoice batch: ${detail}`);
  }

  return parsed.data.map((entry) => ({
    extracted: { invoice: entry.invoice, warnings: entry.warnings },
    match: entry.match,
  }));
}

export function loadInvoices(filePath: string): InvoiceInput[] {
  return parseInvoiceBatch(JSON.parse(fs.readFileSync(filePath, "utf-8")));
}
