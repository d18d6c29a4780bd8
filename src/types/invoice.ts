export type LineItem = {
  name: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
};

export type Invoice = {
  invoiceId: string;
  vendorName: string;
  invoiceDate: string | null;
  lineItems: LineItem[];
  subtotal: number | null;
  tax: number | null;
  shipping: number | null;
  total: number | null;
};

// What the extraction step hands over. Warnings are informational only.
export type ExtractedInvoice = {
  invoice: Invoice;
  warnings: string[];
};

export type MatchMethod = "exact" | "alias" | "fuzzy";

export type VendorMatch = {
  vendorId: string;
  confidence: number;
  method: MatchMethod;
};
