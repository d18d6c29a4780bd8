import type { VendorItemBaseline } from "./observation.js";

export type VerdictStatus = "IN_RANGE" | "OVERPRICED" | "UNDERPRICED" | "NO_HISTORY";

// "unreadable" means the learned store failed, which is not the same as having no data.
export type HistorySource = "static" | "learned" | "none" | "unreadable";

export type ComparisonVerdict = Readonly<{
  item: string;
  quantity: number;
  unitPrice: number;
  status: VerdictStatus;
  historySource: HistorySource;
  baseline: VendorItemBaseline | null;
  quantityFactor: number | null;
  adjustedBaseline: number | null;
  expectedRange: Readonly<{ low: number; high: number }> | null;
  deviationRatio: number | null;
}>;

export type MathFinding = Readonly<{
  item: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
  expectedTotal: number;
  difference: number;
  ok: boolean;
}>;

export type ObservationStatus = "OK" | "OBSERVATION";

export type Observation = Readonly<{
  status: ObservationStatus;
  note: string;
}>;

export type TaxShippingStatus = Readonly<{
  tax: Observation;
  shipping: Observation;
  totals: Observation;
}>;

export type DecisionStatus = "APPROVED" | "FLAGGED";

export type ReasonKind =
  | "PRICE_ANOMALY"
  | "NO_HISTORY"
  | "HISTORY_UNREADABLE"
  | "MATH_MISMATCH"
  | "VENDOR_LOW_CONFIDENCE";

export type QuestionCategory =
  | "price_anomaly"
  | "pricing_pattern"
  | "no_history"
  | "math_mismatch"
  | "vendor_confidence"
  | "generic";

export type ReconciliationSummary = Readonly<{
  itemsChecked: number;
  itemsInRange: number;
  itemsOutOfRange: number;
  itemsNoHistory: number;
  mathIssues: number;
  taxStatus: ObservationStatus;
  shippingStatus: ObservationStatus;
  totalsStatus: ObservationStatus;
  historyDegraded: boolean;
  extractionWarnings: readonly string[];
}>;

export type Decision = Readonly<{
  status: DecisionStatus;
  reasonCodes: readonly string[];
  clarifyingQuestions: readonly string[];
  summary: ReconciliationSummary;
}>;
