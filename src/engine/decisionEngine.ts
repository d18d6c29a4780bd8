import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config.js";
import type {
  ComparisonVerdict,
  Decision,
  MathFinding,
  QuestionCategory,
  ReasonKind,
  ReconciliationSummary,
  TaxShippingStatus,
} from "../types/decision.js";
import { normalizeKey } from "../utils/keys.js";

export type DecisionInput = {
  vendorId: string;
  vendorMatchConfidence: number;
  verdicts: readonly ComparisonVerdict[];
  mathFindings: readonly MathFinding[];
  taxShipping: TaxShippingStatus;
  extractionWarnings?: readonly string[];
};

const REASON_ORDER: readonly ReasonKind[] = [
  "PRICE_ANOMALY",
  "NO_HISTORY",
  "HISTORY_UNREADABLE",
  "MATH_MISMATCH",
  "VENDOR_LOW_CONFIDENCE",
];

export const GENERIC_QUESTION =
  "This invoice passed all automated checks. Please confirm the quantities and descriptions match what was actually received before final approval.";

export const FIRST_ORDER_QUESTION = "Is this a first-time order? Confirm contract terms.";

export const PRICING_PATTERN_QUESTION =
  "Every line item is priced outside the historical range. Has there been a contract renegotiation or pricing restructure?";

type Trigger = { kind: ReasonKind; item: string | null };

function uniq(values: string[]) {
  return [...new Set(values)];
}

// First spelling wins; items match the way history lookups do.
function uniqItems(items: string[]) {
  const seen = new Map<string, string>();
  for (const item of items) {
    const key = normalizeKey(item);
    if (!seen.has(key)) seen.set(key, item);
  }
  return [...seen.values()];
}

function triggerKey(t: Trigger) {
  return t.item === null ? t.kind : `${t.kind}:${normalizeKey(t.item)}`;
}

function collectTriggers(input: DecisionInput, config: EngineConfig): Trigger[] {
  const triggers: Trigger[] = [];

  for (const v of input.verdicts) {
    if (v.status === "OVERPRICED" || v.status === "UNDERPRICED") {
      triggers.push({ kind: "PRICE_ANOMALY", item: v.item });
    } else if (v.status === "NO_HISTORY") {
      triggers.push({
        kind: v.historySource === "unreadable" ? "HISTORY_UNREADABLE" : "NO_HISTORY",
        item: v.item,
      });
    }
  }

  for (const m of input.mathFindings) {
    if (!m.ok) triggers.push({ kind: "MATH_MISMATCH", item: m.item });
  }

  if (input.vendorMatchConfidence < config.vendorConfidenceThreshold) {
    triggers.push({ kind: "VENDOR_LOW_CONFIDENCE", item: null });
  }

  return triggers;
}

function reasonCodes(triggers: Trigger[]): string[] {
  const ranked = [...triggers].sort(
    (a, b) => REASON_ORDER.indexOf(a.kind) - REASON_ORDER.indexOf(b.kind)
  );
  const codes = new Map<string, string>();
  for (const t of ranked) {
    const key = triggerKey(t);
    if (!codes.has(key)) codes.set(key, t.item === null ? t.kind : `${t.kind}:${t.item}`);
  }
  return [...codes.values()];
}

function itemsOf(triggers: Trigger[], kinds: ReasonKind[]) {
  return uniqItems(
    triggers.flatMap((t) => (kinds.includes(t.kind) && t.item !== null ? [t.item] : []))
  );
}

function priceQuestion(input: DecisionInput, config: EngineConfig): string | null {
  const anomalies = input.verdicts.filter(
    (v) => v.status === "OVERPRICED" || v.status === "UNDERPRICED"
  );
  if (anomalies.length === 0) return null;

  const details = uniq(
    anomalies.map((v) => {
      const expected = v.adjustedBaseline === null ? "n/a" : `$${v.adjustedBaseline.toFixed(2)}`;
      const dir = v.status === "OVERPRICED" ? "over" : "under";
      return `${v.item} ($${v.unitPrice.toFixed(2)} vs expected ${expected}, ${dir})`;
    })
  );

  return (
    `Price anomalies beyond the ${config.priceLowRatio}x–${config.priceHighRatio}x range: ` +
    `${details.join("; ")}. Please verify these prices with the vendor before approving.`
  );
}

function pricingPatternQuestion(input: DecisionInput): string | null {
  const priced = input.verdicts.filter((v) => v.status !== "NO_HISTORY");
  const distinct = new Set(priced.map((v) => normalizeKey(v.item)));
  if (distinct.size < 2) return null;

  const allOut = priced.every((v) => v.status === "OVERPRICED" || v.status === "UNDERPRICED");
  return allOut ? PRICING_PATTERN_QUESTION : null;
}

function questionFor(
  category: QuestionCategory,
  input: DecisionInput,
  triggers: Trigger[],
  config: EngineConfig
): string | null {
  switch (category) {
    case "price_anomaly":
      return priceQuestion(input, config);
    case "pricing_pattern":
      return pricingPatternQuestion(input);
    case "no_history": {
      if (itemsOf(triggers, ["NO_HISTORY"]).length > 0) return FIRST_ORDER_QUESTION;
      const unreadable = itemsOf(triggers, ["HISTORY_UNREADABLE"]);
      if (unreadable.length === 0) return null;
      return `Price history could not be read for: ${unreadable.join(", ")}. Verify these prices manually before approving.`;
    }
    case "math_mismatch": {
      const items = itemsOf(triggers, ["MATH_MISMATCH"]);
      if (items.length === 0) return null;
      return `The line math doesn't add up for: ${items.join(", ")}. Is this a rounding issue, or is a quantity or amount wrong?`;
    }
    case "vendor_confidence": {
      if (!triggers.some((t) => t.kind === "VENDOR_LOW_CONFIDENCE")) return null;
      const confidence = Math.round(input.vendorMatchConfidence * 100);
      return `Vendor matched to '${input.vendorId}' with only ${confidence}% confidence. Is this the correct vendor?`;
    }
    case "generic":
      return null;
  }
}

const QUESTION_ORDER: readonly QuestionCategory[] = [
  "price_anomaly",
  "pricing_pattern",
  "no_history",
  "math_mismatch",
  "vendor_confidence",
];

function clarifyingQuestions(
  input: DecisionInput,
  triggers: Trigger[],
  config: EngineConfig
): string[] {
  const limit = Math.min(3, Math.max(1, Math.floor(config.maxQuestions)));
  const questions = QUESTION_ORDER.flatMap((c) => {
    const q = questionFor(c, input, triggers, config);
    return q === null ? [] : [q];
  });

  if (questions.length === 0) return [GENERIC_QUESTION];
  return questions.slice(0, limit);
}

function summarize(input: DecisionInput): ReconciliationSummary {
  const { verdicts } = input;
  return Object.freeze({
    itemsChecked: verdicts.length,
    itemsInRange: verdicts.filter((v) => v.status === "IN_RANGE").length,
    itemsOutOfRange: verdicts.filter((v) => v.status === "OVERPRICED" || v.status === "UNDERPRICED")
      .length,
    itemsNoHistory: verdicts.filter((v) => v.status === "NO_HISTORY").length,
    mathIssues: input.mathFindings.filter((m) => !m.ok).length,
    taxStatus: input.taxShipping.tax.status,
    shippingStatus: input.taxShipping.shipping.status,
    totalsStatus: input.taxShipping.totals.status,
    historyDegraded: verdicts.some((v) => v.historySource === "unreadable"),
    extractionWarnings: Object.freeze([...(input.extractionWarnings ?? [])]),
  });
}

/**
 * Turns comparator output into an invoice-level decision.
 *
 * Pure: no I/O, no clock, no hidden state. Any single trigger flags the
 * invoice; nothing is weighed against anything else. Tax, shipping and
 * totals observations only appear in the summary.
 */
export function decide(input: DecisionInput, config: EngineConfig = DEFAULT_ENGINE_CONFIG): Decision {
  const triggers = collectTriggers(input, config);

  return Object.freeze({
    status: triggers.length > 0 ? "FLAGGED" : "APPROVED",
    reasonCodes: Object.freeze(reasonCodes(triggers)),
    clarifyingQuestions: Object.freeze(clarifyingQuestions(input, triggers, config)),
    summary: summarize(input),
  });
}
