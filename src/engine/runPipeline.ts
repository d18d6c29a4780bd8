import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config.js";
import type { InvoiceInput } from "../adapters/loadInvoices.js";
import type {
  ComparisonVerdict,
  Decision,
  MathFinding,
  TaxShippingStatus,
} from "../types/decision.js";
import type { MatchMethod } from "../types/invoice.js";
import type { LearnedHistorySource, StaticHistorySource } from "../types/observation.js";
import { decide } from "./decisionEngine.js";
import { PriceComparator } from "./priceComparator.js";

export type EngineContext = {
  comparator: PriceComparator;
  config: EngineConfig;
};

export type InvoiceResult = Readonly<{
  invoiceId: string;
  vendorId: string;
  matchMethod: MatchMethod;
  verdicts: readonly ComparisonVerdict[];
  mathFindings: readonly MathFinding[];
  taxShipping: TaxShippingStatus;
  decision: Decision;
}>;

export function createEngine(args: {
  history: StaticHistorySource;
  learned: LearnedHistorySource;
  config?: EngineConfig;
}): EngineContext {
  const config = args.config ?? DEFAULT_ENGINE_CONFIG;
  return { comparator: new PriceComparator(args.history, args.learned, config), config };
}

/**
 * compare → math → totals → decide for one invoice. Reads the stores, never
 * writes them; learning happens later, through learnFromApproval.
 */
export function runPipeline(ctx: EngineContext, input: InvoiceInput): InvoiceResult {
  const { invoice, warnings } = input.extracted;
  const vendorId = input.match.vendorId;

  const verdicts = Object.freeze(ctx.comparator.compare(vendorId, invoice.lineItems));
  const mathFindings = Object.freeze(ctx.comparator.checkMath(invoice.lineItems));
  const taxShipping = ctx.comparator.reconcileTotals(invoice, vendorId);

  const decision = decide(
    {
      vendorId,
      vendorMatchConfidence: input.match.confidence,
      verdicts,
      mathFindings,
      taxShipping,
      extractionWarnings: warnings,
    },
    ctx.config
  );

  return Object.freeze({
    invoiceId: invoice.invoiceId,
    vendorId,
    matchMethod: input.match.method,
    verdicts,
    mathFindings,
    taxShipping,
    decision,
  });
}

// Invoices in a batch are independent; none sees another's outcome.
export function runBatch(ctx: EngineContext, inputs: readonly InvoiceInput[]): InvoiceResult[] {
  return inputs.map((input) => runPipeline(ctx, input));
}
