import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config.js";
import type {
  ComparisonVerdict,
  HistorySource,
  MathFinding,
  Observation,
  TaxShippingStatus,
  VerdictStatus,
} from "../types/decision.js";
import type { Invoice, LineItem } from "../types/invoice.js";
import type {
  LearnedHistorySource,
  PriceObservation,
  StaticHistorySource,
  VendorItemBaseline,
} from "../types/observation.js";

// Floating point slack on top of the configured money tolerances.
const FLOAT_SLACK = 1e-9;

function round2(n: number) {
  return Math.round(n * 100) / 100;
}

function money(n: number) {
  return `$${n.toFixed(2)}`;
}

function pct(n: number) {
  return `${(n * 100).toFixed(2)}%`;
}

export function summarizeObservations(
  observations: readonly PriceObservation[],
  preferredCount = DEFAULT_ENGINE_CONFIG.preferredObservationCount
): VendorItemBaseline | null {
  if (observations.length === 0) return null;

  const prices = observations.map((o) => o.unitPrice);
  const qtys = observations.map((o) => o.quantity).filter((q) => q > 0);

  return Object.freeze({
    avgPrice: prices.reduce((a, b) => a + b, 0) / prices.length,
    avgQuantity: qtys.length > 0 ? qtys.reduce((a, b) => a + b, 0) / qtys.length : 1,
    minPrice: Math.min(...prices),
    maxPrice: Math.max(...prices),
    count: observations.length,
    lowConfidence: observations.length < preferredCount,
    origin: observations[0].origin,
  });
}

/**
 * Expected-price multiplier for an order size that differs from the usual one.
 *
 * Orders within 0.5x–2x of the historical average quantity are left alone.
 * Outside that band the expected unit price moves along a log2 curve:
 * 5x the usual quantity expects roughly 30% cheaper units, a tenth of it
 * expects them to cost up to twice as much. The factor is clamped to
 * [0.4, 2.0].
 */
export function quantityAdjustmentFactor(invoiceQty: number, historicalAvgQty: number): number {
  if (!(invoiceQty > 0) || !(historicalAvgQty > 0)) return 1;

  const ratio = invoiceQty / historicalAvgQty;
  if (ratio >= 0.5 && ratio <= 2) return 1;

  const adjustment = 1 / (1 + 0.25 * Math.log2(Math.max(ratio, 0.1)));
  return Math.max(0.4, Math.min(2, adjustment));
}

export function classifyPrice(
  unitPrice: number,
  adjustedBaseline: number,
  config: Pick<EngineConfig, "priceLowRatio" | "priceHighRatio"> = DEFAULT_ENGINE_CONFIG
): { status: Exclude<VerdictStatus, "NO_HISTORY">; low: number; high: number; ratio: number | null } {
  const low = adjustedBaseline * config.priceLowRatio;
  const high = adjustedBaseline * config.priceHighRatio;

  let ratio: number | null;
  if (adjustedBaseline > 0) ratio = unitPrice / adjustedBaseline;
  else ratio = unitPrice === 0 ? 1 : null;

  if (unitPrice > high) return { status: "OVERPRICED", low, high, ratio };
  if (unitPrice < low) return { status: "UNDERPRICED", low, high, ratio };
  return { status: "IN_RANGE", low, high, ratio };
}

export class PriceComparator {
  constructor(
    private readonly history: StaticHistorySource,
    private readonly learned: LearnedHistorySource,
    private readonly config: EngineConfig = DEFAULT_ENGINE_CONFIG
  ) {}

  compare(vendorId: string, lineItems: readonly LineItem[]): ComparisonVerdict[] {
    return lineItems.map((li) => this.compareLine(vendorId, li));
  }

  // Static history wins outright; the learned store is only asked when the seed has nothing.
  private resolveHistory(
    vendorId: string,
    item: string
  ): { source: HistorySource; observations: readonly PriceObservation[] } {
    const fromSeed = this.history.lookup(vendorId, item);
    if (fromSeed.length > 0) return { source: "static", observations: fromSeed };

    const learned = this.learned.lookup(vendorId, item);
    if (learned.kind === "unreadable") return { source: "unreadable", observations: [] };
    if (learned.observations.length > 0) {
      return { source: "learned", observations: learned.observations };
    }
    return { source: "none", observations: [] };
  }

  private compareLine(vendorId: string, li: LineItem): ComparisonVerdict {
    const { source, observations } = this.resolveHistory(vendorId, li.name);
    const baseline = summarizeObservations(observations, this.config.preferredObservationCount);

    if (!baseline) {
      return Object.freeze({
        item: li.name,
        quantity: li.quantity,
        unitPrice: li.unitPrice,
        status: "NO_HISTORY",
        historySource: source,
        baseline: null,
        quantityFactor: null,
        adjustedBaseline: null,
        expectedRange: null,
        deviationRatio: null,
      });
    }

    const quantityFactor = quantityAdjustmentFactor(li.quantity, baseline.avgQuantity);
    const adjustedBaseline = baseline.avgPrice * quantityFactor;
    const verdict = classifyPrice(li.unitPrice, adjustedBaseline, this.config);

    return Object.freeze({
      item: li.name,
      quantity: li.quantity,
      unitPrice: li.unitPrice,
      status: verdict.status,
      historySource: source,
      baseline,
      quantityFactor,
      adjustedBaseline,
      expectedRange: Object.freeze({ low: verdict.low, high: verdict.high }),
      deviationRatio: verdict.ratio,
    });
  }

  checkMath(lineItems: readonly LineItem[]): MathFinding[] {
    return lineItems.map((li) => {
      const raw = li.quantity * li.unitPrice;
      // The gate uses the unrounded gap; the rounded figures are for display.
      return Object.freeze({
        item: li.name,
        quantity: li.quantity,
        unitPrice: li.unitPrice,
        lineTotal: li.lineTotal,
        expectedTotal: round2(raw),
        difference: round2(li.lineTotal - raw),
        ok: Math.abs(raw - li.lineTotal) <= this.config.mathEpsilon + FLOAT_SLACK,
      });
    });
  }

  reconcileTotals(invoice: Invoice, vendorId: string): TaxShippingStatus {
    return Object.freeze({
      tax: this.checkTax(invoice.subtotal, invoice.tax),
      shipping: this.checkShipping(vendorId, invoice.shipping),
      totals: this.checkTotals(invoice),
    });
  }

  private checkTax(subtotal: number | null, tax: number | null): Observation {
    if (subtotal === null || tax === null) {
      return { status: "OBSERVATION", note: "Missing subtotal or tax value." };
    }
    if (tax === 0) {
      return {
        status: "OBSERVATION",
        note: "No tax charged ($0). Could be tax-exempt or bundled into unit prices.",
      };
    }

    const effective = subtotal > 0 ? tax / subtotal : 0;
    for (const rate of this.config.validTaxRates) {
      if (rate > 0 && Math.abs(effective - rate) <= this.config.taxTolerance) {
        return {
          status: "OK",
          note: `Tax rate ${pct(effective)} matches known rate ${pct(rate)}.`,
        };
      }
    }

    const known = this.config.validTaxRates.filter((r) => r > 0).map(pct).join(", ");
    return {
      status: "OBSERVATION",
      note: `Tax rate ${pct(effective)} doesn't match known rates (${known}).`,
    };
  }

  private checkShipping(vendorId: string, shipping: number | null): Observation {
    if (shipping === null) return { status: "OBSERVATION", note: "No shipping amount on the invoice." };
    if (shipping === 0) return { status: "OK", note: "No shipping charged." };

    const maxSeen = this.history.shippingMaxSeen(vendorId);
    if (maxSeen === null) {
      return { status: "OBSERVATION", note: `Shipping ${money(shipping)}. No history to compare.` };
    }
    if (shipping <= maxSeen) {
      return { status: "OK", note: `Shipping ${money(shipping)} within norms (max seen: ${money(maxSeen)}).` };
    }
    return {
      status: "OBSERVATION",
      note: `Shipping ${money(shipping)} above max seen (${money(maxSeen)}). Could be distance or rush delivery.`,
    };
  }

  private checkTotals(invoice: Invoice): Observation {
    const { subtotal, tax, shipping, total } = invoice;
    if (subtotal === null || total === null) {
      return { status: "OBSERVATION", note: "Subtotal or total missing; totals not reconciled." };
    }

    const tolerance = this.config.totalsEpsilon + FLOAT_SLACK;
    const issues: string[] = [];

    const lineSum = round2(invoice.lineItems.reduce((acc, li) => acc + li.lineTotal, 0));
    if (Math.abs(lineSum - subtotal) > tolerance) {
      issues.push(`lines sum to ${money(lineSum)}, invoice subtotal is ${money(subtotal)}`);
    }

    const expectedTotal = round2(subtotal + (tax ?? 0) + (shipping ?? 0));
    if (Math.abs(expectedTotal - total) > tolerance) {
      issues.push(
        `${money(subtotal)} + tax ${money(tax ?? 0)} + shipping ${money(shipping ?? 0)} = ${money(expectedTotal)}, invoice total is ${money(total)}`
      );
    }

    if (issues.length > 0) return { status: "OBSERVATION", note: `Totals: ${issues.join("; ")}.` };
    return { status: "OK", note: "Subtotal, tax and shipping add up to the total." };
  }
}
