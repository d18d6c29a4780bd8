export type ObservationOrigin = "static" | "learned";

export type PriceObservation = Readonly<{
  vendorId: string;
  item: string;
  quantity: number;
  unitPrice: number;
  observedAt: string;
  origin: ObservationOrigin;
  invoiceId: string | null;
}>;

/**
 * Derived on demand from the observations of one (vendor, item) pair.
 * Never persisted.
 */
export type VendorItemBaseline = Readonly<{
  avgPrice: number;
  avgQuantity: number;
  minPrice: number;
  maxPrice: number;
  count: number;
  lowConfidence: boolean;
  origin: ObservationOrigin;
}>;

export type LookupResult =
  | { kind: "found"; observations: PriceObservation[] }
  | { kind: "unreadable"; error: string };

export interface LearnedHistorySource {
  lookup(vendorId: string, item: string): LookupResult;
}

export interface StaticHistorySource {
  lookup(vendorId: string, item: string): PriceObservation[];
  shippingMaxSeen(vendorId: string): number | null;
}
