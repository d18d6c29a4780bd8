import fs from "node:fs";
import { z } from "zod";
import type { PriceObservation } from "../types/observation.js";
import { errorMessage } from "../utils/errors.js";
import { normalizeKey } from "../utils/keys.js";

const SeedObservationSchema = z.object({
  quantity: z.number().finite().positive(),
  unitPrice: z.number().finite().nonnegative(),
  observedAt: z.string().min(1),
  invoiceId: z.string().min(1).optional(),
});

const VendorHistorySeedSchema = z.object({
  version: z.string().min(1),
  vendors: z.array(
    z.object({
      vendorId: z.string().trim().min(1),
      shippingMaxSeen: z.number().finite().nonnegative().optional(),
      items: z.array(
        z.object({
          item: z.string().trim().min(1),
          observations: z.array(SeedObservationSchema),
        })
      ),
    })
  ),
});

export type VendorHistorySeed = z.input<typeof VendorHistorySeedSchema>;

export class VendorHistoryLoadError extends Error {
  constructor(readonly source: string, detail: string) {
    super(`Cannot load vendor history from ${source}: ${detail}`);
    this.name = "VendorHistoryLoadError";
  }
}

/**
 * Read-only seed table of historical (vendor, item) prices. Built once per
 * process; nothing in the engine mutates it afterwards.
 */
export class VendorHistoryStore {
  private constructor(
    readonly version: string,
    private readonly byVendor: ReadonlyMap<string, ReadonlyMap<string, readonly PriceObservation[]>>,
    private readonly shipping: ReadonlyMap<string, number>
  ) {}

  static fromSeed(seed: unknown, source = "seed"): VendorHistoryStore {
    const parsed = VendorHistorySeedSchema.safeParse(seed);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      throw new VendorHistoryLoadError(source, detail);
    }

    const byVendor = new Map<string, Map<string, PriceObservation[]>>();
    const shipping = new Map<string, number>();

    for (const vendor of parsed.data.vendors) {
      const vendorKey = normalizeKey(vendor.vendorId);
      const items = byVendor.get(vendorKey) ?? new Map<string, PriceObservation[]>();
      byVendor.set(vendorKey, items);

      if (vendor.shippingMaxSeen !== undefined) shipping.set(vendorKey, vendor.shippingMaxSeen);

      for (const entry of vendor.items) {
        const itemKey = normalizeKey(entry.item);
        const list = items.get(itemKey) ?? [];
        for (const o of entry.observations) {
          list.push(
            Object.freeze({
              vendorId: vendor.vendorId,
              item: entry.item,
              quantity: o.quantity,
              unitPrice: o.unitPrice,
              observedAt: o.observedAt,
              origin: "static",
              invoiceId: o.invoiceId ?? null,
            })
          );
        }
        items.set(itemKey, list);
      }
    }

    return new VendorHistoryStore(parsed.data.version, byVendor, shipping);
  }

  lookup(vendorId: string, item: string): PriceObservation[] {
    const found = this.byVendor.get(normalizeKey(vendorId))?.get(normalizeKey(item));
    return found ? [...found] : [];
  }

  shippingMaxSeen(vendorId: string): number | null {
    return this.shipping.get(normalizeKey(vendorId)) ?? null;
  }

  stats() {
    let items = 0;
    let observations = 0;
    for (const vendorItems of this.byVendor.values()) {
      items += vendorItems.size;
      for (const list of vendorItems.values()) observations += list.length;
    }
    return { version: this.version, vendors: this.byVendor.size, items, observations };
  }
}

// Fatal on failure: the comparator has nothing to compare against without it.
export function loadVendorHistory(filePath: string): VendorHistoryStore {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new VendorHistoryLoadError(filePath, errorMessage(err));
  }
  return VendorHistoryStore.fromSeed(raw, filePath);
}
