import type Database from "better-sqlite3";
import { z } from "zod";
import type { PriceObservation } from "../types/observation.js";
import { normalizeKey } from "../utils/keys.js";

type ObservationRow = {
  id: number;
  vendorKey: string;
  itemKey: string;
  vendorId: string;
  item: string;
  quantity: number;
  unitPrice: number;
  observedAt: string;
  invoiceId: string | null;
  recordedAt: string;
};

export const NewObservationSchema = z.object({
  vendorId: z.string().trim().min(1),
  item: z.string().trim().min(1),
  quantity: z.number().finite().positive(),
  unitPrice: z.number().finite().nonnegative(),
  observedAt: z.string().min(1),
  invoiceId: z.string().min(1).nullable().optional(),
});

export type NewObservation = z.infer<typeof NewObservationSchema>;

function toObservation(row: ObservationRow): PriceObservation {
  return Object.freeze({
    vendorId: row.vendorId,
    item: row.item,
    quantity: row.quantity,
    unitPrice: row.unitPrice,
    observedAt: row.observedAt,
    origin: "learned",
    invoiceId: row.invoiceId,
  });
}

export function insertObservation(
  db: Database.Database,
  obs: NewObservation,
  recordedAt: string
): PriceObservation {
  const row = {
    vendorKey: normalizeKey(obs.vendorId),
    itemKey: normalizeKey(obs.item),
    vendorId: obs.vendorId.trim(),
    item: obs.item.trim(),
    quantity: obs.quantity,
    unitPrice: obs.unitPrice,
    observedAt: obs.observedAt,
    invoiceId: obs.invoiceId ?? null,
    recordedAt,
  };

  const info = db
    .prepare(
      `
      INSERT INTO price_observations
        (vendorKey, itemKey, vendorId, item, quantity, unitPrice, observedAt, invoiceId, recordedAt)
      VALUES
        (@vendorKey, @itemKey, @vendorId, @item, @quantity, @unitPrice, @observedAt, @invoiceId, @recordedAt)
      `
    )
    .run(row);

  return toObservation({ id: Number(info.lastInsertRowid), ...row });
}

export function findObservations(
  db: Database.Database,
  vendorId: string,
  item: string
): PriceObservation[] {
  return db
    .prepare<[string, string], ObservationRow>(
      `
      SELECT *
      FROM price_observations
      WHERE vendorKey = ?
        AND itemKey = ?
      ORDER BY id ASC
      `
    )
    .all(normalizeKey(vendorId), normalizeKey(item))
    .map(toObservation);
}

export function listVendorObservations(
  db: Database.Database,
  vendorId: string
): PriceObservation[] {
  return db
    .prepare<[string], ObservationRow>(
      `SELECT * FROM price_observations WHERE vendorKey = ? ORDER BY itemKey ASC, id ASC`
    )
    .all(normalizeKey(vendorId))
    .map(toObservation);
}

export function observationCounts(db: Database.Database) {
  const row = db
    .prepare<[], { observations: number; vendors: number; items: number }>(
      `
      SELECT COUNT(*) AS observations,
             COUNT(DISTINCT vendorKey) AS vendors,
             COUNT(DISTINCT vendorKey || '|' || itemKey) AS items
      FROM price_observations
      `
    )
    .get();

  return row ?? { observations: 0, vendors: 0, items: 0 };
}
