import type { LearningDatabase } from "../db/learningDatabase.js";
import { summarizeObservations } from "../engine/priceComparator.js";

export function listObservations(db: LearningDatabase, args: { vendor: string; item?: string }) {
  const rows = db.listObservations(args.vendor, args.item);

  console.log(`\n== Learned observations (${args.vendor}${args.item ? ` / ${args.item}` : ""}) ==`);
  if (rows.length === 0) {
    console.log("(none)");
    return;
  }

  const byItem = new Map<string, typeof rows>();
  for (const r of rows) {
    const list = byItem.get(r.item) ?? [];
    list.push(r);
    byItem.set(r.item, list);
  }

  for (const [item, list] of byItem) {
    const baseline = summarizeObservations(list);
    console.log({
      item,
      count: list.length,
      avgPrice: baseline?.avgPrice,
      avgQuantity: baseline?.avgQuantity,
      lowConfidence: baseline?.lowConfidence,
      observations: list.map((o) => ({
        quantity: o.quantity,
        unitPrice: o.unitPrice,
        observedAt: o.observedAt,
        invoiceId: o.invoiceId,
      })),
    });
  }
}

export function printStats(db: LearningDatabase) {
  const stats = db.stats();
  console.log(`\n== Learning database (${db.dbPath}) ==`);
  console.log(stats);
}

export function printEvents(db: LearningDatabase, limit: number) {
  const events = db.recentEvents(limit);
  console.log(`\n== Last ${limit} audit events ==`);
  if (events.length === 0) console.log("(none)");
  for (const e of events) {
    console.log({
      ts: e.ts,
      eventType: e.eventType,
      vendor: e.vendor,
      invoiceId: e.invoiceId,
      meta: e.metaJson ? JSON.parse(e.metaJson) : null,
    });
  }
}
