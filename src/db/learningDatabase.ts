import type Database from "better-sqlite3";
import type { LearnedHistorySource, LookupResult, PriceObservation } from "../types/observation.js";
import { errorMessage } from "../utils/errors.js";
import { normalizeKey } from "../utils/keys.js";
import { listAuditEvents, logAuditEvent } from "./auditEvents.js";
import { countLearned, hasLearned, markLearned } from "./learningEvents.js";
import { migrate } from "./migrations.js";
import {
  findObservations,
  insertObservation,
  listVendorObservations,
  NewObservationSchema,
  observationCounts,
  type NewObservation,
} from "./priceObservations.js";
import { openDb } from "./sqlite.js";

export type RecordResult =
  | { ok: true; observation: PriceObservation }
  | { ok: false; error: string };

export type ApprovedLine = {
  item: string;
  quantity: number;
  unitPrice: number;
};

export type InvoiceRecordResult =
  | { ok: true; skipped: false; observations: PriceObservation[] }
  | { ok: true; skipped: true; observations: [] }
  | { ok: false; error: string };

export type LearningStats = {
  observations: number;
  vendors: number;
  items: number;
  invoicesLearned: number;
};

function nowIso(d?: Date) {
  return (d ?? new Date()).toISOString();
}

function describeIssues(issues: Array<{ path: (string | number)[]; message: string }>) {
  return issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/**
 * Durable, append-only store of prices taken from human-approved invoices.
 *
 * Open it once at startup and close it on exit. Every write runs in an
 * IMMEDIATE transaction, so a failed append leaves no partial rows and two
 * processes sharing the file take turns holding the write lock. Reads see
 * the last committed state (WAL snapshot).
 */
export class LearningDatabase implements LearnedHistorySource {
  private constructor(
    private readonly db: Database.Database,
    readonly dbPath: string
  ) {}

  static open(dbPath: string): LearningDatabase {
    const db = openDb(dbPath);
    migrate(db);
    return new LearningDatabase(db, dbPath);
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  lookup(vendorId: string, item: string): LookupResult {
    try {
      return { kind: "found", observations: findObservations(this.db, vendorId, item) };
    } catch (err) {
      const error = errorMessage(err);
      console.warn(`[learningDb] lookup failed for ${vendorId} / ${item}: ${error}`);
      return { kind: "unreadable", error };
    }
  }

  record(input: NewObservation, now?: Date): RecordResult {
    const parsed = NewObservationSchema.safeParse(input);
    if (!parsed.success) {
      return { ok: false, error: `Invalid observation: ${describeIssues(parsed.error.issues)}` };
    }

    const obs = parsed.data;
    const recordedAt = nowIso(now);

    try {
      const observation = this.db
        .transaction(() => {
          const saved = insertObservation(this.db, obs, recordedAt);
          logAuditEvent(this.db, {
            eventType: "OBSERVATION_RECORDED",
            vendor: saved.vendorId,
            invoiceId: saved.invoiceId,
            entityType: "price_observation",
            entityId: normalizeKey(saved.item),
            meta: { quantity: saved.quantity, unitPrice: saved.unitPrice },
            now,
          });
          return saved;
        })
        .immediate();

      return { ok: true, observation };
    } catch (err) {
      const error = errorMessage(err);
      console.error(`[learningDb] record failed for ${obs.vendorId} / ${obs.item}: ${error}`);
      return { ok: false, error };
    }
  }

  /**
   * Appends every line of one approved invoice, all or nothing. An invoice
   * that was already learned is skipped so re-running an approval cannot
   * double-count its prices.
   */
  recordApprovedInvoice(
    args: { invoiceId: string; vendorId: string; lines: ApprovedLine[]; approvedAt: string },
    now?: Date
  ): InvoiceRecordResult {
    const candidates: NewObservation[] = [];
    for (const [idx, line] of args.lines.entries()) {
      const parsed = NewObservationSchema.safeParse({
        vendorId: args.vendorId,
        item: line.item,
        quantity: line.quantity,
        unitPrice: line.unitPrice,
        observedAt: args.approvedAt,
        invoiceId: args.invoiceId,
      });
      if (!parsed.success) {
        return {
          ok: false,
          error: `Invalid line ${idx} (${line.item}): ${describeIssues(parsed.error.issues)}`,
        };
      }
      candidates.push(parsed.data);
    }

    const recordedAt = nowIso(now);

    try {
      return this.db
        .transaction((): InvoiceRecordResult => {
          if (hasLearned(this.db, args.invoiceId)) {
            logAuditEvent(this.db, {
              eventType: "INVOICE_ALREADY_LEARNED",
              vendor: args.vendorId,
              invoiceId: args.invoiceId,
              now,
            });
            return { ok: true, skipped: true, observations: [] };
          }

          const observations = candidates.map((c) => insertObservation(this.db, c, recordedAt));
          markLearned(this.db, {
            invoiceId: args.invoiceId,
            vendorId: args.vendorId,
            lineCount: observations.length,
            learnedAt: recordedAt,
          });
          logAuditEvent(this.db, {
            eventType: "INVOICE_LEARNED",
            vendor: args.vendorId,
            invoiceId: args.invoiceId,
            meta: { lines: observations.map((o) => o.item) },
            now,
          });

          return { ok: true, skipped: false, observations };
        })
        .immediate();
    } catch (err) {
      const error = errorMessage(err);
      console.error(`[learningDb] recording invoice ${args.invoiceId} failed: ${error}`);
      return { ok: false, error };
    }
  }

  listObservations(vendorId: string, item?: string): PriceObservation[] {
    if (item) return findObservations(this.db, vendorId, item);
    return listVendorObservations(this.db, vendorId);
  }

  recentEvents(limit = 20) {
    return listAuditEvents(this.db, limit);
  }

  stats(): LearningStats {
    return { ...observationCounts(this.db), invoicesLearned: countLearned(this.db) };
  }

  close() {
    if (!this.db.open) return;
    this.db.pragma("wal_checkpoint(TRUNCATE)");
    this.db.close();
  }
}
