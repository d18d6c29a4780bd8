import type Database from "better-sqlite3";

function nowIso(now?: Date) {
  return (now ?? new Date()).toISOString();
}

export type AuditEventType =
  | "OBSERVATION_RECORDED"
  | "INVOICE_LEARNED"
  | "INVOICE_ALREADY_LEARNED"
  | "ADMIN_ACTION";

export type AuditEventRow = {
  id: number;
  ts: string;
  eventType: AuditEventType;
  vendor: string | null;
  invoiceId: string | null;
  entityType: string | null;
  entityId: string | null;
  metaJson: string | null;
};

export function logAuditEvent(
  db: Database.Database,
  args: {
    eventType: AuditEventType;
    vendor?: string | null;
    invoiceId?: string | null;
    entityType?: string | null;
    entityId?: string | null;
    meta?: unknown;
    now?: Date;
  }
) {
  const stmt = db.prepare(`
    INSERT INTO audit_events (ts, eventType, vendor, invoiceId, entityType, entityId, metaJson)
    VALUES (@ts, @eventType, @vendor, @invoiceId, @entityType, @entityId, @metaJson)
  `);

  stmt.run({
    ts: nowIso(args.now),
    eventType: args.eventType,
    vendor: args.vendor ?? null,
    invoiceId: args.invoiceId ?? null,
    entityType: args.entityType ?? null,
    entityId: args.entityId ?? null,
    metaJson: args.meta ? JSON.stringify(args.meta) : null,
  });
}

export function listAuditEvents(db: Database.Database, limit = 20): AuditEventRow[] {
  return db
    .prepare<[number], AuditEventRow>(`SELECT * FROM audit_events ORDER BY id DESC LIMIT ?`)
    .all(limit);
}
