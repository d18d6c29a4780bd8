import type Database from "better-sqlite3";

export function hasLearned(db: Database.Database, invoiceId: string): boolean {
  const row = db
    .prepare<[string], { invoiceId: string }>(
      `SELECT invoiceId FROM learning_events WHERE invoiceId = ?`
    )
    .get(invoiceId);
  return !!row;
}

export function markLearned(
  db: Database.Database,
  args: { invoiceId: string; vendorId: string; lineCount: number; learnedAt: string }
) {
  db.prepare(
    `INSERT INTO learning_events (invoiceId, vendorId, lineCount, learnedAt)
     VALUES (@invoiceId, @vendorId, @lineCount, @learnedAt)`
  ).run(args);
}

export function countLearned(db: Database.Database): number {
  const row = db
    .prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM learning_events`)
    .get();
  return row?.n ?? 0;
}
