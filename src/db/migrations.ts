import type Database from "better-sqlite3";

export function migrate(db: Database.Database) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS price_observations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      vendorKey TEXT NOT NULL,
      itemKey TEXT NOT NULL,
      vendorId TEXT NOT NULL,
      item TEXT NOT NULL,
      quantity REAL NOT NULL CHECK (quantity > 0),
      unitPrice REAL NOT NULL CHECK (unitPrice >= 0),
      observedAt TEXT NOT NULL,
      invoiceId TEXT,
      recordedAt TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_price_observations_key
      ON price_observations(vendorKey, itemKey);

    CREATE TABLE IF NOT EXISTS learning_events (
      invoiceId TEXT PRIMARY KEY,
      vendorId TEXT NOT NULL,
      lineCount INTEGER NOT NULL,
      learnedAt TEXT NOT NULL
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS audit_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      ts TEXT NOT NULL,
      eventType TEXT NOT NULL,
      vendor TEXT,
      invoiceId TEXT,
      entityType TEXT,
      entityId TEXT,
      metaJson TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_audit_events_vendor ON audit_events(vendor);
  `);

  // Append-only: stored observations can never be rewritten or removed.
  db.exec(`
    CREATE TRIGGER IF NOT EXISTS price_observations_no_update
      BEFORE UPDATE ON price_observations
      BEGIN SELECT RAISE(ABORT, 'price_observations is append-only'); END;
    CREATE TRIGGER IF NOT EXISTS price_observations_no_delete
      BEFORE DELETE ON price_observations
      BEGIN SELECT RAISE(ABORT, 'price_observations is append-only'); END;
  `);
}
