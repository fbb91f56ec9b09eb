import Database from "better-sqlite3";

export function createAnomalyDb(path: string): Database.Database {
  const db = new Database(path);
  if (path !== ":memory:") db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.exec(`
    CREATE TABLE IF NOT EXISTS anomalies (
      id TEXT PRIMARY KEY, idempotency_key TEXT NOT NULL,
      transaction_id TEXT NOT NULL, rule_id TEXT NOT NULL,
      type TEXT NOT NULL, reason TEXT NOT NULL, score REAL,
      status TEXT NOT NULL DEFAULT 'PendingReview', version INTEGER NOT NULL DEFAULT 1,
      detected_at INTEGER NOT NULL, updated_at INTEGER NOT NULL,
      UNIQUE (transaction_id, rule_id)
    );
    CREATE INDEX IF NOT EXISTS idx_anomalies_key ON anomalies(idempotency_key);
    CREATE INDEX IF NOT EXISTS idx_anomalies_status ON anomalies(status);
    CREATE INDEX IF NOT EXISTS idx_anomalies_rule ON anomalies(rule_id);
    CREATE TABLE IF NOT EXISTS feedback_events (
      seq INTEGER PRIMARY KEY AUTOINCREMENT, id TEXT NOT NULL UNIQUE,
      anomaly_id TEXT NOT NULL REFERENCES anomalies(id),
      kind TEXT NOT NULL CHECK(kind IN ('transition','amendment')),
      reviewer_id TEXT NOT NULL, from_status TEXT NOT NULL, to_status TEXT NOT NULL,
      timestamp INTEGER NOT NULL, notes TEXT, corrected_code TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_feedback_events_anomaly ON feedback_events(anomaly_id);
  `);
  return db;
}
