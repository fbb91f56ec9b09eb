import { randomUUID } from "node:crypto";
import type Database from "better-sqlite3";
import {
  AnomalyTypeSchema,
  FeedbackStatusSchema,
  type Anomaly,
  type AnomalyDraft,
  type AnomalyFilter,
  type FeedbackEvent,
  type FeedbackStatus,
} from "@fleetsight/shared";
import type { DraftSink } from "../batch/batch-detector.js";
import { AnomalyNotFoundError, ConcurrentModificationError } from "../errors.js";
import type { ReviewStore } from "../review/workflow.js";

type AnomalyRow = {
  id: string;
  idempotency_key: string;
  transaction_id: string;
  rule_id: string;
  type: string;
  reason: string;
  score: number | null;
  status: string;
  version: number;
  detected_at: number;
  updated_at: number;
};

type EventRow = {
  id: string;
  anomaly_id: string;
  kind: string;
  reviewer_id: string;
  from_status: string;
  to_status: string;
  timestamp: number;
  notes: string | null;
  corrected_code: string | null;
};

export type UpsertResult = {
  inserted: number;
  skipped: number;
};

export type RuleOutcomeStats = {
  ruleId: string;
  total: number;
  byStatus: Record<FeedbackStatus, number>;
  /** Share of closed reviews marked Okay; 0 when nothing is closed yet. */
  falsePositiveRate: number;
};

function toAnomaly(r: AnomalyRow): Anomaly {
  const anomaly: Anomaly = {
    id: r.id,
    idempotencyKey: r.idempotency_key,
    transactionId: r.transaction_id,
    ruleId: r.rule_id,
    type: AnomalyTypeSchema.parse(r.type),
    reason: r.reason,
    status: FeedbackStatusSchema.parse(r.status),
    version: r.version,
    detectedAt: r.detected_at,
    updatedAt: r.updated_at,
  };
  if (r.score !== null) anomaly.score = r.score;
  return anomaly;
}

function toEvent(r: EventRow): FeedbackEvent {
  const event: FeedbackEvent = {
    id: r.id,
    anomalyId: r.anomaly_id,
    kind: r.kind === "amendment" ? "amendment" : "transition",
    reviewerId: r.reviewer_id,
    fromStatus: FeedbackStatusSchema.parse(r.from_status),
    toStatus: FeedbackStatusSchema.parse(r.to_status),
    timestamp: r.timestamp,
  };
  if (r.notes !== null) event.notes = r.notes;
  if (r.corrected_code !== null) event.correctedCode = r.corrected_code;
  return event;
}

/** Anomaly persistence: idempotent draft upserts and version-checked review commits. */
export class SqliteAnomalyStore implements ReviewStore, DraftSink {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  upsertDrafts(drafts: readonly AnomalyDraft[]): UpsertResult {
    const stmt = this.db.prepare(
      `INSERT OR IGNORE INTO anomalies
         (id, idempotency_key, transaction_id, rule_id, type, reason, score, status, version, detected_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, 1, ?, ?)`,
    );
    const tx = this.db.transaction((batch: readonly AnomalyDraft[]) => {
      let inserted = 0;
      for (const d of batch) {
        const info = stmt.run(
          randomUUID(),
          d.idempotencyKey,
          d.transactionId,
          d.ruleId,
          d.type,
          d.reason,
          d.score ?? null,
          d.status,
          d.detectedAt,
          d.detectedAt,
        );
        inserted += info.changes;
      }
      return inserted;
    });
    const inserted = tx(drafts);
    return { inserted, skipped: drafts.length - inserted };
  }

  get(anomalyId: string): Anomaly | undefined {
    const row = this.db.prepare<[string], AnomalyRow>("SELECT * FROM anomalies WHERE id = ?").get(anomalyId);
    return row ? toAnomaly(row) : undefined;
  }

  getByKey(idempotencyKey: string): Anomaly | undefined {
    const row = this.db
      .prepare<[string], AnomalyRow>("SELECT * FROM anomalies WHERE idempotency_key = ?")
      .get(idempotencyKey);
    return row ? toAnomaly(row) : undefined;
  }

  findByTransaction(transactionId: string): Anomaly[] {
    return this.db
      .prepare<[string], AnomalyRow>("SELECT * FROM anomalies WHERE transaction_id = ? ORDER BY detected_at, rule_id")
      .all(transactionId)
      .map(toAnomaly);
  }

  listByStatus(status: FeedbackStatus): Anomaly[] {
    return this.list({ status: [status] });
  }

  list(filter: AnomalyFilter = {}): Anomaly[] {
    const clauses: string[] = [];
    const params: (string | number)[] = [];

    if (filter.status && filter.status.length > 0) {
      clauses.push(`status IN (${filter.status.map(() => "?").join(", ")})`);
      params.push(...filter.status);
    }
    if (filter.ruleId !== undefined) {
      clauses.push("rule_id = ?");
      params.push(filter.ruleId);
    }
    if (filter.type !== undefined) {
      clauses.push("type = ?");
      params.push(filter.type);
    }
    if (filter.since !== undefined) {
      clauses.push("detected_at >= ?");
      params.push(filter.since);
    }

    let query = "SELECT * FROM anomalies";
    if (clauses.length > 0) query += ` WHERE ${clauses.join(" AND ")}`;
    query += " ORDER BY detected_at, id";
    if (filter.limit !== undefined) {
      query += " LIMIT ?";
      params.push(filter.limit);
    }

    return this.db.prepare<(string | number)[], AnomalyRow>(query).all(...params).map(toAnomaly);
  }

  history(anomalyId: string): FeedbackEvent[] {
    return this.db
      .prepare<[string], EventRow>("SELECT * FROM feedback_events WHERE anomaly_id = ? ORDER BY seq")
      .all(anomalyId)
      .map(toEvent);
  }

  commit(expectedVersion: number, next: Anomaly, event: FeedbackEvent): void {
    const update = this.db.prepare(
      "UPDATE anomalies SET status = ?, version = ?, updated_at = ? WHERE id = ? AND version = ?",
    );
    const insert = this.db.prepare(
      `INSERT INTO feedback_events
         (id, anomaly_id, kind, reviewer_id, from_status, to_status, timestamp, notes, corrected_code)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );

    const tx = this.db.transaction(() => {
      const info = update.run(next.status, next.version, next.updatedAt, next.id, expectedVersion);
      if (info.changes === 0) {
        const current = this.get(next.id);
        if (!current) throw new AnomalyNotFoundError(next.id);
        throw new ConcurrentModificationError(next.id, expectedVersion, current.version);
      }
      insert.run(
        event.id,
        event.anomalyId,
        event.kind,
        event.reviewerId,
        event.fromStatus,
        event.toStatus,
        event.timestamp,
        event.notes ?? null,
        event.correctedCode ?? null,
      );
    });
    tx();
  }

  ruleOutcomeStats(ruleId: string): RuleOutcomeStats {
    const rows = this.db
      .prepare<[string], { status: string; count: number }>(
        "SELECT status, COUNT(*) as count FROM anomalies WHERE rule_id = ? GROUP BY status",
      )
      .all(ruleId);

    const byStatus: Record<FeedbackStatus, number> = {
      PendingReview: 0,
      Okay: 0,
      Investigate: 0,
      ConfirmedFraudOrMisuse: 0,
      Miscategorized: 0,
    };
    let total = 0;
    for (const r of rows) {
      byStatus[FeedbackStatusSchema.parse(r.status)] = r.count;
      total += r.count;
    }

    const closed = byStatus.Okay + byStatus.ConfirmedFraudOrMisuse + byStatus.Miscategorized;
    return { ruleId, total, byStatus, falsePositiveRate: closed === 0 ? 0 : byStatus.Okay / closed };
  }

  seenKeys(transactionIds: readonly string[]): Set<string> {
    if (transactionIds.length === 0) return new Set();
    const rows = this.db
      .prepare<[string], { idempotency_key: string }>(
        "SELECT idempotency_key FROM anomalies WHERE transaction_id IN (SELECT value FROM json_each(?))",
      )
      .all(JSON.stringify(transactionIds));
    return new Set(rows.map((r) => r.idempotency_key));
  }
}
