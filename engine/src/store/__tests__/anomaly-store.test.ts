import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import type { AnomalyDraft, Rule, Transaction } from "@fleetsight/shared";
import { createEvaluationContext } from "../../conditions/context.js";
import { detect } from "../../detection/detector.js";
import { idempotencyKey } from "../../detection/dispatcher.js";
import { ConcurrentModificationError } from "../../errors.js";
import { applyTransition } from "../../review/workflow.js";
import { createSnapshot } from "../../rules/snapshot.js";
import { SqliteAnomalyStore } from "../anomaly-store.js";
import { createAnomalyDb } from "../db.js";

const DETECTED = Date.UTC(2024, 2, 4, 12, 0);

let db: Database.Database;
let store: SqliteAnomalyStore;

beforeEach(() => {
  db = createAnomalyDb(":memory:");
  store = new SqliteAnomalyStore(db);
});

afterEach(() => {
  db.close();
});

function makeDraft(transactionId: string, ruleId: string, overrides: Partial<AnomalyDraft> = {}): AnomalyDraft {
  return {
    idempotencyKey: idempotencyKey(transactionId, ruleId),
    transactionId,
    ruleId,
    type: "HighSpend",
    reason: "high",
    status: "PendingReview",
    detectedAt: DETECTED,
    ...overrides,
  };
}

describe("SqliteAnomalyStore", () => {
  it("creates one anomaly per transaction and rule across repeated detection", () => {
    const rule: Rule = {
      id: "high-spend",
      name: "High spend",
      priority: 1,
      active: true,
      entityType: "transaction",
      condition: { kind: "attribute", property: "amount", operator: "gt", threshold: { kind: "number", value: 500 } },
      actions: [{ kind: "create_anomaly", anomalyType: "HighSpend", reasonTemplate: "amount {amount} exceeds 500" }],
    };
    const tx: Transaction = {
      id: "t1",
      kind: "transaction",
      timestamp: DETECTED,
      amount: "650",
      currency: "USD",
      merchantName: "Acme Fuel",
      merchantCategory: "fuel",
    };
    const snapshot = createSnapshot([rule]);

    const first = store.upsertDrafts(detect(tx, snapshot, createEvaluationContext(tx, { now: DETECTED })));
    const second = store.upsertDrafts(detect(tx, snapshot, createEvaluationContext(tx, { now: DETECTED + 1000 })));

    expect(first).toEqual({ inserted: 1, skipped: 0 });
    expect(second).toEqual({ inserted: 0, skipped: 1 });

    const stored = store.findByTransaction("t1");
    expect(stored).toHaveLength(1);
    expect(stored[0]).toMatchObject({
      idempotencyKey: "t1:high-spend",
      reason: "amount 650 exceeds 500",
      status: "PendingReview",
      version: 1,
      detectedAt: DETECTED,
    });
  });

  it("keeps pairs apart when an id contains the key separator", () => {
    expect(store.upsertDrafts([makeDraft("a:b", "c"), makeDraft("a", "b:c")])).toEqual({ inserted: 2, skipped: 0 });

    expect([...store.seenKeys(["a:b"])]).toEqual(["a%3Ab:c"]);
    expect([...store.seenKeys(["a"])]).toEqual(["a:b%3Ac"]);
    expect(store.findByTransaction("a").map((a) => a.ruleId)).toEqual(["b:c"]);
  });

  it("keeps the optional score", () => {
    store.upsertDrafts([makeDraft("t1", "r1", { score: 0.75 }), makeDraft("t2", "r1")]);
    expect(store.getByKey("t1:r1")?.score).toBe(0.75);
    expect(store.getByKey("t2:r1")?.score).toBeUndefined();
  });

  it("commits with a version check", () => {
    store.upsertDrafts([makeDraft("t1", "r1")]);
    const anomaly = store.getByKey("t1:r1");
    if (!anomaly) throw new Error("expected anomaly");

    const result = applyTransition(
      anomaly,
      { anomalyId: anomaly.id, expectedVersion: 1, reviewerId: "r1", status: "Okay" },
      { now: DETECTED + 1, eventId: "e1" },
    );
    store.commit(1, result.anomaly, result.event);

    expect(() => store.commit(1, result.anomaly, { ...result.event, id: "e2" })).toThrow(ConcurrentModificationError);
    expect(store.get(anomaly.id)).toMatchObject({ status: "Okay", version: 2, updatedAt: DETECTED + 1 });
    expect(store.history(anomaly.id).map((e) => e.id)).toEqual(["e1"]);
  });

  it("filters listings", () => {
    store.upsertDrafts([
      makeDraft("t1", "r1"),
      makeDraft("t2", "r1", { type: "Location", detectedAt: DETECTED + 10 }),
      makeDraft("t3", "r2", { detectedAt: DETECTED + 20 }),
    ]);

    expect(store.list({ ruleId: "r1" }).map((a) => a.transactionId)).toEqual(["t1", "t2"]);
    expect(store.list({ type: "Location" }).map((a) => a.transactionId)).toEqual(["t2"]);
    expect(store.list({ since: DETECTED + 5 }).map((a) => a.transactionId)).toEqual(["t2", "t3"]);
    expect(store.list({ limit: 1 }).map((a) => a.transactionId)).toEqual(["t1"]);
    expect(store.listByStatus("PendingReview")).toHaveLength(3);
    expect(store.listByStatus("Okay")).toEqual([]);
  });

  it("summarises review outcomes per rule", () => {
    store.upsertDrafts([makeDraft("t1", "r1"), makeDraft("t2", "r1"), makeDraft("t3", "r1"), makeDraft("t4", "r1")]);
    const review = (transactionId: string, status: "Okay" | "ConfirmedFraudOrMisuse") => {
      const anomaly = store.getByKey(`${transactionId}:r1`);
      if (!anomaly) throw new Error("expected anomaly");
      const result = applyTransition(
        anomaly,
        { anomalyId: anomaly.id, expectedVersion: 1, reviewerId: "r1", status },
        { now: DETECTED },
      );
      store.commit(1, result.anomaly, result.event);
    };
    review("t1", "Okay");
    review("t2", "Okay");
    review("t3", "ConfirmedFraudOrMisuse");

    const stats = store.ruleOutcomeStats("r1");
    expect(stats.total).toBe(4);
    expect(stats.byStatus).toEqual({
      PendingReview: 1,
      Okay: 2,
      Investigate: 0,
      ConfirmedFraudOrMisuse: 1,
      Miscategorized: 0,
    });
    expect(stats.falsePositiveRate).toBeCloseTo(2 / 3);
    expect(store.ruleOutcomeStats("unused").falsePositiveRate).toBe(0);
  });

  it("reports stored keys for a set of transactions", () => {
    store.upsertDrafts([makeDraft("t1", "r1"), makeDraft("t1", "r2"), makeDraft("t2", "r1")]);
    expect([...store.seenKeys(["t1", "t9"])].sort()).toEqual(["t1:r1", "t1:r2"]);
    expect(store.seenKeys([]).size).toBe(0);
  });
});
