import { fileURLToPath } from "node:url";
import { describe, it, expect, afterEach } from "vitest";
import type { Transaction } from "@fleetsight/shared";
import { createEngine, type Engine } from "../engine.js";
import { loadConfig } from "../config/load-config.js";
import { createFileRuleRepository, InMemoryRuleRepository } from "../rules/repository.js";

const NOW = Date.UTC(2024, 2, 9, 23, 0);

const transactions: Transaction[] = [
  {
    id: "t1",
    kind: "fuel_transaction",
    timestamp: Date.UTC(2024, 2, 9, 22, 15),
    amount: "84.00",
    currency: "USD",
    merchantName: "Night Owl Fuel",
    merchantCategory: "fuel",
    vehicleId: "v1",
    driverId: "d1",
    fuelType: "diesel",
    fuelVolume: "40",
    fuelVolumeUnit: "L",
  },
  {
    id: "t2",
    kind: "maintenance_transaction",
    timestamp: Date.UTC(2024, 2, 6, 10, 0),
    amount: "310.00",
    currency: "USD",
    merchantName: "Fleet Garage",
    merchantCategory: "repairs",
    vehicleId: "v2",
    maintenanceType: "brakes",
  },
];

let engine: Engine | undefined;

afterEach(() => {
  engine?.close();
  engine = undefined;
});

describe("createEngine", () => {
  it("runs detection and review end to end", async () => {
    const repository = new InMemoryRuleRepository([
      {
        id: "weekend-night-fuel",
        name: "Weekend fuel outside business hours",
        priority: 1,
        active: true,
        entityType: "fuel_transaction",
        condition: {
          kind: "and",
          children: [
            { kind: "attribute", property: "isWeekend", operator: "eq", threshold: { kind: "boolean", value: true } },
            { kind: "attribute", property: "isBusinessHours", operator: "eq", threshold: { kind: "boolean", value: false } },
          ],
        },
        actions: [
          { kind: "create_anomaly", anomalyType: "TimeOfDay", reasonTemplate: "{fuelVolume} {fuelVolumeUnit} at {timestamp}" },
          { kind: "update_status", targetProperty: "driver.reviewFlag", newValue: "pending" },
        ],
      },
    ]);

    engine = createEngine(loadConfig({ FLEETSIGHT_LOG_LEVEL: "error" }), { repository, now: () => NOW });
    const report = await engine.detector.run(transactions);

    expect(report.processed).toBe(2);
    expect(report.drafts.map((d) => d.reason)).toEqual(["40 L at 2024-03-09T22:15:00.000Z"]);
    expect(report.inserted).toBe(1);

    const [anomaly] = engine.store.findByTransaction("t1");
    expect(anomaly?.type).toBe("TimeOfDay");

    const reviewed = engine.review.submitFeedback({
      anomalyId: anomaly?.id ?? "",
      expectedVersion: 1,
      reviewerId: "reviewer-1",
      status: "ConfirmedFraudOrMisuse",
    });
    expect(reviewed.status).toBe("ConfirmedFraudOrMisuse");
    expect(engine.store.ruleOutcomeStats("weekend-night-fuel").byStatus.ConfirmedFraudOrMisuse).toBe(1);
  });
});

describe("bundled rules", () => {
  it("loads the sample policy in priority order", async () => {
    const repository = createFileRuleRepository(fileURLToPath(new URL("../../../rules", import.meta.url)));
    const snapshot = await repository.loadActiveRules("fuel_transaction");
    expect(snapshot.rules.map((r) => r.id)).toEqual([
      "high-spend",
      "unusual-merchant",
      "after-hours-fuel",
      "rapid-refuel",
      "high-consumption",
    ]);
  });
});
