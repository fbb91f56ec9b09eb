import { describe, it, expect } from "vitest";
import type { Rule } from "@fleetsight/shared";
import { MalformedRuleError } from "../../errors.js";
import { appliesTo, createSnapshot, fingerprintRules } from "../snapshot.js";

function makeRule(id: string, overrides: Partial<Rule> = {}): Rule {
  return {
    id,
    name: id,
    priority: 10,
    active: true,
    entityType: "transaction",
    condition: { kind: "attribute", property: "amount", operator: "gt", threshold: { kind: "number", value: 500 } },
    actions: [{ kind: "create_anomaly", anomalyType: "HighSpend", reasonTemplate: "amount {amount}" }],
    ...overrides,
  };
}

describe("appliesTo", () => {
  it("lets base transaction rules cover every kind", () => {
    expect(appliesTo("transaction", "fuel_transaction")).toBe(true);
    expect(appliesTo("fuel_transaction", "fuel_transaction")).toBe(true);
    expect(appliesTo("fuel_transaction", "maintenance_transaction")).toBe(false);
    expect(appliesTo("fuel_transaction", "transaction")).toBe(false);
  });
});

describe("createSnapshot", () => {
  it("orders by priority, then id", () => {
    const snapshot = createSnapshot([
      makeRule("b", { priority: 2 }),
      makeRule("c", { priority: 1 }),
      makeRule("a", { priority: 2 }),
    ]);
    expect(snapshot.rules.map((r) => r.id)).toEqual(["c", "a", "b"]);
  });

  it("drops inactive rules and rules for other entity types", () => {
    const snapshot = createSnapshot(
      [
        makeRule("base"),
        makeRule("off", { active: false }),
        makeRule("fuel", { entityType: "fuel_transaction" }),
        makeRule("service", { entityType: "maintenance_transaction" }),
      ],
      { entityType: "fuel_transaction" },
    );
    expect(snapshot.rules.map((r) => r.id)).toEqual(["base", "fuel"]);
    expect(snapshot.entityType).toBe("fuel_transaction");
  });

  it("is frozen and detached from its source", () => {
    const rule = makeRule("a");
    const snapshot = createSnapshot([rule], { now: 1234 });

    rule.priority = 99;
    expect(snapshot.rules[0]?.priority).toBe(10);
    expect(snapshot.loadedAt).toBe(1234);
    expect(Object.isFrozen(snapshot.rules)).toBe(true);
    expect(Object.isFrozen(snapshot.rules[0]?.condition)).toBe(true);
  });

  it("fingerprints the selected rules", () => {
    const a = createSnapshot([makeRule("a")]);
    const b = createSnapshot([makeRule("a")]);
    const c = createSnapshot([makeRule("a", { priority: 3 })]);
    expect(a.fingerprint).toBe(b.fingerprint);
    expect(a.fingerprint).not.toBe(c.fingerprint);
    expect(a.fingerprint).toBe(fingerprintRules(a.rules));
    expect(a.fingerprint).toMatch(/^[0-9a-f]{64}$/);
  });

  it("refuses malformed rules", () => {
    expect(() => createSnapshot([makeRule("a"), makeRule("a")])).toThrow(MalformedRuleError);
  });
});
