import { describe, it, expect } from "vitest";
import { MalformedRuleError } from "../../errors.js";
import { loadPolicy, loadRules, loadRuleSet, rulesOf, validateRules } from "../loader.js";

function rawRule(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: "high-spend",
    name: "High spend",
    priority: 1,
    condition: { kind: "attribute", property: "amount", operator: "gt", threshold: { kind: "number", value: 500 } },
    actions: [{ kind: "create_anomaly", anomalyType: "HighSpend", reasonTemplate: "amount {amount} exceeds 500" }],
    ...overrides,
  };
}

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof MalformedRuleError) return err.problems;
    throw err;
  }
  return [];
}

describe("loadRules", () => {
  it("applies schema defaults and freezes the result", () => {
    const [rule] = loadRules([rawRule()]);
    expect(rule?.active).toBe(true);
    expect(rule?.entityType).toBe("transaction");
    expect(Object.isFrozen(rule)).toBe(true);
    expect(Object.isFrozen(rule?.condition)).toBe(true);
    expect(Object.isFrozen(rule?.actions)).toBe(true);
  });

  it("rejects a rule without actions", () => {
    expect(problemsOf(() => loadRules([rawRule({ actions: [] })]))).toEqual([
      "0.actions: a rule needs at least one action",
    ]);
  });

  it("rejects an empty and", () => {
    const problems = problemsOf(() => loadRules([rawRule({ condition: { kind: "and", children: [] } })]));
    expect(problems).toEqual(["0.condition.children: and requires at least one child"]);
  });

  it("rejects a not with more than its child", () => {
    const condition = {
      kind: "not",
      child: { kind: "attribute", property: "amount", operator: "gt", threshold: { kind: "number", value: 1 } },
      children: [],
    };
    expect(() => loadRules([rawRule({ condition })])).toThrow(MalformedRuleError);
  });

  it("rejects an unknown property name", () => {
    const condition = { kind: "attribute", property: "colour", operator: "eq", threshold: { kind: "string", value: "red" } };
    const problems = problemsOf(() => loadRules([rawRule({ condition })]));
    expect(problems).toHaveLength(1);
    expect(problems[0]).toMatch(/^0\.condition\.property: /);
  });

  it("rejects a duplicate rule id", () => {
    const problems = problemsOf(() => loadRules([rawRule(), rawRule({ priority: 2 })]));
    expect(problems).toEqual(['rules.1: duplicate rule id "high-spend"']);
  });

  it("rejects a property the entity type does not carry", () => {
    const condition = { kind: "attribute", property: "fuelType", operator: "eq", threshold: { kind: "string", value: "diesel" } };
    const problems = problemsOf(() => loadRules([rawRule({ condition })]));
    expect(problems).toEqual(['rules.0.condition: property "fuelType" is not available on transaction']);
  });

  it("accepts fuel properties on fuel rules", () => {
    const condition = { kind: "attribute", property: "fuelType", operator: "eq", threshold: { kind: "string", value: "diesel" } };
    expect(loadRules([rawRule({ condition, entityType: "fuel_transaction" })])).toHaveLength(1);
  });

  it("rejects an operator that cannot compare the property and threshold", () => {
    const condition = { kind: "attribute", property: "amount", operator: "contains", threshold: { kind: "string", value: "5" } };
    const problems = problemsOf(() => loadRules([rawRule({ condition })]));
    expect(problems).toEqual([
      'rules.0.condition: operator contains cannot compare decimal property "amount" with a string threshold',
    ]);
  });

  it("reports nested problems with their path", () => {
    const condition = {
      kind: "or",
      children: [
        { kind: "attribute", property: "amount", operator: "gt", threshold: { kind: "number", value: 1 } },
        { kind: "not", child: { kind: "attribute", property: "isWeekend", operator: "gt", threshold: { kind: "boolean", value: true } } },
      ],
    };
    const problems = problemsOf(() => loadRules([rawRule({ condition })]));
    expect(problems).toEqual([
      'rules.0.condition.children.1.child: operator gt cannot compare boolean property "isWeekend" with a boolean threshold',
    ]);
  });

  it("rejects unknown template fields", () => {
    const actions = [{ kind: "create_anomaly", anomalyType: "HighSpend", reasonTemplate: "spent at {merchant}" }];
    expect(problemsOf(() => loadRules([rawRule({ actions })]))).toEqual([
      'rules.0.actions.0: unknown template field "{merchant}"',
    ]);
  });

  it("allows anomaly fields only after the rule creates an anomaly", () => {
    const notify = { kind: "notify", channel: "email", template: "{anomaly.type} on {id}", role: "fleet_manager" };
    const create = { kind: "create_anomaly", anomalyType: "HighSpend", reasonTemplate: "high" };

    expect(loadRules([rawRule({ actions: [create, notify] })])).toHaveLength(1);
    expect(problemsOf(() => loadRules([rawRule({ actions: [notify, create] })]))).toEqual([
      'rules.0.actions.0: unknown template field "{anomaly.type}"',
    ]);
  });

  it("rejects status updates on unknown targets", () => {
    const actions = [{ kind: "update_status", targetProperty: "depot.status", newValue: "flagged" }];
    expect(problemsOf(() => loadRules([rawRule({ actions })]))).toEqual([
      'rules.0.actions.0: unknown status target "depot.status"',
    ]);
  });

  it("rejects optional properties the entity type does not carry", () => {
    const problems = problemsOf(() => loadRules([rawRule({ optionalProperties: ["maintenanceType"] })]));
    expect(problems).toEqual(['rules.0.optionalProperties: "maintenanceType" is not available on transaction']);
  });

  it("rejects optional properties under a not", () => {
    const vehicle = { kind: "attribute", property: "vehicleId", operator: "eq", threshold: { kind: "string", value: "v1" } };
    const condition = { kind: "not", child: { kind: "and", children: [vehicle] } };

    expect(problemsOf(() => loadRules([rawRule({ condition, optionalProperties: ["vehicleId"] })]))).toEqual([
      'rules.0.condition.child.children.0: optional property "vehicleId" cannot appear under not',
    ]);
    expect(loadRules([rawRule({ condition: vehicle, optionalProperties: ["vehicleId"] })])).toHaveLength(1);
    expect(loadRules([rawRule({ condition })])).toHaveLength(1);
  });
});

describe("validateRules", () => {
  it("returns no problems for a valid rule", () => {
    expect(validateRules(loadRules([rawRule()]))).toEqual([]);
  });
});

describe("loadRuleSet and loadPolicy", () => {
  it("loads a rule set with a default version", () => {
    const set = loadRuleSet({ id: "core", name: "Core", rules: [rawRule()] });
    expect(set.version).toBe(1);
    expect(set.rules).toHaveLength(1);
  });

  it("validates rule ids across the rule sets of a policy", () => {
    const raw = {
      id: "p1",
      name: "Fleet policy",
      ruleSets: [
        { id: "a", name: "A", rules: [rawRule()] },
        { id: "b", name: "B", rules: [rawRule()] },
      ],
    };
    expect(problemsOf(() => loadPolicy(raw))).toEqual(['rules.1: duplicate rule id "high-spend"']);
  });

  it("flattens a policy into its rules", () => {
    const policy = loadPolicy({
      id: "p1",
      name: "Fleet policy",
      ruleSets: [
        { id: "a", name: "A", rules: [rawRule()] },
        { id: "b", name: "B", rules: [rawRule({ id: "late-night", priority: 5 })] },
      ],
    });
    expect(rulesOf(policy).map((r) => r.id)).toEqual(["high-spend", "late-night"]);
  });
});
