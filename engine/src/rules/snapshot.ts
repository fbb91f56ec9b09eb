import * as crypto from "node:crypto";
import type { EntityType, Rule } from "@fleetsight/shared";
import { deepFreeze } from "../utils/freeze.js";
import { assertValidRules } from "./loader.js";

export type RuleSnapshot = {
  readonly rules: readonly Rule[];
  readonly entityType?: EntityType;
  readonly loadedAt: number;
  readonly fingerprint: string;
};

export type SnapshotOptions = {
  entityType?: EntityType;
  now?: number;
};

/** A `transaction` rule covers every kind; a specific type covers only itself. */
export function appliesTo(ruleEntityType: EntityType, kind: EntityType): boolean {
  return ruleEntityType === "transaction" || ruleEntityType === kind;
}

/** Priority ascending, then id by code unit so the order never depends on locale. */
export function compareRules(a: Rule, b: Rule): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

export function fingerprintRules(rules: readonly Rule[]): string {
  return crypto.createHash("sha256").update(JSON.stringify(rules)).digest("hex");
}

/**
 * Copy, validate, order and freeze the active rules for one detection pass.
 * Later edits to the source rules never reach a snapshot already taken.
 */
export function createSnapshot(rules: readonly Rule[], options: SnapshotOptions = {}): RuleSnapshot {
  assertValidRules(rules);

  const { entityType } = options;
  const selected = structuredClone(
    rules.filter((rule) => rule.active && (entityType === undefined || appliesTo(rule.entityType, entityType))),
  ).sort(compareRules);

  return deepFreeze({
    rules: selected,
    entityType,
    loadedAt: options.now ?? Date.now(),
    fingerprint: fingerprintRules(selected),
  });
}
