import type { AnomalyDraft, EffectRequest, ExternalEffect, Rule, Transaction } from "@fleetsight/shared";
import type { EvaluationContext } from "../conditions/context.js";
import { evaluate } from "../conditions/evaluator.js";
import { RuleScopedError } from "../errors.js";
import { appliesTo, type RuleSnapshot } from "../rules/snapshot.js";
import { createLogger } from "../utils/logger.js";
import { dispatch, idempotencyKey } from "./dispatcher.js";

const log = createLogger("detector");

export type RuleError = {
  transactionId: string;
  ruleId: string;
  /** Index of the failing action; absent when the condition itself failed. */
  actionIndex?: number;
  error: RuleScopedError;
};

export type DetectionResult = {
  transactionId: string;
  drafts: AnomalyDraft[];
  effects: ExternalEffect[];
  ruleErrors: RuleError[];
  actionErrors: RuleError[];
  /** Idempotency keys skipped because the caller had already seen them. */
  duplicates: string[];
};

export type DetectOptions = {
  seenKeys?: ReadonlySet<string>;
};

function matches(rule: Readonly<Rule>, context: EvaluationContext): boolean {
  return evaluate(rule.condition, context, { optionalProperties: rule.optionalProperties });
}

/**
 * Run every applicable active rule of the snapshot against one transaction.
 * Rule-scoped failures are collected; anything else propagates.
 */
export function evaluateTransaction(
  transaction: Readonly<Transaction>,
  snapshot: RuleSnapshot,
  context: EvaluationContext,
  options: DetectOptions = {},
): DetectionResult {
  const result: DetectionResult = {
    transactionId: transaction.id,
    drafts: [],
    effects: [],
    ruleErrors: [],
    actionErrors: [],
    duplicates: [],
  };

  for (const rule of snapshot.rules) {
    if (!rule.active || !appliesTo(rule.entityType, transaction.kind)) continue;

    const key = idempotencyKey(transaction.id, rule.id);
    if (options.seenKeys?.has(key)) {
      result.duplicates.push(key);
      continue;
    }

    let matched: boolean;
    try {
      matched = matches(rule, context);
    } catch (err) {
      if (!(err instanceof RuleScopedError)) throw err;
      log.warn("Rule skipped", { transactionId: transaction.id, ruleId: rule.id, code: err.code, error: err.message });
      result.ruleErrors.push({ transactionId: transaction.id, ruleId: rule.id, error: err });
      continue;
    }
    if (!matched) continue;

    let draft: AnomalyDraft | undefined;
    rule.actions.forEach((action, actionIndex) => {
      if (action.kind === "create_anomaly" && draft !== undefined) {
        log.warn("Ignoring repeated create_anomaly", { ruleId: rule.id, actionIndex });
        return;
      }

      let effect: EffectRequest;
      try {
        effect = dispatch(action, rule, transaction, { now: context.now, anomaly: draft });
      } catch (err) {
        if (!(err instanceof RuleScopedError)) throw err;
        log.warn("Action dropped", {
          transactionId: transaction.id,
          ruleId: rule.id,
          actionIndex,
          code: err.code,
          error: err.message,
        });
        result.actionErrors.push({ transactionId: transaction.id, ruleId: rule.id, actionIndex, error: err });
        return;
      }

      if (effect.type === "create_anomaly") {
        draft = effect.draft;
        result.drafts.push(effect.draft);
      } else {
        result.effects.push(effect);
      }
    });
  }

  return result;
}

export function detect(
  transaction: Readonly<Transaction>,
  snapshot: RuleSnapshot,
  context: EvaluationContext,
): AnomalyDraft[] {
  return evaluateTransaction(transaction, snapshot, context).drafts;
}
