import type { AttributeCondition, Condition, ConditionOperator, PropertyRef, Threshold } from "@fleetsight/shared";
import { assertUnreachable, errorMessage, GeometryLookupError, MalformedRuleError, UnresolvedPropertyError } from "../errors.js";
import type { EvaluationContext } from "./context.js";
import { compareDecimal, parseDecimal } from "./decimal.js";
import type { PropertyType, PropertyValue } from "./properties.js";

export type EvaluateOptions = {
  /** Properties whose absence makes an attribute false instead of raising. */
  optionalProperties?: readonly PropertyRef[];
};

const COMPATIBLE: Record<ConditionOperator, ReadonlyArray<readonly [PropertyType, Threshold["kind"]]>> = {
  eq: [["decimal", "number"], ["string", "string"], ["boolean", "boolean"], ["duration", "duration"]],
  ne: [["decimal", "number"], ["string", "string"], ["boolean", "boolean"], ["duration", "duration"]],
  gt: [["decimal", "number"], ["duration", "duration"]],
  ge: [["decimal", "number"], ["duration", "duration"]],
  lt: [["decimal", "number"], ["duration", "duration"]],
  le: [["decimal", "number"], ["duration", "duration"]],
  contains: [["string", "string"]],
  within_region: [["point", "region"]],
  not_in_set: [["string", "set"]],
};

export function isCompatible(operator: ConditionOperator, propertyType: PropertyType, thresholdKind: Threshold["kind"]): boolean {
  return COMPATIBLE[operator].some(([p, t]) => p === propertyType && t === thresholdKind);
}

function mismatch(condition: AttributeCondition, value: PropertyValue): never {
  throw new MalformedRuleError([
    `operator ${condition.operator} cannot compare ${value.type} property "${condition.property}" with a ${condition.threshold.kind} threshold`,
  ]);
}

/** -1, 0 or 1 for ordered values; undefined when the pair has no ordering. */
function order(value: PropertyValue, threshold: Threshold): -1 | 0 | 1 | undefined {
  if (value.type === "decimal" && threshold.kind === "number") {
    return compareDecimal(value.value, parseDecimal(threshold.value));
  }
  if (value.type === "duration" && threshold.kind === "duration") {
    return value.value < threshold.ms ? -1 : value.value > threshold.ms ? 1 : 0;
  }
  return undefined;
}

function equals(value: PropertyValue, threshold: Threshold): boolean | undefined {
  if (value.type === "string" && threshold.kind === "string") return value.value === threshold.value;
  if (value.type === "boolean" && threshold.kind === "boolean") return value.value === threshold.value;
  const o = order(value, threshold);
  return o === undefined ? undefined : o === 0;
}

function evaluateAttribute(
  condition: AttributeCondition,
  context: EvaluationContext,
  optional: readonly PropertyRef[],
): boolean {
  const value = context.resolve(condition.property);
  if (value === undefined) {
    if (optional.includes(condition.property)) return false;
    throw new UnresolvedPropertyError(condition.property);
  }

  const { threshold } = condition;

  switch (condition.operator) {
    case "eq":
    case "ne": {
      const same = equals(value, threshold);
      if (same === undefined) return mismatch(condition, value);
      return condition.operator === "eq" ? same : !same;
    }
    case "gt":
    case "ge":
    case "lt":
    case "le": {
      const o = order(value, threshold);
      if (o === undefined) return mismatch(condition, value);
      if (condition.operator === "gt") return o > 0;
      if (condition.operator === "ge") return o >= 0;
      if (condition.operator === "lt") return o < 0;
      return o <= 0;
    }
    case "contains": {
      if (value.type !== "string" || threshold.kind !== "string") return mismatch(condition, value);
      return value.value.toLowerCase().includes(threshold.value.toLowerCase());
    }
    case "not_in_set": {
      if (value.type !== "string" || threshold.kind !== "set") return mismatch(condition, value);
      return !threshold.values.includes(value.value);
    }
    case "within_region": {
      if (value.type !== "point" || threshold.kind !== "region") return mismatch(condition, value);
      if (!context.geometry) {
        throw new GeometryLookupError(threshold.regionRef, "no geometry provider in context");
      }
      try {
        return context.geometry.contains(threshold.regionRef, value.value);
      } catch (err) {
        if (err instanceof GeometryLookupError) throw err;
        throw new GeometryLookupError(threshold.regionRef, errorMessage(err));
      }
    }
    default:
      return assertUnreachable(condition.operator);
  }
}

/**
 * Evaluate a condition tree against a context. `and` stops at the first false
 * child and `or` at the first true one; errors raised before that point propagate.
 */
export function evaluate(condition: Condition, context: EvaluationContext, options: EvaluateOptions = {}): boolean {
  switch (condition.kind) {
    case "attribute":
      return evaluateAttribute(condition, context, options.optionalProperties ?? []);
    case "and":
      for (const child of condition.children) {
        if (!evaluate(child, context, options)) return false;
      }
      return true;
    case "or":
      for (const child of condition.children) {
        if (evaluate(child, context, options)) return true;
      }
      return false;
    case "not":
      return !evaluate(condition.child, context, options);
    default:
      return assertUnreachable(condition);
  }
}
