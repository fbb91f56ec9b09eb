import {
  PolicySchema,
  RuleSchema,
  RuleSetSchema,
  type Action,
  type Condition,
  type EntityType,
  type Policy,
  type Rule,
  type RuleSet,
} from "@fleetsight/shared";
import { z } from "zod";
import { isCompatible } from "../conditions/evaluator.js";
import { isPropertyAvailable, PROPERTY_CATALOG } from "../conditions/properties.js";
import {
  ANOMALY_TEMPLATE_FIELDS,
  placeholders,
  RULE_TEMPLATE_FIELDS,
  TRANSACTION_TEMPLATE_FIELDS,
} from "../detection/template.js";
import { isTargetType, splitTargetProperty } from "../detection/dispatcher.js";
import { assertUnreachable, MalformedRuleError } from "../errors.js";
import { deepFreeze } from "../utils/freeze.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("rule-loader");

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
}

type ConditionScope = {
  entityType: EntityType;
  optional: readonly string[];
  negated: boolean;
};

function checkCondition(condition: Condition, scope: ConditionScope, path: string, problems: string[]): void {
  const { entityType } = scope;
  switch (condition.kind) {
    case "attribute": {
      const { property, operator, threshold } = condition;
      if (!(property in PROPERTY_CATALOG)) {
        problems.push(`${path}: unknown property "${property}"`);
        return;
      }
      // An absent optional property reads as false, which a negation would turn into a match.
      if (scope.negated && scope.optional.includes(property)) {
        problems.push(`${path}: optional property "${property}" cannot appear under not`);
      }
      if (!isPropertyAvailable(property, entityType)) {
        problems.push(`${path}: property "${property}" is not available on ${entityType}`);
      }
      if (!isCompatible(operator, PROPERTY_CATALOG[property].type, threshold.kind)) {
        problems.push(
          `${path}: operator ${operator} cannot compare ${PROPERTY_CATALOG[property].type} property "${property}" with a ${threshold.kind} threshold`,
        );
      }
      return;
    }
    case "and":
    case "or":
      if (condition.children.length === 0) {
        problems.push(`${path}: ${condition.kind} requires at least one child`);
      }
      condition.children.forEach((child, i) => checkCondition(child, scope, `${path}.children.${i}`, problems));
      return;
    case "not":
      checkCondition(condition.child, { ...scope, negated: true }, `${path}.child`, problems);
      return;
    default:
      assertUnreachable(condition);
  }
}

function actionTemplates(action: Action): string[] {
  switch (action.kind) {
    case "create_anomaly":
      return [action.reasonTemplate];
    case "update_status":
      return [];
    case "notify":
      return [action.template];
    case "invoke_service":
      return Object.values(action.payloadTemplate);
    default:
      return assertUnreachable(action);
  }
}

function checkActions(rule: Rule, path: string, problems: string[]): void {
  if (rule.actions.length === 0) {
    problems.push(`${path}.actions: a rule needs at least one action`);
  }

  let anomalyAvailable = false;
  rule.actions.forEach((action, i) => {
    for (const field of actionTemplates(action).flatMap(placeholders)) {
      const known =
        TRANSACTION_TEMPLATE_FIELDS.has(field) ||
        RULE_TEMPLATE_FIELDS.has(field) ||
        (anomalyAvailable && action.kind !== "create_anomaly" && ANOMALY_TEMPLATE_FIELDS.has(field));
      if (!known) {
        problems.push(`${path}.actions.${i}: unknown template field "{${field}}"`);
      }
    }
    if (action.kind === "update_status") {
      const { entity, property } = splitTargetProperty(action.targetProperty);
      if (!isTargetType(entity) || property.length === 0) {
        problems.push(`${path}.actions.${i}: unknown status target "${action.targetProperty}"`);
      }
    }
    if (action.kind === "create_anomaly") anomalyAvailable = true;
  });
}

/** Semantic checks that a schema cannot express. Returns one message per problem. */
export function validateRules(rules: readonly Rule[]): string[] {
  const problems: string[] = [];
  const seen = new Set<string>();

  rules.forEach((rule, i) => {
    const path = `rules.${i}`;
    if (seen.has(rule.id)) {
      problems.push(`${path}: duplicate rule id "${rule.id}"`);
    }
    seen.add(rule.id);

    const scope: ConditionScope = {
      entityType: rule.entityType,
      optional: rule.optionalProperties ?? [],
      negated: false,
    };
    checkCondition(rule.condition, scope, `${path}.condition`, problems);
    for (const property of rule.optionalProperties ?? []) {
      if (!isPropertyAvailable(property, rule.entityType)) {
        problems.push(`${path}.optionalProperties: "${property}" is not available on ${rule.entityType}`);
      }
    }
    checkActions(rule, path, problems);
  });

  return problems;
}

export function assertValidRules(rules: readonly Rule[]): void {
  const problems = validateRules(rules);
  if (problems.length > 0) {
    log.warn("Rejected malformed rules", { problems });
    throw new MalformedRuleError(problems);
  }
}

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const problems = formatIssues(result.error);
    log.warn("Rejected malformed rules", { problems });
    throw new MalformedRuleError(problems);
  }
  return result.data;
}

export function loadRules(raw: unknown): Rule[] {
  const rules = parseWith(z.array(RuleSchema), raw);
  assertValidRules(rules);
  return deepFreeze(rules);
}

export function loadRuleSet(raw: unknown): RuleSet {
  const ruleSet = parseWith(RuleSetSchema, raw);
  assertValidRules(ruleSet.rules);
  return deepFreeze(ruleSet);
}

export function loadPolicy(raw: unknown): Policy {
  const policy = parseWith(PolicySchema, raw);
  assertValidRules(policy.ruleSets.flatMap((set) => set.rules));
  return deepFreeze(policy);
}

export function rulesOf(policy: Policy): Rule[] {
  return policy.ruleSets.flatMap((set) => [...set.rules]);
}
