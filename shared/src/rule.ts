import { z } from "zod";
import { AnomalyTypeSchema, type AnomalyType } from "./anomaly.js";
import { ConditionSchema, PropertyRefSchema, type Condition, type PropertyRef } from "./condition.js";
import { EntityTypeSchema, type EntityType } from "./transaction.js";

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export type CreateAnomalyAction = {
  kind: "create_anomaly";
  anomalyType: AnomalyType;
  reasonTemplate: string;
  score?: number;
};

export type UpdateStatusAction = {
  kind: "update_status";
  targetProperty: string;
  newValue: string;
};

export type NotifyAction = {
  kind: "notify";
  channel: string;
  template: string;
  role: string;
};

export type InvokeServiceAction = {
  kind: "invoke_service";
  serviceRef: string;
  payloadTemplate: Readonly<Record<string, string>>;
};

export type Action = CreateAnomalyAction | UpdateStatusAction | NotifyAction | InvokeServiceAction;

// ---------------------------------------------------------------------------
// Rules and policies
// ---------------------------------------------------------------------------

export type Rule = {
  id: string;
  name: string;
  description?: string;
  priority: number;
  active: boolean;
  entityType: EntityType;
  condition: Condition;
  actions: readonly Action[];
  optionalProperties?: readonly PropertyRef[];
};

export type RuleSet = {
  id: string;
  name: string;
  version: number;
  rules: readonly Rule[];
};

export type Policy = {
  id: string;
  name: string;
  description?: string;
  ruleSets: readonly RuleSet[];
};

// ---------------------------------------------------------------------------
// Zod schemas
// ---------------------------------------------------------------------------

export const ActionSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("create_anomaly"),
    anomalyType: AnomalyTypeSchema,
    reasonTemplate: z.string().min(1),
    score: z.number().min(0).max(1).optional(),
  }),
  z.object({
    kind: z.literal("update_status"),
    targetProperty: z.string().min(1),
    newValue: z.string(),
  }),
  z.object({
    kind: z.literal("notify"),
    channel: z.string().min(1),
    template: z.string().min(1),
    role: z.string().min(1),
  }),
  z.object({
    kind: z.literal("invoke_service"),
    serviceRef: z.string().min(1),
    payloadTemplate: z.record(z.string()),
  }),
]);

export const RuleSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  priority: z.number().int(),
  active: z.boolean().default(true),
  entityType: EntityTypeSchema.default("transaction"),
  condition: ConditionSchema,
  actions: z.array(ActionSchema).min(1, "a rule needs at least one action"),
  optionalProperties: z.array(PropertyRefSchema).optional(),
});

export const RuleSetSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  version: z.number().int().positive().default(1),
  rules: z.array(RuleSchema),
});

export const PolicySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  ruleSets: z.array(RuleSetSchema),
});
