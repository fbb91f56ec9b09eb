import { z } from "zod";
import { DecimalSchema, type DecimalValue } from "./transaction.js";

// ---------------------------------------------------------------------------
// Property references
// ---------------------------------------------------------------------------

export const PROPERTY_REFS = [
  "kind",
  "amount",
  "currency",
  "merchantName",
  "merchantCategory",
  "location",
  "hasLocation",
  "odometerReading",
  "vehicleId",
  "driverId",
  "mlScore",
  "mlLabel",
  "fuelType",
  "fuelVolume",
  "pricePerUnit",
  "maintenanceType",
  "hourOfDay",
  "dayOfWeek",
  "isWeekend",
  "isBusinessHours",
  "daysSinceLastTransaction",
  "timeSinceLastTransaction",
  "distanceSinceLastTransaction",
  "avgConsumptionRate",
  "windowTransactionCount",
  "windowTotalAmount",
  "windowMerchantCount",
] as const;

export type PropertyRef = (typeof PROPERTY_REFS)[number];

export type ConditionOperator =
  | "eq"
  | "ne"
  | "gt"
  | "ge"
  | "lt"
  | "le"
  | "contains"
  | "within_region"
  | "not_in_set";

// ---------------------------------------------------------------------------
// Thresholds
// ---------------------------------------------------------------------------

export type NumberThreshold = { kind: "number"; name?: string; value: DecimalValue; unit?: string };
export type StringThreshold = { kind: "string"; name?: string; value: string };
export type BooleanThreshold = { kind: "boolean"; name?: string; value: boolean };
export type DurationThreshold = { kind: "duration"; name?: string; ms: number; unit?: string };
export type SetThreshold = { kind: "set"; name?: string; values: readonly string[] };
export type RegionThreshold = { kind: "region"; name?: string; regionRef: string };

export type Threshold =
  | NumberThreshold
  | StringThreshold
  | BooleanThreshold
  | DurationThreshold
  | SetThreshold
  | RegionThreshold;

// ---------------------------------------------------------------------------
// Condition tree
// ---------------------------------------------------------------------------

export type AttributeCondition = {
  kind: "attribute";
  property: PropertyRef;
  operator: ConditionOperator;
  threshold: Threshold;
};

export type AndCondition = { kind: "and"; children: readonly Condition[] };
export type OrCondition = { kind: "or"; children: readonly Condition[] };
export type NotCondition = { kind: "not"; child: Condition };

export type Condition = AttributeCondition | AndCondition | OrCondition | NotCondition;

// ---------------------------------------------------------------------------
// Zod schemas
// ---------------------------------------------------------------------------

export const PropertyRefSchema = z.enum(PROPERTY_REFS);

export const ConditionOperatorSchema = z.enum([
  "eq",
  "ne",
  "gt",
  "ge",
  "lt",
  "le",
  "contains",
  "within_region",
  "not_in_set",
]);

export const ThresholdSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("number"), name: z.string().optional(), value: DecimalSchema, unit: z.string().optional() }),
  z.object({ kind: z.literal("string"), name: z.string().optional(), value: z.string() }),
  z.object({ kind: z.literal("boolean"), name: z.string().optional(), value: z.boolean() }),
  z.object({
    kind: z.literal("duration"),
    name: z.string().optional(),
    ms: z.number().int().nonnegative(),
    unit: z.string().optional(),
  }),
  z.object({ kind: z.literal("set"), name: z.string().optional(), values: z.array(z.string()) }),
  z.object({ kind: z.literal("region"), name: z.string().optional(), regionRef: z.string().min(1) }),
]);

export const ConditionSchema: z.ZodType<Condition> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({
      kind: z.literal("attribute"),
      property: PropertyRefSchema,
      operator: ConditionOperatorSchema,
      threshold: ThresholdSchema,
    }),
    z.object({
      kind: z.literal("and"),
      children: z.array(ConditionSchema).min(1, "and requires at least one child"),
    }),
    z.object({
      kind: z.literal("or"),
      children: z.array(ConditionSchema).min(1, "or requires at least one child"),
    }),
    z.object({ kind: z.literal("not"), child: ConditionSchema }).strict(),
  ]),
);
