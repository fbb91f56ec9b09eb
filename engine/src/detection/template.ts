import type { AnomalyDraft, Rule, Transaction } from "@fleetsight/shared";
import { TemplateRenderError } from "../errors.js";

const PLACEHOLDER = /\{([A-Za-z_][\w.]*)\}/g;

export type TemplateFields = Readonly<Record<string, string | undefined>>;

export function placeholders(template: string): string[] {
  return [...template.matchAll(PLACEHOLDER)].map((m) => m[1] ?? "");
}

export function renderTemplate(template: string, fields: TemplateFields): string {
  return template.replace(PLACEHOLDER, (_match, field: string) => {
    const value = fields[field];
    if (value === undefined) {
      throw new TemplateRenderError(field, template);
    }
    return value;
  });
}

function str(v: string | number | undefined): string | undefined {
  return v === undefined ? undefined : String(v);
}

export function templateFields(
  tx: Readonly<Transaction>,
  rule: Readonly<Rule>,
  anomaly?: Readonly<AnomalyDraft>,
): TemplateFields {
  return {
    id: tx.id,
    kind: tx.kind,
    timestamp: new Date(tx.timestamp).toISOString(),
    amount: str(tx.amount),
    currency: tx.currency,
    merchantName: tx.merchantName,
    merchantCategory: tx.merchantCategory,
    "location.latitude": str(tx.location?.latitude),
    "location.longitude": str(tx.location?.longitude),
    odometerReading: str(tx.odometerReading),
    vehicleId: tx.vehicleId,
    driverId: tx.driverId,
    "ml.score": str(tx.ml?.score),
    "ml.label": tx.ml?.label,
    fuelType: tx.fuelType,
    fuelVolume: str(tx.fuelVolume),
    fuelVolumeUnit: tx.fuelVolumeUnit,
    maintenanceType: tx.maintenanceType,
    "rule.id": rule.id,
    "rule.name": rule.name,
    "rule.priority": String(rule.priority),
    "anomaly.type": anomaly?.type,
    "anomaly.reason": anomaly?.reason,
    "anomaly.score": str(anomaly?.score),
    "anomaly.idempotencyKey": anomaly?.idempotencyKey,
  };
}

export const TRANSACTION_TEMPLATE_FIELDS: ReadonlySet<string> = new Set([
  "id",
  "kind",
  "timestamp",
  "amount",
  "currency",
  "merchantName",
  "merchantCategory",
  "location.latitude",
  "location.longitude",
  "odometerReading",
  "vehicleId",
  "driverId",
  "ml.score",
  "ml.label",
  "fuelType",
  "fuelVolume",
  "fuelVolumeUnit",
  "maintenanceType",
]);

export const RULE_TEMPLATE_FIELDS: ReadonlySet<string> = new Set(["rule.id", "rule.name", "rule.priority"]);

export const ANOMALY_TEMPLATE_FIELDS: ReadonlySet<string> = new Set([
  "anomaly.type",
  "anomaly.reason",
  "anomaly.score",
  "anomaly.idempotencyKey",
]);
