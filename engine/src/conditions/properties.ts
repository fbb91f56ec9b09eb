import type { DecimalValue, EntityType, GeoPoint, PropertyRef, Transaction } from "@fleetsight/shared";
import type { TransactionFeatures } from "../features/transaction-features.js";
import { isDecimal, parseDecimal, type Decimal } from "./decimal.js";

export type PropertyType = "decimal" | "string" | "boolean" | "duration" | "point";

export type PropertyValue =
  | { type: "decimal"; value: Decimal }
  | { type: "string"; value: string }
  | { type: "boolean"; value: boolean }
  | { type: "duration"; value: number }
  | { type: "point"; value: GeoPoint };

export type PropertySource = {
  transaction: Readonly<Transaction>;
  features: () => TransactionFeatures;
};

export type PropertyDefinition = {
  type: PropertyType;
  entityTypes: readonly EntityType[];
  resolve: (source: PropertySource) => PropertyValue | undefined;
};

const ALL: readonly EntityType[] = ["transaction", "fuel_transaction", "maintenance_transaction"];
const FUEL: readonly EntityType[] = ["fuel_transaction"];
const MAINTENANCE: readonly EntityType[] = ["maintenance_transaction"];

function decimal(v: DecimalValue | undefined): PropertyValue | undefined {
  return v !== undefined && isDecimal(v) ? { type: "decimal", value: parseDecimal(v) } : undefined;
}

function decimalOf(d: Decimal | undefined): PropertyValue | undefined {
  return d ? { type: "decimal", value: d } : undefined;
}

function text(v: string | undefined): PropertyValue | undefined {
  return v !== undefined ? { type: "string", value: v } : undefined;
}

function flag(v: boolean): PropertyValue {
  return { type: "boolean", value: v };
}

function def(
  type: PropertyType,
  entityTypes: readonly EntityType[],
  resolve: (source: PropertySource) => PropertyValue | undefined,
): PropertyDefinition {
  return { type, entityTypes, resolve };
}

export const PROPERTY_CATALOG: Readonly<Record<PropertyRef, PropertyDefinition>> = {
  kind: def("string", ALL, ({ transaction }) => text(transaction.kind)),
  amount: def("decimal", ALL, ({ transaction }) => decimal(transaction.amount)),
  currency: def("string", ALL, ({ transaction }) => text(transaction.currency)),
  merchantName: def("string", ALL, ({ transaction }) => text(transaction.merchantName)),
  merchantCategory: def("string", ALL, ({ transaction }) => text(transaction.merchantCategory)),
  location: def("point", ALL, ({ transaction }) =>
    transaction.location ? { type: "point", value: transaction.location } : undefined,
  ),
  hasLocation: def("boolean", ALL, ({ transaction }) => flag(transaction.location !== undefined)),
  odometerReading: def("decimal", ALL, ({ transaction }) => decimal(transaction.odometerReading)),
  vehicleId: def("string", ALL, ({ transaction }) => text(transaction.vehicleId)),
  driverId: def("string", ALL, ({ transaction }) => text(transaction.driverId)),
  mlScore: def("decimal", ALL, ({ transaction }) => decimal(transaction.ml?.score)),
  mlLabel: def("string", ALL, ({ transaction }) => text(transaction.ml?.label)),
  fuelType: def("string", FUEL, ({ transaction }) => text(transaction.fuelType)),
  fuelVolume: def("decimal", FUEL, ({ transaction }) => decimal(transaction.fuelVolume)),
  pricePerUnit: def("decimal", FUEL, ({ features }) => decimalOf(features().pricePerUnit)),
  maintenanceType: def("string", MAINTENANCE, ({ transaction }) => text(transaction.maintenanceType)),
  hourOfDay: def("decimal", ALL, ({ features }) => decimal(features().hourOfDay)),
  dayOfWeek: def("decimal", ALL, ({ features }) => decimal(features().dayOfWeek)),
  isWeekend: def("boolean", ALL, ({ features }) => flag(features().isWeekend)),
  isBusinessHours: def("boolean", ALL, ({ features }) => flag(features().isBusinessHours)),
  daysSinceLastTransaction: def("decimal", ALL, ({ features }) => decimal(features().daysSinceLastTransaction)),
  timeSinceLastTransaction: def("duration", ALL, ({ features }) => {
    const ms = features().timeSinceLastTransaction;
    return ms !== undefined ? { type: "duration", value: ms } : undefined;
  }),
  distanceSinceLastTransaction: def("decimal", ALL, ({ features }) =>
    decimal(features().distanceSinceLastTransaction),
  ),
  avgConsumptionRate: def("decimal", FUEL, ({ features }) => decimalOf(features().avgConsumptionRate)),
  windowTransactionCount: def("decimal", ALL, ({ features }) => decimal(features().windowTransactionCount)),
  windowTotalAmount: def("decimal", ALL, ({ features }) => decimalOf(features().windowTotalAmount)),
  windowMerchantCount: def("decimal", ALL, ({ features }) => decimal(features().windowMerchantCount)),
};

export function isPropertyAvailable(property: PropertyRef, entityType: EntityType): boolean {
  return PROPERTY_CATALOG[property].entityTypes.includes(entityType);
}
