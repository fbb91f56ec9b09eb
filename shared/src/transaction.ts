import { z } from "zod";

// ---------------------------------------------------------------------------
// Transaction types
// ---------------------------------------------------------------------------

export type EntityType = "transaction" | "fuel_transaction" | "maintenance_transaction";

/** Decimal values may arrive as strings ("650.00") so they never pass through a float. */
export type DecimalValue = string | number;

export type GeoPoint = {
  latitude: number;
  longitude: number;
};

export type MlSignal = {
  score: number;
  label: string;
};

export type Transaction = {
  id: string;
  kind: EntityType;
  timestamp: number;
  amount: DecimalValue;
  currency: string;
  merchantName: string;
  merchantCategory: string;
  location?: GeoPoint;
  odometerReading?: number;
  vehicleId?: string;
  driverId?: string;
  ml?: MlSignal;
  fuelType?: string;
  fuelVolume?: DecimalValue;
  fuelVolumeUnit?: string;
  maintenanceType?: string;
};

// ---------------------------------------------------------------------------
// Zod schemas
// ---------------------------------------------------------------------------

export const DECIMAL_PATTERN = /^[+-]?\d+(\.\d+)?$/;

export const EntityTypeSchema = z.enum(["transaction", "fuel_transaction", "maintenance_transaction"]);

export const DecimalSchema = z.union([
  z.string().regex(DECIMAL_PATTERN, "must be a decimal number"),
  z.number().finite(),
]);

export const GeoPointSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export const TransactionSchema = z.object({
  id: z.string().min(1).max(36),
  kind: EntityTypeSchema,
  timestamp: z.number().int().nonnegative(),
  amount: DecimalSchema,
  currency: z.string().regex(/^[A-Z]{3}$/, "must be a 3-letter ISO 4217 code"),
  merchantName: z.string().max(255),
  merchantCategory: z.string(),
  location: GeoPointSchema.optional(),
  odometerReading: z.number().int().positive().optional(),
  vehicleId: z.string().min(1).optional(),
  driverId: z.string().min(1).optional(),
  ml: z.object({ score: z.number().min(0).max(1), label: z.string().min(1) }).optional(),
  fuelType: z.string().min(1).optional(),
  fuelVolume: DecimalSchema.optional(),
  fuelVolumeUnit: z.string().min(1).optional(),
  maintenanceType: z.string().min(1).optional(),
});

export function parseTransaction(raw: unknown): Transaction {
  return TransactionSchema.parse(raw);
}
