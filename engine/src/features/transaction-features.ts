import type { BusinessHours, Transaction } from "@fleetsight/shared";
import {
  addDecimal,
  divideDecimal,
  isDecimal,
  parseDecimal,
  ZERO,
  type Decimal,
} from "../conditions/decimal.js";

const DAY_MS = 86_400_000;

export type TransactionFeatures = {
  hourOfDay: number;
  dayOfWeek: number;
  isWeekend: boolean;
  isBusinessHours: boolean;
  pricePerUnit?: Decimal;
  daysSinceLastTransaction?: number;
  timeSinceLastTransaction?: number;
  distanceSinceLastTransaction?: number;
  avgConsumptionRate?: Decimal;
  windowTransactionCount: number;
  windowTotalAmount: Decimal;
  windowMerchantCount: number;
};

export type FeatureOptions = {
  businessHours: BusinessHours;
};

export const DEFAULT_BUSINESS_HOURS: BusinessHours = { start: 8, end: 18 };

function normalizeMerchant(name: string): string {
  return name.toLowerCase().trim().replace(/\s+/g, " ");
}

/** Day of week with Monday = 0, computed in UTC. */
function mondayBasedDay(date: Date): number {
  return (date.getUTCDay() + 6) % 7;
}

function timeFeatures(timestamp: number, hours: BusinessHours) {
  const date = new Date(timestamp);
  const hourOfDay = date.getUTCHours();
  const dayOfWeek = mondayBasedDay(date);
  return {
    hourOfDay,
    dayOfWeek,
    isWeekend: dayOfWeek >= 5,
    isBusinessHours: hourOfDay >= hours.start && hourOfDay < hours.end,
  };
}

function pricePerUnit(tx: Readonly<Transaction>): Decimal | undefined {
  if (tx.kind !== "fuel_transaction" || tx.fuelVolume === undefined) return undefined;
  if (!isDecimal(tx.amount) || !isDecimal(tx.fuelVolume)) return undefined;
  return divideDecimal(parseDecimal(tx.amount), parseDecimal(tx.fuelVolume), 4);
}

function historyFeatures(tx: Readonly<Transaction>, history: readonly Transaction[]) {
  if (!tx.vehicleId) return {};

  const previous = history
    .filter((t) => t.vehicleId === tx.vehicleId && t.timestamp < tx.timestamp && t.id !== tx.id)
    .sort((a, b) => b.timestamp - a.timestamp)[0];
  if (!previous) return {};

  const timeSinceLastTransaction = tx.timestamp - previous.timestamp;
  const result: Pick<
    TransactionFeatures,
    "daysSinceLastTransaction" | "timeSinceLastTransaction" | "distanceSinceLastTransaction" | "avgConsumptionRate"
  > = {
    timeSinceLastTransaction,
    daysSinceLastTransaction: Math.floor(timeSinceLastTransaction / DAY_MS),
  };

  if (tx.odometerReading !== undefined && previous.odometerReading !== undefined) {
    const distance = Math.max(0, tx.odometerReading - previous.odometerReading);
    result.distanceSinceLastTransaction = distance;

    // Volume per 100 distance units
    if (tx.kind === "fuel_transaction" && tx.fuelVolume !== undefined && isDecimal(tx.fuelVolume) && distance > 0) {
      const volume = parseDecimal(tx.fuelVolume);
      result.avgConsumptionRate = divideDecimal(
        { units: volume.units * 100n, scale: volume.scale },
        { units: BigInt(distance), scale: 0 },
        4,
      );
    }
  }

  return result;
}

function windowFeatures(tx: Readonly<Transaction>, history: readonly Transaction[]) {
  const merchant = normalizeMerchant(tx.merchantName);
  let windowTransactionCount = 0;
  let windowMerchantCount = 0;
  let windowTotalAmount = ZERO;

  for (const other of history) {
    if (other.id === tx.id) continue;
    windowTransactionCount++;
    if (normalizeMerchant(other.merchantName) === merchant) windowMerchantCount++;
    if (isDecimal(other.amount)) {
      windowTotalAmount = addDecimal(windowTotalAmount, parseDecimal(other.amount));
    }
  }

  return { windowTransactionCount, windowMerchantCount, windowTotalAmount };
}

/**
 * Derive the features rules can reference from a transaction and the window of
 * prior transactions supplied by the caller. The transaction itself is excluded
 * from the window aggregates when it appears in `history`.
 */
export function extractFeatures(
  tx: Readonly<Transaction>,
  history: readonly Transaction[],
  options: FeatureOptions = { businessHours: DEFAULT_BUSINESS_HOURS },
): TransactionFeatures {
  return {
    ...timeFeatures(tx.timestamp, options.businessHours),
    pricePerUnit: pricePerUnit(tx),
    ...historyFeatures(tx, history),
    ...windowFeatures(tx, history),
  };
}
