import type { BusinessHours, PropertyRef, Transaction } from "@fleetsight/shared";
import { DEFAULT_BUSINESS_HOURS, extractFeatures, type TransactionFeatures } from "../features/transaction-features.js";
import type { GeometryProvider } from "../geometry/regions.js";
import { PROPERTY_CATALOG, type PropertyValue } from "./properties.js";

export interface EvaluationContext {
  readonly transaction: Readonly<Transaction>;
  /** Clock reading used for `detectedAt`; fixed per context so repeated runs agree. */
  readonly now: number;
  readonly geometry?: GeometryProvider;
  resolve(property: PropertyRef): PropertyValue | undefined;
}

export type ContextOptions = {
  history?: readonly Transaction[];
  geometry?: GeometryProvider;
  businessHours?: BusinessHours;
  now?: number;
};

export function createEvaluationContext(
  transaction: Readonly<Transaction>,
  options: ContextOptions = {},
): EvaluationContext {
  const history = options.history ?? [];
  const businessHours = options.businessHours ?? DEFAULT_BUSINESS_HOURS;

  let cached: TransactionFeatures | undefined;
  const features = (): TransactionFeatures => {
    cached ??= extractFeatures(transaction, history, { businessHours });
    return cached;
  };

  return {
    transaction,
    now: options.now ?? Date.now(),
    geometry: options.geometry,
    resolve(property) {
      return PROPERTY_CATALOG[property].resolve({ transaction, features });
    },
  };
}
