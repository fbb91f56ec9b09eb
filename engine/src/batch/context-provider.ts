import type { BusinessHours, Transaction } from "@fleetsight/shared";
import type { GeometryProvider } from "../geometry/regions.js";

export type ContextInputs = {
  history: readonly Transaction[];
  geometry?: GeometryProvider;
  businessHours?: BusinessHours;
};

export interface ContextProvider {
  contextFor(transaction: Readonly<Transaction>): ContextInputs | Promise<ContextInputs>;
}

export type WindowedContextOptions = {
  historyWindowMs: number;
  geometry?: GeometryProvider;
  businessHours?: BusinessHours;
};

/**
 * Serves history from an in-memory list: the same vehicle's transactions in
 * `[timestamp - historyWindowMs, timestamp]`. A transaction without a vehicle
 * gets an empty window.
 */
export class WindowedContextProvider implements ContextProvider {
  private byVehicle = new Map<string, Transaction[]>();
  private options: WindowedContextOptions;

  constructor(history: readonly Transaction[], options: WindowedContextOptions) {
    this.options = options;
    for (const tx of history) this.record(tx);
  }

  record(tx: Transaction): void {
    if (!tx.vehicleId) return;
    const list = this.byVehicle.get(tx.vehicleId) ?? [];
    list.push(tx);
    this.byVehicle.set(tx.vehicleId, list);
  }

  contextFor(transaction: Readonly<Transaction>): ContextInputs {
    const from = transaction.timestamp - this.options.historyWindowMs;
    const history = transaction.vehicleId
      ? (this.byVehicle.get(transaction.vehicleId) ?? []).filter(
          (t) => t.timestamp >= from && t.timestamp <= transaction.timestamp,
        )
      : [];
    return { history, geometry: this.options.geometry, businessHours: this.options.businessHours };
  }
}
