import type Database from "better-sqlite3";
import type { EngineConfig, Transaction } from "@fleetsight/shared";
import { BatchDetector, type EffectGateway } from "./batch/batch-detector.js";
import { WindowedContextProvider, type ContextProvider } from "./batch/context-provider.js";
import type { GeometryProvider } from "./geometry/regions.js";
import { ReviewWorkflow } from "./review/workflow.js";
import { createFileRuleRepository, type RuleRepository } from "./rules/repository.js";
import { SqliteAnomalyStore } from "./store/anomaly-store.js";
import { createAnomalyDb } from "./store/db.js";
import { createLogger, setLogLevel } from "./utils/logger.js";

const log = createLogger("engine");

export type EngineOverrides = {
  repository?: RuleRepository;
  contextProvider?: ContextProvider;
  gateway?: EffectGateway;
  /** Seeds the default windowed context provider. */
  history?: readonly Transaction[];
  geometry?: GeometryProvider;
  now?: () => number;
};

export type Engine = {
  config: EngineConfig;
  db: Database.Database;
  store: SqliteAnomalyStore;
  repository: RuleRepository;
  detector: BatchDetector;
  review: ReviewWorkflow;
  close: () => void;
};

export function createEngine(config: EngineConfig, overrides: EngineOverrides = {}): Engine {
  setLogLevel(config.logLevel);

  const db = createAnomalyDb(config.store.path);
  const store = new SqliteAnomalyStore(db);
  const repository = overrides.repository ?? createFileRuleRepository(config.rules.dir, config.rules.activeFile);
  const contextProvider =
    overrides.contextProvider ??
    new WindowedContextProvider(overrides.history ?? [], {
      historyWindowMs: config.detection.historyWindowMs,
      geometry: overrides.geometry,
      businessHours: config.detection.businessHours,
    });

  const detector = new BatchDetector({
    repository,
    contextProvider,
    sink: store,
    gateway: overrides.gateway,
    concurrency: config.detection.concurrency,
    timeoutMs: config.detection.timeoutMs,
    now: overrides.now,
  });
  const review = new ReviewWorkflow({ store, now: overrides.now });

  log.info("Engine ready", { store: config.store.path, rulesDir: config.rules.dir });

  return {
    config,
    db,
    store,
    repository,
    detector,
    review,
    close: () => db.close(),
  };
}
