export { createEngine, type Engine, type EngineOverrides } from "./engine.js";
export { loadConfig, loadConfigFromEnvironment, type Env } from "./config/load-config.js";

export {
  EngineError,
  RuleScopedError,
  UnresolvedPropertyError,
  GeometryLookupError,
  TemplateRenderError,
  IllegalTransitionError,
  ConcurrentModificationError,
  AnomalyNotFoundError,
  MalformedRuleError,
  RuleRepositoryError,
  ConfigError,
  InvalidInputError,
  type EngineErrorCode,
} from "./errors.js";

export { evaluate, isCompatible, type EvaluateOptions } from "./conditions/evaluator.js";
export { createEvaluationContext, type EvaluationContext, type ContextOptions } from "./conditions/context.js";
export { PROPERTY_CATALOG, isPropertyAvailable, type PropertyType, type PropertyValue } from "./conditions/properties.js";
export { parseDecimal, compareDecimal, formatDecimal, type Decimal } from "./conditions/decimal.js";
export { extractFeatures, type TransactionFeatures } from "./features/transaction-features.js";
export { RegionIndex, pointInPolygon, type GeometryProvider, type Polygon, type RegionDefinition } from "./geometry/regions.js";

export { loadRules, loadRuleSet, loadPolicy, rulesOf, validateRules } from "./rules/loader.js";
export { createSnapshot, appliesTo, compareRules, type RuleSnapshot } from "./rules/snapshot.js";
export {
  InMemoryRuleRepository,
  FileRuleRepository,
  createFileRuleRepository,
  type RuleRepository,
} from "./rules/repository.js";

export { dispatch, idempotencyKey, type DispatchOptions } from "./detection/dispatcher.js";
export { renderTemplate, placeholders } from "./detection/template.js";
export {
  detect,
  evaluateTransaction,
  type DetectionResult,
  type DetectOptions,
  type RuleError,
} from "./detection/detector.js";

export {
  ALLOWED_TRANSITIONS,
  canTransition,
  isClosed,
  applyTransition,
  applyAmendment,
  ReviewWorkflow,
  type ReviewStore,
  type TransitionResult,
} from "./review/workflow.js";

export { createAnomalyDb } from "./store/db.js";
export { SqliteAnomalyStore, type RuleOutcomeStats, type UpsertResult } from "./store/anomaly-store.js";

export {
  BatchDetector,
  type BatchReport,
  type DraftSink,
  type EffectGateway,
  type EffectFailure,
  type RunOptions,
  type TransactionError,
} from "./batch/batch-detector.js";
export { WindowedContextProvider, type ContextProvider, type ContextInputs } from "./batch/context-provider.js";
export { WorkerPool, PoolTimeoutError, type PoolTask, type TaskOutcome } from "./batch/worker-pool.js";

export { createLogger, setLogHandler, setLogLevel, type Logger, type LogEntry } from "./utils/logger.js";
