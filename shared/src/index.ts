export type {
  EntityType,
  DecimalValue,
  GeoPoint,
  MlSignal,
  Transaction,
} from "./transaction.js";

export {
  DECIMAL_PATTERN,
  EntityTypeSchema,
  DecimalSchema,
  GeoPointSchema,
  TransactionSchema,
  parseTransaction,
} from "./transaction.js";

export type {
  PropertyRef,
  ConditionOperator,
  NumberThreshold,
  StringThreshold,
  BooleanThreshold,
  DurationThreshold,
  SetThreshold,
  RegionThreshold,
  Threshold,
  AttributeCondition,
  AndCondition,
  OrCondition,
  NotCondition,
  Condition,
} from "./condition.js";

export {
  PROPERTY_REFS,
  PropertyRefSchema,
  ConditionOperatorSchema,
  ThresholdSchema,
  ConditionSchema,
} from "./condition.js";

export type {
  CreateAnomalyAction,
  UpdateStatusAction,
  NotifyAction,
  InvokeServiceAction,
  Action,
  Rule,
  RuleSet,
  Policy,
} from "./rule.js";

export { ActionSchema, RuleSchema, RuleSetSchema, PolicySchema } from "./rule.js";

export type {
  AnomalyType,
  FeedbackStatus,
  AnomalyDraft,
  Anomaly,
  FeedbackEventKind,
  FeedbackEvent,
  FeedbackSubmission,
  AmendmentSubmission,
  AnomalyFilter,
} from "./anomaly.js";

export {
  AnomalyTypeSchema,
  FeedbackStatusSchema,
  FeedbackSubmissionSchema,
  AmendmentSubmissionSchema,
} from "./anomaly.js";

export type {
  EffectTargetType,
  CreateAnomalyRequest,
  StatusUpdateRequest,
  NotificationRequest,
  ServiceInvocationRequest,
  EffectRequest,
  ExternalEffect,
} from "./effects.js";

export { type EngineConfig, type BusinessHours, EngineConfigSchema, parseConfig } from "./config.js";
