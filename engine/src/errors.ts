import type { FeedbackStatus } from "@fleetsight/shared";

export type EngineErrorCode =
  | "UNRESOLVED_PROPERTY"
  | "TEMPLATE_RENDER"
  | "GEOMETRY_LOOKUP"
  | "ILLEGAL_TRANSITION"
  | "CONCURRENT_MODIFICATION"
  | "ANOMALY_NOT_FOUND"
  | "MALFORMED_RULE"
  | "RULE_REPOSITORY"
  | "CONFIG"
  | "INVALID_INPUT";

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: EngineErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.details = details;
  }
}

/** Errors that skip one rule (or one action) for one transaction. */
export class RuleScopedError extends EngineError {}

export class UnresolvedPropertyError extends RuleScopedError {
  readonly property: string;

  constructor(property: string) {
    super("UNRESOLVED_PROPERTY", `Property "${property}" could not be resolved`, { property });
    this.name = "UnresolvedPropertyError";
    this.property = property;
  }
}

export class GeometryLookupError extends RuleScopedError {
  readonly regionRef: string;

  constructor(regionRef: string, cause?: string) {
    super("GEOMETRY_LOOKUP", `Region lookup failed for "${regionRef}"${cause ? `: ${cause}` : ""}`, { regionRef });
    this.name = "GeometryLookupError";
    this.regionRef = regionRef;
  }
}

export class TemplateRenderError extends RuleScopedError {
  readonly field: string;

  constructor(field: string, template: string) {
    super("TEMPLATE_RENDER", `Template field "${field}" is missing`, { field, template });
    this.name = "TemplateRenderError";
    this.field = field;
  }
}

export class IllegalTransitionError extends EngineError {
  readonly from: FeedbackStatus;
  readonly to: FeedbackStatus;

  constructor(from: FeedbackStatus, to: FeedbackStatus) {
    super("ILLEGAL_TRANSITION", `Illegal transition: ${from} -> ${to}`, { from, to });
    this.name = "IllegalTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class ConcurrentModificationError extends EngineError {
  constructor(anomalyId: string, expectedVersion: number, actualVersion: number) {
    super(
      "CONCURRENT_MODIFICATION",
      `Anomaly ${anomalyId} was modified concurrently (expected version ${expectedVersion}, found ${actualVersion})`,
      { anomalyId, expectedVersion, actualVersion },
    );
    this.name = "ConcurrentModificationError";
  }
}

export class AnomalyNotFoundError extends EngineError {
  constructor(anomalyId: string) {
    super("ANOMALY_NOT_FOUND", `Anomaly not found: ${anomalyId}`, { anomalyId });
    this.name = "AnomalyNotFoundError";
  }
}

export class MalformedRuleError extends EngineError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super("MALFORMED_RULE", `Malformed rule set: ${problems.join("; ")}`, { problems });
    this.name = "MalformedRuleError";
    this.problems = problems;
  }
}

export class RuleRepositoryError extends EngineError {
  constructor(message: string) {
    super("RULE_REPOSITORY", message);
    this.name = "RuleRepositoryError";
  }
}

export class ConfigError extends EngineError {
  constructor(message: string) {
    super("CONFIG", message);
    this.name = "ConfigError";
  }
}

export class InvalidInputError extends EngineError {
  readonly problems: string[];

  constructor(subject: string, problems: string[]) {
    super("INVALID_INPUT", `Invalid ${subject}: ${problems.join("; ")}`, { problems });
    this.name = "InvalidInputError";
    this.problems = problems;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function assertUnreachable(x: never): never {
  throw new Error(`Unreachable: ${String(x)}`);
}
