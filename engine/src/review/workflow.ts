import { randomUUID } from "node:crypto";
import {
  AmendmentSubmissionSchema,
  FeedbackSubmissionSchema,
  type AmendmentSubmission,
  type Anomaly,
  type FeedbackEvent,
  type FeedbackStatus,
  type FeedbackSubmission,
} from "@fleetsight/shared";
import type { z } from "zod";
import {
  AnomalyNotFoundError,
  ConcurrentModificationError,
  EngineError,
  IllegalTransitionError,
  InvalidInputError,
} from "../errors.js";
import { createLogger } from "../utils/logger.js";

export const ALLOWED_TRANSITIONS: Readonly<Record<FeedbackStatus, readonly FeedbackStatus[]>> = {
  PendingReview: ["Okay", "Investigate", "ConfirmedFraudOrMisuse", "Miscategorized"],
  Investigate: ["Okay", "ConfirmedFraudOrMisuse", "Miscategorized"],
  Okay: [],
  ConfirmedFraudOrMisuse: [],
  Miscategorized: [],
};

export function canTransition(from: FeedbackStatus, to: FeedbackStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isClosed(status: FeedbackStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

export type TransitionResult = {
  anomaly: Anomaly;
  event: FeedbackEvent;
};

export type TransitionOptions = {
  now: number;
  eventId?: string;
};

function checkVersion(anomaly: Anomaly, expectedVersion: number): void {
  if (anomaly.version !== expectedVersion) {
    throw new ConcurrentModificationError(anomaly.id, expectedVersion, anomaly.version);
  }
}

function withNotes(event: FeedbackEvent, notes?: string, correctedCode?: string): FeedbackEvent {
  if (notes !== undefined) event.notes = notes;
  if (correctedCode !== undefined) event.correctedCode = correctedCode;
  return event;
}

/** Pure: returns the next anomaly and its event, or throws. The input is left untouched. */
export function applyTransition(
  anomaly: Anomaly,
  feedback: FeedbackSubmission,
  options: TransitionOptions,
): TransitionResult {
  checkVersion(anomaly, feedback.expectedVersion);
  if (!canTransition(anomaly.status, feedback.status)) {
    throw new IllegalTransitionError(anomaly.status, feedback.status);
  }

  const event = withNotes(
    {
      id: options.eventId ?? randomUUID(),
      anomalyId: anomaly.id,
      kind: "transition",
      reviewerId: feedback.reviewerId,
      fromStatus: anomaly.status,
      toStatus: feedback.status,
      timestamp: options.now,
    },
    feedback.notes,
    feedback.correctedCode,
  );

  return {
    anomaly: { ...anomaly, status: feedback.status, version: anomaly.version + 1, updatedAt: options.now },
    event,
  };
}

/** Records a correction without moving the status. */
export function applyAmendment(
  anomaly: Anomaly,
  amendment: AmendmentSubmission,
  options: TransitionOptions,
): TransitionResult {
  checkVersion(anomaly, amendment.expectedVersion);

  const event = withNotes(
    {
      id: options.eventId ?? randomUUID(),
      anomalyId: anomaly.id,
      kind: "amendment",
      reviewerId: amendment.reviewerId,
      fromStatus: anomaly.status,
      toStatus: anomaly.status,
      timestamp: options.now,
    },
    amendment.notes,
    amendment.correctedCode,
  );

  return {
    anomaly: { ...anomaly, version: anomaly.version + 1, updatedAt: options.now },
    event,
  };
}

export interface ReviewStore {
  get(anomalyId: string): Anomaly | undefined;
  /**
   * Persist `next` and append `event` only if the stored version still equals
   * `expectedVersion`; otherwise throw ConcurrentModificationError.
   */
  commit(expectedVersion: number, next: Anomaly, event: FeedbackEvent): void;
  history(anomalyId: string): FeedbackEvent[];
}

export type ReviewWorkflowDeps = {
  store: ReviewStore;
  now?: () => number;
  onTransition?: (anomaly: Anomaly, event: FeedbackEvent) => void;
};

function validate<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new InvalidInputError("feedback", problems);
  }
  return result.data;
}

export class ReviewWorkflow {
  private deps: ReviewWorkflowDeps;
  private log = createLogger("review");

  constructor(deps: ReviewWorkflowDeps) {
    this.deps = deps;
  }

  private now(): number {
    return this.deps.now?.() ?? Date.now();
  }

  private load(anomalyId: string): Anomaly {
    const anomaly = this.deps.store.get(anomalyId);
    if (!anomaly) throw new AnomalyNotFoundError(anomalyId);
    return anomaly;
  }

  private commit(expectedVersion: number, result: TransitionResult): Anomaly {
    this.deps.store.commit(expectedVersion, result.anomaly, result.event);
    this.log.info("Review recorded", {
      anomalyId: result.anomaly.id,
      kind: result.event.kind,
      from: result.event.fromStatus,
      to: result.event.toStatus,
      version: result.anomaly.version,
    });
    this.deps.onTransition?.(result.anomaly, result.event);
    return result.anomaly;
  }

  private logRejection(message: string, anomalyId: string, err: unknown): void {
    if (err instanceof EngineError) {
      this.log.warn(message, { anomalyId, code: err.code, error: err.message });
    }
  }

  submitFeedback(raw: FeedbackSubmission): Anomaly {
    const feedback = validate(FeedbackSubmissionSchema, raw);
    const anomaly = this.load(feedback.anomalyId);
    try {
      return this.commit(feedback.expectedVersion, applyTransition(anomaly, feedback, { now: this.now() }));
    } catch (err) {
      this.logRejection("Feedback rejected", feedback.anomalyId, err);
      throw err;
    }
  }

  amend(raw: AmendmentSubmission): Anomaly {
    const amendment = validate(AmendmentSubmissionSchema, raw);
    const anomaly = this.load(amendment.anomalyId);
    try {
      return this.commit(amendment.expectedVersion, applyAmendment(anomaly, amendment, { now: this.now() }));
    } catch (err) {
      this.logRejection("Amendment rejected", amendment.anomalyId, err);
      throw err;
    }
  }

  history(anomalyId: string): FeedbackEvent[] {
    this.load(anomalyId);
    return this.deps.store.history(anomalyId);
  }
}
