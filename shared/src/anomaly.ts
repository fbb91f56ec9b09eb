import { z } from "zod";

export type AnomalyType =
  | "HighSpend"
  | "Location"
  | "Frequency"
  | "TimeOfDay"
  | "FuelMetric"
  | "MlModel"
  | "Other";

export type FeedbackStatus =
  | "PendingReview"
  | "Okay"
  | "Investigate"
  | "ConfirmedFraudOrMisuse"
  | "Miscategorized";

/** Output of detection, persisted by an idempotent upsert on `idempotencyKey`. */
export type AnomalyDraft = {
  idempotencyKey: string;
  transactionId: string;
  ruleId: string;
  type: AnomalyType;
  reason: string;
  score?: number;
  status: "PendingReview";
  detectedAt: number;
};

export type Anomaly = {
  id: string;
  idempotencyKey: string;
  transactionId: string;
  ruleId: string;
  type: AnomalyType;
  reason: string;
  score?: number;
  status: FeedbackStatus;
  version: number;
  detectedAt: number;
  updatedAt: number;
};

export type FeedbackEventKind = "transition" | "amendment";

export type FeedbackEvent = {
  id: string;
  anomalyId: string;
  kind: FeedbackEventKind;
  reviewerId: string;
  fromStatus: FeedbackStatus;
  toStatus: FeedbackStatus;
  timestamp: number;
  notes?: string;
  correctedCode?: string;
};

export type FeedbackSubmission = {
  anomalyId: string;
  expectedVersion: number;
  reviewerId: string;
  status: FeedbackStatus;
  notes?: string;
  correctedCode?: string;
};

export type AmendmentSubmission = {
  anomalyId: string;
  expectedVersion: number;
  reviewerId: string;
  notes: string;
  correctedCode?: string;
};

export type AnomalyFilter = {
  status?: FeedbackStatus[];
  ruleId?: string;
  type?: AnomalyType;
  since?: number;
  limit?: number;
};

export const AnomalyTypeSchema = z.enum([
  "HighSpend",
  "Location",
  "Frequency",
  "TimeOfDay",
  "FuelMetric",
  "MlModel",
  "Other",
]);

export const FeedbackStatusSchema = z.enum([
  "PendingReview",
  "Okay",
  "Investigate",
  "ConfirmedFraudOrMisuse",
  "Miscategorized",
]);

export const FeedbackSubmissionSchema = z.object({
  anomalyId: z.string().min(1),
  expectedVersion: z.number().int().positive(),
  reviewerId: z.string().min(1),
  status: FeedbackStatusSchema,
  notes: z.string().optional(),
  correctedCode: z.string().min(1).optional(),
});

export const AmendmentSubmissionSchema = z.object({
  anomalyId: z.string().min(1),
  expectedVersion: z.number().int().positive(),
  reviewerId: z.string().min(1),
  notes: z.string().min(1),
  correctedCode: z.string().min(1).optional(),
});
