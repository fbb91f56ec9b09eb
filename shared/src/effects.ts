import type { AnomalyDraft } from "./anomaly.js";

export type EffectTargetType = "transaction" | "vehicle" | "driver";

export type CreateAnomalyRequest = {
  type: "create_anomaly";
  ruleId: string;
  draft: AnomalyDraft;
};

export type StatusUpdateRequest = {
  type: "status_update";
  ruleId: string;
  target: { entityType: EffectTargetType; id: string };
  property: string;
  value: string;
};

export type NotificationRequest = {
  type: "notification";
  ruleId: string;
  channel: string;
  message: string;
  role: string;
};

export type ServiceInvocationRequest = {
  type: "service_invocation";
  ruleId: string;
  serviceRef: string;
  payload: Record<string, string>;
};

export type EffectRequest =
  | CreateAnomalyRequest
  | StatusUpdateRequest
  | NotificationRequest
  | ServiceInvocationRequest;

/** Effects handed to the delivery gateway; anomaly creation goes to the store instead. */
export type ExternalEffect = Exclude<EffectRequest, CreateAnomalyRequest>;
