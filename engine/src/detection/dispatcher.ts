import type {
  Action,
  AnomalyDraft,
  EffectRequest,
  EffectTargetType,
  Rule,
  StatusUpdateRequest,
  Transaction,
  UpdateStatusAction,
} from "@fleetsight/shared";
import { assertUnreachable, TemplateRenderError } from "../errors.js";
import { renderTemplate, templateFields } from "./template.js";

export type DispatchOptions = {
  /** Detection time stamped on anomaly drafts. */
  now: number;
  /** Draft created earlier in the same rule; exposes `{anomaly.*}` to templates. */
  anomaly?: AnomalyDraft;
};

/** `<transactionId>:<ruleId>` with both parts percent-encoded, so a `:` inside an id cannot collide. */
export function idempotencyKey(transactionId: string, ruleId: string): string {
  return `${encodeURIComponent(transactionId)}:${encodeURIComponent(ruleId)}`;
}

const TARGET_IDS: Record<EffectTargetType, (tx: Readonly<Transaction>) => string | undefined> = {
  transaction: (tx) => tx.id,
  vehicle: (tx) => tx.vehicleId,
  driver: (tx) => tx.driverId,
};

export function isTargetType(name: string): name is EffectTargetType {
  return Object.hasOwn(TARGET_IDS, name);
}

/** `vehicle.status` targets the transaction's vehicle; a bare name targets the transaction. */
export function splitTargetProperty(targetProperty: string): { entity: string; property: string } {
  const dot = targetProperty.indexOf(".");
  if (dot === -1) return { entity: "transaction", property: targetProperty };
  return { entity: targetProperty.slice(0, dot), property: targetProperty.slice(dot + 1) };
}

function statusTarget(
  action: UpdateStatusAction,
  tx: Readonly<Transaction>,
): Pick<StatusUpdateRequest, "target" | "property"> {
  const { entity, property } = splitTargetProperty(action.targetProperty);
  if (!isTargetType(entity)) {
    throw new TemplateRenderError(entity, action.targetProperty);
  }
  const id = TARGET_IDS[entity](tx);
  if (id === undefined) {
    throw new TemplateRenderError(`${entity}Id`, action.targetProperty);
  }
  return { target: { entityType: entity, id }, property };
}

/**
 * Translate one action into the effect request it describes. Performs no I/O;
 * a missing template field raises TemplateRenderError for this action only.
 */
export function dispatch(
  action: Action,
  rule: Readonly<Rule>,
  tx: Readonly<Transaction>,
  options: DispatchOptions,
): EffectRequest {
  switch (action.kind) {
    case "create_anomaly": {
      const draft: AnomalyDraft = {
        idempotencyKey: idempotencyKey(tx.id, rule.id),
        transactionId: tx.id,
        ruleId: rule.id,
        type: action.anomalyType,
        reason: renderTemplate(action.reasonTemplate, templateFields(tx, rule)),
        status: "PendingReview",
        detectedAt: options.now,
      };
      if (action.score !== undefined) draft.score = action.score;
      return { type: "create_anomaly", ruleId: rule.id, draft };
    }
    case "update_status":
      return {
        type: "status_update",
        ruleId: rule.id,
        ...statusTarget(action, tx),
        value: action.newValue,
      };
    case "notify":
      return {
        type: "notification",
        ruleId: rule.id,
        channel: action.channel,
        message: renderTemplate(action.template, templateFields(tx, rule, options.anomaly)),
        role: action.role,
      };
    case "invoke_service": {
      const fields = templateFields(tx, rule, options.anomaly);
      const payload: Record<string, string> = {};
      for (const [key, template] of Object.entries(action.payloadTemplate)) {
        payload[key] = renderTemplate(template, fields);
      }
      return { type: "service_invocation", ruleId: rule.id, serviceRef: action.serviceRef, payload };
    }
    default:
      return assertUnreachable(action);
  }
}
