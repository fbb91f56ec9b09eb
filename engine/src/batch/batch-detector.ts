import { EventEmitter } from "node:events";
import type { AnomalyDraft, EntityType, ExternalEffect, Transaction } from "@fleetsight/shared";
import { createEvaluationContext } from "../conditions/context.js";
import { evaluateTransaction, type DetectionResult, type RuleError } from "../detection/detector.js";
import { errorMessage } from "../errors.js";
import type { RuleRepository } from "../rules/repository.js";
import { createLogger } from "../utils/logger.js";
import type { ContextProvider } from "./context-provider.js";
import { WorkerPool } from "./worker-pool.js";

export type SinkResult = {
  inserted: number;
  skipped: number;
};

export interface DraftSink {
  upsertDrafts(drafts: readonly AnomalyDraft[]): SinkResult | Promise<SinkResult>;
  /** Idempotency keys already persisted for these transactions. */
  seenKeys?(transactionIds: readonly string[]): ReadonlySet<string> | Promise<ReadonlySet<string>>;
}

export interface EffectGateway {
  deliver(effect: ExternalEffect): void | Promise<void>;
}

export type EffectFailure = {
  effect: ExternalEffect;
  error: string;
};

/** A transaction whose processing failed outside any single rule; the rest of the batch went on. */
export type TransactionError = {
  transactionId: string;
  error: string;
};

export type BatchReport = {
  fingerprint: string;
  processed: number;
  skipped: number;
  failed: TransactionError[];
  drafts: AnomalyDraft[];
  inserted: number;
  /** Drafts suppressed by already-seen keys or ignored by the sink. */
  duplicates: number;
  effectsDelivered: number;
  effectsFailed: EffectFailure[];
  ruleErrors: RuleError[];
};

export type BatchDetectorDeps = {
  repository: RuleRepository;
  contextProvider: ContextProvider;
  sink: DraftSink;
  gateway?: EffectGateway;
  concurrency: number;
  timeoutMs: number;
  now?: () => number;
};

export type RunOptions = {
  signal?: AbortSignal;
  entityType?: EntityType;
};

/**
 * Runs one detection pass over a batch. Emits `draft`, `ruleError`,
 * `transactionError` and `effectFailed` as results come in. Only a
 * repository failure rejects the run.
 */
export class BatchDetector extends EventEmitter {
  private deps: BatchDetectorDeps;
  private log = createLogger("batch");

  constructor(deps: BatchDetectorDeps) {
    super();
    this.deps = deps;
  }

  async run(transactions: readonly Transaction[], options: RunOptions = {}): Promise<BatchReport> {
    const { repository, contextProvider, sink } = this.deps;
    const snapshot = await repository.loadActiveRules(options.entityType);
    const seen = sink.seenKeys ? await sink.seenKeys(transactions.map((t) => t.id)) : new Set<string>();
    const now = this.deps.now?.() ?? Date.now();

    const pool = new WorkerPool<DetectionResult | undefined>({
      maxConcurrent: this.deps.concurrency,
      timeoutMs: this.deps.timeoutMs,
    });

    const outcomes = await Promise.all(
      transactions.map(async (tx) => {
        const outcome = await pool.submit(tx.id, async (taskSignal) => {
          if (options.signal?.aborted) return undefined;
          const inputs = await contextProvider.contextFor(tx);
          if (taskSignal.aborted) return undefined;
          const context = createEvaluationContext(tx, { ...inputs, now });
          return evaluateTransaction(tx, snapshot, context, { seenKeys: seen });
        });
        return { transactionId: tx.id, outcome };
      }),
    );

    const report: BatchReport = {
      fingerprint: snapshot.fingerprint,
      processed: 0,
      skipped: 0,
      failed: [],
      drafts: [],
      inserted: 0,
      duplicates: 0,
      effectsDelivered: 0,
      effectsFailed: [],
      ruleErrors: [],
    };
    const effects: ExternalEffect[] = [];

    for (const { transactionId, outcome } of outcomes) {
      if (!outcome.ok) {
        const failure: TransactionError = { transactionId, error: errorMessage(outcome.error) };
        this.log.error("Transaction failed", { transactionId, error: failure.error });
        report.failed.push(failure);
        this.emit("transactionError", failure);
        continue;
      }
      const result = outcome.value;
      if (!result) {
        report.skipped++;
        continue;
      }
      report.processed++;
      report.duplicates += result.duplicates.length;
      for (const draft of result.drafts) {
        report.drafts.push(draft);
        this.emit("draft", draft);
      }
      for (const error of [...result.ruleErrors, ...result.actionErrors]) {
        report.ruleErrors.push(error);
        this.emit("ruleError", error);
      }
      effects.push(...result.effects);
    }

    if (report.drafts.length > 0) {
      const upsert = await sink.upsertDrafts(report.drafts);
      report.inserted = upsert.inserted;
      report.duplicates += upsert.skipped;
    }

    for (const effect of effects) {
      await this.deliver(effect, report);
    }

    this.log.info("Batch complete", {
      fingerprint: snapshot.fingerprint,
      processed: report.processed,
      skipped: report.skipped,
      failed: report.failed.length,
      drafts: report.drafts.length,
      inserted: report.inserted,
      ruleErrors: report.ruleErrors.length,
      effectsFailed: report.effectsFailed.length,
    });
    return report;
  }

  private async deliver(effect: ExternalEffect, report: BatchReport): Promise<void> {
    if (!this.deps.gateway) return;
    try {
      await this.deps.gateway.deliver(effect);
      report.effectsDelivered++;
    } catch (err) {
      const failure: EffectFailure = { effect, error: errorMessage(err) };
      this.log.error("Effect delivery failed", { ruleId: effect.ruleId, type: effect.type, error: failure.error });
      report.effectsFailed.push(failure);
      this.emit("effectFailed", failure);
    }
  }
}
