import { z } from "zod";

const BusinessHoursSchema = z
  .object({
    start: z.number().int().min(0).max(23).default(8),
    end: z.number().int().min(1).max(24).default(18),
  })
  .refine((h) => h.start < h.end, { message: "businessHours.start must be before businessHours.end" });

const DetectionConfigSchema = z.object({
  concurrency: z.number().int().positive().default(4),
  timeoutMs: z.number().int().positive().default(30000),
  historyWindowMs: z.number().int().positive().default(2592000000),
  businessHours: BusinessHoursSchema.default({}),
});

const RulesConfigSchema = z.object({
  dir: z.string().min(1).default("./rules"),
  activeFile: z.string().min(1).default("rules_active.json"),
});

const StoreConfigSchema = z.object({
  path: z.string().min(1).default(":memory:"),
});

export const EngineConfigSchema = z.object({
  rules: RulesConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
  detection: DetectionConfigSchema.default({}),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type BusinessHours = z.infer<typeof BusinessHoursSchema>;

export function parseConfig(raw: unknown): EngineConfig {
  return EngineConfigSchema.parse(raw);
}
