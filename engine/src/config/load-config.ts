import { config as loadDotenv } from "dotenv";
import { EngineConfigSchema, type EngineConfig } from "@fleetsight/shared";
import { ConfigError } from "../errors.js";

export type Env = Readonly<Record<string, string | undefined>>;

type Section = Record<string, unknown>;

function num(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === "" ? undefined : Number(value);
}

function defined(entries: Section): Section {
  return Object.fromEntries(Object.entries(entries).filter(([, v]) => v !== undefined));
}

function isSection(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(base: Section, key: string): Section {
  const value = base[key];
  return isSection(value) ? { ...value } : {};
}

/**
 * Layer `FLEETSIGHT_*` variables over `base` (e.g. a parsed config file) and
 * validate the result. Unset variables keep the base or schema default.
 */
export function loadConfig(env: Env, base: Section = {}): EngineConfig {
  const detection = section(base, "detection");
  const raw = {
    ...base,
    rules: {
      ...section(base, "rules"),
      ...defined({ dir: env.FLEETSIGHT_RULES_DIR, activeFile: env.FLEETSIGHT_RULES_FILE }),
    },
    store: { ...section(base, "store"), ...defined({ path: env.FLEETSIGHT_STORE_PATH }) },
    detection: {
      ...detection,
      ...defined({
        concurrency: num(env.FLEETSIGHT_CONCURRENCY),
        timeoutMs: num(env.FLEETSIGHT_TIMEOUT_MS),
        historyWindowMs: num(env.FLEETSIGHT_HISTORY_WINDOW_MS),
      }),
      businessHours: {
        ...section(detection, "businessHours"),
        ...defined({
          start: num(env.FLEETSIGHT_BUSINESS_HOURS_START),
          end: num(env.FLEETSIGHT_BUSINESS_HOURS_END),
        }),
      },
    },
    ...defined({ logLevel: env.FLEETSIGHT_LOG_LEVEL }),
  };

  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
  return result.data;
}

/** Reads `.env` from the working directory, then the process environment. */
export function loadConfigFromEnvironment(base: Section = {}): EngineConfig {
  loadDotenv();
  return loadConfig(process.env, base);
}
