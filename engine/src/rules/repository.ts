import * as fs from "node:fs";
import * as path from "node:path";
import type { EntityType, Rule } from "@fleetsight/shared";
import { errorMessage, RuleRepositoryError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { loadRules, loadRuleSet, rulesOf, loadPolicy } from "./loader.js";
import { createSnapshot, type RuleSnapshot } from "./snapshot.js";

export interface RuleRepository {
  /** Resolves to a frozen, self-consistent snapshot, or rejects; never a partial one. */
  loadActiveRules(entityType?: EntityType): Promise<RuleSnapshot>;
}

export class InMemoryRuleRepository implements RuleRepository {
  private rules: readonly Rule[];

  constructor(rules: readonly Rule[] = []) {
    this.rules = loadRules(rules);
  }

  replace(rules: readonly Rule[]): void {
    this.rules = loadRules(rules);
  }

  async loadActiveRules(entityType?: EntityType): Promise<RuleSnapshot> {
    return createSnapshot(this.rules, { entityType });
  }
}

export type FileRuleRepositoryDeps = {
  rulesDir: string;
  activeFile?: string;
  readFile: (filePath: string) => string;
};

function parseRuleFile(raw: unknown): Rule[] {
  if (Array.isArray(raw)) return loadRules(raw);
  if (typeof raw === "object" && raw !== null && "ruleSets" in raw) return rulesOf(loadPolicy(raw));
  return [...loadRuleSet(raw).rules];
}

/**
 * Reads `<rulesDir>/rules_active.json`, which holds a rule array, a rule set or a
 * policy. Each call re-reads the file, so a new batch picks up the latest rules.
 */
export class FileRuleRepository implements RuleRepository {
  private deps: FileRuleRepositoryDeps;
  private log = createLogger("rule-repository");

  constructor(deps: FileRuleRepositoryDeps) {
    this.deps = deps;
  }

  get activePath(): string {
    return path.join(this.deps.rulesDir, this.deps.activeFile ?? "rules_active.json");
  }

  async loadActiveRules(entityType?: EntityType): Promise<RuleSnapshot> {
    let raw: unknown;
    try {
      raw = JSON.parse(this.deps.readFile(this.activePath));
    } catch (err) {
      this.log.error("Failed to read rules", { path: this.activePath, error: errorMessage(err) });
      throw new RuleRepositoryError(`Cannot read rules from ${this.activePath}: ${errorMessage(err)}`);
    }

    const snapshot = createSnapshot(parseRuleFile(raw), { entityType });
    this.log.info("Loaded rule snapshot", {
      path: this.activePath,
      rules: snapshot.rules.length,
      fingerprint: snapshot.fingerprint,
    });
    return snapshot;
  }
}

export function createFileRuleRepository(rulesDir: string, activeFile?: string): FileRuleRepository {
  return new FileRuleRepository({
    rulesDir,
    activeFile,
    readFile: (filePath) => fs.readFileSync(filePath, "utf-8"),
  });
}
