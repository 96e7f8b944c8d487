import { PipelineConfig, RunMode } from "../config/pipeline-config.types";
import { ConfigError } from "../errors";
import { logger } from "../utils/logger";

export function preflightValidate(cfg: PipelineConfig, mode: RunMode, dryRun = cfg.dryRun) {
  if (cfg.version !== 1) throw new ConfigError(`Unsupported config version: ${cfg.version}`);

  if (cfg.tables.length === 0) throw new ConfigError("No tables configured in config.tables");

  const seen = new Set<string>();
  for (const t of cfg.tables) {
    if (seen.has(t.name)) throw new ConfigError(`Table "${t.name}" is configured more than once`);
    seen.add(t.name);
  }

  const unknown = Object.keys(cfg.masking.rules).filter((t) => !seen.has(t));
  if (unknown.length > 0) {
    throw new ConfigError(`masking.rules names tables that are not configured: ${unknown.join(", ")}`);
  }

  for (const t of cfg.tables) {
    const rules = cfg.masking.rules[t.name] ?? {};
    for (const key of t.primaryKey ?? []) {
      const rule = rules[key];
      if (rule && rule.kind !== "none" && rule.kind !== "tokenize") {
        // hash/redact on a key still upserts, but every source row may collapse onto one key
        logger.warn(`${t.name}.${key} is part of the primary key and masked with "${rule.kind}"`);
      }
    }
  }

  if (mode === "full" && cfg.tables.some((t) => t.truncateOnFull) && dryRun) {
    logger.info("truncateOnFull is ignored during a dry run");
  }
}
