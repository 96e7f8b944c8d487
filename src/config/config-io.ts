import fs from "fs";
import YAML from "yaml";
import { z } from "zod";
import { PipelineConfig } from "./pipeline-config.types";
import { resolveSecret } from "./tool.config";
import { parseRuleSet } from "../masking/rules";
import { ConfigError } from "../errors";
import {
  AUDIT_TABLE,
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_WORKERS,
  DEFAULT_WATERMARK_COLUMN,
  STATE_FILE,
  TOKEN_VAULT_TABLE,
} from "./constants";

const DbConfigZ = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().positive().default(5432),
  user: z.string().min(1),
  database: z.string().min(1),
  password: z.string().optional(),
  passwordEnv: z.string().optional(),
  ssl: z.boolean().optional(),
});

const RuleZ = z.union([
  z.string(),
  z.object({
    kind: z.string(),
    char: z.string().optional(),
    keepLength: z.boolean().optional(),
  }),
]);

const TableZ = z.object({
  name: z.string().min(1),
  batchSize: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
  filter: z.string().min(1).optional(),
  watermarkColumn: z.string().min(1).default(DEFAULT_WATERMARK_COLUMN),
  primaryKey: z.array(z.string().min(1)).min(1).optional(),
  truncateOnFull: z.boolean().default(false),
});

const FixedDelayZ = z.object({
  maxAttempts: z.number().int().positive(),
  delayMs: z.number().int().nonnegative(),
});

const BackoffZ = z.object({
  maxAttempts: z.number().int().positive(),
  initialDelayMs: z.number().int().nonnegative(),
  maxDelayMs: z.number().int().nonnegative(),
  multiplier: z.number().min(1),
});

const PipelineConfigZ = z.object({
  version: z.literal(1),
  envName: z.string().min(1).default("dev_local"),
  mode: z.enum(["delta", "full"]).default("delta"),
  dryRun: z.boolean().default(false),
  parallelTables: z.boolean().default(false),
  maxWorkers: z.number().int().positive().default(DEFAULT_MAX_WORKERS),
  stateFile: z.string().min(1).default(STATE_FILE),
  allowedRunnerRoles: z.array(z.string()).default([]),

  source: DbConfigZ,
  destination: DbConfigZ,

  masking: z
    .object({
      salt: z.string().min(1).optional(),
      saltEnv: z.string().min(1).optional(),
      rules: z.record(z.string(), z.record(z.string(), RuleZ)).default({}),
    }),

  tables: z.array(TableZ),

  retry: z
    .object({
      extract: FixedDelayZ.default({ maxAttempts: 3, delayMs: 1000 }),
      load: BackoffZ.default({ maxAttempts: 5, initialDelayMs: 1000, maxDelayMs: 5000, multiplier: 2 }),
      connect: BackoffZ.default({ maxAttempts: 3, initialDelayMs: 1000, maxDelayMs: 5000, multiplier: 2 }),
    })
    .default({}),

  auditTable: z.string().min(1).default(AUDIT_TABLE),
  tokenVaultTable: z.string().min(1).default(TOKEN_VAULT_TABLE),
});

/**
 * Validates a parsed document and resolves the masking salt.
 *
 * The salt is fixed for the lifetime of the masked data: changing it makes
 * every previously produced hash and format-preserved value unmatchable.
 */
export function parsePipelineConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const result = PipelineConfigZ.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid pipeline config: ${issues}`);
  }

  const cfg = result.data;
  const salt = resolveSecret("masking.salt", cfg.masking.salt, cfg.masking.saltEnv, env);

  return {
    ...cfg,
    masking: {
      salt,
      rules: parseRuleSet(cfg.masking.rules),
    },
  };
}

export function readPipelineConfig(filePath: string): PipelineConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }
  const raw = fs.readFileSync(filePath, "utf8");
  return parsePipelineConfig(YAML.parse(raw));
}

export function toYamlString(obj: unknown): string {
  return new YAML.Document(obj).toString({ indent: 2 });
}

export function writeYaml(filePath: string, obj: unknown) {
  fs.writeFileSync(filePath, toYamlString(obj), "utf8");
}
