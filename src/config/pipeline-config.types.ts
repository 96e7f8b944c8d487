import type { DbConfig } from "./tool.config";
import type { MaskingRuleSet } from "../masking/rules";

export type RunMode = "delta" | "full";

export type TableDescriptor = {
  /** `table` or `schema.table` */
  name: string;
  batchSize: number;
  /** static SQL predicate, used when no watermark applies */
  filter?: string;
  watermarkColumn: string;
  /** upsert key; plain inserts when absent */
  primaryKey?: string[];
  /** clear the destination table before a full, non-dry run */
  truncateOnFull: boolean;
};

export type FixedDelayConfig = {
  maxAttempts: number;
  delayMs: number;
};

export type BackoffConfig = {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
};

export type PipelineConfig = {
  version: 1;
  envName: string;
  mode: RunMode;
  dryRun: boolean;
  parallelTables: boolean;
  maxWorkers: number;
  stateFile: string;
  allowedRunnerRoles: string[];

  source: DbConfig;
  destination: DbConfig;

  masking: {
    salt: string;
    rules: MaskingRuleSet;
  };

  tables: TableDescriptor[];

  retry: {
    extract: FixedDelayConfig;
    load: BackoffConfig;
    connect: BackoffConfig;
  };

  auditTable: string;
  tokenVaultTable: string;
};
