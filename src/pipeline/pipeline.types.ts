import type { RunMode } from "../config/pipeline-config.types";
import type { WatermarkValue } from "../state/watermark-store";

/** Column name -> scalar, in source column order. */
export type Row = Record<string, unknown>;

export type TableEntry = { table: string; rows: number };

export type ErrorEntry = { unit: string; error: string };

export type AuditSummary = {
  executionId: string;
  envName: string;
  startedAt: string;
  finishedAt?: string;
  tablesProcessed: TableEntry[];
  rowsCopied: number;
  rowsFailed: number;
  errors: ErrorEntry[];
};

export type RunSummary = AuditSummary & {
  mode: RunMode;
  dryRun: boolean;
  auditPersisted: boolean;
  watermarks: Record<string, WatermarkValue>;
};

export type TableResult = {
  table: string;
  batches: number;
  rows: number;
  failedBatches: number;
  elapsedMs: number;
};
