import { DbConnection } from "../db/postgres.client";
import { RuleKind } from "../masking/rules";
import { TableInfo, readSchema } from "../schema/schema-reader";
import { mapPgToGroup, ruleFitsColumn } from "../schema/type-mapper";
import { logger } from "../utils/logger";
import { DbConfig } from "./tool.config";
import {
  AUDIT_TABLE,
  DEFAULT_BATCH_SIZE,
  DEFAULT_WATERMARK_COLUMN,
  STATE_FILE,
  TOKEN_VAULT_TABLE,
} from "./constants";

/** Column-name hints used to pre-fill masking rules. */
export const defaultColumnStrategy: { kind: RuleKind; columns: string[] }[] = [
  { kind: "hash", columns: ["email", "username", "user_name"] },
  { kind: "preserve-format", columns: ["phone", "mobile", "phone_number", "fax"] },
  { kind: "redact", columns: ["address", "street", "notes"] },
  { kind: "tokenize", columns: ["ssn", "national_id", "tax_id", "document_number"] },
];

function suggestRule(column: string): RuleKind {
  const name = column.toLowerCase();
  const hit = defaultColumnStrategy.find((s) => s.columns.includes(name));
  return hit ? hit.kind : "none";
}

export type GeneratedPipelineConfig = {
  version: 1;
  generatedAt: string;
  envName: string;
  mode: "delta";
  dryRun: true;
  parallelTables: boolean;
  maxWorkers: number;
  stateFile: string;
  allowedRunnerRoles: string[];
  source: DbConfig;
  destination: DbConfig;
  masking: { saltEnv: string; rules: Record<string, Record<string, string>> };
  tables: {
    name: string;
    batchSize: number;
    watermarkColumn: string;
    primaryKey?: string[];
  }[];
  auditTable: string;
  tokenVaultTable: string;
};

/**
 * Starter config for every table of a schema. Written with `dryRun: true`
 * so nothing is copied before someone has reviewed the rules.
 */
export function buildConfigFromSchema(params: {
  tables: TableInfo[];
  source: DbConfig;
  destination: DbConfig;
  now?: Date;
}): GeneratedPipelineConfig {
  const { tables, source, destination } = params;
  const rules: Record<string, Record<string, string>> = {};

  const tableEntries = tables.map((t) => {
    const name = t.schema === "public" ? t.name : `${t.schema}.${t.name}`;

    const tableRules: Record<string, string> = {};
    for (const c of t.columns) {
      const kind = suggestRule(c.name);
      if (kind === "none") continue;

      const group = mapPgToGroup(c.dataType, c.udtName);
      if (!ruleFitsColumn(kind, group)) {
        logger.warn(`[configGen] ${name}.${c.name} is ${group}; not suggesting "${kind}"`);
        continue;
      }
      tableRules[c.name] = kind;
    }
    if (Object.keys(tableRules).length > 0) rules[name] = tableRules;

    if (!t.columns.some((c) => c.name === DEFAULT_WATERMARK_COLUMN)) {
      logger.warn(`[configGen] ${name} has no ${DEFAULT_WATERMARK_COLUMN} column; set watermarkColumn by hand`);
    }

    return {
      name,
      batchSize: DEFAULT_BATCH_SIZE,
      watermarkColumn: DEFAULT_WATERMARK_COLUMN,
      ...(t.primaryKey.length > 0 ? { primaryKey: t.primaryKey } : {}),
    };
  });

  return {
    version: 1,
    generatedAt: (params.now ?? new Date()).toISOString(),
    envName: "qa",
    mode: "delta",
    dryRun: true,
    parallelTables: tableEntries.length > 1,
    maxWorkers: 3,
    stateFile: STATE_FILE,
    allowedRunnerRoles: [],
    source,
    destination,
    masking: { saltEnv: "MASKING_SALT", rules },
    tables: tableEntries,
    auditTable: AUDIT_TABLE,
    tokenVaultTable: TOKEN_VAULT_TABLE,
  };
}

export async function generateConfig(params: {
  client: DbConnection;
  schema: string;
  source: DbConfig;
  destination: DbConfig;
}): Promise<GeneratedPipelineConfig> {
  const tables = await readSchema(params.client, params.schema);
  logger.info(`Found ${tables.length} tables in schema "${params.schema}"`);

  return buildConfigFromSchema({
    tables,
    source: params.source,
    destination: params.destination,
  });
}
