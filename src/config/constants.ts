export const CONFIG_FILE = "pipeline.config.yaml";
export const STATE_FILE = "state/last_run.json";
export const REPORT_DIR = "reports";

export const AUDIT_TABLE = "execution_audit";
export const TOKEN_VAULT_TABLE = "token_vault";

export const DEFAULT_BATCH_SIZE = 500;
export const DEFAULT_WATERMARK_COLUMN = "updated_at";
export const DEFAULT_MAX_WORKERS = 3;
