import dotenv from "dotenv";
import { ConfigError } from "../errors";

export type DbConfig = {
  host: string;
  port: number;
  user: string;
  database: string;
  /** literal secret; wins over passwordEnv */
  password?: string;
  /** name of the env var holding the secret */
  passwordEnv?: string;
  ssl?: boolean;
};

/**
 * Loads `.env.local` on top of whatever `dotenv/config` already put in
 * process.env. Existing variables are never overwritten.
 */
export function loadLocalEnv(file = ".env.local") {
  dotenv.config({ path: file, override: false });
}

export function resolveSecret(
  label: string,
  literal: string | undefined,
  envName: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (literal) return literal;

  if (envName) {
    const v = env[envName];
    if (!v) throw new ConfigError(`Missing env var: ${envName} (${label})`);
    return v;
  }

  throw new ConfigError(`${label}: neither a literal value nor an env var name was configured`);
}

export function resolveDbPassword(db: DbConfig, env: NodeJS.ProcessEnv = process.env): string {
  return resolveSecret(`${db.user}@${db.host}/${db.database}`, db.password, db.passwordEnv, env);
}

function env(name: string, fallback?: string): string {
  const v = process.env[name] ?? fallback;
  if (v === undefined) throw new ConfigError(`Missing env var: ${name}`);
  return v;
}

/**
 * Connection taken from the standard libpq variables. Used where no config
 * file exists yet (config generation).
 */
export function dbConfigFromEnv(): DbConfig {
  return {
    host: env("PGHOST", "localhost"),
    port: Number(env("PGPORT", "5432")),
    user: env("PGUSER"),
    passwordEnv: "PGPASSWORD",
    database: env("PGDATABASE"),
    ssl: env("PGSSLMODE", "").toLowerCase() === "require",
  };
}
