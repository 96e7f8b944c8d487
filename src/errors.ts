/**
 * Error taxonomy of the pipeline. `unit` names what failed: a table,
 * a connection target, or the audit writer.
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly unit: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PipelineError";
  }
}

/** Runner identity is not in the allow-list. Fatal, raised before any audit exists. */
export class AuthorizationError extends PipelineError {
  constructor(
    message: string,
    public readonly role: string
  ) {
    super(message, "authorization");
    this.name = "AuthorizationError";
  }
}

export class ConnectivityError extends PipelineError {
  constructor(message: string, unit: string, options?: { cause?: unknown }) {
    super(message, unit, options);
    this.name = "ConnectivityError";
  }
}

export class ExtractionError extends PipelineError {
  constructor(message: string, unit: string, options?: { cause?: unknown }) {
    super(message, unit, options);
    this.name = "ExtractionError";
  }
}

export class LoadError extends PipelineError {
  constructor(message: string, unit: string, options?: { cause?: unknown }) {
    super(message, unit, options);
    this.name = "LoadError";
  }
}

/** Data or configuration defect hit while masking. Never retried. */
export class MaskingError extends PipelineError {
  constructor(message: string, unit: string, options?: { cause?: unknown }) {
    super(message, unit, options);
    this.name = "MaskingError";
  }
}

export class AuditPersistenceError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "audit", options);
    this.name = "AuditPersistenceError";
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super(message, "config");
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
