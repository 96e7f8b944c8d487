import { ConfigError } from "../errors";

export type MaskingRule =
  | { kind: "hash" }
  | { kind: "redact"; char: string; keepLength: boolean }
  | { kind: "preserve-format" }
  | { kind: "tokenize" }
  | { kind: "none" };

export type RuleKind = MaskingRule["kind"];

/** column -> rule */
export type TableRules = Record<string, MaskingRule>;

/** table -> column -> rule */
export type MaskingRuleSet = Record<string, TableRules>;

export type RuleInput =
  | string
  | { kind: string; char?: string; keepLength?: boolean };

export const REDACT_PLACEHOLDER = "REDACTED";
export const DEFAULT_MASK_CHAR = "*";

/**
 * Accepted spellings. The snake_case names are what older config files use.
 */
const RULE_NAMES: Record<string, RuleKind> = {
  hash: "hash",
  deterministic_hash: "hash",
  redact: "redact",
  redaction: "redact",
  "preserve-format": "preserve-format",
  preserve_format: "preserve-format",
  preserve_phone_format: "preserve-format",
  tokenize: "tokenize",
  none: "none",
  keep: "none",
};

export function resolveRuleKind(name: string): RuleKind | undefined {
  return RULE_NAMES[name.trim().toLowerCase()];
}

export function parseRule(input: RuleInput, where: string): MaskingRule {
  const spec = typeof input === "string" ? { kind: input } : input;
  const kind = resolveRuleKind(spec.kind);

  switch (kind) {
    case "redact": {
      const char = spec.char ?? DEFAULT_MASK_CHAR;
      if (char.length !== 1) {
        throw new ConfigError(`${where}: redact "char" must be a single character`);
      }
      return { kind, char, keepLength: spec.keepLength ?? false };
    }
    case "hash":
    case "preserve-format":
    case "tokenize":
    case "none":
      return { kind };
    case undefined:
      throw new ConfigError(
        `${where}: unknown masking rule "${spec.kind}". ` +
          `Use one of: hash | redact | preserve-format | tokenize | none`
      );
  }
}

export function parseRuleSet(
  input: Record<string, Record<string, RuleInput>>
): MaskingRuleSet {
  const out: MaskingRuleSet = {};
  for (const [table, columns] of Object.entries(input)) {
    const rules: TableRules = {};
    for (const [column, rule] of Object.entries(columns)) {
      rules[column] = parseRule(rule, `masking.rules.${table}.${column}`);
    }
    out[table] = rules;
  }
  return out;
}
