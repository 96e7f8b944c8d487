import { MaskingError, errorMessage } from "../errors";
import { Row } from "../pipeline/pipeline.types";
import { deterministicHash, preserveFormat, redact, scalarText } from "./mask-utils";
import { MaskingRule, TableRules } from "./rules";
import { TokenVault } from "./token-vault";

export type MaskingContext = {
  salt: string;
  vault: TokenVault;
};

export async function applyRule(
  rule: MaskingRule,
  value: unknown,
  ctx: MaskingContext
): Promise<unknown> {
  switch (rule.kind) {
    case "hash":
      return deterministicHash(value, ctx.salt);
    case "redact":
      return redact(value, { char: rule.char, keepLength: rule.keepLength });
    case "preserve-format":
      return preserveFormat(value, ctx.salt);
    case "tokenize":
      if (value === null || value === undefined) return null;
      return ctx.vault.getOrCreate(scalarText(value));
    case "none":
      return value;
  }
}

/**
 * Returns a copy of `row` with each ruled column replaced. Columns without
 * a rule, and rules naming columns the row does not have, are left alone:
 * the output has exactly the input's columns, in the same order.
 */
export async function maskRow(row: Row, rules: TableRules, ctx: MaskingContext): Promise<Row> {
  const out: Row = { ...row };
  for (const [column, rule] of Object.entries(rules)) {
    if (!(column in out)) continue;
    out[column] = await applyRule(rule, row[column], ctx);
  }
  return out;
}

export async function maskBatch(
  table: string,
  rows: Row[],
  rules: TableRules,
  ctx: MaskingContext
): Promise<Row[]> {
  const out: Row[] = [];
  for (const row of rows) {
    try {
      out.push(await maskRow(row, rules, ctx));
    } catch (err) {
      throw new MaskingError(`Masking failed for ${table}: ${errorMessage(err)}`, table, {
        cause: err,
      });
    }
  }
  return out;
}
