import type { RuleKind } from "../masking/rules";

export type ColumnTypeGroup =
  | "STRING"
  | "NUMBER"
  | "BOOLEAN"
  | "DATE"
  | "JSON"
  | "UUID"
  | "OTHER";

const UDT_GROUPS: Record<string, ColumnTypeGroup> = {
  text: "STRING",
  varchar: "STRING",
  bpchar: "STRING",
  char: "STRING",
  citext: "STRING",
  name: "STRING",
  int2: "NUMBER",
  int4: "NUMBER",
  int8: "NUMBER",
  numeric: "NUMBER",
  float4: "NUMBER",
  float8: "NUMBER",
  money: "NUMBER",
  bool: "BOOLEAN",
  date: "DATE",
  timestamp: "DATE",
  timestamptz: "DATE",
  time: "DATE",
  timetz: "DATE",
  json: "JSON",
  jsonb: "JSON",
  uuid: "UUID",
};

/**
 * Groups a column by its information_schema `udt_name`, falling back to
 * `data_type` for domains and arrays.
 */
export function mapPgToGroup(dataType: string, udtName?: string): ColumnTypeGroup {
  const udt = (udtName || "").toLowerCase();
  if (udt in UDT_GROUPS) return UDT_GROUPS[udt];

  const dt = (dataType || "").toLowerCase();
  if (dt.includes("char") || dt.includes("text")) return "STRING";
  if (dt.includes("timestamp") || dt.includes("date") || dt.includes("time")) return "DATE";
  if (dt.includes("int") || dt.includes("numeric") || dt.includes("double") || dt.includes("real")) {
    return "NUMBER";
  }
  return "OTHER";
}

/**
 * Masked values are text: a rule can only be written back into a column
 * that accepts the text it produces.
 */
export function ruleFitsColumn(kind: RuleKind, group: ColumnTypeGroup): boolean {
  switch (kind) {
    case "none":
      return true;
    case "hash":
    case "redact":
    case "preserve-format":
      return group === "STRING";
    case "tokenize":
      return group === "STRING" || group === "UUID";
  }
}
