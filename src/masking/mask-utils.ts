import crypto from "crypto";
import { DEFAULT_MASK_CHAR, REDACT_PLACEHOLDER } from "./rules";

/**
 * Text a masking rule works on. Dates use their UTC ISO form and objects
 * (json/jsonb, arrays) their JSON, so the result does not depend on the
 * host's locale or time zone.
 */
export function scalarText(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? String(value) : value.toISOString();
  }
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * sha256 over the trimmed, lowercased value followed by the salt.
 *
 * Output is stable only while the salt is: rotating it breaks every join
 * and lookup made against previously masked data.
 */
export function deterministicHash(value: unknown, salt: string): string | null {
  if (value === null || value === undefined) return null;

  const normalized = scalarText(value).trim().toLowerCase();
  return sha256Hex(normalized + salt);
}

export function redact(
  value: unknown,
  opts: { char?: string; keepLength?: boolean } = {}
): string | null {
  if (value === null || value === undefined) return null;

  if (opts.keepLength) {
    // one mask char per code point, not per UTF-16 unit
    return (opts.char ?? DEFAULT_MASK_CHAR).repeat([...scalarText(value)].length);
  }
  return REDACT_PLACEHOLDER;
}

/**
 * Replaces every digit with a hash-derived digit, leaving separators,
 * brackets and spaces where they were. "(555) 123-4567" keeps its shape.
 */
export function preserveFormat(value: unknown, salt: string): string | null {
  if (value === null || value === undefined) return null;

  const text = scalarText(value);
  const digits = text.replace(/\D/g, "");
  const replacement = derivedDigits(digits, salt, digits.length);

  let idx = 0;
  let out = "";
  for (const ch of text) {
    if (ch >= "0" && ch <= "9") {
      out += replacement[idx++];
    } else {
      out += ch;
    }
  }
  return out;
}

/**
 * Maps each hex digit of the hash to `value % 10`. A single sha256 gives 64
 * digits; longer inputs keep drawing from sha256 of the previous hash.
 */
export function derivedDigits(digits: string, salt: string, count: number): string {
  let out = "";
  let hash = sha256Hex(digits.trim().toLowerCase() + salt);

  while (out.length < count) {
    for (const hex of hash) {
      if (out.length >= count) break;
      out += String(parseInt(hex, 16) % 10);
    }
    hash = sha256Hex(hash);
  }
  return out;
}

function sha256Hex(input: string): string {
  return crypto.createHash("sha256").update(input, "utf8").digest("hex");
}
