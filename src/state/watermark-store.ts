import fs from "fs/promises";
import path from "path";
import { Mutex } from "./mutex";

export type WatermarkValue = string | number;

export interface WatermarkStore {
  get(table: string): Promise<WatermarkValue | undefined>;
  advance(table: string, candidates: readonly unknown[]): Promise<WatermarkValue | undefined>;
  snapshot(): Promise<Record<string, WatermarkValue>>;
}

const DECIMAL = /^-?\d+(\.\d+)?$/;
const INTEGER = /^-?\d+$/;
const ZONED_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/**
 * Local wall-clock time with the host's UTC offset, e.g.
 * `2024-01-03T10:00:00.000-06:00`. pg reads `timestamp` columns as local
 * time, so the wall-clock part is what the column holds; the offset keeps
 * the instant exact for `timestamptz`.
 */
export function formatLocalTimestamp(d: Date): string {
  const offset = -d.getTimezoneOffset();
  const sign = offset < 0 ? "-" : "+";
  const abs = Math.abs(offset);
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}` +
    `T${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}` +
    `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  );
}

/**
 * Turns a raw column value into something that can be stored and compared.
 * Null/undefined are not candidates.
 */
export function toWatermarkValue(value: unknown): WatermarkValue | undefined {
  if (value === null || value === undefined) return undefined;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : formatLocalTimestamp(value);
  }
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "bigint") return value.toString();
  return String(value);
}

function decimalText(v: WatermarkValue): string | undefined {
  const text = typeof v === "number" ? String(v) : v.trim();
  return DECIMAL.test(text) ? text : undefined;
}

/**
 * pg hands back int8 and numeric as text, so numeric-looking strings are
 * ordered by value ("10" > "9"). Integers compare exactly as bigints.
 * Zoned timestamps compare by instant; anything else as text.
 */
export function compareWatermarks(a: WatermarkValue, b: WatermarkValue): number {
  if (typeof a === "number" && typeof b === "number") return a - b;

  const da = decimalText(a);
  const db = decimalText(b);
  if (da !== undefined && db !== undefined) {
    if (INTEGER.test(da) && INTEGER.test(db)) {
      const ba = BigInt(da);
      const bb = BigInt(db);
      return ba < bb ? -1 : ba > bb ? 1 : 0;
    }
    return Number(da) - Number(db);
  }

  const sa = String(a);
  const sb = String(b);
  if (ZONED_TIMESTAMP.test(sa) && ZONED_TIMESTAMP.test(sb)) {
    return Date.parse(sa) - Date.parse(sb);
  }
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

export function maxWatermark(values: readonly unknown[]): WatermarkValue | undefined {
  let best: WatermarkValue | undefined;
  for (const raw of values) {
    const v = toWatermarkValue(raw);
    if (v === undefined) continue;
    if (best === undefined || compareWatermarks(v, best) > 0) best = v;
  }
  return best;
}

function isWatermarkMap(value: unknown): value is Record<string, WatermarkValue> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === "string" || typeof v === "number");
}

/**
 * Per-table high-water marks persisted as one JSON file.
 *
 * Every read and write of the map and the file goes through a single lock,
 * so table tasks running side by side cannot lose each other's updates or
 * interleave writes to the file.
 */
export class FileWatermarkStore implements WatermarkStore {
  private readonly lock = new Mutex();
  private state: Record<string, WatermarkValue> | undefined;

  constructor(private readonly filePath: string) {}

  get(table: string): Promise<WatermarkValue | undefined> {
    return this.lock.runExclusive(async () => (await this.load())[table]);
  }

  /**
   * Raises the stored mark for `table` to the max of `candidates` and
   * rewrites the file. Never lowers it. Returns the stored value.
   */
  advance(table: string, candidates: readonly unknown[]): Promise<WatermarkValue | undefined> {
    return this.lock.runExclusive(async () => {
      const state = await this.load();
      const current = state[table];
      const next = maxWatermark(candidates);

      if (next === undefined) return current;
      if (current !== undefined && compareWatermarks(next, current) <= 0) return current;

      state[table] = next;
      await this.persist(state);
      return next;
    });
  }

  snapshot(): Promise<Record<string, WatermarkValue>> {
    return this.lock.runExclusive(async () => ({ ...(await this.load()) }));
  }

  private async load(): Promise<Record<string, WatermarkValue>> {
    if (this.state) return this.state;

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isNotFound(err)) {
        this.state = {};
        return this.state;
      }
      throw err;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isWatermarkMap(parsed)) {
      throw new Error(`Watermark file ${this.filePath} is not a table -> value mapping`);
    }
    this.state = parsed;
    return this.state;
  }

  private async persist(state: Record<string, WatermarkValue>): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(state, null, 4), "utf8");
    await fs.rename(tmp, this.filePath);
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
