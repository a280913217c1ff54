import { isBackendKind, type StorageConfig } from "../models/storageConfig";
import { ValidationError } from "../models/errors";
import { CsvSyntaxError, formatCsv, parseCsv } from "../utils/csv";
import { parseBoolean, snakeToCamel } from "../utils/format";

export const CONFIG_CSV_COLUMNS = [
  "id",
  "owner_id",
  "display_name",
  "backend_kind",
  "access_key_id",
  "secret_access_key",
  "region",
  "bucket_name",
  "endpoint_url",
  "use_tls",
  "is_default",
  "created_at",
  "updated_at",
] as const;

export type TransferFormat = "csv" | "json";

export function isTransferFormat(value: unknown): value is TransferFormat {
  return value === "csv" || value === "json";
}

function configToCsvRow(c: StorageConfig): string[] {
  return [
    c.id,
    c.ownerId,
    c.displayName,
    c.backendKind,
    c.accessKeyId,
    c.secretAccessKey,
    c.region,
    c.bucketName,
    c.endpointUrl ?? "",
    String(c.useTls),
    String(c.isDefault),
    c.createdAt,
    c.updatedAt,
  ];
}

export function configsToCsv(configs: ReadonlyArray<StorageConfig>): string {
  return formatCsv([[...CONFIG_CSV_COLUMNS], ...configs.map(configToCsvRow)]);
}

/** Returns one camelCase record per data row; values stay strings until they are parsed. */
export function recordsFromCsv(text: string, columns: ReadonlyArray<string>): Record<string, string>[] {
  let rows: string[][];
  try {
    rows = parseCsv(text);
  } catch (e) {
    if (e instanceof CsvSyntaxError) throw new ValidationError(`malformed CSV: ${e.message}`);
    throw e;
  }
  if (rows.length === 0) return [];
  const header = rows[0].map((h) => h.trim().toLowerCase());
  const missing = columns.filter((col) => !header.includes(col));
  if (missing.length > 0) {
    throw new ValidationError(`CSV header is missing columns: ${missing.join(", ")}`);
  }
  return rows.slice(1).map((cells) => {
    const raw: Record<string, string> = {};
    header.forEach((name, i) => {
      raw[name] = cells[i] ?? "";
    });
    return snakeToCamel<Record<string, string>>(raw);
  });
}

export function configsFromCsv(text: string): Record<string, string>[] {
  return recordsFromCsv(text, CONFIG_CSV_COLUMNS);
}

export function configsToJson(configs: ReadonlyArray<StorageConfig>): string {
  return JSON.stringify(configs, null, 2);
}

export function recordsFromJson(text: string, noun: string): unknown[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new ValidationError(`malformed JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!Array.isArray(parsed)) throw new ValidationError(`JSON import must be an array of ${noun}`);
  return parsed;
}

export function configsFromJson(text: string): unknown[] {
  return recordsFromJson(text, "configurations");
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function requiredString(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const s = value.trim();
  return s === "" ? null : s;
}

export function flag(value: unknown, def: boolean): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") return parseBoolean(value, def);
  return def;
}

export function timestamp(value: unknown, fallback: string): string {
  if (typeof value !== "string" && !(value instanceof Date)) return fallback;
  const d = new Date(value);
  return isNaN(d.getTime()) ? fallback : d.toISOString();
}

/**
 * Accepts a record from either import format. Returns null for a record that misses a
 * required field or names an unknown backend kind.
 */
export function parseImportRecord(raw: unknown, now: string = new Date().toISOString()): StorageConfig | null {
  if (!isRecord(raw)) return null;
  const id = requiredString(raw.id);
  const ownerId = requiredString(raw.ownerId);
  const displayName = requiredString(raw.displayName);
  const accessKeyId = requiredString(raw.accessKeyId);
  const bucketName = requiredString(raw.bucketName);
  const secretAccessKey = typeof raw.secretAccessKey === "string" ? raw.secretAccessKey : "";
  const backendKind = typeof raw.backendKind === "string" ? raw.backendKind.trim() : raw.backendKind;
  if (!id || !ownerId || !displayName || !accessKeyId || !bucketName || !secretAccessKey) return null;
  if (!isBackendKind(backendKind)) return null;
  const endpointUrl = requiredString(raw.endpointUrl);
  if (backendKind === "self-hosted" && !endpointUrl) return null;
  const createdAt = timestamp(raw.createdAt, now);
  return {
    id,
    ownerId,
    displayName,
    backendKind,
    accessKeyId,
    secretAccessKey,
    region: typeof raw.region === "string" ? raw.region.trim() : "",
    bucketName,
    endpointUrl: backendKind === "cloud" ? null : endpointUrl,
    useTls: flag(raw.useTls, true),
    isDefault: flag(raw.isDefault, false),
    createdAt,
    updatedAt: timestamp(raw.updatedAt, createdAt),
  };
}
