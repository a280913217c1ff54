import type { AdminBackendConfig } from "./models/storageConfig";

export class Config {
  static readonly FRONTEND_ORIGIN = envStrCsv("STOWAGE_FRONTEND_ORIGIN", ["http://localhost:5173"]);
  static readonly BACKEND_PORT = envNum("STOWAGE_BACKEND_PORT", 8081);
  static readonly DATABASE_HOST = envStr("STOWAGE_DATABASE_HOST", "localhost");
  static readonly DATABASE_PORT = envNum("STOWAGE_DATABASE_PORT", 5432);
  static readonly DATABASE_USER = envStr("STOWAGE_DATABASE_USER", "stowage");
  static readonly DATABASE_PASSWORD = envStr("STOWAGE_DATABASE_PASSWORD", "*");
  static readonly DATABASE_NAME = envStr("STOWAGE_DATABASE_NAME", "stowage");
  static readonly REDIS_HOST = envStr("STOWAGE_REDIS_HOST", "localhost");
  static readonly REDIS_PORT = envNum("STOWAGE_REDIS_PORT", 6379);
  static readonly REDIS_PASSWORD = envStr("STOWAGE_REDIS_PASSWORD", "*");
  static readonly SESSION_TTL = envNum("STOWAGE_SESSION_TTL", 60 * 60 * 24);
  static readonly TRUST_PROXY_HOPS = envNum("STOWAGE_TRUST_PROXY_HOPS", 1);
  static readonly ID_ISSUE_WORKER_ID = envNum("STOWAGE_ID_ISSUE_WORKER_ID", 0);
  static readonly PASSWORD_CONFIG = envStr("STOWAGE_PASSWORD_CONFIG", "scrypt:12:20:4096:8:1");
  static readonly UPLOAD_TMP_DIR = envStr("STOWAGE_UPLOAD_TMP_DIR", "", true);
  static readonly UPLOAD_BYTE_LIMIT = envNum("STOWAGE_UPLOAD_BYTE_LIMIT", 5 * 1024 * 1024 * 1024);
  static readonly IMPORT_BYTE_LIMIT = envNum("STOWAGE_IMPORT_BYTE_LIMIT", 10 * 1024 * 1024);
  static readonly STORE_CACHE_SIZE = envNum("STOWAGE_STORE_CACHE_SIZE", 256);
  static readonly AUDIT_LOG_RETENTION_DAYS = envNum("STOWAGE_AUDIT_LOG_RETENTION_DAYS", 90);
  static readonly AUDIT_LOG_PAGE_LIMIT = envNum("STOWAGE_AUDIT_LOG_PAGE_LIMIT", 500);
  static readonly PROVISION_ENDPOINT_URL = envStr(
    "STOWAGE_PROVISION_ENDPOINT_URL",
    "http://localhost:9000",
  );
  static readonly PROVISION_REGION = envStr("STOWAGE_PROVISION_REGION", "us-east-1");
  static readonly PROVISION_USE_TLS = envBool("STOWAGE_PROVISION_USE_TLS", false);
  static readonly PROVISION_ADMIN_ACCESS_KEY_ID = envStr(
    "STOWAGE_PROVISION_ADMIN_ACCESS_KEY_ID",
    "",
    true,
  );
  static readonly PROVISION_ADMIN_SECRET_ACCESS_KEY = envStr(
    "STOWAGE_PROVISION_ADMIN_SECRET_ACCESS_KEY",
    "",
    true,
  );
  static readonly PROVISION_TENANT_ACCESS_KEY_ID = envStr(
    "STOWAGE_PROVISION_TENANT_ACCESS_KEY_ID",
    "",
    true,
  );
  static readonly PROVISION_TENANT_SECRET_ACCESS_KEY = envStr(
    "STOWAGE_PROVISION_TENANT_SECRET_ACCESS_KEY",
    "",
    true,
  );
  static readonly PROVISION_BUCKET_PREFIX = envStr("STOWAGE_PROVISION_BUCKET_PREFIX", "stowage");
}

export type ProvisionSettings = Pick<
  typeof Config,
  | "PROVISION_ENDPOINT_URL"
  | "PROVISION_REGION"
  | "PROVISION_USE_TLS"
  | "PROVISION_ADMIN_ACCESS_KEY_ID"
  | "PROVISION_ADMIN_SECRET_ACCESS_KEY"
  | "PROVISION_TENANT_ACCESS_KEY_ID"
  | "PROVISION_TENANT_SECRET_ACCESS_KEY"
  | "PROVISION_BUCKET_PREFIX"
>;

/**
 * Provisioning is enabled only with both key pairs set and distinct: tenants receive the
 * tenant pair, never the admin one.
 */
export function makeAdminBackendConfig(settings: ProvisionSettings = Config): AdminBackendConfig | null {
  const adminKey = settings.PROVISION_ADMIN_ACCESS_KEY_ID;
  const adminSecret = settings.PROVISION_ADMIN_SECRET_ACCESS_KEY;
  const tenantKey = settings.PROVISION_TENANT_ACCESS_KEY_ID;
  const tenantSecret = settings.PROVISION_TENANT_SECRET_ACCESS_KEY;
  if (!adminKey || !adminSecret || !tenantKey || !tenantSecret) return null;
  if (tenantKey === adminKey || tenantSecret === adminSecret) return null;
  return Object.freeze({
    endpointUrl: settings.PROVISION_ENDPOINT_URL,
    region: settings.PROVISION_REGION,
    useTls: settings.PROVISION_USE_TLS,
    adminAccessKeyId: adminKey,
    adminSecretAccessKey: adminSecret,
    tenantAccessKeyId: tenantKey,
    tenantSecretAccessKey: tenantSecret,
    bucketPrefix: settings.PROVISION_BUCKET_PREFIX,
  });
}

export function envStr(name: string, def?: string, treatEmptyAsUndefined = false): string {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  return v;
}

export function envNum(name: string, def?: number, treatEmptyAsUndefined = false): number {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  const n = Number(v);
  if (isNaN(n)) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} is not a valid number: ${v}`);
  }
  return n;
}

export function envBool(name: string, def?: boolean, treatEmptyAsUndefined = false): boolean {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  const vv = v.toLowerCase();
  if (["1", "true", "yes", "on"].includes(vv)) return true;
  if (["0", "false", "no", "off"].includes(vv)) return false;
  if (def !== undefined) return def;
  throw new Error(`Env var ${name} is not a valid boolean: ${v}`);
}

export function envStrCsv(name: string, def?: string[], treatEmptyAsUndefined = false): string[] {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
