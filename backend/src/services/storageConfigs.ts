import { Pool, PoolClient } from "pg";
import {
  isBackendKind,
  type CreateConfigOptions,
  type ImportConfigsResult,
  type RedactedStorageConfig,
  type Requester,
  type StorageConfig,
  type StorageConfigDraft,
  type StorageConfigPatch,
} from "../models/storageConfig";
import type { AuditActor } from "../models/auditLog";
import {
  ConfigNotFoundError,
  ForbiddenError,
  LastConfigError,
  NoConfigurationError,
  ValidationError,
} from "../models/errors";
import type { AuditSink } from "./auditLog";
import { IdIssueService } from "./idIssue";
import { makeS3ClientConfig, type ObjectStoreCache } from "./storageFactory";
import { parseImportRecord } from "./configTransfer";
import { pgQuery, withTransaction } from "../utils/servers";
import { maskSecret, toIsoString } from "../utils/format";
import { createLogger } from "../utils/logger";

const logger = createLogger({ file: "storageConfigs" });

type StorageConfigRow = {
  id: string;
  owner_id: string;
  display_name: string;
  backend_kind: string;
  access_key_id: string;
  secret_access_key: string;
  region: string;
  bucket_name: string;
  endpoint_url: string | null;
  use_tls: boolean;
  is_default: boolean;
  created_at: Date | string;
  updated_at: Date | string;
};

const COLUMNS =
  "id, owner_id, display_name, backend_kind, access_key_id, secret_access_key, region, bucket_name, endpoint_url, use_tls, is_default, created_at, updated_at";

function rowToConfig(row: StorageConfigRow): StorageConfig {
  if (!isBackendKind(row.backend_kind)) {
    throw new Error(`unknown backend kind stored for config ${row.id}: ${row.backend_kind}`);
  }
  return {
    id: row.id,
    ownerId: row.owner_id,
    displayName: row.display_name,
    backendKind: row.backend_kind,
    accessKeyId: row.access_key_id,
    secretAccessKey: row.secret_access_key,
    region: row.region,
    bucketName: row.bucket_name,
    endpointUrl: row.endpoint_url,
    useTls: row.use_tls,
    isDefault: row.is_default,
    createdAt: toIsoString(row.created_at),
    updatedAt: toIsoString(row.updated_at),
  };
}

function configParams(c: StorageConfig): unknown[] {
  return [
    c.id,
    c.ownerId,
    c.displayName,
    c.backendKind,
    c.accessKeyId,
    c.secretAccessKey,
    c.region,
    c.bucketName,
    c.endpointUrl,
    c.useTls,
    c.isDefault,
    c.createdAt,
    c.updatedAt,
  ];
}

type ConfigFields = Omit<StorageConfig, "id" | "ownerId" | "isDefault" | "createdAt" | "updatedAt">;

/** Trims and checks a draft, then runs it through the client factory without any I/O. */
export function normalizeConfigFields(draft: StorageConfigDraft): ConfigFields {
  const displayName = typeof draft.displayName === "string" ? draft.displayName.trim() : "";
  if (!displayName) throw new ValidationError("displayName is required");
  if (!isBackendKind(draft.backendKind)) {
    throw new ValidationError(`unknown backendKind: ${String(draft.backendKind)}`);
  }
  const endpoint = typeof draft.endpointUrl === "string" ? draft.endpointUrl.trim() : "";
  const fields: ConfigFields = {
    displayName,
    backendKind: draft.backendKind,
    accessKeyId: typeof draft.accessKeyId === "string" ? draft.accessKeyId.trim() : "",
    secretAccessKey: typeof draft.secretAccessKey === "string" ? draft.secretAccessKey : "",
    region: typeof draft.region === "string" ? draft.region.trim() : "",
    bucketName: typeof draft.bucketName === "string" ? draft.bucketName.trim() : "",
    endpointUrl: draft.backendKind === "cloud" ? null : endpoint || null,
    useTls: draft.useTls ?? true,
  };
  makeS3ClientConfig(fields);
  return fields;
}

/**
 * Applies a patch on top of a stored record. Identity, ownership, creation time and the
 * default flag always come from `existing`; an omitted or empty secret keeps the stored one.
 */
export function mergeStorageConfig(
  existing: StorageConfig,
  patch: StorageConfigPatch,
  now: string = new Date().toISOString(),
): StorageConfig {
  const fields = normalizeConfigFields({
    displayName: patch.displayName ?? existing.displayName,
    backendKind: patch.backendKind ?? existing.backendKind,
    accessKeyId: patch.accessKeyId ?? existing.accessKeyId,
    secretAccessKey: patch.secretAccessKey ? patch.secretAccessKey : existing.secretAccessKey,
    region: patch.region ?? existing.region,
    bucketName: patch.bucketName ?? existing.bucketName,
    endpointUrl: patch.endpointUrl !== undefined ? patch.endpointUrl : existing.endpointUrl,
    useTls: patch.useTls ?? existing.useTls,
  });
  return {
    ...fields,
    id: existing.id,
    ownerId: existing.ownerId,
    isDefault: existing.isDefault,
    createdAt: existing.createdAt,
    updatedAt: now,
  };
}

export function redactConfig(config: StorageConfig): RedactedStorageConfig {
  const { secretAccessKey, ...rest } = config;
  return { ...rest, secretAccessKeyHint: maskSecret(secretAccessKey) };
}

export function ownerLockKey(ownerId: string): string {
  return `storage_configs:${ownerId}`;
}

type AuditTarget = {
  action: string;
  ownerId?: string;
  resourceId?: string;
  details?: Record<string, unknown>;
  actor?: AuditActor;
};

export class StorageConfigsService {
  private pgPool: Pool;
  private idIssueService: IdIssueService;
  private audit: AuditSink;
  private storeCache: ObjectStoreCache | null;

  constructor(
    pgPool: Pool,
    idIssueService: IdIssueService,
    audit: AuditSink,
    storeCache: ObjectStoreCache | null = null,
  ) {
    this.pgPool = pgPool;
    this.idIssueService = idIssueService;
    this.audit = audit;
    this.storeCache = storeCache;
  }

  private async audited<T>(target: AuditTarget, fn: () => Promise<T>): Promise<T> {
    const base = {
      action: target.action,
      resource: "storage_config",
      resourceId: target.resourceId,
      details: target.details ?? {},
      actor: { ...target.actor, userId: target.actor?.userId ?? target.ownerId },
    };
    try {
      const out = await fn();
      await this.audit.record({ ...base, success: true });
      return out;
    } catch (e) {
      await this.audit.record({ ...base, success: false, error: e });
      throw e;
    }
  }

  async createConfig(
    ownerId: string,
    draft: StorageConfigDraft,
    opts: CreateConfigOptions = {},
    actor?: AuditActor,
  ): Promise<string> {
    const id = this.idIssueService.issueId();
    const details = { displayName: draft.displayName, backendKind: draft.backendKind, bucketName: draft.bucketName };
    return this.audited({ action: "create_config", ownerId, resourceId: id, details, actor }, async () => {
      const fields = normalizeConfigFields(draft);
      const now = new Date().toISOString();
      await withTransaction(
        this.pgPool,
        async (client) => {
          const res = await client.query<{ cnt: number }>(
            "SELECT COUNT(*)::int AS cnt FROM storage_configs WHERE owner_id = $1",
            [ownerId],
          );
          const isFirst = Number(res.rows[0]?.cnt ?? 0) === 0;
          const isDefault = isFirst || opts.makeDefault === true;
          if (isDefault && !isFirst) {
            await client.query(
              "UPDATE storage_configs SET is_default = FALSE WHERE owner_id = $1 AND is_default",
              [ownerId],
            );
          }
          const config: StorageConfig = {
            ...fields,
            id,
            ownerId,
            isDefault,
            createdAt: now,
            updatedAt: now,
          };
          await client.query(
            `INSERT INTO storage_configs (${COLUMNS})
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`,
            configParams(config),
          );
        },
        ownerLockKey(ownerId),
      );
      logger.debug(`[storageConfigs] created ${id} for ${ownerId}`);
      return id;
    });
  }

  async getConfig(requester: Requester, id: string): Promise<StorageConfig> {
    const res = await pgQuery<StorageConfigRow>(
      this.pgPool,
      `SELECT ${COLUMNS} FROM storage_configs WHERE id = $1`,
      [id],
    );
    if (res.rows.length === 0) throw new ConfigNotFoundError(id);
    const config = rowToConfig(res.rows[0]);
    if (config.ownerId !== requester.userId && !requester.isAdmin) {
      throw new ForbiddenError();
    }
    return config;
  }

  async getOwnedConfig(ownerId: string, id: string): Promise<StorageConfig> {
    const res = await pgQuery<StorageConfigRow>(
      this.pgPool,
      `SELECT ${COLUMNS} FROM storage_configs WHERE id = $1 AND owner_id = $2`,
      [id, ownerId],
    );
    if (res.rows.length === 0) throw new ConfigNotFoundError(id);
    return rowToConfig(res.rows[0]);
  }

  async listConfigs(ownerId: string): Promise<RedactedStorageConfig[]> {
    const res = await pgQuery<StorageConfigRow>(
      this.pgPool,
      `SELECT ${COLUMNS} FROM storage_configs WHERE owner_id = $1 ORDER BY created_at ASC, id ASC`,
      [ownerId],
    );
    return res.rows.map((row) => redactConfig(rowToConfig(row)));
  }

  async getDefaultConfig(ownerId: string): Promise<StorageConfig> {
    const res = await pgQuery<StorageConfigRow>(
      this.pgPool,
      `SELECT ${COLUMNS} FROM storage_configs WHERE owner_id = $1
       ORDER BY is_default DESC, created_at ASC, id ASC LIMIT 1`,
      [ownerId],
    );
    if (res.rows.length === 0) throw new NoConfigurationError();
    return rowToConfig(res.rows[0]);
  }

  private async lockedOwnedConfig(client: PoolClient, ownerId: string, id: string): Promise<StorageConfig> {
    const res = await client.query<StorageConfigRow>(
      `SELECT ${COLUMNS} FROM storage_configs WHERE id = $1 AND owner_id = $2 FOR UPDATE`,
      [id, ownerId],
    );
    if (res.rows.length === 0) throw new ConfigNotFoundError(id);
    return rowToConfig(res.rows[0]);
  }

  async updateConfig(
    ownerId: string,
    id: string,
    patch: StorageConfigPatch,
    actor?: AuditActor,
  ): Promise<StorageConfig> {
    const details = {
      changed: Object.keys(patch).filter((k) => k !== "secretAccessKey" || Boolean(patch.secretAccessKey)),
    };
    const updated = await this.audited({ action: "update_config", ownerId, resourceId: id, details, actor }, () =>
      withTransaction(
        this.pgPool,
        async (client) => {
          const existing = await this.lockedOwnedConfig(client, ownerId, id);
          const merged = mergeStorageConfig(existing, patch);
          await client.query(
            `UPDATE storage_configs
                SET display_name = $3, backend_kind = $4, access_key_id = $5, secret_access_key = $6,
                    region = $7, bucket_name = $8, endpoint_url = $9, use_tls = $10, updated_at = $11
              WHERE id = $1 AND owner_id = $2`,
            [
              id,
              ownerId,
              merged.displayName,
              merged.backendKind,
              merged.accessKeyId,
              merged.secretAccessKey,
              merged.region,
              merged.bucketName,
              merged.endpointUrl,
              merged.useTls,
              merged.updatedAt,
            ],
          );
          return merged;
        },
        ownerLockKey(ownerId),
      ),
    );
    this.storeCache?.invalidate(id);
    return updated;
  }

  async setDefaultConfig(ownerId: string, id: string, actor?: AuditActor): Promise<void> {
    await this.audited({ action: "set_default_config", ownerId, resourceId: id, actor }, () =>
      withTransaction(
        this.pgPool,
        async (client) => {
          await this.lockedOwnedConfig(client, ownerId, id);
          await client.query(
            "UPDATE storage_configs SET is_default = FALSE WHERE owner_id = $1 AND is_default",
            [ownerId],
          );
          await client.query(
            "UPDATE storage_configs SET is_default = TRUE, updated_at = $3 WHERE id = $1 AND owner_id = $2",
            [id, ownerId, new Date().toISOString()],
          );
        },
        ownerLockKey(ownerId),
      ),
    );
  }

  async deleteConfig(ownerId: string, id: string, actor?: AuditActor): Promise<void> {
    await this.audited({ action: "delete_config", ownerId, resourceId: id, actor }, () =>
      withTransaction(
        this.pgPool,
        async (client) => {
          const res = await client.query<{ id: string; is_default: boolean }>(
            "SELECT id, is_default FROM storage_configs WHERE owner_id = $1 ORDER BY created_at ASC, id ASC",
            [ownerId],
          );
          const target = res.rows.find((r) => r.id === id);
          if (!target) throw new ConfigNotFoundError(id);
          if (res.rows.length === 1) throw new LastConfigError();
          await client.query("DELETE FROM storage_configs WHERE id = $1 AND owner_id = $2", [id, ownerId]);
          if (target.is_default) {
            const successor = res.rows.find((r) => r.id !== id);
            if (successor) {
              await client.query(
                "UPDATE storage_configs SET is_default = TRUE, updated_at = $2 WHERE id = $1",
                [successor.id, new Date().toISOString()],
              );
              logger.debug(`[storageConfigs] promoted ${successor.id} to default for ${ownerId}`);
            }
          }
        },
        ownerLockKey(ownerId),
      ),
    );
    this.storeCache?.invalidate(id);
  }

  async exportAllConfigs(): Promise<StorageConfig[]> {
    const res = await pgQuery<StorageConfigRow>(
      this.pgPool,
      `SELECT ${COLUMNS} FROM storage_configs ORDER BY owner_id ASC, created_at ASC, id ASC`,
    );
    return res.rows.map(rowToConfig);
  }

  /**
   * Upserts records by id, grouped per owner under that owner's lock. A record whose id
   * already belongs to another owner is skipped. Afterwards each affected owner keeps
   * exactly one default: the earliest flagged record, else the earliest record.
   */
  async importConfigs(records: ReadonlyArray<unknown>, actor?: AuditActor): Promise<ImportConfigsResult> {
    const now = new Date().toISOString();
    const byOwner = new Map<string, StorageConfig[]>();
    let skipped = 0;
    for (const raw of records) {
      const config = parseImportRecord(raw, now);
      if (!config) {
        skipped++;
        continue;
      }
      const list = byOwner.get(config.ownerId) ?? [];
      list.push(config);
      byOwner.set(config.ownerId, list);
    }
    const details = { records: records.length, owners: byOwner.size };
    return this.audited({ action: "import_configs", details, actor }, async () => {
      let imported = 0;
      for (const [ownerId, configs] of byOwner) {
        const written = await withTransaction(
          this.pgPool,
          (client) => this.importOwnerConfigs(client, ownerId, configs),
          ownerLockKey(ownerId),
        );
        imported += written;
        skipped += configs.length - written;
        for (const c of configs) this.storeCache?.invalidate(c.id);
      }
      logger.info(`[storageConfigs] imported ${imported} configs, skipped ${skipped}`);
      return { imported, skipped };
    });
  }

  private async importOwnerConfigs(
    client: PoolClient,
    ownerId: string,
    configs: StorageConfig[],
  ): Promise<number> {
    const before = await client.query<{ id: string; is_default: boolean }>(
      "SELECT id, is_default FROM storage_configs WHERE owner_id = $1",
      [ownerId],
    );
    const flagged = new Set(before.rows.filter((r) => r.is_default).map((r) => r.id));
    await client.query("UPDATE storage_configs SET is_default = FALSE WHERE owner_id = $1 AND is_default", [
      ownerId,
    ]);
    let written = 0;
    for (const config of configs) {
      const res = await client.query(
        `INSERT INTO storage_configs (${COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, FALSE, $11, $12)
         ON CONFLICT (id) DO UPDATE
            SET display_name = EXCLUDED.display_name, backend_kind = EXCLUDED.backend_kind,
                access_key_id = EXCLUDED.access_key_id, secret_access_key = EXCLUDED.secret_access_key,
                region = EXCLUDED.region, bucket_name = EXCLUDED.bucket_name,
                endpoint_url = EXCLUDED.endpoint_url, use_tls = EXCLUDED.use_tls,
                created_at = EXCLUDED.created_at, updated_at = EXCLUDED.updated_at
          WHERE storage_configs.owner_id = EXCLUDED.owner_id`,
        [
          config.id,
          config.ownerId,
          config.displayName,
          config.backendKind,
          config.accessKeyId,
          config.secretAccessKey,
          config.region,
          config.bucketName,
          config.endpointUrl,
          config.useTls,
          config.createdAt,
          config.updatedAt,
        ],
      );
      if ((res.rowCount ?? 0) === 0) {
        logger.warn(`[storageConfigs] import skipped ${config.id}: owned by another user`);
        continue;
      }
      written++;
      if (config.isDefault) flagged.add(config.id);
      else flagged.delete(config.id);
    }
    const all = await client.query<{ id: string }>(
      "SELECT id FROM storage_configs WHERE owner_id = $1 ORDER BY created_at ASC, id ASC",
      [ownerId],
    );
    const winner = all.rows.find((r) => flagged.has(r.id)) ?? all.rows[0];
    if (winner) {
      await client.query("UPDATE storage_configs SET is_default = TRUE WHERE id = $1", [winner.id]);
    }
    return written;
  }
}
