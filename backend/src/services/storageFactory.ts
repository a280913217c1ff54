import crypto from "crypto";
import { S3Client, type S3ClientConfig } from "@aws-sdk/client-s3";
import type { AdminBackendConfig, StorageConfig } from "../models/storageConfig";
import { ClientCreationFailure } from "../models/errors";
import type { BucketAdmin, ObjectStore } from "./storage";
import { S3BucketAdmin, S3ObjectStore } from "./storageS3";

export type BackendPolicy =
  | { kind: "cloud"; addressing: "virtual-hosted"; tls: "required" }
  | { kind: "self-hosted"; addressing: "path"; tls: "required" | "disabled" };

export type StoreConnection = Pick<
  StorageConfig,
  | "backendKind"
  | "accessKeyId"
  | "secretAccessKey"
  | "region"
  | "bucketName"
  | "endpointUrl"
  | "useTls"
>;

const FALLBACK_REGION = "us-east-1";

export function resolveBackendPolicy(conn: Pick<StoreConnection, "backendKind" | "useTls">): BackendPolicy {
  switch (conn.backendKind) {
    case "cloud":
      return { kind: "cloud", addressing: "virtual-hosted", tls: "required" };
    case "self-hosted":
      return { kind: "self-hosted", addressing: "path", tls: conn.useTls ? "required" : "disabled" };
  }
}

/**
 * Accepts either a full base URL or a bare `host[:port]` as stored by older clients.
 * The scheme always follows the TLS policy.
 */
export function normalizeEndpoint(raw: string, tls: BackendPolicy["tls"]): string {
  const trimmed = raw.trim();
  if (!trimmed) throw new ClientCreationFailure("endpoint URL is required for self-hosted backends");
  const scheme = tls === "required" ? "https:" : "http:";
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `${scheme}//${trimmed}`;
  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    throw new ClientCreationFailure(`invalid endpoint URL: ${trimmed}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ClientCreationFailure(`unsupported endpoint scheme: ${url.protocol}`);
  }
  if (!url.hostname || url.search || url.hash || url.username || url.password) {
    throw new ClientCreationFailure(`invalid endpoint URL: ${trimmed}`);
  }
  url.protocol = scheme;
  const path = url.pathname.replace(/\/+$/, "");
  return `${url.protocol}//${url.host}${path}`;
}

export function makeS3ClientConfig(conn: StoreConnection): S3ClientConfig {
  if (!conn.accessKeyId.trim()) throw new ClientCreationFailure("access key ID is required");
  if (!conn.secretAccessKey) throw new ClientCreationFailure("secret access key is required");
  if (!conn.bucketName.trim()) throw new ClientCreationFailure("bucket name is required");
  const policy = resolveBackendPolicy(conn);
  const credentials = {
    accessKeyId: conn.accessKeyId,
    secretAccessKey: conn.secretAccessKey,
  };
  const region = conn.region.trim() || FALLBACK_REGION;
  switch (policy.kind) {
    case "cloud":
      return { region, credentials, forcePathStyle: false };
    case "self-hosted":
      return {
        region,
        credentials,
        endpoint: normalizeEndpoint(conn.endpointUrl ?? "", policy.tls),
        forcePathStyle: true,
        tls: policy.tls === "required",
      };
  }
}

export function makeObjectStore(conn: StoreConnection): ObjectStore {
  const clientConfig = makeS3ClientConfig(conn);
  return new S3ObjectStore(new S3Client(clientConfig), conn.bucketName.trim());
}

/** Admin credentials against the provisioning endpoint; used only to create buckets. */
export function makeBucketAdmin(admin: AdminBackendConfig): BucketAdmin {
  const policy = resolveBackendPolicy({ backendKind: "self-hosted", useTls: admin.useTls });
  if (!admin.adminAccessKeyId.trim() || !admin.adminSecretAccessKey) {
    throw new ClientCreationFailure("admin credentials are required for provisioning");
  }
  return new S3BucketAdmin(
    new S3Client({
      region: admin.region.trim() || FALLBACK_REGION,
      credentials: {
        accessKeyId: admin.adminAccessKeyId,
        secretAccessKey: admin.adminSecretAccessKey,
      },
      endpoint: normalizeEndpoint(admin.endpointUrl, policy.tls),
      forcePathStyle: true,
      tls: policy.tls === "required",
    }),
  );
}

export function connectionFingerprint(conn: StoreConnection): string {
  return crypto
    .createHash("sha256")
    .update(
      JSON.stringify([
        conn.backendKind,
        conn.accessKeyId,
        conn.secretAccessKey,
        conn.region,
        conn.bucketName,
        conn.endpointUrl ?? "",
        conn.useTls,
      ]),
    )
    .digest("hex");
}

export type ObjectStoreBuilder = (conn: StoreConnection) => ObjectStore;

/**
 * Least-recently-used cache of stores keyed by config id and connection fingerprint.
 * Holds at least one entry, so every store it builds is closed once dropped.
 */
export class ObjectStoreCache {
  private readonly entries = new Map<string, { fingerprint: string; store: ObjectStore }>();
  private readonly maxEntries: number;

  constructor(
    maxEntries: number,
    private readonly build: ObjectStoreBuilder = makeObjectStore,
  ) {
    this.maxEntries = Math.max(1, Math.floor(maxEntries) || 1);
  }

  get size(): number {
    return this.entries.size;
  }

  storeFor(config: StorageConfig): ObjectStore {
    const fingerprint = connectionFingerprint(config);
    const hit = this.entries.get(config.id);
    if (hit && hit.fingerprint === fingerprint) {
      this.entries.delete(config.id);
      this.entries.set(config.id, hit);
      return hit.store;
    }
    const store = this.build(config);
    this.invalidate(config.id);
    this.entries.set(config.id, { fingerprint, store });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.invalidate(oldest.value);
    }
    return store;
  }

  /** Builds a store that is never cached, for records that may not be saved yet. */
  fresh(conn: StoreConnection): ObjectStore {
    return this.build(conn);
  }

  invalidate(configId: string): void {
    const entry = this.entries.get(configId);
    if (!entry) return;
    this.entries.delete(configId);
    entry.store.close();
  }
}
