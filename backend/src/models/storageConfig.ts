export const BACKEND_KINDS = ["cloud", "self-hosted"] as const;

export type BackendKind = (typeof BACKEND_KINDS)[number];

export type StorageConfig = {
  id: string;
  ownerId: string;
  displayName: string;
  backendKind: BackendKind;
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
  bucketName: string;
  endpointUrl: string | null;
  useTls: boolean;
  isDefault: boolean;
  createdAt: string;
  updatedAt: string;
};

export type RedactedStorageConfig = Omit<StorageConfig, "secretAccessKey"> & {
  secretAccessKeyHint: string;
};

export type StorageConfigDraft = {
  displayName: string;
  backendKind: BackendKind;
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
  bucketName: string;
  endpointUrl?: string | null;
  useTls?: boolean;
};

export type StorageConfigPatch = {
  displayName?: string;
  backendKind?: BackendKind;
  accessKeyId?: string;
  secretAccessKey?: string;
  region?: string;
  bucketName?: string;
  endpointUrl?: string | null;
  useTls?: boolean;
};

export type CreateConfigOptions = {
  makeDefault?: boolean;
};

export type Requester = {
  userId: string;
  isAdmin: boolean;
};

export type ImportConfigsResult = {
  imported: number;
  skipped: number;
};

export type AdminBackendConfig = Readonly<{
  endpointUrl: string;
  region: string;
  useTls: boolean;
  adminAccessKeyId: string;
  adminSecretAccessKey: string;
  tenantAccessKeyId: string;
  tenantSecretAccessKey: string;
  bucketPrefix: string;
}>;

export function isBackendKind(value: unknown): value is BackendKind {
  return typeof value === "string" && (BACKEND_KINDS as readonly string[]).includes(value);
}
