import type {
  AdminBackendConfig,
  CreateConfigOptions,
  StorageConfigDraft,
} from "../models/storageConfig";
import type { AuditActor } from "../models/auditLog";
import { BackendOperationFailure, ProvisioningUnavailableError, ValidationError } from "../models/errors";
import type { AuditSink } from "./auditLog";
import type { BucketAdmin } from "./storage";
import { createLogger, errorMessage } from "../utils/logger";

const logger = createLogger({ file: "provisioning" });

export interface ConfigCreator {
  createConfig(
    ownerId: string,
    draft: StorageConfigDraft,
    opts?: CreateConfigOptions,
    actor?: AuditActor,
  ): Promise<string>;
}

export type ProvisionResult = {
  configId: string;
  bucketName: string;
  bucketCreated: boolean;
};

export function provisionedBucketName(prefix: string, ownerId: string): string {
  return `${prefix}-${ownerId.slice(0, 8).toLowerCase()}`;
}

export class ProvisioningService {
  constructor(
    private readonly admin: AdminBackendConfig,
    private readonly bucketAdmin: BucketAdmin,
    private readonly registry: ConfigCreator,
    private readonly audit: AuditSink,
  ) {}

  async provision(ownerId: string, username: string, actor?: AuditActor): Promise<ProvisionResult> {
    const bucketName = provisionedBucketName(this.admin.bucketPrefix, ownerId);
    const details: Record<string, unknown> = { bucketName, username };
    const auditActor = { ...actor, userId: actor?.userId ?? ownerId };
    try {
      if (!ownerId) throw new ValidationError("ownerId is required");
      if (
        !this.admin.tenantAccessKeyId ||
        !this.admin.tenantSecretAccessKey ||
        this.admin.tenantAccessKeyId === this.admin.adminAccessKeyId ||
        this.admin.tenantSecretAccessKey === this.admin.adminSecretAccessKey
      ) {
        throw new ProvisioningUnavailableError("tenant credentials must differ from the admin credentials");
      }
      let state: "created" | "existing";
      try {
        state = await this.bucketAdmin.ensureBucket(bucketName, this.admin.region);
      } catch (e) {
        throw new BackendOperationFailure("create-bucket", e);
      }
      details.bucketCreated = state === "created";
      const configId = await this.registry.createConfig(
        ownerId,
        {
          displayName: `Provisioned (${username})`,
          backendKind: "self-hosted",
          accessKeyId: this.admin.tenantAccessKeyId,
          secretAccessKey: this.admin.tenantSecretAccessKey,
          region: this.admin.region,
          bucketName,
          endpointUrl: this.admin.endpointUrl,
          useTls: this.admin.useTls,
        },
        { makeDefault: true },
        actor,
      );
      await this.audit.record({
        action: "provision_config",
        resource: "storage_config",
        resourceId: configId,
        success: true,
        details,
        actor: auditActor,
      });
      logger.info(`[provisioning] provisioned ${bucketName} for ${ownerId} as ${configId}`);
      return { configId, bucketName, bucketCreated: state === "created" };
    } catch (e) {
      logger.warn(`[provisioning] failed for ${ownerId}: ${errorMessage(e)}`);
      await this.audit.record({
        action: "provision_config",
        resource: "storage_config",
        success: false,
        error: e,
        details,
        actor: auditActor,
      });
      throw e;
    }
  }
}
