import { makeAdminBackendConfig, type ProvisionSettings } from "./config";

const settings: ProvisionSettings = {
  PROVISION_ENDPOINT_URL: "http://minio.test:9000",
  PROVISION_REGION: "us-east-1",
  PROVISION_USE_TLS: false,
  PROVISION_ADMIN_ACCESS_KEY_ID: "admin-access",
  PROVISION_ADMIN_SECRET_ACCESS_KEY: "admin-test-secret",
  PROVISION_TENANT_ACCESS_KEY_ID: "tenant-access",
  PROVISION_TENANT_SECRET_ACCESS_KEY: "tenant-test-secret",
  PROVISION_BUCKET_PREFIX: "stowage",
};

describe("makeAdminBackendConfig", () => {
  test("hands tenants the tenant key pair", () => {
    expect(makeAdminBackendConfig(settings)).toEqual({
      endpointUrl: "http://minio.test:9000",
      region: "us-east-1",
      useTls: false,
      adminAccessKeyId: "admin-access",
      adminSecretAccessKey: "admin-test-secret",
      tenantAccessKeyId: "tenant-access",
      tenantSecretAccessKey: "tenant-test-secret",
      bucketPrefix: "stowage",
    });
  });

  test("is disabled without tenant credentials", () => {
    expect(
      makeAdminBackendConfig({
        ...settings,
        PROVISION_TENANT_ACCESS_KEY_ID: "",
        PROVISION_TENANT_SECRET_ACCESS_KEY: "",
      }),
    ).toBeNull();
    expect(makeAdminBackendConfig({ ...settings, PROVISION_TENANT_SECRET_ACCESS_KEY: "" })).toBeNull();
  });

  test("is disabled when the tenant pair reuses the admin pair", () => {
    expect(
      makeAdminBackendConfig({ ...settings, PROVISION_TENANT_SECRET_ACCESS_KEY: "admin-test-secret" }),
    ).toBeNull();
    expect(makeAdminBackendConfig({ ...settings, PROVISION_TENANT_ACCESS_KEY_ID: "admin-access" })).toBeNull();
  });

  test("is disabled without admin credentials", () => {
    expect(makeAdminBackendConfig({ ...settings, PROVISION_ADMIN_ACCESS_KEY_ID: "" })).toBeNull();
  });
});
