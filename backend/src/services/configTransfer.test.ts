import {
  CONFIG_CSV_COLUMNS,
  configsFromCsv,
  configsFromJson,
  configsToCsv,
  configsToJson,
  isTransferFormat,
  parseImportRecord,
} from "./configTransfer";
import type { StorageConfig } from "../models/storageConfig";
import { ValidationError } from "../models/errors";

const cloud: StorageConfig = {
  id: "00000000000000A1",
  ownerId: "U1",
  displayName: 'Team "A", main\nsecond line',
  backendKind: "cloud",
  accessKeyId: "test-access",
  secretAccessKey: "test-secret",
  region: "",
  bucketName: "team-a",
  endpointUrl: null,
  useTls: true,
  isDefault: true,
  createdAt: "2025-01-02T03:04:05.000Z",
  updatedAt: "2025-01-03T03:04:05.000Z",
};

const selfHosted: StorageConfig = {
  id: "00000000000000A2",
  ownerId: "U1",
  displayName: "Lab",
  backendKind: "self-hosted",
  accessKeyId: "lab-access",
  secretAccessKey: "test-secret,with comma",
  region: "us-east-1",
  bucketName: "lab",
  endpointUrl: "http://minio.test:9000",
  useTls: false,
  isDefault: false,
  createdAt: "2025-02-01T00:00:00.000Z",
  updatedAt: "2025-02-01T00:00:00.000Z",
};

const NOW = "2025-06-01T00:00:00.000Z";

describe("isTransferFormat", () => {
  test("accepts csv and json only", () => {
    expect(isTransferFormat("csv")).toBe(true);
    expect(isTransferFormat("json")).toBe(true);
    expect(isTransferFormat("xml")).toBe(false);
    expect(isTransferFormat(undefined)).toBe(false);
  });
});

describe("CSV transfer", () => {
  test("header row lists every column", () => {
    const csv = configsToCsv([]);
    expect(csv).toBe(CONFIG_CSV_COLUMNS.join(",") + "\r\n");
  });

  test("round trips quoted fields and empty endpoints", () => {
    const csv = configsToCsv([cloud, selfHosted]);
    const rows = configsFromCsv(csv);
    expect(rows[0].displayName).toBe('Team "A", main\nsecond line');
    expect(rows[0].endpointUrl).toBe("");
    expect(rows.map((r) => parseImportRecord(r, NOW))).toEqual([cloud, selfHosted]);
  });

  test("header matching ignores case and order", () => {
    const header = [...CONFIG_CSV_COLUMNS].reverse().map((c) => c.toUpperCase());
    const values = [
      "2025-02-01T00:00:00.000Z",
      "2025-02-01T00:00:00.000Z",
      "false",
      "false",
      "http://minio.test:9000",
      "lab",
      "us-east-1",
      '"test-secret,with comma"',
      "lab-access",
      "self-hosted",
      "Lab",
      "U1",
      "00000000000000A2",
    ];
    const rows = configsFromCsv(header.join(",") + "\n" + values.join(",") + "\n");
    expect(parseImportRecord(rows[0], NOW)).toEqual(selfHosted);
  });

  test("empty input yields no records", () => {
    expect(configsFromCsv("")).toEqual([]);
  });

  test("missing columns and malformed text are validation errors", () => {
    const header = CONFIG_CSV_COLUMNS.filter((c) => c !== "use_tls").join(",");
    expect(() => configsFromCsv(header + "\r\n")).toThrow("CSV header is missing columns: use_tls");
    expect(() => configsFromCsv('id\r\n"open')).toThrow(ValidationError);
    expect(() => configsFromCsv('id\r\n"open')).toThrow("malformed CSV: unterminated quoted field at line 2");
  });
});

describe("JSON transfer", () => {
  test("round trips configurations", () => {
    const raws = configsFromJson(configsToJson([cloud, selfHosted]));
    expect(raws.map((r) => parseImportRecord(r, NOW))).toEqual([cloud, selfHosted]);
  });

  test("rejects malformed text and non-arrays", () => {
    expect(() => configsFromJson("{")).toThrow(ValidationError);
    expect(() => configsFromJson('{"id":"x"}')).toThrow("JSON import must be an array of configurations");
  });
});

describe("parseImportRecord", () => {
  const minimal = {
    id: "C1",
    ownerId: "U1",
    displayName: "Main",
    backendKind: "cloud",
    accessKeyId: "test-access",
    secretAccessKey: "test-secret",
    bucketName: "main",
  };

  test("fills defaults", () => {
    expect(parseImportRecord(minimal, NOW)).toEqual({
      ...minimal,
      backendKind: "cloud",
      region: "",
      endpointUrl: null,
      useTls: true,
      isDefault: false,
      createdAt: NOW,
      updatedAt: NOW,
    });
  });

  test("coerces flags and timestamps", () => {
    const parsed = parseImportRecord(
      {
        ...minimal,
        endpointUrl: "http://ignored.test",
        isDefault: "yes",
        useTls: "0",
        createdAt: "2025-01-01T09:00:00+09:00",
        updatedAt: "not a date",
      },
      NOW,
    );
    expect(parsed?.endpointUrl).toBeNull();
    expect(parsed?.isDefault).toBe(true);
    expect(parsed?.useTls).toBe(false);
    expect(parsed?.createdAt).toBe("2025-01-01T00:00:00.000Z");
    expect(parsed?.updatedAt).toBe("2025-01-01T00:00:00.000Z");
  });

  test("rejects incomplete or unknown records", () => {
    expect(parseImportRecord(null, NOW)).toBeNull();
    expect(parseImportRecord([minimal], NOW)).toBeNull();
    expect(parseImportRecord({ ...minimal, id: " " }, NOW)).toBeNull();
    expect(parseImportRecord({ ...minimal, secretAccessKey: "" }, NOW)).toBeNull();
    expect(parseImportRecord({ ...minimal, backendKind: "gcs" }, NOW)).toBeNull();
    expect(parseImportRecord({ ...minimal, backendKind: "self-hosted" }, NOW)).toBeNull();
    expect(
      parseImportRecord({ ...minimal, backendKind: " self-hosted ", endpointUrl: "minio:9000" }, NOW)?.endpointUrl,
    ).toBe("minio:9000");
  });
});
