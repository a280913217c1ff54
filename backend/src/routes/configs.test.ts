import { parseDraft, parsePatch } from "./configs";
import { ValidationError } from "../models/errors";

describe("parseDraft", () => {
  test("fills missing strings and keeps the endpoint", () => {
    expect(
      parseDraft({ backendKind: "self-hosted", displayName: "Lab", endpointUrl: "minio:9000", useTls: "false" }),
    ).toEqual({
      displayName: "Lab",
      backendKind: "self-hosted",
      accessKeyId: "",
      secretAccessKey: "",
      region: "",
      bucketName: "",
      endpointUrl: "minio:9000",
      useTls: false,
    });
  });

  test("rejects bad shapes", () => {
    expect(() => parseDraft(null)).toThrow("request body must be an object");
    expect(() => parseDraft({ displayName: "x" })).toThrow("backendKind is required");
    expect(() => parseDraft({ backendKind: "gcs" })).toThrow("unknown backendKind: gcs");
    expect(() => parseDraft({ backendKind: "cloud", region: 3 })).toThrow("region must be a string");
    expect(() => parseDraft({ backendKind: "cloud", useTls: 1 })).toThrow(ValidationError);
  });
});

describe("parsePatch", () => {
  test("keeps only the fields that were sent", () => {
    expect(parsePatch({ displayName: "New", endpointUrl: null, unknown: "x" })).toEqual({
      displayName: "New",
      endpointUrl: null,
    });
    expect(parsePatch({})).toEqual({});
    expect(parsePatch({ useTls: true, secretAccessKey: "" })).toEqual({ useTls: true, secretAccessKey: "" });
  });
});
