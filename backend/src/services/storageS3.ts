import { Readable } from "stream";
import {
  S3Client,
  GetObjectCommand,
  PutObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  ListObjectsV2CommandOutput,
  CreateMultipartUploadCommand,
  UploadPartCommand,
  CompleteMultipartUploadCommand,
  AbortMultipartUploadCommand,
  CreateBucketCommand,
  BucketLocationConstraint,
  GetObjectCommandOutput,
} from "@aws-sdk/client-s3";
import type { CompletedPart, ObjectDownload, StoredObject } from "../models/transfer";
import { ObjectNotFoundError } from "../models/errors";
import type { BucketAdmin, ObjectStore } from "./storage";

function stripEtagQuotes(etag?: string): string | undefined {
  return etag?.replace(/^"|"$/g, "");
}

function toLocationConstraint(region: string): BucketLocationConstraint | undefined {
  return Object.values(BucketLocationConstraint).find((v) => v === region);
}

function errorName(e: unknown): string {
  return e instanceof Error ? e.name : "";
}

function httpStatusOf(e: unknown): number | undefined {
  if (typeof e !== "object" || e === null || !("$metadata" in e)) return undefined;
  const meta = e.$metadata;
  if (typeof meta !== "object" || meta === null || !("httpStatusCode" in meta)) return undefined;
  return typeof meta.httpStatusCode === "number" ? meta.httpStatusCode : undefined;
}

export function isNotFoundError(e: unknown): boolean {
  const name = errorName(e);
  return name === "NoSuchKey" || name === "NotFound" || httpStatusOf(e) === 404;
}

export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly s3: S3Client,
    readonly bucket: string,
  ) {}

  async probe(): Promise<void> {
    await this.s3.send(new ListObjectsV2Command({ Bucket: this.bucket, MaxKeys: 1 }));
  }

  close(): void {
    this.s3.destroy();
  }

  async listObjects(prefix: string): Promise<StoredObject[]> {
    const all: StoredObject[] = [];
    let continuationToken: string | undefined = undefined;
    do {
      const res: ListObjectsV2CommandOutput = await this.s3.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          MaxKeys: 1000,
          ContinuationToken: continuationToken,
        }),
      );
      for (const obj of res.Contents ?? []) {
        if (obj.Key === undefined) continue;
        all.push({
          key: obj.Key,
          size: obj.Size ?? 0,
          etag: stripEtagQuotes(obj.ETag),
          lastModified: obj.LastModified?.toISOString(),
        });
      }
      continuationToken = res.IsTruncated ? res.NextContinuationToken : undefined;
    } while (continuationToken);
    return all;
  }

  async putObject(
    key: string,
    body: Readable | Uint8Array,
    size: number,
    contentType?: string,
  ): Promise<void> {
    await this.s3.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentLength: size,
        ContentType: contentType ? contentType : "application/octet-stream",
      }),
    );
  }

  async getObject(key: string): Promise<ObjectDownload> {
    let res: GetObjectCommandOutput;
    try {
      res = await this.s3.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
    } catch (e) {
      if (isNotFoundError(e)) throw new ObjectNotFoundError(key, e);
      throw e;
    }
    const body = res.Body;
    if (!(body instanceof Readable)) {
      throw new Error("response body is not a readable stream");
    }
    return {
      body,
      contentType: res.ContentType,
      contentLength: res.ContentLength,
      etag: stripEtagQuotes(res.ETag),
      lastModified: res.LastModified?.toISOString(),
    };
  }

  async deleteObject(key: string): Promise<void> {
    await this.s3.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
  }

  async createMultipartUpload(key: string, contentType?: string): Promise<string> {
    const res = await this.s3.send(
      new CreateMultipartUploadCommand({
        Bucket: this.bucket,
        Key: key,
        ContentType: contentType ? contentType : "application/octet-stream",
      }),
    );
    if (!res.UploadId) throw new Error("backend returned no upload id");
    return res.UploadId;
  }

  async uploadPart(
    key: string,
    uploadId: string,
    partNumber: number,
    body: Uint8Array,
  ): Promise<string> {
    const res = await this.s3.send(
      new UploadPartCommand({
        Bucket: this.bucket,
        Key: key,
        UploadId: uploadId,
        PartNumber: partNumber,
        Body: body,
        ContentLength: body.byteLength,
      }),
    );
    if (!res.ETag) throw new Error(`backend returned no ETag for part ${partNumber}`);
    return res.ETag;
  }

  async completeMultipartUpload(
    key: string,
    uploadId: string,
    parts: CompletedPart[],
  ): Promise<void> {
    await this.s3.send(
      new CompleteMultipartUploadCommand({
        Bucket: this.bucket,
        Key: key,
        UploadId: uploadId,
        MultipartUpload: {
          Parts: parts.map((p) => ({ PartNumber: p.partNumber, ETag: p.eTag })),
        },
      }),
    );
  }

  async abortMultipartUpload(key: string, uploadId: string): Promise<void> {
    await this.s3.send(
      new AbortMultipartUploadCommand({ Bucket: this.bucket, Key: key, UploadId: uploadId }),
    );
  }
}

export class S3BucketAdmin implements BucketAdmin {
  constructor(private readonly s3: S3Client) {}

  async ensureBucket(bucket: string, region: string): Promise<"created" | "existing"> {
    const constraint = region === "us-east-1" ? undefined : toLocationConstraint(region);
    try {
      await this.s3.send(
        new CreateBucketCommand({
          Bucket: bucket,
          ...(constraint ? { CreateBucketConfiguration: { LocationConstraint: constraint } } : {}),
        }),
      );
      return "created";
    } catch (e) {
      if (errorName(e) === "BucketAlreadyOwnedByYou") return "existing";
      throw e;
    }
  }
}
