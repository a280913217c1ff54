import type { Readable } from "stream";
import type { CompletedPart, ObjectDownload, StoredObject } from "../models/transfer";

/** A client bound to exactly one bucket and one credential pair. */
export interface ObjectStore {
  readonly bucket: string;

  probe(): Promise<void>;

  listObjects(prefix: string): Promise<StoredObject[]>;

  putObject(
    key: string,
    body: Readable | Uint8Array,
    size: number,
    contentType?: string,
  ): Promise<void>;

  getObject(key: string): Promise<ObjectDownload>;

  deleteObject(key: string): Promise<void>;

  createMultipartUpload(key: string, contentType?: string): Promise<string>;

  uploadPart(key: string, uploadId: string, partNumber: number, body: Uint8Array): Promise<string>;

  completeMultipartUpload(key: string, uploadId: string, parts: CompletedPart[]): Promise<void>;

  abortMultipartUpload(key: string, uploadId: string): Promise<void>;

  /** Releases pooled sockets; the store must not be used afterwards. */
  close(): void;
}

export interface BucketAdmin {
  ensureBucket(bucket: string, region: string): Promise<"created" | "existing">;
}
