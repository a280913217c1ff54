import { Readable } from "stream";
import type { ObjectStore } from "./storage";
import { IllegalTransitionError, MultipartUploadSession, runMultipartUpload } from "./multipartUpload";
import { BackendOperationFailure } from "../models/errors";
import type { CompletedPart, ObjectDownload, StoredObject } from "../models/transfer";
import { fromBuffer } from "../utils/chunks";

class RecordingStore implements ObjectStore {
  readonly bucket = "test-bucket";
  calls: string[] = [];
  uploadedParts = new Map<number, Buffer>();
  completedWith: CompletedPart[] | null = null;
  failPart: number | null = null;
  failComplete = false;
  failAbort = false;

  async probe(): Promise<void> {}

  close(): void {}

  async listObjects(): Promise<StoredObject[]> {
    return [];
  }

  async putObject(): Promise<void> {
    this.calls.push("put");
  }

  async getObject(): Promise<ObjectDownload> {
    return { body: Readable.from([]) };
  }

  async deleteObject(): Promise<void> {}

  async createMultipartUpload(key: string): Promise<string> {
    this.calls.push(`create ${key}`);
    return "upload-1";
  }

  async uploadPart(_key: string, uploadId: string, partNumber: number, body: Uint8Array): Promise<string> {
    this.calls.push(`part ${partNumber} ${body.length}`);
    if (this.failPart === partNumber) throw new Error("part rejected");
    this.uploadedParts.set(partNumber, Buffer.from(body));
    return `etag-${uploadId}-${partNumber}`;
  }

  async completeMultipartUpload(_key: string, _uploadId: string, parts: CompletedPart[]): Promise<void> {
    this.calls.push("complete");
    if (this.failComplete) throw new Error("complete rejected");
    this.completedWith = parts;
  }

  async abortMultipartUpload(): Promise<void> {
    this.calls.push("abort");
    if (this.failAbort) throw new Error("abort rejected");
  }
}

function bytes(n: number): Uint8Array {
  const out = new Uint8Array(n);
  for (let i = 0; i < n; i++) out[i] = i % 251;
  return out;
}

describe("MultipartUploadSession", () => {
  test("walks the happy path", async () => {
    const store = new RecordingStore();
    const session = new MultipartUploadSession(store, "users/u1/a.bin");
    expect(session.state).toBe("idle");
    expect(await session.initiate()).toBe("upload-1");
    expect(session.state).toBe("initiated");
    await session.uploadPart(bytes(3));
    expect(session.state).toBe("part-uploaded");
    await session.uploadPart(bytes(2));
    expect(session.nextPartNumber).toBe(3);
    await session.complete();
    expect(session.state).toBe("completed");
    expect(store.completedWith).toEqual([
      { partNumber: 1, eTag: "etag-upload-1-1" },
      { partNumber: 2, eTag: "etag-upload-1-2" },
    ]);
  });

  test("rejects illegal transitions", async () => {
    const session = new MultipartUploadSession(new RecordingStore(), "k");
    await expect(session.uploadPart(bytes(1))).rejects.toBeInstanceOf(IllegalTransitionError);
    await expect(session.complete()).rejects.toThrow("illegal multipart transition: idle -> completing");
    await session.initiate();
    await expect(session.initiate()).rejects.toThrow("illegal multipart transition: initiated -> initiated");
  });

  test("abort after completion is a no-op", async () => {
    const store = new RecordingStore();
    const session = new MultipartUploadSession(store, "k");
    await session.initiate();
    await session.complete();
    expect(await session.abort()).toBe(false);
    expect(session.state).toBe("completed");
    expect(store.calls).not.toContain("abort");
  });

  test("abort before initiate never reaches the backend", async () => {
    const store = new RecordingStore();
    const session = new MultipartUploadSession(store, "k");
    expect(await session.abort()).toBe(true);
    expect(session.state).toBe("aborted");
    expect(store.calls).toEqual([]);
  });
});

describe("runMultipartUpload", () => {
  test("splits the body into ordered parts and reassembles byte-for-byte", async () => {
    const store = new RecordingStore();
    const data = bytes(10);
    const out = await runMultipartUpload(store, "k", fromBuffer(data, 3), { partBytes: 4 });
    expect(out).toEqual({
      uploadId: "upload-1",
      size: 10,
      parts: [
        { partNumber: 1, eTag: "etag-upload-1-1" },
        { partNumber: 2, eTag: "etag-upload-1-2" },
        { partNumber: 3, eTag: "etag-upload-1-3" },
      ],
    });
    expect(store.calls).toEqual(["create k", "part 1 4", "part 2 4", "part 3 2", "complete"]);
    const joined = Buffer.concat([1, 2, 3].map((n) => store.uploadedParts.get(n) ?? Buffer.alloc(0)));
    expect(joined.equals(Buffer.from(data))).toBe(true);
  });

  test("a failing part aborts the session and reports the stage", async () => {
    const store = new RecordingStore();
    store.failPart = 2;
    const err = await runMultipartUpload(store, "k", fromBuffer(bytes(10)), { partBytes: 4 }).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(BackendOperationFailure);
    if (!(err instanceof BackendOperationFailure)) return;
    expect(err.stage).toBe("upload-part");
    expect(err.partNumber).toBe(2);
    expect(err.message).toBe("storage backend failed at upload-part: part rejected");
    expect(store.calls).toEqual(["create k", "part 1 4", "part 2 4", "abort"]);
  });

  test("a read error is tagged read-part and aborts", async () => {
    const store = new RecordingStore();
    async function* broken(): AsyncGenerator<Uint8Array> {
      yield bytes(4);
      throw new Error("disk gone");
    }
    const err = await runMultipartUpload(store, "k", broken(), { partBytes: 4 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendOperationFailure);
    if (!(err instanceof BackendOperationFailure)) return;
    expect(err.stage).toBe("read-part");
    expect(err.partNumber).toBe(2);
    expect(store.calls).toEqual(["create k", "part 1 4", "abort"]);
  });

  test("a completion failure aborts", async () => {
    const store = new RecordingStore();
    store.failComplete = true;
    await expect(runMultipartUpload(store, "k", fromBuffer(bytes(4)), { partBytes: 4 })).rejects.toThrow(
      "storage backend failed at complete: complete rejected",
    );
    expect(store.calls).toEqual(["create k", "part 1 4", "complete", "abort"]);
  });

  test("the original error survives a failing abort", async () => {
    const store = new RecordingStore();
    store.failPart = 1;
    store.failAbort = true;
    await expect(runMultipartUpload(store, "k", fromBuffer(bytes(4)), { partBytes: 4 })).rejects.toThrow(
      "storage backend failed at upload-part: part rejected",
    );
    expect(store.calls).toEqual(["create k", "part 1 4", "abort"]);
  });

  test("an aborted signal stops the upload as a read failure", async () => {
    const store = new RecordingStore();
    const controller = new AbortController();
    async function* slow(): AsyncGenerator<Uint8Array> {
      yield bytes(4);
      controller.abort();
      yield bytes(4);
    }
    const err = await runMultipartUpload(store, "k", slow(), {
      partBytes: 4,
      signal: controller.signal,
    }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendOperationFailure);
    if (!(err instanceof BackendOperationFailure)) return;
    expect(err.stage).toBe("read-part");
    expect(store.calls).toEqual(["create k", "part 1 4", "abort"]);
  });
});
