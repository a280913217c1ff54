import type { ObjectStore } from "./storage";
import { BackendOperationFailure } from "../models/errors";
import { MULTIPART_PART_BYTES, type CompletedPart } from "../models/transfer";
import { readChunks } from "../utils/chunks";
import { createLogger, errorMessage } from "../utils/logger";

const logger = createLogger({ file: "multipartUpload" });

export type MultipartState =
  | "idle"
  | "initiated"
  | "part-uploading"
  | "part-uploaded"
  | "completing"
  | "completed"
  | "aborting"
  | "aborted";

const TRANSITIONS: Record<MultipartState, readonly MultipartState[]> = {
  idle: ["initiated", "aborting"],
  initiated: ["part-uploading", "completing", "aborting"],
  "part-uploading": ["part-uploaded", "aborting"],
  "part-uploaded": ["part-uploading", "completing", "aborting"],
  completing: ["completed", "aborting"],
  completed: [],
  aborting: ["aborted"],
  aborted: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: MultipartState,
    readonly to: MultipartState,
  ) {
    super(`illegal multipart transition: ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

/**
 * One in-flight multipart upload. Lives only for the duration of a call and is never
 * persisted, so a crash between initiate and complete leaves an orphan on the backend.
 */
export class MultipartUploadSession {
  private _state: MultipartState = "idle";
  private _uploadId: string | null = null;
  private readonly _parts: CompletedPart[] = [];
  private _nextPartNumber = 1;

  constructor(
    private readonly store: ObjectStore,
    readonly key: string,
    private readonly contentType?: string,
  ) {}

  get state(): MultipartState {
    return this._state;
  }

  get bucket(): string {
    return this.store.bucket;
  }

  get uploadId(): string | null {
    return this._uploadId;
  }

  get parts(): readonly CompletedPart[] {
    return this._parts;
  }

  get nextPartNumber(): number {
    return this._nextPartNumber;
  }

  async initiate(): Promise<string> {
    this.assertCanMove("initiated");
    let uploadId: string;
    try {
      uploadId = await this.store.createMultipartUpload(this.key, this.contentType);
    } catch (e) {
      throw new BackendOperationFailure("initiate", e);
    }
    this._uploadId = uploadId;
    this.moveTo("initiated");
    return uploadId;
  }

  async uploadPart(bytes: Uint8Array): Promise<CompletedPart> {
    this.moveTo("part-uploading");
    const uploadId = this.requireUploadId();
    const partNumber = this._nextPartNumber;
    let eTag: string;
    try {
      eTag = await this.store.uploadPart(this.key, uploadId, partNumber, bytes);
    } catch (e) {
      throw new BackendOperationFailure("upload-part", e, { partNumber });
    }
    const part = { partNumber, eTag };
    this._parts.push(part);
    this._nextPartNumber++;
    this.moveTo("part-uploaded");
    return part;
  }

  async complete(): Promise<void> {
    this.moveTo("completing");
    try {
      await this.store.completeMultipartUpload(this.key, this.requireUploadId(), [...this._parts]);
    } catch (e) {
      throw new BackendOperationFailure("complete", e);
    }
    this.moveTo("completed");
  }

  /** Best-effort. Returns whether the backend acknowledged the abort. */
  async abort(): Promise<boolean> {
    if (this._state === "completed" || this._state === "aborted" || this._state === "aborting") {
      return false;
    }
    this.moveTo("aborting");
    if (this._uploadId === null) {
      this.moveTo("aborted");
      return true;
    }
    try {
      await this.store.abortMultipartUpload(this.key, this._uploadId);
      logger.debug(`[multipart] aborted ${this.bucket}/${this.key} (${this._uploadId})`);
      return true;
    } catch (e) {
      logger.warn(
        `[multipart] abort failed for ${this.bucket}/${this.key} (${this._uploadId}): ${errorMessage(e)}`,
      );
      return false;
    } finally {
      this.moveTo("aborted");
    }
  }

  private requireUploadId(): string {
    if (this._uploadId === null) throw new Error("multipart upload has not been initiated");
    return this._uploadId;
  }

  private assertCanMove(to: MultipartState): void {
    if (!TRANSITIONS[this._state].includes(to)) {
      throw new IllegalTransitionError(this._state, to);
    }
  }

  private moveTo(to: MultipartState): void {
    this.assertCanMove(to);
    this._state = to;
  }
}

export type MultipartUploadOptions = {
  contentType?: string;
  signal?: AbortSignal;
  partBytes?: number;
};

export type MultipartUploadOutcome = {
  uploadId: string;
  parts: CompletedPart[];
  size: number;
};

function abortedReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("upload aborted");
}

export async function runMultipartUpload(
  store: ObjectStore,
  key: string,
  body: AsyncIterable<Uint8Array | string>,
  opts: MultipartUploadOptions = {},
): Promise<MultipartUploadOutcome> {
  const { signal } = opts;
  const session = new MultipartUploadSession(store, key, opts.contentType);
  const uploadId = await session.initiate();
  let size = 0;
  try {
    try {
      for await (const chunk of readChunks(body, opts.partBytes ?? MULTIPART_PART_BYTES)) {
        if (signal?.aborted) throw abortedReason(signal);
        await session.uploadPart(chunk);
        size += chunk.length;
      }
      if (signal?.aborted) throw abortedReason(signal);
    } catch (e) {
      if (e instanceof BackendOperationFailure) throw e;
      throw new BackendOperationFailure("read-part", e, { partNumber: session.nextPartNumber });
    }
    await session.complete();
  } catch (e) {
    await session.abort();
    throw e;
  }
  logger.debug(`[multipart] completed ${session.bucket}/${key} in ${session.parts.length} parts`);
  return { uploadId, parts: [...session.parts], size };
}
