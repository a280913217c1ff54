import { Buffer } from "buffer";

/**
 * Regroups a byte stream into buffers of exactly `size` bytes. Only the last buffer may be
 * shorter, and an empty source yields nothing.
 */
export async function* readChunks(
  source: AsyncIterable<Uint8Array | string>,
  size: number,
): AsyncGenerator<Buffer, void, undefined> {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`chunk size must be a positive integer: ${size}`);
  }
  let pending: Buffer[] = [];
  let pendingLen = 0;
  for await (const piece of source) {
    let buf = typeof piece === "string" ? Buffer.from(piece, "utf8") : Buffer.from(piece);
    while (buf.length > 0) {
      const room = size - pendingLen;
      if (buf.length < room) {
        pending.push(buf);
        pendingLen += buf.length;
        break;
      }
      pending.push(buf.subarray(0, room));
      buf = buf.subarray(room);
      yield Buffer.concat(pending, size);
      pending = [];
      pendingLen = 0;
    }
  }
  if (pendingLen > 0) {
    yield Buffer.concat(pending, pendingLen);
  }
}

export async function* fromBuffer(data: Uint8Array, pieceBytes = 64 * 1024): AsyncGenerator<Uint8Array> {
  for (let off = 0; off < data.length; off += pieceBytes) {
    yield data.subarray(off, Math.min(off + pieceBytes, data.length));
  }
}
