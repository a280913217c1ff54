import { Config } from "../config";
import { Buffer } from "buffer";
import crypto, { randomBytes, timingSafeEqual } from "crypto";

type HashScheme =
  | { name: "sha256"; saltLen: number }
  | { name: "scrypt"; saltLen: number; coreLen: number; cost: number; blockSize: number; parallelism: number };

function parseHashScheme(spec: string): HashScheme {
  const [name, ...params] = spec.split(":");
  const nums = params.map((p) => parseInt(p, 10));
  if (nums.some((n) => !Number.isFinite(n) || n <= 0)) {
    throw new Error(`${name}: bad params: ${params}`);
  }
  if (name === "sha256") {
    if (nums.length !== 1) throw new Error(`${name}: bad params: ${params}`);
    return { name, saltLen: nums[0] };
  }
  if (name === "scrypt") {
    if (nums.length !== 5) throw new Error(`${name}: bad params: ${params}`);
    const [saltLen, coreLen, cost, blockSize, parallelism] = nums;
    return { name, saltLen, coreLen, cost, blockSize, parallelism };
  }
  throw new Error(`unknown algorithm: ${name}`);
}

async function derive(scheme: HashScheme, text: string, salt: Buffer): Promise<Buffer> {
  const passwordBytes = Buffer.from(text, "utf8");
  if (scheme.name === "sha256") {
    return crypto.createHash("sha256").update(Buffer.concat([passwordBytes, salt])).digest();
  }
  return await new Promise<Buffer>((resolve, reject) => {
    crypto.scrypt(
      passwordBytes,
      salt,
      scheme.coreLen,
      { N: scheme.cost, r: scheme.blockSize, p: scheme.parallelism },
      (err, dk) => (err ? reject(err) : resolve(dk)),
    );
  });
}

export async function generatePasswordHash(
  text: string,
  spec: string = Config.PASSWORD_CONFIG,
): Promise<Uint8Array> {
  const scheme = parseHashScheme(spec);
  const salt = Buffer.from(randomBytes(scheme.saltLen));
  const hash = await derive(scheme, text, salt);
  return Buffer.concat([hash, salt]);
}

export async function checkPasswordHash(
  text: string,
  hash: Uint8Array,
  spec: string = Config.PASSWORD_CONFIG,
): Promise<boolean> {
  const scheme = parseHashScheme(spec);
  const hashLen = scheme.name === "sha256" ? 32 : scheme.coreLen;
  const stored = Buffer.from(hash);
  const storedHash = stored.subarray(0, hashLen);
  const storedSalt = stored.subarray(hashLen);
  const derived = await derive(scheme, text, storedSalt);
  if (storedHash.length !== derived.length) return false;
  return timingSafeEqual(storedHash, derived);
}

export function bytesToHex(ary: Uint8Array): string {
  return Buffer.from(ary).toString("hex");
}

export function hexToBytes(str: string): Uint8Array | null {
  const normalizedStr = str.replace(/^\\x/, "").replace(/[^0-9a-fA-F]/g, "");
  if (normalizedStr.length % 2 !== 0) {
    return null;
  }
  return new Uint8Array(Buffer.from(normalizedStr, "hex"));
}

export function validateEmail(email: string): boolean {
  return /^[a-zA-Z0-9.!#$%&'*+\/=?^_`{|}~-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/.test(
    email,
  );
}

export function normalizeEmail(input: string): string {
  return input.toLowerCase().trim();
}

export function parseBoolean(input: string | undefined | null, defaultValue = false): boolean {
  if (!input) return defaultValue;
  const s = input.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(s)) return true;
  if (["false", "0", "no", "off"].includes(s)) return false;
  return defaultValue;
}

export function parseIntOrUndefined(input: unknown): number | undefined {
  if (typeof input === "number") return Number.isFinite(input) ? Math.trunc(input) : undefined;
  if (typeof input !== "string" || input.trim() === "") return undefined;
  const n = parseInt(input, 10);
  return Number.isFinite(n) ? n : undefined;
}

/** Reveals at most a quarter of the secret, capped at `visible` characters. */
export function maskSecret(secret: string, visible = 4): string {
  const shown = Math.min(visible, Math.floor(secret.length / 4));
  return secret.slice(0, Math.max(0, shown)) + "****";
}

export function toIsoString(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  const d = new Date(String(value));
  if (isNaN(d.getTime())) throw new Error(`invalid timestamp: ${String(value)}`);
  return d.toISOString();
}

export function snakeToCamel<T = Record<string, unknown>>(obj: unknown): T {
  if (Array.isArray(obj)) {
    return obj.map((item) => snakeToCamel(item)) as unknown as T;
  }
  if (typeof Buffer !== "undefined" && obj instanceof Buffer) {
    return obj as T;
  }
  if (obj instanceof Date) {
    return obj as T;
  }
  if (obj && typeof obj === "object") {
    const n: Record<string, unknown> = {};
    for (const k of Object.keys(obj)) {
      const key = k.replace(/_([a-z])/g, (g) => g[1].toUpperCase());
      n[key] = snakeToCamel((obj as Record<string, unknown>)[k]);
    }
    return n as T;
  }
  return obj as T;
}
