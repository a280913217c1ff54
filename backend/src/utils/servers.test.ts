import { jest } from "@jest/globals";
import type { Pool, PoolClient } from "pg";
import { getSampleAddr, pgQuery, withTransaction } from "./servers";

type QueryFn = (text: string, params?: unknown[]) => Promise<{ rows: unknown[]; rowCount: number }>;

function makeClient(fail?: (text: string) => boolean) {
  const calls: string[] = [];
  const release = jest.fn();
  const query = jest.fn<QueryFn>(async (text) => {
    calls.push(text);
    if (fail?.(text)) throw new Error(`failed: ${text}`);
    return { rows: [], rowCount: 0 };
  });
  const client = { query, release };
  const pool = { connect: jest.fn(async () => client) };
  return {
    calls,
    release,
    query,
    client: client as unknown as PoolClient,
    pool: pool as unknown as Pool,
  };
}

describe("getSampleAddr", () => {
  test("returns an IPv4 address", () => {
    expect(getSampleAddr()).toMatch(/^\d+\.\d+\.\d+\.\d+$/);
  });
});

describe("pgQuery", () => {
  test("success on first try", async () => {
    const query = jest.fn<QueryFn>(async () => ({ rows: [{ a: 1 }], rowCount: 1 }));
    const pool = { query } as unknown as Pool;
    const res = await pgQuery<{ a: number }>(pool, "SELECT 1", []);
    expect(query).toHaveBeenCalledWith("SELECT 1", []);
    expect(res.rows[0].a).toBe(1);
  });

  test("retries then succeeds", async () => {
    const query = jest
      .fn<QueryFn>()
      .mockRejectedValueOnce(new Error("q1"))
      .mockResolvedValueOnce({ rows: [{ a: 2 }], rowCount: 1 });
    const pool = { query } as unknown as Pool;
    const res = await pgQuery<{ a: number }>(pool, "SELECT 2", [], 3);
    expect(query).toHaveBeenCalledTimes(2);
    expect(res.rows[0].a).toBe(2);
  });

  test("gives up after the last attempt", async () => {
    const query = jest.fn<QueryFn>().mockRejectedValue(new Error("fail"));
    const pool = { query } as unknown as Pool;
    await expect(pgQuery(pool, "SELECT 3", [], 2)).rejects.toThrow("fail");
    expect(query).toHaveBeenCalledTimes(2);
  });
});

describe("withTransaction", () => {
  test("commits and releases", async () => {
    const t = makeClient();
    const out = await withTransaction(t.pool, async (client) => {
      await client.query("UPDATE t SET x = 1");
      return 42;
    });
    expect(out).toBe(42);
    expect(t.calls).toEqual(["BEGIN", "UPDATE t SET x = 1", "COMMIT"]);
    expect(t.release).toHaveBeenCalledTimes(1);
  });

  test("takes the advisory lock before running the body", async () => {
    const t = makeClient();
    await withTransaction(t.pool, async () => undefined, "owner-1");
    expect(t.calls).toEqual(["BEGIN", "SELECT pg_advisory_xact_lock(hashtext($1))", "COMMIT"]);
    expect(t.query.mock.calls[1][1]).toEqual(["owner-1"]);
  });

  test("rolls back and rethrows on failure", async () => {
    const t = makeClient();
    await expect(
      withTransaction(t.pool, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(t.calls).toEqual(["BEGIN", "ROLLBACK"]);
    expect(t.release).toHaveBeenCalledTimes(1);
  });

  test("surfaces the original error when rollback also fails", async () => {
    const t = makeClient((text) => text === "ROLLBACK");
    await expect(
      withTransaction(t.pool, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(t.release).toHaveBeenCalledTimes(1);
  });
});
