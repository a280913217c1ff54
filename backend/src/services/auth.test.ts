import { jest } from "@jest/globals";
import type { Pool } from "pg";
import type Redis from "ioredis";
import { AuthService } from "./auth";
import { checkPasswordHash } from "../utils/format";

jest.mock("../config", () => ({
  Config: { SESSION_TTL: 3600 },
}));

jest.mock("../utils/servers", () => ({
  pgQuery: jest.fn(
    (pool: { query: (sql: string, params?: unknown[]) => unknown }, sql: string, params?: unknown[]) =>
      pool.query(sql, params),
  ),
}));

jest.mock("../utils/format", () => {
  const actual = jest.requireActual<typeof import("../utils/format")>("../utils/format");
  return { ...actual, checkPasswordHash: jest.fn(async () => true) };
});

type QueryFn = (sql: string, params?: unknown[]) => Promise<{ rows: unknown[]; rowCount: number }>;

class MockRedis {
  store: Record<string, string> = {};

  set = jest.fn(async (key: string, value: string, _mode: string, _ttl: number) => {
    this.store[key] = value;
    return "OK";
  });

  getex = jest.fn(async (key: string, _mode: string, _ttl: number) => this.store[key] ?? null);

  del = jest.fn(async (key: string) => {
    const had = key in this.store || key in this.sets;
    delete this.store[key];
    delete this.sets[key];
    return had ? 1 : 0;
  });

  sets: Record<string, string[]> = {};

  sadd = jest.fn(async (key: string, member: string) => {
    const members = this.sets[key] ?? [];
    if (members.includes(member)) return 0;
    this.sets[key] = [...members, member];
    return 1;
  });

  smembers = jest.fn(async (key: string) => this.sets[key] ?? []);

  expire = jest.fn(async (_key: string, _ttl: number) => 1);
}

const USER_ROW = {
  id: "0000000000000A01",
  email: "test@example.com",
  nickname: "Tester",
  is_admin: true,
  created_at: "2025-07-20T00:00:00Z",
  password: new Uint8Array([1, 2, 3]),
};

describe("AuthService", () => {
  let query: jest.Mock<QueryFn>;
  let redis: MockRedis;
  let authService: AuthService;

  beforeEach(() => {
    query = jest.fn<QueryFn>(async () => ({ rows: [], rowCount: 0 }));
    redis = new MockRedis();
    authService = new AuthService({ query } as unknown as Pool, redis as unknown as Redis);
  });

  test("login: stores a session with the configured TTL", async () => {
    query.mockResolvedValueOnce({ rows: [USER_ROW], rowCount: 1 });
    const result = await authService.login(" Test@Example.com ", "password");
    expect(result.userId).toBe("0000000000000A01");
    expect(result.sessionId).toMatch(/^[0-9a-f]{64}$/);
    expect(query.mock.calls[0][1]).toEqual(["test@example.com"]);

    const key = `session:${result.sessionId}`;
    expect(redis.set).toHaveBeenCalledWith(key, redis.store[key], "EX", 3600);
    const session = JSON.parse(redis.store[key]);
    expect(session).toMatchObject({
      userId: "0000000000000A01",
      userEmail: "test@example.com",
      userNickname: "Tester",
      userIsAdmin: true,
      userCreatedAt: "2025-07-20T00:00:00.000Z",
    });
    expect(typeof session.loggedInAt).toBe("string");
  });

  test("login: unknown email", async () => {
    await expect(authService.login("nobody@example.com", "pw")).rejects.toThrow("authentication failed");
    expect(redis.set).not.toHaveBeenCalled();
  });

  test("login: wrong password", async () => {
    query.mockResolvedValueOnce({ rows: [USER_ROW], rowCount: 1 });
    jest.mocked(checkPasswordHash).mockResolvedValueOnce(false);
    await expect(authService.login("test@example.com", "bad")).rejects.toThrow("authentication failed");
    expect(redis.set).not.toHaveBeenCalled();
  });

  test("getSessionInfo: slides the TTL and returns the session", async () => {
    const info = {
      userId: "0000000000000A01",
      userEmail: "e@example.com",
      userNickname: "Nick",
      userIsAdmin: false,
      userCreatedAt: "2025-07-01T00:00:00.000Z",
      loggedInAt: "2025-07-13T00:00:00.000Z",
    };
    redis.store["session:abc"] = JSON.stringify(info);
    expect(await authService.getSessionInfo("abc")).toEqual(info);
    expect(redis.getex).toHaveBeenCalledWith("session:abc", "EX", 3600);
  });

  test("getSessionInfo: missing, malformed or foreign values are null", async () => {
    expect(await authService.getSessionInfo("")).toBeNull();
    expect(redis.getex).not.toHaveBeenCalled();
    expect(await authService.getSessionInfo("none")).toBeNull();
    redis.store["session:bad"] = "{not json";
    expect(await authService.getSessionInfo("bad")).toBeNull();
    redis.store["session:odd"] = JSON.stringify({ userId: "x" });
    expect(await authService.getSessionInfo("odd")).toBeNull();
  });

  test("logout", async () => {
    redis.store["session:toDel"] = '{"userId":"xx"}';
    await authService.logout("toDel");
    expect(redis.store["session:toDel"]).toBeUndefined();
    await authService.logout("");
    expect(redis.del).toHaveBeenCalledTimes(1);
  });

  test("revokeUserSessions ends every session of the user", async () => {
    query.mockResolvedValue({ rows: [USER_ROW], rowCount: 1 });
    const first = await authService.login("test@example.com", "password");
    const second = await authService.login("test@example.com", "password");
    expect(redis.sets["user_sessions:0000000000000A01"]).toEqual([first.sessionId, second.sessionId]);
    expect(redis.expire).toHaveBeenCalledWith("user_sessions:0000000000000A01", 3600);
    redis.store["session:other"] = "{}";

    expect(await authService.revokeUserSessions("0000000000000A01")).toBe(2);
    expect(Object.keys(redis.store)).toEqual(["session:other"]);
    expect(redis.sets).toEqual({});
    expect(await authService.revokeUserSessions("0000000000000A01")).toBe(0);
  });
});
