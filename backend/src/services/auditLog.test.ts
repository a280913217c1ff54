import { jest } from "@jest/globals";
import type { Pool } from "pg";
import { AuditLogService } from "./auditLog";
import { IdIssueService } from "./idIssue";

jest.mock("../config", () => ({
  Config: {
    AUDIT_LOG_RETENTION_DAYS: 30,
    AUDIT_LOG_PAGE_LIMIT: 50,
  },
}));

jest.mock("../utils/servers", () => ({
  pgQuery: jest.fn(
    (pool: { query: (sql: string, params?: unknown[]) => unknown }, sql: string, params?: unknown[]) =>
      pool.query(sql, params),
  ),
}));

type QueryFn = (sql: string, params?: unknown[]) => Promise<{ rows: unknown[]; rowCount: number }>;

function normalizeSql(sql: string) {
  return sql.replace(/\s+/g, " ").trim();
}

function mkSvc(impl?: QueryFn) {
  const query = jest.fn<QueryFn>(impl ?? (async () => ({ rows: [], rowCount: 0 })));
  const pool = { query } as unknown as Pool;
  const ids = new IdIssueService(1);
  jest.spyOn(ids, "issueId").mockReturnValue("00000000000000AA");
  return { svc: new AuditLogService(pool, ids), query };
}

describe("AuditLogService.record", () => {
  test("inserts the event with actor columns and serialized details", async () => {
    const { svc, query } = mkSvc();
    await svc.record({
      action: "upload_file",
      resource: "file",
      resourceId: "users/u1/a.txt",
      success: false,
      error: new Error("storage backend failed at put: boom"),
      details: { filename: "a.txt", size: 3, stage: "put" },
      actor: { userId: "u1", sessionId: "s1", clientIp: "10.0.0.1", userAgent: "curl" },
    });
    expect(query).toHaveBeenCalledTimes(1);
    const [sql, params] = query.mock.calls[0];
    expect(normalizeSql(sql)).toMatch(/^INSERT INTO audit_logs \(id, created_at, user_id, action/);
    expect(params?.[0]).toBe("00000000000000AA");
    expect(params?.slice(2)).toEqual([
      "u1",
      "upload_file",
      "file",
      "users/u1/a.txt",
      false,
      "storage backend failed at put: boom",
      JSON.stringify({ filename: "a.txt", size: 3, stage: "put" }),
      "s1",
      "10.0.0.1",
      "curl",
    ]);
  });

  test("never rejects when the database fails", async () => {
    const { svc } = mkSvc(async () => {
      throw new Error("db down");
    });
    await expect(
      svc.record({ action: "delete_file", resource: "file", success: true, details: {} }),
    ).resolves.toBeUndefined();
  });
});

describe("AuditLogService queries", () => {
  const row = {
    id: "00000000000000AA",
    created_at: new Date("2025-01-02T03:04:05.000Z"),
    user_id: "u1",
    action: "create_config",
    resource: "storage_config",
    resource_id: "c1",
    success: true,
    error: null,
    details: null,
    session_id: "s1",
    client_ip: null,
    user_agent: null,
  };

  test("listAuditLogs builds filters, clamps the limit and maps rows", async () => {
    const { svc, query } = mkSvc(async () => ({ rows: [row], rowCount: 1 }));
    const out = await svc.listAuditLogs({
      userId: "u1",
      action: "create_config",
      since: new Date("2025-01-01T00:00:00.000Z"),
      offset: 5,
      limit: 1000,
    });
    const [sql, params] = query.mock.calls[0];
    expect(normalizeSql(sql)).toBe(
      "SELECT id, created_at, user_id, action, resource, resource_id, success, error, details, session_id, client_ip, user_agent FROM audit_logs WHERE user_id = $1 AND action = $2 AND created_at >= $3 ORDER BY created_at DESC, id DESC LIMIT $4 OFFSET $5",
    );
    expect(params).toEqual(["u1", "create_config", "2025-01-01T00:00:00.000Z", 50, 5]);
    expect(out).toEqual([
      {
        id: "00000000000000AA",
        createdAt: "2025-01-02T03:04:05.000Z",
        userId: "u1",
        action: "create_config",
        resource: "storage_config",
        resourceId: "c1",
        success: true,
        error: null,
        details: {},
        sessionId: "s1",
        clientIp: null,
        userAgent: null,
      },
    ]);
  });

  test("listAuditLogs without filters", async () => {
    const { svc, query } = mkSvc();
    await svc.listAuditLogs();
    const [sql, params] = query.mock.calls[0];
    expect(normalizeSql(sql)).toMatch(/FROM audit_logs ORDER BY created_at DESC, id DESC LIMIT \$1 OFFSET \$2$/);
    expect(params).toEqual([50, 0]);
  });

  test("listAuditLogsBySession", async () => {
    const { svc, query } = mkSvc(async () => ({ rows: [row], rowCount: 1 }));
    const out = await svc.listAuditLogsBySession("s1");
    expect(query.mock.calls[0][1]).toEqual(["s1", 50]);
    expect(out.map((l) => l.sessionId)).toEqual(["s1"]);
  });

  test("purgeOldAuditLogs deletes before the retention cutoff", async () => {
    const { svc, query } = mkSvc(async () => ({ rows: [], rowCount: 7 }));
    const n = await svc.purgeOldAuditLogs(new Date("2025-03-31T00:00:00.000Z"));
    expect(n).toBe(7);
    const [sql, params] = query.mock.calls[0];
    expect(sql).toBe("DELETE FROM audit_logs WHERE created_at < $1");
    expect(params).toEqual(["2025-03-01T00:00:00.000Z"]);
  });
});
