import { Pool } from "pg";
import { Config } from "../config";
import { IdIssueService } from "./idIssue";
import type { AuditEvent, AuditLog, ListAuditLogsInput } from "../models/auditLog";
import { pgQuery } from "../utils/servers";
import { createLogger, errorMessage } from "../utils/logger";
import { toIsoString } from "../utils/format";

const logger = createLogger({ file: "auditLog" });

export interface AuditSink {
  /** Never rejects. */
  record(event: AuditEvent): Promise<void>;
}

type AuditLogRow = {
  id: string;
  created_at: Date | string;
  user_id: string | null;
  action: string;
  resource: string;
  resource_id: string | null;
  success: boolean;
  error: string | null;
  details: Record<string, unknown> | null;
  session_id: string | null;
  client_ip: string | null;
  user_agent: string | null;
};

const COLUMNS =
  "id, created_at, user_id, action, resource, resource_id, success, error, details, session_id, client_ip, user_agent";

function rowToAuditLog(row: AuditLogRow): AuditLog {
  return {
    id: row.id,
    createdAt: toIsoString(row.created_at),
    userId: row.user_id,
    action: row.action,
    resource: row.resource,
    resourceId: row.resource_id,
    success: row.success,
    error: row.error,
    details: row.details ?? {},
    sessionId: row.session_id,
    clientIp: row.client_ip,
    userAgent: row.user_agent,
  };
}

function describeError(error: unknown): string | null {
  if (error === undefined || error === null) return null;
  return errorMessage(error);
}

export class AuditLogService implements AuditSink {
  private pgPool: Pool;
  private idIssueService: IdIssueService;

  constructor(pgPool: Pool, idIssueService: IdIssueService) {
    this.pgPool = pgPool;
    this.idIssueService = idIssueService;
  }

  async record(event: AuditEvent): Promise<void> {
    const id = this.idIssueService.issueId();
    try {
      await pgQuery(
        this.pgPool,
        `INSERT INTO audit_logs (${COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9::jsonb, $10, $11, $12)`,
        [
          id,
          new Date().toISOString(),
          event.actor?.userId ?? null,
          event.action,
          event.resource,
          event.resourceId ?? null,
          event.success,
          describeError(event.error),
          JSON.stringify(event.details),
          event.actor?.sessionId ?? null,
          event.actor?.clientIp ?? null,
          event.actor?.userAgent ?? null,
        ],
      );
    } catch (e) {
      logger.error(`[auditLog] failed to record ${event.action} on ${event.resource}: ${errorMessage(e)}`);
    }
  }

  async listAuditLogs(input: ListAuditLogsInput = {}): Promise<AuditLog[]> {
    const where: string[] = [];
    const params: unknown[] = [];
    if (input.userId) {
      params.push(input.userId);
      where.push(`user_id = $${params.length}`);
    }
    if (input.action) {
      params.push(input.action);
      where.push(`action = $${params.length}`);
    }
    if (input.resource) {
      params.push(input.resource);
      where.push(`resource = $${params.length}`);
    }
    if (input.since) {
      params.push(input.since.toISOString());
      where.push(`created_at >= $${params.length}`);
    }
    if (input.until) {
      params.push(input.until.toISOString());
      where.push(`created_at < $${params.length}`);
    }
    const limit = Math.min(Math.max(1, input.limit ?? 100), Config.AUDIT_LOG_PAGE_LIMIT);
    const offset = Math.max(0, input.offset ?? 0);
    params.push(limit, offset);
    const sql =
      `SELECT ${COLUMNS} FROM audit_logs` +
      (where.length > 0 ? ` WHERE ${where.join(" AND ")}` : "") +
      ` ORDER BY created_at DESC, id DESC LIMIT $${params.length - 1} OFFSET $${params.length}`;
    const res = await pgQuery<AuditLogRow>(this.pgPool, sql, params);
    return res.rows.map(rowToAuditLog);
  }

  async listAuditLogsBySession(sessionId: string): Promise<AuditLog[]> {
    const res = await pgQuery<AuditLogRow>(
      this.pgPool,
      `SELECT ${COLUMNS} FROM audit_logs WHERE session_id = $1 ORDER BY created_at ASC, id ASC LIMIT $2`,
      [sessionId, Config.AUDIT_LOG_PAGE_LIMIT],
    );
    return res.rows.map(rowToAuditLog);
  }

  async purgeOldAuditLogs(now: Date = new Date()): Promise<number> {
    const days = Config.AUDIT_LOG_RETENTION_DAYS;
    const cutoff = new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
    const res = await pgQuery(this.pgPool, "DELETE FROM audit_logs WHERE created_at < $1", [
      cutoff.toISOString(),
    ]);
    const count = res.rowCount ?? 0;
    logger.info(`[auditLog] purged ${count} records older than ${cutoff.toISOString()}`);
    return count;
  }
}
