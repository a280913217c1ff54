import { Pool } from "pg";
import Redis from "ioredis";
import crypto from "crypto";
import { Config } from "../config";
import type { SessionInfo } from "../models/session";
import { checkPasswordHash, normalizeEmail } from "../utils/format";
import { pgQuery } from "../utils/servers";

export type LoginResult = { sessionId: string; userId: string };

type LoginRow = {
  id: string;
  email: string;
  nickname: string;
  is_admin: boolean;
  created_at: string | Date;
  password: Uint8Array;
};

function sessionKey(sessionId: string): string {
  return `session:${sessionId}`;
}

function userSessionsKey(userId: string): string {
  return `user_sessions:${userId}`;
}

function isSessionInfo(value: unknown): value is SessionInfo {
  if (typeof value !== "object" || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  return (
    typeof v.userId === "string" &&
    typeof v.userEmail === "string" &&
    typeof v.userNickname === "string" &&
    typeof v.userIsAdmin === "boolean" &&
    typeof v.userCreatedAt === "string" &&
    typeof v.loggedInAt === "string"
  );
}

export class AuthService {
  private pgPool: Pool;
  private redis: Redis;

  constructor(pgPool: Pool, redis: Redis) {
    this.pgPool = pgPool;
    this.redis = redis;
  }

  async login(email: string, password: string): Promise<LoginResult> {
    const result = await pgQuery<LoginRow>(
      this.pgPool,
      `SELECT id, email, nickname, is_admin, created_at, password
       FROM users
       WHERE email = $1`,
      [normalizeEmail(email)],
    );
    if (result.rows.length === 0) throw new Error("authentication failed");
    const row = result.rows[0];

    const ok = await checkPasswordHash(password, row.password);
    if (!ok) throw new Error("authentication failed");

    const sessionId = crypto.randomBytes(32).toString("hex");
    const sessionInfo: SessionInfo = {
      userId: row.id,
      userEmail: row.email,
      userNickname: row.nickname,
      userIsAdmin: !!row.is_admin,
      userCreatedAt: new Date(row.created_at).toISOString(),
      loggedInAt: new Date().toISOString(),
    };
    await this.redis.set(sessionKey(sessionId), JSON.stringify(sessionInfo), "EX", Config.SESSION_TTL);
    await this.redis.sadd(userSessionsKey(row.id), sessionId);
    await this.redis.expire(userSessionsKey(row.id), Config.SESSION_TTL);
    return { sessionId, userId: row.id };
  }

  async getSessionInfo(sessionId: string): Promise<SessionInfo | null> {
    if (!sessionId) return null;
    const value = await this.redis.getex(sessionKey(sessionId), "EX", Config.SESSION_TTL);
    if (!value) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch {
      return null;
    }
    return isSessionInfo(parsed) ? parsed : null;
  }

  async logout(sessionId: string): Promise<void> {
    if (sessionId) {
      await this.redis.del(sessionKey(sessionId));
    }
  }

  /** Ends every session of the user, after a role change or account removal. */
  async revokeUserSessions(userId: string): Promise<number> {
    const key = userSessionsKey(userId);
    const sessionIds = await this.redis.smembers(key);
    for (const sessionId of sessionIds) {
      await this.redis.del(sessionKey(sessionId));
    }
    await this.redis.del(key);
    return sessionIds.length;
  }
}
