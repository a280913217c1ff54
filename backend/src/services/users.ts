import { Pool } from "pg";
import type {
  ChangePasswordInput,
  CreateUserInput,
  ImportUsersResult,
  ListUsersInput,
  UpdateUserInput,
  User,
  UserImportRecord,
} from "../models/user";
import type { AuditActor } from "../models/auditLog";
import { DuplicateEmailError, UserNotFoundError, ValidationError, isUniqueViolation } from "../models/errors";
import type { AuditSink } from "./auditLog";
import { IdIssueService } from "./idIssue";
import type { ObjectStoreCache } from "./storageFactory";
import { ownerLockKey } from "./storageConfigs";
import { parseUserImportRecord } from "./userTransfer";
import {
  checkPasswordHash,
  generatePasswordHash,
  normalizeEmail,
  toIsoString,
  validateEmail,
} from "../utils/format";
import { pgQuery, withTransaction } from "../utils/servers";
import { createLogger } from "../utils/logger";

const logger = createLogger({ file: "users" });

type UserRow = {
  id: string;
  email: string;
  nickname: string;
  is_admin: boolean;
  created_at: Date | string;
};

const USER_COLUMNS = "id, email, nickname, is_admin, created_at";

function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    nickname: row.nickname,
    isAdmin: row.is_admin,
    createdAt: toIsoString(row.created_at),
  };
}

function checkedEmail(input: unknown): string {
  if (typeof input !== "string" || input.trim() === "") throw new ValidationError("email is required");
  const email = normalizeEmail(input);
  if (!validateEmail(email)) throw new ValidationError("given email is invalid");
  return email;
}

function checkedNickname(input: unknown): string {
  const nickname = typeof input === "string" ? input.trim() : "";
  if (!nickname) throw new ValidationError("nickname is required");
  return nickname;
}

function uniqueEmail(e: unknown): unknown {
  return isUniqueViolation(e) ? new DuplicateEmailError() : e;
}

export class UsersService {
  private pgPool: Pool;
  private idIssueService: IdIssueService;
  private audit: AuditSink;
  private storeCache: ObjectStoreCache | null;

  constructor(
    pgPool: Pool,
    idIssueService: IdIssueService,
    audit: AuditSink,
    storeCache: ObjectStoreCache | null = null,
  ) {
    this.pgPool = pgPool;
    this.idIssueService = idIssueService;
    this.audit = audit;
    this.storeCache = storeCache;
  }

  private async audited<T>(
    action: string,
    resourceId: string | undefined,
    details: Record<string, unknown>,
    actor: AuditActor | undefined,
    fn: () => Promise<T>,
  ): Promise<T> {
    const base = { action, resource: "user", resourceId, details, actor };
    try {
      const out = await fn();
      await this.audit.record({ ...base, success: true });
      return out;
    } catch (e) {
      await this.audit.record({ ...base, success: false, error: e });
      throw e;
    }
  }

  async createUser(input: CreateUserInput, actor?: AuditActor): Promise<User> {
    const email = checkedEmail(input.email);
    const nickname = checkedNickname(input.nickname);
    if (typeof input.password !== "string" || input.password.trim() === "")
      throw new ValidationError("password is required");
    let id: string;
    if (input.id && input.id.trim() !== "") {
      id = input.id.trim();
      if (!/^[0-9A-F]{16}$/.test(id)) throw new ValidationError("invalid id format");
    } else {
      id = this.idIssueService.issueId();
    }
    const isAdmin = input.isAdmin === true;
    return this.audited("create_user", id, { isAdmin }, actor, async () => {
      const passwordHash = await generatePasswordHash(input.password);
      const res = await pgQuery<UserRow>(
        this.pgPool,
        `INSERT INTO users (id, email, nickname, is_admin, password, created_at)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${USER_COLUMNS}`,
        [id, email, nickname, isAdmin, passwordHash, new Date().toISOString()],
      ).catch((e: unknown) => {
        throw uniqueEmail(e);
      });
      return rowToUser(res.rows[0]);
    });
  }

  async getUser(id: string): Promise<User> {
    const res = await pgQuery<UserRow>(this.pgPool, `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    if (res.rows.length === 0) throw new UserNotFoundError(id);
    return rowToUser(res.rows[0]);
  }

  async listUsers(input: ListUsersInput = {}): Promise<User[]> {
    const offset = Math.max(0, input.offset ?? 0);
    const limit = Math.min(Math.max(1, input.limit ?? 100), 1000);
    const order = input.order === "asc" ? "ASC" : "DESC";
    const res = await pgQuery<UserRow>(
      this.pgPool,
      `SELECT ${USER_COLUMNS}
       FROM users
       ORDER BY created_at ${order}, id ${order}
       OFFSET $1 LIMIT $2`,
      [offset, limit],
    );
    return res.rows.map(rowToUser);
  }

  async updateUser(id: string, input: UpdateUserInput, actor?: AuditActor): Promise<User> {
    const cols: string[] = [];
    const vals: unknown[] = [];
    let idx = 1;
    if (input.email !== undefined) {
      cols.push(`email = $${idx++}`);
      vals.push(checkedEmail(input.email));
    }
    if (input.nickname !== undefined) {
      cols.push(`nickname = $${idx++}`);
      vals.push(checkedNickname(input.nickname));
    }
    if (input.isAdmin !== undefined) {
      if (actor?.userId === id && !input.isAdmin) {
        throw new ValidationError("cannot revoke your own admin role");
      }
      cols.push(`is_admin = $${idx++}`);
      vals.push(input.isAdmin);
    }
    if (cols.length === 0) return this.getUser(id);
    const details = { fields: cols.map((c) => c.split(" ")[0]) };
    return this.audited("update_user", id, details, actor, async () => {
      const res = await pgQuery<UserRow>(
        this.pgPool,
        `UPDATE users SET ${cols.join(", ")} WHERE id = $${idx} RETURNING ${USER_COLUMNS}`,
        [...vals, id],
      ).catch((e: unknown) => {
        throw uniqueEmail(e);
      });
      if (res.rows.length === 0) throw new UserNotFoundError(id);
      return rowToUser(res.rows[0]);
    });
  }

  async changePassword(input: ChangePasswordInput, actor?: AuditActor): Promise<void> {
    if (typeof input.newPassword !== "string" || input.newPassword.trim() === "") {
      throw new ValidationError("new password is required");
    }
    await this.audited("change_password", input.id, {}, { ...actor, userId: actor?.userId ?? input.id }, async () => {
      const res = await pgQuery<{ password: Uint8Array }>(
        this.pgPool,
        "SELECT password FROM users WHERE id = $1",
        [input.id],
      );
      if (res.rows.length === 0) throw new UserNotFoundError(input.id);
      if (!(await checkPasswordHash(input.currentPassword, res.rows[0].password))) {
        throw new ValidationError("current password is incorrect");
      }
      const passwordHash = await generatePasswordHash(input.newPassword);
      await pgQuery(this.pgPool, "UPDATE users SET password = $1 WHERE id = $2", [passwordHash, input.id]);
    });
  }

  /** Removes the account and every storage configuration it owns. */
  async deleteUser(id: string, actor?: AuditActor): Promise<{ deletedConfigs: number }> {
    if (actor?.userId === id) throw new ValidationError("cannot delete your own account");
    return this.audited("delete_user", id, {}, actor, async () => {
      const configIds = await withTransaction(
        this.pgPool,
        async (client) => {
          const configs = await client.query<{ id: string }>(
            "DELETE FROM storage_configs WHERE owner_id = $1 RETURNING id",
            [id],
          );
          const res = await client.query("DELETE FROM users WHERE id = $1", [id]);
          if ((res.rowCount ?? 0) === 0) throw new UserNotFoundError(id);
          return configs.rows.map((r) => r.id);
        },
        ownerLockKey(id),
      );
      for (const configId of configIds) this.storeCache?.invalidate(configId);
      logger.info(`[users] deleted ${id} with ${configIds.length} configs`);
      return { deletedConfigs: configIds.length };
    });
  }

  async exportUsers(): Promise<User[]> {
    const res = await pgQuery<UserRow>(
      this.pgPool,
      `SELECT ${USER_COLUMNS} FROM users ORDER BY created_at ASC, id ASC`,
    );
    return res.rows.map(rowToUser);
  }

  /**
   * Upserts records by id in one transaction. Existing accounts keep their password unless
   * the record carries one; a new id without a password is skipped.
   */
  async importUsers(records: ReadonlyArray<unknown>, actor?: AuditActor): Promise<ImportUsersResult> {
    const parsed: UserImportRecord[] = [];
    let skipped = 0;
    for (const raw of records) {
      const rec = parseUserImportRecord(raw);
      if (rec) parsed.push(rec);
      else skipped++;
    }
    return this.audited("import_users", undefined, { records: records.length }, actor, async () => {
      const hashes = new Map<UserImportRecord, Uint8Array>();
      for (const rec of parsed) {
        if (rec.password !== null) hashes.set(rec, await generatePasswordHash(rec.password));
      }
      const now = new Date().toISOString();
      let imported: number;
      try {
        imported = await withTransaction(this.pgPool, async (client) => {
          const found = await client.query<{ id: string }>("SELECT id FROM users WHERE id = ANY($1)", [
            parsed.map((r) => r.id),
          ]);
          const existing = new Set(found.rows.map((r) => r.id));
          let written = 0;
          for (const rec of parsed) {
            const hash = hashes.get(rec);
            if (existing.has(rec.id)) {
              if (hash) {
                await client.query(
                  "UPDATE users SET email = $2, nickname = $3, is_admin = $4, password = $5 WHERE id = $1",
                  [rec.id, rec.email, rec.nickname, rec.isAdmin, hash],
                );
              } else {
                await client.query("UPDATE users SET email = $2, nickname = $3, is_admin = $4 WHERE id = $1", [
                  rec.id,
                  rec.email,
                  rec.nickname,
                  rec.isAdmin,
                ]);
              }
            } else if (hash) {
              await client.query(
                `INSERT INTO users (id, email, nickname, is_admin, password, created_at)
                 VALUES ($1, $2, $3, $4, $5, $6)`,
                [rec.id, rec.email, rec.nickname, rec.isAdmin, hash, now],
              );
              existing.add(rec.id);
            } else {
              continue;
            }
            written++;
          }
          return written;
        });
      } catch (e) {
        throw uniqueEmail(e);
      }
      skipped += parsed.length - imported;
      logger.info(`[users] imported ${imported} users, skipped ${skipped}`);
      return { imported, skipped };
    });
  }
}
