import type { User, UserImportRecord } from "../models/user";
import { formatCsv } from "../utils/csv";
import { normalizeEmail, validateEmail } from "../utils/format";
import { flag, isRecord, recordsFromCsv, recordsFromJson, requiredString } from "./configTransfer";

export const USER_CSV_COLUMNS = ["id", "email", "nickname", "is_admin", "created_at"] as const;

export function usersToCsv(users: ReadonlyArray<User>): string {
  return formatCsv([
    [...USER_CSV_COLUMNS],
    ...users.map((u) => [u.id, u.email, u.nickname, String(u.isAdmin), u.createdAt]),
  ]);
}

/** An optional `password` column is carried through for new accounts. */
export function usersFromCsv(text: string): Record<string, string>[] {
  return recordsFromCsv(text, ["id", "email", "nickname", "is_admin"]);
}

export function usersToJson(users: ReadonlyArray<User>): string {
  return JSON.stringify(users, null, 2);
}

export function usersFromJson(text: string): unknown[] {
  return recordsFromJson(text, "users");
}

/** Returns null for a record with a malformed id or email or without a nickname. */
export function parseUserImportRecord(raw: unknown): UserImportRecord | null {
  if (!isRecord(raw)) return null;
  const id = requiredString(raw.id);
  const rawEmail = requiredString(raw.email);
  const nickname = requiredString(raw.nickname);
  if (!id || !/^[0-9A-F]{16}$/.test(id) || !rawEmail || !nickname) return null;
  const email = normalizeEmail(rawEmail);
  if (!validateEmail(email)) return null;
  const password = typeof raw.password === "string" && raw.password.trim() !== "" ? raw.password : null;
  return { id, email, nickname, isAdmin: flag(raw.isAdmin, false), password };
}
