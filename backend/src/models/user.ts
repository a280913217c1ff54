import type { RedactedStorageConfig } from "./storageConfig";

export type User = {
  id: string;
  email: string;
  nickname: string;
  isAdmin: boolean;
  createdAt: string;
};

export type CreateUserInput = {
  id?: string;
  email: string;
  nickname: string;
  password: string;
  isAdmin?: boolean;
};

export type ListUsersInput = {
  offset?: number;
  limit?: number;
  order?: "asc" | "desc";
};

export type UpdateUserInput = {
  email?: string;
  nickname?: string;
  isAdmin?: boolean;
};

export type ChangePasswordInput = {
  id: string;
  currentPassword: string;
  newPassword: string;
};

/** An imported user; the password is needed only for ids that do not exist yet. */
export type UserImportRecord = {
  id: string;
  email: string;
  nickname: string;
  isAdmin: boolean;
  password: string | null;
};

export type ImportUsersResult = {
  imported: number;
  skipped: number;
};

export type UserWithDefaultConfig = {
  user: User;
  config: RedactedStorageConfig | null;
};
