export type BackendStage =
  | "probe"
  | "initiate"
  | "read-part"
  | "upload-part"
  | "complete"
  | "abort"
  | "put"
  | "get"
  | "delete"
  | "list"
  | "create-bucket";

export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ConfigNotFoundError extends AppError {
  readonly configId: string;

  constructor(configId: string) {
    super("configuration not found", 404);
    this.configId = configId;
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "forbidden") {
    super(message, 403);
  }
}

export class UserNotFoundError extends AppError {
  readonly userId: string;

  constructor(userId: string) {
    super("user not found", 404);
    this.userId = userId;
  }
}

export class DuplicateEmailError extends AppError {
  constructor() {
    super("email is already in use", 409);
  }
}

export class ClientCreationFailure extends AppError {
  constructor(reason: string) {
    super(`failed to create storage client: ${reason}`, 400);
  }
}

export class LastConfigError extends AppError {
  constructor() {
    super("cannot delete the last configuration", 400);
  }
}

export class NoConfigurationError extends AppError {
  constructor() {
    super("no configurations found", 404);
  }
}

export class ProvisioningUnavailableError extends AppError {
  constructor(reason: string) {
    super(`provisioning is unavailable: ${reason}`, 503);
  }
}

export class BackendOperationFailure extends AppError {
  readonly stage: BackendStage;
  readonly partNumber?: number;

  constructor(
    stage: BackendStage,
    cause: unknown,
    opts: { partNumber?: number; statusCode?: number } = {},
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`storage backend failed at ${stage}: ${reason}`, opts.statusCode ?? 500);
    this.stage = stage;
    this.partNumber = opts.partNumber;
    this.cause = cause;
  }
}

export class ObjectNotFoundError extends BackendOperationFailure {
  readonly key: string;

  constructor(key: string, cause?: unknown) {
    super("get", cause ?? new Error(`no such key: ${key}`), { statusCode: 404 });
    this.key = key;
  }
}

export function isUniqueViolation(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "23505";
}

export function statusOf(e: unknown): number {
  return e instanceof AppError ? e.statusCode : 500;
}
