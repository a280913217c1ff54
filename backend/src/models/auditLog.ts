export type AuditActor = {
  userId?: string;
  sessionId?: string;
  clientIp?: string;
  userAgent?: string;
};

export type AuditEvent = {
  action: string;
  resource: string;
  resourceId?: string;
  success: boolean;
  error?: unknown;
  details: Record<string, unknown>;
  actor?: AuditActor;
};

export type AuditLog = {
  id: string;
  createdAt: string;
  userId: string | null;
  action: string;
  resource: string;
  resourceId: string | null;
  success: boolean;
  error: string | null;
  details: Record<string, unknown>;
  sessionId: string | null;
  clientIp: string | null;
  userAgent: string | null;
};

export type ListAuditLogsInput = {
  userId?: string;
  action?: string;
  resource?: string;
  since?: Date;
  until?: Date;
  offset?: number;
  limit?: number;
};
