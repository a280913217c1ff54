import { Request, Response } from "express";
import { AuthService } from "../services/auth";
import type { AuditActor } from "../models/auditLog";
import type { Requester } from "../models/storageConfig";
import { parseIntOrUndefined } from "../utils/format";

export type LoginUser = Requester & {
  nickname: string;
  sessionId: string;
};

export class AuthHelpers {
  private authService: AuthService;

  constructor(authService: AuthService) {
    this.authService = authService;
  }

  getSessionId(req: Request): string | null {
    const value: unknown = req.cookies?.session_id;
    return typeof value === "string" && value !== "" ? value : null;
  }

  async getCurrentUser(req: Request): Promise<LoginUser | null> {
    const sessionId = this.getSessionId(req);
    if (!sessionId) return null;
    const info = await this.authService.getSessionInfo(sessionId);
    if (!info || !info.userId) return null;
    return {
      userId: info.userId,
      isAdmin: info.userIsAdmin,
      nickname: info.userNickname,
      sessionId,
    };
  }

  async requireLogin(req: Request, res: Response): Promise<LoginUser | null> {
    const loginUser = await this.getCurrentUser(req);
    if (!loginUser) {
      res.status(401).json({ error: "login required" });
      return null;
    }
    return loginUser;
  }

  async requireAdmin(req: Request, res: Response): Promise<LoginUser | null> {
    const loginUser = await this.requireLogin(req, res);
    if (!loginUser) return null;
    if (!loginUser.isAdmin) {
      res.status(403).json({ error: "admin only" });
      return null;
    }
    return loginUser;
  }

  static actorOf(req: Request, user: LoginUser): AuditActor {
    return {
      userId: user.userId,
      sessionId: user.sessionId,
      clientIp: req.ip,
      userAgent: req.get("user-agent"),
    };
  }

  static getPageParams(req: Request, maxLimit: number): { offset: number; limit: number } {
    const offset = Math.max(0, parseIntOrUndefined(req.query.offset) ?? 0);
    const limit = Math.min(Math.max(1, parseIntOrUndefined(req.query.limit) ?? 100), maxLimit);
    return { offset, limit };
  }
}
