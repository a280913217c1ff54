import { Router, Request, Response } from "express";
import { Config } from "../config";
import { AuthService } from "../services/auth";
import { UsersService } from "../services/users";
import { AuthHelpers } from "./authHelpers";
import { isPlainObject, sendError } from "./utils";
import { errorMessage } from "../utils/logger";

export default function createAuthRouter(authService: AuthService, usersService: UsersService) {
  const router = Router();
  const authHelpers = new AuthHelpers(authService);

  router.post("/", async (req: Request, res: Response) => {
    const email: unknown = req.body?.email;
    const password: unknown = req.body?.password;
    if (typeof email !== "string" || typeof password !== "string" || !email || !password) {
      return res.status(400).json({ error: "email and password are needed" });
    }
    try {
      const { sessionId } = await authService.login(email, password);
      res.cookie("session_id", sessionId, makeCookieOptions(req));
      res.json({ sessionId });
    } catch (e) {
      res.status(401).json({ error: errorMessage(e) });
    }
  });

  router.get("/", async (req: Request, res: Response) => {
    const sessionId = authHelpers.getSessionId(req);
    if (!sessionId) return res.status(401).json({ error: "no session ID" });
    const sessionInfo = await authService.getSessionInfo(sessionId);
    if (!sessionInfo) return res.status(401).json({ error: "no matching session" });
    res.json(sessionInfo);
  });

  router.post("/register", async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isPlainObject(body)) return res.status(400).json({ error: "request body must be an object" });
    const { email, nickname, password } = body;
    if (typeof email !== "string" || typeof nickname !== "string" || typeof password !== "string") {
      return res.status(400).json({ error: "email, nickname and password are needed" });
    }
    try {
      const user = await usersService.createUser(
        { email, nickname, password, isAdmin: false },
        { clientIp: req.ip, userAgent: req.get("user-agent") },
      );
      res.status(201).json(user);
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post("/change-password", async (req: Request, res: Response) => {
    const loginUser = await authHelpers.requireLogin(req, res);
    if (!loginUser) return;
    const currentPassword: unknown = req.body?.currentPassword;
    const newPassword: unknown = req.body?.newPassword;
    if (typeof currentPassword !== "string" || typeof newPassword !== "string") {
      return res.status(400).json({ error: "currentPassword and newPassword are needed" });
    }
    try {
      await usersService.changePassword(
        { id: loginUser.userId, currentPassword, newPassword },
        AuthHelpers.actorOf(req, loginUser),
      );
      res.json({ result: "ok" });
    } catch (e) {
      sendError(res, e);
    }
  });

  router.delete("/", async (req: Request, res: Response) => {
    const sessionId = authHelpers.getSessionId(req);
    if (sessionId) await authService.logout(sessionId);
    res.clearCookie("session_id", makeCookieOptions(req));
    res.json({ result: "ok" });
  });

  return router;
}

function makeCookieOptions(req: Request) {
  return {
    httpOnly: true,
    secure: req.secure || req.get("x-forwarded-proto") === "https",
    sameSite: "lax" as const,
    path: "/",
    maxAge: Config.SESSION_TTL * 1000,
  };
}
