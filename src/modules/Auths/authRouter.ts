// src/modules/Auths/authRouter.ts
import { Router, type Request, type Response, type NextFunction } from "express";
import {
  TOKEN_COOKIE,
  actorOf,
  authMiddleware,
  readToken,
  setTokenCookie,
  tokenCookieOptions,
} from "../../middleware/authMiddleware";
import { verifyToken, type AuthService } from "./authService";

export function createAuthRouter(authService: AuthService) {
  const router = Router();

  // ---------------- REGISTER ----------------
  router.post("/register", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(201).json(await authService.register(req.body));
    } catch (err) {
      next(err);
    }
  });

  // ---------------- LOGIN ----------------
  router.post("/login", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await authService.login(req.body);
      setTokenCookie(res, result.data.token);
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  // ---------------- LOGOUT ----------------
  router.post("/logout", (_req: Request, res: Response) => {
    res.clearCookie(TOKEN_COOKIE, tokenCookieOptions());
    res.json({ message: "You have been logged out successfully." });
  });

  // ---------------- VERIFY ----------------
  router.get("/verify", (req: Request, res: Response) => {
    const token = readToken(req);
    if (!token) return res.status(401).json({ valid: false, error: "Token not found." });

    try {
      const { actor } = verifyToken(token);
      res.json({ valid: true, actor });
    } catch (err) {
      res.status(401).json({ valid: false, error: err instanceof Error ? err.message : "Invalid token." });
    }
  });

  // ---------------- PROFILE ----------------
  router.get("/me", authMiddleware, async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await authService.getAccount(actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
