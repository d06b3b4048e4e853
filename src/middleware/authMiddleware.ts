// src/middleware/authMiddleware.ts
import type { Request, Response, NextFunction, CookieOptions } from "express";
import { env } from "../config/env";
import { generateToken, verifyToken } from "../modules/Auths/authService";
import type { Actor } from "../policies/accessPolicy";
import { AuthenticationError } from "../utils/errors";

declare global {
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

export const TOKEN_COOKIE = "token";
const TOKEN_TTL_MS = 2 * 60 * 60 * 1000;
const REFRESH_WINDOW_SECONDS = 30 * 60;

export const tokenCookieOptions = (): CookieOptions => ({
  httpOnly: true,
  secure: env.isProduction,
  sameSite: env.isProduction ? "none" : "lax",
  path: "/",
});

export function setTokenCookie(res: Response, token: string) {
  res.cookie(TOKEN_COOKIE, token, { ...tokenCookieOptions(), maxAge: TOKEN_TTL_MS });
}

export function readToken(req: Request): string | null {
  const cookie: unknown = req.cookies?.[TOKEN_COOKIE];
  if (typeof cookie === "string" && cookie) return cookie;
  const header = req.headers.authorization;
  if (header?.startsWith("Bearer ")) return header.slice("Bearer ".length) || null;
  return null;
}

// Resolves the caller from the cookie or bearer token and re-issues it near expiry
export function authMiddleware(req: Request, res: Response, next: NextFunction) {
  const token = readToken(req);
  if (!token) return next(new AuthenticationError("Token not found."));

  try {
    const { actor, exp } = verifyToken(token);
    req.actor = actor;

    const timeLeft = (exp ?? 0) - Math.floor(Date.now() / 1000);
    if (timeLeft < REFRESH_WINDOW_SECONDS) setTokenCookie(res, generateToken(actor));

    next();
  } catch (err) {
    next(err);
  }
}

export function actorOf(req: Request): Actor {
  if (!req.actor) throw new AuthenticationError();
  return req.actor;
}
