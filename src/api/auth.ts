import { createHash, timingSafeEqual } from "node:crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { rateLimit, type RateLimitRequestHandler } from "express-rate-limit";
import jwt from "jsonwebtoken";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { RATE_LIMIT_COOKIE, SESSION_COOKIE, SESSION_TTL } from "../constants";
import type { Account, AppConfig } from "../env";
import { AuthError, ForbiddenError, ValidationError } from "../errors";
import { log } from "../helpers/log.helper";
import type { Role } from "../types";

const SessionSchema = z.object({
  role: z.enum(["admin", "employee"]),
  username: z.string(),
});

export type Session = z.infer<typeof SessionSchema>;

const LoginBodySchema = z.object({
  username: z.string().min(1, "username is required"),
  password: z.string().min(1, "password is required"),
});

function cookieValue(req: Request, name: string): string | undefined {
  const cookies: unknown = req.cookies;
  if (typeof cookies !== "object" || cookies === null) return undefined;
  const value: unknown = Object.getOwnPropertyDescriptor(cookies, name)?.value;
  return typeof value === "string" && value ? value : undefined;
}

function sameSecret(a: string, b: string): boolean {
  const digest = (s: string) => createHash("sha256").update(s).digest();
  return timingSafeEqual(digest(a), digest(b));
}

export function matchAccount(accounts: AppConfig["accounts"], username: string, password: string): Role | null {
  const roles: Array<[Role, Account | undefined]> = [
    ["admin", accounts.admin],
    ["employee", accounts.employee],
  ];
  for (const [role, account] of roles) {
    if (!account) continue;
    const userOk = sameSecret(account.username, username);
    const passOk = sameSecret(account.password, password);
    if (userOk && passOk) return role;
  }
  return null;
}

export function signSession(session: Session, secret: string): string {
  return jwt.sign(session, secret, { algorithm: "HS256", expiresIn: SESSION_TTL });
}

export function readSession(req: Request, secret: string): Session | null {
  const token = cookieValue(req, SESSION_COOKIE);
  if (!token) return null;
  try {
    const parsed = SessionSchema.safeParse(jwt.verify(token, secret, { algorithms: ["HS256"] }));
    return parsed.success ? parsed.data : null;
  } catch (err) {
    log.debug(`Rejected session token: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/** Rate-limit bucket for this browser; the id lives in its own cookie. */
export function rateLimitKey(req: Request): string {
  return `session:${cookieValue(req, RATE_LIMIT_COOKIE) ?? req.ip ?? "unknown"}`;
}

export const ensureRateLimitId: RequestHandler = (req, res, next) => {
  if (!cookieValue(req, RATE_LIMIT_COOKIE)) {
    const id = uuidv4();
    res.cookie(RATE_LIMIT_COOKIE, id, { httpOnly: true, sameSite: "lax" });
    req.cookies = { ...(typeof req.cookies === "object" ? req.cookies : {}), [RATE_LIMIT_COOKIE]: id };
  }
  next();
};

export function loginLimiter(limit: number): RateLimitRequestHandler {
  return rateLimit({
    windowMs: 15 * 60 * 1000,
    limit,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    keyGenerator: rateLimitKey,
    handler: (_req, res) => {
      res.status(429).json({ ok: false, error: "Too many login attempts, try again later", code: "rate_limited" });
    },
  });
}

export function sessionOf(res: Response): Session | null {
  const parsed = SessionSchema.safeParse(res.locals.session);
  return parsed.success ? parsed.data : null;
}

export function requireRole(secret: string, ...roles: Role[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const session = readSession(req, secret);
    if (!session) return next(new AuthError());
    if (roles.length && !roles.includes(session.role)) return next(new ForbiddenError());
    res.locals.session = session;
    next();
  };
}

export function loginHandler(config: AppConfig, limiter: RateLimitRequestHandler): RequestHandler {
  return async (req, res, next) => {
    const parsed = LoginBodySchema.safeParse(req.body);
    if (!parsed.success) return next(new ValidationError("Invalid login request", parsed.error.flatten()));

    const { username, password } = parsed.data;
    const role = matchAccount(config.accounts, username, password);
    if (!role) {
      log.warn(`Failed login for "${username}"`);
      return next(new AuthError("Invalid username or password"));
    }

    try {
      // a successful login clears earlier failed attempts of this browser
      await limiter.resetKey(rateLimitKey(req));
    } catch (err) {
      return next(err);
    }

    res.cookie(SESSION_COOKIE, signSession({ role, username }, config.secretKey), {
      httpOnly: true,
      sameSite: "lax",
      secure: req.secure,
      maxAge: 12 * 60 * 60 * 1000,
    });
    log.info(`${role} "${username}" logged in`);
    res.json({ ok: true, role });
  };
}

export const logoutHandler: RequestHandler = (_req, res) => {
  res.clearCookie(SESSION_COOKIE);
  res.json({ ok: true });
};
