import { randomUUID } from "crypto";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { env } from "../config/env.js";
import type { Shopper } from "../services/owner.js";
import { mergeSessionIntoUser } from "../services/session.js";
import { verifyShopperToken } from "../utils/tokens.js";

export const SESSION_COOKIE = "sid";
export const ACCESS_COOKIE = "access_token";
const ONE_YEAR_MS = 365 * 24 * 60 * 60 * 1000;

const sessionIdSchema = z.string().uuid();

export type ShopperRequest = Request & { shopper?: Shopper; csrfToken?: string };

export const ANONYMOUS: Shopper = { userId: null, sessionId: null, email: null, displayName: null };

export function readCookie(req: Request, name: string): string | null {
  const cookies: Record<string, unknown> = req.cookies ?? {};
  const value = cookies[name];
  return typeof value === "string" && value.length > 0 ? value : null;
}

function parseBearerToken(authorizationHeader?: string) {
  if (!authorizationHeader || !authorizationHeader.startsWith("Bearer ")) {
    return null;
  }
  return authorizationHeader.slice("Bearer ".length);
}

export function currentShopper(req: ShopperRequest): Shopper {
  return req.shopper ?? ANONYMOUS;
}

/**
 * Resolves who is shopping. A valid access token makes the request a signed-in
 * user; anything else shops under the `sid` session cookie, which is issued on
 * first visit. A user arriving with a leftover session has it merged in.
 */
export async function resolveShopper(req: ShopperRequest, res: Response, next: NextFunction) {
  const token = readCookie(req, ACCESS_COOKIE) ?? parseBearerToken(req.header("authorization"));
  const claims = token ? verifyShopperToken(token) : null;
  const sessionCookie = readCookie(req, SESSION_COOKIE);
  const sessionId = sessionCookie && sessionIdSchema.safeParse(sessionCookie).success ? sessionCookie : null;

  if (claims) {
    if (sessionId) {
      await mergeSessionIntoUser(claims.userId, sessionId);
    }
    if (sessionCookie) {
      res.clearCookie(SESSION_COOKIE);
    }
    req.shopper = { userId: claims.userId, sessionId: null, email: claims.email, displayName: claims.displayName };
    next();
    return;
  }

  const activeSession = sessionId ?? randomUUID();
  if (!sessionId) {
    res.cookie(SESSION_COOKIE, activeSession, {
      httpOnly: true,
      sameSite: "lax",
      secure: env.NODE_ENV === "production",
      maxAge: ONE_YEAR_MS
    });
  }
  req.shopper = { userId: null, sessionId: activeSession, email: null, displayName: null };
  next();
}
