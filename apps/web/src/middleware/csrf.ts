import { randomBytes, timingSafeEqual } from "crypto";
import type { NextFunction, Response } from "express";
import { env } from "../config/env.js";
import { HttpError } from "../utils/httpError.js";
import { readCookie, type ShopperRequest } from "./shopper.js";

export const CSRF_COOKIE = "csrftoken";
export const CSRF_HEADER = "x-csrftoken";
export const CSRF_FIELD = "_csrf";
const SAFE_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);
const ONE_YEAR_MS = 365 * 24 * 60 * 60 * 1000;

export function issueCsrfToken(req: ShopperRequest, res: Response, next: NextFunction) {
  const existing = readCookie(req, CSRF_COOKIE);
  if (existing) {
    req.csrfToken = existing;
    next();
    return;
  }

  const token = randomBytes(32).toString("hex");
  // Readable by page scripts, which echo it back in the header.
  res.cookie(CSRF_COOKIE, token, {
    httpOnly: false,
    sameSite: "lax",
    secure: env.NODE_ENV === "production",
    maxAge: ONE_YEAR_MS
  });
  req.csrfToken = token;
  next();
}

function submittedToken(req: ShopperRequest) {
  const header = req.header(CSRF_HEADER);
  if (header) {
    return header;
  }
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null && CSRF_FIELD in body && typeof body[CSRF_FIELD] === "string") {
    return body[CSRF_FIELD];
  }
  return null;
}

function tokensMatch(expected: string, actual: string) {
  const a = Buffer.from(expected);
  const b = Buffer.from(actual);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Double-submit check: the header (or form field) must echo the cookie. */
export function verifyCsrf(req: ShopperRequest, res: Response, next: NextFunction) {
  if (SAFE_METHODS.has(req.method)) {
    next();
    return;
  }

  const expected = readCookie(req, CSRF_COOKIE);
  const actual = submittedToken(req);
  if (expected && actual && tokensMatch(expected, actual)) {
    next();
    return;
  }

  if (req.originalUrl.startsWith("/api")) {
    res.status(403).json({ success: false, message: "CSRF verification failed." });
    return;
  }
  next(new HttpError(403, "FORBIDDEN", "CSRF verification failed."));
}
