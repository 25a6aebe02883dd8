import type { NextFunction, Response } from "express";
import { isHttpError, notFound } from "../utils/httpError.js";
import { logger } from "../utils/logger.js";
import { bareLayoutContext, sendPage } from "../utils/render.js";
import ErrorPage from "../views/pages/ErrorPage.js";
import { currentShopper, type ShopperRequest } from "./shopper.js";

type ResolvedError = {
  status: number;
  message: string;
};

function isApiRequest(req: ShopperRequest) {
  return req.originalUrl.startsWith("/api");
}

// Body parser failures carry a 4xx `status` of their own.
function clientStatus(error: unknown) {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status >= 400 && error.status < 500 ? error.status : null;
  }
  return null;
}

function resolveError(error: unknown): ResolvedError {
  if (isHttpError(error)) {
    return { status: error.status, message: error.message };
  }
  const status = clientStatus(error);
  if (status !== null) {
    return { status, message: "Malformed request." };
  }
  return { status: 500, message: "Something went wrong. Please try again." };
}

export function notFoundHandler(req: ShopperRequest, _res: Response, next: NextFunction) {
  next(notFound(isApiRequest(req) ? "Route not found." : "Page not found."));
}

export function errorHandler(error: unknown, req: ShopperRequest, res: Response, next: NextFunction) {
  if (res.headersSent) {
    next(error);
    return;
  }

  const { status, message } = resolveError(error);
  if (status >= 500) {
    logger.error("request failed", {
      method: req.method,
      path: req.originalUrl,
      error: error instanceof Error ? (error.stack ?? error.message) : String(error)
    });
  }

  if (isApiRequest(req)) {
    res.status(status).json({ success: false, message });
    return;
  }

  sendPage(res, ErrorPage, { context: bareLayoutContext(currentShopper(req), req.path), status, message }, status);
}
