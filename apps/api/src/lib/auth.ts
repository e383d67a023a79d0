import type { Request, Response, NextFunction, RequestHandler } from "express";
import { ErrorCode, send400, sendError } from "./api-error.js";

/**
 * Bearer-token auth middleware.
 * When an API key is configured, requests must include
 * `Authorization: Bearer <key>`. Without one (local dev), auth is skipped.
 */
export function requireApiKey(apiKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) return next();

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      return sendError(res, 401, "Missing or invalid Authorization header. Use: Bearer <API_KEY>", ErrorCode.UNAUTHORIZED);
    }

    const token = authHeader.slice(7);
    if (token !== apiKey) {
      return sendError(res, 403, "Invalid API key", ErrorCode.FORBIDDEN);
    }

    return next();
  };
}

export function readUserId(req: Request): string | null {
  const header = req.get("x-user-id");
  return header && header.trim() ? header.trim() : null;
}

/** Caller id from `X-User-Id`; answers 400 and returns null when it is missing. */
export function requireUserId(req: Request, res: Response): string | null {
  const userId = readUserId(req);
  if (!userId) {
    send400(res, "X-User-Id header is required");
    return null;
  }
  return userId;
}
