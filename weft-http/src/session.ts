import type { Request, Response } from "express";
import { Environment, newUUID4, toUUID } from "@weft/sys";

export const SESSION_COOKIE = "ktlibSessionId";

function readCookie(req: Request, name: string): unknown {
  return req.cookies?.[name];
}

/**
 * Session id from the request cookie, issuing a new cookie when it is
 * missing or not a UUID
 */
export function resolveSessionId(req: Request, res: Response): string {
  const existing = toUUID(readCookie(req, SESSION_COOKIE));
  if (existing) return existing;

  const sessionId = newUUID4();
  res.cookie(SESSION_COOKIE, sessionId, {
    httpOnly: true,
    secure: Environment.isNotLocal,
    path: "/",
  });
  return sessionId;
}
