import type { Request, Response, NextFunction } from "express";
import { NotFoundError, UnauthorizedError, ValidationError, log, logError } from "@weft/sys";
import { ErrorReporter } from "@weft/trace";

/**
 * 4xx status carried by framework errors (e.g. malformed JSON bodies)
 */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null) return null;
  const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

/**
 * Map uncaught errors to status codes.
 *
 * - ValidationError → 400 with the validation failures as body
 * - UnauthorizedError → 403
 * - NotFoundError → 404
 * - anything else → 500, logged and reported
 */
export function createErrorHandler() {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof ValidationError) {
      res.status(400).json(err.validationErrors);
      return;
    }

    if (err instanceof UnauthorizedError) {
      res.status(403).end();
      return;
    }

    if (err instanceof NotFoundError) {
      res.status(404).end();
      return;
    }

    const status = clientErrorStatus(err);
    if (status !== null) {
      const message = err instanceof Error ? err.message : "Bad Request";
      log(`${req.method} ${req.path} rejected with ${status}: ${message}`);
      res.status(status).json({ message });
      return;
    }

    logError(`Unhandled error on ${req.method} ${req.path}`, err);
    ErrorReporter.report(err);
    res.status(500).end();
  };
}
