// backend/services/shared/middleware/requestId.ts

/**
 * Purpose:
 * - Every inbound request carries a stable correlation key so access logs,
 *   pipeline logs and problem bodies can be tied together.
 *
 * Notes:
 * - Must run before any logger.
 * - Never overwrites a caller-supplied ID; mints a UUID only when the request
 *   carries none of `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 * - The chosen id is echoed back as `x-request-id`.
 */

import type { Request, RequestHandler } from "express";
import { randomUUID } from "node:crypto";

export function incomingRequestId(req: Request): string | undefined {
  const hdr =
    req.headers["x-request-id"] ||
    req.headers["x-correlation-id"] ||
    req.headers["x-amzn-trace-id"];
  const id = Array.isArray(hdr) ? hdr[0] : hdr;
  return id && id.trim() ? id.trim() : undefined;
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const id = incomingRequestId(req) ?? randomUUID();
    req.requestId = id;
    res.setHeader("x-request-id", id);
    next();
  };
}
