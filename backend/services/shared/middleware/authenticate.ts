// backend/services/shared/middleware/authenticate.ts

/**
 * Purpose:
 * - Static shared-secret gate. The raw `Authorization` header value must equal
 *   the configured token exactly (no "Bearer " scheme).
 *
 * Notes:
 * - Outermost pipeline stage: a rejected request never reaches logging,
 *   parsing or handlers.
 * - 401 bodies are plain text.
 */

import type { RequestHandler } from "express";
import { logger } from "../utils/logger";

export const TOKEN_MISSING = "Authorization token is missing.";
export const TOKEN_INVALID = "Invalid authorization token.";

export type SharedSecretOptions = {
  /** Exact value the Authorization header must carry. */
  token: string;
};

export function sharedSecretAuth(opts: SharedSecretOptions): RequestHandler {
  if (!opts.token) throw new Error("sharedSecretAuth requires a token");

  return (req, res, next) => {
    const header = req.headers.authorization;

    if (header === undefined) {
      logger.debug(
        { requestId: req.requestId, path: req.path },
        "[auth] token missing"
      );
      res.status(401).type("text/plain").send(TOKEN_MISSING);
      return;
    }

    if (header !== opts.token) {
      logger.debug(
        { requestId: req.requestId, path: req.path },
        "[auth] token rejected"
      );
      res.status(401).type("text/plain").send(TOKEN_INVALID);
      return;
    }

    next();
  };
}
