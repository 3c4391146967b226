// backend/services/shared/middleware/httpLogger.ts

/**
 * Purpose:
 * - Structured access log per request, tagged with `service` and `reqId`.
 * - Telemetry only: never blocks or rewrites a response.
 *
 * Order:
 * - Mount immediately after `requestIdMiddleware` so `req.requestId` is set.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 */

import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import { logger as rootLogger } from "../utils/logger";

function requestIdOf(req: IncomingMessage): string | undefined {
  if ("requestId" in req && typeof req.requestId === "string") {
    return req.requestId;
  }
  return undefined;
}

export function makeHttpLogger(serviceName: string) {
  const logger = rootLogger.child({ service: serviceName });

  return pinoHttp({
    logger,

    // Keep pino-http's req.id aligned with requestIdMiddleware.
    genReqId: (req, res) => {
      const existing = requestIdOf(req);
      if (existing) return existing;
      const id = randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    customProps: (req: IncomingMessage) => ({
      service: serviceName,
      reqId: requestIdOf(req),
    }),

    serializers: {
      req(req: IncomingMessage) {
        return { id: requestIdOf(req), method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
