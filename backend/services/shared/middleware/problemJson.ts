// backend/services/shared/middleware/problemJson.ts

/**
 * Purpose:
 * - Tail stages of the pipeline:
 *     notFoundMessage  → unknown routes
 *     errorBoundary    → any fault raised downstream (stage 3)
 *     exceptionHandler → faults stage 3 could not absorb (stage 4)
 *
 * Notes:
 * - errorBoundary keeps its 500 body generic; the fault itself is logged and
 *   recorded in the app's FaultLog.
 * - Client errors raised by the body parser (bad JSON, oversized body) are not
 *   faults and answer with their own 4xx status.
 * - exceptionHandler renders the same problem body as the diagnostic route.
 */

import type { ErrorRequestHandler, Request, RequestHandler } from "express";
import { extractLogContext, logger } from "../utils/logger";
import { messageBody, notFound } from "../http/errors";
import type { FaultLog, RecordedFault } from "../http/faultLog";
import { makeProblem, sendProblem, type ProblemBody } from "../http/problem";

export const INTERNAL_ERROR_BODY = { error: "Internal server error." } as const;
export const FAULT_PROBLEM_TITLE =
  "An error occurred while processing your request.";

/** Status of a 4xx error the framework marked safe to expose, if any. */
export function exposedClientStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const status = "status" in err ? err.status : undefined;
  const expose = "expose" in err ? err.expose : undefined;
  if (expose !== true || typeof status !== "number") return undefined;
  return status >= 400 && status < 500 ? status : undefined;
}

export function faultProblem(
  fault: RecordedFault | undefined,
  instance?: string
): ProblemBody {
  return makeProblem({
    title: FAULT_PROBLEM_TITLE,
    status: 500,
    detail: fault?.error.message,
    instance,
  });
}

export function notFoundMessage(): RequestHandler {
  return (_req, res) => {
    notFound(res, "Route not found");
  };
}

function logFault(req: Request, err: unknown, msg: string) {
  logger.error({ ...extractLogContext(req), err }, msg);
}

export function errorBoundary(faults: FaultLog): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const clientStatus = exposedClientStatus(err);
    if (clientStatus !== undefined) {
      logger.warn(
        { ...extractLogContext(req), status: clientStatus },
        "rejected request body"
      );
      res
        .status(clientStatus)
        .json(
          messageBody(
            clientStatus === 413
              ? "Request body too large"
              : "Invalid request body"
          )
        );
      return;
    }

    logFault(req, err, "An unhandled exception occurred.");
    faults.record(err, req.requestId);
    res.status(500).json(INTERNAL_ERROR_BODY);
  };
}

export function exceptionHandler(faults: FaultLog): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const recorded = faults.record(err, req.requestId);
    logFault(req, err, "exception handler caught fault");

    if (res.headersSent) {
      res.end();
      return;
    }
    sendProblem(res, faultProblem(recorded, req.requestId));
  };
}
