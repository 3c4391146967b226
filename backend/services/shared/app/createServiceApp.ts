// backend/services/shared/app/createServiceApp.ts

/**
 * Purpose:
 * - Assemble a service's request pipeline from an explicit, ordered list of
 *   named stages. The list is built once; nothing is registered ad hoc.
 *
 * Order (outermost first):
 *   requestId → httpLogger            (ambient; never short-circuit)
 *   authenticate                       (stage 1; may answer 401)
 *   logRequestResponse                 (stage 2)
 *   jsonBody → routes → notFound       (dispatch)
 *   errorBoundary                      (stage 3)
 *   exceptionHandler                   (stage 4)
 *
 * Notes:
 * - Every stage forwards with Express `next()`; errors travel by `next(err)`
 *   to the two error stages at the tail.
 */

import express, {
  type ErrorRequestHandler,
  type Express,
  type RequestHandler,
  type Router,
} from "express";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import { sharedSecretAuth } from "../middleware/authenticate";
import {
  logRequestResponse,
  type RequestLogSink,
} from "../middleware/logRequestResponse";
import {
  errorBoundary,
  exceptionHandler,
  notFoundMessage,
} from "../middleware/problemJson";
import type { FaultLog } from "../http/faultLog";

export type PipelineStage =
  | { name: string; kind: "request"; handler: RequestHandler }
  | { name: string; kind: "error"; handler: ErrorRequestHandler };

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "user"). Used in logs. */
  serviceName: string;
  /** Shared secret the Authorization header must equal. */
  authToken: string;
  /** Per-app fault record read by the diagnostic error route. */
  faults: FaultLog;
  /**
   * Mounts the service's routes onto the provided Router.
   * Routes are one-liners that reference handlers only.
   */
  mountRoutes: (router: Router) => void;
  /** JSON body limit (express.json syntax). Defaults to "1mb". */
  bodyLimit?: string;
  /** Sink for the request/response log stage (defaults to the shared logger). */
  logSink?: RequestLogSink;
};

export function buildPipeline(opts: CreateServiceAppOptions): PipelineStage[] {
  const router = express.Router();
  opts.mountRoutes(router);

  return [
    { name: "requestId", kind: "request", handler: requestIdMiddleware() },
    {
      name: "httpLogger",
      kind: "request",
      handler: makeHttpLogger(opts.serviceName),
    },
    {
      name: "authenticate",
      kind: "request",
      handler: sharedSecretAuth({ token: opts.authToken }),
    },
    {
      name: "logRequestResponse",
      kind: "request",
      handler: logRequestResponse({ sink: opts.logSink }),
    },
    {
      name: "jsonBody",
      kind: "request",
      handler: express.json({ limit: opts.bodyLimit ?? "1mb" }),
    },
    { name: "routes", kind: "request", handler: router },
    { name: "notFound", kind: "request", handler: notFoundMessage() },
    { name: "errorBoundary", kind: "error", handler: errorBoundary(opts.faults) },
    {
      name: "exceptionHandler",
      kind: "error",
      handler: exceptionHandler(opts.faults),
    },
  ];
}

export function mountPipeline(app: Express, stages: PipelineStage[]): void {
  const seen = new Set<string>();
  for (const stage of stages) {
    if (seen.has(stage.name)) {
      throw new Error(`PIPELINE_INVALID: duplicate stage "${stage.name}"`);
    }
    seen.add(stage.name);
    app.use(stage.handler);
  }
}

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const app = express();
  app.disable("x-powered-by");
  mountPipeline(app, buildPipeline(opts));
  return app;
}
