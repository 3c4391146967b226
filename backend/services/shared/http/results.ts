// backend/services/shared/http/results.ts

/**
 * Purpose:
 * - Handlers return a typed outcome; `sendResult` is the single place that
 *   turns an outcome into an HTTP response.
 *
 * Mapping:
 * - ok       → status (200|201) + JSON body (+ Location when given)
 * - text     → 200 text/plain
 * - invalid  → 400 { Message }
 * - notFound → 404 { Message }
 * - fault    → 500 problem+json, detail = fault message
 */

import type { Request, Response } from "express";
import { messageBody, toError } from "./errors";
import { makeProblem, sendProblem } from "./problem";
import { logger } from "../utils/logger";

export const HANDLER_FAULT_TITLE = "An error occurred";

export type OkResult<T> = {
  kind: "ok";
  status: 200 | 201;
  body: T;
  location?: string;
};
export type TextResult = { kind: "text"; text: string };
export type InvalidResult = { kind: "invalid"; message: string };
export type NotFoundResult = { kind: "notFound"; message: string };
export type FaultResult = { kind: "fault"; error: Error };

export type HandlerResult<T> =
  | OkResult<T>
  | TextResult
  | InvalidResult
  | NotFoundResult
  | FaultResult;

export const ok = <T>(body: T): OkResult<T> => ({
  kind: "ok",
  status: 200,
  body,
});

export const created = <T>(body: T, location: string): OkResult<T> => ({
  kind: "ok",
  status: 201,
  body,
  location,
});

export const text = (value: string): TextResult => ({
  kind: "text",
  text: value,
});

export const invalid = (message: string): InvalidResult => ({
  kind: "invalid",
  message,
});

export const notFound = (message: string): NotFoundResult => ({
  kind: "notFound",
  message,
});

export const fault = (err: unknown): FaultResult => ({
  kind: "fault",
  error: toError(err),
});

/** Failure boundary: a throw/rejection inside `fn` becomes a fault result. */
export async function guard<T>(
  fn: () => Promise<HandlerResult<T>> | HandlerResult<T>
): Promise<HandlerResult<T>> {
  try {
    return await fn();
  } catch (err) {
    return fault(err);
  }
}

export function sendResult<T>(
  req: Request,
  res: Response,
  result: HandlerResult<T>
): void {
  switch (result.kind) {
    case "ok":
      if (result.location) res.location(result.location);
      res.status(result.status).json(result.body);
      return;
    case "text":
      res.status(200).type("text/plain").send(result.text);
      return;
    case "invalid":
      res.status(400).json(messageBody(result.message));
      return;
    case "notFound":
      res.status(404).json(messageBody(result.message));
      return;
    case "fault":
      logger.error(
        {
          requestId: req.requestId,
          path: req.originalUrl,
          err: result.error,
        },
        "handler fault"
      );
      sendProblem(
        res,
        makeProblem({
          title: HANDLER_FAULT_TITLE,
          status: 500,
          detail: result.error.message,
          instance: req.requestId,
        })
      );
      return;
  }
}
