// backend/services/shared/middleware/logRequestResponse.ts

/**
 * Purpose:
 * - Log every request line before forwarding, and the final status plus the
 *   full response body once the downstream emits it.
 *
 * Notes:
 * - Every chunk handed to `res.write` / `res.end` is copied (`res.send` and
 *   `res.json` funnel into `end`). The full body is logged when `end` is
 *   called, before the final chunk is written to the real output.
 * - Chunks go out as they are written; copying never delays a streamed
 *   response or changes `headersSent`.
 */

import type { RequestHandler } from "express";
import { logger } from "../utils/logger";

/** Minimal sink; the shared pino logger satisfies it. */
export type RequestLogSink = {
  info: (obj: object, msg: string) => void;
};

export type LogRequestResponseOptions = {
  sink?: RequestLogSink;
};

/** Copy of a write/end chunk; callbacks and empty args yield nothing. */
function chunkBuffer(chunk: unknown, encoding: unknown): Buffer | undefined {
  if (typeof chunk === "string") {
    const enc =
      typeof encoding === "string" && Buffer.isEncoding(encoding)
        ? encoding
        : "utf8";
    return Buffer.from(chunk, enc);
  }
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return undefined;
}

export function logRequestResponse(
  opts: LogRequestResponseOptions = {}
): RequestHandler {
  return (req, res, next) => {
    const sink = opts.sink ?? logger;
    sink.info(
      { requestId: req.requestId, method: req.method, path: req.path },
      `Incoming request: ${req.method} ${req.path}`
    );

    const chunks: Buffer[] = [];
    const capture = (args: unknown[]) => {
      const buf = chunkBuffer(args[0], args[1]);
      if (buf) chunks.push(buf);
    };

    let logged = false;
    const writeOut = () => {
      if (logged) return;
      logged = true;
      const text = Buffer.concat(chunks).toString("utf8");
      sink.info(
        { requestId: req.requestId, status: res.statusCode, body: text },
        `Outgoing response: ${res.statusCode} ${text}`
      );
    };

    const write = res.write;
    res.write = function (this: typeof res, ...args: unknown[]): boolean {
      capture(args);
      const accepted: unknown = Reflect.apply(write, this, args);
      return accepted !== false;
    };

    const end = res.end;
    res.end = function (this: typeof res, ...args: unknown[]) {
      capture(args);
      writeOut();
      Reflect.apply(end, this, args);
      return this;
    };

    next();
  };
}
