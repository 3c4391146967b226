// backend/services/user/src/controllers/handlers/error.ts
import type { RequestHandler } from "express";
import type { FaultLog } from "@shared/http/faultLog";
import { sendProblem } from "@shared/http/problem";
import { faultProblem } from "@shared/middleware/problemJson";

// GET /error  (diagnostic; always 500, detail = last recorded fault)
export function makeErrorReport(faults: FaultLog): RequestHandler {
  return (req, res) => {
    sendProblem(res, faultProblem(faults.last(), req.requestId));
  };
}
