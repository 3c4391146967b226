// backend/services/shared/http/problem.ts

/**
 * RFC 7807 Problem+JSON helpers.
 * Keys with undefined values are dropped so bodies stay minimal.
 */

import type { Response } from "express";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export type ProblemBody = {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
};

export type ProblemInput = {
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  type?: string;
};

export function makeProblem(input: ProblemInput): ProblemBody {
  const body: ProblemBody = {
    type: input.type ?? "about:blank",
    title: input.title,
    status: input.status,
  };
  if (input.detail !== undefined) body.detail = input.detail;
  if (input.instance !== undefined) body.instance = input.instance;
  return body;
}

export function sendProblem(res: Response, body: ProblemBody): void {
  res.status(body.status).type(PROBLEM_CONTENT_TYPE).json(body);
}
