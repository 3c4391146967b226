// backend/services/shared/contracts/common.ts
import { z } from "zod";

/** Expected client failure (400/404): `{ "Message": text }` */
export const zMessageBody = z.object({
  Message: z.string(),
});

/** Pipeline-level 500 from the error boundary */
export const zInternalError = z.object({
  error: z.literal("Internal server error."),
});

/** RFC 7807 Problem+JSON */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
});

export type Problem = z.infer<typeof zProblem>;
