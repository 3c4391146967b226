// backend/services/user/src/controllers/handlers/list.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { guard, invalid, sendResult } from "@shared/http/results";
import { logger } from "@shared/utils/logger";
import type { UserService } from "../../services/userService";
import { zListQuery } from "../../validators/user.dto";

export const MSG_BAD_PAGING = "page and pageSize must be integers";

// GET /users?page=&pageSize=
export function makeList(svc: UserService): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = req.requestId;
    logger.debug({ requestId }, "[UserHandlers.list] enter");

    const result = await guard(async () => {
      const q = zListQuery.safeParse(req.query);
      if (!q.success) return invalid(MSG_BAD_PAGING);
      return svc.list(q.data);
    });

    logger.debug({ requestId, kind: result.kind }, "[UserHandlers.list] exit");
    sendResult(req, res, result);
  });
}
