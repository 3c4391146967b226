// backend/services/user/src/controllers/handlers/remove.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { guard, invalid, sendResult } from "@shared/http/results";
import { logger } from "@shared/utils/logger";
import type { UserService } from "../../services/userService";
import { zIdParam } from "../../validators/user.dto";
import { MSG_BAD_ID } from "./messages";

// DELETE /users/:id  (responds with the removed record)
export function makeRemove(svc: UserService): RequestHandler {
  return asyncHandler(async (req, res) => {
    logger.debug({ requestId: req.requestId }, "[UserHandlers.remove] enter");

    const result = await guard(async () => {
      const p = zIdParam.safeParse(req.params);
      if (!p.success) return invalid(MSG_BAD_ID);
      return svc.remove(p.data.id);
    });

    sendResult(req, res, result);
  });
}
