// backend/services/user/src/controllers/handlers/update.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { guard, invalid, sendResult } from "@shared/http/results";
import { logger } from "@shared/utils/logger";
import type { UserService } from "../../services/userService";
import { zIdParam, zUserBody } from "../../validators/user.dto";
import { MSG_BAD_BODY, MSG_BAD_ID } from "./messages";

// PUT /users/:id  (overwrites name + email)
export function makeUpdate(svc: UserService): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = req.requestId;
    logger.debug({ requestId }, "[UserHandlers.update] enter");

    const result = await guard(async () => {
      const p = zIdParam.safeParse(req.params);
      if (!p.success) return invalid(MSG_BAD_ID);
      const body = zUserBody.safeParse(req.body ?? {});
      if (!body.success) return invalid(MSG_BAD_BODY);
      return svc.update(p.data.id, body.data);
    });

    logger.debug(
      { requestId, kind: result.kind },
      "[UserHandlers.update] exit"
    );
    sendResult(req, res, result);
  });
}
