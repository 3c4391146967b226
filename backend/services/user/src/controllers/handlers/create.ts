// backend/services/user/src/controllers/handlers/create.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { guard, invalid, sendResult } from "@shared/http/results";
import { logger } from "@shared/utils/logger";
import type { UserService } from "../../services/userService";
import { zUserBody } from "../../validators/user.dto";
import { MSG_BAD_BODY } from "./messages";

// POST /users  (id in the body is ignored; the store assigns it)
export function makeCreate(svc: UserService): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = req.requestId;
    logger.debug({ requestId }, "[UserHandlers.create] enter");

    const result = await guard(async () => {
      const body = zUserBody.safeParse(req.body ?? {});
      if (!body.success) return invalid(MSG_BAD_BODY);
      return svc.create(body.data);
    });

    if (result.kind === "ok") {
      logger.debug(
        { requestId, id: result.body.id },
        "[UserHandlers.create] created"
      );
    }
    sendResult(req, res, result);
  });
}
