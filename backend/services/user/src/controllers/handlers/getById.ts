// backend/services/user/src/controllers/handlers/getById.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { guard, invalid, sendResult } from "@shared/http/results";
import { logger } from "@shared/utils/logger";
import type { UserService } from "../../services/userService";
import { zIdParam } from "../../validators/user.dto";
import { MSG_BAD_ID } from "./messages";

// GET /users/:id
export function makeGetById(svc: UserService): RequestHandler {
  return asyncHandler(async (req, res) => {
    logger.debug({ requestId: req.requestId }, "[UserHandlers.getById] enter");

    const result = await guard(async () => {
      const p = zIdParam.safeParse(req.params);
      if (!p.success) return invalid(MSG_BAD_ID);
      return svc.getById(p.data.id);
    });

    sendResult(req, res, result);
  });
}
