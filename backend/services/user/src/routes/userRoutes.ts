// backend/services/user/src/routes/userRoutes.ts
import type { Router } from "express";
import type { FaultLog } from "@shared/http/faultLog";
import type { UserService } from "../services/userService";

// Direct handler imports (no barrels)
import { makeList } from "../controllers/handlers/list";
import { makeGetById } from "../controllers/handlers/getById";
import { makeCreate } from "../controllers/handlers/create";
import { makeUpdate } from "../controllers/handlers/update";
import { makeRemove } from "../controllers/handlers/remove";
import { makeErrorReport } from "../controllers/handlers/error";

export type UserRouteDeps = {
  users: UserService;
  faults: FaultLog;
};

/**
 * Policy:
 * - POST /users creates (store assigns id), PUT /users/:id overwrites.
 * - Auth is a pipeline stage; no per-route auth here.
 */
export function mountUserRoutes(router: Router, deps: UserRouteDeps): void {
  // one-liners only, no logic here
  router.get("/users", makeList(deps.users));
  router.get("/users/:id", makeGetById(deps.users));
  router.post("/users", makeCreate(deps.users));
  router.put("/users/:id", makeUpdate(deps.users));
  router.delete("/users/:id", makeRemove(deps.users));

  // diagnostics
  router.get("/error", makeErrorReport(deps.faults));
}
