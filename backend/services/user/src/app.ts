// backend/services/user/src/app.ts

/**
 * Purpose:
 * - User service app on the shared createServiceApp pipeline.
 * - Store and fault log are injected per app instance; tests build as many
 *   isolated apps as they need.
 */

import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import { FaultLog } from "@shared/http/faultLog";
import type { RequestLogSink } from "@shared/middleware/logRequestResponse";
import { SEED_USERS } from "./models/User";
import { InMemoryUserStore, type UserStore } from "./repo/userStore";
import { UserService } from "./services/userService";
import { mountUserRoutes } from "./routes/userRoutes";

export const SERVICE_NAME = "user";

export type CreateUserAppOptions = {
  authToken: string;
  /** Defaults to a fresh in-memory store seeded with SEED_USERS. */
  store?: UserStore;
  faults?: FaultLog;
  bodyLimit?: string;
  logSink?: RequestLogSink;
};

export function createUserApp(opts: CreateUserAppOptions): Express {
  const store = opts.store ?? new InMemoryUserStore(SEED_USERS);
  const faults = opts.faults ?? new FaultLog();
  const users = new UserService(store);

  return createServiceApp({
    serviceName: SERVICE_NAME,
    authToken: opts.authToken,
    faults,
    bodyLimit: opts.bodyLimit,
    logSink: opts.logSink,
    mountRoutes: (router) => mountUserRoutes(router, { users, faults }),
  });
}
