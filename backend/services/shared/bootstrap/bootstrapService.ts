// backend/services/shared/bootstrap/bootstrapService.ts

/**
 * Purpose:
 * - Deterministic start-up for a service:
 *     1) env cascade (repo → family → service)
 *     2) strict required-env check
 *     3) logger init (after env is present)
 *     4) createApp (lazy, so config reads the loaded env)
 *     5) HTTP bind
 */

import type { Express } from "express";
import { loadEnvCascadeForService, assertEnv } from "../env";
import { startHttpService, type StartedService } from "./startHttpService";

/** What createApp hands back: the app and the port from the service config. */
export type ServiceApp = {
  app: Express;
  port: number;
};

export type BootstrapOptions = {
  serviceName: string;
  /** Service root directory (e.g., path.resolve(__dirname) from index.ts) */
  serviceRootAbs: string;
  createApp: () => ServiceApp | Promise<ServiceApp>;
  /** Name of the env var carrying the port for this service. */
  portEnv?: string;
  /** Additional required env vars (besides the port). */
  requiredEnv?: string[];
};

export async function bootstrapService(
  opts: BootstrapOptions
): Promise<StartedService> {
  const {
    serviceName,
    serviceRootAbs,
    createApp,
    portEnv = "PORT",
    requiredEnv = [],
  } = opts;

  // 1) Env cascade; injected env wins over files.
  const { mode, loaded } = loadEnvCascadeForService(serviceRootAbs);

  // 2) Strict env check.
  assertEnv([portEnv, "LOG_LEVEL", ...requiredEnv]);

  // 3) Logger only after LOG_LEVEL is known.
  const { initLogger } = await import("../utils/logger");
  initLogger(serviceName);
  const { logger } = await import("../utils/logger");
  logger.info({ mode, envFiles: loaded }, `[${serviceName}] env loaded`);

  // 4) App (and the port its config resolved).
  const { app, port } = await createApp();

  // 5) Bind.
  return startHttpService({
    app,
    port,
    serviceName,
    logger,
  });
}
