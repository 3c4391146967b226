// backend/services/user/index.ts

/**
 * Boot order:
 *   env cascade → required env → logger → app (lazy) → listen
 *
 * Config and app are imported only after the cascade so they read the loaded
 * env, never the bare process env.
 */

import "tsconfig-paths/register";
import path from "node:path";
import { bootstrapService } from "@shared/bootstrap/bootstrapService";

const SERVICE_NAME = "user" as const;

process.on("unhandledRejection", (reason) => {
  // eslint-disable-next-line no-console
  console.error(`[${SERVICE_NAME}] unhandledRejection`, reason);
});
process.on("uncaughtException", (err) => {
  // eslint-disable-next-line no-console
  console.error(`[${SERVICE_NAME}] uncaughtException`, err);
  process.exit(1);
});

bootstrapService({
  serviceName: SERVICE_NAME,
  serviceRootAbs: path.resolve(__dirname), // service root (this folder), not /src
  portEnv: "USER_PORT",
  requiredEnv: [],
  createApp: async () => {
    const { config } = await import("./src/config");
    const { createUserApp } = await import("./src/app");
    const app = createUserApp({
      authToken: config.authToken,
      bodyLimit: config.bodyLimit,
    });
    return { app, port: config.port };
  },
}).catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(`[${SERVICE_NAME}] bootstrap failed`, err);
  process.exit(1);
});
