// backend/services/user/src/config.ts
import { optionalEnv, requireNumber } from "@shared/config/env";

// Service name lives in app.ts; LOG_LEVEL is read by the shared logger.

export const config = {
  port: requireNumber("USER_PORT"),
  authToken: optionalEnv("USER_AUTH_TOKEN", "valid-token"),
  bodyLimit: optionalEnv("USER_BODY_LIMIT", "1mb"),
} as const;
