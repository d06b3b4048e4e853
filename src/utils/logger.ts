// src/utils/logger.ts
import pino from "pino";
import { env } from "../config/env";

export const logger = pino({
  name: "hostel-manager",
  level: env.LOG_LEVEL ?? (env.isProduction ? "info" : "debug"),
  redact: {
    paths: ["password", "passwordHash", "token", "req.headers.cookie", "req.headers.authorization"],
    remove: true,
  },
});
