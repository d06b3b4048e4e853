// src/config/env.ts
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(10000),
  MONGODB_URI: z.string().min(1).default("mongodb://localhost:27017/hostel?replicaSet=rs0"),
  JWT_SECRET: z.string().min(1, "JWT_SECRET must be defined in .env file"),
  CORS_ORIGINS: z.string().optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
  ADMIN_USERNAME: z.string().optional(),
  ADMIN_EMAIL: z.string().optional(),
  ADMIN_PASSWORD: z.string().optional(),
});

const parsed = EnvSchema.parse(process.env);

// CORS_ORIGINS is a comma-separated allow-list, only consulted in production
export const env = {
  ...parsed,
  CORS_ORIGINS: parsed.CORS_ORIGINS
    ? parsed.CORS_ORIGINS.split(",").map((origin) => origin.trim()).filter(Boolean)
    : [],
  isProduction: parsed.NODE_ENV === "production",
};
