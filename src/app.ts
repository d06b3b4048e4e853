// src/app.ts
import express from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import { env } from "./config/env";
import { logger } from "./utils/logger";
import type { ServiceDeps } from "./store";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { createAuthService } from "./modules/Auths/authService";
import { createAuthRouter } from "./modules/Auths/authRouter";
import { createRoomService } from "./modules/Rooms/roomService";
import { createRoomRouter } from "./modules/Rooms/roomRouter";
import { createTenantService } from "./modules/Tenants/tenantService";
import { createTenantRouter } from "./modules/Tenants/tenantRouter";
import { createBillService } from "./modules/Bills/billService";
import { createBillRouter } from "./modules/Bills/billRouter";
import { createComplaintService } from "./modules/Complaints/complaintService";
import { createComplaintRouter } from "./modules/Complaints/complaintRouter";
import { createDashboardService } from "./modules/Dashboards/dashboardService";
import { createDashboardRouter } from "./modules/Dashboards/dashboardRouter";

const corsOptions: cors.CorsOptions = {
  origin: (origin, callback) => {
    if (!origin) return callback(null, true);
    const isAllowed = env.CORS_ORIGINS.includes(origin);
    if (!isAllowed) logger.warn({ origin }, "CORS origin blocked");
    isAllowed ? callback(null, true) : callback(new Error("CORS not allowed"));
  },
  credentials: true,
  methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
  allowedHeaders: ["Content-Type", "Authorization"],
  exposedHeaders: ["Set-Cookie"],
};

export function createApp(deps: ServiceDeps) {
  const app = express();
  app.set("trust proxy", 1);

  // every origin is allowed outside production
  app.use(env.isProduction ? cors(corsOptions) : cors({ origin: true, credentials: true }));
  app.use(express.json());
  app.use(cookieParser());

  // ---------------- Routes ----------------
  app.use("/auth", createAuthRouter(createAuthService(deps)));
  app.use("/dashboard", createDashboardRouter(createDashboardService(deps)));
  app.use("/rooms", createRoomRouter(createRoomService(deps)));
  app.use("/tenants", createTenantRouter(createTenantService(deps)));
  app.use("/bills", createBillRouter(createBillService(deps)));
  app.use("/complaints", createComplaintRouter(createComplaintService(deps)));

  // ---------------- Health Check ----------------
  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", uptime: process.uptime() });
  });

  // ---------------- Error Handler ----------------
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
