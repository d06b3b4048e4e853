// src/modules/Dashboards/dashboardRouter.ts
import { Router, type Request, type Response, type NextFunction } from "express";
import { actorOf, authMiddleware } from "../../middleware/authMiddleware";
import type { DashboardService } from "./dashboardService";

export function createDashboardRouter(dashboardService: DashboardService) {
  const router = Router();
  router.use(authMiddleware);

  router.get("/admin", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await dashboardService.getAdminDashboard(actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.get("/tenant", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await dashboardService.getTenantDashboard(actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
