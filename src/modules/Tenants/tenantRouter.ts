// src/modules/Tenants/tenantRouter.ts
import { Router, type Request, type Response, type NextFunction } from "express";
import { actorOf, authMiddleware } from "../../middleware/authMiddleware";
import type { TenantService } from "./tenantService";

export function createTenantRouter(tenantService: TenantService) {
  const router = Router();
  router.use(authMiddleware);

  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await tenantService.getAllTenants(actorOf(req), req.query));
    } catch (err) {
      next(err);
    }
  });

  //  Own profile and room (tenant)
  router.get("/me", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await tenantService.getOwnProfile(actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  //  Rooms that may be offered to this tenant
  router.get("/:tenantId/assignment", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await tenantService.getAssignmentForm(actorOf(req), req.params.tenantId));
    } catch (err) {
      next(err);
    }
  });

  //  Assign, move or unassign (roomId: null)
  router.put("/:tenantId/room", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await tenantService.assignRoom(actorOf(req), req.params.tenantId, req.body));
    } catch (err) {
      next(err);
    }
  });

  router.delete("/:tenantId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await tenantService.deleteTenant(actorOf(req), req.params.tenantId));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
