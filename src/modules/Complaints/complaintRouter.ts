// src/modules/Complaints/complaintRouter.ts
import { Router, type Request, type Response, type NextFunction } from "express";
import { actorOf, authMiddleware } from "../../middleware/authMiddleware";
import type { ComplaintService } from "./complaintService";

export function createComplaintRouter(complaintService: ComplaintService) {
  const router = Router();
  router.use(authMiddleware);

  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await complaintService.getAllComplaints(actorOf(req), req.query));
    } catch (err) {
      next(err);
    }
  });

  router.get("/mine", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await complaintService.getOwnComplaints(actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(201).json(await complaintService.fileComplaint(actorOf(req), req.body));
    } catch (err) {
      next(err);
    }
  });

  router.put("/:complaintId/status", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const status: unknown = req.body?.status;
      res.json(await complaintService.setComplaintStatus(actorOf(req), req.params.complaintId, status));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
