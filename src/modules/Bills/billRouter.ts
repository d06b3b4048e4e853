// src/modules/Bills/billRouter.ts
import { Router, type Request, type Response, type NextFunction } from "express";
import { actorOf, authMiddleware } from "../../middleware/authMiddleware";
import type { BillService } from "./billService";

export function createBillRouter(billService: BillService) {
  const router = Router();
  router.use(authMiddleware);

  //  All bills (admin), filterable by status / tenantId / month
  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await billService.getAllBills(actorOf(req), req.query));
    } catch (err) {
      next(err);
    }
  });

  //  Own bills (tenant)
  router.get("/mine", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const bills = await billService.getOwnBills(actorOf(req));
      res.json({ count: bills.length, bills });
    } catch (err) {
      next(err);
    }
  });

  router.get("/:billId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await billService.getBillById(actorOf(req), req.params.billId));
    } catch (err) {
      next(err);
    }
  });

  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(201).json(await billService.createBill(actorOf(req), req.body));
    } catch (err) {
      next(err);
    }
  });

  router.put("/:billId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await billService.updateBill(actorOf(req), req.params.billId, req.body));
    } catch (err) {
      next(err);
    }
  });

  router.delete("/:billId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await billService.deleteBill(actorOf(req), req.params.billId));
    } catch (err) {
      next(err);
    }
  });

  //  Pay own bill; a repeat answers 200 with outcome "noop"
  router.post("/:billId/pay", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await billService.payBill(actorOf(req), req.params.billId));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
