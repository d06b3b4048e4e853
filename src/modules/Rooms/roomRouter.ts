// src/modules/Rooms/roomRouter.ts
import { Router, type Request, type Response, type NextFunction } from "express";
import { actorOf, authMiddleware } from "../../middleware/authMiddleware";
import type { RoomService } from "./roomService";

export function createRoomRouter(roomService: RoomService) {
  const router = Router();
  router.use(authMiddleware);

  //  All rooms with their current tenant count
  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await roomService.getAllRooms(actorOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.get("/:roomId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await roomService.getRoomById(actorOf(req), req.params.roomId));
    } catch (err) {
      next(err);
    }
  });

  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(201).json(await roomService.createRoom(actorOf(req), req.body));
    } catch (err) {
      next(err);
    }
  });

  router.put("/:roomId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await roomService.updateRoom(actorOf(req), req.params.roomId, req.body));
    } catch (err) {
      next(err);
    }
  });

  //  Tenants in the room lose their assignment
  router.delete("/:roomId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await roomService.deleteRoom(actorOf(req), req.params.roomId));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
