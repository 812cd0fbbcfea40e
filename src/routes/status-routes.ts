import { Router } from "express";
import { StatusController } from "../controllers/status-controller";

export function statusRoutes(controller: StatusController): Router {
  const router = Router();

  // GET /api/status
  router.get("/", controller.status);

  return router;
}
