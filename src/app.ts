import express from "express";
import {
  StatusSource,
  createStatusController,
} from "./controllers/status-controller";
import { statusRoutes } from "./routes/status-routes";
import { logger } from "./utils/logger";
import { errorMessage } from "./utils/monitor-error";

export function createApp(source: StatusSource): express.Express {
  const app = express();
  const controller = createStatusController(source);

  // Middleware
  app.use(express.json());

  // Routes
  app.use("/api/status", statusRoutes(controller));

  // Health check endpoint
  app.get("/health", controller.health);

  // Error handling middleware
  app.use(
    (
      err: unknown,
      req: express.Request,
      res: express.Response,
      next: express.NextFunction
    ) => {
      logger.error(`Status API error on ${req.method} ${req.path}: ${errorMessage(err)}`);
      res.status(500).json({ error: "Internal Server Error" });
    }
  );

  return app;
}
