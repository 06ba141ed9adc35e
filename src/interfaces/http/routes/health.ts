import { Router } from "express";
import { createHealthController } from "../controllers/healthController";
import type { Logger } from "../../../infrastructure/logging/logger";

export function healthRoutes(checkStorage: () => Promise<void>, logger: Logger) {
  const router = Router();
  router.get("/health", createHealthController(checkStorage, logger));
  return router;
}
