import { Router } from "express";
import { healthRoutes } from "./health";
import { taskRoutes } from "./tasks";
import type { TaskControllerDeps } from "../controllers/taskController";

export interface HttpRouterDeps extends TaskControllerDeps {
  checkStorage: () => Promise<void>;
}

export function makeHttpRouter(deps: HttpRouterDeps) {
  const router = Router();

  router.use(healthRoutes(deps.checkStorage, deps.logger));
  router.use(taskRoutes(deps));

  return router;
}
