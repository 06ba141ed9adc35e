import { type NextFunction, type Request, type Response, Router } from "express";
import createTaskController, { type TaskControllerDeps } from "../controllers/taskController";

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

// Express 4 does not forward rejected promises to the error middleware.
const handle = (fn: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
  fn(req, res).catch(next);
};

export function taskRoutes(deps: TaskControllerDeps) {
  const controller = createTaskController(deps);
  const router = Router();

  router.get("/", handle(controller.list));
  router.post("/add", handle(controller.add));
  router.get("/edit/:id(\\d+)", handle(controller.editForm));
  router.post("/edit/:id(\\d+)", handle(controller.edit));
  router.get("/delete/:id(\\d+)", handle(controller.remove));
  router.get("/complete/:id(\\d+)", handle(controller.complete));

  return router;
}
