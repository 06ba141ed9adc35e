import path from "path";
import express from "express";
import cookieSession from "cookie-session";
import flash from "connect-flash";
import morgan from "morgan";
import swaggerUi from "swagger-ui-express";
import apiSpec from "./docs/openapi.json";

import type { AppConfig } from "./config";
import type { Logger } from "./infrastructure/logging/logger";
import { httpLogStream } from "./infrastructure/logging/logger";
import type { TaskRepository } from "./core/ports/TaskRepository";
import SqliteTaskRepository from "./infrastructure/repositories/sqliteTaskRepository";
import makeCreateTask from "./core/use-cases/createTask";
import makeListTasks from "./core/use-cases/listTasks";
import makeGetTask from "./core/use-cases/getTask";
import makeUpdateTask from "./core/use-cases/updateTask";
import makeDeleteTask from "./core/use-cases/deleteTask";
import makeCompleteTask from "./core/use-cases/completeTask";

import { makeHttpRouter } from "./interfaces/http/routes";
import { errorHandler } from "./interfaces/http/middlewares/errorHandler";
import { notFound } from "./interfaces/http/middlewares/notFound";

export const VIEWS_DIR = path.join(__dirname, "..", "views");

export interface AppOptions {
  config: AppConfig;
  logger: Logger;
  /** Defaults to the SQLite repository at `config.database.path`. */
  repository?: TaskRepository;
}

export function createApp({ config, logger, repository }: AppOptions) {
  const repo = repository ?? new SqliteTaskRepository(
    { path: config.database.path, busyTimeoutMs: config.database.busyTimeoutMs },
    logger
  );
  const useCases = {
    createTask: makeCreateTask(repo),
    listTasks: makeListTasks(repo),
    getTask: makeGetTask(repo),
    updateTask: makeUpdateTask(repo),
    deleteTask: makeDeleteTask(repo),
    completeTask: makeCompleteTask(repo),
  };

  const app = express();
  app.set("views", VIEWS_DIR);
  app.set("view engine", "ejs");

  app.use(morgan(config.log.httpFormat, { stream: httpLogStream(logger) }));
  app.use(express.urlencoded({ extended: false, limit: "100kb" }));
  app.use(
    cookieSession({
      name: "session",
      keys: [config.sessionSecret],
      httpOnly: true,
      sameSite: "lax",
    })
  );
  // Flash messages travel in the signed cookie; the server keeps no session state.
  app.use(flash());

  // API Docs (Swagger UI)
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(apiSpec));
  app.get("/docs-json", (_req, res) => res.json(apiSpec));

  app.use(makeHttpRouter({ ...useCases, logger, checkStorage: () => repo.ping() }));

  app.use(notFound);
  app.use(errorHandler(logger));

  return app;
}
