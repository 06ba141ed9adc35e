import type { Request, Response } from "express";
import type { Logger } from "../../../infrastructure/logging/logger";

export const createHealthController = (checkStorage: () => Promise<void>, logger: Logger) => {
  const log = logger.child({ component: "health" });

  return async (_req: Request, res: Response) => {
    try {
      await checkStorage();
    } catch (err) {
      log.warn({ err }, "storage health check failed");
      return res
        .status(503)
        .json({ status: "degraded", database: "unavailable", uptime: process.uptime() });
    }
    return res.status(200).json({ status: "ok", database: "ok", uptime: process.uptime() });
  };
};
