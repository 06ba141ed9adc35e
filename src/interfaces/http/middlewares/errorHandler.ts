import type { NextFunction, Request, Response } from "express";
import type { Logger } from "../../../infrastructure/logging/logger";

export function errorHandler(logger: Logger) {
  const log = logger.child({ component: "http" });

  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    log.error({ err, method: req.method, path: req.originalUrl }, "internal server error");
    if (res.headersSent) return next(err);

    res.status(500).render("500", (renderErr: Error | null, html?: string) => {
      if (renderErr) {
        log.error({ err: renderErr }, "failed to render error page");
        return res.type("text").send("Internal Server Error");
      }
      return res.send(html);
    });
  };
}
