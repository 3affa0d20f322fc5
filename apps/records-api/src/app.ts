import express, { Express, NextFunction, Request, Response } from "express";
import compression from "compression";
import helmet from "helmet";
import { isHttpError, StorageError } from "./errors";
import { RecordHandler } from "./handlers";
import { logger } from "./logger";
import { RecordRepository } from "./repository";
import { createRouter } from "./routes";

export interface AppDeps {
  repository: RecordRepository;
  requestTimeoutMs: number;
  bodyLimit?: string;
}

export function createApp({ repository, requestTimeoutMs, bodyLimit = "1mb" }: AppDeps): Express {
  const app = express();

  app.use(helmet()); // secure HTTP headers
  app.use(compression());
  app.use(express.json({ limit: bodyLimit }));

  // Request logger middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      logger.info({
        method: req.method,
        path: req.path,
        status: res.statusCode,
        ms: Date.now() - start,
      });
    });
    next();
  });

  app.use(createRouter(new RecordHandler(repository, { requestTimeoutMs })));

  // Error handler: the one place errors turn into statuses.
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);

    // Client already gone: nothing to answer.
    if (res.destroyed) {
      logger.warn({ err, path: req.path }, "Request aborted by client");
      return;
    }

    // express.json(): malformed JSON (400), body too large (413), ...
    if (isHttpError(err) && err.status >= 400 && err.status < 500) {
      logger.warn({ err: err.message, path: req.path }, "Rejected request body");
      res.status(err.status).type("text/plain").send(err.expose === false ? "bad request" : err.message);
      return;
    }

    const message = err instanceof Error ? err.message : "internal server error";
    logger.error({ err, path: req.path }, err instanceof StorageError ? "Storage failure" : "Unhandled error");
    res.status(500).type("text/plain").send(message);
  });

  return app;
}
