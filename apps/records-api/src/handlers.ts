import { NextFunction, Request, Response } from "express";
import { requestSignal } from "./context";
import { RecordRepository } from "./repository";
import { createRecordSchema, formatIssues } from "./schemas";

export interface RecordHandlerOptions {
  requestTimeoutMs: number;
}

// Decodes requests, calls the repository, encodes responses.
// Storage failures are passed on with next(err); the app's error
// handler is the only place they become HTTP statuses.
export class RecordHandler {
  constructor(
    private readonly repository: RecordRepository,
    private readonly options: RecordHandlerOptions,
  ) {}

  create = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = createRecordSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).type("text/plain").send(formatIssues(parsed.error));
        return;
      }

      await this.repository.create(parsed.data, requestSignal(res, this.options.requestTimeoutMs));
      res.status(201).end();
    } catch (err) {
      next(err);
    }
  };

  getByDate = async (req: Request, res: Response, next: NextFunction) => {
    // Passed through as-is: the store decides what a date is.
    const { date } = req.query;
    if (typeof date !== "string") {
      res.status(400).type("text/plain").send("date query parameter is required");
      return;
    }

    try {
      const records = await this.repository.getByDate(date, requestSignal(res, this.options.requestTimeoutMs));
      res.status(200).json(records);
    } catch (err) {
      next(err);
    }
  };
}
