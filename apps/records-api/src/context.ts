import { Response } from "express";
import { RequestAbortedError } from "./errors";

/**
 * Cancellation for one request: aborts when the client goes away before
 * the response has been written, or when `timeoutMs` elapses (0 disables
 * the deadline).
 */
export function requestSignal(res: Response, timeoutMs: number): AbortSignal {
  const controller = new AbortController();

  const timer =
    timeoutMs > 0
      ? setTimeout(() => controller.abort(RequestAbortedError.deadline(timeoutMs)), timeoutMs)
      : undefined;
  timer?.unref();

  res.on("close", () => {
    clearTimeout(timer);
    if (!res.writableFinished) controller.abort(RequestAbortedError.clientClosed());
  });

  return controller.signal;
}
