import { Router } from "express";
import { RecordHandler } from "./handlers";

export function createRouter(handler: RecordHandler): Router {
  const router = Router();

  router.post("/records", handler.create);
  router.get("/records", handler.getByDate);

  return router;
}
