import express, { type Request, type Response } from "express";
import type { HealthResponse } from "@keyprint/core";
import type { StorageAdapter } from "../storage/adapter";

export function createHealthRouter(args: { storage: StorageAdapter }) {
  const router = express.Router();

  router.get("/health", async (_req: Request, res: Response) => {
    const databaseUp = await args.storage.ping();
    const response: HealthResponse = {
      ok: databaseUp,
      status: databaseUp ? "up" : "degraded",
      database: databaseUp ? "up" : "down",
    };
    res.status(databaseUp ? 200 : 503).json(response);
  });

  return router;
}
