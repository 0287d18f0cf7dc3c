import express, { type Request, type Response } from "express";
import type { OverviewDashboardResponse, UserDashboardResponse } from "@keyprint/core";
import { sendError } from "../errors";
import type { StorageAdapter } from "../storage/adapter";
import { parseUsername } from "./validation";

export const RECENT_SESSION_LIMIT = 10;

export function createDashboardRouter(args: { storage: StorageAdapter }) {
  const router = express.Router();

  router.get("/dashboard/overview", async (_req: Request, res: Response) => {
    const response: OverviewDashboardResponse = {
      ok: true,
      overview: await args.storage.getOverviewStats(),
    };
    res.json(response);
  });

  router.get("/dashboard/users/:username", async (req: Request<{ username: string }>, res: Response) => {
    const username = parseUsername(req.params.username);
    if (!username.ok) {
      sendError(res, 400, "VALIDATION_ERROR", username.message, { field: username.field });
      return;
    }

    const user = await args.storage.findUserByName(username.value);
    const dashboard = user ? await args.storage.getUserDashboard(user.id, RECENT_SESSION_LIMIT) : null;
    if (!dashboard) {
      sendError(res, 404, "USER_NOT_FOUND", `No user named "${username.value}".`);
      return;
    }

    const response: UserDashboardResponse = { ok: true, dashboard };
    res.json(response);
  });

  return router;
}
