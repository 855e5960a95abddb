// src/routes/lateReturns.ts
// Read-only: log rows are written by the database trigger only.
import { Router } from "express";
import type { Database } from "../db/database";
import { listLateReturns } from "../services/lateReturns";
import { LateReturnQuery } from "../validators/lateReturns";

export function lateReturnsRouter(db: Database) {
  const router = Router();

  router.get("/", async (req, res, next) => {
    try {
      const filter = LateReturnQuery.parse(req.query);
      res.json(await listLateReturns(db, filter));
    } catch (e) { next(e); }
  });

  return router;
}
