// src/routes/health.ts
import { Router } from "express";
import { sql } from "drizzle-orm";
import type { Database } from "../db/database";

export function healthRouter(db: Database) {
  const health = Router();

  health.get("/", async (_req, res) => {
    try {
      await db.execute(sql`select 1`);
      res.json({ ok: true, db: "up" });
    } catch (e) {
      console.error("[health] database check failed", e);
      res.status(503).json({ ok: false, db: "down" });
    }
  });

  return health;
}
