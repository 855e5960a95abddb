// src/routes/reports.ts
import { Router } from "express";
import type { Database } from "../db/database";
import { longestRentedMovie, multiMonthCustomers, topCustomers, topGenre } from "../services/reports";
import { MultiMonthQuery } from "../validators/reports";

export function reportsRouter(db: Database) {
  const router = Router();

  router.get("/top-customers", async (_req, res, next) => {
    try {
      res.json(await topCustomers(db));
    } catch (e) { next(e); }
  });

  router.get("/longest-rented-movie", async (_req, res, next) => {
    try {
      const row = await longestRentedMovie(db);
      if (!row) return res.status(404).json({ error: "no_data" });
      res.json(row);
    } catch (e) { next(e); }
  });

  // ?year=2025&minMonths=2
  router.get("/multi-month-customers", async (req, res, next) => {
    try {
      const input = MultiMonthQuery.parse(req.query);
      res.json(await multiMonthCustomers(db, input));
    } catch (e) { next(e); }
  });

  router.get("/top-genre", async (_req, res, next) => {
    try {
      const row = await topGenre(db);
      if (!row) return res.status(404).json({ error: "no_data" });
      res.json(row);
    } catch (e) { next(e); }
  });

  return router;
}
