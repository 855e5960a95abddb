// src/routes/rentals.ts
import { Router } from "express";
import type { Database } from "../db/database";
import {
  checkoutRental, getRental, lateDays, listRentals, returnRental, updateRental
} from "../services/rentals";
import { RentalCreate, RentalListQuery, RentalReturn, RentalUpdate } from "../validators/rentals";

export function rentalsRouter(db: Database) {
  const router = Router();

  // ── GET /api/rentals?outstanding=true&customerId=... ───────────────────────
  router.get("/", async (req, res, next) => {
    try {
      const filter = RentalListQuery.parse(req.query);
      res.json(await listRentals(db, filter));
    } catch (e) { next(e); }
  });

  // ── POST /api/rentals (checkout) ───────────────────────────────────────────
  router.post("/", async (req, res, next) => {
    try {
      const input = RentalCreate.parse(req.body ?? {});
      const rental = await checkoutRental(db, input);
      res.status(201).json({ ...rental, daysLate: lateDays(rental) });
    } catch (e) { next(e); }
  });

  router.get("/:id", async (req, res, next) => {
    try {
      const rental = await getRental(db, req.params.id);
      if (!rental) return res.status(404).json({ error: "not_found" });
      res.json({ ...rental, daysLate: lateDays(rental) });
    } catch (e) { next(e); }
  });

  // ── PATCH /api/rentals/:id (date correction) ───────────────────────────────
  router.patch("/:id", async (req, res, next) => {
    try {
      const patch = RentalUpdate.parse(req.body ?? {});
      const rental = await updateRental(db, req.params.id, patch);
      if (!rental) return res.status(404).json({ error: "not_found" });
      res.json({ ...rental, daysLate: lateDays(rental) });
    } catch (e) { next(e); }
  });

  // ── POST /api/rentals/:id/return ───────────────────────────────────────────
  router.post("/:id/return", async (req, res, next) => {
    try {
      const { returnDate } = RentalReturn.parse(req.body ?? {});
      const rental = await returnRental(db, req.params.id, returnDate);
      if (!rental) return res.status(404).json({ error: "not_found" });
      res.json({ ...rental, daysLate: lateDays(rental) });
    } catch (e) { next(e); }
  });

  return router;
}
