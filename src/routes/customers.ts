// src/routes/customers.ts
import { Router } from "express";
import type { Database } from "../db/database";
import { createCustomer, deleteCustomer, getCustomer, listCustomers } from "../services/customers";
import { CustomerCreate } from "../validators/customers";

export function customersRouter(db: Database) {
  const router = Router();

  router.get("/", async (_req, res, next) => {
    try {
      res.json(await listCustomers(db));
    } catch (e) { next(e); }
  });

  router.post("/", async (req, res, next) => {
    try {
      const input = CustomerCreate.parse(req.body ?? {});
      res.status(201).json(await createCustomer(db, input));
    } catch (e) { next(e); }
  });

  router.get("/:id", async (req, res, next) => {
    try {
      const row = await getCustomer(db, req.params.id);
      if (!row) return res.status(404).json({ error: "not_found" });
      res.json(row);
    } catch (e) { next(e); }
  });

  // rentals/log rows keep existing with customer_id = null
  router.delete("/:id", async (req, res, next) => {
    try {
      const deleted = await deleteCustomer(db, req.params.id);
      if (!deleted) return res.status(404).json({ error: "not_found" });
      res.status(204).end();
    } catch (e) { next(e); }
  });

  return router;
}
