// src/routes/movies.ts
import { Router } from "express";
import type { Database } from "../db/database";
import { createMovie, deleteMovie, getMovie, listMovies } from "../services/movies";
import { MovieCreate, MovieListQuery } from "../validators/movies";

export function moviesRouter(db: Database) {
  const router = Router();

  // ?genre=Action
  router.get("/", async (req, res, next) => {
    try {
      const filter = MovieListQuery.parse(req.query);
      res.json(await listMovies(db, filter));
    } catch (e) { next(e); }
  });

  router.post("/", async (req, res, next) => {
    try {
      const input = MovieCreate.parse(req.body ?? {});
      res.status(201).json(await createMovie(db, input));
    } catch (e) { next(e); }
  });

  router.get("/:id", async (req, res, next) => {
    try {
      const row = await getMovie(db, req.params.id);
      if (!row) return res.status(404).json({ error: "not_found" });
      res.json(row);
    } catch (e) { next(e); }
  });

  router.delete("/:id", async (req, res, next) => {
    try {
      const deleted = await deleteMovie(db, req.params.id);
      if (!deleted) return res.status(404).json({ error: "not_found" });
      res.status(204).end();
    } catch (e) { next(e); }
  });

  return router;
}
