// src/validators/movies.ts
import { z } from "zod";

export const MovieCreate = z.object({
  title: z.string().trim().min(1).max(200),
  genre: z.string().trim().min(1).max(60),
  releaseYear: z.coerce.number().int().min(1888).max(2100).optional(),
});

export const MovieListQuery = z.object({
  genre: z.string().trim().min(1).optional(),
});

export type MovieCreateInput = z.infer<typeof MovieCreate>;
