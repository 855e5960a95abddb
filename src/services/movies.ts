// src/services/movies.ts
import { asc, eq } from "drizzle-orm";
import type { Database } from "../db/database";
import { movies, type Movie } from "../db/schema";
import { newId } from "../utils/id";
import type { MovieCreateInput } from "../validators/movies";

export async function createMovie(db: Database, input: MovieCreateInput): Promise<Movie> {
  const [row] = await db
    .insert(movies)
    .values({
      id: newId(),
      title: input.title,
      genre: input.genre,
      releaseYear: input.releaseYear ?? null
    })
    .returning();
  return row;
}

export async function getMovie(db: Database, id: string): Promise<Movie | null> {
  const [row] = await db.select().from(movies).where(eq(movies.id, id));
  return row ?? null;
}

export function listMovies(db: Database, filter: { genre?: string } = {}): Promise<Movie[]> {
  return db
    .select()
    .from(movies)
    .where(filter.genre ? eq(movies.genre, filter.genre) : undefined)
    .orderBy(asc(movies.title), asc(movies.id));
}

// rentals and log entries survive with movie_id = null
export async function deleteMovie(db: Database, id: string): Promise<boolean> {
  const gone = await db.delete(movies).where(eq(movies.id, id)).returning({ id: movies.id });
  return gone.length > 0;
}
