// src/test-utils/db.ts
// In-process postgres for tests, with the real migrations (and trigger) applied.
import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import { migrate } from "drizzle-orm/pglite/migrator";
import { sql } from "drizzle-orm";
import * as schema from "../db/schema";
import { MIGRATIONS_FOLDER, type Database } from "../db/database";
import { createCustomer } from "../services/customers";
import { createMovie } from "../services/movies";

export type TestDb = {
  db: Database;
  reset: () => Promise<void>;
  close: () => Promise<void>;
};

export async function createTestDb(): Promise<TestDb> {
  const client = new PGlite();
  const pglite = drizzle(client, { schema });
  await migrate(pglite, { migrationsFolder: MIGRATIONS_FOLDER });
  const db: Database = pglite;

  return {
    db,
    reset: async () => {
      await db.execute(sql`truncate table late_return_log, rentals, movies, customers restart identity`);
    },
    close: () => client.close(),
  };
}

let seq = 0;

/** Customer with unique email/phone unless given. */
export function aCustomer(db: Database, name = "Test Customer", overrides: { email?: string; phone?: string } = {}) {
  seq += 1;
  return createCustomer(db, {
    name,
    email: overrides.email ?? `customer${seq}@example.test`,
    phone: overrides.phone ?? `+1555000${String(seq).padStart(4, "0")}`,
  });
}

export function aMovie(db: Database, title = "Test Movie", genre = "Drama") {
  return createMovie(db, { title, genre, releaseYear: 2020 });
}
