// src/db/database.ts
import path from "node:path";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import type * as schema from "./schema";

/**
 * Driver-agnostic drizzle handle. Production passes the node-postgres
 * instance from ./drizzle, tests pass an in-process PGlite one.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

// drizzle-kit output (see drizzle.config.ts); same path from src/ and dist/
export const MIGRATIONS_FOLDER = path.resolve(__dirname, "../../migrations");
