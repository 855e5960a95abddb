// src/db/drizzle.ts
import { Pool } from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import * as schema from "./schema";
import { ENV } from "../env";

if (!ENV.DATABASE_URL) {
  throw new Error("DATABASE_URL is missing in environment variables");
}

export const pool = new Pool({ connectionString: ENV.DATABASE_URL });

export const db = drizzle(pool, { schema, logger: ENV.DB_LOG });
