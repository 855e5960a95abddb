// src/scripts/migrate.ts
// Usage: npm run build && npm run db:migrate
import { migrate } from "drizzle-orm/node-postgres/migrator";
import { db, pool } from "../db/drizzle";
import { MIGRATIONS_FOLDER } from "../db/database";

async function run() {
  try {
    await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
    console.log("[migrate] database migrations applied");
  } finally {
    await pool.end();
  }
}

run().catch((error: unknown) => {
  console.error("[migrate] failed:", error);
  process.exit(1);
});
