import 'dotenv/config';
import { defineConfig } from 'drizzle-kit';

// Both migrations are custom SQL (`npm run db:generate -- --custom --name=...`):
// the trigger cannot be expressed in the drizzle schema.
export default defineConfig({
  schema: './src/db/schema.ts',
  out: './migrations',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? '',
  },
  verbose: true,
  strict: true,
});
