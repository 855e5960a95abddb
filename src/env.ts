// src/env.ts
import "dotenv/config";
import { z } from "zod";

const TRUTHY = new Set(["true", "1", "yes", "on"]);

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  DATABASE_URL: z.string().optional(),
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  // drizzle query logging: true/false, 1/0, yes/no, on/off
  DB_LOG: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["true", "false", "1", "0", "yes", "no", "on", "off", ""]))
    .default("false")
    .transform((v) => TRUTHY.has(v)),
});

export type Env = z.infer<typeof EnvSchema>;

export const ENV: Env = EnvSchema.parse(process.env);
