// src/db/schema.ts
// Mirrors migrations/*.sql (custom drizzle-kit migrations); the SQL is the source of truth for DDL.
import {
  pgTable, varchar, integer, timestamp, date, index, check
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";

// ── Core ──────────────────────────────────────────────────────────────────────
export const customers = pgTable("customers", {
  id: varchar("id", { length: 26 }).primaryKey(),
  name: varchar("name", { length: 120 }).notNull(),
  email: varchar("email", { length: 160 }).notNull().unique(),
  phone: varchar("phone", { length: 20 }).notNull().unique(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull()
});

export const movies = pgTable("movies", {
  id: varchar("id", { length: 26 }).primaryKey(),
  title: varchar("title", { length: 200 }).notNull(),
  genre: varchar("genre", { length: 60 }).notNull(),
  releaseYear: integer("release_year"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull()
});

// return_date null = still out
export const rentals = pgTable("rentals", {
  id: varchar("id", { length: 26 }).primaryKey(),
  customerId: varchar("customer_id", { length: 26 })
    .references(() => customers.id, { onDelete: "set null" }),
  movieId: varchar("movie_id", { length: 26 })
    .references(() => movies.id, { onDelete: "set null" }),
  rentalDate: date("rental_date", { mode: "string" }).notNull(),
  returnDate: date("return_date", { mode: "string" })
}, (t) => [
  index("idx_rentals_customer").on(t.customerId),
  index("idx_rentals_movie").on(t.movieId)
]);

// ── Late returns: written only by trg_rentals_late_return ────────────────────
export const lateReturnLog = pgTable("late_return_log", {
  id: integer("id").primaryKey().generatedAlwaysAsIdentity(),
  rentalId: varchar("rental_id", { length: 26 })
    .references(() => rentals.id, { onDelete: "set null" }),
  customerId: varchar("customer_id", { length: 26 })
    .references(() => customers.id, { onDelete: "set null" }),
  movieId: varchar("movie_id", { length: 26 })
    .references(() => movies.id, { onDelete: "set null" }),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  daysLate: integer("days_late").notNull()
}, (t) => [
  index("idx_late_return_log_rental").on(t.rentalId),
  check("late_return_log_days_late_check", sql`${t.daysLate} > 0`)
]);

export type Customer = typeof customers.$inferSelect;
export type Movie = typeof movies.$inferSelect;
export type Rental = typeof rentals.$inferSelect;
export type LateReturn = typeof lateReturnLog.$inferSelect;
