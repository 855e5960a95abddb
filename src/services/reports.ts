// src/services/reports.ts
// Read-only aggregates. Every single-row report has an explicit tie-break so
// the answer does not depend on scan order.
import { asc, count, countDistinct, desc, eq, gte, isNotNull, sql } from "drizzle-orm";
import type { Database } from "../db/database";
import { customers, movies, rentals } from "../db/schema";
import type { MultiMonthInput } from "../validators/reports";

export type CustomerRentalCount = {
  rank: number;
  customerId: string;
  name: string;
  rentalCount: number;
};

export type MovieDuration = {
  movieId: string;
  title: string;
  averageDays: number;
  returnedRentals: number;
};

export type MultiMonthCustomer = {
  customerId: string;
  name: string;
  months: number;
};

export type GenreCount = {
  genre: string;
  rentalCount: number;
};

/**
 * Customers ranked by how many rentals they have, returned or not.
 * Customers without rentals are listed with 0. Equal counts share a rank.
 */
export function topCustomers(db: Database): Promise<CustomerRentalCount[]> {
  const rentalCount = count(rentals.id);
  return db
    .select({
      rank: sql<number>`dense_rank() over (order by ${rentalCount} desc)`.mapWith(Number),
      customerId: customers.id,
      name: customers.name,
      rentalCount
    })
    .from(customers)
    .leftJoin(rentals, eq(rentals.customerId, customers.id))
    .groupBy(customers.id)
    .orderBy(desc(rentalCount), asc(customers.name), asc(customers.id));
}

/** Movie with the highest average days out over its returned rentals; ties go to the lower id. */
export async function longestRentedMovie(db: Database): Promise<MovieDuration | null> {
  const averageDays = sql<number>`avg(${rentals.returnDate} - ${rentals.rentalDate})`.mapWith(Number);
  const [row] = await db
    .select({
      movieId: movies.id,
      title: movies.title,
      averageDays,
      returnedRentals: count(rentals.id)
    })
    .from(rentals)
    .innerJoin(movies, eq(rentals.movieId, movies.id))
    .where(isNotNull(rentals.returnDate))
    .groupBy(movies.id)
    .orderBy(desc(averageDays), asc(movies.id))
    .limit(1);
  return row ?? null;
}

/** Customers who rented in at least `minMonths` distinct calendar months of `year`. */
export function multiMonthCustomers(
  db: Database,
  { year, minMonths }: MultiMonthInput
): Promise<MultiMonthCustomer[]> {
  const months = countDistinct(sql`extract(month from ${rentals.rentalDate})`);
  return db
    .select({
      customerId: customers.id,
      name: customers.name,
      months
    })
    .from(customers)
    .innerJoin(rentals, eq(rentals.customerId, customers.id))
    .where(sql`extract(year from ${rentals.rentalDate})::int = ${year}`)
    .groupBy(customers.id)
    .having(gte(months, minMonths))
    .orderBy(asc(customers.name), asc(customers.id));
}

/** Genre with the most rentals; ties go to the alphabetically first genre. */
export async function topGenre(db: Database): Promise<GenreCount | null> {
  const rentalCount = count(rentals.id);
  const [row] = await db
    .select({ genre: movies.genre, rentalCount })
    .from(rentals)
    .innerJoin(movies, eq(rentals.movieId, movies.id))
    .groupBy(movies.genre)
    .orderBy(desc(rentalCount), asc(movies.genre))
    .limit(1);
  return row ?? null;
}
