// src/services/rentals.ts
// Rentals are written with plain INSERT/UPDATE; late-return logging is the
// job of trg_rentals_late_return (migrations/0001_late_return_trigger.sql).
import { and, desc, eq, isNotNull, isNull, type SQL } from "drizzle-orm";
import type { Database } from "../db/database";
import { rentals, type Rental } from "../db/schema";
import { DomainError } from "../utils/errors";
import { newId } from "../utils/id";
import type { RentalCreateInput, RentalListFilter, RentalUpdateInput } from "../validators/rentals";

/** Grace period before a return is considered late. */
export const RENTAL_WINDOW_DAYS = 7;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Whole days between two YYYY-MM-DD dates, same as `date - date` in postgres. */
export function daysBetween(from: string, to: string): number {
  return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / MS_PER_DAY);
}

/** Days the database will log for this rental, or null if it is on time or still out. */
export function lateDays(rental: Pick<Rental, "rentalDate" | "returnDate">): number | null {
  if (!rental.returnDate) return null;
  const days = daysBetween(rental.rentalDate, rental.returnDate);
  return days > RENTAL_WINDOW_DAYS ? days : null;
}

function assertDateOrder(rentalDate: string, returnDate: string | null) {
  if (returnDate && returnDate < rentalDate) {
    throw new DomainError("invalid_dates", "returnDate must not be before rentalDate");
  }
}

export async function checkoutRental(db: Database, input: RentalCreateInput): Promise<Rental> {
  const returnDate = input.returnDate ?? null;
  assertDateOrder(input.rentalDate, returnDate);
  const [row] = await db
    .insert(rentals)
    .values({
      id: newId(),
      customerId: input.customerId,
      movieId: input.movieId,
      rentalDate: input.rentalDate,
      returnDate
    })
    .returning();
  return row;
}

export async function getRental(db: Database, id: string): Promise<Rental | null> {
  const [row] = await db.select().from(rentals).where(eq(rentals.id, id));
  return row ?? null;
}

export function listRentals(db: Database, filter: RentalListFilter = {}): Promise<Rental[]> {
  const conds: SQL[] = [];
  if (filter.outstanding === true) conds.push(isNull(rentals.returnDate));
  if (filter.outstanding === false) conds.push(isNotNull(rentals.returnDate));
  if (filter.customerId) conds.push(eq(rentals.customerId, filter.customerId));

  return db
    .select()
    .from(rentals)
    .where(and(...conds))
    .orderBy(desc(rentals.rentalDate), desc(rentals.id));
}

/**
 * Changes rental and/or return date. Every write that leaves return_date
 * set re-runs the lateness check, so a late rental that is updated again
 * gets another log entry.
 */
export async function updateRental(db: Database, id: string, patch: RentalUpdateInput): Promise<Rental | null> {
  const current = await getRental(db, id);
  if (!current) return null;

  const rentalDate = patch.rentalDate ?? current.rentalDate;
  const returnDate = patch.returnDate === undefined ? current.returnDate : patch.returnDate;
  assertDateOrder(rentalDate, returnDate);

  const [row] = await db
    .update(rentals)
    .set({ rentalDate, returnDate })
    .where(eq(rentals.id, id))
    .returning();
  return row ?? null;
}

/** Check-in. A returned rental is only changed through updateRental. */
export async function returnRental(db: Database, id: string, returnDate: string): Promise<Rental | null> {
  const current = await getRental(db, id);
  if (!current) return null;
  if (current.returnDate !== null) {
    throw new DomainError("already_returned", `rental was already returned on ${current.returnDate}`, 409);
  }
  return updateRental(db, id, { returnDate });
}
