// src/validators/rentals.ts
import { z } from "zod";

// Calendar date, e.g. "2025-02-01"
export const IsoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "date must be YYYY-MM-DD")
  .refine((s) => {
    const d = new Date(`${s}T00:00:00Z`);
    return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === s;
  }, "not a calendar date");

const returnNotBeforeRental = (v: { rentalDate?: string; returnDate?: string | null }) =>
  !v.rentalDate || !v.returnDate || v.returnDate >= v.rentalDate;

const RETURN_BEFORE_RENTAL = { message: "returnDate must not be before rentalDate", path: ["returnDate"] };

export const RentalCreate = z
  .object({
    customerId: z.string().min(10),
    movieId: z.string().min(10),
    rentalDate: IsoDate,
    returnDate: IsoDate.nullish(),
  })
  .refine(returnNotBeforeRental, RETURN_BEFORE_RENTAL);

export const RentalReturn = z.object({
  returnDate: IsoDate,
});

// date correction; at least one field
export const RentalUpdate = z
  .object({
    rentalDate: IsoDate.optional(),
    returnDate: IsoDate.nullable().optional(),
  })
  .refine((v) => v.rentalDate !== undefined || v.returnDate !== undefined, "nothing to update")
  .refine(returnNotBeforeRental, RETURN_BEFORE_RENTAL);

export const RentalListQuery = z.object({
  outstanding: z.enum(["true", "false"]).transform((v) => v === "true").optional(),
  customerId: z.string().min(10).optional(),
});

export type RentalCreateInput = z.infer<typeof RentalCreate>;
export type RentalUpdateInput = z.infer<typeof RentalUpdate>;
export type RentalListFilter = z.infer<typeof RentalListQuery>;
