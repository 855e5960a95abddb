import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { sql } from "drizzle-orm";
import { lateReturnLog, rentals } from "../../db/schema";
import { aCustomer, aMovie, createTestDb, type TestDb } from "../../test-utils/db";
import {
  checkoutRental, daysBetween, getRental, lateDays, listRentals, returnRental, updateRental
} from "../rentals";
import { DomainError } from "../../utils/errors";

describe("rentals + late-return trigger", () => {
  let t: TestDb;

  beforeAll(async () => {
    t = await createTestDb();
  });
  afterAll(async () => {
    await t.close();
  });
  beforeEach(async () => {
    await t.reset();
  });

  async function setup() {
    const customer = await aCustomer(t.db, "Ada");
    const movie = await aMovie(t.db, "Heat", "Action");
    return { customer, movie };
  }

  const logRows = () => t.db.select().from(lateReturnLog).orderBy(lateReturnLog.id);

  it("logs 19 days for a rental returned on 2025-02-20 after 2025-02-01", async () => {
    const { customer, movie } = await setup();
    const rental = await checkoutRental(t.db, {
      customerId: customer.id,
      movieId: movie.id,
      rentalDate: "2025-02-01",
      returnDate: "2025-02-20"
    });

    const rows = await logRows();
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      rentalId: rental.id,
      customerId: customer.id,
      movieId: movie.id,
      daysLate: 19
    });
    expect(rows[0].createdAt).toBeInstanceOf(Date);
  });

  it("does not log a rental returned within 5 days", async () => {
    const { customer, movie } = await setup();
    await checkoutRental(t.db, {
      customerId: customer.id,
      movieId: movie.id,
      rentalDate: "2025-03-01",
      returnDate: "2025-03-06"
    });
    expect(await logRows()).toHaveLength(0);
  });

  it("treats exactly 7 days as on time and 8 as late", async () => {
    const { customer, movie } = await setup();
    await checkoutRental(t.db, {
      customerId: customer.id, movieId: movie.id, rentalDate: "2025-01-01", returnDate: "2025-01-08"
    });
    expect(await logRows()).toHaveLength(0);

    await checkoutRental(t.db, {
      customerId: customer.id, movieId: movie.id, rentalDate: "2025-01-01", returnDate: "2025-01-09"
    });
    const rows = await logRows();
    expect(rows.map((r) => r.daysLate)).toEqual([8]);
  });

  it("does not log outstanding rentals however old", async () => {
    const { customer, movie } = await setup();
    const rental = await checkoutRental(t.db, {
      customerId: customer.id, movieId: movie.id, rentalDate: "2020-01-01"
    });
    expect(rental.returnDate).toBeNull();

    // unrelated update while still out
    await updateRental(t.db, rental.id, { rentalDate: "2019-06-01" });
    expect(await logRows()).toHaveLength(0);
  });

  it("logs when a late rental is returned through an update", async () => {
    const { customer, movie } = await setup();
    const rental = await checkoutRental(t.db, {
      customerId: customer.id, movieId: movie.id, rentalDate: "2025-04-01"
    });

    const returned = await returnRental(t.db, rental.id, "2025-04-15");
    expect(returned?.returnDate).toBe("2025-04-15");

    const rows = await logRows();
    expect(rows).toHaveLength(1);
    expect(rows[0].daysLate).toBe(14);
  });

  it("appends another entry for every later write and never retracts", async () => {
    const { customer, movie } = await setup();
    const rental = await checkoutRental(t.db, {
      customerId: customer.id, movieId: movie.id, rentalDate: "2025-05-01", returnDate: "2025-05-21"
    });

    // corrected to 12 days: still late, second entry
    await updateRental(t.db, rental.id, { returnDate: "2025-05-13" });
    // corrected to on time: nothing new, nothing removed
    await updateRental(t.db, rental.id, { returnDate: "2025-05-03" });

    const rows = await logRows();
    expect(rows.map((r) => r.daysLate)).toEqual([20, 12]);
  });

  it("rolls the rental write back when the log insert fails", async () => {
    const { customer, movie } = await setup();
    await t.db.execute(sql`alter table late_return_log add constraint test_cap check (days_late < 10)`);
    try {
      await expect(
        checkoutRental(t.db, {
          customerId: customer.id, movieId: movie.id, rentalDate: "2025-02-01", returnDate: "2025-02-20"
        })
      ).rejects.toThrow();

      expect(await t.db.select().from(rentals)).toHaveLength(0);
      expect(await logRows()).toHaveLength(0);
    } finally {
      await t.db.execute(sql`alter table late_return_log drop constraint test_cap`);
    }
  });

  it("rejects a return date before the rental date", async () => {
    const { customer, movie } = await setup();
    const rental = await checkoutRental(t.db, {
      customerId: customer.id, movieId: movie.id, rentalDate: "2025-06-10"
    });
    await expect(returnRental(t.db, rental.id, "2025-06-01")).rejects.toBeInstanceOf(DomainError);
    expect((await getRental(t.db, rental.id))?.returnDate).toBeNull();
  });

  it("refuses to return a rental twice and leaves the log alone", async () => {
    const { customer, movie } = await setup();
    const rental = await checkoutRental(t.db, {
      customerId: customer.id, movieId: movie.id, rentalDate: "2025-02-01"
    });
    await returnRental(t.db, rental.id, "2025-02-20");

    const second = returnRental(t.db, rental.id, "2025-02-25");
    await expect(second).rejects.toBeInstanceOf(DomainError);
    await expect(second).rejects.toMatchObject({ code: "already_returned", status: 409 });

    expect((await getRental(t.db, rental.id))?.returnDate).toBe("2025-02-20");
    expect((await logRows()).map((r) => r.daysLate)).toEqual([19]);
  });

  it("returns null when updating a missing rental", async () => {
    expect(await returnRental(t.db, "01JNOTAREALRENTALID0000000", "2025-01-01")).toBeNull();
  });

  it("filters outstanding rentals and orders newest first", async () => {
    const { customer, movie } = await setup();
    const a = await checkoutRental(t.db, {
      customerId: customer.id, movieId: movie.id, rentalDate: "2025-01-01", returnDate: "2025-01-03"
    });
    const b = await checkoutRental(t.db, { customerId: customer.id, movieId: movie.id, rentalDate: "2025-02-01" });
    const c = await checkoutRental(t.db, { customerId: customer.id, movieId: movie.id, rentalDate: "2025-03-01" });

    expect((await listRentals(t.db, { outstanding: true })).map((r) => r.id)).toEqual([c.id, b.id]);
    expect((await listRentals(t.db, { outstanding: false })).map((r) => r.id)).toEqual([a.id]);
    expect((await listRentals(t.db)).map((r) => r.id)).toEqual([c.id, b.id, a.id]);
  });
});

describe("lateness helpers", () => {
  it("counts calendar days across month ends", () => {
    expect(daysBetween("2025-02-01", "2025-02-20")).toBe(19);
    expect(daysBetween("2025-01-28", "2025-03-01")).toBe(32);
    expect(daysBetween("2024-02-28", "2024-03-01")).toBe(2);
  });

  it("mirrors the trigger condition", () => {
    expect(lateDays({ rentalDate: "2025-02-01", returnDate: null })).toBeNull();
    expect(lateDays({ rentalDate: "2025-02-01", returnDate: "2025-02-08" })).toBeNull();
    expect(lateDays({ rentalDate: "2025-02-01", returnDate: "2025-02-09" })).toBe(8);
  });
});
