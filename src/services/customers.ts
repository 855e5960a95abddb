// src/services/customers.ts
import { asc, eq } from "drizzle-orm";
import type { Database } from "../db/database";
import { customers, type Customer } from "../db/schema";
import { newId } from "../utils/id";
import type { CustomerCreateInput } from "../validators/customers";

export async function createCustomer(db: Database, input: CustomerCreateInput): Promise<Customer> {
  const [row] = await db.insert(customers).values({ id: newId(), ...input }).returning();
  return row;
}

export async function getCustomer(db: Database, id: string): Promise<Customer | null> {
  const [row] = await db.select().from(customers).where(eq(customers.id, id));
  return row ?? null;
}

export function listCustomers(db: Database): Promise<Customer[]> {
  return db.select().from(customers).orderBy(asc(customers.name), asc(customers.id));
}

/**
 * Rentals and late-return entries keep their rows; their customer_id is
 * set to null by the foreign keys.
 */
export async function deleteCustomer(db: Database, id: string): Promise<boolean> {
  const gone = await db.delete(customers).where(eq(customers.id, id)).returning({ id: customers.id });
  return gone.length > 0;
}
