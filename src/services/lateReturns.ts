// src/services/lateReturns.ts
import { desc, eq, isNotNull } from "drizzle-orm";
import type { Database } from "../db/database";
import { lateReturnLog, type LateReturn } from "../db/schema";

export type LateReturnFilter = {
  rentalId?: string;
  /** keep only the newest entry per rental */
  latest?: boolean;
};

/**
 * Reads the late-return log, newest first.
 *
 * The log is append-only, so a rental whose return date was corrected keeps
 * its earlier entries. `latest` collapses each rental to its most recent
 * entry; entries whose rental was deleted (rental_id null) are left out of
 * that view since there is nothing to collapse them on.
 */
export async function listLateReturns(db: Database, filter: LateReturnFilter = {}): Promise<LateReturn[]> {
  const byRental = filter.rentalId ? eq(lateReturnLog.rentalId, filter.rentalId) : undefined;

  if (!filter.latest) {
    return db.select().from(lateReturnLog).where(byRental).orderBy(desc(lateReturnLog.id));
  }

  const rows = await db
    .selectDistinctOn([lateReturnLog.rentalId])
    .from(lateReturnLog)
    .where(byRental ?? isNotNull(lateReturnLog.rentalId))
    .orderBy(lateReturnLog.rentalId, desc(lateReturnLog.id));
  return rows.sort((a, b) => b.id - a.id);
}
