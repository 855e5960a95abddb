// src/validators/lateReturns.ts
import { z } from "zod";

export const LateReturnQuery = z.object({
  rentalId: z.string().min(10).optional(),
  latest: z.enum(["true", "false"]).transform((v) => v === "true").default("false"),
});

export type LateReturnQueryInput = z.infer<typeof LateReturnQuery>;
