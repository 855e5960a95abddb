// src/validators/reports.ts
import { z } from "zod";

export const MultiMonthQuery = z.object({
  year: z.coerce.number().int().min(1900).max(2100),
  minMonths: z.coerce.number().int().min(1).max(12).default(2),
});

export type MultiMonthInput = z.infer<typeof MultiMonthQuery>;
