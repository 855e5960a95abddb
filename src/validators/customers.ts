// src/validators/customers.ts
import { z } from "zod";

export const CustomerCreate = z.object({
  name: z.string().trim().min(2).max(120),
  email: z.string().trim().toLowerCase().email().max(160),
  phone: z.string().regex(/^\+?\d{7,15}$/, "phone must be 7-15 digits, optional leading +"),
});

export type CustomerCreateInput = z.infer<typeof CustomerCreate>;
