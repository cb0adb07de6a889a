// src/models/pools.ts
import { z } from "zod";

export const ValuePoolsSchema = z.object({
  firstNames: z.array(z.string().min(1)).length(20),
  lastNames: z.array(z.string().min(1)).length(20),
  medicalHistories: z.array(z.string().min(1)).min(1),
});
