import { z } from "zod";

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

/** Non-negative integer path parameter (schedule ids). */
export const IdParamSchema = z
  .string()
  .regex(/^\d{1,10}$/)
  .transform((v) => Number(v));
