// backend/services/user/src/validators/user.dto.ts
import { z } from "zod";

const zIntString = z
  .string()
  .trim()
  .regex(/^-?\d+$/, "Expected an integer")
  .transform((v) => Number(v))
  .refine((n) => Number.isSafeInteger(n), "Integer out of range");

/** Path param `:id`. */
export const zIdParam = z.object({
  id: zIntString,
});

/** GET /users query. Defaults: page=1, pageSize=10. */
export const zListQuery = z.object({
  page: zIntString.default("1"),
  pageSize: zIntString.default("10"),
});

/**
 * Create/replace body. `id` is accepted and ignored; `null` counts as absent.
 * Presence/emptiness is judged by the rules, not here.
 */
export const zUserBody = z.object({
  id: z.unknown().optional(),
  name: z.string().nullish(),
  email: z.string().nullish(),
});

export type IdParam = z.infer<typeof zIdParam>;
export type ListQuery = z.infer<typeof zListQuery>;
export type UserBody = z.infer<typeof zUserBody>;
