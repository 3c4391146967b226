// backend/services/shared/contracts/user.contract.ts
import { z } from "zod";

/** User as it crosses the wire. `id` is store-assigned. */
export const zUser = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  email: z.string().min(1),
});
export type UserWire = z.infer<typeof zUser>;

export const zUserList = z.array(zUser);
