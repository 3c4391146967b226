// backend/services/user/src/services/userService.ts

/**
 * Purpose:
 * - Business steps for each user operation, returned as typed results.
 *   No Express types here; handlers own parsing and response writing.
 *
 * Notes:
 * - update() checks the format of the STORED email, not the replacement
 *   email. Pinned by test "update: validates the stored email".
 */

import type { UserStore } from "../repo/userStore";
import type { User, UserFields } from "../models/User";
import {
  created,
  invalid,
  notFound,
  ok,
  text,
  type HandlerResult,
} from "@shared/http/results";
import { emailFormat, requiredFields } from "../validators/user.rules";

export const MSG_NOT_FOUND = "User not found";
export const MSG_UPDATED = "User updated successfully";

export type PageRequest = { page: number; pageSize: number };

type FieldsInput = { name?: string | null; email?: string | null };

/** page/pageSize below 1 yield an empty page. */
export function pageToSlice(p: PageRequest): { offset: number; limit: number } {
  if (p.page < 1 || p.pageSize < 1) return { offset: 0, limit: 0 };
  return { offset: (p.page - 1) * p.pageSize, limit: p.pageSize };
}

function checked(input: FieldsInput): UserFields | string {
  const req = requiredFields(input);
  if (!req.ok) return req.message;
  // requiredFields guarantees both are non-empty strings
  return { name: input.name ?? "", email: input.email ?? "" };
}

export class UserService {
  constructor(private readonly store: UserStore) {}

  public async list(p: PageRequest): Promise<HandlerResult<User[]>> {
    const { offset, limit } = pageToSlice(p);
    if (limit === 0) return ok([]);
    return ok(await this.store.list(offset, limit));
  }

  public async getById(id: number): Promise<HandlerResult<User>> {
    const user = await this.store.findById(id);
    return user ? ok(user) : notFound(MSG_NOT_FOUND);
  }

  public async create(input: FieldsInput): Promise<HandlerResult<User>> {
    const fields = checked(input);
    if (typeof fields === "string") return invalid(fields);

    const fmt = emailFormat(fields.email);
    if (!fmt.ok) return invalid(fmt.message);

    const user = await this.store.insert(fields);
    return created(user, `/users/${user.id}`);
  }

  public async update(
    id: number,
    input: FieldsInput
  ): Promise<HandlerResult<never>> {
    const existing = await this.store.findById(id);
    if (!existing) return notFound(MSG_NOT_FOUND);

    const fields = checked(input);
    if (typeof fields === "string") return invalid(fields);

    const fmt = emailFormat(existing.email);
    if (!fmt.ok) return invalid(fmt.message);

    const saved = await this.store.update(id, fields);
    if (!saved) return notFound(MSG_NOT_FOUND);
    return text(MSG_UPDATED);
  }

  public async remove(id: number): Promise<HandlerResult<User>> {
    const removed = await this.store.remove(id);
    return removed ? ok(removed) : notFound(MSG_NOT_FOUND);
  }
}
