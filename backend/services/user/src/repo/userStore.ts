// backend/services/user/src/repo/userStore.ts

/**
 * Purpose:
 * - Authoritative sequence of users, read and mutated only through the
 *   service layer.
 *
 * Invariants:
 * - ids are unique; a new id is max(current ids) + 1, or 1 when the store is
 *   empty. Deleting the highest user frees its id for the next insert.
 * - update touches name/email only.
 * - Callers receive copies; stored records are never shared by reference.
 *
 * Notes:
 * - Methods are async so a persistent store can replace this one behind the
 *   same interface. Each in-memory operation runs to completion within a
 *   single event-loop turn, so operations never interleave.
 */

import type { User, UserFields } from "../models/User";

export interface UserStore {
  list(offset: number, limit: number): Promise<User[]>;
  findById(id: number): Promise<User | null>;
  insert(fields: UserFields): Promise<User>;
  update(id: number, fields: UserFields): Promise<User | null>;
  remove(id: number): Promise<User | null>;
  count(): Promise<number>;
}

const copy = (u: User): User => ({ id: u.id, name: u.name, email: u.email });

export class InMemoryUserStore implements UserStore {
  private readonly users: User[];

  constructor(seed: readonly User[] = []) {
    const ids = new Set<number>();
    for (const u of seed) {
      if (ids.has(u.id)) throw new Error(`Duplicate seed user id: ${u.id}`);
      ids.add(u.id);
    }
    this.users = seed.map(copy);
  }

  public async list(offset: number, limit: number): Promise<User[]> {
    if (offset < 0 || limit <= 0) return [];
    return this.users.slice(offset, offset + limit).map(copy);
  }

  public async findById(id: number): Promise<User | null> {
    const found = this.users.find((u) => u.id === id);
    return found ? copy(found) : null;
  }

  public async insert(fields: UserFields): Promise<User> {
    const user: User = {
      id: this.nextId(),
      name: fields.name,
      email: fields.email,
    };
    this.users.push(user);
    return copy(user);
  }

  public async update(id: number, fields: UserFields): Promise<User | null> {
    const found = this.users.find((u) => u.id === id);
    if (!found) return null;
    found.name = fields.name;
    found.email = fields.email;
    return copy(found);
  }

  public async remove(id: number): Promise<User | null> {
    const idx = this.users.findIndex((u) => u.id === id);
    if (idx < 0) return null;
    const [removed] = this.users.splice(idx, 1);
    return removed ? copy(removed) : null;
  }

  /** max(existing ids) + 1, or 1 for an empty store. */
  private nextId(): number {
    if (this.users.length === 0) return 1;
    return this.users.reduce((max, u) => Math.max(max, u.id), 0) + 1;
  }

  public async count(): Promise<number> {
    return this.users.length;
  }
}
