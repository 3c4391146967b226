// backend/services/user/src/models/User.ts

/** Stored user. `id` is assigned by the store and never changes. */
export type User = {
  id: number;
  name: string;
  email: string;
};

/** Writable fields of a user (create and update). */
export type UserFields = Pick<User, "name" | "email">;

/** Records every fresh process starts with. */
export const SEED_USERS: readonly User[] = Object.freeze([
  { id: 1, name: "Alice", email: "alice@example.com" },
  { id: 2, name: "Bob", email: "bob@example.com" },
]);
