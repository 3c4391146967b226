// backend/services/user/test/userService.spec.ts
import { describe, it, expect } from "vitest";
import { InMemoryUserStore } from "../src/repo/userStore";
import { SEED_USERS } from "../src/models/User";
import {
  MSG_NOT_FOUND,
  MSG_UPDATED,
  UserService,
  pageToSlice,
} from "../src/services/userService";
import { MSG_EMAIL_FORMAT, MSG_REQUIRED } from "../src/validators/user.rules";

const makeSvc = () => {
  const store = new InMemoryUserStore(SEED_USERS);
  return { store, svc: new UserService(store) };
};

describe("pageToSlice", () => {
  it("maps page/pageSize to offset/limit", () => {
    expect(pageToSlice({ page: 1, pageSize: 10 })).toEqual({
      offset: 0,
      limit: 10,
    });
    expect(pageToSlice({ page: 3, pageSize: 5 })).toEqual({
      offset: 10,
      limit: 5,
    });
  });

  it("gives an empty slice below 1", () => {
    expect(pageToSlice({ page: 0, pageSize: 10 })).toEqual({
      offset: 0,
      limit: 0,
    });
    expect(pageToSlice({ page: 1, pageSize: -2 })).toEqual({
      offset: 0,
      limit: 0,
    });
  });
});

describe("UserService", () => {
  it("list: second page of size 1 is Bob", async () => {
    const { svc } = makeSvc();
    expect(await svc.list({ page: 2, pageSize: 1 })).toEqual({
      kind: "ok",
      status: 200,
      body: [{ id: 2, name: "Bob", email: "bob@example.com" }],
    });
  });

  it("list: page 0 is empty", async () => {
    const { svc } = makeSvc();
    expect(await svc.list({ page: 0, pageSize: 10 })).toEqual({
      kind: "ok",
      status: 200,
      body: [],
    });
  });

  it("getById: notFound for unknown id", async () => {
    const { svc } = makeSvc();
    expect(await svc.getById(9)).toEqual({
      kind: "notFound",
      message: MSG_NOT_FOUND,
    });
  });

  it("create: required fields are checked before email format", async () => {
    const { svc } = makeSvc();
    expect(await svc.create({ name: "", email: "not-an-email" })).toEqual({
      kind: "invalid",
      message: MSG_REQUIRED,
    });
  });

  it("create: rejects a malformed email", async () => {
    const { svc, store } = makeSvc();
    expect(await svc.create({ name: "Eve", email: "eve@nowhere" })).toEqual({
      kind: "invalid",
      message: MSG_EMAIL_FORMAT,
    });
    expect(await store.count()).toBe(2);
  });

  it("create: 201 with Location", async () => {
    const { svc } = makeSvc();
    expect(
      await svc.create({ name: "Charlie", email: "charlie@example.com" })
    ).toEqual({
      kind: "ok",
      status: 201,
      body: { id: 3, name: "Charlie", email: "charlie@example.com" },
      location: "/users/3",
    });
  });

  it("update: lookup happens before field checks", async () => {
    const { svc } = makeSvc();
    expect(await svc.update(77, {})).toEqual({
      kind: "notFound",
      message: MSG_NOT_FOUND,
    });
  });

  it("update: required fields", async () => {
    const { svc } = makeSvc();
    expect(await svc.update(1, { name: "Alicia" })).toEqual({
      kind: "invalid",
      message: MSG_REQUIRED,
    });
  });

  it("update: overwrites and answers with text", async () => {
    const { svc, store } = makeSvc();
    expect(
      await svc.update(1, { name: "Alicia", email: "alicia@example.com" })
    ).toEqual({ kind: "text", text: MSG_UPDATED });
    expect(await store.findById(1)).toEqual({
      id: 1,
      name: "Alicia",
      email: "alicia@example.com",
    });
  });

  // The format check runs against the email already stored, not the
  // replacement. These two cases pin that.
  it("update: validates the stored email, not the incoming one", async () => {
    const { svc, store } = makeSvc();
    expect(await svc.update(2, { name: "Bob", email: "bob-at-nowhere" })).toEqual(
      { kind: "text", text: MSG_UPDATED }
    );
    expect((await store.findById(2))?.email).toBe("bob-at-nowhere");

    expect(
      await svc.update(2, { name: "Bob", email: "bob@example.com" })
    ).toEqual({ kind: "invalid", message: MSG_EMAIL_FORMAT });
    expect((await store.findById(2))?.email).toBe("bob-at-nowhere");
  });

  it("remove: returns the removed user, then notFound", async () => {
    const { svc } = makeSvc();
    expect(await svc.remove(2)).toEqual({
      kind: "ok",
      status: 200,
      body: { id: 2, name: "Bob", email: "bob@example.com" },
    });
    expect(await svc.remove(2)).toEqual({
      kind: "notFound",
      message: MSG_NOT_FOUND,
    });
  });
});
