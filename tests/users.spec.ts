import { describe, expect, it } from "vitest";

import {
  createMongoUserRepository,
  toPublicUser,
  toUser,
  type UserLookupModel,
} from "../src/modules/users/index.js";
import { DatabaseError } from "../src/shared/errors.js";

describe("toUser", () => {
  it("maps a stored document", () => {
    const user = toUser({
      _id: "65a0c0ffee",
      user_id: "user_1",
      user_email: " A@X.com ",
      hashed_password: "scrypt$1$...",
      roles: ["admin", " admin", "", "user"],
      region: "eu",
      created_at: new Date(0),
    });

    expect(user).toEqual({
      id: "user_1",
      email: "a@x.com",
      passwordHash: "scrypt$1$...",
      roles: ["admin", "user"],
      region: "eu",
    });
  });

  it("defaults optional fields", () => {
    expect(toUser({ user_id: "user_2", user_email: "b@x.com" })).toEqual({
      id: "user_2",
      email: "b@x.com",
      passwordHash: null,
      roles: [],
      region: null,
    });
  });

  it("rejects documents without an id", () => {
    expect(() => toUser({ user_email: "c@x.com" })).toThrow(DatabaseError);
    expect(() => toUser(null)).toThrow("Database error: Malformed user document");
  });
});

describe("toPublicUser", () => {
  it("drops the password hash", () => {
    expect(
      toPublicUser({ id: "user_1", email: "a@x.com", passwordHash: "secret-hash", roles: ["user"], region: null })
    ).toEqual({ user_id: "user_1", user_email: "a@x.com", roles: ["user"], region: null });
  });
});

function stubModel(result: unknown) {
  const filters: unknown[] = [];
  let indexBuilds = 0;
  const model: UserLookupModel = {
    findOne(filter) {
      filters.push(filter);
      return {
        lean: () => ({
          exec: () => (result instanceof Error ? Promise.reject(result) : Promise.resolve(result)),
        }),
      };
    },
    createIndexes() {
      indexBuilds += 1;
      return Promise.resolve();
    },
  };
  return { model, filters, indexBuilds: () => indexBuilds };
}

describe("Mongo user repository", () => {
  const stored = {
    user_id: "user_1",
    user_email: "a@x.com",
    hashed_password: "scrypt$1$...",
    roles: ["user"],
    region: null,
  };

  it("looks users up by normalized email", async () => {
    const stub = stubModel(stored);
    const repo = createMongoUserRepository(stub.model);

    await expect(repo.findByEmail("  A@X.com ")).resolves.toEqual({
      id: "user_1",
      email: "a@x.com",
      passwordHash: "scrypt$1$...",
      roles: ["user"],
      region: null,
    });
    expect(stub.filters).toEqual([{ user_email: "a@x.com" }]);
  });

  it("looks users up by id", async () => {
    const stub = stubModel(stored);
    const repo = createMongoUserRepository(stub.model);

    await expect(repo.findById("user_1")).resolves.toMatchObject({ id: "user_1" });
    expect(stub.filters).toEqual([{ user_id: "user_1" }]);
  });

  it("returns null when nothing matches", async () => {
    const repo = createMongoUserRepository(stubModel(null).model);
    await expect(repo.findById("nobody")).resolves.toBeNull();
  });

  it("wraps driver failures in DatabaseError", async () => {
    const repo = createMongoUserRepository(stubModel(new Error("connection reset")).model);

    const pending = repo.findByEmail("a@x.com");
    await expect(pending).rejects.toBeInstanceOf(DatabaseError);
    await expect(pending).rejects.toMatchObject({
      statusCode: 500,
      message: "Database error: Failed to fetch user by email",
    });
  });

  it("rejects corrupt documents", async () => {
    const repo = createMongoUserRepository(stubModel({ user_email: "a@x.com" }).model);
    await expect(repo.findByEmail("a@x.com")).rejects.toThrow("Database error: Malformed user document");
  });

  it("builds indexes on demand", async () => {
    const stub = stubModel(null);
    await createMongoUserRepository(stub.model).ensureIndexes();
    expect(stub.indexBuilds()).toBe(1);
  });
});
