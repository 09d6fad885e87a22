/**
 * Users Repository
 * ================
 * MongoDB lookups for user identity records. Read-only.
 */

import { z } from "zod";

import { DatabaseError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import type { UserDocument } from "./users.model.js";
import type { User, UserRepository } from "./users.types.js";

const storedUserSchema = z.object({
  user_id: z.string().min(1),
  user_email: z.string().min(1),
  hashed_password: z.string().nullish(),
  roles: z.array(z.string()).nullish(),
  region: z.string().nullish(),
});

/**
 * Map a raw `users` document to a `User`. Documents missing an id or email
 * are rejected as corrupt.
 */
export function toUser(doc: unknown): User {
  const parsed = storedUserSchema.safeParse(doc);
  if (!parsed.success) {
    throw new DatabaseError("Malformed user document", parsed.error.issues);
  }
  const d = parsed.data;
  return {
    id: d.user_id,
    email: d.user_email.trim().toLowerCase(),
    passwordHash: d.hashed_password ?? null,
    roles: Array.from(new Set((d.roles ?? []).map((r) => r.trim()).filter(Boolean))),
    region: d.region ?? null,
  };
}

type UserFilter = Partial<Pick<UserDocument, "user_email" | "user_id">>;

/**
 * Model operations the repository uses. A `UserModel` satisfies it.
 */
export type UserLookupModel = {
  findOne(filter: UserFilter): { lean(): { exec(): Promise<unknown> } };
  createIndexes(): Promise<unknown>;
};

export type MongoUserRepository = UserRepository & {
  ensureIndexes(): Promise<void>;
};

export function createMongoUserRepository(model: UserLookupModel): MongoUserRepository {
  async function findOne(filter: UserFilter, label: string): Promise<User | null> {
    let doc: unknown;
    try {
      doc = await model.findOne(filter).lean().exec();
    } catch (err: unknown) {
      logger.error("User lookup failed", {
        by: label,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new DatabaseError(`Failed to fetch user by ${label}`, err);
    }
    return doc ? toUser(doc) : null;
  }

  return {
    findByEmail(email) {
      return findOne({ user_email: email.trim().toLowerCase() }, "email");
    },

    findById(id) {
      return findOne({ user_id: id }, "id");
    },

    async ensureIndexes() {
      await model.createIndexes();
      logger.info("User indexes ensured");
    },
  };
}
