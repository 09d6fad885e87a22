/* eslint-disable no-console */
/**
 * Seed Users
 * ==========
 * Creates or updates a login-capable user.
 *
 *   SEED_EMAIL=a@example.com SEED_PASSWORD=... SEED_ROLES=admin,user tsx src/scripts/seed-users.ts
 */

import "dotenv/config";

import { randomUUID } from "node:crypto";

import { getUserModel } from "../modules/users/index.js";
import { connectMongo, disconnectMongo } from "../shared/mongo.js";
import { hashPassword } from "../shared/password.js";

function requireEnv(name: string): string {
  const v = (process.env[name] || "").trim();
  if (!v) {throw new Error(`Missing required env var: ${name}`);}
  return v;
}

async function main() {
  const email = requireEnv("SEED_EMAIL").toLowerCase();
  const password = requireEnv("SEED_PASSWORD");
  const roles = (process.env.SEED_ROLES || "user")
    .split(",")
    .map((r) => r.trim())
    .filter(Boolean);

  const connection = await connectMongo(process.env.MONGO_URI?.trim() || "mongodb://localhost:27017/rag_chat");
  try {
    const Users = getUserModel(connection);
    await Users.createIndexes();

    const hashed_password = await hashPassword(password);
    const existing = await Users.findOne({ user_email: email }).exec();
    if (existing) {
      existing.hashed_password = hashed_password;
      existing.roles = roles;
      await existing.save();
      console.log(`🔐 Updated ${email} (${existing.user_id})`);
    } else {
      const created = await Users.create({
        user_id: `user_${randomUUID()}`,
        user_email: email,
        hashed_password,
        roles,
      });
      console.log(`👤 Created ${email} (${created.user_id})`);
    }
  } finally {
    await disconnectMongo(connection);
  }
}

main().catch((err: unknown) => {
  console.error("❌ Seed failed:", err);
  process.exit(1);
});
