/**
 * User Model
 * ==========
 * Mongoose schema for the `users` collection.
 */

import { type Connection, type Model, Schema } from "mongoose";

export interface UserDocument {
  user_id: string;
  user_email: string;
  hashed_password: string | null;
  roles: string[];
  region: string | null;
  created_at: Date;
}

export const userSchema = new Schema<UserDocument>(
  {
    user_id: { type: String, required: true },
    user_email: { type: String, required: true, lowercase: true, trim: true },
    hashed_password: { type: String, default: null },
    roles: { type: [String], default: ["user"] },
    region: { type: String, default: null },
    created_at: { type: Date, default: () => new Date() },
  },
  { collection: "users", versionKey: false }
);

userSchema.index({ user_email: 1 }, { unique: true });
userSchema.index({ user_id: 1 }, { unique: true });

export type UserModel = Model<UserDocument>;

export function getUserModel(connection: Connection): UserModel {
  return connection.model<UserDocument>("User", userSchema);
}
