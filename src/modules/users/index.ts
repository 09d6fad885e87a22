/**
 * Users Module
 * ============
 * Identity records from the document store.
 */

export { getUserModel, type UserDocument, type UserModel } from "./users.model.js";
export {
  createMongoUserRepository,
  type MongoUserRepository,
  toUser,
  type UserLookupModel,
} from "./users.repository.js";
export type { PublicUser, User, UserRepository } from "./users.types.js";
export { toPublicUser } from "./users.types.js";
