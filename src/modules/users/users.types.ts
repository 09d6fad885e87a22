export type User = {
  id: string;
  email: string;
  passwordHash: string | null;
  roles: string[];
  region: string | null;
};

/**
 * Read-only access to stored users.
 */
export interface UserRepository {
  findByEmail(email: string): Promise<User | null>;
  findById(id: string): Promise<User | null>;
}

/** What the API returns about a user. */
export type PublicUser = {
  user_id: string;
  user_email: string;
  roles: string[];
  region: string | null;
};

export function toPublicUser(user: User): PublicUser {
  return {
    user_id: user.id,
    user_email: user.email,
    roles: user.roles,
    region: user.region,
  };
}
