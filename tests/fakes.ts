import type {
  RefreshTokenRecord,
  RevokeOutcome,
  RevokeReason,
  TokenStore,
  UserIdentity,
} from "../src/modules/auth/auth.types.js";
import type { TokenStoreMulti, TokenStoreRedis } from "../src/modules/auth/auth.token-store.js";
import type { RagAnswer, RagService } from "../src/modules/chat/chat.service.js";
import type { User, UserRepository } from "../src/modules/users/users.types.js";
import { hashPassword } from "../src/shared/password.js";

export class FakeClock {
  constructor(public nowMs: number = Date.UTC(2026, 0, 15, 9, 0, 0)) {}

  now = (): number => this.nowMs;

  advance(ms: number) {
    this.nowMs += ms;
  }
}

/**
 * Token store with the same contract as the Redis one: ttl eviction on the
 * fake clock and compare-and-set revoke.
 */
export class InMemoryTokenStore implements TokenStore {
  private readonly entries = new Map<string, { record: RefreshTokenRecord; evictAt: number }>();

  constructor(private readonly clock: FakeClock) {}

  get size(): number {
    this.evictExpired();
    return this.entries.size;
  }

  private evictExpired() {
    for (const [id, entry] of this.entries) {
      if (entry.evictAt <= this.clock.now()) {this.entries.delete(id);}
    }
  }

  put(record: RefreshTokenRecord, ttlSeconds: number): Promise<void> {
    this.entries.set(record.tokenId, {
      record: { ...record },
      evictAt: this.clock.now() + ttlSeconds * 1000,
    });
    return Promise.resolve();
  }

  get(tokenId: string): Promise<RefreshTokenRecord | null> {
    this.evictExpired();
    const entry = this.entries.get(tokenId);
    return Promise.resolve(entry ? { ...entry.record } : null);
  }

  revoke(
    tokenId: string,
    change: { reason: RevokeReason; replacedBy?: string | null; at: number }
  ): Promise<RevokeOutcome> {
    this.evictExpired();
    const entry = this.entries.get(tokenId);
    if (!entry) {return Promise.resolve("not_found");}
    if (entry.record.revoked) {return Promise.resolve("already_revoked");}
    entry.record = {
      ...entry.record,
      revoked: true,
      revokedAt: change.at,
      revokedReason: change.reason,
      replacedBy: change.replacedBy ?? null,
    };
    return Promise.resolve("revoked");
  }

  listForUser(userId: string): Promise<RefreshTokenRecord[]> {
    this.evictExpired();
    const out: RefreshTokenRecord[] = [];
    for (const { record } of this.entries.values()) {
      if (record.userId === userId) {out.push({ ...record });}
    }
    return Promise.resolve(out);
  }
}

export class InMemoryUserRepository implements UserRepository {
  private readonly users = new Map<string, User>();

  add(user: User) {
    this.users.set(user.id, user);
  }

  remove(id: string) {
    this.users.delete(id);
  }

  findByEmail(email: string): Promise<User | null> {
    const wanted = email.trim().toLowerCase();
    for (const user of this.users.values()) {
      if (user.email === wanted) {return Promise.resolve(user);}
    }
    return Promise.resolve(null);
  }

  findById(id: string): Promise<User | null> {
    return Promise.resolve(this.users.get(id) ?? null);
  }
}

export class FakeRagService implements RagService {
  calls: Array<{ question: string; user: UserIdentity }> = [];
  failWith: Error | null = null;

  answer(params: { question: string; user: UserIdentity }): Promise<RagAnswer> {
    this.calls.push(params);
    if (this.failWith) {return Promise.reject(this.failWith);}
    return Promise.resolve({ answer: `echo: ${params.question}`, model: "fake-model" });
  }
}

// Low scrypt cost keeps fixture setup fast; verification reads N from the hash.
export async function makeUser(params: {
  id: string;
  email: string;
  password: string;
  roles?: string[];
}): Promise<User> {
  return {
    id: params.id,
    email: params.email,
    passwordHash: await hashPassword(params.password, { N: 1024 }),
    roles: params.roles ?? ["user"],
    region: null,
  };
}

type RedisCall = Array<string | number>;

/**
 * Records the commands a Redis-backed store issues. Hashes and sets are kept
 * in maps; `EVAL` replies come from `evalReplies` in order.
 */
export class RecordingRedis implements TokenStoreRedis {
  calls: RedisCall[] = [];
  hashes = new Map<string, Record<string, string>>();
  sets = new Map<string, Set<string>>();
  evalReplies: unknown[] = [];

  multi(): TokenStoreMulti {
    const queued: RedisCall[] = [];
    const chain: TokenStoreMulti = {
      hSet: (key, value) => {
        queued.push(["hSet", key]);
        this.hashes.set(key, { ...value });
        return chain;
      },
      pExpire: (key, milliseconds, mode) => {
        queued.push(mode ? ["pExpire", key, milliseconds, mode] : ["pExpire", key, milliseconds]);
        return chain;
      },
      sAdd: (key, member) => {
        queued.push(["sAdd", key, member]);
        const set = this.sets.get(key) ?? new Set<string>();
        set.add(member);
        this.sets.set(key, set);
        return chain;
      },
      exec: () => {
        this.calls.push(...queued, ["exec"]);
        return Promise.resolve(queued.map(() => "OK"));
      },
    };
    return chain;
  }

  hGetAll(key: string): Promise<Record<string, string>> {
    this.calls.push(["hGetAll", key]);
    return Promise.resolve({ ...this.hashes.get(key) });
  }

  sMembers(key: string): Promise<string[]> {
    this.calls.push(["sMembers", key]);
    return Promise.resolve([...(this.sets.get(key) ?? [])]);
  }

  sRem(key: string, members: string[]): Promise<number> {
    this.calls.push(["sRem", key, ...members]);
    const set = this.sets.get(key);
    let removed = 0;
    for (const m of members) {
      if (set?.delete(m)) {removed += 1;}
    }
    return Promise.resolve(removed);
  }

  sendCommand(args: string[]): Promise<unknown> {
    this.calls.push(args);
    return Promise.resolve(this.evalReplies.shift() ?? 0);
  }
}
