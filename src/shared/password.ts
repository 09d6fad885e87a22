import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";

type ScryptParams = {
  N: number;
  r: number;
  p: number;
  keylen: number;
};

const DEFAULT_SCRYPT: ScryptParams = {
  N: 16384,
  r: 8,
  p: 1,
  keylen: 64,
};

type ParsedHash = {
  params: ScryptParams;
  salt: Buffer;
  hash: Buffer;
};

function scryptAsync(
  password: string,
  salt: Buffer,
  keylen: number,
  options: { N: number; r: number; p: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, keylen, { ...options, maxmem: 256 * options.N * options.r }, (err, derivedKey) => {
      if (err) {return reject(err);}
      resolve(derivedKey);
    });
  });
}

// Format: scrypt$1$N$r$p$salt$hash
function parseScryptHash(encoded: string): ParsedHash | null {
  const parts = String(encoded || "").split("$");
  if (parts.length !== 7) {return null;}
  const [kind, version, Nraw, rraw, praw, saltB64, hashB64] = parts;
  if (kind !== "scrypt" || version !== "1") {return null;}

  const N = Number(Nraw);
  const r = Number(rraw);
  const p = Number(praw);
  if (!Number.isInteger(N) || !Number.isInteger(r) || !Number.isInteger(p)) {return null;}
  if (N <= 1 || r <= 0 || p <= 0) {return null;}

  const salt = Buffer.from(saltB64, "base64url");
  const hash = Buffer.from(hashB64, "base64url");
  if (salt.length < 8 || hash.length < 32) {return null;}
  return { params: { N, r, p, keylen: hash.length }, salt, hash };
}

export async function hashPassword(password: string, params: Partial<ScryptParams> = {}): Promise<string> {
  const p: ScryptParams = { ...DEFAULT_SCRYPT, ...params };
  const salt = randomBytes(16);
  const derived = await scryptAsync(password, salt, p.keylen, { N: p.N, r: p.r, p: p.p });
  return `scrypt$1$${p.N}$${p.r}$${p.p}$${salt.toString("base64url")}$${derived.toString("base64url")}`;
}

export async function verifyPassword(password: string, encoded: string): Promise<boolean> {
  const parsed = parseScryptHash(encoded);
  if (!parsed) {return false;}

  const derived = await scryptAsync(password, parsed.salt, parsed.params.keylen, {
    N: parsed.params.N,
    r: parsed.params.r,
    p: parsed.params.p,
  });

  if (derived.length !== parsed.hash.length) {return false;}
  return timingSafeEqual(derived, parsed.hash);
}

let dummyHash: Promise<string> | null = null;

/**
 * Burns one scrypt derivation with default parameters and always resolves
 * false. Used when there is no stored hash to compare against, so an unknown
 * email costs the same as a wrong password.
 */
export async function verifyAgainstDummy(password: string): Promise<false> {
  if (!dummyHash) {
    dummyHash = hashPassword(randomBytes(16).toString("hex"));
  }
  await verifyPassword(password, await dummyHash);
  return false;
}
