export interface AuthConfig {
  readonly jwtSecret: string;
  readonly accessTokenTtlSeconds: number;
  readonly refreshTokenTtlSeconds: number;
  readonly rememberMeTtlSeconds: number;
  readonly bcryptRounds: number;
}

const MINUTE = 60;
const DAY = 24 * 60 * MINUTE;

interface IntRange {
  min: number;
  max?: number;
}

const readInt = (
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  { min, max }: IntRange
): number => {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === "") return fallback;

  if (!/^\d+$/.test(raw)) {
    throw new Error(`${name} must be a whole number, got "${raw}"`);
  }

  const parsed = Number(raw);
  if (parsed < min || (max !== undefined && parsed > max)) {
    const range = max === undefined ? `at least ${min}` : `between ${min} and ${max}`;
    throw new Error(`${name} must be ${range}, got ${parsed}`);
  }
  return parsed;
};

/**
 * Builds the token/session settings from environment variables.
 * The result is passed to the codec, hasher and auth service at construction.
 */
export const loadAuthConfig = (env: NodeJS.ProcessEnv = process.env): AuthConfig => {
  const jwtSecret = env.JWT_SECRET;

  if (!jwtSecret) {
    throw new Error("JWT_SECRET missing");
  }

  const accessMinutes = readInt(env, "ACCESS_TOKEN_EXPIRE_MINUTES", 15, { min: 1 });
  const refreshDays = readInt(env, "REFRESH_TOKEN_EXPIRE_DAYS", 7, { min: 1 });
  // a remember-me session never ends before a normal one
  const rememberDays = readInt(env, "REMEMBER_ME_EXPIRE_DAYS", Math.max(30, refreshDays), {
    min: refreshDays,
  });

  return Object.freeze({
    jwtSecret,
    accessTokenTtlSeconds: accessMinutes * MINUTE,
    refreshTokenTtlSeconds: refreshDays * DAY,
    rememberMeTtlSeconds: rememberDays * DAY,
    // bcrypt accepts 4..31
    bcryptRounds: readInt(env, "BCRYPT_ROUNDS", 10, { min: 4, max: 31 }),
  });
};
