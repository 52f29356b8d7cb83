import bcrypt from "bcrypt";
import { PasswordHasher } from "../types/auth";
import { Logger, logger as defaultLogger } from "./logger";

// $2a$/$2b$/$2y$, two-digit cost, 22 chars of salt + 31 chars of digest
const BCRYPT_HASH_PATTERN = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export const BCRYPT_MAX_BYTES = 72;

export const fitsBcrypt = (plaintext: string) => {
  return Buffer.byteLength(plaintext, "utf8") <= BCRYPT_MAX_BYTES;
};

export const isWellFormedHash = (hash: unknown): hash is string => {
  return typeof hash === "string" && BCRYPT_HASH_PATTERN.test(hash);
};

/**
 * bcrypt-backed hasher. Hashing runs on the libuv thread pool, so the
 * event loop keeps accepting requests while a hash is computed.
 */
export const createPasswordHasher = (
  rounds: number,
  logger: Logger = defaultLogger
): PasswordHasher => {
  const hash = async (plaintext: string): Promise<string> => {
    if (!fitsBcrypt(plaintext)) {
      throw new Error(`Password exceeds ${BCRYPT_MAX_BYTES} bytes`);
    }

    const salt = await bcrypt.genSalt(rounds);
    return bcrypt.hash(plaintext, salt);
  };

  const verify = async (plaintext: string, hash: string): Promise<boolean> => {
    // bcrypt would compare only the first 72 bytes, so a longer input never matches
    if (!fitsBcrypt(plaintext)) {
      return false;
    }

    if (!isWellFormedHash(hash)) {
      logger.error("CORRUPT_CREDENTIAL: stored password hash is malformed");
      return false;
    }

    try {
      return await bcrypt.compare(plaintext, hash);
    } catch (error) {
      logger.error("CORRUPT_CREDENTIAL: password comparison failed:", error);
      return false;
    }
  };

  return { hash, verify };
};
