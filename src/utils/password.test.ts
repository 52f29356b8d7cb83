import { createPasswordHasher, fitsBcrypt, isWellFormedHash } from "./password";
import { Logger } from "./logger";

const silentLogger = (): Logger & { error: jest.Mock } => ({
  error: jest.fn(),
  warn: jest.fn(),
  info: jest.fn(),
  debug: jest.fn(),
});

describe("password hasher", () => {
  it("verifies the password it hashed and rejects others", async () => {
    const hasher = createPasswordHasher(4, silentLogger());
    const hash = await hasher.hash("Secret123!");

    expect(isWellFormedHash(hash)).toBe(true);
    expect(hash.startsWith("$2b$04$")).toBe(true);
    expect(await hasher.verify("Secret123!", hash)).toBe(true);
    expect(await hasher.verify("Secret123?", hash)).toBe(false);
  });

  it("salts every hash", async () => {
    const hasher = createPasswordHasher(4, silentLogger());
    expect(await hasher.hash("same-password")).not.toBe(await hasher.hash("same-password"));
  });

  it("returns false and logs for a malformed stored hash", async () => {
    const logger = silentLogger();
    const hasher = createPasswordHasher(4, logger);

    expect(await hasher.verify("Secret123!", "not-a-bcrypt-hash")).toBe(false);
    expect(logger.error).toHaveBeenCalledWith("CORRUPT_CREDENTIAL: stored password hash is malformed");
  });

  it("never matches input longer than 72 bytes that shares the stored prefix", async () => {
    const hasher = createPasswordHasher(4, silentLogger());
    // 36 two-byte characters fill bcrypt's 72-byte window exactly
    const stored = "é".repeat(36);
    const hash = await hasher.hash(stored);

    expect(await hasher.verify(stored, hash)).toBe(true);
    expect(await hasher.verify(stored + "DIFFERENT", hash)).toBe(false);
  });

  it("refuses to hash more than 72 bytes", async () => {
    const hasher = createPasswordHasher(4, silentLogger());
    await expect(hasher.hash("é".repeat(37))).rejects.toThrow("Password exceeds 72 bytes");
  });

  it("measures the limit in UTF-8 bytes", () => {
    expect(fitsBcrypt("a".repeat(72))).toBe(true);
    expect(fitsBcrypt("é".repeat(36))).toBe(true);
    expect(fitsBcrypt("é".repeat(37))).toBe(false);
  });

  it("recognises bcrypt hash shapes", () => {
    expect(isWellFormedHash("$2b$10$" + "a".repeat(53))).toBe(true);
    expect(isWellFormedHash("$2x$10$" + "a".repeat(53))).toBe(false);
    expect(isWellFormedHash("$2b$10$" + "a".repeat(52))).toBe(false);
    expect(isWellFormedHash(undefined)).toBe(false);
  });
});
