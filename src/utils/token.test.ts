import jwt from "jsonwebtoken";
import { createTokenCodec, hashToken } from "./token";
import { createTestClock } from "../tests/helpers/memoryStores";

const SECRET = "test-secret";

describe("token codec", () => {
  const clock = createTestClock();
  const codec = createTokenCodec({ jwtSecret: SECRET, accessTokenTtlSeconds: 900 }, clock.now);

  describe("issueAccess / verifyAccess", () => {
    it("returns the claims it signed", () => {
      const issued = codec.issueAccess(42, { role: "admin", username: "alice" });
      const check = codec.verifyAccess(issued.token);

      expect(check).toEqual({ ok: true, claims: issued.claims });
      expect(issued.claims.sub).toBe("42");
      expect(issued.claims.type).toBe("access");
      expect(issued.claims.exp - issued.claims.iat).toBe(900);
      expect(issued.claims.jti).toMatch(/^[0-9a-f]{32}$/);
    });

    it("gives every token its own jti", () => {
      const a = codec.issueAccess(1);
      const b = codec.issueAccess(1);
      expect(a.claims.jti).not.toBe(b.claims.jti);
    });

    it("honours an explicit ttl", () => {
      const issued = codec.issueAccess(1, {}, 60);
      expect(issued.claims.exp - issued.claims.iat).toBe(60);
    });

    it("reports EXPIRED once the ttl has passed", () => {
      const local = createTestClock();
      const localCodec = createTokenCodec({ jwtSecret: SECRET, accessTokenTtlSeconds: 60 }, local.now);
      const issued = localCodec.issueAccess(7);

      local.advanceSeconds(59);
      expect(localCodec.verifyAccess(issued.token).ok).toBe(true);

      local.advanceSeconds(1);
      expect(localCodec.verifyAccess(issued.token)).toEqual({ ok: false, error: "EXPIRED" });
    });

    it("reports BAD_SIGNATURE for a token signed with another key", () => {
      const other = createTokenCodec({ jwtSecret: "other-secret", accessTokenTtlSeconds: 900 }, clock.now);
      const issued = other.issueAccess(1);

      expect(codec.verifyAccess(issued.token)).toEqual({ ok: false, error: "BAD_SIGNATURE" });
    });

    it("reports BAD_SIGNATURE for garbage", () => {
      expect(codec.verifyAccess("not-a-jwt")).toEqual({ ok: false, error: "BAD_SIGNATURE" });
    });

    it("reports WRONG_TOKEN_TYPE for a correctly signed non-access token", () => {
      const now = Math.floor(clock.now().getTime() / 1000);
      const token = jwt.sign(
        { sub: "1", iat: now, exp: now + 60, type: "refresh", jti: "abc" },
        SECRET,
        { algorithm: "HS256" }
      );

      expect(codec.verifyAccess(token)).toEqual({ ok: false, error: "WRONG_TOKEN_TYPE" });
    });

    it("drops a role claim it does not recognise", () => {
      const now = Math.floor(clock.now().getTime() / 1000);
      const token = jwt.sign(
        { sub: "1", iat: now, exp: now + 60, type: "access", jti: "abc", role: "superuser" },
        SECRET,
        { algorithm: "HS256" }
      );

      const check = codec.verifyAccess(token);
      expect(check).toEqual({
        ok: true,
        claims: { sub: "1", iat: now, exp: now + 60, type: "access", jti: "abc" },
      });
    });
  });

  describe("refresh secrets", () => {
    it("issues a url-safe secret and stores only its sha256", () => {
      const secret = codec.issueRefreshSecret();

      expect(secret.token).toMatch(/^[A-Za-z0-9_-]{43}$/);
      expect(secret.tokenId).toBe(hashToken(secret.token));
      expect(secret.tokenId).toMatch(/^[0-9a-f]{64}$/);
      expect(codec.refreshTokenId(secret.token)).toBe(secret.tokenId);
    });

    it("never repeats a secret", () => {
      expect(codec.issueRefreshSecret().token).not.toBe(codec.issueRefreshSecret().token);
    });
  });

  it("hashToken is the hex sha256 digest", () => {
    expect(hashToken("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });
});
