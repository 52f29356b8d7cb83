import jwt, { JwtPayload, TokenExpiredError } from "jsonwebtoken";
import crypto from "crypto";
import { AuthConfig } from "../config/auth.config";
import {
  AccessTokenClaims,
  AccessTokenExtras,
  Clock,
  TokenCheck,
  TokenCodec,
} from "../types/auth";
import { isRole } from "../types/role";

const ALGORITHM = "HS256";

export const hashToken = (token: string) => {
  return crypto.createHash("sha256").update(token).digest("hex");
};

const toSeconds = (date: Date) => Math.floor(date.getTime() / 1000);

/**
 * Rebuilds typed claims from a verified payload. Anything that is not an
 * access token of the expected shape is rejected.
 */
const readAccessClaims = (payload: string | JwtPayload): AccessTokenClaims | null => {
  if (typeof payload === "string") return null;

  const { sub, iat, exp, type, jti, role, username } = payload;

  if (type !== "access") return null;
  if (typeof sub !== "string" || typeof jti !== "string") return null;
  if (typeof iat !== "number" || typeof exp !== "number") return null;

  const claims: AccessTokenClaims = { sub, iat, exp, type, jti };
  if (isRole(role)) claims.role = role;
  if (typeof username === "string") claims.username = username;
  return claims;
};

export const createTokenCodec = (
  config: Pick<AuthConfig, "jwtSecret" | "accessTokenTtlSeconds">,
  clock: Clock = () => new Date()
): TokenCodec => {
  const issueAccess = (
    userId: number,
    extras: AccessTokenExtras = {},
    ttlSeconds: number = config.accessTokenTtlSeconds
  ) => {
    const now = toSeconds(clock());

    const claims: AccessTokenClaims = {
      sub: String(userId),
      iat: now,
      exp: now + ttlSeconds,
      type: "access",
      jti: crypto.randomBytes(16).toString("hex"),
      ...extras,
    };

    const token = jwt.sign(claims, config.jwtSecret, { algorithm: ALGORITHM });
    return { token, claims };
  };

  const issueRefreshSecret = () => {
    const token = crypto.randomBytes(32).toString("base64url");
    return { token, tokenId: hashToken(token) };
  };

  const verifyAccess = (token: string): TokenCheck => {
    let payload: string | JwtPayload;

    try {
      payload = jwt.verify(token, config.jwtSecret, {
        algorithms: [ALGORITHM],
        clockTimestamp: toSeconds(clock()),
      });
    } catch (error) {
      if (error instanceof TokenExpiredError) {
        return { ok: false, error: "EXPIRED" };
      }
      return { ok: false, error: "BAD_SIGNATURE" };
    }

    const claims = readAccessClaims(payload);
    if (!claims) {
      return { ok: false, error: "WRONG_TOKEN_TYPE" };
    }

    return { ok: true, claims };
  };

  return {
    issueAccess,
    issueRefreshSecret,
    refreshTokenId: hashToken,
    verifyAccess,
  };
};
