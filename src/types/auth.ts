import { Role } from "./role";

/* ================================
   USERS
================================ */

export interface User {
  id: number;
  email: string;
  username: string;
  passwordHash: string;
  isActive: boolean;
  isVerified: boolean;
  role: Role;
  createdAt: Date;
  updatedAt: Date | null;
}

export type PublicUser = Omit<User, "passwordHash">;

// what requireAuth puts on req.user
export type AuthUser = PublicUser;

export type DuplicateField = "email" | "username";

export interface CreateUserInput {
  email: string;
  username: string;
  passwordHash: string;
  role?: Role;
}

export type CreateUserResult =
  | { status: "created"; user: User }
  | { status: "duplicate"; field: DuplicateField };

export interface CredentialStore {
  createUser(input: CreateUserInput): Promise<CreateUserResult>;
  findByUsernameOrEmail(identifier: string): Promise<User | null>;
  findById(userId: number): Promise<User | null>;
  updatePasswordHash(userId: number, passwordHash: string): Promise<boolean>;
  deleteUser(userId: number): Promise<boolean>;
}

/* ================================
   SESSIONS
================================ */

export type RevokeReason =
  | "logout"
  | "logout_all"
  | "rotated"
  | "password_change"
  | "account_deleted";

export interface DeviceInfo {
  userAgent?: string;
  ipAddress?: string;
}

export interface RefreshSession {
  id: number;
  tokenId: string; // sha256 of the refresh secret, never the secret itself
  userId: number;
  issuedAt: Date;
  expiresAt: Date;
  revoked: boolean;
  revokedAt: Date | null;
  revokedReason: RevokeReason | null;
  rememberMe: boolean;
  device: DeviceInfo;
}

export interface CreateSessionInput {
  userId: number;
  tokenId: string;
  ttlSeconds: number;
  rememberMe: boolean;
  device?: DeviceInfo;
}

export interface SessionStore {
  createSession(input: CreateSessionInput): Promise<RefreshSession>;
  /** Expired or revoked sessions resolve to null. */
  getActive(tokenId: string): Promise<RefreshSession | null>;
  /** True only for the call that moved the session out of ACTIVE. */
  revoke(tokenId: string, reason: RevokeReason): Promise<boolean>;
  /**
   * Revokes the active session `tokenId` as "rotated" and creates `next` in
   * one atomic step. Null when the old session was no longer active.
   */
  rotate(tokenId: string, next: CreateSessionInput): Promise<RefreshSession | null>;
  revokeAllForUser(userId: number, reason: RevokeReason): Promise<number>;
  purgeExpired(): Promise<number>;
}

/* ================================
   TOKENS
================================ */

export interface AccessTokenExtras {
  role?: Role;
  username?: string;
}

export interface AccessTokenClaims extends AccessTokenExtras {
  sub: string;
  iat: number;
  exp: number;
  type: "access";
  jti: string;
}

export type TokenCheckError = "BAD_SIGNATURE" | "WRONG_TOKEN_TYPE" | "EXPIRED";

export type TokenCheck =
  | { ok: true; claims: AccessTokenClaims }
  | { ok: false; error: TokenCheckError };

export interface IssuedAccessToken {
  token: string;
  claims: AccessTokenClaims;
}

export interface RefreshSecret {
  token: string;
  tokenId: string;
}

export interface TokenCodec {
  issueAccess(userId: number, extras?: AccessTokenExtras, ttlSeconds?: number): IssuedAccessToken;
  issueRefreshSecret(): RefreshSecret;
  refreshTokenId(token: string): string;
  verifyAccess(token: string): TokenCheck;
}

export interface TokenPair {
  access_token: string;
  refresh_token: string;
  token_type: "bearer";
  expires_in: number;
}

export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, hash: string): Promise<boolean>;
}

export type Clock = () => Date;
