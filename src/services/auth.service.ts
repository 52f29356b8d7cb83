import crypto from "crypto";
import { AuthConfig } from "../config/auth.config";
import {
  CreateSessionInput,
  CredentialStore,
  DeviceInfo,
  PasswordHasher,
  PublicUser,
  SessionStore,
  TokenCodec,
  TokenPair,
  User,
} from "../types/auth";
import { AuthResult, ErrorKinds, fail, succeed } from "../utils/errors";
import { Logger, logger as defaultLogger } from "../utils/logger";

/**
 * Auth engine: registration, login, refresh-token rotation, logout and
 * password/account management on top of the injected stores.
 *
 * Operations never throw. Storage errors are logged here and returned as
 * STORAGE_FAILURE so callers never see driver detail.
 */

export interface AuthServiceDeps {
  credentials: CredentialStore;
  sessions: SessionStore;
  tokens: TokenCodec;
  hasher: PasswordHasher;
  config: Pick<AuthConfig, "accessTokenTtlSeconds" | "refreshTokenTtlSeconds" | "rememberMeTtlSeconds">;
  logger?: Logger;
}

export interface RegisterInput {
  email: string;
  username: string;
  password: string;
}

export interface LoginInput {
  identifier: string;
  password: string;
  rememberMe?: boolean;
  device?: DeviceInfo;
}

export interface AuthService {
  register(input: RegisterInput): Promise<AuthResult<PublicUser>>;
  login(input: LoginInput): Promise<AuthResult<TokenPair>>;
  refresh(refreshToken: string, device?: DeviceInfo): Promise<AuthResult<TokenPair>>;
  logout(refreshToken: string): Promise<AuthResult<void>>;
  logoutAll(userId: number): Promise<AuthResult<{ revokedSessions: number }>>;
  changePassword(
    userId: number,
    oldPassword: string,
    newPassword: string
  ): Promise<AuthResult<{ revokedSessions: number }>>;
  deleteAccount(userId: number, password: string): Promise<AuthResult<void>>;
  getCurrentUser(accessToken: string): Promise<AuthResult<PublicUser>>;
}

export const toPublicUser = (user: User): PublicUser => {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
};

export const createAuthService = ({
  credentials,
  sessions,
  tokens,
  hasher,
  config,
  logger = defaultLogger,
}: AuthServiceDeps): AuthService => {
  // Hash checked when the identifier matches no user, so both login
  // failure paths pay for one bcrypt comparison.
  let dummyHash: Promise<string> | null = null;
  const getDummyHash = () => {
    dummyHash ??= hasher.hash(crypto.randomBytes(16).toString("hex")).catch((error: unknown) => {
      // let the next login try again
      dummyHash = null;
      throw error;
    });
    return dummyHash;
  };

  const guard = async <T>(
    operation: string,
    run: () => Promise<AuthResult<T>>
  ): Promise<AuthResult<T>> => {
    try {
      return await run();
    } catch (error) {
      logger.error(`❌ ${operation} failed:`, error);
      return fail(ErrorKinds.STORAGE_FAILURE);
    }
  };

  const sessionInput = (
    user: User,
    tokenId: string,
    rememberMe: boolean,
    device?: DeviceInfo
  ): CreateSessionInput => ({
    userId: user.id,
    tokenId,
    ttlSeconds: rememberMe ? config.rememberMeTtlSeconds : config.refreshTokenTtlSeconds,
    rememberMe,
    device,
  });

  const tokenPair = (user: User, refreshToken: string): TokenPair => {
    const access = tokens.issueAccess(user.id, { role: user.role, username: user.username });

    return {
      access_token: access.token,
      refresh_token: refreshToken,
      token_type: "bearer",
      expires_in: config.accessTokenTtlSeconds,
    };
  };

  const openSession = async (
    user: User,
    rememberMe: boolean,
    device?: DeviceInfo
  ): Promise<TokenPair> => {
    const secret = tokens.issueRefreshSecret();
    await sessions.createSession(sessionInput(user, secret.tokenId, rememberMe, device));
    return tokenPair(user, secret.token);
  };

  /* ================================
     REGISTER
  ================================ */

  const register = (input: RegisterInput) =>
    guard("register", async () => {
      const passwordHash = await hasher.hash(input.password);

      const result = await credentials.createUser({
        email: input.email,
        username: input.username,
        passwordHash,
      });

      if (result.status === "duplicate") {
        const message =
          result.field === "email" ? "Email already registered" : "Username already taken";
        return fail(ErrorKinds.DUPLICATE_CREDENTIAL, { message, field: result.field });
      }

      logger.info(`✅ User registered: ${result.user.id} (${result.user.username})`);
      return succeed(toPublicUser(result.user));
    });

  /* ================================
     LOGIN
  ================================ */

  const login = (input: LoginInput) =>
    guard("login", async () => {
      const user = await credentials.findByUsernameOrEmail(input.identifier);

      const passwordMatches = await hasher.verify(
        input.password,
        user ? user.passwordHash : await getDummyHash()
      );

      // same kind and message for unknown identifier and wrong password
      if (!user || !passwordMatches) {
        return fail(ErrorKinds.INVALID_CREDENTIALS);
      }

      if (!user.isActive) {
        return fail(ErrorKinds.ACCOUNT_INACTIVE);
      }

      const pair = await openSession(user, input.rememberMe ?? false, input.device);

      logger.debug(`✅ Login successful for user ${user.id} (remember_me=${input.rememberMe ?? false})`);
      return succeed(pair);
    });

  /* ================================
     REFRESH (ROTATING)
  ================================ */

  const refresh = (refreshToken: string, device?: DeviceInfo) =>
    guard("refresh", async () => {
      if (!refreshToken) {
        return fail(ErrorKinds.INVALID_REFRESH_TOKEN);
      }

      const tokenId = tokens.refreshTokenId(refreshToken.trim());
      const session = await sessions.getActive(tokenId);

      if (!session) {
        return fail(ErrorKinds.INVALID_REFRESH_TOKEN);
      }

      const user = await credentials.findById(session.userId);
      if (!user) {
        await sessions.revoke(tokenId, "account_deleted");
        return fail(ErrorKinds.INVALID_REFRESH_TOKEN);
      }

      if (!user.isActive) {
        return fail(ErrorKinds.ACCOUNT_INACTIVE);
      }

      // revoke and insert commit together; a logout or revoke-all that got
      // there first leaves nothing to rotate
      const secret = tokens.issueRefreshSecret();
      const next = await sessions.rotate(
        tokenId,
        sessionInput(user, secret.tokenId, session.rememberMe, device ?? session.device)
      );
      if (!next) {
        return fail(ErrorKinds.INVALID_REFRESH_TOKEN);
      }

      logger.debug(`🔄 Rotated refresh token for user ${user.id} (session ${session.id} -> ${next.id})`);
      return succeed(tokenPair(user, secret.token));
    });

  /* ================================
     LOGOUT
  ================================ */

  const logout = (refreshToken: string) =>
    guard<void>("logout", async () => {
      if (!refreshToken || !refreshToken.trim()) {
        return fail(ErrorKinds.VALIDATION_ERROR, {
          issues: [{ field: "refresh_token", message: "Refresh token is required" }],
        });
      }

      // unknown or already revoked tokens are not an error here
      await sessions.revoke(tokens.refreshTokenId(refreshToken.trim()), "logout");
      return succeed(undefined);
    });

  const logoutAll = (userId: number) =>
    guard("logoutAll", async () => {
      const revokedSessions = await sessions.revokeAllForUser(userId, "logout_all");
      logger.info(`🔒 Logged out user ${userId} from ${revokedSessions} session(s)`);
      return succeed({ revokedSessions });
    });

  /* ================================
     PASSWORD / ACCOUNT
  ================================ */

  const changePassword = (userId: number, oldPassword: string, newPassword: string) =>
    guard("changePassword", async () => {
      const user = await credentials.findById(userId);
      if (!user) {
        return fail(ErrorKinds.USER_NOT_FOUND);
      }

      const oldMatches = await hasher.verify(oldPassword, user.passwordHash);
      if (!oldMatches) {
        return fail(ErrorKinds.INVALID_CREDENTIALS, { message: "Current password is incorrect" });
      }

      if (oldPassword === newPassword) {
        return fail(ErrorKinds.VALIDATION_ERROR, {
          issues: [
            { field: "new_password", message: "New password must be different from current password" },
          ],
        });
      }

      const passwordHash = await hasher.hash(newPassword);
      const updated = await credentials.updatePasswordHash(userId, passwordHash);
      if (!updated) {
        return fail(ErrorKinds.USER_NOT_FOUND);
      }

      const revokedSessions = await sessions.revokeAllForUser(userId, "password_change");
      logger.info(`🔑 Password changed for user ${userId}; revoked ${revokedSessions} session(s)`);
      return succeed({ revokedSessions });
    });

  const deleteAccount = (userId: number, password: string) =>
    guard<void>("deleteAccount", async () => {
      const user = await credentials.findById(userId);
      if (!user) {
        return fail(ErrorKinds.USER_NOT_FOUND);
      }

      const matches = await hasher.verify(password, user.passwordHash);
      if (!matches) {
        return fail(ErrorKinds.INVALID_CREDENTIALS, { message: "Password is incorrect" });
      }

      await sessions.revokeAllForUser(userId, "account_deleted");
      await credentials.deleteUser(userId);

      logger.info(`🗑️ Account deleted: ${userId}`);
      return succeed(undefined);
    });

  /* ================================
     CURRENT USER
  ================================ */

  const getCurrentUser = (accessToken: string) =>
    guard("getCurrentUser", async () => {
      const check = tokens.verifyAccess(accessToken);
      if (!check.ok) {
        logger.debug(`Access token rejected: ${check.error}`);
        return fail(ErrorKinds.INVALID_TOKEN);
      }

      const userId = Number(check.claims.sub);
      if (!Number.isSafeInteger(userId) || userId <= 0) {
        return fail(ErrorKinds.INVALID_TOKEN);
      }

      // tokens outlive a deleted account until they expire
      const user = await credentials.findById(userId);
      if (!user) {
        return fail(ErrorKinds.USER_NOT_FOUND);
      }

      return succeed(toPublicUser(user));
    });

  return {
    register,
    login,
    refresh,
    logout,
    logoutAll,
    changePassword,
    deleteAccount,
    getCurrentUser,
  };
};
