import {
  Clock,
  CreateSessionInput,
  CreateUserInput,
  CreateUserResult,
  CredentialStore,
  RefreshSession,
  RevokeReason,
  SessionStore,
  User,
} from "../../types/auth";
import { normalizeIdentifier } from "../../models/user.model";

/**
 * In-process stand-ins for the Postgres models. Same contracts as
 * user.model.ts and refreshToken.model.ts, backed by Maps.
 */

export interface TestClock {
  now: Clock;
  advanceSeconds(seconds: number): void;
}

export const createTestClock = (start = new Date("2026-01-01T00:00:00.000Z")): TestClock => {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advanceSeconds: (seconds) => {
      current += seconds * 1000;
    },
  };
};

export interface MemoryCredentialStore extends CredentialStore {
  users: Map<number, User>;
}

export const createMemoryCredentialStore = (clock: Clock = () => new Date()): MemoryCredentialStore => {
  const users = new Map<number, User>();
  let nextId = 1;

  const createUser = async (input: CreateUserInput): Promise<CreateUserResult> => {
    const email = normalizeIdentifier(input.email);
    const username = normalizeIdentifier(input.username);

    for (const user of users.values()) {
      if (user.email === email) return { status: "duplicate", field: "email" };
      if (user.username === username) return { status: "duplicate", field: "username" };
    }

    const user: User = {
      id: nextId++,
      email,
      username,
      passwordHash: input.passwordHash,
      isActive: true,
      isVerified: false,
      role: input.role ?? "user",
      createdAt: clock(),
      updatedAt: null,
    };
    users.set(user.id, user);
    return { status: "created", user: { ...user } };
  };

  const findByUsernameOrEmail = async (identifier: string) => {
    const normalized = normalizeIdentifier(identifier);
    for (const user of users.values()) {
      if (user.username === normalized || user.email === normalized) return { ...user };
    }
    return null;
  };

  const findById = async (userId: number) => {
    const user = users.get(userId);
    return user ? { ...user } : null;
  };

  const updatePasswordHash = async (userId: number, passwordHash: string) => {
    const user = users.get(userId);
    if (!user) return false;
    users.set(userId, { ...user, passwordHash, updatedAt: clock() });
    return true;
  };

  const deleteUser = async (userId: number) => users.delete(userId);

  return { users, createUser, findByUsernameOrEmail, findById, updatePasswordHash, deleteUser };
};

export interface MemorySessionStore extends SessionStore {
  sessions: Map<string, RefreshSession>;
}

export const createMemorySessionStore = (clock: Clock = () => new Date()): MemorySessionStore => {
  const sessions = new Map<string, RefreshSession>();
  let nextId = 1;

  // synchronous, so nothing can interleave with a rotation
  const insert = (input: CreateSessionInput): RefreshSession => {
    const issuedAt = clock();
    const session: RefreshSession = {
      id: nextId++,
      tokenId: input.tokenId,
      userId: input.userId,
      issuedAt,
      expiresAt: new Date(issuedAt.getTime() + input.ttlSeconds * 1000),
      revoked: false,
      revokedAt: null,
      revokedReason: null,
      rememberMe: input.rememberMe,
      device: { ...input.device },
    };
    sessions.set(session.tokenId, session);
    return { ...session };
  };

  const createSession = async (input: CreateSessionInput) => insert(input);

  const getActive = async (tokenId: string) => {
    const session = sessions.get(tokenId);
    if (!session || session.revoked) return null;
    if (session.expiresAt.getTime() <= clock().getTime()) return null;
    return { ...session };
  };

  const markRevoked = (session: RefreshSession, reason: RevokeReason) => {
    sessions.set(session.tokenId, {
      ...session,
      revoked: true,
      revokedAt: clock(),
      revokedReason: reason,
    });
  };

  const revoke = async (tokenId: string, reason: RevokeReason) => {
    const session = sessions.get(tokenId);
    if (!session || session.revoked) return false;
    markRevoked(session, reason);
    return true;
  };

  const rotate = async (tokenId: string, next: CreateSessionInput) => {
    const session = sessions.get(tokenId);
    if (!session || session.revoked) return null;
    if (session.expiresAt.getTime() <= clock().getTime()) return null;
    markRevoked(session, "rotated");
    return insert(next);
  };

  const revokeAllForUser = async (userId: number, reason: RevokeReason) => {
    let count = 0;
    for (const session of [...sessions.values()]) {
      if (session.userId === userId && !session.revoked) {
        markRevoked(session, reason);
        count++;
      }
    }
    return count;
  };

  const purgeExpired = async () => {
    let count = 0;
    for (const session of [...sessions.values()]) {
      if (session.expiresAt.getTime() <= clock().getTime()) {
        sessions.delete(session.tokenId);
        count++;
      }
    }
    return count;
  };

  return { sessions, createSession, getActive, revoke, rotate, revokeAllForUser, purgeExpired };
};
