import { and, eq, gt, lte } from "drizzle-orm";
import type { Database } from "../config/databaseConnection";
import { refreshTokens } from "../schemas/refreshToken.schema";
import { users } from "../schemas/users.schema";
import {
  Clock,
  CreateSessionInput,
  RefreshSession,
  RevokeReason,
  SessionStore,
} from "../types/auth";

type RefreshTokenRow = typeof refreshTokens.$inferSelect;

const REVOKE_REASONS: readonly RevokeReason[] = [
  "logout",
  "logout_all",
  "rotated",
  "password_change",
  "account_deleted",
];

const toRevokeReason = (value: string | null): RevokeReason | null => {
  return REVOKE_REASONS.find((reason) => reason === value) ?? null;
};

const toSession = (row: RefreshTokenRow): RefreshSession => ({
  id: row.id,
  tokenId: row.tokenHash,
  userId: row.userId,
  issuedAt: row.createdAt,
  expiresAt: row.expiresAt,
  revoked: row.revoked,
  revokedAt: row.revokedAt,
  revokedReason: toRevokeReason(row.revokedReason),
  rememberMe: row.rememberMe,
  device: {
    userAgent: row.userAgent ?? undefined,
    ipAddress: row.ipAddress ?? undefined,
  },
});

/* ================================
   SESSION STORE (POSTGRES)
   Single-row mutations are one statement each. Rotation and
   revoke-all run in a transaction holding the user row lock, so a
   revoke-all always sees the session a concurrent rotation created.
================================ */

export const createRefreshTokenModel = (
  db: Database,
  clock: Clock = () => new Date()
): SessionStore => {
  const toInsert = (input: CreateSessionInput) => {
    const now = clock();

    return {
      userId: input.userId,
      tokenHash: input.tokenId,
      expiresAt: new Date(now.getTime() + input.ttlSeconds * 1000),
      rememberMe: input.rememberMe,
      userAgent: input.device?.userAgent?.slice(0, 512) ?? null,
      ipAddress: input.device?.ipAddress?.slice(0, 45) ?? null,
      createdAt: now,
    };
  };

  const createSession = async (input: CreateSessionInput): Promise<RefreshSession> => {
    const [row] = await db.insert(refreshTokens).values(toInsert(input)).returning();
    return toSession(row);
  };

  const getActive = async (tokenId: string): Promise<RefreshSession | null> => {
    const [row] = await db
      .select()
      .from(refreshTokens)
      .where(
        and(
          eq(refreshTokens.tokenHash, tokenId),
          eq(refreshTokens.revoked, false),
          gt(refreshTokens.expiresAt, clock())
        )
      )
      .limit(1);

    return row ? toSession(row) : null;
  };

  const revoke = async (tokenId: string, reason: RevokeReason): Promise<boolean> => {
    const revoked = await db
      .update(refreshTokens)
      .set({ revoked: true, revokedAt: clock(), revokedReason: reason })
      .where(and(eq(refreshTokens.tokenHash, tokenId), eq(refreshTokens.revoked, false)))
      .returning({ id: refreshTokens.id });

    return revoked.length > 0;
  };

  const rotate = (tokenId: string, next: CreateSessionInput): Promise<RefreshSession | null> =>
    db.transaction(async (tx) => {
      await tx
        .select({ id: users.id })
        .from(users)
        .where(eq(users.id, next.userId))
        .for("update");

      const now = clock();
      const consumed = await tx
        .update(refreshTokens)
        .set({ revoked: true, revokedAt: now, revokedReason: "rotated" })
        .where(
          and(
            eq(refreshTokens.tokenHash, tokenId),
            eq(refreshTokens.revoked, false),
            gt(refreshTokens.expiresAt, now)
          )
        )
        .returning({ id: refreshTokens.id });

      if (consumed.length === 0) {
        return null;
      }

      const [row] = await tx.insert(refreshTokens).values(toInsert(next)).returning();
      return toSession(row);
    });

  const revokeAllForUser = (userId: number, reason: RevokeReason): Promise<number> =>
    db.transaction(async (tx) => {
      // waits for any rotation in flight for this user to commit
      await tx.select({ id: users.id }).from(users).where(eq(users.id, userId)).for("update");

      const revoked = await tx
        .update(refreshTokens)
        .set({ revoked: true, revokedAt: clock(), revokedReason: reason })
        .where(and(eq(refreshTokens.userId, userId), eq(refreshTokens.revoked, false)))
        .returning({ id: refreshTokens.id });

      return revoked.length;
    });

  const purgeExpired = async (): Promise<number> => {
    const purged = await db
      .delete(refreshTokens)
      .where(lte(refreshTokens.expiresAt, clock()))
      .returning({ id: refreshTokens.id });

    return purged.length;
  };

  return {
    createSession,
    getActive,
    revoke,
    rotate,
    revokeAllForUser,
    purgeExpired,
  };
};
