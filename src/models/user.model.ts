import { eq, or } from "drizzle-orm";
import type { Database } from "../config/databaseConnection";
import { users } from "../schemas/users.schema";
import {
  CreateUserInput,
  CreateUserResult,
  CredentialStore,
  User,
} from "../types/auth";
import { isRole } from "../types/role";
import { duplicateUserFieldOf } from "../utils/pgErrors";

type UserRow = typeof users.$inferSelect;

export const normalizeIdentifier = (value: string) => value.toLowerCase().trim();

const toUser = (row: UserRow): User => ({
  id: row.id,
  email: row.email,
  username: row.username,
  passwordHash: row.passwordHash,
  isActive: row.isActive,
  isVerified: row.isVerified,
  // unknown roles in the table are treated as the least privileged one
  role: isRole(row.role) ? row.role : "user",
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

/* ================================
   CREDENTIAL STORE (POSTGRES)
================================ */

export const createUserModel = (db: Database): CredentialStore => {
  const createUser = async (input: CreateUserInput): Promise<CreateUserResult> => {
    const email = normalizeIdentifier(input.email);
    const username = normalizeIdentifier(input.username);

    const [existing] = await db
      .select({ email: users.email })
      .from(users)
      .where(or(eq(users.email, email), eq(users.username, username)))
      .limit(1);

    if (existing) {
      return { status: "duplicate", field: existing.email === email ? "email" : "username" };
    }

    try {
      const [row] = await db
        .insert(users)
        .values({
          email,
          username,
          passwordHash: input.passwordHash,
          role: input.role ?? "user",
        })
        .returning();

      return { status: "created", user: toUser(row) };
    } catch (err) {
      // a concurrent registration can slip past the check above
      const field = duplicateUserFieldOf(err);
      if (field) {
        return { status: "duplicate", field };
      }
      throw err;
    }
  };

  const findByUsernameOrEmail = async (identifier: string): Promise<User | null> => {
    const normalized = normalizeIdentifier(identifier);

    const [row] = await db
      .select()
      .from(users)
      .where(or(eq(users.username, normalized), eq(users.email, normalized)))
      .limit(1);

    return row ? toUser(row) : null;
  };

  const findById = async (userId: number): Promise<User | null> => {
    const [row] = await db.select().from(users).where(eq(users.id, userId)).limit(1);
    return row ? toUser(row) : null;
  };

  const updatePasswordHash = async (userId: number, passwordHash: string): Promise<boolean> => {
    const updated = await db
      .update(users)
      .set({ passwordHash, updatedAt: new Date() })
      .where(eq(users.id, userId))
      .returning({ id: users.id });

    return updated.length > 0;
  };

  const deleteUser = async (userId: number): Promise<boolean> => {
    // refresh_tokens rows go with it (ON DELETE CASCADE)
    const deleted = await db
      .delete(users)
      .where(eq(users.id, userId))
      .returning({ id: users.id });

    return deleted.length > 0;
  };

  return {
    createUser,
    findByUsernameOrEmail,
    findById,
    updatePasswordHash,
    deleteUser,
  };
};
