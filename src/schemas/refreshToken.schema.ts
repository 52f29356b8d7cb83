// src/schemas/refreshToken.schema.ts
import {
  pgTable,
  bigserial,
  varchar,
  timestamp,
  boolean,
  bigint,
  index,
} from "drizzle-orm/pg-core";
import { users } from "./users.schema";

export const refreshTokens = pgTable(
  "refresh_tokens",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    userId: bigint("user_id", { mode: "number" })
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    tokenHash: varchar("token_hash", { length: 64 }).notNull().unique(), // never store raw token
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(), // expiration check
    revoked: boolean("revoked").default(false).notNull(), // soft revoke
    revokedAt: timestamp("revoked_at", { withTimezone: true }),
    revokedReason: varchar("revoked_reason", { length: 32 }),
    rememberMe: boolean("remember_me").default(false).notNull(),
    userAgent: varchar("user_agent", { length: 512 }),
    ipAddress: varchar("ip_address", { length: 45 }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(), // audit / cleanup
  },
  (table) => ({
    userActiveIdx: index("idx_refresh_tokens_user_active").on(table.userId, table.expiresAt),
    expiresAtIdx: index("idx_refresh_tokens_expires_at").on(table.expiresAt),
  })
);
