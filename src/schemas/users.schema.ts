import {
  pgTable,
  bigserial,
  varchar,
  timestamp,
  boolean,
  index,
} from "drizzle-orm/pg-core";

export const users = pgTable(
  "users",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),

    // stored lower-cased and trimmed, so unique() is case-insensitive
    email: varchar("email", { length: 255 }).notNull().unique("users_email_unique"),

    username: varchar("username", { length: 50 }).notNull().unique("users_username_unique"),

    passwordHash: varchar("password_hash", { length: 255 }).notNull(),

    isActive: boolean("is_active").default(true).notNull(),

    isVerified: boolean("is_verified").default(false).notNull(),

    role: varchar("role", { length: 50 }).default("user").notNull(),

    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),

    updatedAt: timestamp("updated_at", { withTimezone: true }),
  },
  (table) => ({
    createdAtIdx: index("idx_users_created_at").on(table.createdAt),
  })
);
