import "dotenv/config";
import { db, pool } from "../config/databaseConnection";
import { loadAuthConfig } from "../config/auth.config";
import { createUserModel } from "../models/user.model";
import { createPasswordHasher } from "../utils/password";
import { logger } from "../utils/logger";

async function seedAdmin() {
  const email = process.env.ADMIN_EMAIL;
  const username = process.env.ADMIN_USERNAME || "admin";
  const password = process.env.ADMIN_PASSWORD;

  if (!email || !password) {
    throw new Error("ADMIN_EMAIL and ADMIN_PASSWORD must be set");
  }

  if (password.length < 8) {
    throw new Error("ADMIN_PASSWORD must be at least 8 characters");
  }

  const { bcryptRounds } = loadAuthConfig();
  const passwordHash = await createPasswordHasher(bcryptRounds).hash(password);

  const result = await createUserModel(db).createUser({
    email,
    username,
    passwordHash,
    role: "admin",
  });

  if (result.status === "duplicate") {
    logger.warn(`⚠️ Admin not created: ${result.field} already registered`);
  } else {
    logger.info("✅ Admin user created");
    logger.info("📧 Email:", result.user.email);
    logger.info("👤 Username:", result.user.username);
  }

  await pool.end();
  process.exit(0);
}

seedAdmin().catch((err: unknown) => {
  logger.error("❌ Failed to seed admin:", err);
  process.exit(1);
});
