import dotenv from "dotenv";
dotenv.config();

import { createServer } from "http";
import * as cron from "node-cron";
import { createApp } from "./index";
import { loadAuthConfig } from "./config/auth.config";
import { checkDbConnection, db, pool } from "./config/databaseConnection";
import { createUserModel } from "./models/user.model";
import { createRefreshTokenModel } from "./models/refreshToken.model";
import { createAuthService } from "./services/auth.service";
import { createPasswordHasher } from "./utils/password";
import { createTokenCodec } from "./utils/token";
import { logger } from "./utils/logger";
import { SessionStore } from "./types/auth";

const PORT = process.env.PORT || 5000;

const config = loadAuthConfig();
const sessions = createRefreshTokenModel(db);

const auth = createAuthService({
  credentials: createUserModel(db),
  sessions,
  tokens: createTokenCodec(config),
  hasher: createPasswordHasher(config.bcryptRounds, logger),
  config,
  logger,
});

const app = createApp({ auth, checkDb: checkDbConnection, logger });

// Create HTTP server
const httpServer = createServer(app);

let cleanupTask: cron.ScheduledTask | null = null;

const shutdown = async (signal: string) => {
  try {
    logger.warn(`🛑 Received ${signal}. Shutting down gracefully...`);

    cleanupTask?.stop();

    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
    });

    try {
      await pool.end();
    } catch (e) {
      logger.warn("⚠️ Error closing DB pool:", e);
    }

    logger.info("✅ Shutdown complete.");
    process.exit(0);
  } catch (e) {
    logger.error("❌ Shutdown error:", e);
    process.exit(1);
  }
};

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("unhandledRejection", (reason) => {
  logger.error("❌ Unhandled Promise Rejection:", reason);
});
process.on("uncaughtException", (err) => {
  logger.error("❌ Uncaught Exception:", err);
  void shutdown("uncaughtException");
});

/* ================================
   EXPIRED SESSION CLEANUP
================================ */

/**
 * Deletes refresh-token rows past their expiry.
 * Runs daily at midnight unless SESSION_CLEANUP_CRON says otherwise.
 */
const initializeSessionCleanup = (store: SessionStore) => {
  const cronExpression = process.env.SESSION_CLEANUP_CRON || "0 0 * * *";

  if (!cron.validate(cronExpression)) {
    logger.error(`❌ Invalid SESSION_CLEANUP_CRON "${cronExpression}", session cleanup disabled`);
    return null;
  }

  const runCleanup = async () => {
    try {
      const purged = await store.purgeExpired();
      if (purged > 0) {
        logger.info(`✅ Purged ${purged} expired session(s)`);
      } else {
        logger.debug("ℹ️  No expired sessions to purge");
      }
    } catch (error) {
      logger.error("❌ Error during session cleanup:", error);
    }
  };

  logger.info(`🧹 Session cleanup scheduled (cron: ${cronExpression})`);

  return cron.schedule(cronExpression, () => void runCleanup(), {
    timezone: process.env.TZ || "UTC",
  });
};

httpServer.listen(Number(PORT), "0.0.0.0", () => {
  logger.info(`🚀 Server running on port ${PORT}`);

  checkDbConnection()
    .then(() => {
      logger.info("✅ Database connection verified");
      cleanupTask = initializeSessionCleanup(sessions);
    })
    .catch((error: unknown) => {
      logger.error("❌ Database connection failed:", error instanceof Error ? error.message : error);
      logger.error("💡 Check that PostgreSQL is running and DATABASE_URL in .env is correct");
      process.exit(1); // stop app if DB fails
    });
});
