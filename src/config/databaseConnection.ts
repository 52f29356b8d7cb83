import { Pool } from "pg";
import { drizzle, NodePgDatabase } from "drizzle-orm/node-postgres";
import { logger } from "../utils/logger";

export type Database = NodePgDatabase;

const DATABASE_URL = process.env.DATABASE_URL;

if (!DATABASE_URL) {
  throw new Error("DATABASE_URL missing");
}

// Parse DATABASE_URL to check for SSL parameters
const isLocalhost = DATABASE_URL.includes("localhost") || DATABASE_URL.includes("127.0.0.1");

// For localhost, remove any SSL parameters from connection string
let cleanDatabaseUrl = DATABASE_URL;
if (isLocalhost) {
  cleanDatabaseUrl = DATABASE_URL
    .replace(/[?&]sslmode=[^&]*/gi, "")
    .replace(/[?&]ssl=[^&]*/gi, "")
    .replace(/[?&]channel_binding=[^&]*/gi, "");
}

// - Localhost: SSL disabled (local PostgreSQL typically doesn't support SSL)
// - Remote DB (Neon, Supabase, etc.): SSL without verifying the server certificate
const sslConfig: boolean | { rejectUnauthorized: boolean } = isLocalhost
  ? false
  : { rejectUnauthorized: false };

// Upper bound for every storage call made by the auth service
const queryTimeoutMs = Math.max(
  100,
  parseInt(process.env.DB_QUERY_TIMEOUT_MS ?? "5000", 10) || 5000
);

logger.debug(`🔐 SSL Configuration: ${sslConfig === false ? "Disabled" : "Enabled"}`);

const pool = new Pool({
  connectionString: cleanDatabaseUrl,
  ssl: sslConfig,
  query_timeout: queryTimeoutMs,
});

// Handle pool errors
pool.on("error", (err) => {
  logger.error("❌ Unexpected database pool error:", err);
});

pool.on("connect", () => {
  logger.debug("🔌 Database pool connection established");
});

// ✅ Drizzle instance (pass this to the models)
export const db: Database = drizzle(pool);

export { pool };

const errorCodeOf = (error: unknown): string | undefined => {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
};

// ✅ Connection health check (startup + /health)
export const checkDbConnection = async (): Promise<void> => {
  try {
    const result = await pool.query<{ current_database: string }>("SELECT current_database()");
    logger.debug("✅ Connected to DB:", result.rows[0]?.current_database);
  } catch (error) {
    const code = errorCodeOf(error);
    logger.error("❌ Database connection error:", error instanceof Error ? error.message : error);
    if (code === "ECONNREFUSED") {
      logger.error("   💡 Tip: Make sure PostgreSQL is running on localhost:5432");
    } else if (code === "28P01") {
      logger.error("   💡 Tip: Check your database username and password");
    } else if (code === "3D000") {
      logger.error("   💡 Tip: The database named in DATABASE_URL does not exist. Create it first.");
    }
    throw error; // Re-throw to let the caller decide
  }
};

export default pool;
