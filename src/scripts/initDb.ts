import "dotenv/config";
import fs from "fs";
import path from "path";
import { pool } from "../config/databaseConnection";
import { logger } from "../utils/logger";

// compiled to dist/scripts, so the schema sits two levels up
const SCHEMA_PATH = path.join(__dirname, "../../db/schema.sql");

async function initDb() {
  const sql = fs.readFileSync(SCHEMA_PATH, "utf8");

  await pool.query(sql);

  logger.info("✅ Database schema applied from", SCHEMA_PATH);
  await pool.end();
  process.exit(0);
}

initDb().catch((err: unknown) => {
  logger.error("❌ Failed to initialize database:", err);
  process.exit(1);
});
