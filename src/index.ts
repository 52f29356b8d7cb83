/// <reference path="./types/express.d.ts" />
import express, { Application, NextFunction, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";
import { createAuthRoutes } from "./routes/auth.routes";
import { createHealthController } from "./controllers/health.controller";
import { AuthService } from "./services/auth.service";
import { ErrorKinds } from "./utils/errors";
import { Logger, logger as defaultLogger } from "./utils/logger";
import { sendFailure } from "./utils/response";

export interface AppDeps {
  auth: AuthService;
  checkDb: () => Promise<void>;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

const parseOrigins = (raw?: string): string[] =>
  (raw || "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

// body-parser errors carry the status they should be answered with
const statusOf = (err: unknown): number => {
  if (typeof err === "object" && err !== null) {
    const status: unknown = Reflect.get(err, "status") ?? Reflect.get(err, "statusCode");
    if (typeof status === "number" && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
};

const isBodyParseError = (err: unknown): boolean =>
  typeof err === "object" && err !== null && Reflect.get(err, "type") === "entity.parse.failed";

export const createApp = ({
  auth,
  checkDb,
  logger = defaultLogger,
  env = process.env,
}: AppDeps): Application => {
  const app = express();
  const isProduction = env.NODE_ENV === "production";

  /**
   * Production CORS allowlist, configured via
   * CORS_ORIGINS=https://app.example.com,https://admin.example.com
   */
  const allowedOrigins = parseOrigins(env.CORS_ORIGINS);

  // Behind a reverse proxy, trust it so req.ip is the client address
  if (isProduction) {
    app.set("trust proxy", 1);
  }

  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (mobile apps, server-to-server)
        if (!origin || !isProduction) {
          return callback(null, true);
        }

        callback(null, allowedOrigins.includes(origin));
      },
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
      optionsSuccessStatus: 200,
    })
  );

  // Baseline hardening
  app.disable("x-powered-by");
  app.use(helmet());
  app.use(compression());

  app.use(express.json({ limit: "100kb" }));
  app.use(express.urlencoded({ extended: false, limit: "100kb" }));

  app.get("/", (_req, res) => {
    res.json({ message: "Session authority API", version: "1.0.0", status: "running" });
  });
  app.get("/health", createHealthController(checkDb));

  app.use("/auth", createAuthRoutes(auth));

  // 404
  app.use((_req, res) => {
    sendFailure(res, { kind: ErrorKinds.NOT_FOUND, message: "Route not found" });
  });

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      return sendFailure(res, {
        kind: ErrorKinds.VALIDATION_ERROR,
        message: "Malformed request body",
      });
    }

    const status = statusOf(err);

    if (status >= 500) {
      logger.error("❌ Unhandled request error:", err);
      return res.status(status).json({ message: "Internal server error" });
    }

    const message = err instanceof Error && err.message ? err.message : "Request failed";
    res.status(status).json({ message });
  });

  return app;
};
