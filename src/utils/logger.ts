/* ================================
   SIMPLE LOGGER (Production-Ready)
================================ */

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

const noop = () => undefined;

export const createLogger = (env: NodeJS.ProcessEnv = process.env): Logger => {
  if (env.LOG_LEVEL === "silent") {
    return { error: noop, warn: noop, info: noop, debug: noop };
  }

  const isProduction = env.NODE_ENV === "production";

  return {
    error: (...args) => console.error(...args),
    warn: (...args) => console.warn(...args),
    info: (...args) => console.log(...args),
    debug: (...args) => {
      // debug logs are silent in production
      if (!isProduction) {
        console.log(...args);
      }
    },
  };
};

export const logger = createLogger();
