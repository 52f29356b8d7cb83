import { Request, Response } from "express";

export const createHealthController = (checkDb: () => Promise<void>) => {
  return async (_req: Request, res: Response) => {
    try {
      // verify DB connectivity with a lightweight check
      await checkDb();

      res.json({ status: "ok", db: "connected", timestamp: new Date().toISOString() });
    } catch {
      res.status(503).json({ status: "error", db: "disconnected", timestamp: new Date().toISOString() });
    }
  };
};
