/// <reference path="../types/express.d.ts" />
// auth.middleware.ts
import { Request, Response, NextFunction, RequestHandler } from "express";
import { AuthService } from "../services/auth.service";
import { ErrorKinds } from "../utils/errors";
import { getBearerToken } from "../utils/request";
import { sendFailure } from "../utils/response";

export const createRequireAuth = (auth: AuthService): RequestHandler => {
  return async (req: Request, res: Response, next: NextFunction) => {
    const token = getBearerToken(req);

    if (!token) {
      return sendFailure(res, { kind: ErrorKinds.INVALID_TOKEN, message: "Not authenticated" });
    }

    try {
      const result = await auth.getCurrentUser(token);

      if (!result.ok) {
        return sendFailure(res, result.error);
      }

      if (!result.value.isActive) {
        return sendFailure(res, { kind: ErrorKinds.ACCOUNT_INACTIVE, message: "Inactive user" });
      }

      req.user = result.value;
      next();
    } catch (error) {
      next(error);
    }
  };
};
