/// <reference path="../types/express.d.ts" />
import { Request, Response } from "express";
import { AuthService } from "../services/auth.service";
import { PublicUser } from "../types/auth";
import { ErrorKinds } from "../utils/errors";
import { getDeviceInfo } from "../utils/request";
import { sendFailure } from "../utils/response";
import {
  changePasswordSchema,
  deleteAccountSchema,
  loginFormSchema,
  loginSchema,
  parseBody,
  refreshTokenSchema,
  registerSchema,
} from "../validators/auth.validators";

const toUserResponse = (user: PublicUser) => ({
  id: user.id,
  email: user.email,
  username: user.username,
  role: user.role,
  is_active: user.isActive,
  is_verified: user.isVerified,
  created_at: user.createdAt.toISOString(),
});

const validationFailure = (res: Response, issues: { field: string; message: string }[]) =>
  sendFailure(res, {
    kind: ErrorKinds.VALIDATION_ERROR,
    message: "Validation error",
    issues,
  });

const notAuthenticated = (res: Response) =>
  sendFailure(res, { kind: ErrorKinds.INVALID_TOKEN, message: "Not authenticated" });

export const createAuthController = (auth: AuthService) => {
  /* ================================
     REGISTER
  ================================ */

  const register = async (req: Request, res: Response) => {
    const parsed = parseBody(registerSchema, req.body);
    if (!parsed.ok) {
      return validationFailure(res, parsed.issues);
    }

    const result = await auth.register(parsed.data);
    if (!result.ok) {
      return sendFailure(res, result.error);
    }

    res.status(201).json(toUserResponse(result.value));
  };

  /* ================================
     LOGIN
  ================================ */

  // OAuth2 password flow (form-encoded); never a remember-me session
  const loginForm = async (req: Request, res: Response) => {
    const parsed = parseBody(loginFormSchema, req.body);
    if (!parsed.ok) {
      return validationFailure(res, parsed.issues);
    }

    const result = await auth.login({
      identifier: parsed.data.username,
      password: parsed.data.password,
      rememberMe: false,
      device: getDeviceInfo(req),
    });

    if (!result.ok) {
      return sendFailure(res, result.error);
    }

    res.json(result.value);
  };

  const loginJson = async (req: Request, res: Response) => {
    const parsed = parseBody(loginSchema, req.body);
    if (!parsed.ok) {
      return validationFailure(res, parsed.issues);
    }

    const result = await auth.login({
      identifier: parsed.data.username,
      password: parsed.data.password,
      rememberMe: parsed.data.remember_me,
      device: getDeviceInfo(req),
    });

    if (!result.ok) {
      return sendFailure(res, result.error);
    }

    res.json(result.value);
  };

  /* ================================
     REFRESH TOKEN
  ================================ */

  const refresh = async (req: Request, res: Response) => {
    const parsed = parseBody(refreshTokenSchema, req.body);
    if (!parsed.ok) {
      return validationFailure(res, parsed.issues);
    }

    const result = await auth.refresh(parsed.data.refresh_token, getDeviceInfo(req));
    if (!result.ok) {
      return sendFailure(res, result.error);
    }

    res.json(result.value);
  };

  /* ================================
     LOGOUT
  ================================ */

  const logout = async (req: Request, res: Response) => {
    const parsed = parseBody(refreshTokenSchema, req.body);
    if (!parsed.ok) {
      return validationFailure(res, parsed.issues);
    }

    const result = await auth.logout(parsed.data.refresh_token);
    if (!result.ok) {
      return sendFailure(res, result.error);
    }

    res.status(204).send();
  };

  const logoutAll = async (req: Request, res: Response) => {
    if (!req.user) {
      return notAuthenticated(res);
    }

    const result = await auth.logoutAll(req.user.id);
    if (!result.ok) {
      return sendFailure(res, result.error);
    }

    res.status(204).send();
  };

  /* ================================
     GET CURRENT USER PROFILE
  ================================ */

  const me = async (req: Request, res: Response) => {
    if (!req.user) {
      return notAuthenticated(res);
    }

    res.json(toUserResponse(req.user));
  };

  /* ================================
     CHANGE PASSWORD / DELETE ACCOUNT
  ================================ */

  const changePassword = async (req: Request, res: Response) => {
    if (!req.user) {
      return notAuthenticated(res);
    }

    // accept the older `current_password` field name as well
    const body: Record<string, unknown> = { ...(req.body ?? {}) };
    body.old_password = body.old_password ?? body.current_password;

    const parsed = parseBody(changePasswordSchema, body);
    if (!parsed.ok) {
      return validationFailure(res, parsed.issues);
    }

    const result = await auth.changePassword(
      req.user.id,
      parsed.data.old_password,
      parsed.data.new_password
    );

    if (!result.ok) {
      return sendFailure(res, result.error);
    }

    res.status(200).json({ message: "Password changed successfully. Please login again." });
  };

  const deleteAccount = async (req: Request, res: Response) => {
    if (!req.user) {
      return notAuthenticated(res);
    }

    const parsed = parseBody(deleteAccountSchema, req.body);
    if (!parsed.ok) {
      return validationFailure(res, parsed.issues);
    }

    const result = await auth.deleteAccount(req.user.id, parsed.data.password);
    if (!result.ok) {
      return sendFailure(res, result.error);
    }

    res.status(204).send();
  };

  return {
    register,
    loginForm,
    loginJson,
    refresh,
    logout,
    logoutAll,
    me,
    changePassword,
    deleteAccount,
  };
};
