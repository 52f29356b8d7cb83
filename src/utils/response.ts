import { Response } from "express";
import { AuthFailure, getStatusCode } from "./errors";

export const sendFailure = (res: Response, failure: AuthFailure) => {
  const status = getStatusCode(failure.kind);

  if (status === 401) {
    res.setHeader("WWW-Authenticate", "Bearer");
  }

  return res.status(status).json({
    message: failure.message,
    code: failure.kind,
    ...(failure.field !== undefined ? { field: failure.field } : {}),
    ...(failure.issues !== undefined ? { errors: failure.issues } : {}),
  });
};
