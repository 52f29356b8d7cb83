/**
 * Error kinds returned by the auth engine, with the HTTP status and the
 * client-safe message each one maps to.
 */

export const ErrorKinds = {
  // 401
  INVALID_CREDENTIALS: "INVALID_CREDENTIALS",
  INVALID_REFRESH_TOKEN: "INVALID_REFRESH_TOKEN",
  INVALID_TOKEN: "INVALID_TOKEN",
  USER_NOT_FOUND: "USER_NOT_FOUND",

  // 403
  ACCOUNT_INACTIVE: "ACCOUNT_INACTIVE",

  // 404
  NOT_FOUND: "NOT_FOUND",

  // 409
  DUPLICATE_CREDENTIAL: "DUPLICATE_CREDENTIAL",

  // 422
  VALIDATION_ERROR: "VALIDATION_ERROR",

  // 500
  STORAGE_FAILURE: "STORAGE_FAILURE",
} as const;

export type ErrorKind = typeof ErrorKinds[keyof typeof ErrorKinds];

export const ErrorStatusCodes: Record<ErrorKind, number> = {
  [ErrorKinds.INVALID_CREDENTIALS]: 401,
  [ErrorKinds.INVALID_REFRESH_TOKEN]: 401,
  [ErrorKinds.INVALID_TOKEN]: 401,
  [ErrorKinds.USER_NOT_FOUND]: 401,
  [ErrorKinds.ACCOUNT_INACTIVE]: 403,
  [ErrorKinds.NOT_FOUND]: 404,
  [ErrorKinds.DUPLICATE_CREDENTIAL]: 409,
  [ErrorKinds.VALIDATION_ERROR]: 422,
  [ErrorKinds.STORAGE_FAILURE]: 500,
};

// 401 messages stay fixed so responses do not reveal which check failed
export const ErrorMessages: Record<ErrorKind, string> = {
  [ErrorKinds.INVALID_CREDENTIALS]: "Incorrect username or password",
  [ErrorKinds.INVALID_REFRESH_TOKEN]: "Invalid or expired refresh token",
  [ErrorKinds.INVALID_TOKEN]: "Could not validate credentials",
  [ErrorKinds.USER_NOT_FOUND]: "Could not validate credentials",
  [ErrorKinds.ACCOUNT_INACTIVE]: "Account is inactive. Please contact support.",
  [ErrorKinds.NOT_FOUND]: "Resource not found",
  [ErrorKinds.DUPLICATE_CREDENTIAL]: "Email or username already registered",
  [ErrorKinds.VALIDATION_ERROR]: "Validation error",
  [ErrorKinds.STORAGE_FAILURE]: "Internal server error",
};

export interface FieldIssue {
  field: string;
  message: string;
}

export interface AuthFailure {
  kind: ErrorKind;
  message: string;
  field?: string;
  issues?: FieldIssue[];
}

export type AuthResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: AuthFailure };

export const succeed = <T>(value: T): AuthResult<T> => ({ ok: true, value });

export const fail = <T = never>(
  kind: ErrorKind,
  extra: { message?: string; field?: string; issues?: FieldIssue[] } = {}
): AuthResult<T> => {
  const error: AuthFailure = { kind, message: extra.message ?? ErrorMessages[kind] };
  if (extra.field) error.field = extra.field;
  if (extra.issues) error.issues = extra.issues;
  return { ok: false, error };
};

export const getStatusCode = (kind: ErrorKind): number => {
  return ErrorStatusCodes[kind] ?? 500;
};
