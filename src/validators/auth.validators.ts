import { z } from "zod";
import { FieldIssue } from "../utils/errors";
import { fitsBcrypt } from "../utils/password";

// bcrypt only reads the first 72 bytes of the UTF-8 encoding
const password = z
  .string({ required_error: "Password is required" })
  .min(8, "Password must be at least 8 characters")
  .refine((value) => fitsBcrypt(value), "Password must not exceed 72 bytes");

export const registerSchema = z.object({
  email: z.string({ required_error: "Email is required" }).trim().email("Invalid email format").max(255),
  username: z
    .string({ required_error: "Username is required" })
    .trim()
    .min(3, "Username must be at least 3 characters")
    .max(50, "Username must not exceed 50 characters")
    .regex(/^[A-Za-z0-9_.-]+$/, "Username may contain letters, digits, '_', '.' and '-' only"),
  password,
});

export const loginSchema = z.object({
  username: z.string({ required_error: "Username or email is required" }).trim().min(1, "Username or email is required"),
  password: z.string({ required_error: "Password is required" }).min(1, "Password is required"),
  remember_me: z.boolean().default(false),
});

// OAuth2 password-grant form: everything arrives as strings
export const loginFormSchema = z.object({
  username: z.string({ required_error: "Username or email is required" }).trim().min(1, "Username or email is required"),
  password: z.string({ required_error: "Password is required" }).min(1, "Password is required"),
  grant_type: z.literal("password").optional(),
  scope: z.string().optional(),
});

export const refreshTokenSchema = z.object({
  refresh_token: z.string({ required_error: "Refresh token is required" }).trim().min(1, "Refresh token is required"),
});

export const changePasswordSchema = z.object({
  old_password: z.string({ required_error: "Current password is required" }).min(1, "Current password is required"),
  new_password: password,
});

export const deleteAccountSchema = z.object({
  password: z.string({ required_error: "Password is required" }).min(1, "Password is required"),
});

export type Parsed<T> = { ok: true; data: T } | { ok: false; issues: FieldIssue[] };

export const parseBody = <S extends z.ZodTypeAny>(schema: S, body: unknown): Parsed<z.output<S>> => {
  const result = schema.safeParse(body ?? {});
  if (result.success) {
    return { ok: true, data: result.data };
  }

  return {
    ok: false,
    issues: result.error.issues.map((issue) => ({
      field: issue.path.join(".") || "body",
      message: issue.message,
    })),
  };
};
