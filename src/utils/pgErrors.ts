import { DuplicateField } from "../types/auth";

const UNIQUE_VIOLATION = "23505";

interface PgErrorFields {
  code?: string;
  constraint?: string;
  detail?: string;
}

const readString = (source: object, key: string): string | undefined => {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : undefined;
};

// drizzle may wrap the driver error, so look at `cause` as well
const pgErrorOf = (error: unknown): PgErrorFields | null => {
  if (typeof error !== "object" || error === null) return null;

  const code = readString(error, "code");
  if (code) {
    return {
      code,
      constraint: readString(error, "constraint"),
      detail: readString(error, "detail"),
    };
  }

  const cause: unknown = Reflect.get(error, "cause");
  return cause === error ? null : pgErrorOf(cause);
};

/**
 * Maps a Postgres unique violation on users to the field that collided.
 * Returns null for any other error.
 */
export const duplicateUserFieldOf = (error: unknown): DuplicateField | null => {
  const pgError = pgErrorOf(error);
  if (pgError?.code !== UNIQUE_VIOLATION) return null;

  const hint = `${pgError.constraint ?? ""} ${pgError.detail ?? ""}`;
  if (/username/i.test(hint)) return "username";
  return "email";
};
