export const ROLES = ["user", "admin"] as const;

export type Role = typeof ROLES[number];

export const isRole = (value: unknown): value is Role => {
  return ROLES.some((role) => role === value);
};
