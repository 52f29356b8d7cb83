import { changePasswordSchema, loginSchema, parseBody, registerSchema } from "./auth.validators";

describe("auth validators", () => {
  it("trims register fields", () => {
    expect(
      parseBody(registerSchema, { email: " a@example.com ", username: " alice ", password: "Secret123!" })
    ).toEqual({
      ok: true,
      data: { email: "a@example.com", username: "alice", password: "Secret123!" },
    });
  });

  it("rejects usernames with other characters", () => {
    const parsed = parseBody(registerSchema, {
      email: "a@example.com",
      username: "al ice",
      password: "Secret123!",
    });
    expect(parsed).toEqual({
      ok: false,
      issues: [{ field: "username", message: "Username may contain letters, digits, '_', '.' and '-' only" }],
    });
  });

  it("rejects passwords bcrypt would truncate", () => {
    const parsed = parseBody(changePasswordSchema, { old_password: "x", new_password: "a".repeat(73) });
    expect(parsed).toEqual({
      ok: false,
      issues: [{ field: "new_password", message: "Password must not exceed 72 bytes" }],
    });
  });

  it("counts multibyte characters by their encoded size", () => {
    // 40 characters, 80 bytes
    const parsed = parseBody(registerSchema, {
      email: "a@example.com",
      username: "alice",
      password: "é".repeat(40),
    });
    expect(parsed).toEqual({
      ok: false,
      issues: [{ field: "password", message: "Password must not exceed 72 bytes" }],
    });
  });

  it("defaults remember_me to false", () => {
    expect(parseBody(loginSchema, { username: "alice", password: "x" })).toEqual({
      ok: true,
      data: { username: "alice", password: "x", remember_me: false },
    });
  });

  it("reports missing fields by name", () => {
    expect(parseBody(loginSchema, undefined)).toEqual({
      ok: false,
      issues: [
        { field: "username", message: "Username or email is required" },
        { field: "password", message: "Password is required" },
      ],
    });
  });
});
