import { startTestApp, type TestApp } from "../../../__tests__/support/harness.js";
import { verifyAccess } from "../tokens.js";

const registration = {
  firstName: "Sara",
  lastName: "Bekele",
  email: "Sara@Example.com",
  password: "Passw0rdX",
};

describe("auth routes", () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await startTestApp();
  });

  afterEach(async () => {
    await t.close();
  });

  it("registers, normalises the email and returns a working token", async () => {
    const res = await t.http.post("/api/auth/register", registration);

    expect(res.status).toBe(201);
    expect(res.data.user).toMatchObject({
      email: "sara@example.com",
      firstName: "Sara",
      lastName: "Bekele",
      fullName: "Sara Bekele",
    });
    expect(res.data.user.passwordHash).toBeUndefined();
    expect(verifyAccess(res.data.accessToken).sub).toBe(res.data.user.id);

    const me = await t.http.get("/api/me", { headers: { Authorization: `Bearer ${res.data.accessToken}` } });
    expect(me.status).toBe(200);
    expect(me.data.user.id).toBe(res.data.user.id);
  });

  it("rejects a duplicate email", async () => {
    await t.http.post("/api/auth/register", registration);
    const res = await t.http.post("/api/auth/register", { ...registration, email: "sara@example.com" });

    expect(res.status).toBe(400);
    expect(res.data).toEqual({ error: "A user with this email already exists." });
  });

  it("enforces the password policy", async () => {
    const res = await t.http.post("/api/auth/register", { ...registration, password: "short" });

    expect(res.status).toBe(400);
    expect(res.data.details.fieldErrors.password).toContain("Password must be at least 8 characters");
  });

  it("logs in with the right password only", async () => {
    await t.http.post("/api/auth/register", registration);

    const ok = await t.http.post("/api/auth/login", { email: "sara@example.com", password: "Passw0rdX" });
    const bad = await t.http.post("/api/auth/login", { email: "sara@example.com", password: "wrong" });
    const unknown = await t.http.post("/api/auth/login", { email: "nobody@example.com", password: "Passw0rdX" });

    expect(ok.status).toBe(200);
    expect(typeof ok.data.accessToken).toBe("string");
    expect(bad.status).toBe(401);
    expect(bad.data).toEqual({ error: "Invalid email or password." });
    expect(unknown.status).toBe(401);
  });

  it("limits login attempts to five a minute", async () => {
    const attempt = () => t.http.post("/api/auth/login", { email: "nobody@example.com", password: "x" });
    for (let i = 0; i < 5; i++) expect((await attempt()).status).toBe(401);

    const blocked = await attempt();
    expect(blocked.status).toBe(429);
    expect(blocked.data).toEqual({ error: "Too many requests." });
  });

  it("rejects a forged token", async () => {
    const res = await t.http.get("/api/me", { headers: { Authorization: "Bearer not.a.jwt" } });

    expect(res.status).toBe(401);
    expect(res.data).toEqual({ error: "Invalid or expired token." });
  });
});
