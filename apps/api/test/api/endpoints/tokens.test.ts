import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { hashPassword } from "../../../src/passwords.js";
import { authHeaders, buildApiTestApp } from "../utils/app.js";
import * as authMock from "../utils/authMock.js";
import * as dbMock from "../utils/dbMock.js";
import { AUTHOR, AUTHOR_TOKEN } from "../utils/fixtures.js";

vi.mock("../../../src/auth.js", async () => {
  const mocked = await import("../utils/authMock.js");
  return mocked.getAuthMockModule();
});
vi.mock("../../../src/db.js", async () => {
  const mocked = await import("../utils/dbMock.js");
  return mocked.createDbModuleMock();
});

const ISSUED_KEY = "0123456789abcdef0123456789abcdef01234567";

async function buildApp() {
  return buildApiTestApp();
}

describe("/api/auth/token", () => {
  let storedHash: string;

  beforeEach(async () => {
    authMock.resetAuthMocks();
    authMock.setAuthToken(AUTHOR_TOKEN, AUTHOR);
    dbMock.resetDbMock();
    storedHash = await hashPassword("test-secret-pass");
  });

  afterEach(() => {
    authMock.resetAuthMocks();
    dbMock.resetDbMock();
  });

  function loginHandler(isActive = true) {
    return async (text: string, params?: unknown[]) => {
      if (text.includes("FROM users WHERE email = $1") && params?.[0] === AUTHOR.email) {
        return dbMock.queryRows({ id: AUTHOR.id, password: storedHash, is_active: isActive });
      }
      if (text.includes("INSERT INTO auth_tokens")) return dbMock.queryRows({ key: ISSUED_KEY });
      return dbMock.queryNoRows();
    };
  }

  it("issues a token for valid credentials", async () => {
    dbMock.setQueryHandler(loginHandler());

    const app = await buildApp();
    const response = await app.inject({
      method: "POST",
      url: "/api/auth/token/login/",
      payload: { email: " author@example.com ", password: "test-secret-pass" },
    });
    await app.close();

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ auth_token: ISSUED_KEY });
    expect(dbMock.findQueries("FROM users WHERE email = $1")[0].params).toEqual(["author@example.com"]);

    const [upsert] = dbMock.findQueries("INSERT INTO auth_tokens");
    expect(upsert.params?.[0]).toMatch(/^[0-9a-f]{40}$/);
    expect(upsert.params?.[1]).toBe(AUTHOR.id);
  });

  it("matches the email exactly, as stored", async () => {
    dbMock.setQueryHandler(loginHandler());

    const app = await buildApp();
    const response = await app.inject({
      method: "POST",
      url: "/api/auth/token/login/",
      payload: { email: "Author@Example.com", password: "test-secret-pass" },
    });
    await app.close();

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: "Unable to log in with provided credentials." });
    expect(dbMock.findQueries("FROM users WHERE email = $1")[0].params).toEqual(["Author@Example.com"]);
    expect(dbMock.findQueries("INSERT INTO auth_tokens")).toHaveLength(0);
  });

  it("rejects a wrong password and an inactive account alike", async () => {
    dbMock.setQueryHandler(loginHandler());
    const app = await buildApp();
    const wrong = await app.inject({
      method: "POST",
      url: "/api/auth/token/login/",
      payload: { email: AUTHOR.email, password: "test-secret-wrong" },
    });

    dbMock.setQueryHandler(loginHandler(false));
    const inactive = await app.inject({
      method: "POST",
      url: "/api/auth/token/login/",
      payload: { email: AUTHOR.email, password: "test-secret-pass" },
    });
    await app.close();

    for (const response of [wrong, inactive]) {
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: "Unable to log in with provided credentials." });
    }
    expect(dbMock.findQueries("INSERT INTO auth_tokens")).toHaveLength(0);
  });

  it("requires both email and password", async () => {
    const app = await buildApp();
    const response = await app.inject({
      method: "POST",
      url: "/api/auth/token/login/",
      payload: { email: AUTHOR.email },
    });
    await app.close();

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: "email and password are required" });
  });

  it("deletes the caller's token on logout", async () => {
    const app = await buildApp();
    const response = await app.inject({
      method: "POST",
      url: "/api/auth/token/logout/",
      headers: authHeaders(AUTHOR_TOKEN),
    });
    await app.close();

    expect(response.statusCode).toBe(204);
    expect(dbMock.findQueries("DELETE FROM auth_tokens")[0].params).toEqual([AUTHOR_TOKEN]);
  });

  it("refuses logout without a token", async () => {
    const app = await buildApp();
    const response = await app.inject({ method: "POST", url: "/api/auth/token/logout/" });
    await app.close();

    expect(response.statusCode).toBe(401);
  });
});
