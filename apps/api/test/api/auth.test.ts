import Fastify from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { verifyAuth, verifyOptionalAuth } from "../../src/auth.js";
import * as dbMock from "./utils/dbMock.js";

vi.mock("../../src/db.js", async () => {
  const mocked = await import("./utils/dbMock.js");
  return mocked.createDbModuleMock();
});

const TOKEN = "a".repeat(40);
const USER_ROW = {
  id: 1,
  email: "author@example.com",
  username: "author",
  first_name: "Anna",
  last_name: "Cook",
  is_staff: true,
};

async function buildApp() {
  const app = Fastify({ logger: false });
  app.get("/private", { preHandler: verifyAuth }, async (req) => req.auth ?? null);
  app.get("/public", { preHandler: verifyOptionalAuth }, async (req) => ({ viewer: req.auth?.id ?? null }));
  return app;
}

describe("token authentication", () => {
  beforeEach(() => {
    dbMock.resetDbMock();
    dbMock.setQueryHandler(async (_text, params) =>
      params?.[0] === TOKEN ? dbMock.queryRows(USER_ROW) : dbMock.queryNoRows(),
    );
  });

  afterEach(() => {
    dbMock.resetDbMock();
  });

  it("resolves a known token to its user", async () => {
    const app = await buildApp();
    const response = await app.inject({
      method: "GET",
      url: "/private",
      headers: { authorization: `Token ${TOKEN}` },
    });
    await app.close();

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      id: 1,
      email: "author@example.com",
      username: "author",
      firstName: "Anna",
      lastName: "Cook",
      isStaff: true,
      token: TOKEN,
    });
    expect(dbMock.getQueryLog()[0].text).toContain("u.is_active = true");
  });

  it("answers a missing header with a problem document", async () => {
    const app = await buildApp();
    const response = await app.inject({ method: "GET", url: "/private" });
    await app.close();

    expect(response.statusCode).toBe(401);
    expect(response.headers["content-type"]).toContain("application/problem+json");
    expect(response.json()).toEqual({
      type: "https://tools.ietf.org/html/rfc7807#section-3.1",
      title: "Unauthorized",
      status: 401,
      detail: "Authentication credentials were not provided",
      instance: "/private",
    });
  });

  it("rejects a bearer scheme and an unknown token", async () => {
    const app = await buildApp();
    const bearer = await app.inject({
      method: "GET",
      url: "/private",
      headers: { authorization: `Bearer ${TOKEN}` },
    });
    const unknown = await app.inject({
      method: "GET",
      url: "/private",
      headers: { authorization: "Token unknown-token" },
    });
    await app.close();

    expect(bearer.json()).toMatchObject({ status: 401, detail: "Missing or invalid Authorization header" });
    expect(unknown.json()).toMatchObject({ status: 401, detail: "Invalid token" });
  });

  it("looks a token up once per request", async () => {
    const app = Fastify({ logger: false });
    app.get("/both", { preHandler: [verifyOptionalAuth, verifyAuth] }, async (req) => ({ viewer: req.auth?.id ?? null }));

    const response = await app.inject({
      method: "GET",
      url: "/both",
      headers: { authorization: `Token ${TOKEN}` },
    });
    await app.close();

    expect(response.json()).toEqual({ viewer: 1 });
    expect(dbMock.getQueryLog()).toHaveLength(1);
  });

  it("lets anonymous callers through optional routes", async () => {
    const app = await buildApp();
    const anonymous = await app.inject({ method: "GET", url: "/public" });
    const known = await app.inject({
      method: "GET",
      url: "/public",
      headers: { authorization: `Token ${TOKEN}` },
    });
    const invalid = await app.inject({
      method: "GET",
      url: "/public",
      headers: { authorization: "Token unknown-token" },
    });
    await app.close();

    expect(anonymous.json()).toEqual({ viewer: null });
    expect(known.json()).toEqual({ viewer: 1 });
    expect(invalid.statusCode).toBe(401);
  });

  it("reports a failing lookup as 500", async () => {
    dbMock.setQueryHandler(async () => {
      throw new Error("db-down");
    });

    const app = await buildApp();
    const response = await app.inject({
      method: "GET",
      url: "/private",
      headers: { authorization: `Token ${TOKEN}` },
    });
    await app.close();

    expect(response.statusCode).toBe(500);
    expect(response.json()).toMatchObject({ detail: "Token lookup failed" });
  });
});
