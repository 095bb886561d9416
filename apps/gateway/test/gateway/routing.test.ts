import { describe, expect, it } from "vitest";
import { loadGatewayConfig, parseSize } from "../../src/config.js";
import {
  buildRouteTable,
  effectiveBodyLimit,
  normalizeRequestPath,
  resolveRoute,
  type RouteTable,
} from "../../src/routing.js";

const MB = 1024 * 1024;
const table = buildRouteTable({ proxyBodyLimit: 20 * MB });

describe("route table", () => {
  it("declares the five prefixes with their actions", () => {
    expect(table.map((rule) => [rule.prefix, rule.kind, rule.bodyLimit])).toEqual([
      ["/api/docs/", "docs", undefined],
      ["/api/", "upstream", 20 * MB],
      ["/admin/", "upstream", 20 * MB],
      ["/media/", "upstream", undefined],
      ["/", "spa", undefined],
    ]);
  });

  it.each([
    ["/api/docs/", "/api/docs/"],
    ["/api/docs/openapi-schema.yml", "/api/docs/"],
    ["/api/recipes/", "/api/"],
    ["/api/docs", "/api/"],
    ["/admin/recipes/", "/admin/"],
    ["/media/recipes/images/a.png", "/media/"],
    ["/api", "/"],
    ["/admin", "/"],
    ["/recipes/12", "/"],
    ["/", "/"],
  ])("resolves %s to %s", (path, prefix) => {
    expect(resolveRoute(table, path).prefix).toBe(prefix);
  });

  it("prefers the more specific prefix whatever the declaration order", () => {
    const reversed: RouteTable = [...table].reverse();
    expect(resolveRoute(reversed, "/api/docs/redoc.html").kind).toBe("docs");
    expect(resolveRoute(reversed, "/api/users/").kind).toBe("upstream");
  });

  it("throws when the table has no root rule", () => {
    expect(() => resolveRoute([{ prefix: "/api/", kind: "upstream" }], "/other")).toThrow(
      'No route matches /other; the table must contain "/"',
    );
  });

  it("falls back to the server default when a rule sets no body limit", () => {
    expect(effectiveBodyLimit(resolveRoute(table, "/media/a.png"), MB)).toBe(MB);
    expect(effectiveBodyLimit(resolveRoute(table, "/admin/"), MB)).toBe(20 * MB);
  });
});

describe("normalizeRequestPath", () => {
  it.each([
    ["/api/recipes/?page=2", "/api/recipes/"],
    ["/a//b/./c", "/a/b/c"],
    ["/media/../api/users/", "/api/users/"],
    ["/../../etc/passwd", "/etc/passwd"],
    ["/%2e%2e/secret.txt", "/secret.txt"],
    ["/recipes/caf%C3%A9", "/recipes/café"],
    ["/api/docs/.", "/api/docs/"],
    ["/api/docs/%2e", "/api/docs/"],
    ["/api/docs/redoc/..", "/api/docs/"],
    ["/..", "/"],
    ["/a\\..\\b", "/b"],
  ])("normalises %s to %s", (url, expected) => {
    expect(normalizeRequestPath(url)).toBe(expected);
  });

  it.each([["/%E0%A4%A"], ["relative/path"], ["/nul%00byte"]])("rejects %s", (url) => {
    expect(normalizeRequestPath(url)).toBeNull();
  });
});

describe("gateway configuration", () => {
  it("parses nginx size notation", () => {
    expect(parseSize("512")).toBe(512);
    expect(parseSize("64k")).toBe(64 * 1024);
    expect(parseSize("20M")).toBe(20 * MB);
    expect(parseSize("1g")).toBe(1024 * MB);
    expect(parseSize("20 MB")).toBeNull();
    expect(parseSize("-1")).toBeNull();
  });

  it("uses defaults for an empty environment", () => {
    expect(loadGatewayConfig({})).toEqual({
      port: 80,
      host: "0.0.0.0",
      backendUrl: "http://backend:8000",
      staticRoot: "/staticfiles",
      docsRoot: "/usr/share/nginx/html/api/docs",
      proxyBodyLimit: 20 * MB,
      defaultBodyLimit: MB,
      upstreamTimeoutMs: 60_000,
    });
  });

  it("reads overrides and ignores invalid numbers", () => {
    const config = loadGatewayConfig({
      PORT: "9000",
      BACKEND_URL: "http://127.0.0.1:8000/ignored/path",
      PROXY_BODY_LIMIT: "5m",
      DEFAULT_BODY_LIMIT: "lots",
      UPSTREAM_TIMEOUT_MS: "-3",
    });

    expect(config.port).toBe(9000);
    expect(config.backendUrl).toBe("http://127.0.0.1:8000");
    expect(config.proxyBodyLimit).toBe(5 * MB);
    expect(config.defaultBodyLimit).toBe(MB);
    expect(config.upstreamTimeoutMs).toBe(60_000);
  });

  it("rejects a backend URL that is not http", () => {
    expect(() => loadGatewayConfig({ BACKEND_URL: "not a url" })).toThrow(
      "BACKEND_URL is not a valid URL: not a url",
    );
    expect(() => loadGatewayConfig({ BACKEND_URL: "ftp://backend" })).toThrow(
      "BACKEND_URL must use http or https: ftp://backend",
    );
  });
});
