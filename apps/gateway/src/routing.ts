import { posix } from "node:path";
import type { GatewayConfig } from "./config.js";

export type RouteKind = "docs" | "upstream" | "spa";

export interface RouteRule {
  prefix: string;
  kind: RouteKind;
  /** Only upstream rules carry one; an upstream rule without it uses the server default. */
  bodyLimit?: number;
}

export type RouteTable = readonly RouteRule[];

export const DOCS_PREFIX = "/api/docs/";

export function buildRouteTable(config: Pick<GatewayConfig, "proxyBodyLimit">): RouteTable {
  return [
    { prefix: DOCS_PREFIX, kind: "docs" },
    { prefix: "/api/", kind: "upstream", bodyLimit: config.proxyBodyLimit },
    { prefix: "/admin/", kind: "upstream", bodyLimit: config.proxyBodyLimit },
    { prefix: "/media/", kind: "upstream" },
    { prefix: "/", kind: "spa" },
  ];
}

/**
 * Longest matching prefix wins, whatever the order of the table.
 * The table always holds "/", so a normalised path always resolves.
 */
export function resolveRoute(table: RouteTable, path: string): RouteRule {
  let best: RouteRule | null = null;
  for (const rule of table) {
    if (!path.startsWith(rule.prefix)) continue;
    if (!best || rule.prefix.length > best.prefix.length) best = rule;
  }
  if (!best) {
    throw new Error(`No route matches ${path}; the table must contain "/"`);
  }
  return best;
}

export function effectiveBodyLimit(rule: RouteRule, defaultBodyLimit: number): number {
  return rule.bodyLimit ?? defaultBodyLimit;
}

/**
 * Decodes and normalises the path part of a request URL.
 * Returns null for a path that cannot be decoded or is not absolute.
 */
export function normalizeRequestPath(url: string): string | null {
  const rawPath = url.split("?", 1)[0];
  let decoded: string;
  try {
    decoded = decodeURIComponent(rawPath);
  } catch {
    return null;
  }
  if (!decoded.startsWith("/") || decoded.includes("\0")) return null;
  const slashed = decoded.replace(/\\/g, "/");
  // A trailing "." or ".." names a directory, so the result keeps its slash.
  const directory = /\/\.{1,2}$/.test(slashed);
  return posix.normalize(directory ? `${slashed}/` : slashed);
}
