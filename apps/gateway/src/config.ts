export interface GatewayConfig {
  port: number;
  host: string;
  backendUrl: string;
  staticRoot: string;
  docsRoot: string;
  proxyBodyLimit: number;
  defaultBodyLimit: number;
  upstreamTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

const DEFAULTS = {
  port: 80,
  host: "0.0.0.0",
  backendUrl: "http://backend:8000",
  staticRoot: "/staticfiles",
  docsRoot: "/usr/share/nginx/html/api/docs",
  proxyBodyLimit: 20 * 1024 * 1024,
  defaultBodyLimit: 1024 * 1024,
  upstreamTimeoutMs: 60_000,
} satisfies GatewayConfig;

const SIZE_UNITS: Record<string, number> = {
  "": 1,
  k: 1024,
  m: 1024 * 1024,
  g: 1024 * 1024 * 1024,
};

/**
 * Parses a size in nginx notation (`512`, `64k`, `20m`, `1g`) into bytes.
 * Returns null when the value is not a size.
 */
export function parseSize(raw: string): number | null {
  const match = /^(\d+)([kmg]?)$/i.exec(raw.trim());
  if (!match) return null;
  const value = Number(match[1]);
  const unit = SIZE_UNITS[match[2].toLowerCase()];
  if (!Number.isSafeInteger(value) || unit === undefined) return null;
  return value * unit;
}

function readSize(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  return parseSize(raw) ?? fallback;
}

function readPositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw ?? fallback);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function readBackendUrl(raw: string | undefined): string {
  const value = raw?.trim() || DEFAULTS.backendUrl;
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`BACKEND_URL is not a valid URL: ${value}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new Error(`BACKEND_URL must use http or https: ${value}`);
  }
  return url.origin;
}

export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  return {
    port: readPositiveInt(env.PORT, DEFAULTS.port),
    host: env.HOST?.trim() || DEFAULTS.host,
    backendUrl: readBackendUrl(env.BACKEND_URL),
    staticRoot: env.STATIC_ROOT?.trim() || DEFAULTS.staticRoot,
    docsRoot: env.DOCS_ROOT?.trim() || DEFAULTS.docsRoot,
    proxyBodyLimit: readSize(env.PROXY_BODY_LIMIT, DEFAULTS.proxyBodyLimit),
    defaultBodyLimit: readSize(env.DEFAULT_BODY_LIMIT, DEFAULTS.defaultBodyLimit),
    upstreamTimeoutMs: readPositiveInt(env.UPSTREAM_TIMEOUT_MS, DEFAULTS.upstreamTimeoutMs),
  };
}
