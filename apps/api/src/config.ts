type Env = Record<string, string | undefined>;

export interface ApiConfig {
  port: number;
  host: string;
  mediaRoot: string;
  bodyLimit: number;
}

const DEFAULT_BODY_LIMIT = 20 * 1024 * 1024;

/**
 * DATABASE_URL wins; otherwise the URL is assembled from the POSTGRES_* and
 * DB_* variables of the shared compose env file.
 */
export function databaseUrl(env: Env): string {
  const explicit = env.DATABASE_URL?.trim();
  if (explicit) return explicit;

  const user = encodeURIComponent(env.POSTGRES_USER ?? "foodgram");
  const password = env.POSTGRES_PASSWORD ? `:${encodeURIComponent(env.POSTGRES_PASSWORD)}` : "";
  const host = env.DB_HOST ?? "localhost";
  const port = env.DB_PORT ?? "5432";
  const database = encodeURIComponent(env.POSTGRES_DB ?? "foodgram");
  return `postgresql://${user}${password}@${host}:${port}/${database}`;
}

function mediaRoot(env: Env = process.env): string {
  return env.MEDIA_ROOT?.trim() || "/app/media";
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const value = Number(raw ?? fallback);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export function loadApiConfig(env: Env = process.env): ApiConfig {
  return {
    port: positiveInt(env.PORT, 8000),
    host: env.HOST?.trim() || "0.0.0.0",
    mediaRoot: mediaRoot(env),
    // Recipe images arrive base64-encoded inside the JSON body.
    bodyLimit: positiveInt(env.BODY_LIMIT_BYTES, DEFAULT_BODY_LIMIT),
  };
}
