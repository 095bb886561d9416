import type { FastifyRequest } from "fastify";

/** Origin as the client saw it; the gateway forwards the original Host header. */
export function requestOrigin(req: FastifyRequest): string {
  const forwardedProto = req.headers["x-forwarded-proto"];
  const protocol = (Array.isArray(forwardedProto) ? forwardedProto[0] : forwardedProto) ?? req.protocol;
  const host = req.headers.host ?? "localhost";
  return `${protocol}://${host}`;
}

export function requestUrl(req: FastifyRequest): URL {
  return new URL(req.url, requestOrigin(req));
}

export function mediaUrl(req: FastifyRequest, relPath: string): string {
  const encoded = relPath.split("/").map(encodeURIComponent).join("/");
  return `${requestOrigin(req)}/media/${encoded}`;
}
