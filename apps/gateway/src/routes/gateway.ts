import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { BodyLimitStream, PayloadTooLargeError, declaredLength } from "../body-limit.js";
import type { GatewayConfig } from "../config.js";
import {
  DOCS_PREFIX,
  effectiveBodyLimit,
  normalizeRequestPath,
  resolveRoute,
  type RouteRule,
  type RouteTable,
} from "../routing.js";
import { lookupDocsFile, lookupSpaFile, type StaticTarget } from "../static-files.js";

export interface GatewayRoutesOptions {
  config: GatewayConfig;
  table: RouteTable;
}

interface ResolvedRequest {
  path: string;
  rule: RouteRule;
}

function sendStatic(reply: FastifyReply, target: StaticTarget | null) {
  if (!target) return reply.code(404).send({ error: "Not Found" });
  return reply.sendFile(target.file, target.root);
}

function rejectNonRead(req: FastifyRequest, reply: FastifyReply): boolean {
  if (req.method === "GET" || req.method === "HEAD") return false;
  reply.code(405).header("allow", "GET, HEAD").send({ error: "Method Not Allowed" });
  return true;
}

export async function gatewayRoutes(app: FastifyInstance, opts: GatewayRoutesOptions) {
  const { config, table } = opts;
  const limiters = new WeakMap<FastifyRequest, BodyLimitStream>();

  function resolve(req: FastifyRequest): ResolvedRequest | null {
    const path = normalizeRequestPath(req.url);
    if (path === null) return null;
    return { path, rule: resolveRoute(table, path) };
  }

  // Bodies are streamed to the upstream untouched; static routes never read them.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", (_req, payload, done) => {
    done(null, payload);
  });

  app.addHook("onRequest", async (req, reply) => {
    const resolved = resolve(req);
    if (!resolved) {
      return reply.code(400).send({ error: "Bad Request" });
    }

    req.log.debug({ prefix: resolved.rule.prefix, kind: resolved.rule.kind }, "route resolved");

    if (resolved.rule.kind !== "upstream") return;
    const limit = effectiveBodyLimit(resolved.rule, config.defaultBodyLimit);
    const length = declaredLength(req.headers["content-length"]);
    if (length !== null && length > limit) {
      throw new PayloadTooLargeError(limit);
    }
  });

  app.addHook("preParsing", async (req, _reply, payload) => {
    const resolved = resolve(req);
    if (!resolved || resolved.rule.kind !== "upstream") return payload;
    const limiter = new BodyLimitStream(effectiveBodyLimit(resolved.rule, config.defaultBodyLimit));
    limiters.set(req, limiter);
    payload.on("error", (err) => limiter.destroy(err));
    return payload.pipe(limiter);
  });

  async function dispatch(req: FastifyRequest, reply: FastifyReply) {
    const resolved = resolve(req);
    if (!resolved) return reply.code(400).send({ error: "Bad Request" });
    const { path, rule } = resolved;

    switch (rule.kind) {
      case "upstream":
        return reply.from(req.url, {
          rewriteRequestHeaders: (original, headers) => ({ ...headers, host: original.headers.host }),
          // A chunked body over the limit aborts the upload and lands here.
          onError: (errorReply, { error }) => {
            const limiter = limiters.get(req);
            if (limiter?.exceeded) {
              errorReply.send(new PayloadTooLargeError(limiter.limit));
              return;
            }
            errorReply.send(error);
          },
        });
      case "docs":
        if (rejectNonRead(req, reply)) return reply;
        return sendStatic(reply, await lookupDocsFile(config.docsRoot, path.slice(DOCS_PREFIX.length)));
      case "spa":
        if (rejectNonRead(req, reply)) return reply;
        return sendStatic(reply, await lookupSpaFile(config.staticRoot, path));
    }
  }

  app.all("/", dispatch);
  app.all("/*", dispatch);
}
