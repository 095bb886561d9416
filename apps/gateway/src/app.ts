import Fastify, { type FastifyServerOptions } from "fastify";
import replyFrom from "@fastify/reply-from";
import fastifyStatic from "@fastify/static";
import type { GatewayConfig } from "./config.js";
import { buildRouteTable } from "./routing.js";
import { gatewayRoutes } from "./routes/gateway.js";

export async function buildGateway(config: GatewayConfig, options: Pick<FastifyServerOptions, "logger"> = {}) {
  const app = Fastify({
    logger: options.logger ?? true,
    bodyLimit: config.defaultBodyLimit,
  });
  const table = buildRouteTable(config);

  await app.register(replyFrom, {
    base: config.backendUrl,
    undici: {
      headersTimeout: config.upstreamTimeoutMs,
      bodyTimeout: config.upstreamTimeoutMs,
    },
  });
  await app.register(fastifyStatic, { root: config.staticRoot, serve: false });
  await app.register(gatewayRoutes, { config, table });

  app.log.info(
    { routes: table.map((rule) => `${rule.prefix} -> ${rule.kind}`), backend: config.backendUrl },
    "gateway routing table",
  );

  return app;
}
