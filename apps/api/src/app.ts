import Fastify, { type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import fastifyStatic from "@fastify/static";
import { verifyOptionalAuth } from "./auth.js";
import type { ApiConfig } from "./config.js";
import { adminRoutes } from "./routes/admin.js";
import { healthRoutes } from "./routes/health.js";
import { ingredientRoutes } from "./routes/ingredients.js";
import { recipeRoutes } from "./routes/recipes.js";
import { tagRoutes } from "./routes/tags.js";
import { tokenRoutes } from "./routes/tokens.js";
import { userRoutes } from "./routes/users.js";

export async function buildApi(config: ApiConfig, options: Pick<FastifyServerOptions, "logger"> = {}) {
  const app = Fastify({
    logger: options.logger ?? true,
    bodyLimit: config.bodyLimit,
    ignoreTrailingSlash: true,
  });

  await app.register(cors, { origin: true, methods: ["GET", "HEAD", "PUT", "PATCH", "POST", "DELETE"] });

  await app.register(async (subApp) => {
    // A token that is sent must be valid, whatever the route.
    subApp.addHook("onRequest", async (req, reply) => {
      await verifyOptionalAuth(req, reply);
      if (reply.sent) return reply;
    });

    await subApp.register(healthRoutes);
    await subApp.register(tokenRoutes);
    await subApp.register(userRoutes);
    await subApp.register(tagRoutes);
    await subApp.register(ingredientRoutes);
    await subApp.register(recipeRoutes, { mediaRoot: config.mediaRoot });
  }, { prefix: "/api" });

  await app.register(adminRoutes, { prefix: "/admin" });

  await app.register(fastifyStatic, { root: config.mediaRoot, prefix: "/media/" });

  return app;
}
